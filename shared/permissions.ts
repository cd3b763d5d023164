/**
 * Permission model.
 *
 * PermissionType is a closed set. Which held grant satisfies which required
 * permission is defined once, in PERMISSION_IMPLIES; every check in the
 * codebase goes through permissionImplies() or grantingPermissionTypes().
 */

export const RESOURCE_TYPES = ["document", "folder"] as const;
export type ResourceType = (typeof RESOURCE_TYPES)[number];

export const PERMISSION_TYPES = ["read", "write", "delete", "manage_folders", "admin"] as const;
export type PermissionType = (typeof PERMISSION_TYPES)[number];

// held -> everything it satisfies on the same resource
const PERMISSION_IMPLIES: Record<PermissionType, readonly PermissionType[]> = {
  read: ["read"],
  write: ["write"],
  delete: ["delete"],
  manage_folders: ["manage_folders"],
  admin: PERMISSION_TYPES,
};

export function permissionImplies(held: PermissionType, required: PermissionType): boolean {
  return PERMISSION_IMPLIES[held].includes(required);
}

/** Every permission type whose grant satisfies `required`, `required` first. */
export function grantingPermissionTypes(required: PermissionType): PermissionType[] {
  const granting: PermissionType[] = [required];
  for (const held of PERMISSION_TYPES) {
    if (held !== required && permissionImplies(held, required)) {
      granting.push(held);
    }
  }
  return granting;
}
