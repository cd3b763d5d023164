/**
 * Authorization Service
 *
 * Decides whether an authenticated caller may act on a folder or document.
 *
 * - The caller passes if any of its roles holds the permission.
 * - Folder checks include grants on every ancestor folder.
 * - A document without a matching grant of its own falls back to the
 *   folder that contains it.
 *
 * Authentication happens upstream; this service trusts the claims it gets.
 */

import type { PermissionType, ResourceType } from "@shared/permissions";
import { AppError } from "../lib/errors";
import { createLogger } from "../lib/logger";
import type { Storage } from "../storage";
import type { IdentityClaims } from "../storage/tenantScoped";

const log = createLogger("authorization");

export class AuthorizationService {
  constructor(private readonly storage: Storage) {}

  async can(
    claims: IdentityClaims,
    resourceType: ResourceType,
    resourceId: string,
    permission: PermissionType
  ): Promise<boolean> {
    if (claims.roleIds.length === 0) return false;

    if (await this.anyRoleHolds(claims, resourceType, resourceId, permission)) {
      return true;
    }
    if (resourceType !== "document") return false;

    const document = await this.storage.documents.findById(resourceId, claims.tenantId);
    if (!document) return false;
    return this.anyRoleHolds(claims, "folder", document.folderId, permission);
  }

  /** Throws FORBIDDEN unless `can` allows the action. */
  async authorize(
    claims: IdentityClaims,
    resourceType: ResourceType,
    resourceId: string,
    permission: PermissionType
  ): Promise<void> {
    if (await this.can(claims, resourceType, resourceId, permission)) return;

    log.warn("Access denied", {
      tenantId: claims.tenantId,
      userId: claims.userId,
      requestId: claims.requestId,
      resource: `${resourceType}:${resourceId}`,
      permission,
    });
    throw AppError.forbidden(`Missing ${permission} permission on ${resourceType}`);
  }

  private async anyRoleHolds(
    claims: IdentityClaims,
    resourceType: ResourceType,
    resourceId: string,
    permission: PermissionType
  ): Promise<boolean> {
    for (const roleId of claims.roleIds) {
      if (await this.storage.permissions.checkPermission(roleId, resourceType, resourceId, permission, claims.tenantId)) {
        return true;
      }
    }
    return false;
  }
}
