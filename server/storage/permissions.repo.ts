import { and, asc, eq, inArray, sql, type SQL } from "drizzle-orm";
import type { z } from "zod";
import {
  createPermissionSchema,
  documents,
  grantSchema,
  permissionTypeSchema,
  permissions,
  resourceTypeSchema,
  updatePermissionSchema,
  type CreatePermissionInput,
  type GrantInput,
  type Permission,
  type UpdatePermissionInput,
} from "@shared/schema";
import {
  grantingPermissionTypes,
  type PermissionType,
  type ResourceType,
} from "@shared/permissions";
import type { Database } from "../db";
import { AppError } from "../lib/errors";
import {
  paginate,
  type PaginatedResult,
  type PaginationParams,
  type ResolvedPagination,
} from "../lib/pagination";
import { BaseTenantRepository, type OperationOptions } from "./baseTenantRepository";
import type { FoldersRepository } from "./folders.repo";

const permissionNotFound = () => AppError.notFound("Permission not found");

type GrantData = z.output<typeof grantSchema>;

function grantKey(roleId: string, resourceId: string, permissionType: PermissionType): string {
  return `${roleId}|${resourceId}|${permissionType}`;
}

/**
 * Grants of roles on folders and documents.
 *
 * Folder grants reach every descendant folder in two ways: lazily, by
 * walking ancestor paths at check time, and eagerly, as `inherited` copies
 * written by propagatePermissions. The ancestor walk is authoritative; copies
 * are removed whenever their source grant is revoked or changed, or the
 * folder they sit on moves out from under it.
 */
export class PermissionsRepository extends BaseTenantRepository {
  constructor(db: Database, private readonly folders: FoldersRepository) {
    super(db, "permissions");
  }

  /**
   * Creates a direct grant. An identical propagated copy is promoted to a
   * direct grant in place; an identical direct grant is a conflict.
   */
  async create(input: CreatePermissionInput, options: OperationOptions = {}): Promise<Permission> {
    const tenantId = this.requireTenantId(input.tenantId, "permissions.create");
    const grant = this.parse(createPermissionSchema, input, "permissions.create");

    const created = await this.inTransaction(
      "permissions.create",
      async (tx) => {
        await this.assertResourceExists(tx, grant.resourceType, grant.resourceId, tenantId);
        return this.insertOrPromote(tx, grant, tenantId);
      },
      options,
      { tenantId }
    );

    this.log.info("Permission granted", {
      tenantId,
      permissionId: created.id,
      roleId: created.roleId,
      resource: `${created.resourceType}:${created.resourceId}`,
      permissionType: created.permissionType,
    });
    return created;
  }

  async getById(id: string, tenantId: string): Promise<Permission> {
    this.requireTenantId(tenantId, "permissions.getById");
    const permission = await this.run("permissions.getById", () => this.findById(this.db, id, tenantId));
    if (!permission) throw permissionNotFound();
    return permission;
  }

  /**
   * Changes the role or type of a direct grant. Copies propagated from it
   * no longer match and are removed.
   */
  async update(id: string, tenantId: string, patch: UpdatePermissionInput, options: OperationOptions = {}): Promise<Permission> {
    this.requireTenantId(tenantId, "permissions.update");
    const changes = this.parse(updatePermissionSchema, patch, "permissions.update");

    return this.inTransaction(
      "permissions.update",
      async (tx) => {
        const existing = await this.findById(tx, id, tenantId);
        if (!existing) throw permissionNotFound();
        if (existing.inherited) {
          throw AppError.conflict("Inherited permissions are managed through their source grant", {
            permissionId: id,
            sourcePermissionId: existing.sourcePermissionId,
          });
        }

        const roleId = changes.roleId ?? existing.roleId;
        const permissionType = changes.permissionType ?? existing.permissionType;
        if (roleId === existing.roleId && permissionType === existing.permissionType) {
          return existing;
        }

        const [updated] = await tx
          .update(permissions)
          .set({ roleId, permissionType, updatedAt: new Date() })
          .where(and(eq(permissions.id, id), eq(permissions.tenantId, tenantId)))
          .returning();

        const removed = await tx
          .delete(permissions)
          .where(and(eq(permissions.tenantId, tenantId), eq(permissions.sourcePermissionId, id)))
          .returning({ id: permissions.id });
        if (removed.length > 0) {
          this.log.info("Dropped propagated copies of changed grant", { tenantId, permissionId: id, count: removed.length });
        }
        return updated;
      },
      options,
      { tenantId }
    );
  }

  /** Revokes a grant; its propagated copies go with it. */
  async delete(id: string, tenantId: string, options: OperationOptions = {}): Promise<void> {
    this.requireTenantId(tenantId, "permissions.delete");

    await this.inTransaction(
      "permissions.delete",
      async (tx) => {
        const deleted = await tx
          .delete(permissions)
          .where(and(eq(permissions.id, id), eq(permissions.tenantId, tenantId)))
          .returning({ id: permissions.id });
        if (deleted.length === 0) throw permissionNotFound();
      },
      options,
      { tenantId }
    );

    this.log.info("Permission revoked", { tenantId, permissionId: id });
  }

  async getByResourceId(resourceType: ResourceType, resourceId: string, tenantId: string): Promise<Permission[]> {
    this.requireTenantId(tenantId, "permissions.getByResourceId");
    const type = this.parse(resourceTypeSchema, resourceType, "permissions.getByResourceId");

    return this.run("permissions.getByResourceId", () =>
      this.db
        .select()
        .from(permissions)
        .where(
          and(
            eq(permissions.tenantId, tenantId),
            eq(permissions.resourceType, type),
            eq(permissions.resourceId, resourceId)
          )
        )
        .orderBy(asc(permissions.createdAt), asc(permissions.id))
    );
  }

  async getByRoleId(roleId: string, tenantId: string, pagination?: PaginationParams): Promise<PaginatedResult<Permission>> {
    this.requireTenantId(tenantId, "permissions.getByRoleId");
    const page = this.page(pagination, "permissions.getByRoleId");

    return this.run("permissions.getByRoleId", () =>
      this.list(and(eq(permissions.tenantId, tenantId), eq(permissions.roleId, roleId)), page)
    );
  }

  async getByTenant(tenantId: string, pagination?: PaginationParams): Promise<PaginatedResult<Permission>> {
    this.requireTenantId(tenantId, "permissions.getByTenant");
    const page = this.page(pagination, "permissions.getByTenant");

    return this.run("permissions.getByTenant", () => this.list(eq(permissions.tenantId, tenantId), page));
  }

  /**
   * Creates every grant or none of them. Each grant follows the rules of
   * create: an identical copy is promoted, an identical direct grant (also
   * one earlier in the same batch) fails the whole batch.
   */
  async createBulk(grants: GrantInput[], tenantId: string, options: OperationOptions = {}): Promise<Permission[]> {
    this.requireTenantId(tenantId, "permissions.createBulk");
    const parsed = grants.map((grant, index) => this.parse(grantSchema, grant, `permissions.createBulk[${index}]`));
    if (parsed.length === 0) return [];

    const created = await this.inTransaction(
      "permissions.createBulk",
      async (tx) => {
        const rows: Permission[] = [];
        for (const grant of parsed) {
          options.signal?.throwIfAborted();
          await this.assertResourceExists(tx, grant.resourceType, grant.resourceId, tenantId);
          rows.push(await this.insertOrPromote(tx, grant, tenantId));
        }
        return rows;
      },
      options,
      { tenantId }
    );

    this.log.info("Permissions granted in bulk", { tenantId, count: created.length });
    return created;
  }

  async deleteByResourceId(
    resourceType: ResourceType,
    resourceId: string,
    tenantId: string,
    options: OperationOptions = {}
  ): Promise<number> {
    this.requireTenantId(tenantId, "permissions.deleteByResourceId");
    const type = this.parse(resourceTypeSchema, resourceType, "permissions.deleteByResourceId");

    const deleted = await this.inTransaction(
      "permissions.deleteByResourceId",
      (tx) =>
        tx
          .delete(permissions)
          .where(
            and(
              eq(permissions.tenantId, tenantId),
              eq(permissions.resourceType, type),
              eq(permissions.resourceId, resourceId)
            )
          )
          .returning({ id: permissions.id }),
      options,
      { tenantId }
    );

    this.log.info("Permissions revoked by resource", { tenantId, resource: `${type}:${resourceId}`, count: deleted.length });
    return deleted.length;
  }

  async deleteByRoleId(roleId: string, tenantId: string, options: OperationOptions = {}): Promise<number> {
    this.requireTenantId(tenantId, "permissions.deleteByRoleId");

    const deleted = await this.inTransaction(
      "permissions.deleteByRoleId",
      (tx) =>
        tx
          .delete(permissions)
          .where(and(eq(permissions.tenantId, tenantId), eq(permissions.roleId, roleId)))
          .returning({ id: permissions.id }),
      options,
      { tenantId }
    );

    this.log.info("Permissions revoked by role", { tenantId, roleId, count: deleted.length });
    return deleted.length;
  }

  /**
   * True when the role holds `permissionType` (or a type that implies it) on
   * the resource, or, for folders, on any ancestor folder.
   */
  async checkPermission(
    roleId: string,
    resourceType: ResourceType,
    resourceId: string,
    permissionType: PermissionType,
    tenantId: string
  ): Promise<boolean> {
    this.requireTenantId(tenantId, "permissions.checkPermission");
    const type = this.parse(resourceTypeSchema, resourceType, "permissions.checkPermission");
    const required = this.parse(permissionTypeSchema, permissionType, "permissions.checkPermission");
    const granting = grantingPermissionTypes(required);

    return this.run("permissions.checkPermission", async () => {
      if (await this.hasGrant(tenantId, roleId, type, [resourceId], granting)) {
        return true;
      }
      if (type !== "folder") return false;

      const folder = await this.folders.findById(this.db, resourceId, tenantId);
      if (!folder) return false;
      const ancestors = await this.folders.findAncestors(this.db, folder);
      if (ancestors.length === 0) return false;

      return this.hasGrant(
        tenantId,
        roleId,
        "folder",
        ancestors.map((ancestor) => ancestor.id),
        granting
      );
    });
  }

  /**
   * Grants on every ancestor of the folder, root first, each flagged
   * `inherited` on the returned value.
   */
  async getInheritedPermissions(folderId: string, tenantId: string): Promise<Permission[]> {
    const folder = await this.folders.getById(folderId, tenantId);

    return this.run("permissions.getInheritedPermissions", async () => {
      const ancestors = await this.folders.findAncestors(this.db, folder);
      if (ancestors.length === 0) return [];

      const rows = await this.db
        .select()
        .from(permissions)
        .where(
          and(
            eq(permissions.tenantId, tenantId),
            eq(permissions.resourceType, "folder"),
            inArray(
              permissions.resourceId,
              ancestors.map((ancestor) => ancestor.id)
            )
          )
        )
        .orderBy(asc(permissions.createdAt), asc(permissions.id));

      const depth = new Map(ancestors.map((ancestor, index) => [ancestor.id, index]));
      return rows
        .sort((a, b) => (depth.get(a.resourceId) ?? 0) - (depth.get(b.resourceId) ?? 0))
        .map((row) => ({ ...row, inherited: true }));
    });
  }

  /**
   * Copies the folder's direct grants onto every descendant folder that
   * lacks them. Returns the number of copies written.
   */
  async propagatePermissions(folderId: string, tenantId: string, options: OperationOptions = {}): Promise<number> {
    this.requireTenantId(tenantId, "permissions.propagatePermissions");

    const created = await this.inTransaction(
      "permissions.propagatePermissions",
      async (tx) => {
        const folder = await this.folders.findById(tx, folderId, tenantId);
        if (!folder) throw AppError.notFound("Folder not found");

        const direct = await tx
          .select()
          .from(permissions)
          .where(
            and(
              eq(permissions.tenantId, tenantId),
              eq(permissions.resourceType, "folder"),
              eq(permissions.resourceId, folderId),
              eq(permissions.inherited, false)
            )
          );
        if (direct.length === 0) return 0;

        const descendants = await this.folders.findDescendants(tx, folder);
        if (descendants.length === 0) return 0;
        const descendantIds = descendants.map((descendant) => descendant.id);

        const existing = await tx
          .select({
            roleId: permissions.roleId,
            resourceId: permissions.resourceId,
            permissionType: permissions.permissionType,
          })
          .from(permissions)
          .where(
            and(
              eq(permissions.tenantId, tenantId),
              eq(permissions.resourceType, "folder"),
              inArray(permissions.resourceId, descendantIds)
            )
          );
        const present = new Set(existing.map((row) => grantKey(row.roleId, row.resourceId, row.permissionType)));

        const copies: Array<typeof permissions.$inferInsert> = [];
        for (const descendantId of descendantIds) {
          for (const grant of direct) {
            const key = grantKey(grant.roleId, descendantId, grant.permissionType);
            if (present.has(key)) continue;
            present.add(key);
            copies.push({
              tenantId,
              roleId: grant.roleId,
              resourceType: "folder",
              resourceId: descendantId,
              permissionType: grant.permissionType,
              inherited: true,
              sourcePermissionId: grant.id,
              createdBy: grant.createdBy,
            });
          }
        }
        if (copies.length === 0) return 0;

        options.signal?.throwIfAborted();
        const inserted = await tx
          .insert(permissions)
          .values(copies)
          .onConflictDoNothing()
          .returning({ id: permissions.id });
        return inserted.length;
      },
      options,
      { tenantId }
    );

    this.log.info("Permissions propagated", { tenantId, folderId, created });
    return created;
  }

  // ─── Internals ───────────────────────────────────────────────────────────

  private async insertOrPromote(tx: Database, grant: GrantData, tenantId: string): Promise<Permission> {
    const existing = await this.findGrant(tx, tenantId, grant.roleId, grant.resourceType, grant.resourceId, grant.permissionType);
    if (existing && !existing.inherited) {
      throw AppError.conflict("Permission already granted", { permissionId: existing.id });
    }
    if (existing) {
      const [promoted] = await tx
        .update(permissions)
        .set({ inherited: false, sourcePermissionId: null, createdBy: grant.createdBy, updatedAt: new Date() })
        .where(and(eq(permissions.id, existing.id), eq(permissions.tenantId, tenantId)))
        .returning();
      return promoted;
    }

    const [row] = await tx
      .insert(permissions)
      .values({
        tenantId,
        roleId: grant.roleId,
        resourceType: grant.resourceType,
        resourceId: grant.resourceId,
        permissionType: grant.permissionType,
        inherited: false,
        createdBy: grant.createdBy,
      })
      .returning();
    return row;
  }

  private async findById(db: Database, id: string, tenantId: string): Promise<Permission | null> {
    const [permission] = await db
      .select()
      .from(permissions)
      .where(and(eq(permissions.id, id), eq(permissions.tenantId, tenantId)))
      .limit(1);
    return permission ?? null;
  }

  private async findGrant(
    db: Database,
    tenantId: string,
    roleId: string,
    resourceType: ResourceType,
    resourceId: string,
    permissionType: PermissionType
  ): Promise<Permission | null> {
    const [permission] = await db
      .select()
      .from(permissions)
      .where(
        and(
          eq(permissions.tenantId, tenantId),
          eq(permissions.roleId, roleId),
          eq(permissions.resourceType, resourceType),
          eq(permissions.resourceId, resourceId),
          eq(permissions.permissionType, permissionType)
        )
      )
      .limit(1);
    return permission ?? null;
  }

  private async hasGrant(
    tenantId: string,
    roleId: string,
    resourceType: ResourceType,
    resourceIds: string[],
    permissionTypes: PermissionType[]
  ): Promise<boolean> {
    const [row] = await this.db
      .select({ id: permissions.id })
      .from(permissions)
      .where(
        and(
          eq(permissions.tenantId, tenantId),
          eq(permissions.roleId, roleId),
          eq(permissions.resourceType, resourceType),
          inArray(permissions.resourceId, resourceIds),
          inArray(permissions.permissionType, permissionTypes)
        )
      )
      .limit(1);
    return row !== undefined;
  }

  private async assertResourceExists(
    db: Database,
    resourceType: ResourceType,
    resourceId: string,
    tenantId: string
  ): Promise<void> {
    if (resourceType === "folder") {
      if (!(await this.folders.findById(db, resourceId, tenantId))) {
        throw AppError.notFound("Folder not found");
      }
      return;
    }

    const [document] = await db
      .select({ id: documents.id })
      .from(documents)
      .where(and(eq(documents.id, resourceId), eq(documents.tenantId, tenantId)))
      .limit(1);
    if (!document) throw AppError.notFound("Document not found");
  }

  private async list(where: SQL | undefined, page: ResolvedPagination): Promise<PaginatedResult<Permission>> {
    const [{ count }] = await this.db
      .select({ count: sql<number>`count(*)::int` })
      .from(permissions)
      .where(where);
    const items = await this.db
      .select()
      .from(permissions)
      .where(where)
      .orderBy(asc(permissions.createdAt), asc(permissions.id))
      .limit(page.limit)
      .offset(page.offset);
    return paginate(items, count, page);
  }
}
