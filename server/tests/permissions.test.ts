import { describe, it, expect, beforeAll, beforeEach, afterAll } from "vitest";
import type { PermissionType, ResourceType } from "@shared/permissions";
import { createPermissionSchema } from "@shared/schema";
import { createTestHarness, createFolderPath, OWNER, TENANT_A, TENANT_B, type TestHarness } from "./harness";

describe("PermissionsRepository", () => {
  let harness: TestHarness;

  beforeAll(async () => {
    harness = await createTestHarness();
  });

  beforeEach(async () => {
    await harness.reset();
  });

  afterAll(async () => {
    await harness.close();
  });

  const permissions = () => harness.storage.permissions;

  function grant(
    roleId: string,
    resourceId: string,
    permissionType: PermissionType,
    resourceType: ResourceType = "folder",
    tenantId = TENANT_A
  ) {
    return permissions().create({ tenantId, roleId, resourceType, resourceId, permissionType, createdBy: OWNER });
  }

  describe("create", () => {
    it("stores a direct grant", async () => {
      const [projects] = await createFolderPath(harness.storage, "/Projects");

      const created = await grant("editors", projects.id, "write");

      expect(created).toMatchObject({
        tenantId: TENANT_A,
        roleId: "editors",
        resourceType: "folder",
        resourceId: projects.id,
        permissionType: "write",
        inherited: false,
        sourcePermissionId: null,
        createdBy: OWNER,
      });
      expect(await permissions().getById(created.id, TENANT_A)).toEqual(created);
    });

    it("requires the resource to exist in the tenant", async () => {
      const [foreign] = await createFolderPath(harness.storage, "/Projects", TENANT_B);

      await expect(grant("editors", "missing-id", "read")).rejects.toMatchObject({ code: "NOT_FOUND" });
      await expect(grant("editors", foreign.id, "read")).rejects.toMatchObject({ code: "NOT_FOUND" });
      await expect(grant("editors", "missing-id", "read", "document")).rejects.toMatchObject({
        code: "NOT_FOUND",
        message: "Document not found",
      });
    });

    it("rejects a duplicate grant", async () => {
      const [projects] = await createFolderPath(harness.storage, "/Projects");
      await grant("editors", projects.id, "write");

      await expect(grant("editors", projects.id, "write")).rejects.toMatchObject({ code: "CONFLICT" });
    });

    it("accepts only known permission types", () => {
      const result = createPermissionSchema.safeParse({
        tenantId: TENANT_A,
        roleId: "editors",
        resourceType: "folder",
        resourceId: "folder-1",
        permissionType: "owner",
        createdBy: OWNER,
      });
      expect(result.success).toBe(false);
    });

    it("hides grants of other tenants", async () => {
      const [projects] = await createFolderPath(harness.storage, "/Projects");
      const created = await grant("editors", projects.id, "write");

      await expect(permissions().getById(created.id, TENANT_B)).rejects.toMatchObject({ code: "NOT_FOUND" });
    });
  });

  describe("update and delete", () => {
    it("changes the permission type of a grant", async () => {
      const [projects] = await createFolderPath(harness.storage, "/Projects");
      const created = await grant("editors", projects.id, "read");

      const updated = await permissions().update(created.id, TENANT_A, { permissionType: "write" });

      expect(updated.id).toBe(created.id);
      expect(updated.permissionType).toBe("write");
      expect(updated.updatedAt.getTime()).toBeGreaterThanOrEqual(created.updatedAt.getTime());
    });

    it("rejects an empty patch", async () => {
      const [projects] = await createFolderPath(harness.storage, "/Projects");
      const created = await grant("editors", projects.id, "read");

      await expect(permissions().update(created.id, TENANT_A, {})).rejects.toMatchObject({
        code: "VALIDATION_ERROR",
        details: [{ path: "", message: "Nothing to update" }],
      });
    });

    it("returns NOT_FOUND for missing and cross-tenant targets", async () => {
      const [projects] = await createFolderPath(harness.storage, "/Projects");
      const created = await grant("editors", projects.id, "read");

      await expect(permissions().update("missing-id", TENANT_A, { permissionType: "write" })).rejects.toMatchObject({
        code: "NOT_FOUND",
      });
      await expect(permissions().update(created.id, TENANT_B, { permissionType: "write" })).rejects.toMatchObject({
        code: "NOT_FOUND",
      });
      await expect(permissions().delete(created.id, TENANT_B)).rejects.toMatchObject({ code: "NOT_FOUND" });
      expect((await permissions().getById(created.id, TENANT_A)).permissionType).toBe("read");
    });

    it("deletes a grant", async () => {
      const [projects] = await createFolderPath(harness.storage, "/Projects");
      const created = await grant("editors", projects.id, "read");

      await permissions().delete(created.id, TENANT_A);

      await expect(permissions().getById(created.id, TENANT_A)).rejects.toMatchObject({ code: "NOT_FOUND" });
    });
  });

  describe("checkPermission", () => {
    it("allows an exact grant", async () => {
      const [projects] = await createFolderPath(harness.storage, "/Projects");
      await grant("editors", projects.id, "write");

      expect(await permissions().checkPermission("editors", "folder", projects.id, "write", TENANT_A)).toBe(true);
      expect(await permissions().checkPermission("editors", "folder", projects.id, "read", TENANT_A)).toBe(false);
      expect(await permissions().checkPermission("viewers", "folder", projects.id, "write", TENANT_A)).toBe(false);
    });

    it("lets admin satisfy every permission type on the same resource", async () => {
      const [projects] = await createFolderPath(harness.storage, "/Projects");
      await grant("owners", projects.id, "admin");

      for (const type of ["read", "write", "delete", "manage_folders", "admin"] as const) {
        expect(await permissions().checkPermission("owners", "folder", projects.id, type, TENANT_A)).toBe(true);
      }
    });

    it("inherits a write grant from the parent folder", async () => {
      const [projects, year] = await createFolderPath(harness.storage, "/Projects/2024");
      await grant("R", projects.id, "write");

      expect(await permissions().checkPermission("R", "folder", year.id, "write", TENANT_A)).toBe(true);
      expect(await permissions().checkPermission("R", "folder", year.id, "delete", TENANT_A)).toBe(false);
    });

    it("inherits admin from any ancestor", async () => {
      const [projects, , quarter] = await createFolderPath(harness.storage, "/Projects/2024/Q1");
      await grant("owners", projects.id, "admin");

      expect(await permissions().checkPermission("owners", "folder", quarter.id, "write", TENANT_A)).toBe(true);
    });

    it("does not inherit downwards or sideways", async () => {
      const [projects, year] = await createFolderPath(harness.storage, "/Projects/2024");
      const [archive] = await createFolderPath(harness.storage, "/Archive");
      await grant("R", year.id, "write");

      expect(await permissions().checkPermission("R", "folder", projects.id, "write", TENANT_A)).toBe(false);
      expect(await permissions().checkPermission("R", "folder", archive.id, "write", TENANT_A)).toBe(false);
    });

    it("checks document grants on the document only", async () => {
      const [projects] = await createFolderPath(harness.storage, "/Projects");
      await grant("R", projects.id, "read");
      const document = await harness.storage.documents.createDocument({
        tenantId: TENANT_A,
        folderId: projects.id,
        name: "plan.pdf",
        contentType: "application/pdf",
        ownerId: OWNER,
      });

      expect(await permissions().checkPermission("R", "document", document.id, "read", TENANT_A)).toBe(false);
      await grant("R", document.id, "read", "document");
      expect(await permissions().checkPermission("R", "document", document.id, "read", TENANT_A)).toBe(true);
    });

    it("never sees grants across tenants", async () => {
      const [projects] = await createFolderPath(harness.storage, "/Projects");
      await grant("R", projects.id, "admin");

      expect(await permissions().checkPermission("R", "folder", projects.id, "read", TENANT_B)).toBe(false);
      expect(await permissions().checkPermission("R", "folder", "missing-id", "read", TENANT_A)).toBe(false);
    });
  });

  describe("getInheritedPermissions", () => {
    it("returns ancestor grants root first, flagged inherited", async () => {
      const [projects, year, quarter] = await createFolderPath(harness.storage, "/Projects/2024/Q1");
      const onYear = await grant("R", year.id, "read");
      const onProjects = await grant("R", projects.id, "write");
      await grant("R", quarter.id, "delete");

      const inherited = await permissions().getInheritedPermissions(quarter.id, TENANT_A);

      expect(inherited.map((p) => p.id)).toEqual([onProjects.id, onYear.id]);
      expect(inherited.every((p) => p.inherited)).toBe(true);
      expect((await permissions().getById(onProjects.id, TENANT_A)).inherited).toBe(false);
    });

    it("is empty for a root folder", async () => {
      const [projects] = await createFolderPath(harness.storage, "/Projects");
      await grant("R", projects.id, "write");

      expect(await permissions().getInheritedPermissions(projects.id, TENANT_A)).toEqual([]);
    });

    it("returns NOT_FOUND for a folder of another tenant", async () => {
      const [projects] = await createFolderPath(harness.storage, "/Projects", TENANT_B);

      await expect(permissions().getInheritedPermissions(projects.id, TENANT_A)).rejects.toMatchObject({
        code: "NOT_FOUND",
      });
    });
  });

  describe("propagatePermissions", () => {
    it("copies direct grants onto every descendant once", async () => {
      const [projects, year, quarter] = await createFolderPath(harness.storage, "/Projects/2024/Q1");
      const write = await grant("R", projects.id, "write");
      await grant("auditors", projects.id, "read");

      expect(await permissions().propagatePermissions(projects.id, TENANT_A)).toBe(4);
      expect(await permissions().propagatePermissions(projects.id, TENANT_A)).toBe(0);

      for (const folder of [year, quarter]) {
        const onFolder = await permissions().getByResourceId("folder", folder.id, TENANT_A);
        expect(onFolder).toHaveLength(2);
        expect(onFolder.every((p) => p.inherited)).toBe(true);
      }
      const copy = (await permissions().getByResourceId("folder", year.id, TENANT_A)).find((p) => p.roleId === "R");
      expect(copy?.sourcePermissionId).toBe(write.id);
      expect(copy?.permissionType).toBe("write");
    });

    it("reaches descendants of folders with astral characters in their names", async () => {
      const [root, sub, leaf] = await createFolderPath(harness.storage, "/📁/Sub/Ωmega");
      const [archive] = await createFolderPath(harness.storage, "/Archive");
      const read = await grant("R", root.id, "read");

      expect(await permissions().propagatePermissions(root.id, TENANT_A)).toBe(2);
      const onLeaf = await permissions().getByResourceId("folder", leaf.id, TENANT_A);
      expect(onLeaf).toHaveLength(1);
      expect(onLeaf[0].sourcePermissionId).toBe(read.id);

      await harness.storage.folders.move(sub.id, archive.id, TENANT_A);

      expect(await permissions().getByResourceId("folder", sub.id, TENANT_A)).toEqual([]);
      expect(await permissions().getByResourceId("folder", leaf.id, TENANT_A)).toEqual([]);
      expect(await permissions().checkPermission("R", "folder", leaf.id, "read", TENANT_A)).toBe(false);
    });

    it("skips pairs that already exist on a descendant", async () => {
      const [projects, year] = await createFolderPath(harness.storage, "/Projects/2024");
      await grant("R", projects.id, "write");
      await grant("R", year.id, "write");

      expect(await permissions().propagatePermissions(projects.id, TENANT_A)).toBe(0);
      const onYear = await permissions().getByResourceId("folder", year.id, TENANT_A);
      expect(onYear).toHaveLength(1);
      expect(onYear[0].inherited).toBe(false);
    });

    it("does not re-propagate copies", async () => {
      const [projects, year, quarter] = await createFolderPath(harness.storage, "/Projects/2024/Q1");
      await grant("R", projects.id, "write");
      await permissions().propagatePermissions(projects.id, TENANT_A);

      expect(await permissions().propagatePermissions(year.id, TENANT_A)).toBe(0);
      expect(await permissions().getByResourceId("folder", quarter.id, TENANT_A)).toHaveLength(1);
    });

    it("removes copies when the source grant is revoked", async () => {
      const [projects, year] = await createFolderPath(harness.storage, "/Projects/2024");
      const write = await grant("R", projects.id, "write");
      await permissions().propagatePermissions(projects.id, TENANT_A);

      await permissions().delete(write.id, TENANT_A);

      expect(await permissions().getByResourceId("folder", year.id, TENANT_A)).toEqual([]);
      expect(await permissions().checkPermission("R", "folder", year.id, "write", TENANT_A)).toBe(false);
    });

    it("removes copies when the source grant changes", async () => {
      const [projects, year] = await createFolderPath(harness.storage, "/Projects/2024");
      const write = await grant("R", projects.id, "write");
      await permissions().propagatePermissions(projects.id, TENANT_A);

      await permissions().update(write.id, TENANT_A, { permissionType: "read" });

      expect(await permissions().getByResourceId("folder", year.id, TENANT_A)).toEqual([]);
      expect(await permissions().checkPermission("R", "folder", year.id, "write", TENANT_A)).toBe(false);
      expect(await permissions().checkPermission("R", "folder", year.id, "read", TENANT_A)).toBe(true);
    });

    it("refuses to edit a copy directly", async () => {
      const [projects, year] = await createFolderPath(harness.storage, "/Projects/2024");
      await grant("R", projects.id, "write");
      await permissions().propagatePermissions(projects.id, TENANT_A);
      const [copy] = await permissions().getByResourceId("folder", year.id, TENANT_A);

      await expect(permissions().update(copy.id, TENANT_A, { permissionType: "admin" })).rejects.toMatchObject({
        code: "CONFLICT",
      });
    });

    it("promotes a copy when the same grant is created directly", async () => {
      const [projects, year] = await createFolderPath(harness.storage, "/Projects/2024");
      const write = await grant("R", projects.id, "write");
      await permissions().propagatePermissions(projects.id, TENANT_A);
      const [copy] = await permissions().getByResourceId("folder", year.id, TENANT_A);

      const promoted = await grant("R", year.id, "write");

      expect(promoted.id).toBe(copy.id);
      expect(promoted.inherited).toBe(false);
      expect(promoted.sourcePermissionId).toBeNull();

      await permissions().delete(write.id, TENANT_A);
      expect(await permissions().checkPermission("R", "folder", year.id, "write", TENANT_A)).toBe(true);
    });

    it("drops copies from former ancestors when a folder moves", async () => {
      const [projects, year, quarter] = await createFolderPath(harness.storage, "/Projects/2024/Q1");
      const [archive] = await createFolderPath(harness.storage, "/Archive");
      await grant("R", projects.id, "write");
      const own = await grant("auditors", year.id, "read");
      await permissions().propagatePermissions(projects.id, TENANT_A);
      await permissions().propagatePermissions(year.id, TENANT_A);

      await harness.storage.folders.move(year.id, archive.id, TENANT_A);

      expect(await permissions().checkPermission("R", "folder", year.id, "write", TENANT_A)).toBe(false);
      expect(await permissions().checkPermission("R", "folder", quarter.id, "write", TENANT_A)).toBe(false);
      const onQuarter = await permissions().getByResourceId("folder", quarter.id, TENANT_A);
      expect(onQuarter).toHaveLength(1);
      expect(onQuarter[0].sourcePermissionId).toBe(own.id);
    });

    it("keeps copies whose source is still an ancestor after a move", async () => {
      const [projects, year, quarter] = await createFolderPath(harness.storage, "/Projects/2024/Q1");
      const drafts = await harness.storage.folders.create({
        tenantId: TENANT_A,
        name: "Drafts",
        parentId: projects.id,
        ownerId: OWNER,
      });
      await grant("R", projects.id, "write");
      await permissions().propagatePermissions(projects.id, TENANT_A);

      await harness.storage.folders.move(quarter.id, drafts.id, TENANT_A);

      const onQuarter = await permissions().getByResourceId("folder", quarter.id, TENANT_A);
      expect(onQuarter).toHaveLength(1);
      expect(onQuarter[0].inherited).toBe(true);
      expect(await permissions().checkPermission("R", "folder", year.id, "write", TENANT_A)).toBe(true);
    });
  });

  describe("bulk operations", () => {
    it("creates a batch of grants", async () => {
      const [projects, year] = await createFolderPath(harness.storage, "/Projects/2024");

      const created = await permissions().createBulk(
        [
          { roleId: "R", resourceType: "folder", resourceId: projects.id, permissionType: "read", createdBy: OWNER },
          { roleId: "R", resourceType: "folder", resourceId: year.id, permissionType: "write", createdBy: OWNER },
        ],
        TENANT_A
      );

      expect(created).toHaveLength(2);
      expect(created.every((p) => p.tenantId === TENANT_A && !p.inherited)).toBe(true);
      expect(await permissions().createBulk([], TENANT_A)).toEqual([]);
    });

    it("promotes propagated copies named in a batch", async () => {
      const [projects, year] = await createFolderPath(harness.storage, "/Projects/2024");
      await grant("R", projects.id, "write");
      await permissions().propagatePermissions(projects.id, TENANT_A);
      const [copy] = await permissions().getByResourceId("folder", year.id, TENANT_A);

      const created = await permissions().createBulk(
        [
          { roleId: "R", resourceType: "folder", resourceId: year.id, permissionType: "write", createdBy: OWNER },
          { roleId: "R", resourceType: "folder", resourceId: year.id, permissionType: "read", createdBy: OWNER },
        ],
        TENANT_A
      );

      expect(created).toHaveLength(2);
      expect(created[0].id).toBe(copy.id);
      expect(created[0].inherited).toBe(false);
      expect(created[0].sourcePermissionId).toBeNull();
      expect(created[1].permissionType).toBe("read");
      expect(await permissions().getByResourceId("folder", year.id, TENANT_A)).toHaveLength(2);
    });

    it("creates nothing when one grant in the batch fails", async () => {
      const [projects] = await createFolderPath(harness.storage, "/Projects");

      await expect(
        permissions().createBulk(
          [
            { roleId: "R", resourceType: "folder", resourceId: projects.id, permissionType: "read", createdBy: OWNER },
            { roleId: "R", resourceType: "folder", resourceId: projects.id, permissionType: "read", createdBy: OWNER },
          ],
          TENANT_A
        )
      ).rejects.toMatchObject({ code: "CONFLICT" });

      await expect(
        permissions().createBulk(
          [
            { roleId: "R", resourceType: "folder", resourceId: projects.id, permissionType: "read", createdBy: OWNER },
            { roleId: "R", resourceType: "folder", resourceId: "missing-id", permissionType: "read", createdBy: OWNER },
          ],
          TENANT_A
        )
      ).rejects.toMatchObject({ code: "NOT_FOUND" });

      expect(await permissions().getByResourceId("folder", projects.id, TENANT_A)).toEqual([]);
    });

    it("deletes every grant on a resource", async () => {
      const [projects, year] = await createFolderPath(harness.storage, "/Projects/2024");
      await grant("R", projects.id, "read");
      await grant("S", projects.id, "write");
      await grant("R", year.id, "read");

      expect(await permissions().deleteByResourceId("folder", projects.id, TENANT_A)).toBe(2);
      expect(await permissions().getByResourceId("folder", projects.id, TENANT_A)).toEqual([]);
      expect(await permissions().getByResourceId("folder", year.id, TENANT_A)).toHaveLength(1);
    });

    it("deletes every grant of a role within the tenant", async () => {
      const [projects, year] = await createFolderPath(harness.storage, "/Projects/2024");
      const [foreign] = await createFolderPath(harness.storage, "/Projects", TENANT_B);
      await grant("R", projects.id, "read");
      await grant("R", year.id, "write");
      await grant("S", year.id, "read");
      await grant("R", foreign.id, "read", "folder", TENANT_B);

      expect(await permissions().deleteByRoleId("R", TENANT_A)).toBe(2);
      expect((await permissions().getByRoleId("R", TENANT_A)).items).toEqual([]);
      expect((await permissions().getByRoleId("S", TENANT_A)).pagination.totalItems).toBe(1);
      expect((await permissions().getByRoleId("R", TENANT_B)).pagination.totalItems).toBe(1);
    });

    it("pages grants by role and by tenant", async () => {
      const [projects, year, quarter] = await createFolderPath(harness.storage, "/Projects/2024/Q1");
      await grant("R", projects.id, "read");
      await grant("R", year.id, "read");
      await grant("R", quarter.id, "read");
      await grant("S", quarter.id, "read");

      const byRole = await permissions().getByRoleId("R", TENANT_A, { page: 2, pageSize: 2 });
      expect(byRole.items).toHaveLength(1);
      expect(byRole.pagination).toMatchObject({ page: 2, totalItems: 3, totalPages: 2, hasNext: false, hasPrevious: true });

      const byTenant = await permissions().getByTenant(TENANT_A);
      expect(byTenant.pagination.totalItems).toBe(4);
      expect((await permissions().getByTenant(TENANT_B)).items).toEqual([]);
    });
  });
});
