import { and, asc, eq, ilike, inArray, isNull, sql, type SQL } from "drizzle-orm";
import {
  createFolderSchema,
  documents,
  folders,
  permissions,
  updateFolderSchema,
  type CreateFolderInput,
  type Folder,
  type UpdateFolderInput,
} from "@shared/schema";
import {
  ancestorPaths,
  buildFolderPath,
  descendantPrefix,
  isSameOrDescendantPath,
  rebasePath,
} from "@shared/folderPaths";
import type { Database } from "../db";
import { AppError } from "../lib/errors";
import { paginate, type PaginatedResult, type PaginationParams, type ResolvedPagination } from "../lib/pagination";
import { BaseTenantRepository, type OperationOptions } from "./baseTenantRepository";

/**
 * `column LIKE prefix%` without wildcard interpretation of the prefix.
 * Both lengths are measured in Postgres characters; a JS string length counts
 * UTF-16 units and would cut astral characters in half.
 */
function startsWith(column: typeof folders.path, prefix: string): SQL {
  return sql`left(${column}, char_length(${prefix})) = ${prefix}`;
}

export function escapeLikePattern(value: string): string {
  return value.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

const folderNotFound = () => AppError.notFound("Folder not found");

export class FoldersRepository extends BaseTenantRepository {
  constructor(db: Database) {
    super(db, "folders");
  }

  async create(input: CreateFolderInput, options: OperationOptions = {}): Promise<Folder> {
    const tenantId = this.requireTenantId(input.tenantId, "folders.create");
    const data = this.parse(createFolderSchema, input, "folders.create");

    const folder = await this.inTransaction(
      "folders.create",
      async (tx) => {
        let parentPath: string | null = null;
        if (data.parentId) {
          const parent = await this.findById(tx, data.parentId, tenantId);
          if (!parent) throw AppError.notFound("Parent folder not found");
          parentPath = parent.path;
        }

        const [created] = await tx
          .insert(folders)
          .values({
            tenantId,
            name: data.name,
            parentId: data.parentId ?? null,
            path: buildFolderPath(parentPath, data.name),
            ownerId: data.ownerId,
          })
          .returning();
        return created;
      },
      options,
      { tenantId }
    );

    this.log.info("Folder created", { tenantId, folderId: folder.id, path: folder.path });
    return folder;
  }

  async getById(id: string, tenantId: string): Promise<Folder> {
    this.requireTenantId(tenantId, "folders.getById");
    const folder = await this.run("folders.getById", () => this.findById(this.db, id, tenantId));
    if (!folder) throw folderNotFound();
    return folder;
  }

  /** Renames a folder and rewrites the paths of its whole subtree. */
  async update(id: string, tenantId: string, input: UpdateFolderInput, options: OperationOptions = {}): Promise<Folder> {
    this.requireTenantId(tenantId, "folders.update");
    const { name } = this.parse(updateFolderSchema, input, "folders.update");

    return this.inTransaction(
      "folders.update",
      async (tx) => {
        const folder = await this.findById(tx, id, tenantId);
        if (!folder) throw folderNotFound();
        if (folder.name === name) return folder;

        let parentPath: string | null = null;
        if (folder.parentId) {
          const parent = await this.findById(tx, folder.parentId, tenantId);
          if (!parent) throw AppError.internal("Folder parent is missing", { folderId: id });
          parentPath = parent.path;
        }

        return this.relocate(tx, folder, { name, parentId: folder.parentId, path: buildFolderPath(parentPath, name) }, options);
      },
      options,
      { tenantId }
    );
  }

  async delete(id: string, tenantId: string, options: OperationOptions = {}): Promise<void> {
    this.requireTenantId(tenantId, "folders.delete");

    await this.inTransaction(
      "folders.delete",
      async (tx) => {
        const folder = await this.findById(tx, id, tenantId);
        if (!folder) throw folderNotFound();
        if (!(await this.checkEmpty(tx, id, tenantId))) {
          throw AppError.conflict("Cannot delete folder with subfolders or documents", { folderId: id });
        }

        await tx
          .delete(permissions)
          .where(
            and(
              eq(permissions.tenantId, tenantId),
              eq(permissions.resourceType, "folder"),
              eq(permissions.resourceId, id)
            )
          );
        await tx.delete(folders).where(and(eq(folders.id, id), eq(folders.tenantId, tenantId)));
      },
      options,
      { tenantId }
    );

    this.log.info("Folder deleted", { tenantId, folderId: id });
  }

  async getChildren(parentId: string, tenantId: string, pagination?: PaginationParams): Promise<PaginatedResult<Folder>> {
    this.requireTenantId(tenantId, "folders.getChildren");
    const page = this.page(pagination, "folders.getChildren");

    return this.run("folders.getChildren", async () => {
      if (!(await this.findById(this.db, parentId, tenantId))) throw folderNotFound();
      return this.list(and(eq(folders.tenantId, tenantId), eq(folders.parentId, parentId)), page);
    });
  }

  async getRootFolders(tenantId: string, pagination?: PaginationParams): Promise<PaginatedResult<Folder>> {
    this.requireTenantId(tenantId, "folders.getRootFolders");
    const page = this.page(pagination, "folders.getRootFolders");

    return this.run("folders.getRootFolders", () =>
      this.list(and(eq(folders.tenantId, tenantId), isNull(folders.parentId)), page)
    );
  }

  /** Case-insensitive substring match on folder names. */
  async search(query: string, tenantId: string, pagination?: PaginationParams): Promise<PaginatedResult<Folder>> {
    this.requireTenantId(tenantId, "folders.search");
    const term = query.trim();
    if (term === "") {
      throw AppError.badRequest("Search query cannot be empty", [{ path: "query", message: "Search query cannot be empty" }]);
    }
    const page = this.page(pagination, "folders.search");

    return this.run("folders.search", () =>
      this.list(and(eq(folders.tenantId, tenantId), ilike(folders.name, `%${escapeLikePattern(term)}%`)), page)
    );
  }

  async getFolderPath(id: string, tenantId: string): Promise<string> {
    return (await this.getById(id, tenantId)).path;
  }

  async getByPath(path: string, tenantId: string): Promise<Folder> {
    this.requireTenantId(tenantId, "folders.getByPath");
    const folder = await this.run("folders.getByPath", () => this.findByPath(this.db, path, tenantId));
    if (!folder) throw folderNotFound();
    return folder;
  }

  /**
   * Moves a folder under `newParentId` (null for the root level). The folder
   * and every descendant get their paths rewritten in one transaction, and
   * propagated permission copies in the subtree whose source grant is no
   * longer an ancestor are removed.
   */
  async move(id: string, newParentId: string | null, tenantId: string, options: OperationOptions = {}): Promise<Folder> {
    this.requireTenantId(tenantId, "folders.move");

    return this.inTransaction(
      "folders.move",
      async (tx) => {
        const folder = await this.findById(tx, id, tenantId);
        if (!folder) throw folderNotFound();

        let parentPath: string | null = null;
        if (newParentId !== null) {
          if (newParentId === id) {
            throw AppError.conflict("Cannot move a folder into itself", { folderId: id });
          }
          const parent = await this.findById(tx, newParentId, tenantId);
          if (!parent) throw AppError.notFound("Target folder not found");
          if (isSameOrDescendantPath(parent.path, folder.path)) {
            throw AppError.conflict("Cannot move a folder into one of its descendants", {
              folderId: id,
              targetFolderId: newParentId,
            });
          }
          parentPath = parent.path;
        }

        if (folder.parentId === newParentId) return folder;

        const oldPath = folder.path;
        const updated = await this.relocate(
          tx,
          folder,
          { name: folder.name, parentId: newParentId, path: buildFolderPath(parentPath, folder.name) },
          options
        );
        await this.dropStaleInheritedCopies(tx, updated);

        this.log.info("Folder moved", { tenantId, folderId: id, from: oldPath, to: updated.path });
        return updated;
      },
      options,
      { tenantId }
    );
  }

  async exists(id: string, tenantId: string): Promise<boolean> {
    this.requireTenantId(tenantId, "folders.exists");
    const folder = await this.run("folders.exists", () => this.findById(this.db, id, tenantId));
    return folder !== null;
  }

  /** True when the folder has no child folders and no documents. */
  async isEmpty(id: string, tenantId: string): Promise<boolean> {
    this.requireTenantId(tenantId, "folders.isEmpty");
    return this.run("folders.isEmpty", async () => {
      if (!(await this.findById(this.db, id, tenantId))) throw folderNotFound();
      return this.checkEmpty(this.db, id, tenantId);
    });
  }

  /** Every folder below `id`, ordered by path. */
  async getDescendants(id: string, tenantId: string): Promise<Folder[]> {
    const folder = await this.getById(id, tenantId);
    return this.run("folders.getDescendants", () => this.findDescendants(this.db, folder));
  }

  /** Every folder above `id`, root first. */
  async getAncestors(id: string, tenantId: string): Promise<Folder[]> {
    const folder = await this.getById(id, tenantId);
    return this.run("folders.getAncestors", () => this.findAncestors(this.db, folder));
  }

  // ─── Helpers shared with the other repositories ──────────────────────────

  async findById(db: Database, id: string, tenantId: string): Promise<Folder | null> {
    const [folder] = await db
      .select()
      .from(folders)
      .where(and(eq(folders.id, id), eq(folders.tenantId, tenantId)))
      .limit(1);
    return folder ?? null;
  }

  async findByPath(db: Database, path: string, tenantId: string): Promise<Folder | null> {
    const [folder] = await db
      .select()
      .from(folders)
      .where(and(eq(folders.path, path), eq(folders.tenantId, tenantId)))
      .limit(1);
    return folder ?? null;
  }

  async findDescendants(db: Database, folder: Folder): Promise<Folder[]> {
    return db
      .select()
      .from(folders)
      .where(and(eq(folders.tenantId, folder.tenantId), startsWith(folders.path, descendantPrefix(folder.path))))
      .orderBy(asc(folders.path));
  }

  async findAncestors(db: Database, folder: Folder): Promise<Folder[]> {
    const paths = ancestorPaths(folder.path);
    if (paths.length === 0) return [];
    const rows = await db
      .select()
      .from(folders)
      .where(and(eq(folders.tenantId, folder.tenantId), inArray(folders.path, paths)));
    const byPath = new Map(rows.map((row) => [row.path, row]));
    return paths.flatMap((path) => {
      const ancestor = byPath.get(path);
      return ancestor ? [ancestor] : [];
    });
  }

  // ─── Internals ───────────────────────────────────────────────────────────

  private async list(where: SQL | undefined, page: ResolvedPagination): Promise<PaginatedResult<Folder>> {
    const [{ count }] = await this.db
      .select({ count: sql<number>`count(*)::int` })
      .from(folders)
      .where(where);
    const items = await this.db
      .select()
      .from(folders)
      .where(where)
      .orderBy(asc(folders.name), asc(folders.id))
      .limit(page.limit)
      .offset(page.offset);
    return paginate(items, count, page);
  }

  private async checkEmpty(db: Database, id: string, tenantId: string): Promise<boolean> {
    const [child] = await db
      .select({ id: folders.id })
      .from(folders)
      .where(and(eq(folders.parentId, id), eq(folders.tenantId, tenantId)))
      .limit(1);
    if (child) return false;

    const [document] = await db
      .select({ id: documents.id })
      .from(documents)
      .where(and(eq(documents.folderId, id), eq(documents.tenantId, tenantId)))
      .limit(1);
    return !document;
  }

  /**
   * Gives `folder` a new name/parent/path and rewrites every descendant
   * depth-first, each child taking its parent's new path plus its own name.
   */
  private async relocate(
    tx: Database,
    folder: Folder,
    next: { name: string; parentId: string | null; path: string },
    options: OperationOptions
  ): Promise<Folder> {
    const now = new Date();
    const descendants = await this.findDescendants(tx, folder);

    const [updated] = await tx
      .update(folders)
      .set({ name: next.name, parentId: next.parentId, path: next.path, updatedAt: now })
      .where(and(eq(folders.id, folder.id), eq(folders.tenantId, folder.tenantId)))
      .returning();

    const childrenOf = new Map<string, Folder[]>();
    for (const descendant of descendants) {
      if (!descendant.parentId) continue;
      const siblings = childrenOf.get(descendant.parentId) ?? [];
      siblings.push(descendant);
      childrenOf.set(descendant.parentId, siblings);
    }

    const stack: Array<{ id: string; path: string }> = [{ id: updated.id, path: updated.path }];
    let rewritten = 0;
    while (stack.length > 0) {
      const current = stack.pop();
      if (!current) break;
      for (const child of childrenOf.get(current.id) ?? []) {
        options.signal?.throwIfAborted();
        const childPath = buildFolderPath(current.path, child.name);
        if (childPath !== rebasePath(child.path, folder.path, updated.path)) {
          throw AppError.internal("Folder subtree is inconsistent", { folderId: folder.id, childId: child.id });
        }
        await tx
          .update(folders)
          .set({ path: childPath, updatedAt: now })
          .where(and(eq(folders.id, child.id), eq(folders.tenantId, folder.tenantId)));
        rewritten++;
        stack.push({ id: child.id, path: childPath });
      }
    }

    if (rewritten !== descendants.length) {
      throw AppError.internal("Folder subtree is inconsistent", {
        folderId: folder.id,
        expected: descendants.length,
        rewritten,
      });
    }

    return updated;
  }

  /**
   * After a move, a propagated copy inside the subtree is only valid while
   * its source grant sits on the subtree itself or on one of its new
   * ancestors.
   */
  private async dropStaleInheritedCopies(tx: Database, moved: Folder): Promise<void> {
    const subtree = [moved, ...(await this.findDescendants(tx, moved))];
    const ancestors = await this.findAncestors(tx, moved);
    const subtreeIds = subtree.map((f) => f.id);
    const validSources = new Set([...subtreeIds, ...ancestors.map((f) => f.id)]);

    const copies = await tx
      .select({ id: permissions.id, sourcePermissionId: permissions.sourcePermissionId })
      .from(permissions)
      .where(
        and(
          eq(permissions.tenantId, moved.tenantId),
          eq(permissions.resourceType, "folder"),
          eq(permissions.inherited, true),
          inArray(permissions.resourceId, subtreeIds)
        )
      );
    if (copies.length === 0) return;

    const sourceIds = copies.flatMap((copy) => (copy.sourcePermissionId ? [copy.sourcePermissionId] : []));
    const sources =
      sourceIds.length === 0
        ? []
        : await tx
            .select({ id: permissions.id, resourceId: permissions.resourceId })
            .from(permissions)
            .where(and(eq(permissions.tenantId, moved.tenantId), inArray(permissions.id, sourceIds)));
    const sourceResource = new Map(sources.map((source) => [source.id, source.resourceId]));

    const stale = copies
      .filter((copy) => {
        const resourceId = copy.sourcePermissionId ? sourceResource.get(copy.sourcePermissionId) : undefined;
        return resourceId === undefined || !validSources.has(resourceId);
      })
      .map((copy) => copy.id);
    if (stale.length === 0) return;

    await tx.delete(permissions).where(and(eq(permissions.tenantId, moved.tenantId), inArray(permissions.id, stale)));
    this.log.info("Dropped stale inherited permissions", {
      tenantId: moved.tenantId,
      folderId: moved.id,
      count: stale.length,
    });
  }
}
