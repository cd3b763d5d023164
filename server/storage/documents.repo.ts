import { and, asc, desc, eq, exists, getTableColumns, inArray, or, sql, type SQL } from "drizzle-orm";
import {
  addVersionSchema,
  createDocumentSchema,
  documentMetadata,
  documentVersions,
  documents,
  metadataFilterSchema,
  metadataKeySchema,
  metadataValueSchema,
  permissions,
  updateDocumentSchema,
  versionStatusSchema,
  type AddVersionInput,
  type CreateDocumentInput,
  type Document,
  type DocumentMetadata,
  type DocumentVersion,
  type UpdateDocumentInput,
} from "@shared/schema";
import { canTransitionVersionStatus, isTerminalVersionStatus, type VersionStatusValue } from "@shared/versionStatus";
import type { Database } from "../db";
import { AppError } from "../lib/errors";
import { paginate, type PaginatedResult, type PaginationParams, type ResolvedPagination } from "../lib/pagination";
import { BaseTenantRepository, type OperationOptions } from "./baseTenantRepository";
import type { FoldersRepository } from "./folders.repo";

const documentNotFound = () => AppError.notFound("Document not found");
const versionNotFound = () => AppError.notFound("Document version not found");

export class DocumentsRepository extends BaseTenantRepository {
  constructor(db: Database, private readonly folders: FoldersRepository) {
    super(db, "documents");
  }

  // ─── Documents ───────────────────────────────────────────────────────────

  async createDocument(input: CreateDocumentInput, options: OperationOptions = {}): Promise<Document> {
    const tenantId = this.requireTenantId(input.tenantId, "documents.createDocument");
    const data = this.parse(createDocumentSchema, input, "documents.createDocument");

    const document = await this.inTransaction(
      "documents.createDocument",
      async (tx) => {
        if (!(await this.folders.findById(tx, data.folderId, tenantId))) {
          throw AppError.notFound("Folder not found");
        }
        const [created] = await tx
          .insert(documents)
          .values({
            tenantId,
            folderId: data.folderId,
            name: data.name,
            contentType: data.contentType,
            size: data.size,
            ownerId: data.ownerId,
          })
          .returning();
        return created;
      },
      options,
      { tenantId }
    );

    this.log.info("Document created", { tenantId, documentId: document.id, folderId: document.folderId });
    return document;
  }

  async getDocumentById(id: string, tenantId: string): Promise<Document> {
    this.requireTenantId(tenantId, "documents.getDocumentById");
    const document = await this.run("documents.getDocumentById", () => this.findDocument(this.db, id, tenantId));
    if (!document) throw documentNotFound();
    return document;
  }

  /** Like getDocumentById, but null when the document is absent. */
  async findById(id: string, tenantId: string): Promise<Document | null> {
    this.requireTenantId(tenantId, "documents.findById");
    return this.run("documents.findById", () => this.findDocument(this.db, id, tenantId));
  }

  async listByFolder(folderId: string, tenantId: string, pagination?: PaginationParams): Promise<PaginatedResult<Document>> {
    this.requireTenantId(tenantId, "documents.listByFolder");
    const page = this.page(pagination, "documents.listByFolder");

    return this.run("documents.listByFolder", async () => {
      if (!(await this.folders.findById(this.db, folderId, tenantId))) {
        throw AppError.notFound("Folder not found");
      }
      return this.list(and(eq(documents.tenantId, tenantId), eq(documents.folderId, folderId)), page);
    });
  }

  async listByTenant(tenantId: string, pagination?: PaginationParams): Promise<PaginatedResult<Document>> {
    this.requireTenantId(tenantId, "documents.listByTenant");
    const page = this.page(pagination, "documents.listByTenant");

    return this.run("documents.listByTenant", () => this.list(eq(documents.tenantId, tenantId), page));
  }

  /** Documents carrying at least one of the given key/value pairs. */
  async searchByMetadata(
    filter: Record<string, string>,
    tenantId: string,
    pagination?: PaginationParams
  ): Promise<PaginatedResult<Document>> {
    this.requireTenantId(tenantId, "documents.searchByMetadata");
    const pairs = this.parse(metadataFilterSchema, filter, "documents.searchByMetadata");
    const page = this.page(pagination, "documents.searchByMetadata");

    const matching = Object.entries(pairs).map(([key, value]) =>
      and(eq(documentMetadata.key, key), eq(documentMetadata.value, value))
    );
    const hasPair = exists(
      this.db
        .select({ id: documentMetadata.id })
        .from(documentMetadata)
        .where(and(eq(documentMetadata.documentId, documents.id), or(...matching)))
    );

    return this.run("documents.searchByMetadata", () => this.list(and(eq(documents.tenantId, tenantId), hasPair), page));
  }

  /** Documents of the tenant among `ids`; unknown ids are skipped. */
  async getDocumentsByIds(ids: string[], tenantId: string): Promise<Document[]> {
    this.requireTenantId(tenantId, "documents.getDocumentsByIds");
    if (ids.length === 0) return [];

    return this.run("documents.getDocumentsByIds", () =>
      this.db
        .select()
        .from(documents)
        .where(and(eq(documents.tenantId, tenantId), inArray(documents.id, ids)))
        .orderBy(asc(documents.name), asc(documents.id))
    );
  }

  /**
   * Renames the document, changes its content type or moves it to another
   * folder of the tenant. A `metadata` map replaces all existing keys in the
   * same transaction; `{}` clears them.
   */
  async updateDocument(
    id: string,
    tenantId: string,
    patch: UpdateDocumentInput,
    options: OperationOptions = {}
  ): Promise<Document> {
    this.requireTenantId(tenantId, "documents.updateDocument");
    const changes = this.parse(updateDocumentSchema, patch, "documents.updateDocument");

    const document = await this.inTransaction(
      "documents.updateDocument",
      async (tx) => {
        const existing = await this.findDocument(tx, id, tenantId);
        if (!existing) throw documentNotFound();

        if (changes.folderId !== undefined && changes.folderId !== existing.folderId) {
          if (!(await this.folders.findById(tx, changes.folderId, tenantId))) {
            throw AppError.notFound("Folder not found");
          }
        }

        const now = new Date();
        const [updated] = await tx
          .update(documents)
          .set({
            name: changes.name ?? existing.name,
            contentType: changes.contentType ?? existing.contentType,
            folderId: changes.folderId ?? existing.folderId,
            updatedAt: now,
          })
          .where(and(eq(documents.id, id), eq(documents.tenantId, tenantId)))
          .returning();

        if (changes.metadata !== undefined) {
          options.signal?.throwIfAborted();
          await tx.delete(documentMetadata).where(eq(documentMetadata.documentId, id));
          const entries = Object.entries(changes.metadata);
          if (entries.length > 0) {
            await tx
              .insert(documentMetadata)
              .values(entries.map(([key, value]) => ({ documentId: id, key, value, updatedAt: now })));
          }
        }

        return updated;
      },
      options,
      { tenantId }
    );

    this.log.info("Document updated", { tenantId, documentId: id, folderId: document.folderId });
    return document;
  }

  /** Deletes the document with its versions, metadata and grants. */
  async deleteDocument(id: string, tenantId: string, options: OperationOptions = {}): Promise<void> {
    this.requireTenantId(tenantId, "documents.deleteDocument");

    await this.inTransaction(
      "documents.deleteDocument",
      async (tx) => {
        if (!(await this.findDocument(tx, id, tenantId))) throw documentNotFound();

        await tx
          .delete(permissions)
          .where(
            and(
              eq(permissions.tenantId, tenantId),
              eq(permissions.resourceType, "document"),
              eq(permissions.resourceId, id)
            )
          );
        await tx
          .update(documents)
          .set({ currentVersionId: null })
          .where(and(eq(documents.id, id), eq(documents.tenantId, tenantId)));
        await tx.delete(documentMetadata).where(eq(documentMetadata.documentId, id));
        await tx.delete(documentVersions).where(eq(documentVersions.documentId, id));
        await tx.delete(documents).where(and(eq(documents.id, id), eq(documents.tenantId, tenantId)));
      },
      options,
      { tenantId }
    );

    this.log.info("Document deleted", { tenantId, documentId: id });
  }

  // ─── Versions ────────────────────────────────────────────────────────────

  /**
   * Appends the next version to the document's chain and points the
   * document at it. The document row stays locked until commit, so two
   * concurrent appends cannot pick the same number.
   */
  async addVersion(input: AddVersionInput, tenantId: string, options: OperationOptions = {}): Promise<DocumentVersion> {
    this.requireTenantId(tenantId, "documents.addVersion");
    const data = this.parse(addVersionSchema, input, "documents.addVersion");

    const version = await this.inTransaction(
      "documents.addVersion",
      async (tx) => {
        const [document] = await tx
          .select({ id: documents.id })
          .from(documents)
          .where(and(eq(documents.id, data.documentId), eq(documents.tenantId, tenantId)))
          .for("update");
        if (!document) throw documentNotFound();

        const [{ latest }] = await tx
          .select({ latest: sql<number>`coalesce(max(${documentVersions.versionNumber}), 0)::int` })
          .from(documentVersions)
          .where(eq(documentVersions.documentId, document.id));
        const next = latest + 1;
        if (data.versionNumber !== undefined && data.versionNumber !== next) {
          throw AppError.conflict(`Version number must be ${next}`, {
            documentId: document.id,
            expected: next,
            received: data.versionNumber,
          });
        }

        options.signal?.throwIfAborted();
        const [created] = await tx
          .insert(documentVersions)
          .values({
            documentId: document.id,
            versionNumber: next,
            size: data.size,
            contentHash: data.contentHash,
            storagePath: data.storagePath,
            createdBy: data.createdBy,
            status: "processing",
          })
          .returning();

        await tx
          .update(documents)
          .set({
            currentVersionId: created.id,
            versionCount: sql`${documents.versionCount} + 1`,
            status: created.status,
            size: created.size,
            updatedAt: created.createdAt,
          })
          .where(and(eq(documents.id, document.id), eq(documents.tenantId, tenantId)));

        return created;
      },
      options,
      { tenantId }
    );

    this.log.info("Document version added", {
      tenantId,
      documentId: version.documentId,
      versionId: version.id,
      versionNumber: version.versionNumber,
    });
    return version;
  }

  async getVersionById(versionId: string, tenantId: string): Promise<DocumentVersion> {
    this.requireTenantId(tenantId, "documents.getVersionById");
    const found = await this.run("documents.getVersionById", () => this.findVersion(this.db, versionId, tenantId));
    if (!found) throw versionNotFound();
    return found.version;
  }

  /** The document's versions, newest first. */
  async getVersionsByDocument(documentId: string, tenantId: string): Promise<DocumentVersion[]> {
    this.requireTenantId(tenantId, "documents.getVersionsByDocument");

    return this.run("documents.getVersionsByDocument", async () => {
      if (!(await this.findDocument(this.db, documentId, tenantId))) throw documentNotFound();
      return this.db
        .select()
        .from(documentVersions)
        .where(eq(documentVersions.documentId, documentId))
        .orderBy(desc(documentVersions.versionNumber));
    });
  }

  /**
   * Moves a version out of `processing`. Once `available` or `quarantined`
   * a version keeps that status. The document mirrors the status of its
   * current version.
   */
  async updateVersionStatus(
    versionId: string,
    status: VersionStatusValue,
    tenantId: string,
    options: OperationOptions = {}
  ): Promise<DocumentVersion> {
    this.requireTenantId(tenantId, "documents.updateVersionStatus");
    const next = this.parse(versionStatusSchema, status, "documents.updateVersionStatus");

    return this.inTransaction(
      "documents.updateVersionStatus",
      async (tx) => {
        const found = await this.findVersion(tx, versionId, tenantId);
        if (!found) throw versionNotFound();
        const { version, currentVersionId } = found;

        if (version.status === next) return version;
        if (isTerminalVersionStatus(version.status)) {
          throw AppError.conflict(`Version is ${version.status} and can no longer change status`, {
            versionId,
            from: version.status,
            to: next,
          });
        }
        if (!canTransitionVersionStatus(version.status, next)) {
          throw AppError.conflict(`Cannot change version status from ${version.status} to ${next}`, {
            versionId,
            from: version.status,
            to: next,
          });
        }

        const [updated] = await tx
          .update(documentVersions)
          .set({ status: next })
          .where(eq(documentVersions.id, version.id))
          .returning();

        if (currentVersionId === version.id) {
          await tx
            .update(documents)
            .set({ status: next, updatedAt: new Date() })
            .where(and(eq(documents.id, version.documentId), eq(documents.tenantId, tenantId)));
        }

        this.log.info("Document version status changed", {
          tenantId,
          documentId: version.documentId,
          versionId,
          from: version.status,
          to: next,
        });
        return updated;
      },
      options,
      { tenantId }
    );
  }

  // ─── Metadata ────────────────────────────────────────────────────────────

  /** Sets `key` on the document, replacing any existing value. */
  async addMetadata(
    documentId: string,
    key: string,
    value: string,
    tenantId: string,
    options: OperationOptions = {}
  ): Promise<DocumentMetadata> {
    this.requireTenantId(tenantId, "documents.addMetadata");
    const metadataKey = this.parse(metadataKeySchema, key, "documents.addMetadata");
    const metadataValue = this.parse(metadataValueSchema, value, "documents.addMetadata");

    return this.inTransaction(
      "documents.addMetadata",
      async (tx) => {
        if (!(await this.findDocument(tx, documentId, tenantId))) throw documentNotFound();
        const now = new Date();

        const [row] = await tx
          .insert(documentMetadata)
          .values({ documentId, key: metadataKey, value: metadataValue })
          .onConflictDoUpdate({
            target: [documentMetadata.documentId, documentMetadata.key],
            set: { value: metadataValue, updatedAt: now },
          })
          .returning();
        await this.touch(tx, documentId, tenantId, now);
        return row;
      },
      options,
      { tenantId }
    );
  }

  async getMetadata(documentId: string, tenantId: string): Promise<Record<string, string>> {
    this.requireTenantId(tenantId, "documents.getMetadata");

    return this.run("documents.getMetadata", async () => {
      if (!(await this.findDocument(this.db, documentId, tenantId))) throw documentNotFound();
      const rows = await this.db
        .select({ key: documentMetadata.key, value: documentMetadata.value })
        .from(documentMetadata)
        .where(eq(documentMetadata.documentId, documentId))
        .orderBy(asc(documentMetadata.key));
      return Object.fromEntries(rows.map((row) => [row.key, row.value]));
    });
  }

  async updateMetadata(
    documentId: string,
    key: string,
    value: string,
    tenantId: string,
    options: OperationOptions = {}
  ): Promise<DocumentMetadata> {
    this.requireTenantId(tenantId, "documents.updateMetadata");
    const metadataKey = this.parse(metadataKeySchema, key, "documents.updateMetadata");
    const metadataValue = this.parse(metadataValueSchema, value, "documents.updateMetadata");

    return this.inTransaction(
      "documents.updateMetadata",
      async (tx) => {
        if (!(await this.findDocument(tx, documentId, tenantId))) throw documentNotFound();
        const now = new Date();

        const [row] = await tx
          .update(documentMetadata)
          .set({ value: metadataValue, updatedAt: now })
          .where(and(eq(documentMetadata.documentId, documentId), eq(documentMetadata.key, metadataKey)))
          .returning();
        if (!row) throw AppError.notFound(`Metadata key "${metadataKey}" not found`);

        await this.touch(tx, documentId, tenantId, now);
        return row;
      },
      options,
      { tenantId }
    );
  }

  async deleteMetadata(documentId: string, key: string, tenantId: string, options: OperationOptions = {}): Promise<void> {
    this.requireTenantId(tenantId, "documents.deleteMetadata");
    const metadataKey = this.parse(metadataKeySchema, key, "documents.deleteMetadata");

    await this.inTransaction(
      "documents.deleteMetadata",
      async (tx) => {
        if (!(await this.findDocument(tx, documentId, tenantId))) throw documentNotFound();

        const deleted = await tx
          .delete(documentMetadata)
          .where(and(eq(documentMetadata.documentId, documentId), eq(documentMetadata.key, metadataKey)))
          .returning({ id: documentMetadata.id });
        if (deleted.length === 0) throw AppError.notFound(`Metadata key "${metadataKey}" not found`);

        await this.touch(tx, documentId, tenantId, new Date());
      },
      options,
      { tenantId }
    );
  }

  // ─── Internals ───────────────────────────────────────────────────────────

  private async list(where: SQL | undefined, page: ResolvedPagination): Promise<PaginatedResult<Document>> {
    const [{ count }] = await this.db
      .select({ count: sql<number>`count(*)::int` })
      .from(documents)
      .where(where);
    const items = await this.db
      .select()
      .from(documents)
      .where(where)
      .orderBy(asc(documents.name), asc(documents.id))
      .limit(page.limit)
      .offset(page.offset);
    return paginate(items, count, page);
  }

  private async findDocument(db: Database, id: string, tenantId: string): Promise<Document | null> {
    const [document] = await db
      .select()
      .from(documents)
      .where(and(eq(documents.id, id), eq(documents.tenantId, tenantId)))
      .limit(1);
    return document ?? null;
  }

  // Versions carry no tenant column; the owning document decides visibility.
  private async findVersion(
    db: Database,
    versionId: string,
    tenantId: string
  ): Promise<{ version: DocumentVersion; currentVersionId: string | null } | null> {
    const [row] = await db
      .select({
        version: getTableColumns(documentVersions),
        currentVersionId: documents.currentVersionId,
      })
      .from(documentVersions)
      .innerJoin(documents, eq(documents.id, documentVersions.documentId))
      .where(and(eq(documentVersions.id, versionId), eq(documents.tenantId, tenantId)))
      .limit(1);
    return row ?? null;
  }

  private async touch(db: Database, documentId: string, tenantId: string, at: Date): Promise<void> {
    await db
      .update(documents)
      .set({ updatedAt: at })
      .where(and(eq(documents.id, documentId), eq(documents.tenantId, tenantId)));
  }
}
