import type {
  AddVersionInput,
  CreateDocumentInput,
  CreateFolderInput,
  Document,
  DocumentMetadata,
  DocumentVersion,
  Folder,
  GrantInput,
  Permission,
  UpdateDocumentInput,
  UpdateFolderInput,
  UpdatePermissionInput,
} from "@shared/schema";
import type { PermissionType, ResourceType } from "@shared/permissions";
import type { VersionStatusValue } from "@shared/versionStatus";
import { AppError } from "../lib/errors";
import type { PaginatedResult, PaginationParams } from "../lib/pagination";
import type { OperationOptions } from "./baseTenantRepository";
import type { Storage } from "./index";

/** Already-verified identity supplied by the authentication layer. */
export interface IdentityClaims {
  userId: string;
  tenantId: string;
  roleIds: readonly string[];
  requestId?: string;
}

export interface TenantScopedContext {
  tenantId: string;
  userId: string;
  roleIds: readonly string[];
  requestId?: string;
}

function buildContext(claims: IdentityClaims): TenantScopedContext {
  if (!claims.tenantId || claims.tenantId.trim() === "") {
    throw AppError.badRequest("Tenant context required for this operation", [
      { path: "tenantId", message: "Tenant ID is required" },
    ]);
  }
  if (!claims.userId || claims.userId.trim() === "") {
    throw AppError.badRequest("User context required for this operation", [
      { path: "userId", message: "User ID is required" },
    ]);
  }
  return {
    tenantId: claims.tenantId,
    userId: claims.userId,
    roleIds: [...claims.roleIds],
    requestId: claims.requestId,
  };
}

type FolderFields = Omit<CreateFolderInput, "tenantId" | "ownerId">;
type DocumentFields = Omit<CreateDocumentInput, "tenantId" | "ownerId">;
type VersionFields = Omit<AddVersionInput, "createdBy">;
type GrantFields = Omit<GrantInput, "createdBy">;

/**
 * Storage handle bound to one caller's tenant. Built once per request from
 * the identity claims; none of its methods take a tenant id, so a call
 * through it cannot reach another tenant's rows. Owner and creator fields
 * are filled from the caller.
 */
export class TenantScopedStorage {
  constructor(private readonly ctx: TenantScopedContext, private readonly storage: Storage) {}

  get tenantId(): string {
    return this.ctx.tenantId;
  }

  get userId(): string {
    return this.ctx.userId;
  }

  get roleIds(): readonly string[] {
    return this.ctx.roleIds;
  }

  // ─── Folders ──────────────────────────────────────────────────────────

  createFolder(input: FolderFields, options?: OperationOptions): Promise<Folder> {
    return this.storage.folders.create({ ...input, tenantId: this.ctx.tenantId, ownerId: this.ctx.userId }, options);
  }

  getFolder(id: string): Promise<Folder> {
    return this.storage.folders.getById(id, this.ctx.tenantId);
  }

  renameFolder(id: string, input: UpdateFolderInput, options?: OperationOptions): Promise<Folder> {
    return this.storage.folders.update(id, this.ctx.tenantId, input, options);
  }

  moveFolder(id: string, newParentId: string | null, options?: OperationOptions): Promise<Folder> {
    return this.storage.folders.move(id, newParentId, this.ctx.tenantId, options);
  }

  deleteFolder(id: string, options?: OperationOptions): Promise<void> {
    return this.storage.folders.delete(id, this.ctx.tenantId, options);
  }

  getChildFolders(parentId: string, pagination?: PaginationParams): Promise<PaginatedResult<Folder>> {
    return this.storage.folders.getChildren(parentId, this.ctx.tenantId, pagination);
  }

  getRootFolders(pagination?: PaginationParams): Promise<PaginatedResult<Folder>> {
    return this.storage.folders.getRootFolders(this.ctx.tenantId, pagination);
  }

  searchFolders(query: string, pagination?: PaginationParams): Promise<PaginatedResult<Folder>> {
    return this.storage.folders.search(query, this.ctx.tenantId, pagination);
  }

  getFolderPath(id: string): Promise<string> {
    return this.storage.folders.getFolderPath(id, this.ctx.tenantId);
  }

  getFolderByPath(path: string): Promise<Folder> {
    return this.storage.folders.getByPath(path, this.ctx.tenantId);
  }

  folderExists(id: string): Promise<boolean> {
    return this.storage.folders.exists(id, this.ctx.tenantId);
  }

  isFolderEmpty(id: string): Promise<boolean> {
    return this.storage.folders.isEmpty(id, this.ctx.tenantId);
  }

  getFolderDescendants(id: string): Promise<Folder[]> {
    return this.storage.folders.getDescendants(id, this.ctx.tenantId);
  }

  getFolderAncestors(id: string): Promise<Folder[]> {
    return this.storage.folders.getAncestors(id, this.ctx.tenantId);
  }

  // ─── Permissions ──────────────────────────────────────────────────────

  grantPermission(input: GrantFields, options?: OperationOptions): Promise<Permission> {
    return this.storage.permissions.create(
      { ...input, tenantId: this.ctx.tenantId, createdBy: this.ctx.userId },
      options
    );
  }

  grantPermissions(inputs: GrantFields[], options?: OperationOptions): Promise<Permission[]> {
    return this.storage.permissions.createBulk(
      inputs.map((input) => ({ ...input, createdBy: this.ctx.userId })),
      this.ctx.tenantId,
      options
    );
  }

  getPermission(id: string): Promise<Permission> {
    return this.storage.permissions.getById(id, this.ctx.tenantId);
  }

  updatePermission(id: string, patch: UpdatePermissionInput, options?: OperationOptions): Promise<Permission> {
    return this.storage.permissions.update(id, this.ctx.tenantId, patch, options);
  }

  revokePermission(id: string, options?: OperationOptions): Promise<void> {
    return this.storage.permissions.delete(id, this.ctx.tenantId, options);
  }

  getPermissionsForResource(resourceType: ResourceType, resourceId: string): Promise<Permission[]> {
    return this.storage.permissions.getByResourceId(resourceType, resourceId, this.ctx.tenantId);
  }

  getPermissionsForRole(roleId: string, pagination?: PaginationParams): Promise<PaginatedResult<Permission>> {
    return this.storage.permissions.getByRoleId(roleId, this.ctx.tenantId, pagination);
  }

  getPermissions(pagination?: PaginationParams): Promise<PaginatedResult<Permission>> {
    return this.storage.permissions.getByTenant(this.ctx.tenantId, pagination);
  }

  revokePermissionsForResource(resourceType: ResourceType, resourceId: string, options?: OperationOptions): Promise<number> {
    return this.storage.permissions.deleteByResourceId(resourceType, resourceId, this.ctx.tenantId, options);
  }

  revokePermissionsForRole(roleId: string, options?: OperationOptions): Promise<number> {
    return this.storage.permissions.deleteByRoleId(roleId, this.ctx.tenantId, options);
  }

  checkPermission(
    roleId: string,
    resourceType: ResourceType,
    resourceId: string,
    permissionType: PermissionType
  ): Promise<boolean> {
    return this.storage.permissions.checkPermission(roleId, resourceType, resourceId, permissionType, this.ctx.tenantId);
  }

  getInheritedPermissions(folderId: string): Promise<Permission[]> {
    return this.storage.permissions.getInheritedPermissions(folderId, this.ctx.tenantId);
  }

  propagatePermissions(folderId: string, options?: OperationOptions): Promise<number> {
    return this.storage.permissions.propagatePermissions(folderId, this.ctx.tenantId, options);
  }

  // ─── Documents ────────────────────────────────────────────────────────

  createDocument(input: DocumentFields, options?: OperationOptions): Promise<Document> {
    return this.storage.documents.createDocument(
      { ...input, tenantId: this.ctx.tenantId, ownerId: this.ctx.userId },
      options
    );
  }

  getDocument(id: string): Promise<Document> {
    return this.storage.documents.getDocumentById(id, this.ctx.tenantId);
  }

  getDocuments(ids: string[]): Promise<Document[]> {
    return this.storage.documents.getDocumentsByIds(ids, this.ctx.tenantId);
  }

  listDocuments(folderId: string, pagination?: PaginationParams): Promise<PaginatedResult<Document>> {
    return this.storage.documents.listByFolder(folderId, this.ctx.tenantId, pagination);
  }

  listAllDocuments(pagination?: PaginationParams): Promise<PaginatedResult<Document>> {
    return this.storage.documents.listByTenant(this.ctx.tenantId, pagination);
  }

  searchDocumentsByMetadata(filter: Record<string, string>, pagination?: PaginationParams): Promise<PaginatedResult<Document>> {
    return this.storage.documents.searchByMetadata(filter, this.ctx.tenantId, pagination);
  }

  updateDocument(id: string, patch: UpdateDocumentInput, options?: OperationOptions): Promise<Document> {
    return this.storage.documents.updateDocument(id, this.ctx.tenantId, patch, options);
  }

  deleteDocument(id: string, options?: OperationOptions): Promise<void> {
    return this.storage.documents.deleteDocument(id, this.ctx.tenantId, options);
  }

  addVersion(input: VersionFields, options?: OperationOptions): Promise<DocumentVersion> {
    return this.storage.documents.addVersion({ ...input, createdBy: this.ctx.userId }, this.ctx.tenantId, options);
  }

  getVersion(versionId: string): Promise<DocumentVersion> {
    return this.storage.documents.getVersionById(versionId, this.ctx.tenantId);
  }

  getVersions(documentId: string): Promise<DocumentVersion[]> {
    return this.storage.documents.getVersionsByDocument(documentId, this.ctx.tenantId);
  }

  updateVersionStatus(versionId: string, status: VersionStatusValue, options?: OperationOptions): Promise<DocumentVersion> {
    return this.storage.documents.updateVersionStatus(versionId, status, this.ctx.tenantId, options);
  }

  setMetadata(documentId: string, key: string, value: string, options?: OperationOptions): Promise<DocumentMetadata> {
    return this.storage.documents.addMetadata(documentId, key, value, this.ctx.tenantId, options);
  }

  getMetadata(documentId: string): Promise<Record<string, string>> {
    return this.storage.documents.getMetadata(documentId, this.ctx.tenantId);
  }

  updateMetadata(documentId: string, key: string, value: string, options?: OperationOptions): Promise<DocumentMetadata> {
    return this.storage.documents.updateMetadata(documentId, key, value, this.ctx.tenantId, options);
  }

  deleteMetadata(documentId: string, key: string, options?: OperationOptions): Promise<void> {
    return this.storage.documents.deleteMetadata(documentId, key, this.ctx.tenantId, options);
  }
}

export function createTenantScopedStorage(claims: IdentityClaims, storage: Storage): TenantScopedStorage {
  return new TenantScopedStorage(buildContext(claims), storage);
}
