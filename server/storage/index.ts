import type { Database } from "../db";
import { FoldersRepository } from "./folders.repo";
import { PermissionsRepository } from "./permissions.repo";
import { DocumentsRepository } from "./documents.repo";

export { FoldersRepository, escapeLikePattern } from "./folders.repo";
export { PermissionsRepository } from "./permissions.repo";
export { DocumentsRepository } from "./documents.repo";
export { BaseTenantRepository, type OperationOptions } from "./baseTenantRepository";
export {
  TenantScopedStorage,
  createTenantScopedStorage,
  type IdentityClaims,
  type TenantScopedContext,
} from "./tenantScoped";

export interface Storage {
  folders: FoldersRepository;
  permissions: PermissionsRepository;
  documents: DocumentsRepository;
}

export function createStorage(db: Database): Storage {
  const folders = new FoldersRepository(db);
  return {
    folders,
    permissions: new PermissionsRepository(db, folders),
    documents: new DocumentsRepository(db, folders),
  };
}
