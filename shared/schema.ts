import { sql } from "drizzle-orm";
import {
  pgTable,
  varchar,
  text,
  integer,
  bigint,
  boolean,
  timestamp,
  check,
  index,
  uniqueIndex,
  type AnyPgColumn,
} from "drizzle-orm/pg-core";
import { z } from "zod";
import { PATH_SEPARATOR } from "./folderPaths";
import {
  PERMISSION_TYPES,
  RESOURCE_TYPES,
  type PermissionType,
  type ResourceType,
} from "./permissions";
import { VERSION_STATUSES, type VersionStatusValue } from "./versionStatus";

// ─── Tables ─────────────────────────────────────────────────────────────────

export const folders = pgTable(
  "folders",
  {
    id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
    tenantId: varchar("tenant_id").notNull(),
    name: text("name").notNull(),
    parentId: varchar("parent_id").references((): AnyPgColumn => folders.id),
    path: text("path").notNull(),
    ownerId: varchar("owner_id").notNull(),
    createdAt: timestamp("created_at").defaultNow().notNull(),
    updatedAt: timestamp("updated_at").defaultNow().notNull(),
  },
  (table) => ({
    tenantPathUnique: uniqueIndex("folders_tenant_path_unique").on(table.tenantId, table.path),
    tenantParentIdx: index("folders_tenant_parent_idx").on(table.tenantId, table.parentId),
  })
);

export const documents = pgTable(
  "documents",
  {
    id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
    tenantId: varchar("tenant_id").notNull(),
    folderId: varchar("folder_id")
      .notNull()
      .references(() => folders.id),
    name: text("name").notNull(),
    contentType: text("content_type").notNull(),
    size: bigint("size", { mode: "number" }).notNull().default(0),
    ownerId: varchar("owner_id").notNull(),
    status: text("status").$type<VersionStatusValue>().notNull().default("processing"),
    currentVersionId: varchar("current_version_id"),
    versionCount: integer("version_count").notNull().default(0),
    createdAt: timestamp("created_at").defaultNow().notNull(),
    updatedAt: timestamp("updated_at").defaultNow().notNull(),
  },
  (table) => ({
    tenantFolderIdx: index("documents_tenant_folder_idx").on(table.tenantId, table.folderId),
  })
);

export const documentVersions = pgTable(
  "document_versions",
  {
    id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
    documentId: varchar("document_id")
      .notNull()
      .references(() => documents.id, { onDelete: "cascade" }),
    versionNumber: integer("version_number").notNull(),
    size: bigint("size", { mode: "number" }).notNull(),
    contentHash: text("content_hash").notNull(),
    status: text("status").$type<VersionStatusValue>().notNull().default("processing"),
    storagePath: text("storage_path").notNull(),
    createdBy: varchar("created_by").notNull(),
    createdAt: timestamp("created_at").defaultNow().notNull(),
  },
  (table) => ({
    documentVersionUnique: uniqueIndex("document_versions_document_number_unique").on(
      table.documentId,
      table.versionNumber
    ),
    numberPositive: check("document_versions_number_positive", sql`${table.versionNumber} >= 1`),
  })
);

export const documentMetadata = pgTable(
  "document_metadata",
  {
    id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
    documentId: varchar("document_id")
      .notNull()
      .references(() => documents.id, { onDelete: "cascade" }),
    key: text("key").notNull(),
    value: text("value").notNull(),
    createdAt: timestamp("created_at").defaultNow().notNull(),
    updatedAt: timestamp("updated_at").defaultNow().notNull(),
  },
  (table) => ({
    documentKeyUnique: uniqueIndex("document_metadata_document_key_unique").on(table.documentId, table.key),
  })
);

export const permissions = pgTable(
  "permissions",
  {
    id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
    tenantId: varchar("tenant_id").notNull(),
    roleId: varchar("role_id").notNull(),
    resourceType: text("resource_type").$type<ResourceType>().notNull(),
    resourceId: varchar("resource_id").notNull(),
    permissionType: text("permission_type").$type<PermissionType>().notNull(),
    inherited: boolean("inherited").notNull().default(false),
    // propagated copies point at the direct grant they were cloned from
    sourcePermissionId: varchar("source_permission_id").references((): AnyPgColumn => permissions.id, {
      onDelete: "cascade",
    }),
    createdBy: varchar("created_by").notNull(),
    createdAt: timestamp("created_at").defaultNow().notNull(),
    updatedAt: timestamp("updated_at").defaultNow().notNull(),
  },
  (table) => ({
    grantUnique: uniqueIndex("permissions_grant_unique").on(
      table.tenantId,
      table.roleId,
      table.resourceType,
      table.resourceId,
      table.permissionType
    ),
    tenantResourceIdx: index("permissions_tenant_resource_idx").on(
      table.tenantId,
      table.resourceType,
      table.resourceId
    ),
    tenantRoleIdx: index("permissions_tenant_role_idx").on(table.tenantId, table.roleId),
    sourceIdx: index("permissions_source_idx").on(table.sourcePermissionId),
    resourceTypeCheck: check(
      "permissions_resource_type_check",
      sql`${table.resourceType} IN ('document', 'folder')`
    ),
    permissionTypeCheck: check(
      "permissions_permission_type_check",
      sql`${table.permissionType} IN ('read', 'write', 'delete', 'manage_folders', 'admin')`
    ),
  })
);

// ─── Row types ──────────────────────────────────────────────────────────────

export type Folder = typeof folders.$inferSelect;
export type Document = typeof documents.$inferSelect;
export type DocumentVersion = typeof documentVersions.$inferSelect;
export type DocumentMetadata = typeof documentMetadata.$inferSelect;
export type Permission = typeof permissions.$inferSelect;

// ─── Input schemas ──────────────────────────────────────────────────────────

const idSchema = (label: string) => z.string().trim().min(1, `${label} is required`);

export const tenantIdSchema = idSchema("Tenant ID");

export const folderNameSchema = z
  .string()
  .trim()
  .min(1, "Folder name cannot be empty")
  .max(255, "Folder name cannot exceed 255 characters")
  .refine((name) => !name.includes(PATH_SEPARATOR), {
    message: `Folder name cannot contain "${PATH_SEPARATOR}"`,
  });

export const createFolderSchema = z.object({
  tenantId: tenantIdSchema,
  name: folderNameSchema,
  parentId: z.string().trim().min(1).nullish(),
  ownerId: idSchema("Owner ID"),
});
export type CreateFolderInput = z.input<typeof createFolderSchema>;

export const updateFolderSchema = z.object({
  name: folderNameSchema,
});
export type UpdateFolderInput = z.input<typeof updateFolderSchema>;

export const resourceTypeSchema = z.enum(RESOURCE_TYPES);
export const permissionTypeSchema = z.enum(PERMISSION_TYPES);

export const grantSchema = z.object({
  roleId: idSchema("Role ID"),
  resourceType: resourceTypeSchema,
  resourceId: idSchema("Resource ID"),
  permissionType: permissionTypeSchema,
  createdBy: idSchema("Created by"),
});
export type GrantInput = z.input<typeof grantSchema>;

export const createPermissionSchema = grantSchema.extend({
  tenantId: tenantIdSchema,
});
export type CreatePermissionInput = z.input<typeof createPermissionSchema>;

export const updatePermissionSchema = z
  .object({
    roleId: idSchema("Role ID").optional(),
    permissionType: permissionTypeSchema.optional(),
  })
  .refine((patch) => patch.roleId !== undefined || patch.permissionType !== undefined, {
    message: "Nothing to update",
  });
export type UpdatePermissionInput = z.input<typeof updatePermissionSchema>;

const documentNameSchema = z.string().trim().min(1, "Document name is required").max(255);
const contentTypeSchema = z.string().trim().min(1, "Content type is required");

export const createDocumentSchema = z.object({
  tenantId: tenantIdSchema,
  folderId: idSchema("Folder ID"),
  name: documentNameSchema,
  contentType: contentTypeSchema,
  size: z.number().int().nonnegative().default(0),
  ownerId: idSchema("Owner ID"),
});
export type CreateDocumentInput = z.input<typeof createDocumentSchema>;

export const addVersionSchema = z.object({
  documentId: idSchema("Document ID"),
  versionNumber: z.number().int().min(1, "Version number must be at least 1").optional(),
  size: z.number().int().positive("Size must be greater than 0"),
  contentHash: z.string().trim().min(1, "Content hash is required"),
  storagePath: z.string().trim().min(1, "Storage path is required"),
  createdBy: idSchema("Created by"),
});
export type AddVersionInput = z.input<typeof addVersionSchema>;

export const versionStatusSchema = z.enum(VERSION_STATUSES);

export const metadataKeySchema = z.string().trim().min(1, "Metadata key cannot be empty").max(255);
export const metadataValueSchema = z.string().max(10_000);

export const metadataMapSchema = z.record(metadataKeySchema, metadataValueSchema);

/** A present `metadata` map replaces every key of the document. */
export const updateDocumentSchema = z
  .object({
    name: documentNameSchema.optional(),
    contentType: contentTypeSchema.optional(),
    folderId: idSchema("Folder ID").optional(),
    metadata: metadataMapSchema.optional(),
  })
  .refine((patch) => Object.values(patch).some((value) => value !== undefined), {
    message: "Nothing to update",
  });
export type UpdateDocumentInput = z.input<typeof updateDocumentSchema>;

export const metadataFilterSchema = metadataMapSchema.refine((filter) => Object.keys(filter).length > 0, {
  message: "Metadata filter cannot be empty",
});
