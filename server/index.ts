export * from "@shared/schema";
export * from "@shared/permissions";
export * from "@shared/versionStatus";
export * from "@shared/folderPaths";

export { config, logConfigStatus } from "./config";
export { db, pool, checkDbHealth, connectWithRetry, getPoolStats, type Database, type PoolStats } from "./db";
export { readMigrations, runMigrations, MIGRATIONS_DIR, type Migration } from "./migrate";
export { AppError, isAppError, wrapStorageError, formatZodError, type ErrorCode, type ValidationIssue } from "./lib/errors";
export { createLogger, type Logger, type LogContext, type LogLevel } from "./lib/logger";
export type { PaginatedResult, PaginationInfo, PaginationParams } from "./lib/pagination";
export * from "./storage";
export { AuthorizationService } from "./services/authorization.service";
