import type { z } from "zod";
import type { Database } from "../db";
import { AppError, formatZodError, wrapStorageError } from "../lib/errors";
import { createLogger, type Logger, type LogContext } from "../lib/logger";
import { paginationSchema, resolvePagination, type PaginationParams, type ResolvedPagination } from "../lib/pagination";

export interface OperationOptions {
  signal?: AbortSignal;
}

/**
 * Shared plumbing for the tenant-scoped repositories: tenant and input
 * validation, error normalization, and abortable transactions.
 */
export abstract class BaseTenantRepository {
  protected readonly log: Logger;

  constructor(protected readonly db: Database, source: string) {
    this.log = createLogger(source);
  }

  protected requireTenantId(tenantId: string | null | undefined, operation: string): string {
    if (typeof tenantId !== "string" || tenantId.trim() === "") {
      throw AppError.badRequest(`${operation} requires tenantId`, [{ path: "tenantId", message: "Tenant ID is required" }]);
    }
    return tenantId;
  }

  protected parse<S extends z.ZodTypeAny>(schema: S, input: unknown, operation: string): z.output<S> {
    const result = schema.safeParse(input);
    if (!result.success) {
      throw AppError.badRequest(`Invalid input for ${operation}`, formatZodError(result.error));
    }
    return result.data;
  }

  protected page(params: PaginationParams | undefined, operation: string): ResolvedPagination {
    return resolvePagination(this.parse(paginationSchema, params ?? {}, operation));
  }

  /** Runs `work`, turning driver failures into AppErrors. */
  protected async run<T>(operation: string, work: () => Promise<T>, ctx?: LogContext): Promise<T> {
    try {
      return await work();
    } catch (err) {
      throw this.normalize(operation, err, ctx);
    }
  }

  /**
   * Runs `work` in one transaction. The signal is checked before and after
   * `work`; an abort throws inside the transaction so it rolls back, and the
   * abort reason reaches the caller unchanged.
   */
  protected async inTransaction<T>(
    operation: string,
    work: (tx: Database) => Promise<T>,
    options: OperationOptions = {},
    ctx?: LogContext
  ): Promise<T> {
    const { signal } = options;
    try {
      signal?.throwIfAborted();
      return await this.db.transaction(async (tx) => {
        const result = await work(tx);
        signal?.throwIfAborted();
        return result;
      });
    } catch (err) {
      if (signal?.aborted && err === signal.reason) {
        throw err;
      }
      throw this.normalize(operation, err, ctx);
    }
  }

  private normalize(operation: string, err: unknown, ctx?: LogContext): Error {
    const wrapped = wrapStorageError(operation, err);
    if (wrapped instanceof AppError && wrapped.code === "INTERNAL_ERROR") {
      this.log.error(`${operation} failed`, { ...ctx, operation, error: wrapped.message });
    }
    return wrapped;
  }
}
