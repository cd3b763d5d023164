import { z } from "zod";
import { config } from "../config";

export interface PaginationParams {
  page?: number;
  pageSize?: number;
}

export interface PaginationInfo {
  page: number;
  pageSize: number;
  totalPages: number;
  totalItems: number;
  hasNext: boolean;
  hasPrevious: boolean;
}

export interface PaginatedResult<T> {
  items: T[];
  pagination: PaginationInfo;
}

export const paginationSchema = z.object({
  page: z.number().int().min(1, "Page must be at least 1").default(1),
  pageSize: z
    .number()
    .int()
    .min(1, "Page size must be at least 1")
    .max(config.pagination.maxPageSize, `Page size cannot exceed ${config.pagination.maxPageSize}`)
    .default(config.pagination.defaultPageSize),
});

export interface ResolvedPagination {
  page: number;
  pageSize: number;
  limit: number;
  offset: number;
}

export function resolvePagination(params: { page: number; pageSize: number }): ResolvedPagination {
  return {
    page: params.page,
    pageSize: params.pageSize,
    limit: params.pageSize,
    offset: (params.page - 1) * params.pageSize,
  };
}

export function paginate<T>(items: T[], totalItems: number, page: ResolvedPagination): PaginatedResult<T> {
  const totalPages = Math.ceil(totalItems / page.pageSize);
  return {
    items,
    pagination: {
      page: page.page,
      pageSize: page.pageSize,
      totalPages,
      totalItems,
      hasNext: page.page < totalPages,
      hasPrevious: page.page > 1,
    },
  };
}
