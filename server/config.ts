/**
 * Centralized Configuration Module
 *
 * Reads and validates environment variables once, at import.
 *
 * - In production (NODE_ENV=production) a missing DATABASE_URL is fatal.
 * - Elsewhere safe defaults apply and missing values only warn.
 *
 * Never log secret values, only whether they are configured.
 */

import type { LogLevel } from "./lib/logger";

const isProduction = process.env.NODE_ENV === "production";
const isTest = process.env.NODE_ENV === "test" || process.env.VITEST === "true";

// ============================================================================
// Configuration Value Helpers
// ============================================================================

function optionalEnv(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

function optionalEnvInt(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function optionalEnvLogLevel(key: string, defaultValue: LogLevel): LogLevel {
  const value = process.env[key]?.toLowerCase();
  switch (value) {
    case "debug":
    case "info":
    case "warn":
    case "error":
      return value;
    default:
      return defaultValue;
  }
}

// ============================================================================
// Configuration
// ============================================================================

export const config = {
  nodeEnv: optionalEnv("NODE_ENV", "development"),
  isProduction,
  isTest,

  // Database (required in production)
  databaseUrl: (() => {
    const url = process.env.DATABASE_URL;
    if (!url && isProduction) {
      throw new Error(
        "FATAL: DATABASE_URL environment variable is required in production. " +
        "The document store cannot function without a database connection."
      );
    }
    return url || "";
  })(),
  dbPoolMax: optionalEnvInt("DB_POOL_MAX", 10),
  dbConnectTimeoutMs: optionalEnvInt("DB_CONNECT_TIMEOUT_MS", 5000),

  logLevel: optionalEnvLogLevel("LOG_LEVEL", isTest ? "warn" : "info"),

  pagination: {
    defaultPageSize: optionalEnvInt("DEFAULT_PAGE_SIZE", 20),
    maxPageSize: optionalEnvInt("MAX_PAGE_SIZE", 100),
  },
} as const;

// ============================================================================
// Startup Logging
// ============================================================================

export function logConfigStatus(): void {
  console.log(`[config] Environment: ${config.nodeEnv}`);
  console.log(`[config] Database: ${config.databaseUrl ? "configured" : "NOT CONFIGURED"}`);
  console.log(`[config] Pool max: ${config.dbPoolMax}`);
  console.log(`[config] Log level: ${config.logLevel}`);
  console.log(
    `[config] Page size: default=${config.pagination.defaultPageSize} max=${config.pagination.maxPageSize}`
  );
}
