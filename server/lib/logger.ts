import { config } from "../config";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogContext {
  requestId?: string;
  tenantId?: string;
  userId?: string;
  [key: string]: unknown;
}

interface StructuredLogEntry {
  timestamp: string;
  level: LogLevel;
  source: string;
  message: string;
  requestId?: string;
  tenantId?: string;
  userId?: string;
  [key: string]: unknown;
}

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVEL_ORDER[level] >= LOG_LEVEL_ORDER[config.logLevel];
}

function emit(level: LogLevel, source: string, message: string, ctx?: LogContext): void {
  if (!shouldLog(level)) return;

  const entry: StructuredLogEntry = {
    timestamp: new Date().toISOString(),
    level,
    source,
    message,
    ...ctx,
  };

  const tag = `[${source}]`;
  const json = JSON.stringify(entry);

  switch (level) {
    case "error":
      console.error(tag, json);
      break;
    case "warn":
      console.warn(tag, json);
      break;
    case "debug":
      console.debug(tag, json);
      break;
    default:
      console.log(tag, json);
  }
}

export interface Logger {
  debug(message: string, ctx?: LogContext): void;
  info(message: string, ctx?: LogContext): void;
  warn(message: string, ctx?: LogContext): void;
  error(message: string, ctx?: LogContext): void;
}

export function createLogger(source: string): Logger {
  return {
    debug(message: string, ctx?: LogContext) {
      emit("debug", source, message, ctx);
    },
    info(message: string, ctx?: LogContext) {
      emit("info", source, message, ctx);
    },
    warn(message: string, ctx?: LogContext) {
      emit("warn", source, message, ctx);
    },
    error(message: string, ctx?: LogContext) {
      emit("error", source, message, ctx);
    },
  };
}
