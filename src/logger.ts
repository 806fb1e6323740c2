import { inspect } from "node:util";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  level: LogLevel;
  message: string;
  component?: string;
  requestId?: string;
  meta?: unknown;
  timestamp?: string;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

// Read on every call so tests can change the threshold per case.
function minimumLevel(): LogLevel {
  const configured = process.env.METER_TESTS_LOG_LEVEL?.trim().toLowerCase();
  return configured && isLogLevel(configured) ? configured : "info";
}

function normalizeMeta(meta: unknown): unknown {
  if (meta === undefined) {
    return undefined;
  }

  if (meta instanceof Error) {
    return { name: meta.name, message: meta.message };
  }

  try {
    JSON.stringify(meta);
    return meta;
  } catch {
    return inspect(meta, { depth: 3, breakLength: 80 });
  }
}

/**
 * Writes one JSON line to stderr. Stdout carries the MCP transport and must
 * stay clean.
 */
export function log(entry: LogEntry): void {
  if (LEVEL_ORDER[entry.level] < LEVEL_ORDER[minimumLevel()]) {
    return;
  }

  const payload: Record<string, unknown> = {
    level: entry.level,
    message: entry.message,
    timestamp: entry.timestamp ?? new Date().toISOString(),
  };

  if (entry.component) {
    payload.component = entry.component;
  }

  if (entry.requestId) {
    payload.requestId = entry.requestId;
  }

  const normalizedMeta = normalizeMeta(entry.meta);
  if (normalizedMeta !== undefined) {
    payload.meta = normalizedMeta;
  }

  console.error(JSON.stringify(payload));
}

export const logger = {
  debug(message: string, component?: string, meta?: unknown): void {
    log({ level: "debug", message, component, meta });
  },
  info(message: string, component?: string, meta?: unknown): void {
    log({ level: "info", message, component, meta });
  },
  warn(message: string, component?: string, meta?: unknown): void {
    log({ level: "warn", message, component, meta });
  },
  error(message: string, component?: string, meta?: unknown): void {
    log({ level: "error", message, component, meta });
  },
};
