export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

function ts() {
  return new Date().toISOString();
}

function isLogLevel(s: string): s is LogLevel {
  return s === "debug" || s === "info" || s === "warn" || s === "error";
}

const envLevel = (process.env.LOG_LEVEL ?? "").trim().toLowerCase();
let minLevel: LogLevel = isLogLevel(envLevel) ? envLevel : "info";

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

export const logger = {
  debug: (msg: string, meta?: Record<string, unknown>) => log("debug", msg, meta),
  info: (msg: string, meta?: Record<string, unknown>) => log("info", msg, meta),
  warn: (msg: string, meta?: Record<string, unknown>) => log("warn", msg, meta),
  error: (msg: string, meta?: Record<string, unknown>) => log("error", msg, meta)
};

function log(level: LogLevel, msg: string, meta?: Record<string, unknown>) {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;
  const base = { ts: ts(), level, msg };
  const out = meta ? { ...base, ...meta } : base;
  // Keep it simple: JSON line logs.
  // eslint-disable-next-line no-console
  console.log(JSON.stringify(out));
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
