/**
 * Shared utility functions for the bot runtime.
 */

import { TimeoutError } from "./errors.js";

/**
 * Sleep for a specified number of milliseconds.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Race a promise against a timer. The timer is always cleared so a finished
 * run leaves nothing pending on the event loop.
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}

const DURATION_UNITS_MS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
  d: 86_400_000,
  w: 604_800_000
};

/**
 * Parse a compact duration ("90s", "30m", "12h", "7d", "2w") into milliseconds.
 * Returns null for anything else.
 */
export function parseDuration(raw: string): number | null {
  const m = /^(\d+(?:\.\d+)?)\s*(ms|s|m|h|d|w)$/i.exec(raw.trim());
  if (!m) return null;
  const value = Number(m[1]);
  const unit = DURATION_UNITS_MS[(m[2] ?? "").toLowerCase()];
  if (!Number.isFinite(value) || value <= 0 || unit === undefined) return null;
  return Math.round(value * unit);
}
