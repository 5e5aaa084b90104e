import crypto from "node:crypto";

import type { Fingerprint, FingerprintStrategy, Item } from "./types.js";

/** Order tried after the configured strategy can't be applied. */
export const FALLBACK_ORDER: readonly FingerprintStrategy[] = ["content-hash", "url", "title", "timestamp"];

export const DEFAULT_TIMESTAMP_GRANULARITY_MS = 3_600_000;

/** Titles arrive entity-decoded from normalizeItem; this only folds case and spacing. */
export function normalizeTitle(title: string): string {
  return title
    .replace(/\s+/g, " ")
    .trim()
    .toLowerCase();
}

const STRIP_QUERY_KEYS = new Set([
  "gclid",
  "fbclid",
  "dclid",
  "msclkid",
  "ref",
  "ref_src",
  "source",
  "campaign",
  "mc_cid",
  "mc_eid",
  "at_medium",
  "at_campaign",
  "at_custom1",
  "at_custom2",
  "at_custom3",
  "at_custom4",
  "at_link_id",
  "at_link_type",
  "at_link_origin",
  "at_ptr_name",
  "at_bbc_team",
  "at_format",
  "cmpid",
  "cmp",
  "ocid",
  "rss",
  "ito",
  "taid"
]);

function isTrackingParam(key: string): boolean {
  const k = key.toLowerCase();
  return STRIP_QUERY_KEYS.has(k) || k.startsWith("utm_");
}

/**
 * Canonical form of a link for comparison: scheme dropped, host lower-cased
 * without "www.", tracking params removed, remaining params sorted, no
 * fragment and no trailing slash.
 */
export function canonicalizeUrl(rawUrl: string): string {
  try {
    const url = new URL(rawUrl.trim());
    url.hash = "";

    // Normalize host casing
    url.hostname = url.hostname.toLowerCase();

    // Strip known tracking params
    for (const key of Array.from(url.searchParams.keys())) {
      if (isTrackingParam(key)) {
        url.searchParams.delete(key);
      }
    }

    // Sort params to stabilize fingerprint
    const params = Array.from(url.searchParams.entries()).sort(([a, av], [b, bv]) =>
      a === b ? av.localeCompare(bv) : a.localeCompare(b)
    );
    url.search = "";
    for (const [k, v] of params) url.searchParams.append(k, v);

    let pathname = url.pathname;
    if (pathname.length > 1 && pathname.endsWith("/")) {
      pathname = pathname.replace(/\/+$/, "") || "/";
    }

    const host = url.hostname.replace(/^www\./, "");
    const port = url.port ? `:${url.port}` : "";
    const search = url.searchParams.toString();

    return `${host}${port}${pathname === "/" ? "" : pathname}${search ? `?${search}` : ""}`;
  } catch {
    // If URL parsing fails, fall back to a conservative trimmed string.
    return rawUrl.trim();
  }
}

export function normalizeBody(body: string): string {
  return body.replace(/\s+/g, " ").trim().toLowerCase();
}

export function contentHash(title: string, body: string): string {
  const data = `${normalizeTitle(title)}\n${normalizeBody(body)}`;
  return crypto.createHash("sha256").update(data).digest("hex");
}

export function roundTimestamp(ms: number, granularityMs: number): number {
  return Math.floor(ms / granularityMs) * granularityMs;
}

export type FingerprintOptions = {
  timestampGranularityMs?: number;
};

/** Key for one strategy, or null when the item lacks the field it needs. */
export function keyForStrategy(item: Item, strategy: FingerprintStrategy, opts?: FingerprintOptions): string | null {
  switch (strategy) {
    case "url": {
      if (!item.link) return null;
      return canonicalizeUrl(item.link);
    }
    case "title": {
      const t = normalizeTitle(item.title);
      return t ? t : null;
    }
    case "content-hash": {
      if (!item.body || !item.body.trim()) return null;
      return contentHash(item.title, item.body);
    }
    case "timestamp": {
      if (item.publishedAtMs === undefined || !Number.isFinite(item.publishedAtMs)) return null;
      const granularity = opts?.timestampGranularityMs ?? DEFAULT_TIMESTAMP_GRANULARITY_MS;
      return `${item.sourceId}@${new Date(roundTimestamp(item.publishedAtMs, granularity)).toISOString()}`;
    }
  }
}

export function strategyOrder(preferred: FingerprintStrategy): FingerprintStrategy[] {
  return [preferred, ...FALLBACK_ORDER.filter((s) => s !== preferred)];
}

/**
 * Stable identity for an item. Tries the configured strategy first and then
 * the fixed fallback order. Returns null when no strategy applies.
 */
export function fingerprintItem(item: Item, strategy: FingerprintStrategy, opts?: FingerprintOptions): Fingerprint | null {
  for (const s of strategyOrder(strategy)) {
    const key = keyForStrategy(item, s, opts);
    if (key) return `${s}:${key}`;
  }
  return null;
}

/**
 * Every key an item is known by: the primary fingerprint first, then one key
 * per extra strategy that applies to the item. Duplicates are dropped.
 */
export function fingerprintKeys(
  item: Item,
  strategy: FingerprintStrategy,
  alsoBy: readonly FingerprintStrategy[] = [],
  opts?: FingerprintOptions
): Fingerprint[] {
  const primary = fingerprintItem(item, strategy, opts);
  if (!primary) return [];
  const keys = [primary];
  for (const s of alsoBy) {
    const key = keyForStrategy(item, s, opts);
    if (!key) continue;
    const fp = `${s}:${key}`;
    if (!keys.includes(fp)) keys.push(fp);
  }
  return keys;
}

function bigrams(s: string): Map<string, number> {
  const out = new Map<string, number>();
  for (let i = 0; i < s.length - 1; i++) {
    const gram = s.slice(i, i + 2);
    out.set(gram, (out.get(gram) ?? 0) + 1);
  }
  return out;
}

/**
 * Dice coefficient over character bigrams of the folded titles, 0..1.
 * Identical folded titles score 1 even when shorter than two characters.
 */
export function titleSimilarity(a: string, b: string): number {
  const x = normalizeTitle(a);
  const y = normalizeTitle(b);
  if (x === y) return 1;
  if (x.length < 2 || y.length < 2) return 0;

  const gx = bigrams(x);
  const gy = bigrams(y);
  let overlap = 0;
  for (const [gram, n] of gx) {
    overlap += Math.min(n, gy.get(gram) ?? 0);
  }
  return (2 * overlap) / (x.length - 1 + (y.length - 1));
}
