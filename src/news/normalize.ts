import { collapseWhitespace, decodeHtmlEntities, htmlToLine, htmlToText } from "./text.js";
import type { Item, NormalizeResult, RawItem } from "./types.js";

export const DEFAULT_BODY_MAX_LENGTH = 500;
export const TRUNCATION_SUFFIX = "… (continued at source)";

export type NormalizeOptions = {
  bodyMaxLength?: number;
};

/** Absolute http(s) URL or null. */
export function validLink(raw: string | undefined): string | null {
  if (!raw) return null;
  const trimmed = decodeHtmlEntities(raw.trim());
  if (!trimmed) return null;
  try {
    const u = new URL(trimmed);
    if (u.protocol !== "http:" && u.protocol !== "https:") return null;
    if (!u.hostname) return null;
    return u.toString();
  } catch {
    return null;
  }
}

/** Placeholder title from the last path segment of a link, e.g. ".../storm-hits-coast.html" → "Storm hits coast". */
export function titleFromLink(link: string): string | null {
  try {
    const u = new URL(link);
    const parts = u.pathname.split("/").filter(Boolean);
    const slug = parts[parts.length - 1] ?? "";
    if (!slug) return null;

    let decoded: string;
    try {
      decoded = decodeURIComponent(slug);
    } catch {
      decoded = slug;
    }

    const words = collapseWhitespace(decoded.replace(/\.[a-z0-9]{1,5}$/i, "").replace(/[-_+]+/g, " "));
    // Purely numeric ids ("12427754") don't make a title.
    if (!words || /^[\d\s]+$/.test(words)) return null;
    return words.charAt(0).toUpperCase() + words.slice(1);
  } catch {
    return null;
  }
}

/**
 * Truncate to at most `maxLength` characters including the suffix. Cuts on a
 * word boundary when one is close enough.
 */
export function truncateBody(text: string, maxLength: number): { text: string; truncated: boolean } {
  if (text.length <= maxLength) return { text, truncated: false };

  const room = Math.max(0, maxLength - TRUNCATION_SUFFIX.length);
  let cut = text.slice(0, room);
  const lastSpace = cut.lastIndexOf(" ");
  if (lastSpace > room * 0.6) cut = cut.slice(0, lastSpace);

  return { text: cut.trimEnd() + TRUNCATION_SUFFIX, truncated: true };
}

/**
 * RawItem → Item, or a tagged Invalid with the reason. Never throws.
 *
 * A malformed link is dropped rather than failing the item. The item is
 * Invalid when no title can be derived, or when neither a link nor body text
 * is left.
 */
export function normalizeItem(raw: RawItem, opts?: NormalizeOptions): NormalizeResult {
  const maxLength = opts?.bodyMaxLength ?? DEFAULT_BODY_MAX_LENGTH;

  const link = validLink(raw.link);

  let title = raw.title ? htmlToLine(raw.title) : "";
  if (!title && link) title = titleFromLink(link) ?? "";
  if (!title) return { ok: false, reason: "missing_title" };

  const bodyText = raw.body ? htmlToText(raw.body) : "";
  const body = bodyText ? truncateBody(bodyText, maxLength) : null;

  if (!link && !body) return { ok: false, reason: "missing_link_and_body" };

  let publishedAtMs: number | undefined;
  if (raw.published) {
    const ms = Date.parse(raw.published.trim());
    if (Number.isFinite(ms)) publishedAtMs = ms;
  }

  const item: Item = {
    sourceId: raw.sourceId,
    title,
    bodyTruncated: body?.truncated ?? false
  };
  if (link) item.link = link;
  if (body) item.body = body.text;
  if (publishedAtMs !== undefined) item.publishedAtMs = publishedAtMs;

  return { ok: true, item };
}
