import { decodeHtmlEntities, htmlToLine, htmlToText } from "../text.js";
import type { RawItem } from "../types.js";

type Anchor = { href: string; text: string };

export function extractAnchors(html: string): Anchor[] {
  const out: Anchor[] = [];
  const re = /<a\s+[^>]*href\s*=\s*(?:"([^"]+)"|'([^']+)')[^>]*>([\s\S]*?)<\/a>/gi;
  let m: RegExpExecArray | null;
  while ((m = re.exec(html))) {
    const href = decodeHtmlEntities((m[1] ?? m[2] ?? "").trim());
    const text = htmlToLine(m[3] ?? "");
    if (!href) continue;
    out.push({ href, text });
  }
  return out;
}

export function toAbsoluteUrl(base: string, href: string): string | null {
  try {
    return new URL(href, base).toString();
  } catch {
    return null;
  }
}

function sameSite(url: string, baseUrl: string): boolean {
  try {
    const host = new URL(url).hostname.replace(/^www\./, "");
    const baseHost = new URL(baseUrl).hostname.replace(/^www\./, "");
    return host === baseHost || host.endsWith(`.${baseHost}`);
  } catch {
    return false;
  }
}

/**
 * Headline links scraped from a listing page. Only same-site links matching
 * `include` (when given) are kept; nav/tag/author pages are skipped. Link text
 * shorter than 8 characters is not trusted as a title and is left for the
 * normalizer to derive.
 */
export function parseHtmlLinks(args: {
  html: string;
  baseUrl: string;
  sourceId: string;
  include?: RegExp;
}): RawItem[] {
  const items: RawItem[] = [];
  const seen = new Set<string>();

  for (const a of extractAnchors(args.html)) {
    const abs = toAbsoluteUrl(args.baseUrl, a.href);
    if (!abs || !/^https?:/i.test(abs)) continue;
    if (!sameSite(abs, args.baseUrl)) continue;
    if (/\/(tag|tags|category|categories|author|authors|topics?)\b/i.test(abs)) continue;
    if (args.include && !args.include.test(abs)) continue;

    const key = abs.split("#")[0] ?? abs;
    if (seen.has(key)) continue;
    seen.add(key);

    const item: RawItem = { sourceId: args.sourceId, link: abs };
    if (a.text.length >= 8) item.title = a.text;
    items.push(item);
  }

  return items;
}

function attr(tagHtml: string, name: string): string | null {
  const m = new RegExp(`(?:^|\\s)${name}\\s*=\\s*(?:"([^"]*)"|'([^']*)')`, "i").exec(tagHtml);
  const v = m?.[1] ?? m?.[2];
  return v === undefined ? null : decodeHtmlEntities(v).trim();
}

/**
 * Image figures with captions, e.g. a newspaper front-page round-up: the
 * image alt text becomes the title, the caption the body and the image (or its
 * anchor) the link. Figures without an alt have no title so the normalizer
 * reports them.
 */
export function parseHtmlFigures(args: { html: string; baseUrl: string; sourceId: string }): RawItem[] {
  const items: RawItem[] = [];
  const re = /<figure\b[^>]*>([\s\S]*?)<\/figure>/gi;
  let m: RegExpExecArray | null;

  while ((m = re.exec(args.html))) {
    const inner = m[1] ?? "";
    const img = /<img\b[^>]*>/i.exec(inner)?.[0] ?? "";
    const caption = /<figcaption\b[^>]*>([\s\S]*?)<\/figcaption>/i.exec(inner)?.[1] ?? "";

    const item: RawItem = { sourceId: args.sourceId };
    const alt = img ? attr(img, "alt") : null;
    if (alt) item.title = alt;
    const body = htmlToText(caption);
    if (body) item.body = body;

    // Anchor target if the figure has one, else the image itself.
    const href = /<a\s+[^>]*href\s*=\s*"([^"]+)"/i.exec(inner)?.[1] ?? (img ? attr(img, "src") : null);
    const link = href ? toAbsoluteUrl(args.baseUrl, decodeHtmlEntities(href)) : null;
    if (link) item.link = link;

    items.push(item);
  }

  return items;
}

const BOILERPLATE = ["click here", "subscribe", "follow us", "read more"];

/**
 * Lead paragraphs of an article page: `<p>` text outside page chrome
 * (nav, header, footer, aside, form), longer than 80 characters and not a
 * call to action. At most `max` paragraphs, in document order.
 */
export function extractArticleParagraphs(html: string, max: number): string[] {
  const content = html.replace(/<(script|style|noscript|nav|header|footer|aside|form|iframe)\b[^>]*>[\s\S]*?<\/\1>/gi, " ");
  const out: string[] = [];
  const re = /<p\b[^>]*>([\s\S]*?)<\/p>/gi;
  let m: RegExpExecArray | null;
  while (out.length < max && (m = re.exec(content))) {
    const text = htmlToLine(m[1] ?? "");
    if (text.length <= 80) continue;
    const lower = text.toLowerCase();
    if (BOILERPLATE.some((phrase) => lower.includes(phrase))) continue;
    out.push(text);
  }
  return out;
}
