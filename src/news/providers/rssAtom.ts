import { decodeHtmlEntities, stripCdata } from "../text.js";
import type { RawItem } from "../types.js";

function firstMatch(text: string, re: RegExp): string | null {
  const m = re.exec(text);
  return m?.[1]?.trim() ?? null;
}

function tagText(xml: string, tag: string): string | null {
  const raw = firstMatch(xml, new RegExp(`<${tag}\\b[^>]*>([\\s\\S]*?)<\\/${tag}>`, "i"));
  if (raw === null) return null;
  const text = stripCdata(raw).trim();
  return text ? text : null;
}

function firstTag(xml: string, tags: string[]): string | null {
  for (const t of tags) {
    const v = tagText(xml, t);
    if (v) return v;
  }
  return null;
}

/** Atom <link>: prefer rel="alternate" (or no rel), fall back to any href, then to element text. */
function atomLink(entryXml: string): string | null {
  const links = entryXml.match(/<link\b[^>]*>/gi) ?? [];
  let fallback: string | null = null;
  for (const l of links) {
    const href = firstMatch(l, /href\s*=\s*"([^"]+)"/i) ?? firstMatch(l, /href\s*=\s*'([^']+)'/i);
    if (!href) continue;
    const rel = firstMatch(l, /rel\s*=\s*["']([^"']+)["']/i);
    if (!rel || rel === "alternate") return href;
    fallback ??= href;
  }
  return fallback ?? tagText(entryXml, "link");
}

function assign(item: RawItem, key: "title" | "link" | "body" | "published", value: string | null): void {
  if (value) item[key] = decodeHtmlEntities(value);
}

function parseRss(xml: string, sourceId: string): RawItem[] {
  const out: RawItem[] = [];
  const items = xml.split(/<item\b/i).slice(1);

  for (const chunk of items) {
    const end = chunk.search(/<\/item>/i);
    const itemXml = "<item" + (end >= 0 ? chunk.slice(0, end) : chunk);

    const item: RawItem = { sourceId };
    assign(item, "title", tagText(itemXml, "title"));
    assign(item, "link", tagText(itemXml, "link") ?? guidPermaLink(itemXml));
    // Body stays as markup; the normalizer strips it after entity decoding.
    assign(item, "body", firstTag(itemXml, ["description", "content:encoded", "summary"]));
    assign(item, "published", firstTag(itemXml, ["pubDate", "dc:date", "published", "updated"]));

    out.push(item);
  }

  return out;
}

function guidPermaLink(itemXml: string): string | null {
  const m = /<guid\b([^>]*)>([\s\S]*?)<\/guid>/i.exec(itemXml);
  if (!m) return null;
  const attrs = m[1] ?? "";
  if (/isPermaLink\s*=\s*["']false["']/i.test(attrs)) return null;
  const value = stripCdata(m[2] ?? "").trim();
  return /^https?:\/\//i.test(value) ? value : null;
}

function parseAtom(xml: string, sourceId: string): RawItem[] {
  const out: RawItem[] = [];
  const entries = xml.split(/<entry\b/i).slice(1);

  for (const chunk of entries) {
    const end = chunk.search(/<\/entry>/i);
    const entryXml = "<entry" + (end >= 0 ? chunk.slice(0, end) : chunk);

    const item: RawItem = { sourceId };
    assign(item, "title", tagText(entryXml, "title"));
    assign(item, "link", atomLink(entryXml));
    assign(item, "body", firstTag(entryXml, ["summary", "content"]));
    assign(item, "published", firstTag(entryXml, ["published", "updated"]));

    out.push(item);
  }

  return out;
}

export function isAtom(xml: string): boolean {
  return /<feed\b/i.test(xml) && /xmlns\s*=\s*["']http:\/\/www\.w3\.org\/2005\/Atom["']/i.test(xml);
}

export function looksLikeFeed(xml: string): boolean {
  return /<(rss|feed|rdf:RDF)\b/i.test(xml);
}

/**
 * Parse RSS 2.0 / RDF / Atom text into raw items in document order. Fields
 * are left raw: missing ones are simply absent.
 */
export function parseFeed(xml: string, sourceId: string): RawItem[] {
  return isAtom(xml) ? parseAtom(xml, sourceId) : parseRss(xml, sourceId);
}
