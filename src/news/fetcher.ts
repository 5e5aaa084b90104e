import { FetchError } from "../errors.js";
import { errorMessage, logger } from "../logger.js";
import { sleep } from "../utils.js";
import { extractArticleParagraphs, parseHtmlFigures, parseHtmlLinks } from "./providers/html.js";
import { looksLikeFeed, parseFeed } from "./providers/rssAtom.js";
import type { RawItem, SourceDescriptor } from "./types.js";

const USER_AGENT = "Mozilla/5.0 (compatible; newsdesk-bot/1.0)";
const MAX_BODY_BYTES = 5_000_000;

export type FetchOptions = {
  timeoutMs?: number;
  retries?: number;
};

/** Article collaborator: lead paragraphs of the page at `url`, joined by blank lines ("" when none). */
export type ArticleFetcher = (url: string, maxParagraphs: number, opts?: FetchOptions) => Promise<string>;

/** Fetch collaborator: a finite, single-use sequence of raw items for one source. */
export type SourceFetcher = (source: SourceDescriptor, opts?: FetchOptions) => AsyncIterable<RawItem>;

function shouldRetryStatus(status: number): boolean {
  return status === 429 || (status >= 500 && status <= 599);
}

async function fetchWithTimeout(url: string, init: RequestInit, timeoutMs: number): Promise<Response> {
  const controller = new AbortController();
  const t = setTimeout(() => controller.abort(), timeoutMs);
  try {
    return await fetch(url, { ...init, signal: controller.signal });
  } finally {
    clearTimeout(t);
  }
}

/**
 * GET with per-attempt timeout; retries network errors and 429/5xx with
 * exponential backoff (0.5s, 1s, 2s...). Non-retriable statuses fail at once.
 */
export async function fetchWithRetry(
  sourceId: string,
  url: string,
  init: RequestInit,
  opts?: FetchOptions
): Promise<Response> {
  const retries = opts?.retries ?? 2;
  const timeoutMs = opts?.timeoutMs ?? 15_000;

  let lastErr: FetchError | null = null;
  for (let attempt = 0; attempt <= retries; attempt++) {
    try {
      const res = await fetchWithTimeout(url, init, timeoutMs);
      if (res.ok) return res;

      lastErr = new FetchError(sourceId, `HTTP ${res.status}`, { status: res.status });
      logger.warn("fetch.non_200", { sourceId, url, status: res.status, attempt });
      if (!shouldRetryStatus(res.status)) throw lastErr;
    } catch (err) {
      if (err instanceof FetchError) throw err;
      const timedOut = err instanceof Error && err.name === "AbortError";
      lastErr = new FetchError(sourceId, timedOut ? `timeout after ${timeoutMs}ms` : errorMessage(err), { cause: err });
      logger.warn("fetch.failed", { sourceId, url, attempt, error: lastErr.message });
    }

    if (attempt < retries) await sleep(500 * Math.pow(2, attempt));
  }

  throw lastErr ?? new FetchError(sourceId, "fetch failed");
}

/** Body text with a size guard; the timeout covers slow or chunked responses. */
export async function fetchText(sourceId: string, url: string, accept: string, opts?: FetchOptions): Promise<string> {
  const res = await fetchWithRetry(
    sourceId,
    url,
    {
      method: "GET",
      headers: {
        Accept: accept,
        "Accept-Language": "en-GB,en;q=0.9",
        // Some sites respond with 403/429 to missing/odd UAs.
        "User-Agent": USER_AGENT
      }
    },
    opts
  );

  const timeoutMs = opts?.timeoutMs ?? 15_000;
  let timer: NodeJS.Timeout | undefined;
  try {
    const text = await Promise.race([
      res.text(),
      new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new FetchError(sourceId, `body timeout after ${timeoutMs}ms`)), timeoutMs);
      })
    ]);
    if (text.length > MAX_BODY_BYTES) {
      throw new FetchError(sourceId, `response too large (${text.length} bytes)`);
    }
    return text;
  } catch (err) {
    if (err instanceof FetchError) throw err;
    throw new FetchError(sourceId, `reading body failed: ${errorMessage(err)}`, { cause: err });
  } finally {
    if (timer) clearTimeout(timer);
  }
}

function compileInclude(source: SourceDescriptor): RegExp | undefined {
  if (!source.include) return undefined;
  try {
    return new RegExp(source.include, "i");
  } catch (err) {
    throw new FetchError(source.id, `invalid include pattern: ${errorMessage(err)}`);
  }
}

/** Parse fetched text for a source. Throws FetchError when the text is not what the source kind expects. */
export function parseSourceText(source: SourceDescriptor, text: string): RawItem[] {
  switch (source.kind) {
    case "rss": {
      if (!looksLikeFeed(text)) throw new FetchError(source.id, "response is not an RSS/Atom feed");
      return parseFeed(text, source.id);
    }
    case "html-links":
      return parseHtmlLinks({ html: text, baseUrl: source.url, sourceId: source.id, include: compileInclude(source) });
    case "html-figures":
      return parseHtmlFigures({ html: text, baseUrl: source.url, sourceId: source.id });
  }
}

const ACCEPT: Record<SourceDescriptor["kind"], string> = {
  rss: "application/rss+xml,application/atom+xml,text/xml,application/xml;q=0.9,*/*;q=0.8",
  "html-links": "text/html,application/xhtml+xml",
  "html-figures": "text/html,application/xhtml+xml"
};

/**
 * Default fetch collaborator over HTTP. Yields items in document order, capped
 * at `maxItems`. Any failure surfaces as FetchError while iterating.
 */
export async function* fetchSource(source: SourceDescriptor, opts?: FetchOptions): AsyncGenerator<RawItem> {
  const text = await fetchText(source.id, source.url, ACCEPT[source.kind], opts);
  const items = parseSourceText(source, text);
  const limit = source.maxItems ?? items.length;

  logger.debug("fetch.parsed", { sourceId: source.id, kind: source.kind, items: items.length, limit });
  yield* items.slice(0, limit);
}

/** Default article collaborator over HTTP. Fails with FetchError tagged "article". */
export async function fetchArticleText(url: string, maxParagraphs: number, opts?: FetchOptions): Promise<string> {
  const html = await fetchText("article", url, ACCEPT["html-links"], opts);
  return extractArticleParagraphs(html, maxParagraphs).join("\n\n");
}
