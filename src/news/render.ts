import type { Item, PostDraft, PostKind } from "./types.js";

export const MAX_TITLE_LENGTH = 300;

const WEEKDAYS = ["Sunday", "Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday"];

export type RenderOptions = {
  postKind: PostKind;
  titleTemplate?: string;
  /** Run hour (UTC) from which date placeholders refer to the next day. */
  dateRollHourUtc?: number;
  flairText?: string;
  replyWithBody?: boolean;
  bodyFooter?: string;
  /** Display name of the item's source for the attribution line. */
  sourceLabel?: string;
};

export function truncateTitle(s: string, max = MAX_TITLE_LENGTH): string {
  if (s.length <= max) return s;
  const suffix = "…";
  return s.slice(0, max - suffix.length).trimEnd() + suffix;
}

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

/** Date the title placeholders refer to. */
export function postDate(now: Date, dateRollHourUtc?: number): Date {
  if (dateRollHourUtc !== undefined && now.getUTCHours() >= dateRollHourUtc) {
    return new Date(now.getTime() + 86_400_000);
  }
  return now;
}

export function renderTitle(item: Item, now: Date, opts: Pick<RenderOptions, "titleTemplate" | "dateRollHourUtc" | "sourceLabel">): string {
  const template = opts.titleTemplate ?? "{title}";
  const d = postDate(now, opts.dateRollHourUtc);
  const weekday = WEEKDAYS[d.getUTCDay()] ?? "";
  const date = `${pad2(d.getUTCDate())}/${pad2(d.getUTCMonth() + 1)}/${d.getUTCFullYear()}`;

  const values: Record<string, string> = {
    title: item.title,
    TITLE: item.title.toUpperCase(),
    source: opts.sourceLabel ?? item.sourceId,
    weekday,
    WEEKDAY: weekday.toUpperCase(),
    date
  };

  const rendered = template.replace(/\{(\w+)\}/g, (whole, key: string) => values[key] ?? whole);
  return truncateTitle(rendered.replace(/\s+/g, " ").trim());
}

/**
 * Body block: quoted paragraphs, attribution, optional read-more link and
 * footer. Returns null when the item has neither body nor link.
 */
export function renderBody(item: Item, opts: Pick<RenderOptions, "bodyFooter" | "sourceLabel">): string | null {
  const blocks: string[] = [];

  if (item.body) {
    const quote = item.body
      .split(/\n\s*\n/)
      .map((p) => p.trim())
      .filter(Boolean)
      .map((p) => `> ${p}`)
      .join("\n>\n");
    blocks.push(quote);
    blocks.push(`*Quoted from ${opts.sourceLabel ?? item.sourceId}*`);
  }

  if (item.link) blocks.push(`[Read more](${item.link})`);
  if (opts.bodyFooter) blocks.push(opts.bodyFooter);

  if (!item.body && !item.link) return null;
  return blocks.join("\n\n");
}

/**
 * Item → post. Link posts carry the body as an optional reply comment; a link
 * post for an item without a link becomes a self post.
 */
export function renderPost(item: Item, now: Date, opts: RenderOptions): PostDraft {
  const title = renderTitle(item, now, opts);
  const body = renderBody(item, opts);
  const kind: PostKind = opts.postKind === "link" && item.link ? "link" : "self";

  const draft: PostDraft = { kind, title };
  if (opts.flairText) draft.flairText = opts.flairText;

  if (kind === "link") {
    draft.url = item.link;
    if (opts.replyWithBody && item.body && body) draft.comment = body;
  } else if (body) {
    draft.text = body;
  }

  return draft;
}
