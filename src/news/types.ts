import type { PublishError } from "../errors.js";

export type SourceKind = "rss" | "html-links" | "html-figures";

export type SourceDescriptor = {
  id: string;
  kind: SourceKind;
  url: string;
  /** Human-readable name used in attribution lines; defaults to the host. */
  label?: string;
  maxItems?: number;
  /** html-links only: regex an absolute link must match to be kept. */
  include?: string;
};

export type FingerprintStrategy = "url" | "title" | "content-hash" | "timestamp";

/** Unprocessed fetch result. Every field except the source may be missing. */
export type RawItem = {
  sourceId: string;
  title?: string;
  link?: string;
  body?: string;
  /** Raw timestamp text as the source gave it. */
  published?: string;
};

export type Item = {
  sourceId: string;
  title: string;
  link?: string;
  body?: string;
  bodyTruncated: boolean;
  publishedAtMs?: number;
};

export type InvalidReason =
  | "missing_title"
  | "missing_link_and_body"
  | "unfingerprintable"
  | "blocked_phrase";

export type NormalizeResult =
  | { ok: true; item: Item }
  | { ok: false; reason: InvalidReason };

export type Fingerprint = string;

export type PostKind = "link" | "self";

/** What the publisher receives: a fully rendered post. */
export type PostDraft = {
  kind: PostKind;
  title: string;
  url?: string;
  text?: string;
  /** Posted as a reply under a link post. */
  comment?: string;
  flairText?: string;
};

export type PostId = string;

export type Outcome =
  | { kind: "skippedInvalid"; reason: InvalidReason }
  | { kind: "skippedDuplicate"; fingerprint: Fingerprint }
  | { kind: "published"; fingerprint: Fingerprint; postId: PostId }
  | { kind: "failed"; fingerprint: Fingerprint; error: PublishError };

export type SourceFailure = {
  sourceId: string;
  error: string;
};

export type PublishFailure = {
  sourceId: string;
  title: string;
  fingerprint: Fingerprint;
  kind: PublishError["kind"];
  message: string;
};

export type RunSummary = {
  bot: string;
  startedAt: string;
  finishedAt: string;
  sources: number;
  fetched: number;
  normalized: number;
  skippedInvalid: number;
  skippedDuplicate: number;
  /** Candidates held back by per-run caps; they stay unseen for the next run. */
  deferred: number;
  published: number;
  failed: number;
  evicted: number;
  invalidReasons: Partial<Record<InvalidReason, number>>;
  sourceFailures: SourceFailure[];
  publishErrors: PublishFailure[];
  posts: Array<{ fingerprint: Fingerprint; postId: PostId }>;
};
