import { PublishError } from "../errors.js";
import { errorMessage, logger } from "../logger.js";
import type { Publisher } from "../social/poster.js";
import type { DedupStore } from "../state/dedupStore.js";
import { withTimeout } from "../utils.js";
import { fingerprintKeys, titleSimilarity, type FingerprintOptions } from "./fingerprint.js";
import { renderPost, type RenderOptions } from "./render.js";
import type { Fingerprint, FingerprintStrategy, Item, Outcome } from "./types.js";

export type PublishGateOptions = {
  store: DedupStore;
  publisher: Publisher;
  strategy: FingerprintStrategy;
  /** Extra strategies whose keys also count as "seen" (URL or content, say). */
  dedupAlsoBy?: FingerprintStrategy[];
  /** Skip items whose title scores at least this against a seen title (0..1]. */
  titleSimilarity?: number;
  fingerprint?: FingerprintOptions;
  render: Omit<RenderOptions, "sourceLabel">;
  /** Source id → display label for attribution lines. */
  sourceLabels?: Record<string, string>;
  blockedPhrases?: string[];
  publishTimeoutMs: number;
  now?: () => Date;
};

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Whole-phrase, case-insensitive matchers. */
export function compileBlockedPhrases(phrases: string[]): RegExp[] {
  return phrases
    .map((p) => p.trim())
    .filter(Boolean)
    .map((p) => {
      const start = /^\w/.test(p) ? "\\b" : "";
      const end = /\w$/.test(p) ? "\\b" : "";
      return new RegExp(`${start}${escapeRegExp(p)}${end}`, "i");
    });
}

export type Candidate = { kind: "candidate"; fingerprint: Fingerprint; keys: Fingerprint[] };

export type ScreenResult = Candidate | Extract<Outcome, { kind: "skippedInvalid" | "skippedDuplicate" }>;

export function toPublishError(err: unknown): PublishError {
  if (err instanceof PublishError) return err;
  // Timeouts and unexpected throws alike: the next run may succeed.
  return new PublishError("transient", errorMessage(err), { cause: err });
}

/**
 * Per-item decision: Normalized → Skipped(invalid|duplicate) | Candidate →
 * Published | Failed. Only a successful publish marks the fingerprint seen,
 * so a failed item is retried on the next run.
 *
 * A gate lives for one run. Keys and titles it has already tried to publish
 * in that run count as duplicates, so a failed item is not resubmitted from
 * a second feed entry in the same run.
 */
export class PublishGate {
  private readonly blocked: RegExp[];
  private readonly now: () => Date;
  private readonly attempted = new Set<Fingerprint>();
  private readonly attemptedTitles: Array<{ fingerprint: Fingerprint; title: string }> = [];

  constructor(private readonly opts: PublishGateOptions) {
    this.blocked = compileBlockedPhrases(opts.blockedPhrases ?? []);
    this.now = opts.now ?? (() => new Date());
  }

  /** Everything before the publish call. */
  screen(item: Item): ScreenResult {
    const keys = fingerprintKeys(item, this.opts.strategy, this.opts.dedupAlsoBy, this.opts.fingerprint);
    const [fp] = keys;
    if (!fp) return { kind: "skippedInvalid", reason: "unfingerprintable" };

    if (this.blocked.length > 0) {
      const text = `${item.title}\n${item.body ?? ""}`;
      if (this.blocked.some((re) => re.test(text))) return { kind: "skippedInvalid", reason: "blocked_phrase" };
    }

    const seen = keys.find((k) => this.opts.store.contains(k) || this.attempted.has(k));
    if (seen) return { kind: "skippedDuplicate", fingerprint: seen };

    const similar = this.similarTitle(item.title);
    if (similar) return { kind: "skippedDuplicate", fingerprint: similar };

    return { kind: "candidate", fingerprint: fp, keys };
  }

  /** Publish a screened candidate and record the outcome. */
  async publishCandidate(item: Item, candidate: Candidate): Promise<Outcome> {
    const fp = candidate.fingerprint;
    for (const k of candidate.keys) this.attempted.add(k);
    this.attemptedTitles.push({ fingerprint: fp, title: item.title });

    const draft = renderPost(item, this.now(), {
      ...this.opts.render,
      sourceLabel: this.opts.sourceLabels?.[item.sourceId]
    });

    const controller = new AbortController();
    try {
      const postId = await withTimeout(
        this.opts.publisher.publish(draft, { signal: controller.signal }),
        this.opts.publishTimeoutMs,
        "publish"
      );
      // Title on the primary key only, so each post is matched by title once.
      this.opts.store.markSeen(fp, { sourceId: item.sourceId, title: item.title });
      for (const k of candidate.keys.slice(1)) this.opts.store.markSeen(k, { sourceId: item.sourceId });
      logger.info("gate.published", { sourceId: item.sourceId, title: draft.title, postId, fingerprint: fp });
      return { kind: "published", fingerprint: fp, postId };
    } catch (err) {
      controller.abort();
      const error = toPublishError(err);
      logger.warn("gate.publish_failed", {
        sourceId: item.sourceId,
        title: draft.title,
        fingerprint: fp,
        errorKind: error.kind,
        error: error.message,
        retryAfterMs: error.retryAfterMs
      });
      return { kind: "failed", fingerprint: fp, error };
    }
  }

  async process(item: Item): Promise<Outcome> {
    const screened = this.screen(item);
    if (screened.kind !== "candidate") {
      logger.debug("gate.skipped", { sourceId: item.sourceId, title: item.title, outcome: screened.kind });
      return screened;
    }
    return this.publishCandidate(item, screened);
  }

  /** Fingerprint of a stored or attempted title close enough to this one. */
  private similarTitle(title: string): Fingerprint | undefined {
    const threshold = this.opts.titleSimilarity;
    if (threshold === undefined) return undefined;
    const pool = [...this.opts.store.titledEntries(), ...this.attemptedTitles];
    const hit = pool.find((entry) => titleSimilarity(title, entry.title) >= threshold);
    return hit?.fingerprint;
  }
}
