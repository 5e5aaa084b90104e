import type { BotConfig } from "../bots.js";
import { errorMessage, logger } from "../logger.js";
import type { Publisher } from "../social/poster.js";
import type { DedupStore } from "../state/dedupStore.js";
import {
  fetchArticleText,
  fetchSource as httpFetchSource,
  type ArticleFetcher,
  type FetchOptions,
  type SourceFetcher
} from "./fetcher.js";
import { PublishGate } from "./gate.js";
import { normalizeItem, truncateBody } from "./normalize.js";
import type { InvalidReason, Item, Outcome, RawItem, RunSummary, SourceDescriptor } from "./types.js";

export type PipelineDeps = {
  bot: BotConfig;
  store: DedupStore;
  publisher: Publisher;
  fetchSource?: SourceFetcher;
  fetchArticle?: ArticleFetcher;
  fetchOptions?: FetchOptions;
  publishTimeoutMs: number;
  /** Nothing is persisted: the store is read but never flushed. */
  dryRun?: boolean;
  now?: () => Date;
};

function emptySummary(bot: string, startedAt: Date, sources: number): RunSummary {
  return {
    bot,
    startedAt: startedAt.toISOString(),
    finishedAt: startedAt.toISOString(),
    sources,
    fetched: 0,
    normalized: 0,
    skippedInvalid: 0,
    skippedDuplicate: 0,
    deferred: 0,
    published: 0,
    failed: 0,
    evicted: 0,
    invalidReasons: {},
    sourceFailures: [],
    publishErrors: [],
    posts: []
  };
}

function countInvalid(summary: RunSummary, reason: InvalidReason): void {
  summary.skippedInvalid += 1;
  summary.invalidReasons[reason] = (summary.invalidReasons[reason] ?? 0) + 1;
}

function sourceLabel(source: SourceDescriptor): string {
  if (source.label) return source.label;
  try {
    return new URL(source.url).hostname.replace(/^www\./, "");
  } catch {
    return source.id;
  }
}

/**
 * One end-to-end run for a bot variant: load store → fetch every source →
 * normalize → gate each item in source order → flush store once (never on a
 * dry run) → summary.
 *
 * Source and item failures are recorded and the run carries on. Store I/O
 * failures (StoreIOError) propagate to the caller.
 */
export class PipelineRunner {
  private readonly fetchSource: SourceFetcher;
  private readonly fetchArticle: ArticleFetcher;
  private readonly now: () => Date;

  constructor(private readonly deps: PipelineDeps) {
    this.fetchSource = deps.fetchSource ?? httpFetchSource;
    this.fetchArticle = deps.fetchArticle ?? fetchArticleText;
    this.now = deps.now ?? (() => new Date());
  }

  /** True when the run could not reach any source at all. */
  static shouldFail(summary: RunSummary): boolean {
    return summary.sources > 0 && summary.sourceFailures.length >= summary.sources;
  }

  async run(): Promise<RunSummary> {
    const { bot, store } = this.deps;
    const startedAt = this.now();
    const summary = emptySummary(bot.name, startedAt, bot.sources.length);

    logger.info("run.start", { bot: bot.name, sources: bot.sources.length, strategy: bot.fingerprintStrategy });

    await store.load();
    if (bot.dedupHorizon !== undefined) {
      summary.evicted = store.evictOlderThan(bot.dedupHorizon, startedAt.getTime());
    }

    const gate = new PublishGate({
      store,
      publisher: this.deps.publisher,
      strategy: bot.fingerprintStrategy,
      dedupAlsoBy: bot.dedupAlsoBy,
      titleSimilarity: bot.titleSimilarity,
      fingerprint: { timestampGranularityMs: bot.timestampGranularity },
      render: {
        postKind: bot.publishTarget.postKind,
        titleTemplate: bot.publishTarget.titleTemplate,
        dateRollHourUtc: bot.publishTarget.dateRollHourUtc,
        flairText: bot.publishTarget.flairText,
        replyWithBody: bot.publishTarget.replyWithBody,
        bodyFooter: bot.publishTarget.bodyFooter
      },
      sourceLabels: Object.fromEntries(bot.sources.map((s) => [s.id, sourceLabel(s)])),
      blockedPhrases: bot.blockedPhrases,
      publishTimeoutMs: this.deps.publishTimeoutMs,
      now: this.now
    });

    let attempts = 0;

    // Sources in configured order, items in fetch order.
    for (const source of bot.sources) {
      const raws = await this.drainSource(source, summary);
      if (!raws) continue;

      let attemptsThisSource = 0;
      for (const raw of raws) {
        const normalized = normalizeItem(raw, { bodyMaxLength: bot.bodyMaxLength });
        if (!normalized.ok) {
          countInvalid(summary, normalized.reason);
          logger.info("item.invalid", { sourceId: raw.sourceId, reason: normalized.reason, title: raw.title, link: raw.link });
          continue;
        }
        summary.normalized += 1;
        const item = normalized.item;

        const screened = gate.screen(item);
        if (screened.kind !== "candidate") {
          this.record(summary, item, screened);
          continue;
        }

        const capHit =
          (bot.maxPostsPerRun !== undefined && attempts >= bot.maxPostsPerRun) ||
          (bot.maxPerSource !== undefined && attemptsThisSource >= bot.maxPerSource);
        if (capHit) {
          summary.deferred += 1;
          logger.debug("item.deferred", { sourceId: item.sourceId, title: item.title });
          continue;
        }

        attempts += 1;
        attemptsThisSource += 1;
        const post = await this.withArticleBody(item);
        this.record(summary, post, await gate.publishCandidate(post, screened));
      }
    }

    if (this.deps.dryRun) {
      logger.info("store.flush skipped (dry run)", { path: store.path, entries: store.size, unsaved: store.hasChanges });
    } else {
      await store.flush();
    }

    summary.finishedAt = this.now().toISOString();
    logger.info("run.summary", { ...summary });
    return summary;
  }

  /**
   * Swap the feed body for the article's lead paragraphs when the variant
   * quotes them. The fingerprint was taken from the feed item already. On any
   * failure the feed body stays.
   */
  private async withArticleBody(item: Item): Promise<Item> {
    const target = this.deps.bot.publishTarget;
    if (!target.replyWithBody || target.articleParagraphs === undefined || !item.link) return item;

    try {
      const text = await this.fetchArticle(item.link, target.articleParagraphs, this.deps.fetchOptions);
      if (!text.trim()) return item;
      const body = truncateBody(text, this.deps.bot.bodyMaxLength);
      return { ...item, body: body.text, bodyTruncated: body.truncated };
    } catch (err) {
      logger.warn("pipeline.article.failed", { sourceId: item.sourceId, link: item.link, error: errorMessage(err) });
      return item;
    }
  }

  /** Fetch a whole source. A failure anywhere discards the source for this run. */
  private async drainSource(source: SourceDescriptor, summary: RunSummary): Promise<RawItem[] | null> {
    const raws: RawItem[] = [];
    try {
      for await (const raw of this.fetchSource(source, this.deps.fetchOptions)) {
        raws.push(raw);
      }
    } catch (err) {
      summary.sourceFailures.push({ sourceId: source.id, error: errorMessage(err) });
      logger.warn("pipeline.source.failed", { sourceId: source.id, url: source.url, error: errorMessage(err) });
      return null;
    }

    summary.fetched += raws.length;
    logger.info("pipeline.source.fetched", { sourceId: source.id, items: raws.length });
    return raws;
  }

  private record(summary: RunSummary, item: Item, outcome: Outcome): void {
    switch (outcome.kind) {
      case "skippedInvalid":
        countInvalid(summary, outcome.reason);
        logger.info("item.invalid", { sourceId: item.sourceId, reason: outcome.reason, title: item.title });
        return;
      case "skippedDuplicate":
        summary.skippedDuplicate += 1;
        logger.debug("item.duplicate", { sourceId: item.sourceId, title: item.title, fingerprint: outcome.fingerprint });
        return;
      case "published":
        summary.published += 1;
        summary.posts.push({ fingerprint: outcome.fingerprint, postId: outcome.postId });
        return;
      case "failed":
        summary.failed += 1;
        summary.publishErrors.push({
          sourceId: item.sourceId,
          title: item.title,
          fingerprint: outcome.fingerprint,
          kind: outcome.error.kind,
          message: outcome.error.message
        });
        return;
    }
  }
}
