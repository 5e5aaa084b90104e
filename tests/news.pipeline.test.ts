import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { BotConfigSchema, type BotConfig } from "../src/bots.js";
import { FetchError, PublishError, StoreIOError } from "../src/errors.js";
import type { SourceFetcher } from "../src/news/fetcher.js";
import { contentHash } from "../src/news/fingerprint.js";
import { PipelineRunner, type PipelineDeps } from "../src/news/pipeline.js";
import type { PostDraft, RawItem } from "../src/news/types.js";
import { DedupStore } from "../src/state/dedupStore.js";

const NOW = new Date("2024-01-02T10:00:00Z");

let dir: string;
let storePath: string;

beforeEach(async () => {
  dir = await mkdtemp(path.join(tmpdir(), "pipeline-"));
  storePath = path.join(dir, "test-bot.seen.json");
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

function bot(overrides: Record<string, unknown> = {}): BotConfig {
  return BotConfigSchema.parse({
    name: "test-bot",
    sources: [
      { id: "a", kind: "rss", url: "https://a.example.com/feed" },
      { id: "b", kind: "rss", url: "https://b.example.com/feed" }
    ],
    publishTarget: { platform: "none" },
    ...overrides
  });
}

function raw(sourceId: string, n: number, overrides?: Partial<RawItem>): RawItem {
  return {
    sourceId,
    title: `Story ${sourceId}${n}`,
    link: `https://${sourceId}.example.com/news/${n}`,
    body: `Body of story ${n}.`,
    ...overrides
  };
}

type Feeds = Record<string, RawItem[] | Error>;

/** In-process fetch collaborator. A failing source yields one item before it throws. */
function fakeFetcher(feeds: Feeds): SourceFetcher {
  return async function* (source) {
    const feed = feeds[source.id];
    if (feed instanceof Error) {
      yield raw(source.id, 99, { title: "Partial item" });
      throw feed;
    }
    yield* feed ?? [];
  };
}

function okPublisher() {
  let n = 0;
  return vi.fn(async (_draft: PostDraft) => {
    n += 1;
    return `t3_${n}`;
  });
}

async function runOnce(
  cfg: BotConfig,
  feeds: Feeds,
  publish: (draft: PostDraft) => Promise<string>,
  now: Date = NOW,
  extra: Pick<PipelineDeps, "dryRun" | "fetchArticle"> = {}
) {
  const store = new DedupStore({ path: storePath, bot: cfg.name });
  const runner = new PipelineRunner({
    bot: cfg,
    store,
    publisher: { publish },
    fetchSource: fakeFetcher(feeds),
    publishTimeoutMs: 1_000,
    now: () => now,
    ...extra
  });
  return runner.run();
}

async function storedFingerprints(): Promise<Set<string>> {
  return new DedupStore({ path: storePath }).load();
}

function publishedUrls(publish: ReturnType<typeof okPublisher>): Array<string | undefined> {
  return publish.mock.calls.map(([draft]) => draft.url);
}

describe("PipelineRunner", () => {
  it("publishes new items in source order and persists them", async () => {
    const publish = okPublisher();
    const summary = await runOnce(bot(), { a: [raw("a", 1), raw("a", 2)], b: [raw("b", 1)] }, publish);

    expect(summary).toMatchObject({
      bot: "test-bot",
      startedAt: "2024-01-02T10:00:00.000Z",
      sources: 2,
      fetched: 3,
      normalized: 3,
      published: 3,
      skippedDuplicate: 0,
      skippedInvalid: 0,
      failed: 0,
      deferred: 0
    });
    expect(summary.posts).toEqual([
      { fingerprint: "url:a.example.com/news/1", postId: "t3_1" },
      { fingerprint: "url:a.example.com/news/2", postId: "t3_2" },
      { fingerprint: "url:b.example.com/news/1", postId: "t3_3" }
    ]);
    expect(publishedUrls(publish)).toEqual([
      "https://a.example.com/news/1",
      "https://a.example.com/news/2",
      "https://b.example.com/news/1"
    ]);
    expect(await storedFingerprints()).toEqual(
      new Set(["url:a.example.com/news/1", "url:a.example.com/news/2", "url:b.example.com/news/1"])
    );
  });

  it("never passes an already-seen item to the publisher", async () => {
    const seeded = new DedupStore({ path: storePath });
    seeded.markSeen("url:a.example.com/news/1");
    await seeded.flush();

    const publish = okPublisher();
    const summary = await runOnce(bot(), { a: [raw("a", 1), raw("a", 2)], b: [] }, publish);

    expect(summary.skippedDuplicate).toBe(1);
    expect(summary.published).toBe(1);
    expect(publishedUrls(publish)).toEqual(["https://a.example.com/news/2"]);
  });

  it("retries a failed item on the next run", async () => {
    const feeds: Feeds = { a: [raw("a", 1)], b: [] };
    const failing = vi.fn(async (_draft: PostDraft): Promise<string> => {
      throw new PublishError("transient", "upstream 502");
    });

    const first = await runOnce(bot(), feeds, failing);
    expect(first).toMatchObject({ published: 0, failed: 1 });
    expect(first.publishErrors).toEqual([
      {
        sourceId: "a",
        title: "Story a1",
        fingerprint: "url:a.example.com/news/1",
        kind: "transient",
        message: "upstream 502"
      }
    ]);
    expect((await storedFingerprints()).has("url:a.example.com/news/1")).toBe(false);

    const publish = okPublisher();
    const second = await runOnce(bot(), feeds, publish);
    expect(second).toMatchObject({ published: 1, failed: 0 });
    expect(publishedUrls(publish)).toEqual(["https://a.example.com/news/1"]);
  });

  it("publishes nothing on a second run over unchanged sources", async () => {
    const feeds: Feeds = { a: [raw("a", 1), raw("a", 2)], b: [raw("b", 1)] };
    await runOnce(bot(), feeds, okPublisher());

    const publish = okPublisher();
    const second = await runOnce(bot(), feeds, publish);

    expect(second).toMatchObject({ published: 0, skippedDuplicate: 3 });
    expect(publish).not.toHaveBeenCalled();
  });

  it("treats a whitespace-only body difference as the same story", async () => {
    const publish = okPublisher();
    const summary = await runOnce(
      bot(),
      {
        a: [raw("a", 1, { body: "Winds  of 100mph." }), raw("a", 1, { body: "\n Winds of\t100mph. " })],
        b: []
      },
      publish
    );

    expect(summary).toMatchObject({ published: 1, skippedDuplicate: 1 });
    expect(publish).toHaveBeenCalledTimes(1);
  });

  it("counts an item with no title and no link as invalid", async () => {
    const publish = okPublisher();
    const summary = await runOnce(bot(), { a: [{ sourceId: "a", body: "Quoted from the link" }], b: [] }, publish);

    expect(summary).toMatchObject({ fetched: 1, normalized: 0, skippedInvalid: 1, published: 0 });
    expect(summary.invalidReasons).toEqual({ missing_title: 1 });
    expect(publish).not.toHaveBeenCalled();
  });

  it("republishes after the store file is corrupted", async () => {
    const feeds: Feeds = { a: [raw("a", 1)], b: [raw("b", 1)] };
    await runOnce(bot(), feeds, okPublisher());
    await writeFile(storePath, '{"schemaVersion":1,"entries":[{"finger', "utf8");

    const publish = okPublisher();
    const summary = await runOnce(bot(), feeds, publish);

    expect(summary).toMatchObject({ published: 2, skippedDuplicate: 0 });
    expect(await storedFingerprints()).toEqual(new Set(["url:a.example.com/news/1", "url:b.example.com/news/1"]));
  });

  it("isolates a failing source and drops its partial items", async () => {
    const publish = okPublisher();
    const summary = await runOnce(
      bot(),
      { a: new FetchError("a", "HTTP 503", { status: 503 }), b: [raw("b", 1)] },
      publish
    );

    expect(summary.sourceFailures).toEqual([{ sourceId: "a", error: "HTTP 503" }]);
    expect(summary).toMatchObject({ fetched: 1, published: 1 });
    expect(publishedUrls(publish)).toEqual(["https://b.example.com/news/1"]);
    expect(PipelineRunner.shouldFail(summary)).toBe(false);
  });

  it("flags the run when every source fails, leaving the store file untouched", async () => {
    const summary = await runOnce(bot(), { a: new Error("dns"), b: new Error("dns") }, okPublisher());

    expect(summary.sourceFailures).toHaveLength(2);
    expect(summary.published).toBe(0);
    expect(PipelineRunner.shouldFail(summary)).toBe(true);
    expect(await readdir(dir)).toEqual([]);
  });

  it("does not persist anything on a dry run", async () => {
    const publish = okPublisher();
    const summary = await runOnce(bot(), { a: [raw("a", 1)], b: [] }, publish, NOW, { dryRun: true });

    expect(summary.published).toBe(1);
    expect(await readdir(dir)).toEqual([]);

    // A live run afterwards still sees the item as new.
    const live = okPublisher();
    await runOnce(bot(), { a: [raw("a", 1)], b: [] }, live);
    expect(publishedUrls(live)).toEqual(["https://a.example.com/news/1"]);
  });

  it("submits a story once per run even when the first attempt fails", async () => {
    const failing = vi.fn(async (_draft: PostDraft): Promise<string> => {
      throw new PublishError("rateLimited", "slow down");
    });
    const feeds: Feeds = {
      a: [raw("a", 1), raw("a", 1, { link: "https://a.example.com/news/1?utm_source=x" })],
      b: []
    };

    const summary = await runOnce(bot(), feeds, failing);

    expect(failing).toHaveBeenCalledTimes(1);
    expect(summary).toMatchObject({ failed: 1, skippedDuplicate: 1, published: 0 });
    expect(await storedFingerprints()).toEqual(new Set());
  });

  it("skips titles close to one already published when titleSimilarity is set", async () => {
    const seeded = new DedupStore({ path: storePath });
    seeded.markSeen("url:elsewhere.example.com/storm", { title: "Storm hits coast" });
    await seeded.flush();

    const publish = okPublisher();
    const summary = await runOnce(
      bot({ titleSimilarity: 0.85 }),
      { a: [raw("a", 1, { title: "Storm hits coast!" }), raw("a", 2)], b: [] },
      publish
    );

    expect(summary).toMatchObject({ skippedDuplicate: 1, published: 1 });
    expect(publishedUrls(publish)).toEqual(["https://a.example.com/news/2"]);
  });

  it("matches similar titles within a single run", async () => {
    const publish = okPublisher();
    const summary = await runOnce(
      bot({ titleSimilarity: 0.85 }),
      { a: [raw("a", 1, { title: "Storm hits coast" })], b: [raw("b", 1, { title: "Storm hits coast!" })] },
      publish
    );

    expect(summary).toMatchObject({ skippedDuplicate: 1, published: 1 });
    expect(publishedUrls(publish)).toEqual(["https://a.example.com/news/1"]);
  });

  it("treats a match on any dedupAlsoBy key as a duplicate and records every key", async () => {
    const publish = okPublisher();
    const summary = await runOnce(
      bot({ dedupAlsoBy: ["content-hash"] }),
      { a: [raw("a", 1)], b: [raw("b", 5, { title: "Story a1", body: "Body of story 1." })] },
      publish
    );

    expect(summary).toMatchObject({ published: 1, skippedDuplicate: 1 });
    expect(publishedUrls(publish)).toEqual(["https://a.example.com/news/1"]);
    expect(await storedFingerprints()).toEqual(
      new Set(["url:a.example.com/news/1", `content-hash:${contentHash("Story a1", "Body of story 1.")}`])
    );
  });

  it("quotes the article's lead paragraphs in the reply when configured", async () => {
    const cfg = bot({ publishTarget: { platform: "none", replyWithBody: true, articleParagraphs: 2 } });
    const fetchArticle = vi.fn(async (_url: string, _max: number) => "Lead one.\n\nLead two.");
    const publish = okPublisher();

    await runOnce(cfg, { a: [raw("a", 1)], b: [] }, publish, NOW, { fetchArticle });

    expect(fetchArticle).toHaveBeenCalledWith("https://a.example.com/news/1", 2, undefined);
    expect(publish.mock.calls[0]?.[0].comment).toBe(
      "> Lead one.\n>\n> Lead two.\n\n*Quoted from a.example.com*\n\n[Read more](https://a.example.com/news/1)"
    );
  });

  it("keeps the feed body when the article cannot be fetched", async () => {
    const cfg = bot({ publishTarget: { platform: "none", replyWithBody: true, articleParagraphs: 2 } });
    const fetchArticle = vi.fn(async (_url: string, _max: number): Promise<string> => {
      throw new FetchError("article", "HTTP 404", { status: 404 });
    });
    const publish = okPublisher();

    const summary = await runOnce(cfg, { a: [raw("a", 1)], b: [] }, publish, NOW, { fetchArticle });

    expect(summary.published).toBe(1);
    expect(publish.mock.calls[0]?.[0].comment).toBe(
      "> Body of story 1.\n\n*Quoted from a.example.com*\n\n[Read more](https://a.example.com/news/1)"
    );
  });

  it("defers candidates over the per-run caps to the next run", async () => {
    const cfg = bot({ maxPostsPerRun: 2, maxPerSource: 1 });
    const feeds: Feeds = { a: [raw("a", 1), raw("a", 2), raw("a", 3)], b: [raw("b", 1), raw("b", 2)] };

    const publish = okPublisher();
    const first = await runOnce(cfg, feeds, publish);
    expect(first).toMatchObject({ published: 2, deferred: 3 });
    expect(publishedUrls(publish)).toEqual(["https://a.example.com/news/1", "https://b.example.com/news/1"]);

    const publishAgain = okPublisher();
    const second = await runOnce(cfg, feeds, publishAgain);
    expect(second).toMatchObject({ published: 2, deferred: 1, skippedDuplicate: 2 });
    expect(publishedUrls(publishAgain)).toEqual(["https://a.example.com/news/2", "https://b.example.com/news/2"]);
  });

  it("evicts entries past the dedup horizon before gating", async () => {
    const seeded = new DedupStore({ path: storePath });
    seeded.markSeen("url:a.example.com/news/1", { atMs: NOW.getTime() - 2 * 86_400_000 });
    seeded.markSeen("url:a.example.com/news/2", { atMs: NOW.getTime() - 3_600_000 });
    await seeded.flush();

    const publish = okPublisher();
    const summary = await runOnce(bot({ dedupHorizon: "1d" }), { a: [raw("a", 1), raw("a", 2)], b: [] }, publish);

    expect(summary).toMatchObject({ evicted: 1, published: 1, skippedDuplicate: 1 });
    expect(publishedUrls(publish)).toEqual(["https://a.example.com/news/1"]);
  });

  it("aborts on store I/O failure before publishing anything", async () => {
    const publish = okPublisher();
    const runner = new PipelineRunner({
      bot: bot(),
      // A directory cannot be read as the store file.
      store: new DedupStore({ path: dir }),
      publisher: { publish },
      fetchSource: fakeFetcher({ a: [raw("a", 1)], b: [] }),
      publishTimeoutMs: 1_000,
      now: () => NOW
    });

    await expect(runner.run()).rejects.toBeInstanceOf(StoreIOError);
    expect(publish).not.toHaveBeenCalled();
  });
});
