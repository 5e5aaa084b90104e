import { describe, it, expect, vi } from "vitest";
import { PublishError } from "../src/errors.js";
import { compileBlockedPhrases, PublishGate, toPublishError } from "../src/news/gate.js";
import type { FingerprintStrategy, Item } from "../src/news/types.js";
import type { Publisher } from "../src/social/poster.js";
import { DedupStore } from "../src/state/dedupStore.js";

const NOW = new Date("2024-01-02T10:00:00Z");

function item(overrides?: Partial<Item>): Item {
  return {
    sourceId: "bbc",
    title: "Storm hits coast",
    link: "https://www.example.com/news/storm",
    body: "Winds of 100mph.",
    bodyTruncated: false,
    ...overrides
  };
}

function setup(
  publish: Publisher["publish"],
  extra?: { blockedPhrases?: string[]; publishTimeoutMs?: number; titleSimilarity?: number; dedupAlsoBy?: FingerprintStrategy[] }
) {
  // Never loaded or flushed here, so the path is never touched.
  const store = new DedupStore({ path: "/nonexistent/seen.json", now: () => NOW.getTime() });
  const publishMock = vi.fn(publish);
  const publisher: Publisher = { publish: publishMock };
  const gate = new PublishGate({
    store,
    publisher,
    strategy: "url",
    dedupAlsoBy: extra?.dedupAlsoBy,
    titleSimilarity: extra?.titleSimilarity,
    render: { postKind: "link", replyWithBody: true },
    sourceLabels: { bbc: "BBC News" },
    blockedPhrases: extra?.blockedPhrases,
    publishTimeoutMs: extra?.publishTimeoutMs ?? 1_000,
    now: () => NOW
  });
  return { store, gate, publishMock };
}

describe("PublishGate", () => {
  it("publishes a new item and marks it seen", async () => {
    const { store, gate, publishMock } = setup(async () => "t3_abc");

    const outcome = await gate.process(item());

    expect(outcome).toEqual({ kind: "published", fingerprint: "url:example.com/news/storm", postId: "t3_abc" });
    expect(store.contains("url:example.com/news/storm")).toBe(true);
    expect(store.get("url:example.com/news/storm")).toMatchObject({ sourceId: "bbc", title: "Storm hits coast" });
    expect(publishMock).toHaveBeenCalledWith({
      kind: "link",
      title: "Storm hits coast",
      url: "https://www.example.com/news/storm",
      comment: "> Winds of 100mph.\n\n*Quoted from BBC News*\n\n[Read more](https://www.example.com/news/storm)"
    }, { signal: expect.any(AbortSignal) });
  });

  it("skips an item already seen without calling the publisher", async () => {
    const { store, gate, publishMock } = setup(async () => "t3_abc");
    store.markSeen("url:example.com/news/storm");

    expect(await gate.process(item())).toEqual({ kind: "skippedDuplicate", fingerprint: "url:example.com/news/storm" });
    expect(publishMock).not.toHaveBeenCalled();
  });

  it("leaves a failed item unseen so it is retried", async () => {
    const { store, gate } = setup(async () => {
      throw new PublishError("rateLimited", "slow down", { retryAfterMs: 60_000 });
    });

    const outcome = await gate.process(item());

    expect(outcome.kind).toBe("failed");
    expect(outcome).toMatchObject({ fingerprint: "url:example.com/news/storm", error: { kind: "rateLimited", retryAfterMs: 60_000 } });
    expect(store.contains("url:example.com/news/storm")).toBe(false);
    expect(store.hasChanges).toBe(false);
  });

  it("treats a hung publish as a transient failure and aborts it", async () => {
    let signal: AbortSignal | undefined;
    const { store, gate } = setup((_draft, opts) => {
      signal = opts?.signal;
      return new Promise<string>(() => undefined);
    }, { publishTimeoutMs: 20 });

    const outcome = await gate.process(item());

    expect(outcome).toMatchObject({ kind: "failed", error: { kind: "transient", message: "publish timed out after 20ms" } });
    expect(store.size).toBe(0);
    expect(signal?.aborted).toBe(true);
  });

  it("reports a story already attempted this run as a duplicate without marking it seen", async () => {
    const { store, gate, publishMock } = setup(async () => {
      throw new PublishError("rateLimited", "slow down");
    });

    expect((await gate.process(item())).kind).toBe("failed");
    expect(await gate.process(item({ link: "https://example.com/news/storm/" }))).toEqual({
      kind: "skippedDuplicate",
      fingerprint: "url:example.com/news/storm"
    });
    expect(publishMock).toHaveBeenCalledTimes(1);
    expect(store.contains("url:example.com/news/storm")).toBe(false);
  });

  it("skips a near-identical title of a stored entry", () => {
    const { store, gate } = setup(async () => "t3_abc", { titleSimilarity: 0.85 });
    store.markSeen("url:example.com/other", { title: "Storm hits coast!" });

    expect(gate.screen(item())).toEqual({ kind: "skippedDuplicate", fingerprint: "url:example.com/other" });
  });

  it("ignores title similarity below the threshold", () => {
    const { store, gate } = setup(async () => "t3_abc", { titleSimilarity: 0.85 });
    store.markSeen("url:example.com/other", { title: "Floods close motorway" });

    expect(gate.screen(item()).kind).toBe("candidate");
  });

  it("lists every dedup key on a candidate", () => {
    const { gate } = setup(async () => "t3_abc", { dedupAlsoBy: ["title"] });

    expect(gate.screen(item())).toEqual({
      kind: "candidate",
      fingerprint: "url:example.com/news/storm",
      keys: ["url:example.com/news/storm", "title:storm hits coast"]
    });
  });

  it("reports blocked phrases as invalid", async () => {
    const { gate, publishMock } = setup(async () => "t3_abc", { blockedPhrases: ["live updates"] });

    expect(await gate.process(item({ title: "Storm: LIVE updates from the coast" }))).toEqual({
      kind: "skippedInvalid",
      reason: "blocked_phrase"
    });
    expect(publishMock).not.toHaveBeenCalled();
  });

  it("reports items with nothing to fingerprint as invalid", () => {
    const { gate } = setup(async () => "t3_abc");
    expect(gate.screen({ sourceId: "bbc", title: " ", bodyTruncated: false })).toEqual({
      kind: "skippedInvalid",
      reason: "unfingerprintable"
    });
  });
});

describe("compileBlockedPhrases", () => {
  it("matches whole words only, ignoring case", () => {
    const [quiz] = compileBlockedPhrases(["quiz", "  "]);
    expect(compileBlockedPhrases(["quiz", "  "])).toHaveLength(1);
    expect(quiz?.test("Friday QUIZ: test yourself")).toBe(true);
    expect(quiz?.test("A quizzical look")).toBe(false);
  });
});

describe("toPublishError", () => {
  it("passes PublishError through and wraps anything else as transient", () => {
    const original = new PublishError("rejected", "bad title");
    expect(toPublishError(original)).toBe(original);
    expect(toPublishError(new Error("socket hang up"))).toMatchObject({ kind: "transient", message: "socket hang up" });
    expect(toPublishError("boom")).toMatchObject({ kind: "transient", message: "boom" });
  });
});
