import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { StoreCorruptError, StoreIOError } from "../errors.js";
import { errorMessage, logger } from "../logger.js";
import type { Fingerprint } from "../news/types.js";

// Schema versioning for migrations
const STORE_SCHEMA_VERSION = 1;

/**
 * v1: fingerprint entries with first-seen time (2026-10)
 */

const EntrySchema = z.object({
  fingerprint: z.string().min(1),
  firstSeenAtMs: z.number().finite(),
  sourceId: z.string().optional(),
  title: z.string().optional()
});

const StoreFileSchema = z.object({
  schemaVersion: z.number().int().positive(),
  bot: z.string().optional(),
  updatedAt: z.string().optional(),
  entries: z.array(EntrySchema)
});

export type SeenEntry = z.infer<typeof EntrySchema>;

export type SeenMeta = {
  sourceId?: string;
  title?: string;
  atMs?: number;
};

export type DedupStoreOptions = {
  path: string;
  bot?: string;
  now?: () => number;
};

function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}

/**
 * Durable set of fingerprints already published.
 *
 * Lifecycle per run: load() once, contains()/markSeen() in memory, flush()
 * once. flush() writes a temp file and renames it over the store, so a crash
 * mid-write leaves the previous file intact.
 */
export class DedupStore {
  private readonly entries = new Map<Fingerprint, SeenEntry>();
  private readonly filePath: string;
  private readonly bot?: string;
  private readonly now: () => number;
  private dirty = false;

  constructor(opts: DedupStoreOptions) {
    this.filePath = opts.path;
    this.bot = opts.bot;
    this.now = opts.now ?? Date.now;
  }

  get path(): string {
    return this.filePath;
  }

  get size(): number {
    return this.entries.size;
  }

  get hasChanges(): boolean {
    return this.dirty;
  }

  /**
   * Reconstruct state from disk. A missing file is a first run. A corrupt file
   * is moved aside and the store starts empty. Any other read failure throws
   * StoreIOError.
   */
  async load(): Promise<Set<Fingerprint>> {
    this.entries.clear();
    this.dirty = false;

    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf8");
    } catch (err) {
      if (isNotFound(err)) {
        logger.info("store.load empty (first run)", { path: this.filePath });
        return this.fingerprints();
      }
      throw new StoreIOError(this.filePath, `cannot read dedup store: ${errorMessage(err)}`, { cause: err });
    }

    try {
      for (const entry of parseStoreFile(this.filePath, raw)) {
        if (!this.entries.has(entry.fingerprint)) this.entries.set(entry.fingerprint, entry);
      }
    } catch (err) {
      if (!(err instanceof StoreCorruptError)) throw err;
      logger.warn("store.corrupt; starting empty", { path: this.filePath, error: err.message });
      await this.quarantine();
      this.entries.clear();
      return this.fingerprints();
    }

    logger.info("store.loaded", { path: this.filePath, entries: this.entries.size });
    return this.fingerprints();
  }

  contains(fp: Fingerprint): boolean {
    return this.entries.has(fp);
  }

  /** Idempotent: an existing entry keeps its original first-seen time. */
  markSeen(fp: Fingerprint, meta?: SeenMeta): void {
    if (this.entries.has(fp)) return;
    const entry: SeenEntry = { fingerprint: fp, firstSeenAtMs: meta?.atMs ?? this.now() };
    if (meta?.sourceId) entry.sourceId = meta.sourceId;
    if (meta?.title) entry.title = meta.title;
    this.entries.set(fp, entry);
    this.dirty = true;
  }

  get(fp: Fingerprint): SeenEntry | undefined {
    return this.entries.get(fp);
  }

  /** Entries that carry a title, for fuzzy title matching. */
  titledEntries(): Array<SeenEntry & { title: string }> {
    const out: Array<SeenEntry & { title: string }> = [];
    for (const entry of this.entries.values()) {
      if (entry.title) out.push({ ...entry, title: entry.title });
    }
    return out;
  }

  fingerprints(): Set<Fingerprint> {
    return new Set(this.entries.keys());
  }

  /** Drop entries first seen before now - horizonMs. Returns how many were dropped. */
  evictOlderThan(horizonMs: number, nowMs: number = this.now()): number {
    const cutoff = nowMs - horizonMs;
    let evicted = 0;
    for (const [fp, entry] of this.entries) {
      if (entry.firstSeenAtMs < cutoff) {
        this.entries.delete(fp);
        evicted++;
      }
    }
    if (evicted > 0) {
      this.dirty = true;
      logger.info("store.evicted", { path: this.filePath, evicted, horizonMs });
    }
    return evicted;
  }

  /**
   * Persist the full in-memory state atomically (temp file + rename). A store
   * with no changes since load() is left as it is on disk.
   */
  async flush(): Promise<void> {
    if (!this.dirty) {
      logger.debug("store.flush skipped (no changes)", { path: this.filePath });
      return;
    }

    const dir = path.dirname(this.filePath);
    const tmp = `${this.filePath}.${process.pid}.tmp`;

    const entries = Array.from(this.entries.values()).sort((a, b) =>
      a.firstSeenAtMs === b.firstSeenAtMs ? a.fingerprint.localeCompare(b.fingerprint) : a.firstSeenAtMs - b.firstSeenAtMs
    );
    const payload = {
      schemaVersion: STORE_SCHEMA_VERSION,
      bot: this.bot,
      updatedAt: new Date(this.now()).toISOString(),
      entries
    };

    try {
      await mkdir(dir, { recursive: true });
      await writeFile(tmp, JSON.stringify(payload, null, 2) + "\n", "utf8");
      await rename(tmp, this.filePath);
    } catch (err) {
      await rm(tmp, { force: true }).catch((cleanupErr: unknown) => {
        logger.warn("store.flush tmp cleanup failed", { path: tmp, error: errorMessage(cleanupErr) });
      });
      throw new StoreIOError(this.filePath, `cannot write dedup store: ${errorMessage(err)}`, { cause: err });
    }

    this.dirty = false;
    logger.info("store.flushed", { path: this.filePath, entries: entries.length });
  }

  private async quarantine(): Promise<void> {
    const target = `${this.filePath}.corrupt-${this.now()}`;
    try {
      await rename(this.filePath, target);
      logger.warn("store.corrupt file moved aside", { from: this.filePath, to: target });
    } catch (err) {
      // The next flush overwrites the corrupt file anyway.
      logger.warn("store.corrupt file could not be moved aside", { path: this.filePath, error: errorMessage(err) });
    }
  }
}

/**
 * Parse and validate store file contents. Throws StoreCorruptError for
 * truncated JSON, a schema mismatch or an unknown future version.
 */
export function parseStoreFile(filePath: string, raw: string): SeenEntry[] {
  if (!raw.trim()) return [];

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new StoreCorruptError(filePath, `invalid JSON: ${errorMessage(err)}`);
  }

  const parsed = StoreFileSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join(".") || "(root)"}: ${issue.message}` : "schema mismatch";
    throw new StoreCorruptError(filePath, `invalid store file (${where})`);
  }

  if (parsed.data.schemaVersion > STORE_SCHEMA_VERSION) {
    throw new StoreCorruptError(filePath, `unsupported schemaVersion ${parsed.data.schemaVersion}`);
  }

  return parsed.data.entries;
}

export function storePathFor(stateDir: string, bot: string, storeFile?: string): string {
  const file = storeFile ?? `${bot}.seen.json`;
  return path.isAbsolute(file) ? file : path.resolve(process.cwd(), stateDir, file);
}
