import { readFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { missingRedditCredentials, type AppConfig } from "./config.js";
import { parseDuration } from "./utils.js";

/**
 * Bot variants: one JSON file per variant under BOT_CONFIG_DIR. Each variant
 * is the same pipeline with its own sources, dedup strategy, formatting and
 * publish target.
 */

const Duration = z.string().transform((raw, ctx) => {
  const ms = parseDuration(raw);
  if (ms === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid duration "${raw}" (use e.g. 30m, 12h, 7d)` });
    return z.NEVER;
  }
  return ms;
});

const SourceSchema = z.object({
  id: z.string().regex(/^[a-z0-9][a-z0-9_-]*$/i, "source id must be alphanumeric/dash/underscore"),
  kind: z.enum(["rss", "html-links", "html-figures"]),
  url: z.string().url(),
  label: z.string().optional(),
  maxItems: z.number().int().positive().optional(),
  include: z.string().optional()
});

const Strategy = z.enum(["url", "title", "content-hash", "timestamp"]);

const PublishTargetShared = {
  postKind: z.enum(["link", "self"]).default("link"),
  flairText: z.string().optional(),
  replyWithBody: z.boolean().default(false),
  /** Quote up to this many lead paragraphs from the article page in the reply. */
  articleParagraphs: z.number().int().min(1).max(10).optional(),
  titleTemplate: z.string().optional(),
  dateRollHourUtc: z.number().int().min(0).max(23).optional(),
  bodyFooter: z.string().optional()
};

const PublishTargetSchema = z.discriminatedUnion("platform", [
  z.object({ platform: z.literal("reddit"), subreddit: z.string().regex(/^[A-Za-z0-9_]{2,21}$/, "invalid subreddit name"), ...PublishTargetShared }),
  z.object({ platform: z.literal("none"), ...PublishTargetShared })
]);

export const BotConfigSchema = z.object({
  name: z.string().min(1),
  sources: z.array(SourceSchema).min(1),
  fingerprintStrategy: Strategy.default("url"),
  dedupAlsoBy: z.array(Strategy).default([]),
  titleSimilarity: z.number().gt(0).max(1).optional(),
  timestampGranularity: Duration.default("1h"),
  bodyMaxLength: z.number().int().min(50).max(40_000).default(500),
  dedupHorizon: Duration.optional(),
  maxPostsPerRun: z.number().int().positive().optional(),
  maxPerSource: z.number().int().positive().optional(),
  blockedPhrases: z.array(z.string().min(1)).default([]),
  storeFile: z.string().optional(),
  publishTarget: PublishTargetSchema
});

export type BotConfig = z.infer<typeof BotConfigSchema>;
export type PublishTarget = BotConfig["publishTarget"];

function validateBot(bot: BotConfig, cfg: AppConfig): string[] {
  const errors: string[] = [];

  const ids = new Set<string>();
  for (const s of bot.sources) {
    if (ids.has(s.id)) errors.push(`duplicate source id "${s.id}"`);
    ids.add(s.id);

    if (s.include) {
      try {
        // eslint-disable-next-line no-new
        new RegExp(s.include, "i");
      } catch {
        errors.push(`source "${s.id}": include is not a valid regex`);
      }
    }
    if (s.include && s.kind !== "html-links") {
      errors.push(`source "${s.id}": include only applies to html-links sources`);
    }
  }

  if (bot.maxPerSource && bot.maxPostsPerRun && bot.maxPerSource > bot.maxPostsPerRun) {
    errors.push("maxPerSource must be <= maxPostsPerRun");
  }

  if (bot.publishTarget.articleParagraphs !== undefined && !bot.publishTarget.replyWithBody) {
    errors.push("publishTarget.articleParagraphs requires publishTarget.replyWithBody");
  }

  if (bot.publishTarget.platform === "reddit" && !cfg.DRY_RUN) {
    for (const key of missingRedditCredentials(cfg)) {
      errors.push(`${key} is required when publishTarget.platform=reddit and DRY_RUN=false`);
    }
  }

  return errors;
}

/** Validate a parsed variant object against the schema and the runtime config. */
export function parseBotConfig(json: unknown, cfg: AppConfig, origin = "bot config"): BotConfig {
  const parsed = BotConfigSchema.safeParse(json);
  if (!parsed.success) {
    const lines = parsed.error.issues.map((i) => `  - ${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new Error(`Config validation errors (${origin}):\n${lines.join("\n")}`);
  }

  const errors = validateBot(parsed.data, cfg);
  if (errors.length > 0) {
    throw new Error(`Config validation errors (${origin}):\n${errors.map((e) => `  - ${e}`).join("\n")}`);
  }

  return parsed.data;
}

export function botConfigPath(configDir: string, name: string): string {
  if (!/^[a-z0-9][a-z0-9_-]*$/i.test(name)) {
    throw new Error(`invalid bot name "${name}"`);
  }
  return path.resolve(process.cwd(), configDir, `${name}.json`);
}

export async function loadBotConfig(cfg: AppConfig, name: string, configDir = cfg.BOT_CONFIG_DIR): Promise<BotConfig> {
  const p = botConfigPath(configDir, name);

  let raw: string;
  try {
    raw = await readFile(p, "utf8");
  } catch (err) {
    throw new Error(`cannot read bot config ${p}: ${err instanceof Error ? err.message : String(err)}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new Error(`bot config ${p} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }

  return parseBotConfig(json, cfg, path.basename(p));
}
