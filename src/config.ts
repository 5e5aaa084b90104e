import * as dotenv from "dotenv";
import { existsSync } from "node:fs";
import path from "node:path";
import { z } from "zod";

// Load env from the working directory when present. Real env vars win.
const localEnvPath = path.join(process.cwd(), ".env");
if (existsSync(localEnvPath)) dotenv.config({ path: localEnvPath });

const BoolFromString = z
  .enum(["true", "false"])
  .transform((v) => v === "true");

const LogLevel = z.enum(["debug", "info", "warn", "error"]);

const envSchema = z.object({
  // Which bot variant to run (config/bots/<BOT>.json)
  BOT: z.string().trim().optional(),
  BOT_CONFIG_DIR: z.string().default("config/bots"),
  STATE_DIR: z.string().default("data"),

  // Runtime
  DRY_RUN: BoolFromString.default("true"),
  LOG_LEVEL: LogLevel.default("info"),

  // Collaborator timeouts
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  FETCH_RETRIES: z.coerce.number().int().min(0).max(5).default(2),
  PUBLISH_TIMEOUT_MS: z.coerce.number().int().positive().default(20_000),

  // Reddit ("script" app credentials)
  REDDIT_CLIENT_ID: z.string().optional(),
  REDDIT_CLIENT_SECRET: z.string().optional(),
  REDDIT_USERNAME: z.string().optional(),
  REDDIT_PASSWORD: z.string().optional(),
  REDDIT_USER_AGENT: z.string().default("newsdesk-bot/1.0")
});

export type AppConfig = z.infer<typeof envSchema>;

export type RedditCredentialKey = "REDDIT_CLIENT_ID" | "REDDIT_CLIENT_SECRET" | "REDDIT_USERNAME" | "REDDIT_PASSWORD";

const REDDIT_KEYS: RedditCredentialKey[] = ["REDDIT_CLIENT_ID", "REDDIT_CLIENT_SECRET", "REDDIT_USERNAME", "REDDIT_PASSWORD"];

/** Names of the Reddit credentials that are missing or blank. */
export function missingRedditCredentials(cfg: AppConfig): RedditCredentialKey[] {
  return REDDIT_KEYS.filter((key) => {
    const v = cfg[key];
    return !v || !v.trim();
  });
}

function validateRuntime(cfg: AppConfig): string[] {
  const errors: string[] = [];

  if (cfg.FETCH_TIMEOUT_MS < 1000) {
    errors.push(`FETCH_TIMEOUT_MS must be >= 1000 (got ${cfg.FETCH_TIMEOUT_MS})`);
  }
  if (cfg.PUBLISH_TIMEOUT_MS < 1000) {
    errors.push(`PUBLISH_TIMEOUT_MS must be >= 1000 (got ${cfg.PUBLISH_TIMEOUT_MS})`);
  }
  if (!cfg.REDDIT_USER_AGENT.trim()) {
    errors.push("REDDIT_USER_AGENT must not be blank");
  }

  return errors;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const lines = parsed.error.issues.map((i) => `  - ${i.path.join(".")}: ${i.message}`);
    throw new Error(`Config validation errors:\n${lines.join("\n")}`);
  }

  const cfg = parsed.data;
  const errors = validateRuntime(cfg);
  if (errors.length > 0) {
    throw new Error(`Config validation errors:\n${errors.map((e) => `  - ${e}`).join("\n")}`);
  }

  return cfg;
}
