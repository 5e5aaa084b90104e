import { loadBotConfig, type BotConfig } from "./bots.js";
import { loadConfig, type AppConfig } from "./config.js";
import { StoreIOError } from "./errors.js";
import { errorMessage, logger, setLogLevel } from "./logger.js";
import { PipelineRunner } from "./news/pipeline.js";
import { createPublisher } from "./social/poster.js";
import { DedupStore, storePathFor } from "./state/dedupStore.js";

export type CliArgs = {
  bot?: string;
  dryRun: boolean;
  configDir?: string;
  help: boolean;
};

const USAGE = [
  "Usage:",
  "  newsdesk-bot [--bot <name>] [--dry-run] [--config-dir <dir>]",
  "",
  "  --bot <name>        bot variant (config/bots/<name>.json); defaults to $BOT",
  "  --dry-run           log posts instead of submitting them",
  "  --config-dir <dir>  directory holding bot variant files"
].join("\n");

/** Exit codes: 0 run completed, 1 run failed, 2 bad configuration. */
export const EXIT_OK = 0;
export const EXIT_RUN_FAILED = 1;
export const EXIT_CONFIG = 2;

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { dryRun: false, help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const value = () => {
      const v = argv[i + 1];
      if (v === undefined || v.startsWith("--")) throw new UsageError(`${arg} needs a value`);
      i++;
      return v;
    };

    if (arg === "--help" || arg === "-h") args.help = true;
    else if (arg === "--dry-run") args.dryRun = true;
    else if (arg === "--bot") args.bot = value();
    else if (arg === "--config-dir") args.configDir = value();
    else throw new UsageError(`unknown argument: ${arg}`);
  }

  return args;
}

async function runBot(cfg: AppConfig, args: CliArgs): Promise<number> {
  const name = args.bot ?? cfg.BOT;
  if (!name) {
    logger.error("no bot selected (pass --bot <name> or set BOT)");
    return EXIT_CONFIG;
  }

  let bot: BotConfig;
  try {
    bot = await loadBotConfig(cfg, name, args.configDir ?? cfg.BOT_CONFIG_DIR);
  } catch (err) {
    logger.error("bot config invalid", { bot: name, error: errorMessage(err) });
    return EXIT_CONFIG;
  }

  // Nothing leaves the process, so nothing may be recorded as published either.
  const dryRun = cfg.DRY_RUN || bot.publishTarget.platform === "none";

  logger.info("newsdesk-bot starting", {
    bot: bot.name,
    sources: bot.sources.length,
    strategy: bot.fingerprintStrategy,
    platform: bot.publishTarget.platform,
    dryRun
  });

  const store = new DedupStore({ path: storePathFor(cfg.STATE_DIR, bot.name, bot.storeFile), bot: bot.name });
  const runner = new PipelineRunner({
    bot,
    store,
    publisher: createPublisher(cfg, bot.publishTarget),
    fetchOptions: { timeoutMs: cfg.FETCH_TIMEOUT_MS, retries: cfg.FETCH_RETRIES },
    publishTimeoutMs: cfg.PUBLISH_TIMEOUT_MS,
    dryRun
  });

  try {
    const summary = await runner.run();
    if (PipelineRunner.shouldFail(summary)) {
      logger.error("run failed: no source could be fetched", { bot: bot.name, sourceFailures: summary.sourceFailures.length });
      return EXIT_RUN_FAILED;
    }
    return EXIT_OK;
  } catch (err) {
    if (err instanceof StoreIOError) {
      logger.error("run aborted: dedup store unavailable", { path: err.path, error: err.message });
      return EXIT_RUN_FAILED;
    }
    throw err;
  }
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  let args: CliArgs;
  try {
    args = parseArgs(argv);
  } catch (err) {
    logger.error("bad arguments", { error: errorMessage(err) });
    // eslint-disable-next-line no-console
    console.error(USAGE);
    return EXIT_CONFIG;
  }

  if (args.help) {
    // eslint-disable-next-line no-console
    console.log(USAGE);
    return EXIT_OK;
  }

  let cfg: AppConfig;
  try {
    cfg = loadConfig();
  } catch (err) {
    logger.error("config invalid", { error: errorMessage(err) });
    return EXIT_CONFIG;
  }
  if (args.dryRun) cfg = { ...cfg, DRY_RUN: true };
  setLogLevel(cfg.LOG_LEVEL);

  return runBot(cfg, args);
}
