import type { AppConfig } from "../config.js";
import type { PublishTarget } from "../bots.js";
import { logger } from "../logger.js";
import type { PostDraft, PostId } from "../news/types.js";
import { RedditPublisher } from "./reddit.js";

export type PublishOptions = {
  /** Aborted when the caller gives up on the publish (timeout). */
  signal?: AbortSignal;
};

/** Publish collaborator. Fails with PublishError. */
export type Publisher = {
  publish(draft: PostDraft, opts?: PublishOptions): Promise<PostId>;
};

/** Logs the rendered post instead of submitting it. */
export function createDryRunPublisher(label: string): Publisher {
  let n = 0;
  return {
    async publish(draft: PostDraft) {
      n += 1;
      logger.info("post (dry run)", {
        target: label,
        kind: draft.kind,
        title: draft.title,
        url: draft.url,
        text: draft.text?.slice(0, 200),
        comment: draft.comment?.slice(0, 200),
        flair: draft.flairText
      });
      return `dry-run-${n}`;
    }
  };
}

function must(value: string | undefined, name: string): string {
  if (!value || !value.trim()) throw new Error(`${name} is required`);
  return value;
}

export function createPublisher(cfg: AppConfig, target: PublishTarget): Publisher {
  if (target.platform === "none") {
    return createDryRunPublisher("none");
  }

  const label = `r/${target.subreddit}`;
  if (cfg.DRY_RUN) {
    return createDryRunPublisher(label);
  }

  return new RedditPublisher({
    subreddit: target.subreddit,
    credentials: {
      clientId: must(cfg.REDDIT_CLIENT_ID, "REDDIT_CLIENT_ID"),
      clientSecret: must(cfg.REDDIT_CLIENT_SECRET, "REDDIT_CLIENT_SECRET"),
      username: must(cfg.REDDIT_USERNAME, "REDDIT_USERNAME"),
      password: must(cfg.REDDIT_PASSWORD, "REDDIT_PASSWORD"),
      userAgent: cfg.REDDIT_USER_AGENT
    }
  });
}
