import { z } from "zod";
import { PublishError } from "../errors.js";
import { errorMessage, logger } from "../logger.js";
import type { PostDraft, PostId } from "../news/types.js";
import type { PublishOptions, Publisher } from "./poster.js";

const TOKEN_URL = "https://www.reddit.com/api/v1/access_token";
const API_BASE = "https://oauth.reddit.com";

export type RedditCredentials = {
  clientId: string;
  clientSecret: string;
  username: string;
  password: string;
  userAgent: string;
};

export type RedditPublisherOptions = {
  credentials: RedditCredentials;
  subreddit: string;
  now?: () => number;
};

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().positive().default(3600)
});

const SubmitResponseSchema = z.object({
  json: z.object({
    errors: z.array(z.array(z.unknown())).default([]),
    data: z
      .object({
        id: z.string().optional(),
        name: z.string().optional(),
        url: z.string().optional()
      })
      .optional()
  })
});

function parseRetryAfterHeaderMs(res: Response): number | undefined {
  const raw = res.headers.get("retry-after") ?? res.headers.get("x-ratelimit-reset");
  if (!raw) return undefined;
  const n = Number(raw.trim());
  if (!Number.isFinite(n) || n <= 0) return undefined;
  return Math.floor(n * 1000);
}

/** Map an HTTP failure status onto the publish error kinds. */
export function classifyStatus(status: number): PublishError["kind"] {
  if (status === 429) return "rateLimited";
  if (status === 401 || status === 403) return "authFailed";
  if (status >= 500) return "transient";
  return "rejected";
}

function errorFromResponse(res: Response, what: string): PublishError {
  const kind = classifyStatus(res.status);
  return new PublishError(kind, `reddit ${what} failed (${res.status})`, {
    retryAfterMs: kind === "rateLimited" ? parseRetryAfterHeaderMs(res) : undefined
  });
}

/** Reddit's `json.errors` entries look like ["RATELIMIT", "you are doing that too much", "ratelimit"]. */
function errorFromApiErrors(errors: unknown[][]): PublishError {
  const first = errors[0] ?? [];
  const code = typeof first[0] === "string" ? first[0] : "UNKNOWN";
  const message = typeof first[1] === "string" ? first[1] : "submission rejected";
  const kind: PublishError["kind"] = code === "RATELIMIT" ? "rateLimited" : "rejected";
  return new PublishError(kind, `reddit rejected submission: ${code} ${message}`.trim());
}

/**
 * Reddit publisher over the OAuth API ("script" app, password grant).
 *
 * No retries here: a failed item stays unseen and is retried by the next
 * scheduled run. Secrets and response bodies are never logged.
 */
export class RedditPublisher implements Publisher {
  private token: { value: string; expiresAtMs: number } | null = null;
  private readonly now: () => number;

  constructor(private readonly opts: RedditPublisherOptions) {
    this.now = opts.now ?? Date.now;
  }

  async publish(draft: PostDraft, opts: PublishOptions = {}): Promise<PostId> {
    const { signal } = opts;
    const token = await this.accessToken(signal);

    const form = new URLSearchParams({
      api_type: "json",
      sr: this.opts.subreddit,
      title: draft.title,
      kind: draft.kind,
      resubmit: "true",
      sendreplies: "true"
    });
    if (draft.kind === "link") form.set("url", draft.url ?? "");
    else form.set("text", draft.text ?? "");
    if (draft.flairText) form.set("flair_text", draft.flairText);

    const parsed = SubmitResponseSchema.safeParse(await this.postForm("/api/submit", form, token, "submit", signal));
    if (!parsed.success) {
      throw new PublishError("transient", "reddit submit returned an unexpected response");
    }
    if (parsed.data.json.errors.length > 0) {
      throw errorFromApiErrors(parsed.data.json.errors);
    }

    const name = parsed.data.json.data?.name ?? (parsed.data.json.data?.id ? `t3_${parsed.data.json.data.id}` : undefined);
    if (!name) {
      throw new PublishError("transient", "reddit submit returned no post id");
    }

    logger.info("reddit.submitted", { subreddit: this.opts.subreddit, postId: name, kind: draft.kind });

    if (draft.comment) {
      // The post exists at this point; a failed reply must not turn it into a failure.
      try {
        await this.postForm("/api/comment", new URLSearchParams({ api_type: "json", thing_id: name, text: draft.comment }), token, "comment", signal);
      } catch (err) {
        logger.warn("reddit.comment failed", { postId: name, error: errorMessage(err) });
      }
    }

    return name;
  }

  private async accessToken(signal?: AbortSignal): Promise<string> {
    if (this.token && this.token.expiresAtMs > this.now() + 60_000) return this.token.value;

    const { clientId, clientSecret, username, password, userAgent } = this.opts.credentials;
    const basic = Buffer.from(`${clientId}:${clientSecret}`).toString("base64");

    let res: Response;
    try {
      res = await fetch(TOKEN_URL, {
        method: "POST",
        headers: {
          Authorization: `Basic ${basic}`,
          "Content-Type": "application/x-www-form-urlencoded",
          "User-Agent": userAgent
        },
        body: new URLSearchParams({ grant_type: "password", username, password }).toString(),
        signal
      });
    } catch (err) {
      throw new PublishError("transient", `reddit token request failed: ${errorMessage(err)}`, { cause: err });
    }

    if (!res.ok) throw errorFromResponse(res, "token");

    const body: unknown = await res.json().catch(() => null);
    // Reddit answers bad credentials with 200 + {"error": "invalid_grant"}.
    const parsed = TokenResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new PublishError("authFailed", "reddit token response missing access_token");
    }

    this.token = { value: parsed.data.access_token, expiresAtMs: this.now() + parsed.data.expires_in * 1000 };
    return this.token.value;
  }

  private async postForm(
    pathname: string,
    form: URLSearchParams,
    token: string,
    what: string,
    signal?: AbortSignal
  ): Promise<unknown> {
    let res: Response;
    try {
      res = await fetch(`${API_BASE}${pathname}`, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${token}`,
          "Content-Type": "application/x-www-form-urlencoded",
          "User-Agent": this.opts.credentials.userAgent
        },
        body: form.toString(),
        signal
      });
    } catch (err) {
      throw new PublishError("transient", `reddit ${what} request failed: ${errorMessage(err)}`, { cause: err });
    }

    if (res.status === 401) this.token = null;
    if (!res.ok) throw errorFromResponse(res, what);

    try {
      const body: unknown = await res.json();
      return body;
    } catch (err) {
      throw new PublishError("transient", `reddit ${what} returned invalid JSON`, { cause: err });
    }
  }
}
