// pattern: Imperative Shell
import type { Logger } from "pino";
import type { RateLimitBudget } from "../pipeline/budget";
import { linkSignals } from "../pipeline/signals";
import type { FetchError } from "../pipeline/types";

const DEFAULT_RATE_LIMIT_DELAY_MS = 60_000;

export type PageResult =
  | { readonly success: true; readonly body: unknown; readonly next: string | null }
  | { readonly success: false; readonly error: FetchError };

export type GitHubClient = {
  readonly getPage: (target: string, signal: AbortSignal) => Promise<PageResult>;
};

export type GitHubClientOptions = {
  readonly token: string;
  readonly apiUrl: string;
  readonly timeoutMs: number;
  readonly budget: RateLimitBudget;
  readonly logger: Logger;
  readonly now?: () => number;
};

/**
 * Extracts the `rel="next"` target from a GitHub `Link` header.
 */
export function parseNextLink(header: string | null): string | null {
  if (!header) return null;

  for (const part of header.split(",")) {
    const match = /<([^>]+)>\s*;\s*rel="([^"]+)"/.exec(part);
    if (match?.[1] && match[2]?.split(" ").includes("next")) {
      return match[1];
    }
  }
  return null;
}

function rateLimitDelay(response: Response, now: number): number | null {
  const retryAfter = response.headers.get("retry-after");
  if (retryAfter !== null) {
    const seconds = Number(retryAfter);
    if (Number.isFinite(seconds) && seconds >= 0) return seconds * 1000;
  }

  if (response.headers.get("x-ratelimit-remaining") === "0") {
    const reset = Number(response.headers.get("x-ratelimit-reset"));
    return Number.isFinite(reset) && reset > 0
      ? Math.max(0, reset * 1000 - now)
      : DEFAULT_RATE_LIMIT_DELAY_MS;
  }

  return response.status === 429 ? DEFAULT_RATE_LIMIT_DELAY_MS : null;
}

/**
 * Creates a client that fetches single pages from the GitHub REST API and
 * classifies failures as rate limited, transient or permanent.
 *
 * Requests are gated on the shared budget: when the quota is known to be
 * exhausted, or a rate-limited response asked to back off, no request is
 * issued until the budget allows it again. Aborting the caller's signal rejects with
 * the signal's reason; the per-request timeout is a transient failure.
 */
export function createGitHubClient(options: GitHubClientOptions): GitHubClient {
  const now = options.now ?? Date.now;
  const apiUrl = options.apiUrl.replace(/\/+$/, "");
  const headers = {
    Accept: "application/vnd.github+json",
    Authorization: `Bearer ${options.token}`,
    "User-Agent": "activity-digest/0.1 (GitHub activity poller)",
    "X-GitHub-Api-Version": "2022-11-28",
  };

  const recordQuota = (response: Response) => {
    const remaining = Number(response.headers.get("x-ratelimit-remaining") ?? NaN);
    const reset = Number(response.headers.get("x-ratelimit-reset") ?? NaN);
    if (Number.isFinite(remaining) && Number.isFinite(reset)) {
      options.budget.record(remaining, reset * 1000);
    }
  };

  return {
    async getPage(target: string, signal: AbortSignal): Promise<PageResult> {
      const gate = options.budget.tryAcquire();
      if (!gate.allowed) {
        return {
          success: false,
          error: {
            kind: "rate_limited",
            retryAfterMs: gate.retryAfterMs,
            message: "rate limit budget exhausted",
          },
        };
      }

      const url = /^https?:\/\//.test(target) ? target : `${apiUrl}${target}`;
      const linked = linkSignals([signal, AbortSignal.timeout(options.timeoutMs)]);

      try {
        let response: Response;
        try {
          response = await fetch(url, { signal: linked.signal, headers });
        } catch (err) {
          if (signal.aborted) throw signal.reason;
          const message = err instanceof Error ? err.message : String(err);
          options.logger.warn({ url, error: message }, "github request failed");
          return { success: false, error: { kind: "transient", message } };
        }

        recordQuota(response);

        if (response.ok) {
          let body: unknown;
          try {
            body = await response.json();
          } catch (err) {
            if (signal.aborted) throw signal.reason;
            const message = err instanceof Error ? err.message : String(err);
            return {
              success: false,
              error: { kind: "transient", message: `unreadable response body: ${message}` },
            };
          }
          return { success: true, body, next: parseNextLink(response.headers.get("link")) };
        }

        const status = `HTTP ${response.status}: ${response.statusText}`;

        if (response.status === 403 || response.status === 429) {
          const retryAfterMs = rateLimitDelay(response, now());
          if (retryAfterMs !== null) {
            options.budget.exhaust(retryAfterMs);
            options.logger.warn({ url, retryAfterMs }, "github rate limit reached");
            return {
              success: false,
              error: { kind: "rate_limited", retryAfterMs, message: status },
            };
          }
        }

        if (response.status === 408 || response.status >= 500) {
          return { success: false, error: { kind: "transient", message: status } };
        }

        return { success: false, error: { kind: "permanent", message: status } };
      } finally {
        linked.dispose();
      }
    },
  };
}
