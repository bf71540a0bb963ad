import { setTimeout as delay } from "node:timers/promises";
import type { Logger } from "pino";
import type { ActivitySource, Cursor, FetchOutcome, WatchedItem } from "./types";

export type RetryPolicy = {
  readonly retries: number;
  readonly baseDelayMs: number;
};

/**
 * Fetches an item, retrying transient failures with exponential backoff.
 * Rate-limited and permanent failures are returned immediately. Aborting the
 * signal during a backoff rejects with the abort reason.
 */
export async function fetchWithRetry(
  source: ActivitySource,
  item: WatchedItem,
  since: Cursor | null,
  signal: AbortSignal,
  policy: RetryPolicy,
  logger: Logger,
): Promise<FetchOutcome> {
  for (let attempt = 0; ; attempt++) {
    const outcome = await source.fetchActivity(item, since, signal);

    if (
      outcome.success ||
      outcome.error.kind !== "transient" ||
      attempt >= policy.retries
    ) {
      return outcome;
    }

    const backoffMs = policy.baseDelayMs * 2 ** attempt;
    logger.warn(
      { url: item.url, attempt: attempt + 1, backoffMs, error: outcome.error.message },
      "transient fetch failure, retrying",
    );
    await delay(backoffMs, undefined, { signal }).catch((err: unknown) => {
      signal.throwIfAborted();
      throw err;
    });
  }
}
