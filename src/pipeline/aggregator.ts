import pLimit from "p-limit";
import type { LimitFunction } from "p-limit";
import type { Logger } from "pino";
import type { ItemTracker } from "./tracker";
import { fetchWithRetry } from "./retry";
import type { RetryPolicy } from "./retry";
import type {
  ActivityEvent,
  ActivitySource,
  DigestAggregate,
  DigestConfig,
  FetchOutcome,
  ItemFailure,
  WatchedItem,
} from "./types";

export type AggregatorDeps = {
  readonly source: ActivitySource;
  readonly tracker: ItemTracker;
  /** Shared by every digest; caps fetches in flight across the process. */
  readonly globalLimit: LimitFunction;
  readonly perDigestConcurrency: number;
  readonly retry: RetryPolicy;
  readonly logger: Logger;
  readonly now?: () => number;
};

/**
 * Display order: newest first, ties broken by permalink then item URL so the
 * result never depends on fetch completion order.
 */
export function compareEvents(a: ActivityEvent, b: ActivityEvent): number {
  const byTime = b.timestamp.getTime() - a.timestamp.getTime();
  if (byTime !== 0) return byTime;
  if (a.permalink !== b.permalink) return a.permalink < b.permalink ? -1 : 1;
  if (a.item.url !== b.item.url) return a.item.url < b.item.url ? -1 : 1;
  return 0;
}

/**
 * Merges per-item event lists, dropping duplicate (item, permalink) pairs in
 * favour of the most recent version, and sorts the result.
 */
export function mergeEvents(
  lists: ReadonlyArray<ReadonlyArray<ActivityEvent>>,
): Array<ActivityEvent> {
  const byKey = new Map<string, ActivityEvent>();

  for (const list of lists) {
    for (const event of list) {
      const key = `${event.item.url}\n${event.permalink}`;
      const existing = byKey.get(key);
      if (!existing || event.timestamp.getTime() > existing.timestamp.getTime()) {
        byKey.set(key, event);
      }
    }
  }

  return Array.from(byKey.values()).sort(compareEvents);
}

/**
 * Fetches every item of a digest and merges the results into one aggregate.
 *
 * Fetches run under a per-digest limit nested inside the shared global limit.
 * A failed item is recorded in `failures` and contributes no events; an
 * aggregate is produced even when every item fails. Cursors are committed
 * only once all fetches have finished, and an aborted signal rejects the
 * whole aggregation so nothing partial escapes.
 */
export async function aggregateDigest(
  config: DigestConfig,
  deps: AggregatorDeps,
  signal: AbortSignal,
): Promise<DigestAggregate> {
  const now = deps.now ?? Date.now;
  const digestLimit = pLimit(deps.perDigestConcurrency);

  const results = await Promise.all(
    config.items.map((item) =>
      digestLimit(() =>
        deps.globalLimit(async (): Promise<{ item: WatchedItem; outcome: FetchOutcome }> => {
          signal.throwIfAborted();
          const outcome = await fetchWithRetry(
            deps.source,
            item,
            deps.tracker.cursorFor(item),
            signal,
            deps.retry,
            deps.logger,
          );
          return { item, outcome };
        }),
      ),
    ),
  );

  signal.throwIfAborted();

  const lists: Array<ReadonlyArray<ActivityEvent>> = [];
  const failures: Array<ItemFailure> = [];

  for (const { item, outcome } of results) {
    if (outcome.success) {
      lists.push(deps.tracker.commit(item, outcome.events, outcome.cursor));
    } else {
      failures.push({ item, error: outcome.error });
      deps.logger.warn(
        {
          digestId: config.id,
          url: item.url,
          errorKind: outcome.error.kind,
          error: outcome.error.message,
        },
        "item fetch failed",
      );
    }
  }

  const events = mergeEvents(lists);

  deps.logger.info(
    { digestId: config.id, eventCount: events.length, failureCount: failures.length },
    "digest aggregated",
  );

  return {
    digestId: config.id,
    title: config.title,
    generatedAt: new Date(now()),
    events,
    failures,
  };
}
