import type { DigestAggregate, WatchedItem } from "./types";

// Copies down to the Dates and items, so nothing stored is shared with the
// tracker or with the aggregate passed in.
function freezeAggregate(aggregate: DigestAggregate): DigestAggregate {
  const items = new Map<WatchedItem, WatchedItem>();
  const freezeItem = (item: WatchedItem): WatchedItem => {
    let copy = items.get(item);
    if (!copy) {
      copy = Object.freeze({ ...item });
      items.set(item, copy);
    }
    return copy;
  };

  return Object.freeze({
    ...aggregate,
    generatedAt: new Date(aggregate.generatedAt.getTime()),
    events: Object.freeze(
      aggregate.events.map((event) =>
        Object.freeze({
          ...event,
          item: freezeItem(event.item),
          timestamp: new Date(event.timestamp.getTime()),
        }),
      ),
    ),
    failures: Object.freeze(
      aggregate.failures.map((failure) =>
        Object.freeze({ item: freezeItem(failure.item), error: Object.freeze({ ...failure.error }) }),
      ),
    ),
  });
}

/**
 * Latest aggregate per digest, plus the refreshes currently in flight.
 *
 * - `get` is synchronous and never waits for a refresh
 * - stored aggregates are frozen copies, replaced by a single assignment
 * - at most one refresh runs per digest; concurrent callers share its promise
 * - a rejected refresh leaves the previous aggregate in place
 */
export class DigestCache {
  private readonly entries = new Map<string, DigestAggregate>();
  private readonly inflight = new Map<string, Promise<DigestAggregate>>();

  constructor(private readonly now: () => number = Date.now) {}

  get(digestId: string): DigestAggregate | null {
    return this.entries.get(digestId) ?? null;
  }

  put(digestId: string, aggregate: DigestAggregate): void {
    this.entries.set(digestId, freezeAggregate(aggregate));
  }

  /**
   * True when nothing is stored yet or the stored aggregate is older than
   * `maxAgeMs`.
   */
  isStale(digestId: string, maxAgeMs: number): boolean {
    const entry = this.entries.get(digestId);
    if (!entry) return true;
    return this.now() - entry.generatedAt.getTime() > maxAgeMs;
  }

  isRefreshing(digestId: string): boolean {
    return this.inflight.has(digestId);
  }

  /**
   * Runs `run` and stores its result, unless a refresh for the digest is
   * already in flight, in which case the caller attaches to that one.
   */
  refresh(
    digestId: string,
    run: () => Promise<DigestAggregate>,
  ): Promise<DigestAggregate> {
    const pending = this.inflight.get(digestId);
    if (pending) return pending;

    const task = Promise.resolve()
      .then(run)
      .then((aggregate) => {
        this.put(digestId, aggregate);
        return this.entries.get(digestId) ?? aggregate;
      })
      .finally(() => {
        this.inflight.delete(digestId);
      });

    this.inflight.set(digestId, task);
    return task;
  }
}
