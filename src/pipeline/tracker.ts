import type { ActivityEvent, Cursor, WatchedItem } from "./types";

type ItemState = {
  readonly cursor: Cursor;
  readonly events: ReadonlyArray<ActivityEvent>;
};

/**
 * Per-item fetch progress shared by every digest watching the item.
 *
 * Sources return only activity newer than the cursor, so the tracker keeps
 * each item's events for the retention window and merges new pages into
 * them. Merging is keyed by permalink with the newer timestamp winning, so
 * committing the same page twice changes nothing.
 */
export class ItemTracker {
  private readonly states = new Map<string, ItemState>();

  constructor(
    private readonly retentionMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  cursorFor(item: WatchedItem): Cursor | null {
    return this.states.get(item.url)?.cursor ?? null;
  }

  /**
   * Merges freshly fetched events and advances the cursor. Cursors only move
   * forward, so a slower concurrent fetch from an older position cannot
   * rewind an item.
   *
   * @returns The item's retained events after the merge.
   */
  commit(
    item: WatchedItem,
    fresh: ReadonlyArray<ActivityEvent>,
    cursor: Cursor,
  ): ReadonlyArray<ActivityEvent> {
    const previous = this.states.get(item.url);
    const byPermalink = new Map<string, ActivityEvent>();

    for (const event of [...(previous?.events ?? []), ...fresh]) {
      const existing = byPermalink.get(event.permalink);
      if (!existing || event.timestamp.getTime() >= existing.timestamp.getTime()) {
        byPermalink.set(event.permalink, event);
      }
    }

    const cutoff = this.now() - this.retentionMs;
    const events = Array.from(byPermalink.values()).filter(
      (event) => event.timestamp.getTime() >= cutoff,
    );

    this.states.set(item.url, {
      cursor: laterCursor(previous?.cursor ?? null, cursor),
      events,
    });

    return events;
  }

  retained(item: WatchedItem): ReadonlyArray<ActivityEvent> {
    return this.states.get(item.url)?.events ?? [];
  }
}

function laterCursor(current: Cursor | null, next: Cursor): Cursor {
  if (!current) return next;
  return next.position >= current.position ? next : current;
}
