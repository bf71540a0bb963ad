export type ItemKind = "repository" | "issue" | "pull_request" | "release";

/**
 * A single upstream resource whose activity is tracked. Built once from
 * configuration and never mutated; fetch progress lives in the ItemTracker.
 */
export type WatchedItem = Readonly<{
  kind: ItemKind;
  url: string;
  owner: string;
  repo: string;
  number: number | null;
}>;

/**
 * Marker of fetch progress. Only the activity source that issued a cursor
 * interprets its token; `position` orders cursors from the same source so
 * callers can keep the furthest one without reading the token.
 */
export type Cursor = Readonly<{
  token: string;
  position: number;
}>;

export type ActivityKind =
  | "issue"
  | "pull_request"
  | "comment"
  | "state_change"
  | "commit"
  | "release";

export type ActivityEvent = Readonly<{
  item: WatchedItem;
  kind: ActivityKind;
  timestamp: Date;
  author: string | null;
  summary: string;
  permalink: string;
}>;

export type DigestConfig = Readonly<{
  id: string;
  title: string;
  items: ReadonlyArray<WatchedItem>;
}>;

export type FetchError =
  | { readonly kind: "rate_limited"; readonly retryAfterMs: number; readonly message: string }
  | { readonly kind: "transient"; readonly message: string }
  | { readonly kind: "permanent"; readonly message: string };

/**
 * Result of fetching one item. Never thrown; cancellation is the only way a
 * fetch rejects.
 */
export type FetchOutcome =
  | {
      readonly success: true;
      readonly events: ReadonlyArray<ActivityEvent>;
      readonly cursor: Cursor;
      readonly pages: number;
    }
  | { readonly success: false; readonly error: FetchError };

export type ActivitySource = {
  readonly fetchActivity: (
    item: WatchedItem,
    since: Cursor | null,
    signal: AbortSignal,
  ) => Promise<FetchOutcome>;
};

export type ItemFailure = Readonly<{
  item: WatchedItem;
  error: FetchError;
}>;

/**
 * Render-ready result of one complete pass over a digest's items.
 * `failures` is empty when every item was fetched.
 */
export type DigestAggregate = Readonly<{
  digestId: string;
  title: string;
  generatedAt: Date;
  events: ReadonlyArray<ActivityEvent>;
  failures: ReadonlyArray<ItemFailure>;
}>;
