export { aggregateDigest, mergeEvents, compareEvents } from "./aggregator";
export type { AggregatorDeps } from "./aggregator";
export { RateLimitBudget } from "./budget";
export type { BudgetSnapshot, BudgetGate } from "./budget";
export { DigestCache } from "./cache";
export { fetchWithRetry } from "./retry";
export type { RetryPolicy } from "./retry";
export { linkSignals } from "./signals";
export { ItemTracker } from "./tracker";
export type {
  ActivityEvent,
  ActivityKind,
  ActivitySource,
  Cursor,
  DigestAggregate,
  DigestConfig,
  FetchError,
  FetchOutcome,
  ItemFailure,
  ItemKind,
  WatchedItem,
} from "./types";
