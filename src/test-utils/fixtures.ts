import pino from "pino";
import { vi } from "vitest";
import { appConfigSchema } from "../config/schema";
import type { AppConfig } from "../config";
import { parseItemReference } from "../github/items";
import type {
  ActivityEvent,
  ActivityKind,
  DigestAggregate,
  DigestConfig,
  FetchError,
  ItemFailure,
  WatchedItem,
} from "../pipeline/types";
import { createCallerFactory } from "../api/trpc";
import { appRouter } from "../api/router";
import type { AppContext } from "../api/context";
import type { RefreshScheduler } from "../scheduler";
import { DigestCache } from "../pipeline/cache";
import { RateLimitBudget } from "../pipeline/budget";

/** 2026-10-19T12:00:00Z, the fixed "now" used across tests. */
export const TEST_NOW = Date.parse("2026-10-19T12:00:00Z");

export const HOUR_MS = 60 * 60 * 1000;
export const DAY_MS = 24 * HOUR_MS;

export function silentLogger(): pino.Logger {
  return pino({ level: "silent" });
}

/**
 * Parses a reference into a WatchedItem, failing the test on a bad reference.
 */
export function createTestItem(reference: string): WatchedItem {
  const item = parseItemReference(reference);
  if (!item) throw new Error(`bad test reference: ${reference}`);
  return item;
}

export function createTestEvent(
  item: WatchedItem,
  overrides?: Partial<{
    kind: ActivityKind;
    timestamp: Date;
    author: string | null;
    summary: string;
    permalink: string;
  }>,
): ActivityEvent {
  return {
    item,
    kind: "comment",
    timestamp: new Date(TEST_NOW - HOUR_MS),
    author: "octo",
    summary: "Test comment",
    permalink: `${item.url}#comment-1`,
    ...overrides,
  };
}

export function createTestDigest(
  id: string,
  references: ReadonlyArray<string>,
  title?: string,
): DigestConfig {
  return { id, title: title ?? id, items: references.map(createTestItem) };
}

export function createTestAggregate(
  digest: DigestConfig,
  overrides?: Partial<{
    generatedAt: Date;
    events: ReadonlyArray<ActivityEvent>;
    failures: ReadonlyArray<ItemFailure>;
  }>,
): DigestAggregate {
  return {
    digestId: digest.id,
    title: digest.title,
    generatedAt: new Date(TEST_NOW),
    events: [],
    failures: [],
    ...overrides,
  };
}

export function permanentError(message = "HTTP 404: Not Found"): FetchError {
  return { kind: "permanent", message };
}

/**
 * Creates a default AppConfig suitable for testing.
 */
export function createTestConfig(): AppConfig {
  return appConfigSchema.parse({
    projects: ["octo/widgets"],
    github: { token: "ghp_test-token" },
  });
}

/**
 * A scheduler whose methods are all mocks; refreshes resolve to whatever is
 * cached unless a test overrides `requestRefresh`.
 */
export function createFakeScheduler(cache: DigestCache) {
  return {
    stop: vi.fn(async (): Promise<void> => undefined),
    refreshAll: vi.fn(async () => undefined),
    requestRefresh: vi.fn(async (digestId: string) => cache.get(digestId)),
    state: vi.fn((): "idle" | "refreshing" | "stopped" => "idle"),
  } satisfies RefreshScheduler;
}

export function createTestContext(overrides?: Partial<AppContext>): AppContext {
  const cache = overrides?.cache ?? new DigestCache(() => TEST_NOW);
  return {
    digests: [createTestDigest("widgets.html", ["octo/widgets"], "widgets")],
    cache,
    scheduler: createFakeScheduler(cache),
    budget: new RateLimitBudget(() => TEST_NOW),
    config: createTestConfig(),
    logger: silentLogger(),
    now: () => new Date(TEST_NOW),
    ...overrides,
  };
}

/**
 * Creates a fully-typed tRPC caller for testing router procedures directly.
 */
export function createTestCaller(context: AppContext) {
  const createCaller = createCallerFactory(appRouter);
  return createCaller(context);
}
