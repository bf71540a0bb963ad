// pattern: Imperative Shell
import cron from "node-cron";
import type { ScheduledTask } from "node-cron";
import type { Logger } from "pino";
import type { DigestCache } from "./pipeline/cache";
import { linkSignals } from "./pipeline/signals";
import type { DigestAggregate, DigestConfig } from "./pipeline/types";

export type RefreshState = "idle" | "refreshing" | "stopped";

export type RefreshOptions = {
  /** Give up waiting after this long and return the last known aggregate. */
  readonly timeoutMs?: number;
};

export type RefreshScheduler = {
  /** Resolves once every refresh cancelled by the stop has settled. */
  readonly stop: () => Promise<void>;
  readonly refreshAll: () => Promise<void>;
  readonly requestRefresh: (
    digestId: string,
    options?: RefreshOptions,
  ) => Promise<DigestAggregate | null>;
  readonly state: (digestId: string) => RefreshState;
};

export type AggregateFn = (
  config: DigestConfig,
  signal: AbortSignal,
) => Promise<DigestAggregate>;

export type SchedulerDeps = {
  readonly digests: ReadonlyArray<DigestConfig>;
  readonly cache: DigestCache;
  readonly aggregate: AggregateFn;
  readonly schedule: string;
  readonly logger: Logger;
};

export class UnknownDigestError extends Error {
  constructor(readonly digestId: string) {
    super(`unknown digest: ${digestId}`);
    this.name = "UnknownDigestError";
  }
}

/**
 * Creates and starts a scheduler that refreshes every digest on the
 * configured cron schedule and on demand.
 *
 * Each digest moves idle → refreshing → idle. The cron callback skips digests
 * that are already refreshing; on-demand requests attach to them instead. A
 * refresh that fails is logged and the previous aggregate stays cached; the
 * digest is retried on the next cycle. `stop()` halts the cron task, cancels
 * every in-flight refresh and refuses new ones; it resolves once the
 * cancelled refreshes have settled.
 *
 * @param deps - Digest list, cache, aggregation function and cron expression
 * @returns A RefreshScheduler; `stop()` is terminal
 */
export function createRefreshScheduler(deps: SchedulerDeps): RefreshScheduler {
  const byId = new Map(deps.digests.map((digest) => [digest.id, digest]));
  const shutdown = new AbortController();
  const owners = new Map<string, AbortController>();
  const running = new Set<Promise<unknown>>();
  let stopped = false;

  const track = <T>(work: Promise<T>): Promise<T> => {
    running.add(work);
    const untrack = () => {
      running.delete(work);
    };
    void work.then(untrack, untrack);
    return work;
  };

  const refreshOnce = async (config: DigestConfig): Promise<DigestAggregate> => {
    shutdown.signal.throwIfAborted();
    const controller = new AbortController();
    const linked = linkSignals([shutdown.signal, controller.signal]);
    owners.set(config.id, controller);

    deps.logger.info({ digestId: config.id }, "digest refresh starting");
    try {
      const aggregate = await deps.aggregate(config, linked.signal);
      linked.signal.throwIfAborted();
      deps.logger.info(
        {
          digestId: config.id,
          eventCount: aggregate.events.length,
          failureCount: aggregate.failures.length,
        },
        "digest refresh complete",
      );
      return aggregate;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      if (linked.signal.aborted) {
        deps.logger.warn({ digestId: config.id, error: message }, "digest refresh cancelled");
      } else {
        deps.logger.error({ digestId: config.id, error: message }, "digest refresh failed");
      }
      throw err;
    } finally {
      owners.delete(config.id);
      linked.dispose();
    }
  };

  const runRefresh = (config: DigestConfig): Promise<DigestAggregate> =>
    deps.cache.refresh(config.id, () => track(refreshOnce(config)));

  const refreshAll = async (): Promise<void> => {
    if (stopped) return;

    const idle = deps.digests.filter((digest) => !deps.cache.isRefreshing(digest.id));
    deps.logger.info(
      { digestCount: idle.length, skipped: deps.digests.length - idle.length },
      "refresh cycle starting",
    );

    const results = await Promise.allSettled(idle.map((digest) => runRefresh(digest)));
    const failed = results.filter((result) => result.status === "rejected").length;

    deps.logger.info({ refreshed: idle.length - failed, failed }, "refresh cycle complete");
  };

  const requestRefresh = async (
    digestId: string,
    options?: RefreshOptions,
  ): Promise<DigestAggregate | null> => {
    const config = byId.get(digestId);
    if (!config) throw new UnknownDigestError(digestId);
    if (stopped) return deps.cache.get(digestId);

    const attached = deps.cache.isRefreshing(digestId);
    const pending = runRefresh(config).then(
      (aggregate): DigestAggregate | null => aggregate,
      // Already logged by the refresh itself; fall back to what is cached.
      () => deps.cache.get(digestId),
    );

    if (options?.timeoutMs === undefined) return pending;

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<"timeout">((resolve) => {
      timer = setTimeout(() => resolve("timeout"), options.timeoutMs);
    });

    try {
      const result = await Promise.race([pending, timedOut]);
      if (result !== "timeout") return result;

      deps.logger.warn(
        { digestId, timeoutMs: options.timeoutMs, attached },
        "on-demand refresh timed out",
      );
      if (!attached) {
        owners.get(digestId)?.abort(new Error("on-demand refresh timed out"));
      }
      return deps.cache.get(digestId);
    } finally {
      clearTimeout(timer);
    }
  };

  const task: ScheduledTask = cron.schedule(deps.schedule, async () => {
    await refreshAll();
  });

  return {
    stop: async () => {
      if (!stopped) {
        stopped = true;
        task.stop();
        shutdown.abort(new Error("scheduler stopped"));
        deps.logger.info({ inFlight: running.size }, "refresh scheduler stopped");
      }
      await Promise.allSettled(running);
    },
    refreshAll,
    requestRefresh,
    state: (digestId) => {
      if (stopped) return "stopped";
      return deps.cache.isRefreshing(digestId) ? "refreshing" : "idle";
    },
  };
}
