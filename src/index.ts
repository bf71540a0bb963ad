import pLimit from "p-limit";
import { createLogger } from "./logger";
import { loadSettings } from "./config";
import type { Settings } from "./config";
import { RateLimitBudget, DigestCache, ItemTracker, aggregateDigest } from "./pipeline";
import { createGitHubClient, createGitHubSource } from "./github";
import { createRefreshScheduler } from "./scheduler";
import { createApiServer } from "./api/server";
import { registerShutdownHandlers } from "./lifecycle";

const DAY_MS = 24 * 60 * 60 * 1000;

async function main(): Promise<void> {
  const logger = createLogger();

  logger.info("activity-digest starting");

  let settings: Settings;
  try {
    settings = loadSettings(process.argv.slice(2), process.env);
  } catch (err) {
    logger.fatal(
      { error: err instanceof Error ? err.message : String(err) },
      "configuration error",
    );
    process.exit(1);
  }

  const { config, digests, token } = settings;
  logger.info(
    { digestCount: digests.length, schedule: config.schedule.refresh },
    "config loaded",
  );

  const lookbackMs = config.refresh.lookbackDays * DAY_MS;
  const budget = new RateLimitBudget();
  const client = createGitHubClient({
    token,
    apiUrl: config.github.apiUrl,
    timeoutMs: config.refresh.fetchTimeoutMs,
    budget,
    logger,
  });
  const source = createGitHubSource(client, {
    maxPages: config.refresh.maxPages,
    lookbackMs,
    logger,
  });
  const tracker = new ItemTracker(lookbackMs);
  const cache = new DigestCache();
  const globalLimit = pLimit(config.refresh.globalConcurrency);

  const scheduler = createRefreshScheduler({
    digests,
    cache,
    schedule: config.schedule.refresh,
    logger,
    aggregate: (digest, signal) =>
      aggregateDigest(
        digest,
        {
          source,
          tracker,
          globalLimit,
          perDigestConcurrency: config.refresh.perDigestConcurrency,
          retry: {
            retries: config.refresh.transientRetries,
            baseDelayMs: config.refresh.retryBaseDelayMs,
          },
          logger,
        },
        signal,
      ),
  });
  logger.info({ schedule: config.schedule.refresh }, "refresh scheduler started");

  const app = createApiServer({ digests, cache, scheduler, budget, config, logger });
  const server = app.listen(config.server.port, () => {
    logger.info({ port: config.server.port }, "http server listening");
  });

  registerShutdownHandlers({ scheduler, server, logger });

  await scheduler.refreshAll();
}

main().catch((err) => {
  console.error("fatal startup error:", err);
  process.exit(1);
});
