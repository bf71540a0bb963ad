// pattern: Functional Core
import type { Logger } from "pino";
import type { AppConfig } from "../config";
import type { RateLimitBudget } from "../pipeline/budget";
import type { DigestCache } from "../pipeline/cache";
import type { DigestConfig } from "../pipeline/types";
import type { RefreshScheduler } from "../scheduler";

/**
 * Context shared by the HTML routes and every tRPC procedure.
 * Readers only ever touch the cache through `get`; refreshes go through the
 * scheduler so they are coalesced.
 */
export type AppContext = {
  readonly digests: ReadonlyArray<DigestConfig>;
  readonly cache: DigestCache;
  readonly scheduler: RefreshScheduler;
  readonly budget: RateLimitBudget;
  readonly config: AppConfig;
  readonly logger: Logger;
  readonly now?: () => Date;
};
