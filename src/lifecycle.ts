// pattern: Imperative Shell
import type { Logger } from "pino";
import type { RefreshScheduler } from "./scheduler";

const DEFAULT_GRACE_MS = 10_000;

/**
 * The part of an HTTP server shutdown needs: `close` stops accepting
 * connections and calls back once open requests have finished.
 */
export type ClosableServer = {
  readonly close: (callback: (err?: Error) => void) => unknown;
};

export type ShutdownDeps = {
  readonly scheduler: Pick<RefreshScheduler, "stop">;
  readonly server: ClosableServer;
  readonly logger: Logger;
  /** Upper bound on waiting for refreshes and open requests. */
  readonly graceMs?: number;
  readonly exit?: (code: number) => void;
};

function closeServer(server: ClosableServer): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

async function settlesWithin(work: Promise<unknown>, ms: number): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<false>((resolve) => {
    timer = setTimeout(() => resolve(false), ms);
  });
  try {
    return await Promise.race([work.then(() => true), expired]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Builds the shutdown sequence: stop the scheduler (cancelling in-flight
 * refreshes) and close the HTTP server, wait for both to settle or for the
 * grace period to run out, then exit 0. Only the first call does anything.
 */
export function createShutdown(deps: ShutdownDeps): (signal: string) => Promise<void> {
  const graceMs = deps.graceMs ?? DEFAULT_GRACE_MS;
  const exit = deps.exit ?? ((code: number) => process.exit(code));
  let shuttingDown = false;

  return async (signal) => {
    if (shuttingDown) return;
    shuttingDown = true;
    deps.logger.info({ signal, graceMs }, "shutdown signal received");

    const draining = (async () => {
      await deps.scheduler.stop();
    })().then(
      () => deps.logger.info("in-flight refreshes settled"),
      (err: unknown) =>
        deps.logger.error(
          { error: err instanceof Error ? err.message : String(err) },
          "error stopping scheduler",
        ),
    );
    const closing = closeServer(deps.server).then(
      () => deps.logger.info("http server closed"),
      (err: unknown) =>
        deps.logger.error(
          { error: err instanceof Error ? err.message : String(err) },
          "error closing http server",
        ),
    );

    if (!(await settlesWithin(Promise.all([draining, closing]), graceMs))) {
      deps.logger.warn({ graceMs }, "shutdown grace period elapsed");
    }

    deps.logger.info("shutdown complete");
    exit(0);
  };
}

/**
 * Runs the shutdown sequence on SIGTERM or SIGINT.
 */
export function registerShutdownHandlers(deps: ShutdownDeps): void {
  const shutdown = createShutdown(deps);
  const onSignal = (signal: NodeJS.Signals) => {
    shutdown(signal).catch((err: unknown) => {
      deps.logger.fatal(
        { error: err instanceof Error ? err.message : String(err) },
        "shutdown failed",
      );
      process.exit(1);
    });
  };

  process.on("SIGTERM", onSignal);
  process.on("SIGINT", onSignal);
}
