import { describe, it, expect, afterEach, vi } from "vitest";
import pino from "pino";
import { createShutdown, registerShutdownHandlers } from "./lifecycle";
import type { ShutdownDeps } from "./lifecycle";
import { createLogger } from "./logger";

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

type CloseCallback = (err?: Error) => void;

function createDeps(overrides?: Partial<ShutdownDeps>) {
  const exit = vi.fn((_code: number) => undefined);
  const deps = {
    scheduler: { stop: vi.fn(async (): Promise<void> => undefined) },
    server: { close: vi.fn((callback: CloseCallback) => callback()) },
    logger: pino({ level: "silent" }),
    graceMs: 1_000,
    exit,
    ...overrides,
  } satisfies ShutdownDeps;
  return { deps, exit };
}

function captureLogs() {
  const entries: Array<unknown> = [];
  const logger = createLogger("info", {
    write: (line: string) => {
      entries.push(JSON.parse(line));
    },
  });
  return { entries, logger };
}

describe("registerShutdownHandlers", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should run the shutdown sequence on SIGTERM and SIGINT", async () => {
    for (const signal of ["SIGTERM", "SIGINT"] as const) {
      const onSpy = vi.spyOn(process, "on").mockImplementation(() => process);
      onSpy.mockClear();
      const { deps, exit } = createDeps();

      registerShutdownHandlers(deps);

      expect(onSpy).toHaveBeenCalledWith("SIGTERM", expect.any(Function));
      expect(onSpy).toHaveBeenCalledWith("SIGINT", expect.any(Function));

      const handler = onSpy.mock.calls.find((call) => call[0] === signal)?.[1];
      if (!handler) throw new Error(`no ${signal} handler registered`);
      handler(signal);

      await vi.waitFor(() => expect(exit).toHaveBeenCalledWith(0));
      expect(deps.scheduler.stop).toHaveBeenCalledTimes(1);
      expect(deps.server.close).toHaveBeenCalledTimes(1);
    }
  });
});

describe("createShutdown", () => {
  it("should exit only after refreshes settle and the server has closed", async () => {
    const order: Array<string> = [];
    const refreshes = deferred();
    let finishRequests: CloseCallback = () => undefined;
    const { deps } = createDeps({
      scheduler: {
        stop: async () => {
          order.push("scheduler.stop");
          await refreshes.promise;
          order.push("refreshes settled");
        },
      },
      server: {
        close: (callback: CloseCallback) => {
          order.push("server.close");
          finishRequests = callback;
        },
      },
      exit: (code: number) => {
        order.push(`exit ${code}`);
      },
    });

    const done = createShutdown(deps)("SIGTERM");
    await vi.waitFor(() => expect(order).toEqual(["scheduler.stop", "server.close"]));

    refreshes.resolve();
    await vi.waitFor(() => expect(order).toContain("refreshes settled"));
    expect(order).not.toContain("exit 0");

    finishRequests();
    await done;

    expect(order).toEqual(["scheduler.stop", "server.close", "refreshes settled", "exit 0"]);
  });

  it("should exit once the grace period runs out", async () => {
    const { entries, logger } = captureLogs();
    const { deps, exit } = createDeps({
      server: { close: () => undefined },
      graceMs: 20,
      logger,
    });

    await createShutdown(deps)("SIGTERM");

    expect(exit).toHaveBeenCalledWith(0);
    expect(entries).toContainEqual(
      expect.objectContaining({ level: "warn", graceMs: 20, msg: "shutdown grace period elapsed" }),
    );
    expect(entries).not.toContainEqual(expect.objectContaining({ msg: "http server closed" }));
  });

  it("should shut down only once", async () => {
    const { deps, exit } = createDeps();
    const shutdown = createShutdown(deps);

    await Promise.all([shutdown("SIGTERM"), shutdown("SIGINT")]);

    expect(deps.scheduler.stop).toHaveBeenCalledTimes(1);
    expect(deps.server.close).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledTimes(1);
  });

  it("should keep shutting down when the scheduler or the server fails", async () => {
    const { entries, logger } = captureLogs();
    const { deps, exit } = createDeps({
      scheduler: {
        stop: () => {
          throw new Error("scheduler stop failed");
        },
      },
      server: { close: (callback: CloseCallback) => callback(new Error("Server is not running.")) },
      logger,
    });

    await createShutdown(deps)("SIGINT");

    expect(exit).toHaveBeenCalledWith(0);
    expect(entries).toContainEqual(
      expect.objectContaining({ level: "error", error: "scheduler stop failed", msg: "error stopping scheduler" }),
    );
    expect(entries).toContainEqual(
      expect.objectContaining({ level: "error", error: "Server is not running.", msg: "error closing http server" }),
    );
  });

  it("should log each shutdown phase", async () => {
    const { entries, logger } = captureLogs();
    const { deps } = createDeps({ logger });

    await createShutdown(deps)("SIGTERM");

    const messages = entries.map((entry) =>
      typeof entry === "object" && entry !== null && "msg" in entry ? entry.msg : null,
    );
    expect(messages).toHaveLength(4);
    expect(messages[0]).toBe("shutdown signal received");
    expect(messages.slice(1, 3)).toEqual(
      expect.arrayContaining(["in-flight refreshes settled", "http server closed"]),
    );
    expect(messages[3]).toBe("shutdown complete");
    expect(entries[0]).toMatchObject({ level: "info", signal: "SIGTERM", graceMs: 1_000 });
  });
});
