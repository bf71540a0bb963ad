import { describe, it, expect, afterEach, vi } from "vitest";
import { createLogger } from "./logger";

describe("createLogger", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("should write JSON lines with string levels and ISO timestamps", () => {
    const lines: Array<string> = [];
    const logger = createLogger("debug", { write: (line: string) => void lines.push(line) });

    logger.debug({ digestId: "widgets.html" }, "digest refresh starting");

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? "")).toMatchObject({
      level: "debug",
      digestId: "widgets.html",
      msg: "digest refresh starting",
      time: expect.stringMatching(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/),
    });
  });

  it("should drop messages below the configured level", () => {
    const lines: Array<string> = [];
    const logger = createLogger("warn", { write: (line: string) => void lines.push(line) });

    logger.info("ignored");
    logger.warn("kept");

    expect(lines).toHaveLength(1);
  });

  it("should read the level from LOG_LEVEL when none is given", () => {
    vi.stubEnv("LOG_LEVEL", "error");

    expect(createLogger().level).toBe("error");
  });
});
