import { describe, it, expect } from "vitest";
import { parseTimedelta, sinceStartOfDay } from "./timedelta";
import { DAY_MS, HOUR_MS, TEST_NOW } from "../test-utils/fixtures";

describe("parseTimedelta", () => {
  it("should parse single units", () => {
    expect(parseTimedelta("1w")).toBe(7 * DAY_MS);
    expect(parseTimedelta("3d")).toBe(3 * DAY_MS);
    expect(parseTimedelta("12h")).toBe(12 * HOUR_MS);
    expect(parseTimedelta("90m")).toBe(90 * 60 * 1000);
  });

  it("should add up combined units and accept spelled-out names", () => {
    expect(parseTimedelta("1w2d")).toBe(9 * DAY_MS);
    expect(parseTimedelta("2 days 6 hours")).toBe(2 * DAY_MS + 6 * HOUR_MS);
    expect(parseTimedelta(" 1W ")).toBe(7 * DAY_MS);
  });

  it("should return null for invalid or empty durations", () => {
    for (const text of ["", "abc", "1", "0d", "1y", "1w garbage", "-1d"]) {
      expect(parseTimedelta(text)).toBeNull();
    }
  });
});

describe("sinceStartOfDay", () => {
  it("should subtract the delta from the start of the current UTC day", () => {
    expect(sinceStartOfDay(new Date(TEST_NOW), 7 * DAY_MS)).toEqual(
      new Date("2026-10-12T00:00:00.000Z"),
    );
  });
});
