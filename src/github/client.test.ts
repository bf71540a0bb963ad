import { describe, it, expect, afterEach, vi } from "vitest";
import { createGitHubClient, parseNextLink } from "./client";
import { RateLimitBudget } from "../pipeline/budget";
import { silentLogger, TEST_NOW } from "../test-utils/fixtures";

const API_URL = "https://api.github.test";

function jsonResponse(body: unknown, init?: ResponseInit): Response {
  return new Response(JSON.stringify(body), { status: 200, statusText: "OK", ...init });
}

function stubFetch(respond: (url: string, init?: RequestInit) => Response | Promise<Response>) {
  const fetchMock = vi.fn(async (url: string, init?: RequestInit) => respond(url, init));
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

function createClient(
  budget = new RateLimitBudget(() => TEST_NOW),
  now: () => number = () => TEST_NOW,
) {
  return createGitHubClient({
    token: "ghp_test-token",
    apiUrl: `${API_URL}/`,
    timeoutMs: 15_000,
    budget,
    logger: silentLogger(),
    now,
  });
}

describe("parseNextLink", () => {
  it("should return the next target from a Link header", () => {
    const header =
      '<https://api.github.test/repos/octo/widgets/issues?page=2>; rel="next", ' +
      '<https://api.github.test/repos/octo/widgets/issues?page=5>; rel="last"';

    expect(parseNextLink(header)).toBe("https://api.github.test/repos/octo/widgets/issues?page=2");
  });

  it("should return null when there is no next page", () => {
    expect(parseNextLink('<https://api.github.test/x?page=1>; rel="prev"')).toBeNull();
    expect(parseNextLink(null)).toBeNull();
  });
});

describe("createGitHubClient", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("should return the parsed body and next link on success", async () => {
    const fetchMock = stubFetch(() =>
      jsonResponse([{ id: 1 }], {
        headers: { link: '<https://api.github.test/next?page=2>; rel="next"' },
      }),
    );

    const page = await createClient().getPage("/repos/octo/widgets/releases", new AbortController().signal);

    expect(page).toEqual({
      success: true,
      body: [{ id: 1 }],
      next: "https://api.github.test/next?page=2",
    });
    expect(fetchMock.mock.calls[0]?.[0]).toBe("https://api.github.test/repos/octo/widgets/releases");
    expect(fetchMock.mock.calls[0]?.[1]?.headers).toMatchObject({
      Accept: "application/vnd.github+json",
      Authorization: "Bearer ghp_test-token",
    });
  });

  it("should request absolute targets as given", async () => {
    const fetchMock = stubFetch(() => jsonResponse([]));

    await createClient().getPage("https://api.github.test/next?page=2", new AbortController().signal);

    expect(fetchMock.mock.calls[0]?.[0]).toBe("https://api.github.test/next?page=2");
  });

  it("should record the quota reported by the response", async () => {
    const budget = new RateLimitBudget(() => TEST_NOW);
    stubFetch(() =>
      jsonResponse([], {
        headers: { "x-ratelimit-remaining": "42", "x-ratelimit-reset": "1792000000" },
      }),
    );

    await createClient(budget).getPage("/rate", new AbortController().signal);

    expect(budget.snapshot()).toEqual({
      remaining: 42,
      resetAt: new Date(1_792_000_000_000),
      blockedUntil: null,
      exhausted: false,
    });
  });

  it("should classify an exhausted primary quota as rate limited and stop issuing requests", async () => {
    const budget = new RateLimitBudget(() => TEST_NOW);
    const reset = TEST_NOW / 1000 + 120;
    const fetchMock = stubFetch(
      () =>
        new Response("{}", {
          status: 403,
          statusText: "Forbidden",
          headers: { "x-ratelimit-remaining": "0", "x-ratelimit-reset": String(reset) },
        }),
    );
    const client = createClient(budget);

    const first = await client.getPage("/repos/octo/widgets/issues", new AbortController().signal);
    const second = await client.getPage("/repos/octo/widgets/issues", new AbortController().signal);

    expect(first).toEqual({
      success: false,
      error: { kind: "rate_limited", retryAfterMs: 120_000, message: "HTTP 403: Forbidden" },
    });
    expect(second).toEqual({
      success: false,
      error: { kind: "rate_limited", retryAfterMs: 120_000, message: "rate limit budget exhausted" },
    });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(budget.snapshot().exhausted).toBe(true);
  });

  it("should honour Retry-After on a secondary rate limit", async () => {
    stubFetch(
      () =>
        new Response("{}", {
          status: 429,
          statusText: "Too Many Requests",
          headers: { "retry-after": "5" },
        }),
    );

    const page = await createClient().getPage("/x", new AbortController().signal);

    expect(page).toEqual({
      success: false,
      error: { kind: "rate_limited", retryAfterMs: 5000, message: "HTTP 429: Too Many Requests" },
    });
  });

  it("should resume after Retry-After even when the primary quota resets much later", async () => {
    let clock = TEST_NOW;
    const budget = new RateLimitBudget(() => clock);
    let calls = 0;
    const fetchMock = stubFetch(() =>
      ++calls === 1
        ? new Response("{}", {
            status: 403,
            statusText: "Forbidden",
            headers: {
              "retry-after": "60",
              "x-ratelimit-remaining": "4000",
              "x-ratelimit-reset": String(TEST_NOW / 1000 + 50 * 60),
            },
          })
        : jsonResponse([]),
    );
    const client = createClient(budget, () => clock);

    const first = await client.getPage("/repos/octo/widgets/issues", new AbortController().signal);
    clock += 30_000;
    const during = await client.getPage("/repos/octo/widgets/issues", new AbortController().signal);
    clock = TEST_NOW + 31 * 60_000;
    const after = await client.getPage("/repos/octo/widgets/issues", new AbortController().signal);

    expect(first).toEqual({
      success: false,
      error: { kind: "rate_limited", retryAfterMs: 60_000, message: "HTTP 403: Forbidden" },
    });
    expect(during).toEqual({
      success: false,
      error: { kind: "rate_limited", retryAfterMs: 30_000, message: "rate limit budget exhausted" },
    });
    expect(after).toEqual({ success: true, body: [], next: null });
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(budget.snapshot()).toEqual({
      remaining: 3999,
      resetAt: new Date(TEST_NOW + 50 * 60_000),
      blockedUntil: null,
      exhausted: false,
    });
  });

  it("should treat a 403 without rate limit headers as permanent", async () => {
    stubFetch(() => new Response("{}", { status: 403, statusText: "Forbidden" }));

    const page = await createClient().getPage("/x", new AbortController().signal);

    expect(page).toEqual({
      success: false,
      error: { kind: "permanent", message: "HTTP 403: Forbidden" },
    });
  });

  it("should treat server errors and timeouts as transient", async () => {
    for (const [status, statusText] of [
      [502, "Bad Gateway"],
      [408, "Request Timeout"],
    ] as const) {
      stubFetch(() => new Response("{}", { status, statusText }));

      const page = await createClient().getPage("/x", new AbortController().signal);

      expect(page).toEqual({
        success: false,
        error: { kind: "transient", message: `HTTP ${status}: ${statusText}` },
      });
    }
  });

  it("should treat a missing resource as permanent", async () => {
    stubFetch(() => new Response("{}", { status: 404, statusText: "Not Found" }));

    const page = await createClient().getPage("/repos/octo/gone/issues", new AbortController().signal);

    expect(page).toEqual({
      success: false,
      error: { kind: "permanent", message: "HTTP 404: Not Found" },
    });
  });

  it("should treat network errors as transient", async () => {
    stubFetch(() => {
      throw new TypeError("fetch failed");
    });

    const page = await createClient().getPage("/x", new AbortController().signal);

    expect(page).toEqual({
      success: false,
      error: { kind: "transient", message: "fetch failed" },
    });
  });

  it("should treat an unreadable body as transient", async () => {
    stubFetch(() => new Response("<html>", { status: 200, statusText: "OK" }));

    const page = await createClient().getPage("/x", new AbortController().signal);

    expect(page.success).toBe(false);
    if (!page.success) {
      expect(page.error.kind).toBe("transient");
      expect(page.error.message).toMatch(/^unreadable response body: /);
    }
  });

  it("should reject with the caller's reason when cancelled", async () => {
    const controller = new AbortController();
    controller.abort(new Error("scheduler stopped"));
    stubFetch(() => {
      throw new Error("This operation was aborted");
    });

    await expect(createClient().getPage("/x", controller.signal)).rejects.toThrow(
      "scheduler stopped",
    );
  });
});
