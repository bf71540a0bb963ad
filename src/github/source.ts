// pattern: Imperative Shell
import type { Logger } from "pino";
import { z } from "zod";
import type {
  ActivityEvent,
  ActivitySource,
  Cursor,
  FetchOutcome,
  WatchedItem,
} from "../pipeline/types";
import type { GitHubClient } from "./client";
import { streamsFor } from "./streams";

export type GitHubSourceOptions = {
  readonly maxPages: number;
  readonly lookbackMs: number;
  readonly logger: Logger;
  readonly now?: () => number;
};

/**
 * Where one stream of an item left off. `since` is the watermark: activity
 * at or before it has been reported. `resume` is set while a traversal that
 * hit the page limit still has pages to read; `newest` is the newest
 * timestamp that traversal has seen so far.
 */
export type StreamProgress = Readonly<{
  since: number;
  resume: Readonly<{ next: string; newest: number }> | null;
}>;

const streamProgressSchema = z.object({
  since: z.string().datetime(),
  resume: z.object({ next: z.string().min(1), newest: z.string().datetime() }).nullable(),
});

const cursorTokenSchema = z.object({
  streams: z.record(streamProgressSchema),
});

type CursorToken = z.infer<typeof cursorTokenSchema>;

/**
 * Reads per-stream progress out of a cursor issued by this source. A missing
 * or unreadable cursor yields no progress, so every stream starts at the
 * lookback window.
 */
export function decodeCursor(cursor: Cursor | null): Map<string, StreamProgress> {
  const progress = new Map<string, StreamProgress>();
  if (!cursor) return progress;

  let raw: unknown;
  try {
    raw = JSON.parse(cursor.token);
  } catch {
    return progress;
  }

  const result = cursorTokenSchema.safeParse(raw);
  if (!result.success) return progress;

  for (const [name, state] of Object.entries(result.data.streams)) {
    progress.set(name, {
      since: Date.parse(state.since),
      resume: state.resume
        ? { next: state.resume.next, newest: Date.parse(state.resume.newest) }
        : null,
    });
  }
  return progress;
}

export function encodeCursor(progress: ReadonlyMap<string, StreamProgress>): string {
  const token: CursorToken = { streams: {} };
  for (const [name, state] of progress) {
    token.streams[name] = {
      since: new Date(state.since).toISOString(),
      resume: state.resume
        ? { next: state.resume.next, newest: new Date(state.resume.newest).toISOString() }
        : null,
    };
  }
  return JSON.stringify(token);
}

/**
 * Resolves the point in time a stream is read from: its watermark, clamped
 * to the lookback window and to `now`.
 */
export function resolveSince(
  progress: StreamProgress | undefined,
  now: number,
  lookbackMs: number,
): Date {
  const windowStart = now - lookbackMs;
  if (!progress) return new Date(windowStart);
  return new Date(Math.min(now, Math.max(windowStart, progress.since)));
}

/**
 * Creates an ActivitySource backed by the GitHub REST API.
 *
 * Each item kind maps to one or more paginated streams, and each stream keeps
 * its own progress in the cursor. A timed stream returns only activity newer
 * than its watermark; the commits stream returns every commit, deduplicated
 * by permalink. Each stream reads at most `maxPages` pages per fetch. A
 * stream that stops at that limit keeps its watermark and records where to
 * resume, so the next fetch continues with the older pages before starting
 * over from the newest.
 *
 * The cursor's position is the fetch time, which only moves forward.
 */
export function createGitHubSource(
  client: GitHubClient,
  options: GitHubSourceOptions,
): ActivitySource {
  const now = options.now ?? Date.now;

  return {
    async fetchActivity(
      item: WatchedItem,
      cursor: Cursor | null,
      signal: AbortSignal,
    ): Promise<FetchOutcome> {
      const fetchedAt = now();
      const previous = decodeCursor(cursor);
      const progress = new Map<string, StreamProgress>();
      const events: Array<ActivityEvent> = [];
      const seen = new Set<string>();
      let pages = 0;

      for (const stream of streamsFor(item.kind)) {
        const state = previous.get(stream.name);
        const since = resolveSince(state, fetchedAt, options.lookbackMs);
        const resume = state?.resume ?? null;

        let target: string | null = resume ? resume.next : stream.path(item, since);
        let newest = resume ? Math.min(resume.newest, fetchedAt) : since.getTime();
        let streamPages = 0;

        if (resume) {
          options.logger.debug(
            { url: item.url, stream: stream.name },
            "resuming deferred pages",
          );
        }

        while (target !== null) {
          if (streamPages >= options.maxPages) {
            options.logger.warn(
              { url: item.url, stream: stream.name, maxPages: options.maxPages },
              "page limit reached, remaining activity deferred",
            );
            break;
          }

          const page = await client.getPage(target, signal);
          streamPages++;
          pages++;

          if (!page.success) return page;

          const parsed = stream.parse(page.body, item);
          if (!parsed) {
            return {
              success: false,
              error: {
                kind: "permanent",
                message: `unexpected response shape from ${stream.name} stream`,
              },
            };
          }

          const fresh = stream.timed
            ? parsed.filter((event) => event.timestamp.getTime() > since.getTime())
            : parsed;
          for (const event of fresh) {
            if (seen.has(event.permalink)) continue;
            seen.add(event.permalink);
            events.push(event);
            if (stream.timed) {
              newest = Math.max(newest, Math.min(event.timestamp.getTime(), fetchedAt));
            }
          }

          target = stream.newestFirst && fresh.length < parsed.length ? null : page.next;
        }

        progress.set(
          stream.name,
          target === null
            ? { since: newest, resume: null }
            : { since: since.getTime(), resume: { next: target, newest } },
        );
      }

      options.logger.debug(
        { url: item.url, eventCount: events.length, pages },
        "item fetched",
      );

      return {
        success: true,
        events,
        cursor: { token: encodeCursor(progress), position: fetchedAt },
        pages,
      };
    },
  };
}
