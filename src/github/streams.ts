// pattern: Functional Core
import { z } from "zod";
import type { ActivityEvent, ItemKind, WatchedItem } from "../pipeline/types";

const PAGE_SIZE = 100;
const SUMMARY_LENGTH = 120;

/**
 * One paginated GitHub endpoint feeding a watched item's activity.
 * `parse` returns null when the page does not have the expected shape.
 *
 * `timed` streams carry server-assigned timestamps and are read from a
 * per-stream watermark. Commit dates are set by whoever made the commit, so
 * the commits stream is read whole and deduplicated by permalink instead.
 */
export type ActivityStream = {
  readonly name: string;
  readonly newestFirst: boolean;
  readonly timed: boolean;
  readonly path: (item: WatchedItem, since: Date) => string;
  readonly parse: (
    body: unknown,
    item: WatchedItem,
  ) => ReadonlyArray<ActivityEvent> | null;
};

const timestampSchema = z.string().datetime({ offset: true });
const userSchema = z.object({ login: z.string() }).nullish();

const issueSchema = z.object({
  number: z.number().int(),
  title: z.string(),
  html_url: z.string(),
  state: z.string(),
  updated_at: timestampSchema,
  user: userSchema,
  pull_request: z.unknown().optional(),
});

const commentSchema = z.object({
  html_url: z.string(),
  updated_at: timestampSchema,
  body: z.string().nullish(),
  user: userSchema,
});

const issueEventSchema = z.object({
  id: z.number().int(),
  event: z.string(),
  created_at: timestampSchema,
  actor: userSchema,
});

const commitSchema = z.object({
  sha: z.string(),
  html_url: z.string(),
  commit: z.object({
    message: z.string(),
    author: z.object({ name: z.string().nullish(), date: timestampSchema.nullish() }).nullish(),
    committer: z.object({ date: timestampSchema.nullish() }).nullish(),
  }),
  author: userSchema,
});

const releaseSchema = z.object({
  html_url: z.string(),
  tag_name: z.string(),
  name: z.string().nullish(),
  draft: z.boolean().default(false),
  published_at: timestampSchema.nullish(),
  author: userSchema,
});

const STATE_CHANGES = new Set(["closed", "reopened", "merged"]);

/**
 * First line of free text, cut to a display-friendly length.
 */
export function summarize(text: string | null | undefined): string {
  const line = (text ?? "").trim().split(/\r?\n/, 1)[0]?.trim() ?? "";
  return line.length > SUMMARY_LENGTH
    ? `${line.slice(0, SUMMARY_LENGTH - 1)}…`
    : line;
}

function repoPath(item: WatchedItem): string {
  return `/repos/${encodeURIComponent(item.owner)}/${encodeURIComponent(item.repo)}`;
}

type StreamOrdering = Pick<ActivityStream, "newestFirst" | "timed">;

function defineStream<T>(
  name: string,
  ordering: StreamOrdering,
  entrySchema: z.ZodType<T, z.ZodTypeDef, unknown>,
  path: (item: WatchedItem, since: Date) => string,
  toEvent: (entry: T, item: WatchedItem) => ActivityEvent | null,
): ActivityStream {
  const pageSchema = z.array(entrySchema);

  return {
    name,
    ...ordering,
    path,
    parse(body, item) {
      const result = pageSchema.safeParse(body);
      if (!result.success) return null;

      const events: Array<ActivityEvent> = [];
      for (const entry of result.data) {
        const event = toEvent(entry, item);
        if (event) events.push(event);
      }
      return events;
    },
  };
}

const updatedThreads = defineStream(
  "issues",
  { newestFirst: true, timed: true },
  issueSchema,
  (item, since) =>
    `${repoPath(item)}/issues?state=all&sort=updated&direction=desc&since=${encodeURIComponent(since.toISOString())}&per_page=${PAGE_SIZE}`,
  (entry, item) => ({
    item,
    kind: entry.pull_request === undefined ? "issue" : "pull_request",
    timestamp: new Date(entry.updated_at),
    author: entry.user?.login ?? null,
    summary: `#${entry.number} ${summarize(entry.title)} (${entry.state})`,
    permalink: entry.html_url,
  }),
);

const threadComments = defineStream(
  "comments",
  { newestFirst: false, timed: true },
  commentSchema,
  (item, since) =>
    `${repoPath(item)}/issues/${item.number ?? 0}/comments?since=${encodeURIComponent(since.toISOString())}&per_page=${PAGE_SIZE}`,
  (entry, item) => ({
    item,
    kind: "comment",
    timestamp: new Date(entry.updated_at),
    author: entry.user?.login ?? null,
    summary: summarize(entry.body) || "(empty comment)",
    permalink: entry.html_url,
  }),
);

const threadStateChanges = defineStream(
  "events",
  { newestFirst: false, timed: true },
  issueEventSchema,
  (item) => `${repoPath(item)}/issues/${item.number ?? 0}/events?per_page=${PAGE_SIZE}`,
  (entry, item) =>
    STATE_CHANGES.has(entry.event)
      ? {
          item,
          kind: "state_change",
          timestamp: new Date(entry.created_at),
          author: entry.actor?.login ?? null,
          summary: entry.event,
          permalink: `${item.url}#event-${entry.id}`,
        }
      : null,
);

const pullCommits = defineStream(
  "commits",
  { newestFirst: false, timed: false },
  commitSchema,
  (item) => `${repoPath(item)}/pulls/${item.number ?? 0}/commits?per_page=${PAGE_SIZE}`,
  (entry, item) => {
    const date = entry.commit.committer?.date ?? entry.commit.author?.date;
    if (!date) return null;
    return {
      item,
      kind: "commit",
      timestamp: new Date(date),
      author: entry.author?.login ?? entry.commit.author?.name ?? null,
      summary: `${entry.sha.slice(0, 7)} ${summarize(entry.commit.message)}`,
      permalink: entry.html_url,
    };
  },
);

const releases = defineStream(
  "releases",
  { newestFirst: true, timed: true },
  releaseSchema,
  (item) => `${repoPath(item)}/releases?per_page=${PAGE_SIZE}`,
  (entry, item) => {
    if (entry.draft || !entry.published_at) return null;
    return {
      item,
      kind: "release",
      timestamp: new Date(entry.published_at),
      author: entry.author?.login ?? null,
      summary: summarize(entry.name) || entry.tag_name,
      permalink: entry.html_url,
    };
  },
);

const STREAMS: Readonly<Record<ItemKind, ReadonlyArray<ActivityStream>>> = {
  repository: [updatedThreads],
  issue: [threadComments, threadStateChanges],
  pull_request: [threadComments, threadStateChanges, pullCommits],
  release: [releases],
};

export function streamsFor(kind: ItemKind): ReadonlyArray<ActivityStream> {
  return STREAMS[kind];
}
