// pattern: Functional Core
import type { BudgetSnapshot } from "../pipeline/budget";
import type {
  ActivityEvent,
  DigestAggregate,
  ItemFailure,
  WatchedItem,
} from "../pipeline/types";

export type DigestPage = Readonly<{
  aggregate: DigestAggregate;
  items: ReadonlyArray<WatchedItem>;
  since: Date | null;
  indexUrl: string;
}>;

export type IndexEntry = Readonly<{
  id: string;
  title: string;
  generatedAt: Date | null;
  failureCount: number;
}>;

export type IndexPage = Readonly<{
  digests: ReadonlyArray<IndexEntry>;
  rateLimit: BudgetSnapshot;
  defaultSince: string;
}>;

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

function formatTime(date: Date): string {
  return `${date.toISOString().slice(0, 16).replace("T", " ")} UTC`;
}

/**
 * Heading for a watched item, e.g. `owner/repo#12` or `owner/repo releases`.
 */
export function itemLabel(item: WatchedItem): string {
  const base = `${item.owner}/${item.repo}`;
  switch (item.kind) {
    case "repository":
      return base;
    case "release":
      return `${base} releases`;
    case "issue":
    case "pull_request":
      return `${base}#${item.number ?? ""}`;
  }
}

function renderEvent(event: ActivityEvent): string {
  const author = event.author
    ? ` <span class="author">by ${escapeHtml(event.author)}</span>`
    : "";
  return `<li><span class="when">${formatTime(event.timestamp)}</span> <a href="${escapeHtml(event.permalink)}">${escapeHtml(event.summary)}</a>${author}</li>`;
}

function renderItem(
  item: WatchedItem,
  events: ReadonlyArray<ActivityEvent>,
  failure: ItemFailure | undefined,
): string {
  const heading = `<h2><a href="${escapeHtml(item.url)}">${escapeHtml(itemLabel(item))}</a></h2>`;

  if (failure) {
    return `${heading}\n<p class="error">Could not fetch activity (${failure.error.kind}): ${escapeHtml(failure.error.message)}</p>`;
  }
  if (events.length === 0) {
    return `${heading}\n<p class="quiet">No activity.</p>`;
  }
  return `${heading}\n<ul>\n${events.map(renderEvent).join("\n")}\n</ul>`;
}

/**
 * Renders a digest page: one section per watched item in configuration
 * order, each listing that item's events newest first. Items that failed on
 * this generation show the failure instead of events.
 */
export function renderDigestHtml(page: DigestPage): string {
  const { aggregate, since } = page;
  const visible = since
    ? aggregate.events.filter((event) => event.timestamp.getTime() >= since.getTime())
    : aggregate.events;

  const byItem = new Map<string, Array<ActivityEvent>>();
  for (const event of visible) {
    const list = byItem.get(event.item.url) ?? [];
    list.push(event);
    byItem.set(event.item.url, list);
  }

  const failures = new Map(aggregate.failures.map((failure) => [failure.item.url, failure]));
  const sections = page.items
    .map((item) => renderItem(item, byItem.get(item.url) ?? [], failures.get(item.url)))
    .join("\n");

  const sinceLine = since
    ? `<p class="since">Activity since ${formatTime(since)}</p>\n`
    : "";

  return `<!DOCTYPE html>
<html>
<head>
<meta charset="utf-8">
<title>${escapeHtml(aggregate.title)}</title>
</head>
<body>
<h1>${escapeHtml(aggregate.title)}</h1>
<a href="${escapeHtml(page.indexUrl)}">← Back to index</a>
${sinceLine}${sections}
<p class="footer">Generated ${formatTime(aggregate.generatedAt)}</p>
</body>
</html>
`;
}

/**
 * Renders the landing page listing every digest and the API quota.
 */
export function renderIndexHtml(page: IndexPage): string {
  const rows = page.digests
    .map((digest) => {
      const href = `/${encodeURIComponent(digest.id)}?since=${encodeURIComponent(page.defaultSince)}`;
      const status = digest.generatedAt
        ? `updated ${formatTime(digest.generatedAt)}`
        : "not ready";
      const failures = digest.failureCount > 0
        ? `, ${digest.failureCount} failed item${digest.failureCount !== 1 ? "s" : ""}`
        : "";
      return `<li><a href="${escapeHtml(href)}">${escapeHtml(digest.title)}</a> <span class="status">(${status}${failures})</span></li>`;
    })
    .join("\n");

  const { remaining, resetAt, blockedUntil } = page.rateLimit;
  const quota = remaining === null
    ? "API quota: unknown"
    : `API quota: ${remaining} requests remaining${resetAt ? `, resets ${formatTime(resetAt)}` : ""}`;
  const paused = blockedUntil ? `, paused until ${formatTime(blockedUntil)}` : "";

  return `<!DOCTYPE html>
<html>
<head>
<meta charset="utf-8">
<title>Digests</title>
</head>
<body>
<h1>Digests</h1>
<ul>
${rows}
</ul>
<p class="footer">${quota}${paused}</p>
</body>
</html>
`;
}
