export { createGitHubClient, parseNextLink } from "./client";
export type { GitHubClient, GitHubClientOptions, PageResult } from "./client";
export { parseItemReference } from "./items";
export { createGitHubSource, decodeCursor, encodeCursor, resolveSince } from "./source";
export type { GitHubSourceOptions, StreamProgress } from "./source";
export { streamsFor, summarize } from "./streams";
export type { ActivityStream } from "./streams";
