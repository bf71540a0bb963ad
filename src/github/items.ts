// pattern: Functional Core
import type { WatchedItem } from "../pipeline/types";

const GITHUB_HOSTS = new Set(["github.com", "www.github.com"]);
const NAME = /^[A-Za-z0-9_.-]+$/;
const SHORTHAND = /^([A-Za-z0-9_.-]+)\/([A-Za-z0-9_.-]+)$/;

function repositoryName(raw: string): string {
  return raw.endsWith(".git") ? raw.slice(0, -4) : raw;
}

/**
 * Parses a resource reference into a WatchedItem with a canonical URL.
 *
 * Accepts `owner/repo` shorthand and github.com URLs of a repository, an
 * issue, a pull request or a repository's releases page. Returns null for
 * anything else.
 */
export function parseItemReference(reference: string): WatchedItem | null {
  const trimmed = reference.trim();

  const shorthand = SHORTHAND.exec(trimmed);
  if (shorthand?.[1] && shorthand[2]) {
    const owner = shorthand[1];
    const repo = repositoryName(shorthand[2]);
    if (!NAME.test(repo)) return null;
    return {
      kind: "repository",
      url: `https://github.com/${owner}/${repo}`,
      owner,
      repo,
      number: null,
    };
  }

  let url: URL;
  try {
    url = new URL(trimmed);
  } catch {
    return null;
  }

  if (url.protocol !== "https:" && url.protocol !== "http:") return null;
  if (!GITHUB_HOSTS.has(url.hostname.toLowerCase())) return null;

  const [owner, rawRepo, section, id, ...rest] = url.pathname
    .split("/")
    .filter((segment) => segment.length > 0);

  if (!owner || !rawRepo || rest.length > 0) return null;
  const repo = repositoryName(rawRepo);
  if (!NAME.test(owner) || !NAME.test(repo)) return null;

  const base = `https://github.com/${owner}/${repo}`;

  if (section === undefined) {
    return { kind: "repository", url: base, owner, repo, number: null };
  }

  if (section === "releases" && id === undefined) {
    return { kind: "release", url: `${base}/releases`, owner, repo, number: null };
  }

  if ((section === "issues" || section === "pull") && id !== undefined) {
    if (!/^\d+$/.test(id)) return null;
    const number = Number(id);
    if (number <= 0) return null;
    return section === "issues"
      ? { kind: "issue", url: `${base}/issues/${number}`, owner, repo, number }
      : { kind: "pull_request", url: `${base}/pull/${number}`, owner, repo, number };
  }

  return null;
}
