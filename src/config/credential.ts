import { readFileSync } from "node:fs";
import { ConfigurationError } from "./errors";

const TOKEN_PREFIXES = ["ghp_", "gho_", "ghs_", "ghu_", "github_pat_"];

export type CredentialSettings = {
  readonly token?: string;
  readonly tokenFile?: string;
};

export type CredentialEnv = {
  readonly GITHUB_TOKEN?: string;
  readonly GITHUB_TOKEN_FILE?: string;
};

export function looksLikeToken(value: string): boolean {
  return TOKEN_PREFIXES.some((prefix) => value.startsWith(prefix));
}

function readTokenFile(path: string): string {
  let raw: string;
  try {
    raw = readFileSync(path, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`failed to read GitHub token file at ${path}: ${message}`);
  }

  const token = raw.trim();
  if (token.length === 0) {
    throw new ConfigurationError(`GitHub token file at ${path} is empty`);
  }
  return token;
}

/**
 * Resolves the GitHub API token, in order of precedence:
 *
 * 1. `GITHUB_TOKEN_FILE` environment variable (path)
 * 2. `GITHUB_TOKEN` environment variable (inline)
 * 3. `github.tokenFile` in the config file (path)
 * 4. `github.token` in the config file: inline when it carries a GitHub token
 *    prefix, otherwise read as a path
 *
 * @throws ConfigurationError when no token is configured or a token file is
 *         unreadable or empty
 */
export function resolveToken(
  settings: CredentialSettings,
  env: CredentialEnv,
): string {
  if (env.GITHUB_TOKEN_FILE) return readTokenFile(env.GITHUB_TOKEN_FILE);

  const fromEnv = env.GITHUB_TOKEN?.trim();
  if (fromEnv) return fromEnv;

  if (settings.tokenFile) return readTokenFile(settings.tokenFile);

  if (settings.token) {
    return looksLikeToken(settings.token)
      ? settings.token
      : readTokenFile(settings.token);
  }

  throw new ConfigurationError(
    "no GitHub token configured: set GITHUB_TOKEN, GITHUB_TOKEN_FILE or github.token",
  );
}
