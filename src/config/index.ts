import { existsSync, readFileSync } from "node:fs";
import cron from "node-cron";
import { parse } from "yaml";
import type { DigestConfig } from "../pipeline/types";
import { resolveToken } from "./credential";
import type { CredentialEnv } from "./credential";
import { buildDigestConfigs, projectDigest } from "./digests";
import { ConfigurationError } from "./errors";
import { appConfigSchema } from "./schema";
import type { AppConfig } from "./schema";

function validateConfig(parsed: unknown, source: string): AppConfig {
  const result = appConfigSchema.safeParse(parsed ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new ConfigurationError(`invalid configuration in ${source}:\n${issues}`);
  }

  if (!cron.validate(result.data.schedule.refresh)) {
    throw new ConfigurationError(
      `invalid configuration in ${source}:\n  - schedule.refresh: invalid cron expression "${result.data.schedule.refresh}"`,
    );
  }

  return result.data;
}

export function loadConfig(configPath: string): AppConfig {
  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`failed to read config file at ${configPath}: ${message}`);
  }

  let parsed: unknown;
  try {
    parsed = parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`failed to parse YAML in ${configPath}: ${message}`);
  }

  return validateConfig(parsed, configPath);
}

export type SettingsEnv = CredentialEnv & {
  readonly CONFIG_PATH?: string;
  readonly PROJECTS?: string;
  readonly PORT?: string;
};

/**
 * Everything the service needs at startup, resolved once and passed
 * explicitly to the components that need it.
 */
export type Settings = Readonly<{
  config: AppConfig;
  digests: ReadonlyArray<DigestConfig>;
  token: string;
}>;

/**
 * Resolves the startup settings from command-line arguments and environment.
 *
 * - A single argument naming an existing file is the config file; otherwise
 *   `CONFIG_PATH` names it and the arguments are project shorthands
 * - Projects from `PROJECTS`, then the arguments, then `projects:` become
 *   single-item digests, listed before the configured digests
 * - `PORT` overrides `server.port`
 *
 * @throws ConfigurationError for any invalid or missing setting
 */
export function loadSettings(
  argv: ReadonlyArray<string>,
  env: SettingsEnv,
): Settings {
  const [first] = argv;
  const configArg =
    argv.length === 1 && first !== undefined && existsSync(first) ? first : null;

  const loaded = configArg !== null
    ? loadConfig(configArg)
    : env.CONFIG_PATH
      ? loadConfig(env.CONFIG_PATH)
      : validateConfig({}, "defaults");

  let port = loaded.server.port;
  if (env.PORT !== undefined && env.PORT !== "") {
    port = Number(env.PORT);
    if (!Number.isInteger(port) || port <= 0 || port > 65535) {
      throw new ConfigurationError(`invalid PORT "${env.PORT}"`);
    }
  }

  const projects = [
    ...(env.PROJECTS ?? "").split(/\s+/).filter((project) => project.length > 0),
    ...(configArg !== null ? [] : argv),
    ...loaded.projects,
  ];

  const digests = buildDigestConfigs([
    ...projects.map(projectDigest),
    ...loaded.digests,
  ]);

  if (digests.length === 0) {
    throw new ConfigurationError(
      "no digests configured: pass projects as arguments, set PROJECTS or provide a config file",
    );
  }

  const token = resolveToken(loaded.github, env);

  return {
    config: { ...loaded, server: { ...loaded.server, port } },
    digests,
    token,
  };
}

export { ConfigurationError } from "./errors";
export type { AppConfig };
