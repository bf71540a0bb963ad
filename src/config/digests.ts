// pattern: Functional Core
import { parseItemReference } from "../github/items";
import type { DigestConfig, WatchedItem } from "../pipeline/types";
import { ConfigurationError } from "./errors";
import { DIGEST_ID_PATTERN } from "./schema";

/** Path segments the HTTP server claims for itself. */
const RESERVED_IDS = new Set(["api", "health"]);

export type DigestDefinition = {
  readonly digest: string;
  readonly title?: string;
  readonly items: ReadonlyArray<string>;
};

function parseItems(digestId: string, references: ReadonlyArray<string>): Array<WatchedItem> {
  const items: Array<WatchedItem> = [];
  const seen = new Set<string>();

  for (const reference of references) {
    const item = parseItemReference(reference);
    if (!item) {
      throw new ConfigurationError(
        `digest ${digestId}: malformed resource reference "${reference}"`,
      );
    }
    if (seen.has(item.url)) continue;
    seen.add(item.url);
    items.push(item);
  }

  return items;
}

/**
 * Turns a project shorthand (`owner/repo` or a URL) into a single-item
 * digest named after its last path segment, e.g. `repo.html`.
 */
export function projectDigest(reference: string): DigestDefinition {
  const name = reference.trim().replace(/\/+$/, "").split("/").pop() ?? "";
  return { digest: `${name}.html`, title: name, items: [reference] };
}

/**
 * Validates digest definitions and builds immutable DigestConfigs.
 *
 * @throws ConfigurationError on duplicate or reserved ids, ids that are not
 *         filename-safe, empty item lists or malformed resource references
 */
export function buildDigestConfigs(
  definitions: ReadonlyArray<DigestDefinition>,
): Array<DigestConfig> {
  const digests: Array<DigestConfig> = [];
  const ids = new Set<string>();

  for (const definition of definitions) {
    const id = definition.digest;

    if (!DIGEST_ID_PATTERN.test(id)) {
      throw new ConfigurationError(`digest id "${id}" is not filename-safe`);
    }
    if (RESERVED_IDS.has(id)) {
      throw new ConfigurationError(`digest id "${id}" is reserved`);
    }
    if (ids.has(id)) {
      throw new ConfigurationError(`duplicate digest id "${id}"`);
    }
    if (definition.items.length === 0) {
      throw new ConfigurationError(`digest ${id} has no items`);
    }

    ids.add(id);
    digests.push(
      Object.freeze({
        id,
        title: definition.title ?? id,
        items: Object.freeze(parseItems(id, definition.items)),
      }),
    );
  }

  return digests;
}
