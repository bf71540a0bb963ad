// pattern: Functional Core

const UNIT_MS: Readonly<Record<string, number>> = {
  w: 7 * 24 * 60 * 60 * 1000,
  d: 24 * 60 * 60 * 1000,
  h: 60 * 60 * 1000,
  m: 60 * 1000,
};

const UNIT_ALIASES: Readonly<Record<string, string>> = {
  w: "w",
  week: "w",
  weeks: "w",
  d: "d",
  day: "d",
  days: "d",
  h: "h",
  hour: "h",
  hours: "h",
  m: "m",
  min: "m",
  mins: "m",
  minute: "m",
  minutes: "m",
};

/**
 * Parses a duration such as `1w`, `3d`, `1w2d`, `12h` or `2 days` into
 * milliseconds. Returns null for anything unparseable or zero-length.
 */
export function parseTimedelta(text: string): number | null {
  const input = text.trim().toLowerCase();
  if (input.length === 0) return null;

  const part = /(\d+)\s*([a-z]+)\s*/y;
  let total = 0;
  let offset = 0;

  while (offset < input.length) {
    part.lastIndex = offset;
    const match = part.exec(input);
    if (!match?.[1] || !match[2]) return null;

    const unit = UNIT_ALIASES[match[2]];
    const unitMs = unit ? UNIT_MS[unit] : undefined;
    if (unitMs === undefined) return null;

    total += Number(match[1]) * unitMs;
    offset = part.lastIndex;
  }

  return total > 0 ? total : null;
}

/**
 * Start of the UTC day containing `now`, minus `deltaMs`. Digest pages use
 * day-aligned windows so a page looks the same all day.
 */
export function sinceStartOfDay(now: Date, deltaMs: number): Date {
  const midnight = Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate());
  return new Date(midnight - deltaMs);
}
