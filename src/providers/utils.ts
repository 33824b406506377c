/**
 * Shared header parsing utilities.
 */

const DURATION_UNITS: Record<string, number> = {
  h: 3_600_000,
  m: 60_000,
  s: 1_000,
  ms: 1,
};

/**
 * Parse an OpenAI-style duration string into milliseconds.
 * Used for x-ratelimit-reset-requests and x-ratelimit-reset-tokens.
 *
 *   "6m23.456s" -> 383456
 *   "500ms"     -> 500
 *   "2h30m0s"   -> 9000000
 *
 * @returns Milliseconds, or undefined when nothing parseable is present.
 */
export function parseDurationToMs(str: string): number | undefined {
  const pattern = /(\d+(?:\.\d+)?)(ms|h|m|s)/g;
  let totalMs = 0;
  let matched = false;

  for (const match of str.matchAll(pattern)) {
    const [, amount, unit] = match;
    if (amount === undefined || unit === undefined) continue;
    totalMs += parseFloat(amount) * (DURATION_UNITS[unit] ?? 0);
    matched = true;
  }

  return matched ? Math.round(totalMs) : undefined;
}

/**
 * Parse a retry-after header value: delta-seconds or an HTTP date.
 * @param now - Current time in ms, for HTTP-date values.
 */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | undefined {
  if (value === null || value.trim() === '') return undefined;

  const seconds = Number(value);
  if (!Number.isNaN(seconds)) {
    return Math.max(0, Math.round(seconds * 1000));
  }

  const date = Date.parse(value);
  if (!Number.isNaN(date)) {
    return Math.max(0, date - now);
  }

  return undefined;
}

/** Parse an integer header, ignoring absent or malformed values. */
export function parseIntHeader(value: string | null): number | undefined {
  if (value === null) return undefined;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}
