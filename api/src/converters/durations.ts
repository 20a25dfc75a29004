/**
 * GitLab Duration Parsing
 * @module converters/durations
 *
 * GitLab writes durations as `1h 30m`, `3 days`, `1 week` or a bare number.
 */

const UNIT_SECONDS: ReadonlyArray<readonly [RegExp, number]> = [
  [/^(?:y|yrs?|years?)$/, 365 * 86400],
  [/^(?:mo|months?)$/, 30 * 86400],
  [/^(?:w|wks?|weeks?)$/, 7 * 86400],
  [/^(?:d|days?)$/, 86400],
  [/^(?:h|hrs?|hours?)$/, 3600],
  [/^(?:m|mins?|minutes?)$/, 60],
  [/^(?:s|secs?|seconds?)$/, 1],
];

const TERM = /(\d+(?:\.\d+)?)\s*([a-z]+)/g;

function unitSeconds(unit: string): number | undefined {
  return UNIT_SECONDS.find(([pattern]) => pattern.test(unit))?.[1];
}

/**
 * Total seconds in a duration, or null when any part is unreadable.
 * Compound terms are summed; a bare number is read in `bareUnitSeconds`.
 */
export function parseDurationSeconds(text: string, bareUnitSeconds: number): number | null {
  const normalized = text.trim().toLowerCase();
  if (normalized.length === 0) {
    return null;
  }

  if (/^\d+(?:\.\d+)?$/.test(normalized)) {
    return Number(normalized) * bareUnitSeconds;
  }

  let total = 0;
  let consumed = '';
  for (const match of normalized.matchAll(TERM)) {
    const seconds = unitSeconds(match[2]);
    if (seconds === undefined) {
      return null;
    }
    total += Number(match[1]) * seconds;
    consumed += match[0];
  }

  // Every non-space, non-separator character must belong to a term
  const leftover = normalized.replace(/[\s,]+|and/g, '');
  return consumed.replace(/\s+/g, '') === leftover && consumed.length > 0 ? total : null;
}

/**
 * Job timeout in whole minutes; bare numbers are minutes
 */
export function parseTimeoutMinutes(text: string | undefined, fallback: number): number {
  if (text === undefined) {
    return fallback;
  }
  const seconds = parseDurationSeconds(text, 60);
  return seconds === null || seconds <= 0 ? fallback : Math.ceil(seconds / 60);
}

const MAX_RETENTION_DAYS = 90;

/**
 * Artifact retention in days, from `expire_in`; bare numbers are seconds
 */
export function parseRetentionDays(text: string | undefined, fallback: number): number {
  if (text === undefined) {
    return fallback;
  }
  const seconds = parseDurationSeconds(text, 1);
  if (seconds === null || seconds <= 0) {
    return fallback;
  }
  return Math.min(MAX_RETENTION_DAYS, Math.max(1, Math.ceil(seconds / 86400)));
}
