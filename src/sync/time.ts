/**
 * Timestamp helpers. Missing timestamps sort before every present one.
 */

export function toMillis(value: string | null | undefined): number | null {
  if (!value) return null;
  const millis = Date.parse(value);
  return Number.isNaN(millis) ? null : millis;
}

/**
 * The most recent of the given timestamps, or null when none is present
 */
export function latest(...values: Array<string | null | undefined>): string | null {
  let best: string | null = null;
  let bestMillis = -Infinity;

  for (const value of values) {
    const millis = toMillis(value);
    if (millis !== null && millis > bestMillis) {
      best = new Date(millis).toISOString();
      bestMillis = millis;
    }
  }

  return best;
}

/**
 * Descending comparator with null last
 */
export function compareRecentFirst(a: string | null, b: string | null): number {
  const aMillis = toMillis(a);
  const bMillis = toMillis(b);
  if (aMillis === bMillis) return 0;
  if (aMillis === null) return 1;
  if (bMillis === null) return -1;
  return bMillis - aMillis;
}
