/**
 * "Did you mean" lookup for unknown filter and test names.
 *
 * @module errors
 */

/**
 * Single-character edits (insert, delete, substitute) between two names
 */
export function editDistance(from: string, to: string): number {
  let previous = Array.from({ length: to.length + 1 }, (_, index) => index);
  for (let i = 1; i <= from.length; i++) {
    const current = [i];
    for (let j = 1; j <= to.length; j++) {
      const substitution = previous[j - 1] + (from[i - 1] === to[j - 1] ? 0 : 1);
      current[j] = Math.min(substitution, previous[j] + 1, current[j - 1] + 1);
    }
    previous = current;
  }
  return previous[to.length];
}

/**
 * The known name nearest to `input`, ignoring case. Names more than half
 * of `input` away (at least one edit is always allowed) are not offered;
 * ties go to the earlier name.
 */
export function closestName(input: string, names: Iterable<string>): string | undefined {
  const wanted = input.toLowerCase();
  const limit = Math.max(1, Math.floor(wanted.length / 2));
  let best: { name: string; distance: number } | undefined;

  for (const name of names) {
    const distance = editDistance(wanted, name.toLowerCase());
    if (distance <= limit && (best === undefined || distance < best.distance)) {
      best = { name, distance };
    }
  }
  return best?.name;
}
