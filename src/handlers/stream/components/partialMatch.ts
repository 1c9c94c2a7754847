/**
 * Length of the longest suffix of `text` that is a proper prefix of one of
 * `candidates`. Stream stages hold back that many characters because the next
 * increment may complete the marker.
 */
export function longestPartialSuffix(text: string, candidates: readonly string[]): number {
  let longest = 0;
  for (const candidate of candidates) {
    const max = Math.min(candidate.length - 1, text.length);
    for (let length = max; length > longest; length--) {
      if (text.endsWith(candidate.slice(0, length))) {
        longest = length;
        break;
      }
    }
  }
  return longest;
}

/** Earliest occurrence of any needle at or after `from`; ties go to the longest needle. */
export function findEarliest(
  text: string,
  needles: readonly string[],
  from = 0,
): { index: number; needle: string } | null {
  let best: { index: number; needle: string } | null = null;
  for (const needle of needles) {
    if (needle === "") { continue; }
    const index = text.indexOf(needle, from);
    if (index === -1) { continue; }
    if (best === null || index < best.index || (index === best.index && needle.length > best.needle.length)) {
      best = { index, needle };
    }
  }
  return best;
}
