const PIECE = /\s*\S{1,4}|\s+$/g;

function fnv1a(text: string): number {
  let hash = 0x811c9dc5;
  for (let index = 0; index < text.length; index++) {
    hash ^= text.charCodeAt(index);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash;
}

/**
 * Pseudo-tokenizer for engines that expose none. Pieces are at most four
 * non-space characters plus the whitespace in front of them; ids are stable
 * hashes, so two prompts share a token prefix wherever they share a text prefix.
 */
export function estimateTokens(text: string): number[] {
  return (text.match(PIECE) ?? []).map(fnv1a);
}
