const HYPHEN = 0x2d;
const APOSTROPHE = 0x27;

/**
 * `A-Z` or `a-z`. Bytes with the high bit set are never letters.
 */
export function isAsciiLetter(byte: number): boolean {
  return (byte >= 0x41 && byte <= 0x5a) || (byte >= 0x61 && byte <= 0x7a);
}

/**
 * Punctuation that stays inside a token when letters follow it.
 */
export function isInWordPunctuation(byte: number): boolean {
  return byte === HYPHEN || byte === APOSTROPHE;
}
