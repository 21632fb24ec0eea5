// Text normalization shared by catalog documents and queries. Pure: the same text and
// stopword set always give the same tokens.

// a word carrying any digit ("2nd", "1990s", "2021") is dropped whole
const DIGIT_WORDS = /[\p{L}\p{M}\p{N}_]*\p{N}[\p{L}\p{M}\p{N}_]*/gu;
const PUNCTUATION = /[^\p{L}\p{M}\s]+/gu;

/**
 * Lowercases, drops words containing digits, turns punctuation into spaces, splits on
 * whitespace and drops stopwords. No stemming. Missing text gives no tokens.
 */
export function normalize(text: string | undefined, stopwords: ReadonlySet<string>): string[] {
  return (text ?? '')
    .toLowerCase()
    .replace(DIGIT_WORDS, ' ')
    .replace(PUNCTUATION, ' ')
    .split(/\s+/)
    .filter((t) => t.length > 0 && !stopwords.has(t));
}
