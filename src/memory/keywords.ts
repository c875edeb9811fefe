const STOP_WORDS = new Set([
  "the", "a", "an", "is", "are", "was", "were", "in", "on", "at", "to", "for",
  "of", "with", "and", "or", "not", "this", "that", "it", "i", "my", "your",
]);

const WORD_PATTERN = /[\p{L}\p{N}_]+/gu;

export const MAX_KEYWORDS = 10;

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(WORD_PATTERN) ?? [];
}

function isKeyword(word: string): boolean {
  return word.length > 2 && !STOP_WORDS.has(word);
}

/** Lowercased, stop-word filtered terms longer than two characters, in order of appearance. */
export function extractKeywords(text: string, max = MAX_KEYWORDS): string[] {
  return tokenize(text).filter(isKeyword).slice(0, max);
}

export function keywordSet(text: string): Set<string> {
  return new Set(tokenize(text).filter(isKeyword));
}
