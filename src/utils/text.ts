const WORD_REGEX = /[\p{L}\p{N}]+/gu;

const ENGLISH_STOPWORDS = new Set([
  "a", "an", "and", "are", "as", "at", "be", "but", "by", "for", "from",
  "has", "have", "he", "her", "his", "i", "if", "in", "into", "is", "it",
  "its", "me", "my", "no", "not", "of", "on", "or", "our", "she", "so",
  "than", "that", "the", "their", "them", "then", "there", "these", "they",
  "this", "to", "was", "we", "were", "what", "when", "which", "who", "will",
  "with", "you", "your",
]);

export function normalizeText(text: string): string {
  return text.replace(/\r\n/g, "\n").replace(/\t/g, " ").trim();
}

/** Distinct lexical terms of `text`, in first-seen order. */
export function tokenize(text: string): string[] {
  return [...new Set(tokenizeForBm25(text))];
}

export function tokenizeForBm25(text: string): string[] {
  const words = text.toLowerCase().match(WORD_REGEX) ?? [];

  const terms: string[] = [];
  for (const word of words) {
    if (ENGLISH_STOPWORDS.has(word)) {
      continue;
    }
    const term = stemToken(word);
    if (term.length >= 2 || /\p{N}/u.test(term)) {
      terms.push(term);
    }
  }

  return terms;
}

/**
 * Light English suffix stripping:
 * "indexes", "indexed" and "indexing" all reduce to "index".
 */
export function stemToken(word: string): string {
  if (/[^\x00-\x7f]/.test(word) || /\d/.test(word)) {
    return word;
  }
  if (word.length > 4 && word.endsWith("ies")) {
    return `${word.slice(0, -3)}y`;
  }
  if (word.length > 4 && /(x|ch|sh|ss)es$/.test(word)) {
    return word.slice(0, -2);
  }
  if (word.length > 5 && word.endsWith("ing")) {
    return word.slice(0, -3);
  }
  if (word.length > 4 && word.endsWith("ed")) {
    return word.slice(0, -2);
  }
  if (word.length > 3 && word.endsWith("s") && !/(ss|us|is)$/.test(word)) {
    return word.slice(0, -1);
  }
  return word;
}

export function truncate(text: string, maxChars: number): string {
  return text.length <= maxChars ? text : text.slice(0, maxChars);
}
