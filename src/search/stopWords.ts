/**
 * Membership test over a configured set of low-information words.
 */
export class StopWordFilter {
  private readonly words: ReadonlySet<string>;

  constructor(words: Iterable<string>) {
    const normalized = new Set<string>();
    for (const word of words) {
      const key = word.trim().toLowerCase();
      if (key) {
        normalized.add(key);
      }
    }
    this.words = normalized;
  }

  get size(): number {
    return this.words.size;
  }

  isStopWord(token: string): boolean {
    return this.words.has(token.trim().toLowerCase());
  }

  /** Drops stop words, keeping the remaining tokens in their original order. */
  filterStopWords(tokens: readonly string[]): string[] {
    return tokens.filter(token => !this.isStopWord(token));
  }
}

/** Whitespace tokenizer shared by phrase cleaning and keyword extraction. */
export function tokenize(text: string): string[] {
  return text
    .split(/\s+/)
    .map(token => token.trim())
    .filter(token => token.length > 0);
}
