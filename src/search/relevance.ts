import { Announcement, ScoredCandidate } from '../types.js';
import { StopWordFilter, tokenize } from './stopWords.js';

export const RELEVANCE_WEIGHTS = {
  exactPhrase: 100,
  exactPhraseInTitle: 20,
  cleanPhrase: 80,
  cleanPhraseInTitle: 15,
  keyword: 20,
  keywordInTitle: 10,
  extraKeyword: 10,
} as const;

/**
 * Score one announcement against a query. The checks form an ordered decision
 * list: an exact phrase hit returns before the clean-phrase check, which
 * returns before keyword accumulation, so a phrase match always outranks
 * scattered keyword overlap.
 */
export function scoreAnnouncement(
  record: Announcement,
  queryText: string,
  filteredKeywords: readonly string[],
  stopWords: StopWordFilter
): number {
  const title = (record.title ?? '').toLowerCase();
  const description = (record.description ?? '').toLowerCase();
  const sender = (record.sender ?? '').toLowerCase();
  const searchable = `${title} ${description} ${sender}`;

  const phrase = queryText.toLowerCase();
  if (phrase.trim() && searchable.includes(phrase)) {
    return RELEVANCE_WEIGHTS.exactPhrase + (title.includes(phrase) ? RELEVANCE_WEIGHTS.exactPhraseInTitle : 0);
  }

  const cleanPhrase = stopWords.filterStopWords(tokenize(queryText)).join(' ').toLowerCase();
  if (cleanPhrase && searchable.includes(cleanPhrase)) {
    return RELEVANCE_WEIGHTS.cleanPhrase + (title.includes(cleanPhrase) ? RELEVANCE_WEIGHTS.cleanPhraseInTitle : 0);
  }

  let score = 0;
  let matches = 0;
  for (const keyword of filteredKeywords) {
    const needle = keyword.toLowerCase();
    if (!needle || !searchable.includes(needle)) {
      continue;
    }
    matches += 1;
    score += RELEVANCE_WEIGHTS.keyword;
    if (title.includes(needle)) {
      score += RELEVANCE_WEIGHTS.keywordInTitle;
    }
  }
  if (matches > 1) {
    score += (matches - 1) * RELEVANCE_WEIGHTS.extraKeyword;
  }
  return score;
}

/**
 * Score every record, drop the zero scores and order the rest by descending
 * score. Array.prototype.sort is stable, so equal scores keep fetch order.
 */
export function rankAnnouncements(
  records: readonly Announcement[],
  queryText: string,
  stopWords: StopWordFilter
): ScoredCandidate[] {
  const keywords = stopWords.filterStopWords(tokenize(queryText));
  return records
    .map(record => ({ record, score: scoreAnnouncement(record, queryText, keywords, stopWords) }))
    .filter(candidate => candidate.score > 0)
    .sort((a, b) => b.score - a.score);
}
