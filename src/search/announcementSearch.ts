import { logger } from '../logger.js';
import { Announcement, AnnouncementStore, DateRange, SearchQuery } from '../types.js';
import { clampLimit } from '../utils.js';
import { resolveDateExpression } from './dateResolver.js';
import { rankAnnouncements } from './relevance.js';
import { StopWordFilter } from './stopWords.js';

export interface AnnouncementSearchOptions {
  stopWords: StopWordFilter;
  defaultLimit: number;
  maxLimit: number;
  /** Reference clock for relative date phrases. */
  now?: () => Date;
}

const hasText = (value: string | undefined): value is string =>
  typeof value === 'string' && value.trim().length > 0;

/**
 * Retrieval engine over the announcement store. Every call fetches a fresh
 * snapshot, narrows it by date, sender and text relevance, and truncates it.
 * A store failure yields an empty list instead of an exception.
 */
export class AnnouncementSearch {
  private readonly store: AnnouncementStore;
  private readonly stopWords: StopWordFilter;
  private readonly defaultLimit: number;
  private readonly maxLimit: number;
  private readonly now: () => Date;

  constructor(store: AnnouncementStore, options: AnnouncementSearchOptions) {
    this.store = store;
    this.stopWords = options.stopWords;
    this.maxLimit = options.maxLimit;
    this.defaultLimit = clampLimit(options.defaultLimit, options.maxLimit, options.maxLimit);
    this.now = options.now ?? (() => new Date());
  }

  resolveDateExpression(expression: string): DateRange {
    return resolveDateExpression(expression, this.now());
  }

  clampLimit(limit: number | undefined): number {
    return clampLimit(limit, this.maxLimit, this.defaultLimit);
  }

  async searchAnnouncements(
    queryText: string,
    sender?: string,
    dateExpression?: string,
    limit?: number
  ): Promise<Announcement[]> {
    return this.combinedFilter({
      queryText,
      senderFilter: sender,
      dateExpression,
      limit: this.clampLimit(limit),
    });
  }

  async combinedFilter(query: SearchQuery): Promise<Announcement[]> {
    const { queryText, senderFilter, dateExpression } = query;
    const limit = this.clampLimit(query.limit);
    logger.info(
      `Combined filter - search: '${queryText ?? ''}', sender: '${senderFilter ?? ''}', date: '${dateExpression ?? ''}'`
    );

    let announcements: Announcement[];
    if (hasText(dateExpression)) {
      const range = this.resolveDateExpression(dateExpression);
      announcements = await this.fetchSafely(() => this.store.fetchByDateRange(range.start, range.end));
      logger.info(`Date filtering: ${announcements.length} announcements from ${range.start} to ${range.end}`);
    } else {
      announcements = await this.fetchSafely(() => this.store.fetchAll());
    }

    if (hasText(senderFilter)) {
      const needle = senderFilter.toLowerCase();
      announcements = announcements.filter(ann => (ann.sender ?? '').toLowerCase().includes(needle));
      logger.info(`Sender filtering: ${announcements.length} announcements from '${senderFilter}'`);
    }

    if (hasText(queryText)) {
      const ranked = rankAnnouncements(announcements, queryText, this.stopWords);
      ranked.slice(0, 5).forEach((candidate, i) => {
        logger.debug(`Result ${i + 1}: '${candidate.record.title || 'No title'}' (score: ${candidate.score})`);
      });
      announcements = ranked.map(candidate => candidate.record);
      logger.info(`Text search: ${announcements.length} relevant announcements`);
    }

    const results = announcements.slice(0, limit);
    logger.info(`Final result: ${results.length} announcements`);
    return results;
  }

  /** Newest announcements first, as ordered by the store. */
  async recentAnnouncements(limit?: number): Promise<Announcement[]> {
    const announcements = await this.fetchSafely(() => this.store.fetchAll());
    return announcements.slice(0, this.clampLimit(limit));
  }

  async announcementsByDate(
    expression: string,
    limit?: number
  ): Promise<{ range: DateRange; announcements: Announcement[] }> {
    const range = this.resolveDateExpression(expression);
    const announcements = await this.fetchSafely(() => this.store.fetchByDateRange(range.start, range.end));
    return { range, announcements: announcements.slice(0, this.clampLimit(limit)) };
  }

  private async fetchSafely(fetch: () => Promise<Announcement[]>): Promise<Announcement[]> {
    try {
      const records = await fetch();
      return Array.isArray(records) ? records : [];
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`Announcement store unavailable, returning no results: ${message}`);
      return [];
    }
  }
}
