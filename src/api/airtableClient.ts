import axios, { AxiosError, AxiosInstance } from 'axios';
import { z } from 'zod';
import { logger } from '../logger.js';
import { Announcement, AnnouncementAttachment, AnnouncementStore, SchoolConfig } from '../types.js';
import { fetchAllPages } from '../utils.js';

export function createAirtableClient(config: SchoolConfig['airtable']): AxiosInstance {
  const instance = axios.create({
    baseURL: `${config.baseUrl}/${config.baseId}`,
    headers: {
      Authorization: `Bearer ${config.apiKey}`,
    },
  });

  instance.interceptors.response.use(
    response => response,
    (error: AxiosError) => {
      const status = error.response?.status;
      const data = error.response?.data;
      logger.error({ status, data: data ?? error.message }, `Airtable API error${status ? ` (${status})` : ''}`);
      return Promise.reject(error);
    }
  );

  return instance;
}

const text = z.string().catch('');

const attachmentSchema = z
  .object({
    filename: z.string().optional().catch(undefined),
    url: z.string().optional().catch(undefined),
    type: z.string().optional().catch(undefined),
    size: z.number().optional().catch(undefined),
  })
  .passthrough();

// Rows come back exactly as Airtable stores them; every field is optional.
const recordSchema = z.object({
  id: text,
  fields: z
    .object({
      Title: text,
      SentBy: text,
      SentTime: text,
      Description: text,
      Attachments: z.array(attachmentSchema.catch({})).catch([]),
    })
    .catch({ Title: '', SentBy: '', SentTime: '', Description: '', Attachments: [] }),
});

export function toAnnouncement(row: unknown): Announcement {
  const parsed = recordSchema.safeParse(row);
  if (!parsed.success) {
    return { id: '', title: '', sender: '', sentAt: '', description: '', attachments: [] };
  }
  const { id, fields } = parsed.data;
  const attachments: AnnouncementAttachment[] = fields.Attachments;
  return {
    id,
    title: fields.Title,
    sender: fields.SentBy,
    sentAt: fields.SentTime,
    description: fields.Description,
    attachments,
  };
}

/** Airtable formula selecting SentTime within whole days, both ends inclusive. */
export function dateRangeFormula(start: string, end: string): string {
  return `AND(NOT(IS_BEFORE({SentTime}, '${start}T00:00:00.000Z')), NOT(IS_AFTER({SentTime}, '${end}T23:59:59.999Z')))`;
}

const DAY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Announcement store backed by an Airtable table. Rows are requested newest
 * first (sorted on SentTime) and normalised into {@link Announcement}s.
 */
export class AirtableAnnouncementStore implements AnnouncementStore {
  private readonly axiosInstance: AxiosInstance;
  private readonly tablePath: string;

  constructor(axiosInstance: AxiosInstance, tableName: string) {
    this.axiosInstance = axiosInstance;
    this.tablePath = `/${encodeURIComponent(tableName)}`;
  }

  static fromConfig(config: SchoolConfig['airtable']): AirtableAnnouncementStore {
    return new AirtableAnnouncementStore(createAirtableClient(config), config.tableName);
  }

  async fetchAll(): Promise<Announcement[]> {
    logger.info('Fetching all announcements');
    const rows = await this.fetchRows({});
    logger.info(`Retrieved ${rows.length} announcements`);
    return rows;
  }

  async fetchByDateRange(start: string, end: string): Promise<Announcement[]> {
    if (!DAY_PATTERN.test(start) || !DAY_PATTERN.test(end)) {
      throw new Error(`Invalid date range ${start}..${end}: expected YYYY-MM-DD`);
    }
    logger.info(`Filtering announcements from ${start} to ${end}`);
    const rows = await this.fetchRows({ filterByFormula: dateRangeFormula(start, end) });
    logger.info(`Found ${rows.length} announcements in date range`);
    return rows;
  }

  private async fetchRows(params: Record<string, string>): Promise<Announcement[]> {
    try {
      const rows = await fetchAllPages(this.axiosInstance, this.tablePath, {
        params: {
          pageSize: 100,
          'sort[0][field]': 'SentTime',
          'sort[0][direction]': 'desc',
          ...params,
        },
      });
      return rows.map(toAnnouncement);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to fetch announcements: ${message}`);
    }
  }
}
