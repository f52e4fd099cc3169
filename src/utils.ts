import axios, { AxiosInstance } from 'axios';
import { format, isValid, parseISO } from 'date-fns';
import { z } from 'zod';
import { logger } from './logger.js';

/**
 * Pause execution for a specified number of milliseconds.
 */
export const delay = (ms: number): Promise<void> =>
  new Promise(resolve => setTimeout(resolve, ms));

const apiErrorBody = z.object({
  error: z.union([z.string(), z.object({ type: z.string().optional(), message: z.string().optional() })]),
});

/**
 * Best human-readable message for a failed HTTP call or any other thrown value.
 */
export function describeError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    const body = apiErrorBody.safeParse(error.response?.data);
    if (body.success) {
      const apiError = body.data.error;
      if (typeof apiError === 'string') {
        return apiError;
      }
      return apiError.message || apiError.type || error.message;
    }
    return error.message;
  }
  return error instanceof Error ? error.message : String(error);
}

const pageSchema = z.object({
  records: z.array(z.unknown()).catch([]),
  offset: z.string().optional(),
});

export interface PaginationOptions {
  params?: Record<string, string | number>;
  timeout?: number;
  maxRetries?: number;
  retryDelay?: number;
}

/**
 * Fetch every page of an Airtable list endpoint, following the `offset`
 * cursor until the API stops returning one. Pages that fail with
 * ECONNRESET are retried.
 */
export async function fetchAllPages(
  axiosInstance: AxiosInstance,
  url: string,
  options: PaginationOptions = {}
): Promise<unknown[]> {
  const { params = {}, timeout = 15000, maxRetries = 2, retryDelay = 1000 } = options;
  let results: unknown[] = [];
  let offset: string | undefined;
  let page = 0;

  logger.debug(`Fetching all pages starting from: ${url}`);

  do {
    page += 1;
    for (let attempt = 0; ; attempt++) {
      try {
        const response = await axiosInstance.get<unknown>(url, {
          params: offset ? { ...params, offset } : params,
          timeout,
        });
        const body = pageSchema.parse(response.data ?? {});
        results = results.concat(body.records);
        offset = body.offset;
        if (offset) {
          logger.debug(`Found next page offset: ${offset}`);
        }
        break;
      } catch (error: unknown) {
        if (axios.isAxiosError(error) && error.code === 'ECONNRESET' && attempt < maxRetries) {
          logger.warn(`ECONNRESET fetching page ${page} of ${url} (attempt ${attempt + 1}/${maxRetries + 1}), retrying`);
          await delay(retryDelay);
          continue;
        }
        throw new Error(`Failed during pagination at ${url} (page ${page}): ${describeError(error)}`);
      }
    }
  } while (offset);

  logger.debug(`Finished fetching all pages. Total items: ${results.length}`);
  return results;
}

/**
 * Bound a requested result count to [0, max]; missing or non-numeric values
 * take the fallback.
 */
export function clampLimit(limit: number | undefined, max: number, fallback: number): number {
  const requested = typeof limit === 'number' && Number.isFinite(limit) ? Math.floor(limit) : fallback;
  return Math.min(Math.max(requested, 0), Math.max(max, 0));
}

export function truncate(text: string, maxLength: number, suffix = '...'): string {
  return text.length > maxLength ? `${text.substring(0, maxLength)}${suffix}` : text;
}

/**
 * Render a stored timestamp as "May 5, 2024" using its UTC calendar day.
 * Values that are not ISO timestamps are returned unchanged.
 */
export function formatSentTime(sentAt: string): string {
  if (!sentAt) {
    return 'Unknown date';
  }
  const parsed = parseISO(sentAt);
  if (!isValid(parsed)) {
    return sentAt;
  }
  return format(new Date(parsed.getUTCFullYear(), parsed.getUTCMonth(), parsed.getUTCDate()), 'MMMM d, yyyy');
}
