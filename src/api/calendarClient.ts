import axios, { AxiosInstance } from 'axios';
import { addDays, addHours, format, isValid, parse } from 'date-fns';
import { logger } from '../logger.js';
import {
  CalendarEventPayload,
  CalendarEventRequest,
  CalendarEventResult,
  EventKind,
} from '../types.js';
import { describeError } from '../utils.js';

const CLOCK_TIME_PATTERN = /\b\d{1,2}:\d{2}\s*(am|pm|a\.m\.|p\.m\.)(?![a-z])/;
const DAY_FORMAT = 'yyyy-MM-dd';
const DATETIME_FORMAT = "yyyy-MM-dd'T'HH:mm:ss";

const ID_FIELDS = ['id', 'event_id', 'eventId', 'calendar_event_id', 'google_event_id'];
const ID_TEXT_PATTERNS = [
  /event\s+id[:\s]+([a-zA-Z0-9_-]+)/i,
  /id[:\s]+([a-zA-Z0-9_-]+)/i,
  /created\s+event[:\s]+([a-zA-Z0-9_-]+)/i,
];

const escapeRegExp = (value: string) => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

function idFromObject(value: Record<string, unknown>): string | null {
  for (const field of ID_FIELDS) {
    const candidate = value[field];
    if (typeof candidate === 'string' || typeof candidate === 'number') {
      if (String(candidate)) {
        return String(candidate);
      }
    }
  }
  return null;
}

/**
 * Find the calendar event id in whatever the webhook answered with: a plain
 * string ("Created event: abc123") or an object carrying one of the usual id
 * fields at the top level or one level down.
 */
export function extractEventId(response: unknown): string | null {
  if (!response) {
    return null;
  }
  if (typeof response === 'string') {
    for (const pattern of ID_TEXT_PATTERNS) {
      const match = response.match(pattern);
      if (match) {
        return match[1];
      }
    }
    return null;
  }
  if (!isRecord(response)) {
    return null;
  }
  const topLevel = idFromObject(response);
  if (topLevel) {
    return topLevel;
  }
  for (const value of Object.values(response)) {
    if (isRecord(value)) {
      const nested = idFromObject(value);
      if (nested) {
        return nested;
      }
    }
  }
  return null;
}

export interface CalendarClientOptions {
  webhookUrl: string;
  timeIndicators: readonly string[];
  defaultStartTime?: string;
  defaultDurationHours?: number;
  http?: AxiosInstance;
}

/**
 * Creates Google Calendar events through an n8n webhook. Failures are reported
 * in the returned result rather than thrown.
 */
export class CalendarClient {
  private readonly webhookUrl: string;
  private readonly indicatorPatterns: RegExp[];
  private readonly defaultStartTime: string;
  private readonly defaultDurationHours: number;
  private readonly http: AxiosInstance;

  constructor(options: CalendarClientOptions) {
    this.webhookUrl = options.webhookUrl;
    this.defaultStartTime = options.defaultStartTime ?? '09:00';
    this.defaultDurationHours = options.defaultDurationHours ?? 1;
    this.http = options.http ?? axios.create();
    this.indicatorPatterns = options.timeIndicators
      .map(indicator => indicator.trim().toLowerCase())
      .filter(indicator => indicator.length > 0)
      .map(indicator => new RegExp(`(^|[^a-z])${escapeRegExp(indicator)}(?![a-z])`));
  }

  /**
   * True when the text reads like an all-day event: no clock time and none of
   * the configured time indicators as a whole word.
   */
  detectAllDay(title: string, description = ''): boolean {
    const combined = `${title} ${description}`.toLowerCase();
    if (CLOCK_TIME_PATTERN.test(combined)) {
      logger.debug(`Found specific time pattern in: ${title}`);
      return false;
    }
    if (this.indicatorPatterns.some(pattern => pattern.test(combined))) {
      logger.debug(`Found time indicator in: ${title}`);
      return false;
    }
    return true;
  }

  formatEventData(request: CalendarEventRequest): CalendarEventPayload {
    const { title, date, description = '', location = '' } = request;
    const eventDate = parse(date, DAY_FORMAT, new Date());
    if (!isValid(eventDate)) {
      throw new Error(`Invalid date '${date}', expected YYYY-MM-DD`);
    }
    const allDay = request.allDay ?? this.detectAllDay(title, description);
    const base = { action: 'create_event' as const, title, description, location, all_day: allDay };

    if (allDay) {
      const nextDay = addDays(eventDate, 1);
      return {
        ...base,
        start_date: format(eventDate, DAY_FORMAT),
        end_date: format(nextDay, DAY_FORMAT),
        start_datetime: format(eventDate, DATETIME_FORMAT),
        end_datetime: format(nextDay, DATETIME_FORMAT),
      };
    }

    const startTime = request.startTime ?? this.defaultStartTime;
    const start = parse(`${date} ${startTime}`, 'yyyy-MM-dd HH:mm', new Date());
    if (!isValid(start)) {
      throw new Error(`Invalid start time '${startTime}', expected HH:MM`);
    }
    const end = addHours(start, request.durationHours ?? this.defaultDurationHours);
    return {
      ...base,
      start_date: format(eventDate, DAY_FORMAT),
      end_date: format(eventDate, DAY_FORMAT),
      start_datetime: format(start, DATETIME_FORMAT),
      end_datetime: format(end, DATETIME_FORMAT),
    };
  }

  async createEvent(request: CalendarEventRequest): Promise<CalendarEventResult> {
    const { title, date } = request;
    try {
      if (!this.webhookUrl) {
        throw new Error('No webhook URL configured for calendar integration');
      }
      const payload = this.formatEventData(request);
      logger.info(`Creating calendar event: ${title} on ${date}`);

      const response = await this.http.post<unknown>(this.webhookUrl, payload, {
        headers: { 'Content-Type': 'application/json' },
        timeout: 30000,
      });
      const eventId = extractEventId(response.data);
      const eventType: EventKind = payload.all_day ? 'all-day' : 'timed';

      logger.info(`Calendar event created successfully: ${title} (ID: ${eventId})`);
      return {
        success: true,
        message: `Successfully created calendar event: ${title}`,
        eventId,
        eventType,
        webhookResponse: response.data,
      };
    } catch (error) {
      const verb = axios.isAxiosError(error) ? 'Failed to create' : 'Error creating';
      const message = `${verb} calendar event '${title}': ${describeError(error)}`;
      logger.error(message);
      return { success: false, message, eventId: null };
    }
  }

  /** Reminders are always all-day events titled "REMINDER: <title>". */
  async createReminder(
    title: string,
    reminderDate: string,
    mainEventDate: string,
    description: string
  ): Promise<CalendarEventResult> {
    logger.info(`Creating reminder: REMINDER: ${title} on ${reminderDate}`);
    const result = await this.createEvent({
      title: `REMINDER: ${title}`,
      date: reminderDate,
      description: `${description}\n\nMain event date: ${mainEventDate}`,
      allDay: true,
    });
    if (result.success) {
      result.message = `Successfully created reminder: ${title}`;
    }
    return result;
  }
}
