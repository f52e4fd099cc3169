import {
  addDays,
  endOfMonth,
  format,
  isValid,
  parse,
  parseISO,
  startOfDay,
  startOfWeek,
  subDays,
} from 'date-fns';
import { logger } from '../logger.js';
import { DateRange } from '../types.js';

export const FALLBACK_WINDOW_DAYS = 30;

const DAY_FORMAT = 'yyyy-MM-dd';

const MONTHS = new Map<string, number>([
  ['january', 0], ['february', 1], ['march', 2], ['april', 3], ['may', 4], ['june', 5],
  ['july', 6], ['august', 7], ['september', 8], ['october', 9], ['november', 10], ['december', 11],
  ['jan', 0], ['feb', 1], ['mar', 2], ['apr', 3], ['jun', 5], ['jul', 6],
  ['aug', 7], ['sep', 8], ['sept', 8], ['oct', 9], ['nov', 10], ['dec', 11],
]);

// Literal dates we accept once none of the relative phrases matched. The shape
// check keeps date-fns from reading "24" as the year 24 under a yyyy token.
const LITERAL_DATE_FORMATS: ReadonlyArray<{ shape: RegExp; pattern: string }> = [
  { shape: /^\d{4}-\d{1,2}-\d{1,2}$/, pattern: 'yyyy-M-d' },
  { shape: /^\d{4}\/\d{1,2}\/\d{1,2}$/, pattern: 'yyyy/M/d' },
  { shape: /^\d{1,2}\/\d{1,2}\/\d{4}$/, pattern: 'M/d/yyyy' },
  { shape: /^\d{1,2}\/\d{1,2}\/\d{2}$/, pattern: 'M/d/yy' },
  { shape: /^\d{1,2}\.\d{1,2}\.\d{4}$/, pattern: 'd.M.yyyy' },
];

const ISO_TIMESTAMP = /^(\d{4}-\d{2}-\d{2})[t ]\d{2}:\d{2}/i;

const toDay = (date: Date): string => format(date, DAY_FORMAT);

const singleDay = (date: Date): DateRange => ({ start: toDay(date), end: toDay(date) });

function findMonth(expression: string): number | undefined {
  // Whole words only: "mayor" or "marching" must not select a month
  const words = expression.match(/[a-z]+/g) ?? [];
  for (const word of words) {
    const month = MONTHS.get(word);
    if (month !== undefined) {
      return month;
    }
  }
  return undefined;
}

function findYear(expression: string): number | undefined {
  const match = expression.match(/(?<!\d)20\d{2}(?!\d)/);
  return match ? Number(match[0]) : undefined;
}

function parseLiteralDate(expression: string, today: Date): Date | undefined {
  // A timestamp names the calendar day it was written with, whatever its offset
  const timestamp = expression.match(ISO_TIMESTAMP);
  if (timestamp && isValid(parseISO(expression))) {
    return parseLiteralDate(timestamp[1], today);
  }

  for (const { shape, pattern } of LITERAL_DATE_FORMATS) {
    if (!shape.test(expression)) {
      continue;
    }
    const parsed = parse(expression, pattern, today);
    if (isValid(parsed) && parsed.getFullYear() >= 1000) {
      return parsed;
    }
  }
  return undefined;
}

export function fallbackRange(today: Date): DateRange {
  return { start: toDay(subDays(today, FALLBACK_WINDOW_DAYS)), end: toDay(today) };
}

function resolveOrThrow(expression: string, today: Date): DateRange | undefined {
  const text = expression.toLowerCase().trim();

  if (text.includes('today')) {
    return singleDay(today);
  }
  if (text.includes('yesterday')) {
    return singleDay(subDays(today, 1));
  }
  if (text.includes('this week')) {
    const monday = startOfWeek(today, { weekStartsOn: 1 });
    return { start: toDay(monday), end: toDay(addDays(monday, 6)) };
  }
  if (text.includes('last week')) {
    const monday = subDays(startOfWeek(today, { weekStartsOn: 1 }), 7);
    return { start: toDay(monday), end: toDay(addDays(monday, 6)) };
  }

  const month = findMonth(text);
  if (month !== undefined) {
    const year = findYear(text) ?? today.getFullYear();
    const first = new Date(year, month, 1);
    return { start: toDay(first), end: toDay(endOfMonth(first)) };
  }

  const lastDays = text.match(/last (\d+) days?/);
  if (lastDays) {
    const days = Number(lastDays[1]);
    return { start: toDay(subDays(today, days)), end: toDay(today) };
  }

  const literal = parseLiteralDate(expression.trim(), today);
  return literal ? singleDay(literal) : undefined;
}

/**
 * Resolve a natural-language date phrase ("today", "last week", "in May 2024",
 * "last 10 days", "2024-05-03") into an inclusive calendar-day range.
 *
 * Never throws. Anything it cannot interpret becomes the last 30 days.
 */
export function resolveDateExpression(expression: string, referenceNow: Date = new Date()): DateRange {
  const today = startOfDay(referenceNow);
  try {
    const range = resolveOrThrow(expression, today);
    if (range) {
      return range;
    }
    logger.warn(`Could not parse date query '${expression}', defaulting to last ${FALLBACK_WINDOW_DAYS} days`);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.warn(`Error parsing date query '${expression}': ${message}; defaulting to last ${FALLBACK_WINDOW_DAYS} days`);
  }
  return fallbackRange(today);
}
