import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';
import { resolveLogLevel } from './logger.js';
import { SchoolConfig, SearchVocabulary } from './types.js';

dotenv.config();

export const DEFAULT_VOCABULARY_FILE = path.resolve(__dirname, '..', 'data', 'search-vocabulary.json');

const REQUIRED_VARIABLES = ['AIRTABLE_API_KEY', 'AIRTABLE_BASE_ID', 'OPENAI_API_KEY'] as const;

const positiveInt = (fallback: number) => z.coerce.number().int().positive().catch(fallback);

const envSchema = z.object({
  AIRTABLE_API_KEY: z.string().default(''),
  AIRTABLE_BASE_ID: z.string().default(''),
  AIRTABLE_TABLE_NAME: z.string().min(1).catch('Announcements'),
  AIRTABLE_BASE_URL: z.string().url().catch('https://api.airtable.com/v0'),
  OPENAI_API_KEY: z.string().default(''),
  OPENAI_MODEL: z.string().min(1).catch('gpt-3.5-turbo'),
  N8N_WEBHOOK_URL: z.string().default(''),
  LOG_LEVEL: z.string().optional(),
  DEFAULT_ANNOUNCEMENT_LIMIT: positiveInt(15),
  MAX_ANNOUNCEMENT_LIMIT: positiveInt(50),
  DEFAULT_EVENT_START_TIME: z.string().regex(/^\d{2}:\d{2}$/).catch('09:00'),
  DEFAULT_EVENT_DURATION_HOURS: positiveInt(1),
  REMINDER_DAYS_BEFORE: positiveInt(3),
  SEARCH_VOCABULARY_FILE: z.string().optional(),
});

const vocabularySchema = z.object({
  stopWords: z.array(z.string()),
  timeIndicators: z.array(z.string()),
});

/**
 * Read the stop-word and time-indicator lists used by search and calendar detection.
 */
export function loadVocabulary(filePath: string = DEFAULT_VOCABULARY_FILE): SearchVocabulary {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to read search vocabulary from ${filePath}: ${message}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid search vocabulary in ${filePath}: ${message}`);
  }

  const parsed = vocabularySchema.safeParse(json);
  if (!parsed.success) {
    throw new Error(`Invalid search vocabulary in ${filePath}: ${parsed.error.message}`);
  }
  return parsed.data;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): SchoolConfig {
  const missing = REQUIRED_VARIABLES.filter(name => !env[name]);
  if (missing.length > 0) {
    throw new Error(
      `Missing required environment variables: ${missing.join(', ')}. ` +
        'Please check your .env file and ensure all required values are set.'
    );
  }

  const vars = envSchema.parse(env);
  const defaultLimit = Math.min(vars.DEFAULT_ANNOUNCEMENT_LIMIT, vars.MAX_ANNOUNCEMENT_LIMIT);

  return {
    airtable: {
      apiKey: vars.AIRTABLE_API_KEY,
      baseId: vars.AIRTABLE_BASE_ID,
      tableName: vars.AIRTABLE_TABLE_NAME,
      baseUrl: vars.AIRTABLE_BASE_URL.replace(/\/+$/, ''),
    },
    openai: {
      apiKey: vars.OPENAI_API_KEY,
      model: vars.OPENAI_MODEL,
    },
    calendar: {
      webhookUrl: vars.N8N_WEBHOOK_URL,
      defaultStartTime: vars.DEFAULT_EVENT_START_TIME,
      defaultDurationHours: vars.DEFAULT_EVENT_DURATION_HOURS,
      reminderDaysBefore: vars.REMINDER_DAYS_BEFORE,
    },
    announcements: {
      defaultLimit,
      maxLimit: vars.MAX_ANNOUNCEMENT_LIMIT,
    },
    vocabulary: loadVocabulary(vars.SEARCH_VOCABULARY_FILE || DEFAULT_VOCABULARY_FILE),
    logLevel: resolveLogLevel(vars.LOG_LEVEL),
  };
}
