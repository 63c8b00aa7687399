/**
 * Application configuration
 *
 * Reads `.env` (via dotenv) and validates `process.env` into a typed config.
 * Pipeline defaults are kept small: every region job holds its own browser.
 */

import { config as loadDotenv } from 'dotenv';
import path from 'node:path';
import { z } from 'zod';
import { ConfigurationError } from './errors';

const booleanFromEnv = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  AI_API_KEY: z.string().default(''),
  AI_BASE_URL: z.string().url().default('https://openrouter.ai/api/v1'),
  AI_MODEL: z.string().min(1).default('anthropic/claude-haiku-4.5'),

  GOOGLE_SHEETS_ID: z.string().default(''),
  GOOGLE_SHEETS_NAME: z.string().min(1).default('営業リスト'),
  GOOGLE_SHEETS_CREDENTIALS: z.string().default(''),

  REDIS_URL: z.string().optional(),
  SETTINGS_PATH: z.string().optional(),

  SCRAPER_HEADLESS: booleanFromEnv.default('true'),
  SCRAPER_LOCALE: z.string().default('ja-JP'),
  SCRAPER_MAX_RESULTS: z.coerce.number().int().min(1).max(200).default(50),
  SCRAPER_NAVIGATION_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),

  MAX_PARALLEL_REGIONS: z.coerce.number().int().min(1).max(8).default(2),
  MAX_REGIONS_PER_RUN: z.coerce.number().int().min(1).default(10),
  VERIFY_CONCURRENCY: z.coerce.number().int().min(1).max(8).default(2),
  VERIFY_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  VERIFY_MAX_RETRIES: z.coerce.number().int().min(0).max(5).default(2),
  RUN_TIMEOUT_MS: z.coerce.number().int().positive().default(15 * 60 * 1000),
});

export interface AppConfig {
  ai: {
    apiKey: string;
    baseURL: string;
    model: string;
  };
  sheets: {
    spreadsheetId: string;
    sheetName: string;
    credentials: string;
  };
  redisUrl?: string;
  settingsPath: string;
  scraper: {
    headless: boolean;
    locale: string;
    maxResults: number;
    navigationTimeoutMs: number;
  };
  run: {
    maxParallelRegions: number;
    maxRegionsPerRun: number;
    timeoutMs: number;
  };
  verifier: {
    concurrency: number;
    timeoutMs: number;
    maxRetries: number;
  };
}

/**
 * Parse an environment map into the app config. Pure: does not touch process.env.
 */
export function loadConfig(env: Record<string, string | undefined>): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError('Invalid environment configuration', { issues });
  }
  const e = parsed.data;

  return {
    ai: {
      apiKey: e.AI_API_KEY,
      baseURL: e.AI_BASE_URL,
      model: e.AI_MODEL,
    },
    sheets: {
      spreadsheetId: e.GOOGLE_SHEETS_ID,
      sheetName: e.GOOGLE_SHEETS_NAME,
      credentials: e.GOOGLE_SHEETS_CREDENTIALS,
    },
    redisUrl: e.REDIS_URL || undefined,
    settingsPath: e.SETTINGS_PATH || path.join(process.cwd(), 'config', 'settings.json'),
    scraper: {
      headless: e.SCRAPER_HEADLESS,
      locale: e.SCRAPER_LOCALE,
      maxResults: e.SCRAPER_MAX_RESULTS,
      navigationTimeoutMs: e.SCRAPER_NAVIGATION_TIMEOUT_MS,
    },
    run: {
      maxParallelRegions: e.MAX_PARALLEL_REGIONS,
      maxRegionsPerRun: e.MAX_REGIONS_PER_RUN,
      timeoutMs: e.RUN_TIMEOUT_MS,
    },
    verifier: {
      concurrency: e.VERIFY_CONCURRENCY,
      timeoutMs: e.VERIFY_TIMEOUT_MS,
      maxRetries: e.VERIFY_MAX_RETRIES,
    },
  };
}

let cachedConfig: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!cachedConfig) {
    loadDotenv();
    cachedConfig = loadConfig(process.env);
  }
  return cachedConfig;
}

/**
 * Fail fast when a non-preview run is requested without a destination sheet.
 */
export function assertSheetsConfigured(config: AppConfig): void {
  const missing: string[] = [];
  if (!config.sheets.spreadsheetId) missing.push('GOOGLE_SHEETS_ID');
  if (!config.sheets.credentials) missing.push('GOOGLE_SHEETS_CREDENTIALS');

  if (missing.length > 0) {
    throw new ConfigurationError('Google Sheets configuration is incomplete', { missing });
  }
}
