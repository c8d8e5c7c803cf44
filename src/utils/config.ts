import type Database from 'better-sqlite3';
import { join } from 'path';
import { DATA_DIR, getDb } from '../db/index.js';
import { CONFIG_KEYS, type AppSettings, type Config, type LlmProviderName } from '../models/config.js';
import { logger } from './logger.js';

// Map config keys to environment variable names
const ENV_KEY_MAP: Record<string, string> = {
  [CONFIG_KEYS.LLM_PROVIDER]: 'LLM_PROVIDER',
  [CONFIG_KEYS.LLM_API_KEY]: 'LLM_API_KEY',
  [CONFIG_KEYS.LLM_BASE_URL]: 'LLM_BASE_URL',
  [CONFIG_KEYS.LLM_MODEL]: 'LLM_MODEL',
  [CONFIG_KEYS.LLM_COMMAND]: 'LLM_COMMAND',
  [CONFIG_KEYS.LANGUAGE]: 'FEEDMIND_LANGUAGE',
  [CONFIG_KEYS.PERSONA]: 'FEEDMIND_PERSONA',
  [CONFIG_KEYS.WORKER_CONCURRENCY]: 'FEEDMIND_WORKERS',
  [CONFIG_KEYS.TASK_TIMEOUT_MS]: 'FEEDMIND_TASK_TIMEOUT_MS',
  [CONFIG_KEYS.EXPORT_DIR]: 'FEEDMIND_EXPORT_DIR',
  [CONFIG_KEYS.NOTION_API_KEY]: 'NOTION_API_KEY',
  [CONFIG_KEYS.NOTION_DATABASE_ID]: 'NOTION_DATABASE_ID',
  [CONFIG_KEYS.NOTION_PARENT_PAGE_ID]: 'NOTION_PARENT_PAGE_ID',
};

// Default values for config keys
const DEFAULT_VALUES: Record<string, string> = {
  [CONFIG_KEYS.LLM_PROVIDER]: 'openai',
  [CONFIG_KEYS.LLM_BASE_URL]: 'https://api.openai.com/v1',
  [CONFIG_KEYS.LLM_COMMAND]: 'claude',
  [CONFIG_KEYS.LANGUAGE]: 'en',
  [CONFIG_KEYS.WORKER_CONCURRENCY]: '3',
  [CONFIG_KEYS.TASK_TIMEOUT_MS]: '60000',
  [CONFIG_KEYS.DIGEST_DAYS]: '7',
  [CONFIG_KEYS.DIGEST_MAX_ARTICLES]: '20',
  [CONFIG_KEYS.NOTION_TAGS_PREFIX]: 'feedmind',
};

const PROVIDERS: readonly LlmProviderName[] = ['openai', 'anthropic', 'cli'];

export function getConfig(key: string, db: Database.Database = getDb()): string | null {
  // Priority: env > db > default
  const envKey = ENV_KEY_MAP[key];
  const envValue = envKey ? process.env[envKey] : undefined;
  if (envValue) {
    return envValue;
  }

  const row = db.prepare<[string], Config>('SELECT key, value FROM config WHERE key = ?').get(key);
  if (row?.value) {
    return row.value;
  }

  return DEFAULT_VALUES[key] ?? null;
}

export function setConfig(key: string, value: string, db: Database.Database = getDb()): void {
  db.prepare(
    'INSERT INTO config (key, value) VALUES (?, ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value'
  ).run(key, value);
}

export function deleteConfig(key: string, db: Database.Database = getDb()): boolean {
  const result = db.prepare('DELETE FROM config WHERE key = ?').run(key);
  return result.changes > 0;
}

export function getAllConfig(db: Database.Database = getDb()): Config[] {
  return db.prepare<[], Config>('SELECT key, value FROM config ORDER BY key').all();
}

function getPositiveInt(key: string, db: Database.Database): number {
  const fallback = Number.parseInt(DEFAULT_VALUES[key] ?? '0', 10);
  const raw = getConfig(key, db);
  const value = raw === null ? Number.NaN : Number.parseInt(raw, 10);
  if (!Number.isInteger(value) || value <= 0) {
    if (raw !== null) {
      logger.warn(`Invalid value for ${key}: "${raw}", using ${fallback}`);
    }
    return fallback;
  }
  return value;
}

function parseProvider(raw: string | null): LlmProviderName {
  const match = PROVIDERS.find((p) => p === raw);
  if (!match) {
    logger.warn(`Unknown llm_provider "${raw ?? ''}", falling back to openai`);
    return 'openai';
  }
  return match;
}

export function loadSettings(db: Database.Database = getDb()): AppSettings {
  return {
    llm: {
      provider: parseProvider(getConfig(CONFIG_KEYS.LLM_PROVIDER, db)),
      apiKey: getConfig(CONFIG_KEYS.LLM_API_KEY, db),
      baseUrl: getConfig(CONFIG_KEYS.LLM_BASE_URL, db) ?? 'https://api.openai.com/v1',
      model: getConfig(CONFIG_KEYS.LLM_MODEL, db),
      command: getConfig(CONFIG_KEYS.LLM_COMMAND, db) ?? 'claude',
    },
    language: getConfig(CONFIG_KEYS.LANGUAGE, db) ?? 'en',
    persona: getConfig(CONFIG_KEYS.PERSONA, db),
    workerConcurrency: getPositiveInt(CONFIG_KEYS.WORKER_CONCURRENCY, db),
    taskTimeoutMs: getPositiveInt(CONFIG_KEYS.TASK_TIMEOUT_MS, db),
    digestDays: getPositiveInt(CONFIG_KEYS.DIGEST_DAYS, db),
    digestMaxArticles: getPositiveInt(CONFIG_KEYS.DIGEST_MAX_ARTICLES, db),
    exportDir: getConfig(CONFIG_KEYS.EXPORT_DIR, db) ?? join(DATA_DIR, 'exports'),
    notion: {
      apiKey: getConfig(CONFIG_KEYS.NOTION_API_KEY, db),
      databaseId: getConfig(CONFIG_KEYS.NOTION_DATABASE_ID, db),
      parentPageId: getConfig(CONFIG_KEYS.NOTION_PARENT_PAGE_ID, db),
      tagsPrefix: getConfig(CONFIG_KEYS.NOTION_TAGS_PREFIX, db) ?? 'feedmind',
    },
  };
}
