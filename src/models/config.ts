export interface Config {
  key: string;
  value: string;
}

export const CONFIG_KEYS = {
  LLM_PROVIDER: 'llm_provider',
  LLM_API_KEY: 'llm_api_key',
  LLM_BASE_URL: 'llm_base_url',
  LLM_MODEL: 'llm_model',
  LLM_COMMAND: 'llm_command',
  LANGUAGE: 'language',
  PERSONA: 'persona',
  WORKER_CONCURRENCY: 'worker_concurrency',
  TASK_TIMEOUT_MS: 'task_timeout_ms',
  DIGEST_DAYS: 'digest_days',
  DIGEST_MAX_ARTICLES: 'digest_max_articles',
  EXPORT_DIR: 'export_dir',
  NOTION_API_KEY: 'notion_api_key',
  NOTION_DATABASE_ID: 'notion_database_id',
  NOTION_PARENT_PAGE_ID: 'notion_parent_page_id',
  NOTION_TAGS_PREFIX: 'notion_tags_prefix',
} as const;

export type ConfigKey = (typeof CONFIG_KEYS)[keyof typeof CONFIG_KEYS];

export type LlmProviderName = 'openai' | 'anthropic' | 'cli';

export interface NotionSettings {
  apiKey: string | null;
  /** Pages become rows of this database when set. */
  databaseId: string | null;
  parentPageId: string | null;
  tagsPrefix: string;
}

export interface AppSettings {
  llm: {
    provider: LlmProviderName;
    apiKey: string | null;
    baseUrl: string;
    model: string | null;
    command: string;
  };
  language: string;
  persona: string | null;
  workerConcurrency: number;
  taskTimeoutMs: number;
  digestDays: number;
  digestMaxArticles: number;
  exportDir: string;
  notion: NotionSettings;
}
