import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { ConnectionPool } from '../../db/index.js';
import type { ArticleInput } from '../../models/article.js';
import type { AppSettings } from '../../models/config.js';
import type { Feed } from '../../models/feed.js';
import type { CreatePageParameters, NotionApi } from '../notion.js';
import type { AiProvider, GenerateOptions } from '../providers.js';
import type { FeedSource } from '../workbench.js';

export interface TempPool {
  pool: ConnectionPool;
  dir: string;
  cleanup(): void;
}

export function tempPool(): TempPool {
  const dir = mkdtempSync(join(tmpdir(), 'feedmind-test-'));
  const pool = new ConnectionPool(join(dir, 'test.db'));
  return {
    pool,
    dir,
    cleanup: () => {
      pool.close();
      rmSync(dir, { recursive: true, force: true });
    },
  };
}

/** A clock that advances one second on every read, so timestamps never tie. */
export function tickingClock(start = '2026-03-10T00:00:00.000Z'): () => string {
  let time = Date.parse(start);
  return () => {
    const value = new Date(time).toISOString();
    time += 1000;
    return value;
  };
}

export function testSettings(overrides: Partial<AppSettings> = {}): AppSettings {
  return {
    llm: { provider: 'openai', apiKey: 'test-secret', baseUrl: 'http://localhost:0/v1', model: 'test-model', command: 'true' },
    language: 'en',
    persona: null,
    workerConcurrency: 2,
    taskTimeoutMs: 1000,
    digestDays: 7,
    digestMaxArticles: 20,
    exportDir: join(tmpdir(), 'feedmind-export-unused'),
    notion: { apiKey: null, databaseId: null, parentPageId: null, tagsPrefix: 'feedmind' },
    ...overrides,
  };
}

export type Responder = (prompt: string, call: number, options: GenerateOptions) => Promise<string> | string;

export class FakeProvider implements AiProvider {
  readonly name = 'fake';
  readonly prompts: string[] = [];

  constructor(private readonly respond: Responder = (_prompt, call) => `response-${call}`) {}

  get calls(): number {
    return this.prompts.length;
  }

  isAvailable(): boolean {
    return true;
  }

  async generate(prompt: string, options: GenerateOptions): Promise<string> {
    this.prompts.push(prompt);
    return this.respond(prompt, this.prompts.length, options);
  }
}

/** Serves the same items on every fetch, like a feed that has not changed. */
export class StaticFeedSource implements FeedSource {
  fetches = 0;

  constructor(private readonly items: Omit<ArticleInput, 'feed_id'>[]) {}

  async fetchFeed(feed: Feed): Promise<ArticleInput[]> {
    this.fetches++;
    return this.items.map((item) => ({ ...item, feed_id: feed.id }));
  }
}

/** Records created pages and hands out sequential page ids. */
export class FakeNotion implements NotionApi {
  readonly created: CreatePageParameters[] = [];
  readonly retrieved: string[] = [];

  constructor(private readonly onCreate: (params: CreatePageParameters) => void = () => undefined) {}

  readonly pages = {
    create: async (params: CreatePageParameters): Promise<{ id: string }> => {
      this.onCreate(params);
      this.created.push(params);
      return { id: `page-${this.created.length}` };
    },
    retrieve: async ({ page_id }: { page_id: string }): Promise<{ id: string }> => {
      this.retrieved.push(`page:${page_id}`);
      return { id: page_id };
    },
  };

  readonly databases = {
    retrieve: async ({ database_id }: { database_id: string }): Promise<{ id: string }> => {
      this.retrieved.push(`database:${database_id}`);
      return { id: database_id };
    },
  };
}

export function sampleItems(count: number): Omit<ArticleInput, 'feed_id'>[] {
  return Array.from({ length: count }, (_, i) => ({
    guid: `https://example.com/posts/${i + 1}`,
    title: `Post ${i + 1}`,
    link: `https://example.com/posts/${i + 1}`,
    description: `Description of post ${i + 1}`,
    published_at: `2026-03-0${i + 1}T12:00:00.000Z`,
  }));
}

export function never<T>(): Promise<T> {
  return new Promise<T>(() => undefined);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
