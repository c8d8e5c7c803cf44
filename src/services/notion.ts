import { APIErrorCode, Client, ClientErrorCode, isNotionClientError } from '@notionhq/client';
import type { ArticleWithFeed } from '../models/article.js';
import type { Bookmark } from '../models/bookmark.js';
import type { NotionSettings } from '../models/config.js';
import type { DigestArtifact } from '../models/digest.js';
import { articleDate } from './export.js';
import { TaskFailure, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const log = logger.scope('Notion');

// Notion 单段 rich_text 上限
const TEXT_LIMIT = 2000;
const SOURCE = 'feedmind';

export type CreatePageParameters = Parameters<Client['pages']['create']>[0];
export type NotionBlock = NonNullable<CreatePageParameters['children']>[number];
type PageProperties = CreatePageParameters['properties'];
type ClientFetch = NonNullable<ConstructorParameters<typeof Client>[0]>['fetch'];

interface TextItem {
  type: 'text';
  text: { content: string };
}

/** The part of the Notion client the exporter calls. */
export interface NotionApi {
  pages: {
    create(params: CreatePageParameters): Promise<{ id: string }>;
    retrieve(params: { page_id: string }): Promise<{ id: string }>;
  };
  databases: {
    retrieve(params: { database_id: string }): Promise<{ id: string }>;
  };
}

/** Where pages go: rows of a database, or child pages of a parent page. */
export interface NotionTarget {
  databaseId: string | null;
  parentPageId: string | null;
  tagsPrefix: string;
}

export interface NotionSaveResult {
  pageId: string;
  title: string;
}

export function createNotionClient(apiKey: string, timeoutMs: number, fetch?: ClientFetch): Client {
  return new Client({
    auth: apiKey,
    timeoutMs,
    fetch,
    logger: (level, message) => log.debug(`${level}: ${message}`),
  });
}

export function richText(text: string): TextItem[] {
  if (!text) return [{ type: 'text', text: { content: '' } }];
  const items: TextItem[] = [];
  for (let i = 0; i < text.length; i += TEXT_LIMIT) {
    items.push({ type: 'text', text: { content: text.slice(i, i + TEXT_LIMIT) } });
  }
  return items;
}

function paragraph(text: string): NotionBlock {
  return { object: 'block', type: 'paragraph', paragraph: { rich_text: richText(text) } };
}

function heading(text: string, level: 1 | 2): NotionBlock {
  return level === 1
    ? { object: 'block', type: 'heading_1', heading_1: { rich_text: richText(text) } }
    : { object: 'block', type: 'heading_2', heading_2: { rich_text: richText(text) } };
}

const DIVIDER: NotionBlock = { object: 'block', type: 'divider', divider: {} };

function parent(target: NotionTarget): CreatePageParameters['parent'] {
  if (target.databaseId) return { database_id: target.databaseId };
  if (target.parentPageId) return { page_id: target.parentPageId };
  throw new TaskFailure('unavailable', 'Set notion_database_id or notion_parent_page_id');
}

function pageProperties(title: string): PageProperties {
  return { title: { title: richText(title) } };
}

function databaseProperties(target: NotionTarget, title: string, date: string, tags: readonly string[]) {
  const prefix = target.tagsPrefix;
  return {
    Name: { title: richText(title) },
    Date: { date: { start: date } },
    Source: { rich_text: richText(SOURCE) },
    Tags: { multi_select: [prefix, ...tags.map((tag) => `${prefix}/${tag}`)].map((name) => ({ name })) },
  };
}

export function buildArticlePage(
  article: ArticleWithFeed,
  bookmark: Bookmark | null,
  target: NotionTarget,
  today: string
): CreatePageParameters {
  const children: NotionBlock[] = [heading('Summary', 2), paragraph(article.description || '(no description)')];

  if (article.insight) {
    children.push(heading('Insight', 2), paragraph(article.insight));
  }

  if (article.translated_title || article.translated_description || article.translated_body) {
    children.push(heading('Translation', 2));
    if (article.translated_title) children.push(paragraph(`Title: ${article.translated_title}`));
    if (article.translated_description) children.push(paragraph(`Description: ${article.translated_description}`));
    if (article.translated_body) children.push(paragraph(article.translated_body));
  }

  children.push(
    heading('Memo', 2),
    paragraph(bookmark?.memo || '(no memo)'),
    DIVIDER,
    paragraph(`Saved from ${SOURCE} on ${today}`),
    paragraph(`Original: ${article.link}`)
  );

  return {
    parent: parent(target),
    properties: target.databaseId
      ? {
          ...databaseProperties(target, article.title, articleDate(article), bookmark?.tags ?? []),
          URL: { url: article.link },
          Feed: { rich_text: richText(article.feed_name) },
        }
      : pageProperties(article.title),
    children,
  };
}

export function buildDigestPage(digest: DigestArtifact, target: NotionTarget, today: string): CreatePageParameters {
  const title = `Digest ${digest.scope_key} ${today}`;
  const children: NotionBlock[] = [
    heading(`Digest (${today})`, 1),
    paragraph(`${digest.article_count} articles in ${digest.scope_key}`),
  ];
  for (const block of digest.text.split('\n\n')) {
    const text = block.trim();
    if (text) children.push(paragraph(text));
  }
  children.push(DIVIDER, paragraph(`Generated by ${SOURCE} on ${today}`));

  return {
    parent: parent(target),
    properties: target.databaseId ? databaseProperties(target, title, today, ['digest']) : pageProperties(title),
    children,
  };
}

export function classifyNotionError(error: unknown): TaskFailure {
  if (error instanceof TaskFailure) return error;
  const options = { cause: error };
  if (isNotionClientError(error)) {
    switch (error.code) {
      case ClientErrorCode.RequestTimeout:
        return new TaskFailure('timeout', error.message, options);
      case APIErrorCode.Unauthorized:
      case APIErrorCode.RestrictedResource:
        return new TaskFailure('auth', error.message, options);
      case APIErrorCode.RateLimited:
        return new TaskFailure('rate_limited', error.message, options);
      case APIErrorCode.InternalServerError:
      case APIErrorCode.ServiceUnavailable:
        return new TaskFailure('server', error.message, options);
      case APIErrorCode.ObjectNotFound:
        return new TaskFailure('unavailable', error.message, options);
      default:
        return new TaskFailure('bad_response', error.message, options);
    }
  }
  // node-fetch 的网络错误名为 FetchError
  if (error instanceof Error && (error.name === 'FetchError' || error instanceof TypeError)) {
    return new TaskFailure('network', error.message, options);
  }
  return new TaskFailure('error', errorMessage(error), options);
}

/** Saves articles and digests as Notion pages. */
export class NotionExporter {
  constructor(
    private readonly api: NotionApi,
    private readonly target: NotionTarget,
    private readonly today: () => string = () => new Date().toISOString().slice(0, 10)
  ) {}

  static fromSettings(settings: NotionSettings, timeoutMs: number): NotionExporter {
    if (!settings.apiKey) {
      throw new TaskFailure('unavailable', 'NOTION_API_KEY not set');
    }
    return new NotionExporter(createNotionClient(settings.apiKey, timeoutMs), settings);
  }

  async saveArticle(article: ArticleWithFeed, bookmark: Bookmark | null): Promise<NotionSaveResult> {
    return this.create(buildArticlePage(article, bookmark, this.target, this.today()), article.title);
  }

  async saveDigest(digest: DigestArtifact): Promise<NotionSaveResult> {
    const today = this.today();
    return this.create(buildDigestPage(digest, this.target, today), `Digest ${digest.scope_key} ${today}`);
  }

  /** Fetches the configured database or parent page to confirm access. */
  async check(): Promise<string> {
    try {
      if (this.target.databaseId) {
        return (await this.api.databases.retrieve({ database_id: this.target.databaseId })).id;
      }
      if (this.target.parentPageId) {
        return (await this.api.pages.retrieve({ page_id: this.target.parentPageId })).id;
      }
    } catch (error) {
      throw classifyNotionError(error);
    }
    throw new TaskFailure('unavailable', 'Set notion_database_id or notion_parent_page_id');
  }

  private async create(params: CreatePageParameters, title: string): Promise<NotionSaveResult> {
    try {
      const page = await this.api.pages.create(params);
      log.debug(`Created page ${page.id} for "${title}"`);
      return { pageId: page.id, title };
    } catch (error) {
      throw classifyNotionError(error);
    }
  }
}
