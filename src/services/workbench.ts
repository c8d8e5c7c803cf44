import type { ArticleFilter, ArticleInput, ArticleTranslation, ArticleWithFeed } from '../models/article.js';
import type { BookmarkedArticle, TagCount } from '../models/bookmark.js';
import type { AppSettings } from '../models/config.js';
import { digestScopeKey, type DigestResult, type DigestScope } from '../models/digest.js';
import { eventKey, type AppEvent } from '../models/event.js';
import type { Feed, FeedInput, FeedWithCount } from '../models/feed.js';
import type { TaskContext, TaskHandle } from '../models/task.js';
import type { ConnectionPool } from '../db/index.js';
import { ArtifactCache } from './artifact-cache.js';
import { EventBridge } from './events.js';
import { LlmService, assertTranslatable } from './llm.js';
import { NotionExporter, type NotionApi, type NotionSaveResult } from './notion.js';
import { createProvider, type AiProvider } from './providers.js';
import { fetchArticleText, type ExtractedArticle } from './reader.js';
import { rssService } from './rss.js';
import { ArticleStore } from './store.js';
import { TaskCoordinator } from './tasks.js';
import { StorageFault, TaskFailure, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const log = logger.scope('Workbench');

export interface TextArtifact {
  text: string;
  fromCache: boolean;
}

export interface TranslationArtifact {
  translation: ArticleTranslation;
  fromCache: boolean;
}

export interface RefreshSummary {
  feedId: number;
  feedName: string;
  fetched: number;
  newCount: number;
  error?: string;
}

export type TaskResults = {
  insight: TextArtifact;
  translation: TranslationArtifact;
  body: TextArtifact;
  digest: DigestResult;
  refresh: RefreshSummary[];
  notion: NotionSaveResult;
};

export interface FeedSource {
  fetchFeed(feed: Feed): Promise<ArticleInput[]>;
}

export type PageReader = (url: string) => Promise<ExtractedArticle | null>;

export interface WorkbenchOptions {
  pool: ConnectionPool;
  settings: AppSettings;
  provider?: AiProvider;
  feeds?: FeedSource;
  reader?: PageReader;
  /** Notion client; built from `settings.notion` on first use when omitted. */
  notion?: NotionApi;
  now?: () => string;
}

export interface RequestOptions {
  /** Regenerate even when a current artifact exists. */
  force?: boolean;
}

export interface ImportResult {
  added: Feed[];
  skipped: number;
  invalidated: number;
}

interface Session {
  store: ArticleStore;
  cache: ArtifactCache;
}

/**
 * The surface the CLI talks to. Queries and mutations run on the primary
 * connection; AI and refresh work is submitted to the coordinator and runs
 * on per-lane connections. Every state change is published on `events`.
 */
export class Workbench {
  readonly store: ArticleStore;
  readonly cache: ArtifactCache;
  /** Buffers every event until a consumer attaches; long-lived callers should attach one early. */
  readonly events = new EventBridge<AppEvent>(eventKey);
  readonly tasks: TaskCoordinator<TaskResults>;
  readonly llm: LlmService;

  readonly settings: AppSettings;

  private readonly pool: ConnectionPool;
  private readonly sessions = new Map<number, Session>();
  private readonly feedSource: FeedSource;
  private readonly reader: PageReader;
  private readonly notionApi?: NotionApi;
  private notion: NotionExporter | null = null;
  private readonly now?: () => string;

  constructor(options: WorkbenchOptions) {
    const { pool, settings } = options;
    this.pool = pool;
    this.settings = settings;
    this.now = options.now;
    this.store = new ArticleStore(pool.primary, { now: this.now });
    this.cache = new ArtifactCache(pool.primary, { now: this.now });
    this.feedSource = options.feeds ?? rssService;
    this.reader = options.reader ?? fetchArticleText;
    this.notionApi = options.notion;
    this.llm = new LlmService(options.provider ?? createProvider(settings.llm), {
      persona: settings.persona,
      timeoutMs: settings.taskTimeoutMs,
    });
    this.tasks = new TaskCoordinator<TaskResults>({
      concurrency: settings.workerConcurrency,
      timeoutMs: settings.taskTimeoutMs,
      notify: (event) => this.events.publish(event),
    });
  }

  // Queries
  articles(filter: ArticleFilter = {}): ArticleWithFeed[] {
    return this.store.listArticles(filter);
  }

  article(id: string): ArticleWithFeed | null {
    return this.store.getArticle(id);
  }

  bookmarks(): BookmarkedArticle[] {
    return this.store.listBookmarks();
  }

  tags(): TagCount[] {
    return this.store.listTags();
  }

  feeds(): FeedWithCount[] {
    return this.store.listFeeds();
  }

  // Mutations
  toggleBookmark(articleId: string): boolean {
    const bookmarked = this.store.toggleBookmark(articleId);
    this.events.publish({ type: 'bookmark', id: articleId, change: bookmarked ? 'added' : 'removed' });
    return bookmarked;
  }

  setTags(articleId: string, tags: readonly string[]): string[] {
    const stored = this.store.setTags(articleId, tags);
    this.events.publish({ type: 'bookmark', id: articleId, change: 'tags' });
    return stored;
  }

  setMemo(articleId: string, memo: string | null): void {
    this.store.setMemo(articleId, memo);
    this.events.publish({ type: 'bookmark', id: articleId, change: 'memo' });
  }

  setRead(articleId: string, read = true): void {
    this.store.setRead(articleId, read);
    this.events.publish({ type: 'article', id: articleId, change: 'read' });
  }

  addFeed(input: FeedInput): Feed {
    const feed = this.store.addFeed(input);
    this.events.publish({ type: 'feed', id: feed.id, change: 'added' });
    return feed;
  }

  removeFeed(id: number): boolean {
    const removed = this.store.removeFeed(id);
    if (removed) {
      this.events.publish({ type: 'feed', id, change: 'removed' });
    }
    return removed;
  }

  /** Adds feeds not yet subscribed, then drops every cached digest. */
  importOpml(feeds: readonly FeedInput[]): ImportResult {
    const added: Feed[] = [];
    let skipped = 0;
    for (const input of feeds) {
      if (this.store.getFeedByUrl(input.url)) {
        skipped++;
        continue;
      }
      added.push(this.addFeed(input));
    }
    const invalidated = this.cache.invalidateAll();
    this.events.publish({ type: 'cache', change: 'invalidated', count: invalidated });
    log.debug(`OPML import: ${added.length} added, ${skipped} skipped, ${invalidated} digests dropped`);
    return { added, skipped, invalidated };
  }

  // Requests
  requestInsight(articleId: string, options: RequestOptions = {}): TaskHandle<TextArtifact> {
    const lang = this.settings.language;
    return this.tasks.submit('insight', articleId, {
      run: async (ctx) => {
        const article = this.requireArticle(ctx, articleId);
        if (!options.force && article.insight && article.insight_lang === lang) {
          return { text: article.insight, fromCache: true };
        }
        const text = await this.llm.generateInsight(article, { lang, signal: ctx.signal });
        return { text, fromCache: false };
      },
      commit: (value, ctx) => {
        if (value.fromCache) return;
        this.session(ctx.lane).store.writeInsight(articleId, value.text, lang);
        this.events.publish({ type: 'article', id: articleId, change: 'insight' });
      },
    });
  }

  requestTranslation(articleId: string, options: RequestOptions = {}): TaskHandle<TranslationArtifact> {
    const lang = this.settings.language;
    return this.tasks.submit('translation', articleId, {
      run: async (ctx) => {
        assertTranslatable(lang);
        const article = this.requireArticle(ctx, articleId);
        if (!options.force && article.translated_title && article.translation_lang === lang) {
          return {
            translation: { title: article.translated_title, description: article.translated_description ?? '' },
            fromCache: true,
          };
        }
        const translation = await this.llm.translateMeta(article, { lang, signal: ctx.signal });
        return { translation, fromCache: false };
      },
      commit: (value, ctx) => {
        if (value.fromCache) return;
        this.session(ctx.lane).store.writeTranslation(articleId, value.translation, lang);
        this.events.publish({ type: 'article', id: articleId, change: 'translation' });
      },
    });
  }

  requestBodyTranslation(articleId: string, options: RequestOptions = {}): TaskHandle<TextArtifact> {
    const lang = this.settings.language;
    return this.tasks.submit('body', articleId, {
      run: async (ctx) => {
        assertTranslatable(lang);
        const article = this.requireArticle(ctx, articleId);
        if (!options.force && article.translated_body && article.translation_lang === lang) {
          return { text: article.translated_body, fromCache: true };
        }
        const page = await this.readPage(article.link);
        const text = await this.llm.translateBody(page.textContent, { lang, signal: ctx.signal });
        return { text, fromCache: false };
      },
      commit: (value, ctx) => {
        if (value.fromCache) return;
        this.session(ctx.lane).store.writeTranslatedBody(articleId, value.text, lang);
        this.events.publish({ type: 'article', id: articleId, change: 'translation' });
      },
    });
  }

  /**
   * Serves the cached digest when its fingerprint still matches the current
   * source rows; otherwise generates one and caches it under the fingerprint
   * taken before generation started.
   */
  requestDigest(scope: DigestScope, options: RequestOptions = {}): TaskHandle<DigestResult> {
    const lang = this.settings.language;
    const scopeKey = digestScopeKey(scope, lang);
    return this.tasks.submit('digest', scopeKey, {
      run: async (ctx) => {
        const { store, cache } = this.session(ctx.lane);
        const source = store.digestSource(scope, this.settings.digestMaxArticles);

        const cached = options.force ? null : cache.getDigest(scopeKey, source.fingerprint);
        if (cached) {
          log.debug(`Digest ${scopeKey} served from cache`);
          return {
            scopeKey,
            text: cached.text,
            fingerprint: cached.source_fingerprint,
            articleCount: cached.article_count,
            fromCache: true,
          };
        }

        if (source.entries.length === 0) {
          throw new TaskFailure('unavailable', `No articles in scope ${scopeKey}`);
        }

        const text = await this.llm.generateDigest(scope, source.entries, { lang, signal: ctx.signal });
        return {
          scopeKey,
          text,
          fingerprint: source.fingerprint,
          articleCount: source.entries.length,
          fromCache: false,
        };
      },
      commit: (value, ctx) => {
        if (value.fromCache) return;
        this.session(ctx.lane).cache.putDigest(value.scopeKey, value.fingerprint, value.text, value.articleCount);
      },
    });
  }

  /** Refreshes one feed, or every feed when `feedId` is omitted. */
  refresh(feedId?: number): TaskHandle<RefreshSummary[]> {
    const id = feedId === undefined ? 'all' : String(feedId);
    return this.tasks.submit('refresh', id, {
      run: async (ctx) => {
        const { store } = this.session(ctx.lane);
        const feeds = feedId === undefined ? store.listFeeds() : [this.requireFeed(store, feedId)];
        const summaries: RefreshSummary[] = [];

        for (const feed of feeds) {
          if (ctx.signal.aborted) break;
          try {
            const inputs = await this.feedSource.fetchFeed(feed);
            // 超时后不再写入
            if (ctx.signal.aborted) break;
            const results = store.upsertArticles(inputs);
            store.touchFeed(feed.id);
            const newCount = results.filter((r) => r.isNew).length;
            summaries.push({ feedId: feed.id, feedName: feed.name, fetched: inputs.length, newCount });
            for (const { article, changed } of results) {
              if (changed) this.events.publish({ type: 'article', id: article.id, change: 'upserted' });
            }
            this.events.publish({ type: 'feed', id: feed.id, change: 'refreshed', newCount });
          } catch (error) {
            if (error instanceof StorageFault) throw error;
            log.warn(`Failed to refresh ${feed.name}: ${errorMessage(error)}`);
            summaries.push({ feedId: feed.id, feedName: feed.name, fetched: 0, newCount: 0, error: errorMessage(error) });
          }
        }

        return summaries;
      },
    });
  }

  /** Saves an article, with its bookmark tags and memo, as a Notion page. */
  saveToNotion(articleId: string): TaskHandle<NotionSaveResult> {
    return this.tasks.submit('notion', `article:${articleId}`, {
      run: async (ctx) => {
        const article = this.requireArticle(ctx, articleId);
        const bookmark = this.session(ctx.lane).store.getBookmark(articleId);
        return this.notionExporter().saveArticle(article, bookmark);
      },
    });
  }

  /** Saves the last generated digest of a scope as a Notion page. */
  saveDigestToNotion(scope: DigestScope): TaskHandle<NotionSaveResult> {
    const scopeKey = digestScopeKey(scope, this.settings.language);
    return this.tasks.submit('notion', `digest:${scopeKey}`, {
      run: async (ctx) => {
        const digest = this.session(ctx.lane).cache.peek(scopeKey);
        if (!digest) {
          throw new TaskFailure('unavailable', `No digest generated for ${scopeKey} yet`);
        }
        return this.notionExporter().saveDigest(digest);
      },
    });
  }

  /** Confirms the configured Notion database or parent page is reachable. */
  async checkNotion(): Promise<string> {
    return this.notionExporter().check();
  }

  /** Waits for running work, then closes every connection. */
  async close(): Promise<void> {
    await this.tasks.onIdle();
    this.sessions.clear();
    this.pool.close();
  }

  private notionExporter(): NotionExporter {
    if (!this.notion) {
      const now = this.now;
      this.notion = this.notionApi
        ? new NotionExporter(this.notionApi, this.settings.notion, now ? () => now().slice(0, 10) : undefined)
        : NotionExporter.fromSettings(this.settings.notion, this.settings.taskTimeoutMs);
    }
    return this.notion;
  }

  private session(lane: number): Session {
    const existing = this.sessions.get(lane);
    if (existing) return existing;
    const db = this.pool.lane(lane);
    const created = {
      store: new ArticleStore(db, { now: this.now }),
      cache: new ArtifactCache(db, { now: this.now }),
    };
    this.sessions.set(lane, created);
    return created;
  }

  private requireArticle(ctx: TaskContext, articleId: string): ArticleWithFeed {
    const article = this.session(ctx.lane).store.getArticle(articleId);
    if (!article) {
      throw new StorageFault('not_found', `Article ${articleId} not found`);
    }
    return article;
  }

  private requireFeed(store: ArticleStore, feedId: number): Feed {
    const feed = store.getFeed(feedId);
    if (!feed) {
      throw new StorageFault('not_found', `Feed ${feedId} not found`);
    }
    return feed;
  }

  private async readPage(url: string): Promise<ExtractedArticle> {
    let page: ExtractedArticle | null;
    try {
      page = await this.reader(url);
    } catch (error) {
      throw new TaskFailure('network', `Could not fetch ${url}: ${errorMessage(error)}`, { cause: error });
    }
    if (!page) {
      throw new TaskFailure('bad_response', `No readable content at ${url}`);
    }
    return page;
  }
}
