import type Database from 'better-sqlite3';
import type {
  Article,
  ArticleFilter,
  ArticleInput,
  ArticleRow,
  ArticleTranslation,
  ArticleWithFeed,
  UpsertResult,
} from '../models/article.js';
import type { Bookmark, BookmarkedArticle, TagCount } from '../models/bookmark.js';
import type { DigestScope } from '../models/digest.js';
import type { Feed, FeedInput, FeedWithCount } from '../models/feed.js';
import { StorageFault } from '../utils/errors.js';
import { articleId, fingerprint, type FingerprintPart } from '../utils/hash.js';
import { withRetry } from '../utils/retry.js';

interface ArticleWithFeedRow extends ArticleRow {
  feed_name: string;
  feed_url: string;
  is_bookmarked: number;
}

interface BookmarkRow {
  article_id: string;
  memo: string | null;
  bookmarked_at: string;
  updated_at: string;
  revision: number;
}

interface BookmarkedArticleRow extends ArticleWithFeedRow {
  memo: string | null;
  bookmarked_at: string;
  bookmark_updated_at: string;
  bookmark_revision: number;
}

interface DigestSourceRow extends ArticleWithFeedRow {
  memo: string | null;
  bookmark_revision: number | null;
}

export interface DigestEntry {
  article: ArticleWithFeed;
  memo: string | null;
  tags: string[];
  bookmarkRevision: number | null;
}

export interface DigestSource {
  entries: DigestEntry[];
  fingerprint: string;
}

export interface StoreStats {
  feeds: number;
  articles: number;
  unread: number;
  bookmarks: number;
  tags: number;
}

export interface StoreOptions {
  now?: () => string;
}

const ARTICLE_WITH_FEED_COLUMNS = `
  a.*, f.name AS feed_name, f.url AS feed_url,
  CASE WHEN b.article_id IS NULL THEN 0 ELSE 1 END AS is_bookmarked
`;

function toArticle(row: ArticleRow): Article {
  return { ...row, is_read: row.is_read === 1 };
}

function toArticleWithFeed(row: ArticleWithFeedRow): ArticleWithFeed {
  return { ...toArticle(row), feed_name: row.feed_name, feed_url: row.feed_url, is_bookmarked: row.is_bookmarked === 1 };
}

// LIKE 通配符转义
function likePattern(keyword: string): string {
  const escaped = keyword.replace(/\\/g, '\\\\').replace(/%/g, '\\%').replace(/_/g, '\\_');
  return `%${escaped}%`;
}

export function normalizeTags(tags: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const raw of tags) {
    const tag = raw.trim();
    if (!tag || seen.has(tag)) continue;
    seen.add(tag);
    result.push(tag);
  }
  return result;
}

/**
 * Durable storage for feeds, articles, bookmarks and tags.
 *
 * Every public mutation runs in a single transaction and goes through
 * `withRetry`, so a failure leaves nothing behind and lock contention is
 * retried with bounded backoff. One instance per connection; workers get
 * their own instance on their own lane connection.
 */
export class ArticleStore {
  private readonly now: () => string;

  constructor(
    readonly db: Database.Database,
    options: StoreOptions = {}
  ) {
    this.now = options.now ?? (() => new Date().toISOString());
  }

  // Feed operations
  addFeed(input: FeedInput): Feed {
    return withRetry('addFeed', () => {
      const result = this.db
        .prepare('INSERT INTO feeds (name, url, category, created_at) VALUES (?, ?, ?, ?)')
        .run(input.name, input.url, input.category ?? null, this.now());
      return this.requireFeed(Number(result.lastInsertRowid));
    });
  }

  getFeed(id: number): Feed | null {
    return withRetry('getFeed', () => this.db.prepare<[number], Feed>('SELECT * FROM feeds WHERE id = ?').get(id) ?? null);
  }

  getFeedByUrl(url: string): Feed | null {
    return withRetry('getFeedByUrl', () => this.db.prepare<[string], Feed>('SELECT * FROM feeds WHERE url = ?').get(url) ?? null);
  }

  listFeeds(): FeedWithCount[] {
    return withRetry('listFeeds', () =>
      this.db
        .prepare<[], FeedWithCount>(`
          SELECT f.*, COUNT(a.id) AS article_count
          FROM feeds f
          LEFT JOIN articles a ON a.feed_id = f.id
          GROUP BY f.id
          ORDER BY f.id
        `)
        .all()
    );
  }

  /** Deletes a feed together with its articles, bookmarks and tags. */
  removeFeed(id: number): boolean {
    return withRetry('removeFeed', () => this.db.prepare('DELETE FROM feeds WHERE id = ?').run(id).changes > 0);
  }

  touchFeed(id: number): void {
    withRetry('touchFeed', () => {
      this.db.prepare('UPDATE feeds SET last_fetched_at = ? WHERE id = ?').run(this.now(), id);
    });
  }

  // Article operations
  upsertArticle(input: ArticleInput): UpsertResult {
    return withRetry('upsertArticle', () => this.db.transaction(() => this.upsertOne(input))());
  }

  /** Upserts a whole refresh batch in one transaction. */
  upsertArticles(inputs: readonly ArticleInput[]): UpsertResult[] {
    return withRetry('upsertArticles', () =>
      this.db.transaction(() => inputs.map((input) => this.upsertOne(input)))()
    );
  }

  getArticle(id: string): ArticleWithFeed | null {
    return withRetry('getArticle', () => {
      const row = this.db
        .prepare<[string], ArticleWithFeedRow>(`
          SELECT ${ARTICLE_WITH_FEED_COLUMNS}
          FROM articles a
          JOIN feeds f ON a.feed_id = f.id
          LEFT JOIN bookmarks b ON b.article_id = a.id
          WHERE a.id = ?
        `)
        .get(id);
      return row ? toArticleWithFeed(row) : null;
    });
  }

  listArticles(filter: ArticleFilter = {}): ArticleWithFeed[] {
    const conditions: string[] = [];
    const params: (string | number)[] = [];

    if (filter.feedId !== undefined) {
      conditions.push('a.feed_id = ?');
      params.push(filter.feedId);
    }

    if (filter.unreadOnly) {
      conditions.push('a.is_read = 0');
    }

    if (filter.bookmarkedOnly) {
      conditions.push('b.article_id IS NOT NULL');
    }

    if (filter.tag) {
      conditions.push('a.id IN (SELECT article_id FROM bookmark_tags WHERE tag = ?)');
      params.push(filter.tag.trim());
    }

    if (filter.search) {
      const pattern = likePattern(filter.search);
      const columns = ['a.title', 'a.description', 'a.insight', 'a.translated_title', 'a.translated_description'];
      conditions.push(`(${columns.map((c) => `${c} LIKE ? ESCAPE '\\'`).join(' OR ')})`);
      params.push(...columns.map(() => pattern));
    }

    const whereClause = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    params.push(filter.limit ?? 200);

    const sql = `
      SELECT ${ARTICLE_WITH_FEED_COLUMNS}
      FROM articles a
      JOIN feeds f ON a.feed_id = f.id
      LEFT JOIN bookmarks b ON b.article_id = a.id
      ${whereClause}
      ORDER BY a.published_at DESC, a.fetched_at DESC, a.rowid DESC
      LIMIT ?
    `;

    return withRetry('listArticles', () =>
      this.db.prepare<(string | number)[], ArticleWithFeedRow>(sql).all(...params).map(toArticleWithFeed)
    );
  }

  /** Read state feeds no AI artifact, so it touches `updated_at` but not `revision`. */
  setRead(id: string, read: boolean): Article {
    return withRetry('setRead', () =>
      this.db.transaction(() => {
        this.db
          .prepare('UPDATE articles SET is_read = ?, updated_at = ? WHERE id = ? AND is_read != ?')
          .run(read ? 1 : 0, this.now(), id, read ? 1 : 0);
        return this.requireArticle(id);
      })()
    );
  }

  writeInsight(id: string, text: string, lang: string): Article {
    return this.bumpArticle('writeInsight', id, 'insight = ?, insight_lang = ?', [text, lang]);
  }

  writeTranslation(id: string, translation: ArticleTranslation, lang: string): Article {
    return this.bumpArticle(
      'writeTranslation',
      id,
      'translated_title = ?, translated_description = ?, translation_lang = ?',
      [translation.title, translation.description, lang]
    );
  }

  writeTranslatedBody(id: string, text: string, lang: string): Article {
    return this.bumpArticle('writeTranslatedBody', id, 'translated_body = ?, translation_lang = ?', [text, lang]);
  }

  // Bookmark operations
  /** Creates or destroys the bookmark (with its tags) atomically. Returns the new state. */
  toggleBookmark(id: string): boolean {
    return withRetry('toggleBookmark', () =>
      this.db.transaction(() => {
        this.requireArticle(id);
        const existing = this.getBookmarkRow(id);
        const now = this.now();
        // bookmark revisions restart at 1, so the article revision moves on every toggle
        this.db.prepare('UPDATE articles SET updated_at = ?, revision = revision + 1 WHERE id = ?').run(now, id);
        if (existing) {
          this.db.prepare('DELETE FROM bookmark_tags WHERE article_id = ?').run(id);
          this.db.prepare('DELETE FROM bookmarks WHERE article_id = ?').run(id);
          return false;
        }
        this.db
          .prepare('INSERT INTO bookmarks (article_id, bookmarked_at, updated_at) VALUES (?, ?, ?)')
          .run(id, now, now);
        return true;
      })()
    );
  }

  /** Replaces the bookmark's tags. Returns the stored, normalized tag list. */
  setTags(articleId: string, tags: readonly string[]): string[] {
    const normalized = normalizeTags(tags);
    return withRetry('setTags', () =>
      this.db.transaction(() => {
        this.requireBookmark(articleId);
        this.db.prepare('DELETE FROM bookmark_tags WHERE article_id = ?').run(articleId);
        const insert = this.db.prepare('INSERT INTO bookmark_tags (article_id, tag, position) VALUES (?, ?, ?)');
        normalized.forEach((tag, position) => insert.run(articleId, tag, position));
        this.bumpBookmark(articleId);
        return normalized;
      })()
    );
  }

  setMemo(articleId: string, memo: string | null): void {
    const value = memo?.trim() || null;
    withRetry('setMemo', () =>
      this.db.transaction(() => {
        this.requireBookmark(articleId);
        this.db.prepare('UPDATE bookmarks SET memo = ? WHERE article_id = ?').run(value, articleId);
        this.bumpBookmark(articleId);
      })()
    );
  }

  getBookmark(articleId: string): Bookmark | null {
    return withRetry('getBookmark', () => {
      const row = this.getBookmarkRow(articleId);
      return row ? { ...row, tags: this.getTags(articleId) } : null;
    });
  }

  listBookmarks(): BookmarkedArticle[] {
    return withRetry('listBookmarks', () => {
      const rows = this.db
        .prepare<[], BookmarkedArticleRow>(`
          SELECT ${ARTICLE_WITH_FEED_COLUMNS},
            b.memo, b.bookmarked_at, b.updated_at AS bookmark_updated_at, b.revision AS bookmark_revision
          FROM bookmarks b
          JOIN articles a ON a.id = b.article_id
          JOIN feeds f ON a.feed_id = f.id
          ORDER BY b.bookmarked_at DESC, b.rowid DESC
        `)
        .all();
      const tags = this.getAllTags();
      return rows.map((row) => ({
        ...toArticleWithFeed(row),
        bookmark: {
          article_id: row.id,
          memo: row.memo,
          tags: tags.get(row.id) ?? [],
          bookmarked_at: row.bookmarked_at,
          updated_at: row.bookmark_updated_at,
          revision: row.bookmark_revision,
        },
      }));
    });
  }

  listTags(): TagCount[] {
    return withRetry('listTags', () =>
      this.db
        .prepare<[], TagCount>('SELECT tag, COUNT(*) AS count FROM bookmark_tags GROUP BY tag ORDER BY count DESC, tag')
        .all()
    );
  }

  stats(): StoreStats {
    return withRetry('stats', () =>
      this.db
        .prepare<[], StoreStats>(`
          SELECT
            (SELECT COUNT(*) FROM feeds) AS feeds,
            (SELECT COUNT(*) FROM articles) AS articles,
            (SELECT COUNT(*) FROM articles WHERE is_read = 0) AS unread,
            (SELECT COUNT(*) FROM bookmarks) AS bookmarks,
            (SELECT COUNT(DISTINCT tag) FROM bookmark_tags) AS tags
        `)
        .get() ?? { feeds: 0, articles: 0, unread: 0, bookmarks: 0, tags: 0 }
    );
  }

  // Digest inputs
  /**
   * Selects the articles a digest scope covers and fingerprints them in the
   * same read, so the fingerprint always matches the rows handed to the AI.
   */
  digestSource(scope: DigestScope, limit: number): DigestSource {
    return withRetry('digestSource', () => {
      const rows = this.selectDigestRows(scope, limit);
      const tags = this.getAllTags();
      const entries = rows.map((row) => ({
        article: toArticleWithFeed(row),
        memo: row.memo,
        tags: tags.get(row.id) ?? [],
        bookmarkRevision: row.bookmark_revision,
      }));
      const parts: FingerprintPart[] = entries.map((e) => ({
        id: e.article.id,
        revision: e.article.revision,
        bookmarkRevision: e.bookmarkRevision,
      }));
      return { entries, fingerprint: fingerprint(parts) };
    });
  }

  fingerprint(scope: DigestScope, limit: number): string {
    return this.digestSource(scope, limit).fingerprint;
  }

  private selectDigestRows(scope: DigestScope, limit: number): DigestSourceRow[] {
    const columns = `${ARTICLE_WITH_FEED_COLUMNS}, b.memo, b.revision AS bookmark_revision`;

    if (scope.kind === 'bookmarks') {
      const tag = scope.tag?.trim();
      const params: (string | number)[] = tag ? [tag, limit] : [limit];
      return this.db
        .prepare<(string | number)[], DigestSourceRow>(`
          SELECT ${columns}
          FROM bookmarks b
          ${tag ? 'JOIN bookmark_tags t ON t.article_id = b.article_id AND t.tag = ?' : ''}
          JOIN articles a ON a.id = b.article_id
          JOIN feeds f ON a.feed_id = f.id
          ORDER BY b.bookmarked_at DESC, b.rowid DESC
          LIMIT ?
        `)
        .all(...params);
    }

    const cutoff = new Date(Date.parse(this.now()) - scope.days * 86_400_000).toISOString();
    return this.db
      .prepare<[string, number], DigestSourceRow>(`
        SELECT ${columns}
        FROM articles a
        JOIN feeds f ON a.feed_id = f.id
        LEFT JOIN bookmarks b ON b.article_id = a.id
        WHERE COALESCE(a.published_at, a.fetched_at) >= ?
        ORDER BY a.published_at DESC, a.fetched_at DESC, a.rowid DESC
        LIMIT ?
      `)
      .all(cutoff, limit);
  }

  // Internal utilities
  private upsertOne(input: ArticleInput): UpsertResult {
    const feed = this.db.prepare<[number], Feed>('SELECT * FROM feeds WHERE id = ?').get(input.feed_id);
    if (!feed) {
      throw new StorageFault('not_found', `Feed ${input.feed_id} not found`);
    }

    const id = articleId(feed.url, input.guid || input.link);
    const now = this.now();
    const values = {
      id,
      title: input.title,
      link: input.link,
      description: input.description ?? null,
      published_at: input.published_at ?? null,
      now,
    };

    const exists = this.db.prepare<[string], { id: string }>('SELECT id FROM articles WHERE id = ?').get(id);
    if (!exists) {
      this.db
        .prepare(`
          INSERT INTO articles (id, feed_id, guid, title, link, description, published_at, fetched_at, updated_at)
          VALUES (@id, @feed_id, @guid, @title, @link, @description, @published_at, @now, @now)
        `)
        .run({ ...values, feed_id: feed.id, guid: input.guid || input.link });
      return { article: this.requireArticle(id), isNew: true, changed: true };
    }

    // 只更新抓取得到的字段；已读、洞察、翻译保持不变，内容没变就不升 revision
    const result = this.db
      .prepare(`
        UPDATE articles
        SET title = @title,
            link = @link,
            description = COALESCE(@description, description),
            published_at = COALESCE(@published_at, published_at),
            updated_at = @now,
            revision = revision + 1
        WHERE id = @id
          AND (title IS NOT @title
            OR link IS NOT @link
            OR (@description IS NOT NULL AND description IS NOT @description)
            OR (@published_at IS NOT NULL AND published_at IS NOT @published_at))
      `)
      .run(values);
    return { article: this.requireArticle(id), isNew: false, changed: result.changes > 0 };
  }

  private bumpArticle(label: string, id: string, assignments: string, params: string[]): Article {
    return withRetry(label, () =>
      this.db.transaction(() => {
        const result = this.db
          .prepare(`UPDATE articles SET ${assignments}, updated_at = ?, revision = revision + 1 WHERE id = ?`)
          .run(...params, this.now(), id);
        if (result.changes === 0) {
          throw new StorageFault('not_found', `Article ${id} not found`);
        }
        return this.requireArticle(id);
      })()
    );
  }

  private bumpBookmark(articleId: string): void {
    this.db
      .prepare('UPDATE bookmarks SET updated_at = ?, revision = revision + 1 WHERE article_id = ?')
      .run(this.now(), articleId);
  }

  private requireFeed(id: number): Feed {
    const feed = this.db.prepare<[number], Feed>('SELECT * FROM feeds WHERE id = ?').get(id);
    if (!feed) {
      throw new StorageFault('not_found', `Feed ${id} not found`);
    }
    return feed;
  }

  private requireArticle(id: string): Article {
    const row = this.db.prepare<[string], ArticleRow>('SELECT * FROM articles WHERE id = ?').get(id);
    if (!row) {
      throw new StorageFault('not_found', `Article ${id} not found`);
    }
    return toArticle(row);
  }

  private requireBookmark(articleId: string): BookmarkRow {
    const row = this.getBookmarkRow(articleId);
    if (!row) {
      throw new StorageFault('not_found', `Article ${articleId} is not bookmarked`);
    }
    return row;
  }

  private getBookmarkRow(articleId: string): BookmarkRow | undefined {
    return this.db
      .prepare<[string], BookmarkRow>(
        'SELECT article_id, memo, bookmarked_at, updated_at, revision FROM bookmarks WHERE article_id = ?'
      )
      .get(articleId);
  }

  private getTags(articleId: string): string[] {
    return this.db
      .prepare<[string], { tag: string }>('SELECT tag FROM bookmark_tags WHERE article_id = ? ORDER BY position')
      .all(articleId)
      .map((row) => row.tag);
  }

  private getAllTags(): Map<string, string[]> {
    const rows = this.db
      .prepare<[], { article_id: string; tag: string }>('SELECT article_id, tag FROM bookmark_tags ORDER BY article_id, position')
      .all();
    const byArticle = new Map<string, string[]>();
    for (const row of rows) {
      const list = byArticle.get(row.article_id);
      if (list) {
        list.push(row.tag);
      } else {
        byArticle.set(row.article_id, [row.tag]);
      }
    }
    return byArticle;
  }
}
