import type Database from 'better-sqlite3';

export interface Migration {
  version: number;
  name: string;
  up(db: Database.Database): void;
}

function columnNames(db: Database.Database, table: string): string[] {
  const columns = db.prepare<[], { name: string }>(`PRAGMA table_info(${table})`).all();
  return columns.map((c) => c.name);
}

// 只允许追加：新迁移放在末尾，永远不要修改或删除已发布的迁移
export const MIGRATIONS: readonly Migration[] = [
  {
    version: 1,
    name: 'initial schema',
    up(db) {
      db.exec(`
        -- RSS 源表
        CREATE TABLE IF NOT EXISTS feeds (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          name TEXT NOT NULL,
          url TEXT NOT NULL UNIQUE,
          category TEXT,
          last_fetched_at TEXT,
          created_at TEXT NOT NULL
        );

        -- 文章表（id 由 feed url + guid 派生）
        CREATE TABLE IF NOT EXISTS articles (
          id TEXT PRIMARY KEY,
          feed_id INTEGER NOT NULL,
          guid TEXT NOT NULL,
          title TEXT NOT NULL,
          link TEXT NOT NULL,
          description TEXT,
          published_at TEXT,
          fetched_at TEXT NOT NULL,
          is_read INTEGER NOT NULL DEFAULT 0,
          insight TEXT,
          insight_lang TEXT,
          updated_at TEXT NOT NULL,
          revision INTEGER NOT NULL DEFAULT 1,
          FOREIGN KEY (feed_id) REFERENCES feeds(id) ON DELETE CASCADE
        );
        CREATE INDEX IF NOT EXISTS idx_articles_published ON articles(published_at DESC, fetched_at DESC);
        CREATE INDEX IF NOT EXISTS idx_articles_feed ON articles(feed_id, published_at DESC);
        CREATE INDEX IF NOT EXISTS idx_articles_read ON articles(is_read, published_at DESC);

        -- 收藏表：每篇文章最多一条
        CREATE TABLE IF NOT EXISTS bookmarks (
          article_id TEXT PRIMARY KEY,
          memo TEXT,
          bookmarked_at TEXT NOT NULL,
          updated_at TEXT NOT NULL,
          revision INTEGER NOT NULL DEFAULT 1,
          FOREIGN KEY (article_id) REFERENCES articles(id) ON DELETE CASCADE
        );

        -- 收藏标签（有序集合）
        CREATE TABLE IF NOT EXISTS bookmark_tags (
          article_id TEXT NOT NULL,
          tag TEXT NOT NULL,
          position INTEGER NOT NULL,
          PRIMARY KEY (article_id, tag),
          FOREIGN KEY (article_id) REFERENCES bookmarks(article_id) ON DELETE CASCADE
        );
        CREATE INDEX IF NOT EXISTS idx_bookmark_tags_tag ON bookmark_tags(tag);

        -- 摘要缓存：以指纹判断是否有效
        CREATE TABLE IF NOT EXISTS digests (
          scope_key TEXT PRIMARY KEY,
          text TEXT NOT NULL,
          source_fingerprint TEXT NOT NULL,
          generated_at TEXT NOT NULL
        );

        -- 全局配置表
        CREATE TABLE IF NOT EXISTS config (
          key TEXT PRIMARY KEY,
          value TEXT NOT NULL
        );
      `);
    },
  },
  {
    version: 2,
    name: 'article translations',
    up(db) {
      const columns = columnNames(db, 'articles');
      if (!columns.includes('translated_title')) {
        db.exec('ALTER TABLE articles ADD COLUMN translated_title TEXT');
        db.exec('ALTER TABLE articles ADD COLUMN translated_description TEXT');
        db.exec('ALTER TABLE articles ADD COLUMN translation_lang TEXT');
      }
      if (!columns.includes('translated_body')) {
        db.exec('ALTER TABLE articles ADD COLUMN translated_body TEXT');
      }
    },
  },
  {
    version: 3,
    name: 'digest article count',
    up(db) {
      if (!columnNames(db, 'digests').includes('article_count')) {
        db.exec('ALTER TABLE digests ADD COLUMN article_count INTEGER NOT NULL DEFAULT 0');
      }
    },
  },
];
