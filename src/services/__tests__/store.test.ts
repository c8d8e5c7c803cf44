import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ArticleStore, normalizeTags } from '../store.js';
import type { Feed } from '../../models/feed.js';
import { StorageFault } from '../../utils/errors.js';
import { articleId } from '../../utils/hash.js';
import { sampleItems, tempPool, tickingClock, type TempPool } from './fixtures.js';

describe('ArticleStore', () => {
  let temp: TempPool;
  let store: ArticleStore;
  let feed: Feed;

  beforeEach(() => {
    temp = tempPool();
    store = new ArticleStore(temp.pool.primary, { now: tickingClock() });
    feed = store.addFeed({ name: 'Example', url: 'https://example.com/feed.xml' });
  });

  afterEach(() => {
    temp.cleanup();
  });

  function seed(count = 3): string[] {
    store.upsertArticles(sampleItems(count).map((item) => ({ ...item, feed_id: feed.id })));
    return store.listArticles().map((a) => a.id);
  }

  describe('upsert', () => {
    it('keeps one article per source entry across refreshes', () => {
      const items = sampleItems(3).map((item) => ({ ...item, feed_id: feed.id }));

      expect(store.upsertArticles(items).filter((r) => r.isNew)).toHaveLength(3);
      expect(store.upsertArticles(items).filter((r) => r.isNew)).toHaveLength(0);

      const articles = store.listArticles();
      expect(articles).toHaveLength(3);
      expect(articles.every((a) => !a.is_read)).toBe(true);
      expect(articles.map((a) => a.title)).toEqual(['Post 3', 'Post 2', 'Post 1']);
    });

    it('derives the id from the feed url and guid, falling back to the link', () => {
      const withGuid = store.upsertArticle({ feed_id: feed.id, guid: 'entry-1', title: 'A', link: 'https://example.com/a' });
      const withoutGuid = store.upsertArticle({ feed_id: feed.id, title: 'B', link: 'https://example.com/b' });

      expect(withGuid.article.id).toBe(articleId('https://example.com/feed.xml', 'entry-1'));
      expect(withoutGuid.article.id).toBe(articleId('https://example.com/feed.xml', 'https://example.com/b'));
      expect(withoutGuid.article.guid).toBe('https://example.com/b');
    });

    it('bumps the revision only when fetched content changes', () => {
      const input = { feed_id: feed.id, guid: 'g', title: 'Original', link: 'https://example.com/g' };
      const first = store.upsertArticle(input);
      const same = store.upsertArticle(input);
      const changed = store.upsertArticle({ ...input, title: 'Edited' });

      expect(first).toMatchObject({ isNew: true, changed: true });
      expect(same).toMatchObject({ isNew: false, changed: false });
      expect(changed).toMatchObject({ isNew: false, changed: true });
      expect(same.article.revision).toBe(1);
      expect(changed.article.revision).toBe(2);
      expect(changed.article.title).toBe('Edited');
    });

    it('keeps read state and AI artifacts when an article is fetched again', () => {
      const [id] = seed(1);
      store.setRead(id, true);
      store.writeInsight(id, 'worth reading', 'en');

      store.upsertArticle({ ...sampleItems(1)[0], feed_id: feed.id, description: 'Updated description' });

      const article = store.getArticle(id);
      expect(article?.is_read).toBe(true);
      expect(article?.insight).toBe('worth reading');
      expect(article?.description).toBe('Updated description');
    });

    it('refuses articles of an unknown feed', () => {
      expect(() => store.upsertArticle({ feed_id: 999, title: 'x', link: 'https://example.com/x' })).toThrow(StorageFault);
    });
  });

  describe('artifacts', () => {
    it('lets the latest insight write win', () => {
      const [id] = seed(1);
      store.writeInsight(id, 'first', 'en');
      const latest = store.writeInsight(id, 'second', 'ko');

      expect(latest.insight).toBe('second');
      expect(latest.insight_lang).toBe('ko');
      expect(latest.revision).toBe(3);
    });

    it('stores translations with their language', () => {
      const [id] = seed(1);
      store.writeTranslation(id, { title: '제목', description: '설명' }, 'ko');
      const article = store.writeTranslatedBody(id, '본문', 'ko');

      expect(article.translated_title).toBe('제목');
      expect(article.translated_description).toBe('설명');
      expect(article.translated_body).toBe('본문');
      expect(article.translation_lang).toBe('ko');
    });

    it('does not bump the revision when toggling read state', () => {
      const [id] = seed(1);
      const article = store.setRead(id, true);

      expect(article.is_read).toBe(true);
      expect(article.revision).toBe(1);
    });

    it('reports a missing article', () => {
      expect(() => store.writeInsight('missing', 'x', 'en')).toThrow(StorageFault);
    });
  });

  describe('bookmarks', () => {
    it('toggles a bookmark together with its tags', () => {
      const [id] = seed(1);

      expect(store.toggleBookmark(id)).toBe(true);
      expect(store.setTags(id, [' ai ', 'rust', 'ai', ''])).toEqual(['ai', 'rust']);
      expect(store.getBookmark(id)?.tags).toEqual(['ai', 'rust']);
      expect(store.listTags()).toEqual([
        { tag: 'ai', count: 1 },
        { tag: 'rust', count: 1 },
      ]);

      expect(store.toggleBookmark(id)).toBe(false);
      expect(store.getBookmark(id)).toBeNull();
      expect(store.listTags()).toEqual([]);
    });

    it('rolls back a toggle that fails halfway', () => {
      const [id] = seed(1);
      store.toggleBookmark(id);
      store.setTags(id, ['keep']);
      store.setMemo(id, 'note');
      store.db.exec(`
        CREATE TRIGGER fail_bookmark_delete BEFORE DELETE ON bookmarks
        BEGIN SELECT RAISE(ABORT, 'injected'); END;
      `);

      expect(() => store.toggleBookmark(id)).toThrow(StorageFault);

      const bookmark = store.getBookmark(id);
      expect(bookmark?.tags).toEqual(['keep']);
      expect(bookmark?.memo).toBe('note');
      expect(store.getArticle(id)?.revision).toBe(2);
    });

    it('bumps the article revision in both directions', () => {
      const [id] = seed(1);

      store.toggleBookmark(id);
      expect(store.getArticle(id)?.revision).toBe(2);

      store.toggleBookmark(id);
      expect(store.getArticle(id)?.revision).toBe(3);
    });

    it('requires a bookmark for tags and memos', () => {
      const [id] = seed(1);
      expect(() => store.setTags(id, ['x'])).toThrow(StorageFault);
      expect(() => store.setMemo(id, 'x')).toThrow(StorageFault);
    });

    it('trims memos and clears empty ones', () => {
      const [id] = seed(1);
      store.toggleBookmark(id);

      store.setMemo(id, '  read later  ');
      expect(store.getBookmark(id)?.memo).toBe('read later');

      store.setMemo(id, '   ');
      expect(store.getBookmark(id)?.memo).toBeNull();
    });

    it('bumps the bookmark revision on tag and memo edits', () => {
      const [id] = seed(1);
      store.toggleBookmark(id);
      store.setTags(id, ['a']);
      store.setMemo(id, 'm');

      expect(store.getBookmark(id)?.revision).toBe(3);
    });

    it('lists bookmarks newest first', () => {
      const ids = seed(3);
      store.toggleBookmark(ids[2]);
      store.toggleBookmark(ids[0]);

      expect(store.listBookmarks().map((b) => b.id)).toEqual([ids[0], ids[2]]);
    });

    it('removes bookmarks and tags with their feed', () => {
      const [id] = seed(1);
      store.toggleBookmark(id);
      store.setTags(id, ['gone']);

      expect(store.removeFeed(feed.id)).toBe(true);
      expect(store.listArticles()).toEqual([]);
      expect(store.listTags()).toEqual([]);
    });
  });

  describe('listArticles', () => {
    it('filters by read state, bookmark and tag', () => {
      const ids = seed(3);
      store.setRead(ids[0], true);
      store.toggleBookmark(ids[1]);
      store.setTags(ids[1], ['ml']);

      expect(store.listArticles({ unreadOnly: true }).map((a) => a.id)).toEqual([ids[1], ids[2]]);
      expect(store.listArticles({ bookmarkedOnly: true }).map((a) => a.id)).toEqual([ids[1]]);
      expect(store.listArticles({ tag: 'ml' }).map((a) => a.id)).toEqual([ids[1]]);
      expect(store.listArticles({ limit: 1 })).toHaveLength(1);
    });

    it('treats LIKE wildcards in a search literally', () => {
      store.upsertArticle({ feed_id: feed.id, guid: 'p', title: '100% coverage', link: 'https://example.com/p' });
      store.upsertArticle({ feed_id: feed.id, guid: 'q', title: '100 tests', link: 'https://example.com/q' });

      expect(store.listArticles({ search: '100%' }).map((a) => a.title)).toEqual(['100% coverage']);
    });

    it('searches insights and translations', () => {
      const [id] = seed(1);
      store.writeInsight(id, 'a note about databases', 'en');

      expect(store.listArticles({ search: 'databases' }).map((a) => a.id)).toEqual([id]);
    });
  });

  it('counts feeds, articles and bookmarks', () => {
    const ids = seed(3);
    store.setRead(ids[0], true);
    store.toggleBookmark(ids[1]);
    store.setTags(ids[1], ['a', 'b']);

    expect(store.stats()).toEqual({ feeds: 1, articles: 3, unread: 2, bookmarks: 1, tags: 2 });
  });

  it('normalizes tag lists', () => {
    expect(normalizeTags(['  x', 'y ', 'x', ''])).toEqual(['x', 'y']);
  });
});
