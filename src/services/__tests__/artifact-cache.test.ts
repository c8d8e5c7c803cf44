import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ArtifactCache } from '../artifact-cache.js';
import { ArticleStore } from '../store.js';
import { digestScopeKey, type DigestScope } from '../../models/digest.js';
import type { Feed } from '../../models/feed.js';
import { fingerprint } from '../../utils/hash.js';
import { sampleItems, tempPool, tickingClock, type TempPool } from './fixtures.js';

const BOOKMARKS: DigestScope = { kind: 'bookmarks' };
const LIMIT = 20;

describe('ArtifactCache', () => {
  let temp: TempPool;
  let store: ArticleStore;
  let cache: ArtifactCache;
  let feed: Feed;
  let ids: string[];

  beforeEach(() => {
    temp = tempPool();
    const now = tickingClock();
    store = new ArticleStore(temp.pool.primary, { now });
    cache = new ArtifactCache(temp.pool.primary, { now });
    feed = store.addFeed({ name: 'Example', url: 'https://example.com/feed.xml' });
    store.upsertArticles(sampleItems(3).map((item) => ({ ...item, feed_id: feed.id })));
    ids = store.listArticles().map((a) => a.id);
  });

  afterEach(() => {
    temp.cleanup();
  });

  it('returns an entry only while its fingerprint matches', () => {
    store.toggleBookmark(ids[0]);
    const key = digestScopeKey(BOOKMARKS, 'en');
    const f1 = store.fingerprint(BOOKMARKS, LIMIT);
    cache.putDigest(key, f1, 'D1', 1);

    expect(cache.getDigest(key, f1)?.text).toBe('D1');

    store.toggleBookmark(ids[1]);
    const f2 = store.fingerprint(BOOKMARKS, LIMIT);

    expect(f2).not.toBe(f1);
    expect(cache.getDigest(key, f2)).toBeNull();
    expect(cache.peek(key)?.text).toBe('D1');
  });

  it('misses after a bookmark is removed', () => {
    store.toggleBookmark(ids[0]);
    store.toggleBookmark(ids[1]);
    const before = store.fingerprint(BOOKMARKS, LIMIT);

    store.toggleBookmark(ids[1]);

    expect(store.fingerprint(BOOKMARKS, LIMIT)).not.toBe(before);
  });

  it('misses after a bookmark is removed and added again with other tags', () => {
    const key = digestScopeKey(BOOKMARKS, 'en');
    store.toggleBookmark(ids[0]);
    store.setTags(ids[0], ['alpha']);
    const f1 = store.fingerprint(BOOKMARKS, LIMIT);
    cache.putDigest(key, f1, 'D1', 1);

    store.toggleBookmark(ids[0]);
    store.toggleBookmark(ids[0]);
    store.setTags(ids[0], ['beta']);
    const f2 = store.fingerprint(BOOKMARKS, LIMIT);

    expect(store.getBookmark(ids[0])?.revision).toBe(2);
    expect(f2).not.toBe(f1);
    expect(cache.getDigest(key, f2)).toBeNull();
  });

  it('misses after tags, memos or article content change', () => {
    store.toggleBookmark(ids[0]);
    const initial = store.fingerprint(BOOKMARKS, LIMIT);

    store.setTags(ids[0], ['ai']);
    const tagged = store.fingerprint(BOOKMARKS, LIMIT);
    store.setMemo(ids[0], 'follow up');
    const memoed = store.fingerprint(BOOKMARKS, LIMIT);
    store.writeInsight(ids[0], 'insight', 'en');
    const analyzed = store.fingerprint(BOOKMARKS, LIMIT);

    expect(new Set([initial, tagged, memoed, analyzed]).size).toBe(4);
  });

  it('ignores read state', () => {
    store.toggleBookmark(ids[0]);
    const before = store.fingerprint(BOOKMARKS, LIMIT);

    store.setRead(ids[0], true);

    expect(store.fingerprint(BOOKMARKS, LIMIT)).toBe(before);
  });

  it('fingerprints exactly the rows handed to the digest', () => {
    store.toggleBookmark(ids[0]);
    store.toggleBookmark(ids[2]);

    const source = store.digestSource(BOOKMARKS, LIMIT);
    const expected = fingerprint(
      source.entries.map((e) => ({ id: e.article.id, revision: e.article.revision, bookmarkRevision: e.bookmarkRevision }))
    );

    expect(source.entries.map((e) => e.article.id)).toEqual([ids[2], ids[0]]);
    expect(source.fingerprint).toBe(expected);
  });

  it('scopes a digest to one tag', () => {
    store.toggleBookmark(ids[0]);
    store.toggleBookmark(ids[1]);
    store.setTags(ids[1], ['ml']);

    const source = store.digestSource({ kind: 'bookmarks', tag: 'ml' }, LIMIT);

    expect(source.entries.map((e) => e.article.id)).toEqual([ids[1]]);
    expect(source.entries[0].tags).toEqual(['ml']);
  });

  it('selects recent articles by publication date', () => {
    // sample items are published on March 1-3; the clock starts on March 10
    expect(store.digestSource({ kind: 'recent', days: 8 }, LIMIT).entries.map((e) => e.article.title)).toEqual([
      'Post 3',
      'Post 2',
    ]);
    expect(store.digestSource({ kind: 'recent', days: 1 }, LIMIT).entries).toEqual([]);
  });

  it('replaces an entry on put and drops entries on invalidate', () => {
    const a = digestScopeKey(BOOKMARKS, 'en');
    const b = digestScopeKey({ kind: 'recent', days: 7 }, 'en');
    cache.putDigest(a, 'f1', 'old', 1);
    cache.putDigest(a, 'f2', 'new', 2);
    cache.putDigest(b, 'f3', 'recent', 3);

    expect(cache.peek(a)).toMatchObject({ text: 'new', source_fingerprint: 'f2', article_count: 2 });
    expect(cache.listDigests()).toHaveLength(2);

    expect(cache.invalidate(a)).toBe(true);
    expect(cache.invalidate(a)).toBe(false);
    expect(cache.invalidateAll()).toBe(1);
    expect(cache.listDigests()).toEqual([]);
  });

  it('keys scopes by kind, tag and language', () => {
    expect(digestScopeKey({ kind: 'bookmarks' }, 'en')).toBe('bookmarks@en');
    expect(digestScopeKey({ kind: 'bookmarks', tag: 'ai' }, 'ko')).toBe('bookmarks#tag=ai@ko');
    expect(digestScopeKey({ kind: 'recent', days: 7 }, 'en')).toBe('recent#7d@en');
  });

  it('shares one key for tags that differ only in surrounding space', () => {
    expect(digestScopeKey({ kind: 'bookmarks', tag: ' ai ' }, 'en')).toBe('bookmarks#tag=ai@en');
    expect(digestScopeKey({ kind: 'bookmarks', tag: '  ' }, 'en')).toBe('bookmarks@en');
  });
});
