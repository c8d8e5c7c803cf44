import type Database from 'better-sqlite3';
import type { DigestArtifact } from '../models/digest.js';
import { withRetry } from '../utils/retry.js';

/**
 * Fingerprint-keyed store of generated digests.
 *
 * An entry is valid only while the caller's freshly computed fingerprint
 * matches the one it was generated from. There is no time-based expiry.
 */
export class ArtifactCache {
  private readonly now: () => string;

  constructor(
    private readonly db: Database.Database,
    options: { now?: () => string } = {}
  ) {
    this.now = options.now ?? (() => new Date().toISOString());
  }

  /** Returns the cached digest, or null when absent or generated from different data. */
  getDigest(scopeKey: string, currentFingerprint: string): DigestArtifact | null {
    const entry = this.peek(scopeKey);
    if (!entry || entry.source_fingerprint !== currentFingerprint) {
      return null;
    }
    return entry;
  }

  /** Latest entry for a scope regardless of validity; for display and export only. */
  peek(scopeKey: string): DigestArtifact | null {
    return withRetry('getDigest', () =>
      this.db.prepare<[string], DigestArtifact>('SELECT * FROM digests WHERE scope_key = ?').get(scopeKey) ?? null
    );
  }

  putDigest(scopeKey: string, sourceFingerprint: string, text: string, articleCount: number): DigestArtifact {
    const entry: DigestArtifact = {
      scope_key: scopeKey,
      text,
      source_fingerprint: sourceFingerprint,
      article_count: articleCount,
      generated_at: this.now(),
    };
    withRetry('putDigest', () => {
      this.db
        .prepare(`
          INSERT INTO digests (scope_key, text, source_fingerprint, article_count, generated_at)
          VALUES (@scope_key, @text, @source_fingerprint, @article_count, @generated_at)
          ON CONFLICT(scope_key) DO UPDATE SET
            text = excluded.text,
            source_fingerprint = excluded.source_fingerprint,
            article_count = excluded.article_count,
            generated_at = excluded.generated_at
        `)
        .run(entry);
    });
    return entry;
  }

  invalidate(scopeKey: string): boolean {
    return withRetry('invalidateDigest', () => this.db.prepare('DELETE FROM digests WHERE scope_key = ?').run(scopeKey).changes > 0);
  }

  /** Drops every cached digest. Returns how many were removed. */
  invalidateAll(): number {
    return withRetry('invalidateAll', () => this.db.prepare('DELETE FROM digests').run().changes);
  }

  listDigests(): DigestArtifact[] {
    return withRetry('listDigests', () =>
      this.db.prepare<[], DigestArtifact>('SELECT * FROM digests ORDER BY generated_at DESC').all()
    );
  }
}
