import { createHash } from 'node:crypto';

/** Stable article id: the same feed entry always hashes to the same id. */
export function articleId(feedUrl: string, guid: string): string {
  return createHash('sha256').update(`${feedUrl}:${guid}`).digest('hex').slice(0, 16);
}

export interface FingerprintPart {
  id: string;
  revision: number;
  bookmarkRevision: number | null;
}

/** Order-independent hash over the revisions feeding a cached artifact. */
export function fingerprint(parts: readonly FingerprintPart[]): string {
  const lines = parts
    .map((p) => `${p.id}:${p.revision}:${p.bookmarkRevision ?? '-'}`)
    .sort();
  return createHash('sha256').update(lines.join('\n')).digest('hex');
}
