export type DigestScope =
  | { kind: 'bookmarks'; tag?: string }
  | { kind: 'recent'; days: number };

export interface DigestArtifact {
  scope_key: string;
  text: string;
  source_fingerprint: string;
  article_count: number;
  generated_at: string;
}

export interface DigestResult {
  scopeKey: string;
  text: string;
  fingerprint: string;
  articleCount: number;
  fromCache: boolean;
}

export function digestScopeKey(scope: DigestScope, lang: string): string {
  switch (scope.kind) {
    case 'bookmarks': {
      const tag = scope.tag?.trim();
      return tag ? `bookmarks#tag=${tag}@${lang}` : `bookmarks@${lang}`;
    }
    case 'recent':
      return `recent#${scope.days}d@${lang}`;
  }
}
