export interface Article {
  id: string;
  feed_id: number;
  guid: string;
  title: string;
  link: string;
  description: string | null;
  published_at: string | null;
  fetched_at: string;
  is_read: boolean;
  insight: string | null;
  insight_lang: string | null;
  translated_title: string | null;
  translated_description: string | null;
  translated_body: string | null;
  translation_lang: string | null;
  updated_at: string;
  revision: number;
}

/** Raw `articles` row; SQLite has no boolean type. */
export interface ArticleRow extends Omit<Article, 'is_read'> {
  is_read: number;
}

export interface ArticleWithFeed extends Article {
  feed_name: string;
  feed_url: string;
  is_bookmarked: boolean;
}

export interface ArticleInput {
  feed_id: number;
  /** Upstream guid; falls back to the link when the feed has none. */
  guid?: string;
  title: string;
  link: string;
  description?: string | null;
  published_at?: string | null;
}

export interface ArticleTranslation {
  title: string;
  description: string;
}

export interface ArticleFilter {
  feedId?: number;
  unreadOnly?: boolean;
  bookmarkedOnly?: boolean;
  tag?: string;
  search?: string;
  limit?: number;
}

export interface UpsertResult {
  article: Article;
  isNew: boolean;
  /** New, or a fetched field differed and the revision moved. */
  changed: boolean;
}
