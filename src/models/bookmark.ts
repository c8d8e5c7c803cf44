import type { ArticleWithFeed } from './article.js';

export interface Bookmark {
  article_id: string;
  memo: string | null;
  tags: string[];
  bookmarked_at: string;
  updated_at: string;
  revision: number;
}

export interface BookmarkedArticle extends ArticleWithFeed {
  bookmark: Bookmark;
}

export interface TagCount {
  tag: string;
  count: number;
}
