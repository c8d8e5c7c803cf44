export interface Feed {
  id: number;
  name: string;
  url: string;
  category: string | null;
  last_fetched_at: string | null;
  created_at: string;
}

export interface FeedInput {
  name: string;
  url: string;
  category?: string;
}

export interface FeedWithCount extends Feed {
  article_count: number;
}
