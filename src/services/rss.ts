import Parser from 'rss-parser';
import { convert } from 'html-to-text';
import type { ArticleInput } from '../models/article.js';
import type { Feed } from '../models/feed.js';
import { fetchText } from './http.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const log = logger.scope('RSS');

const DESCRIPTION_LIMIT = 500;
const FEED_ACCEPT = 'application/rss+xml, application/atom+xml, application/xml, text/xml, */*';

interface RssCustomItem {
  contentEncoded?: string;
  summary?: string;
}

// HTML 转纯文本
export function htmlToPlainText(html: string): string {
  if (!html) return '';
  return convert(html, {
    wordwrap: false,
    selectors: [
      { selector: 'a', options: { ignoreHref: true } },
      { selector: 'img', format: 'skip' },
    ],
  }).trim();
}

export function toDescription(html: string | undefined): string | null {
  const text = htmlToPlainText(html ?? '').replace(/\s+/g, ' ').trim();
  if (!text) return null;
  return text.length > DESCRIPTION_LIMIT ? `${text.slice(0, DESCRIPTION_LIMIT)}...` : text;
}

function toIsoDate(value: string | undefined): string | null {
  if (!value) return null;
  const time = Date.parse(value);
  return Number.isNaN(time) ? null : new Date(time).toISOString();
}

export class RssService {
  private parser: Parser<Record<string, unknown>, RssCustomItem>;

  constructor() {
    this.parser = new Parser({
      customFields: {
        item: [['content:encoded', 'contentEncoded'], 'summary'],
      },
    });
  }

  /** Maps feed XML to article inputs. Items with neither guid nor link are skipped. */
  async parseItems(xml: string, feedId: number): Promise<ArticleInput[]> {
    const parsed = await this.parser.parseString(xml);
    const inputs: ArticleInput[] = [];

    for (const item of parsed.items) {
      const link = item.link?.trim() ?? '';
      const guid = item.guid?.trim() || link;
      if (!guid) {
        log.debug(`Skipping item without guid or link: ${item.title ?? '(untitled)'}`);
        continue;
      }
      inputs.push({
        feed_id: feedId,
        guid,
        title: item.title?.trim() || 'Untitled',
        link,
        description: toDescription(item.summary || item.content || item.contentEncoded),
        published_at: toIsoDate(item.isoDate ?? item.pubDate),
      });
    }

    return inputs;
  }

  async fetchFeed(feed: Feed): Promise<ArticleInput[]> {
    const xml = await fetchText(feed.url, { accept: FEED_ACCEPT });
    return this.parseItems(xml, feed.id);
  }

  async detectFeedInfo(url: string): Promise<{ title: string; description?: string } | null> {
    try {
      const xml = await fetchText(url, { accept: FEED_ACCEPT });
      const parsed = await this.parser.parseString(xml);
      return {
        title: parsed.title || url,
        description: parsed.description,
      };
    } catch (error) {
      log.debug(`Feed detection failed for ${url}: ${errorMessage(error)}`);
      return null;
    }
  }
}

export const rssService = new RssService();
