import { Readability } from '@mozilla/readability';
import { JSDOM, VirtualConsole } from 'jsdom';
import { fetchText } from './http.js';
import { BODY_TEXT_LIMIT } from './prompts.js';
import { logger } from '../utils/logger.js';

const log = logger.scope('Reader');

const PAGE_ACCEPT = 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8';

export interface ExtractedArticle {
  title: string;
  textContent: string;
  byline?: string;
  excerpt?: string;
}

function normalizeText(text: string): string {
  return text
    .replace(/[ \t]+/g, ' ')
    .replace(/ *\n */g, '\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

/** Extracts the readable body of an HTML page. Returns null when nothing readable is found. */
export function extractArticle(html: string, url: string): ExtractedArticle | null {
  const vConsole = new VirtualConsole();
  vConsole.on('jsdomError', (error) => {
    // CSS 解析错误等噪音只在 debug 下输出
    log.debug(`jsdom: ${error.message}`);
  });

  const dom = new JSDOM(html, { url, virtualConsole: vConsole });
  try {
    const article = new Readability(dom.window.document).parse();
    const text = normalizeText(article?.textContent ?? '');
    if (!article || !text) {
      return null;
    }
    return {
      title: article.title,
      textContent: text.slice(0, BODY_TEXT_LIMIT),
      byline: article.byline || undefined,
      excerpt: article.excerpt || undefined,
    };
  } finally {
    dom.window.close();
  }
}

export async function fetchArticleText(url: string): Promise<ExtractedArticle | null> {
  const html = await fetchText(url, { accept: PAGE_ACCEPT, timeoutMs: 15_000 });
  const article = extractArticle(html, url);
  if (!article) {
    log.warn(`No readable content at ${url}`);
  }
  return article;
}
