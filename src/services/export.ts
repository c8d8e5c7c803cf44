import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import type { BookmarkedArticle } from '../models/bookmark.js';
import type { DigestArtifact } from '../models/digest.js';
import type { ArtifactCache } from './artifact-cache.js';
import type { ArticleStore } from './store.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const log = logger.scope('Export');

const MEMO_HEADING = '## Memo';
const NO_MEMO = '*(no memo)*';

export interface ExportSummary {
  dir: string;
  bookmarks: string[];
  digests: string[];
  failed: number;
}

// 标题转文件名片段，保留各语言文字
export function slugify(text: string, maxLength = 60): string {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, maxLength)
    .replace(/-+$/, '');
}

// 确保目录存在
function ensureDir(dir: string): void {
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}

function escapeYaml(text: string): string {
  return text.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

export function articleDate(article: Pick<BookmarkedArticle, 'published_at' | 'fetched_at'>): string {
  return (article.published_at ?? article.fetched_at).slice(0, 10);
}

export function bookmarkFileName(article: BookmarkedArticle, suffix?: string): string {
  const slug = slugify(article.title) || article.id;
  return suffix ? `${articleDate(article)}-${slug}-${suffix}.md` : `${articleDate(article)}-${slug}.md`;
}

export function digestFileName(scopeKey: string): string {
  return `digest-${scopeKey.replace(/[^\p{L}\p{N}@=._-]+/gu, '_')}.md`;
}

/** The memo section of an exported note, or null when it holds no memo. */
export function extractMemo(note: string): string | null {
  const lines = note.split('\n');
  const start = lines.findIndex((line) => line.trim() === MEMO_HEADING);
  if (start === -1) return null;

  const memo: string[] = [];
  for (const line of lines.slice(start + 1)) {
    const trimmed = line.trim();
    if (trimmed === '---' || trimmed.startsWith('## ')) break;
    memo.push(line);
  }
  const text = memo.join('\n').trim();
  return text && text !== NO_MEMO ? text : null;
}

function noteSource(note: string): string | null {
  return /^source: (.+)$/m.exec(note)?.[1] ?? null;
}

function readNote(path: string): string | null {
  return existsSync(path) ? readFileSync(path, 'utf-8') : null;
}

export function renderBookmarkNote(article: BookmarkedArticle, memo = article.bookmark.memo): string {
  const { bookmark } = article;
  const lines = [
    '---',
    `title: "${escapeYaml(article.title)}"`,
    `source: ${article.link}`,
    `feed: "${escapeYaml(article.feed_name)}"`,
    `date: ${articleDate(article)}`,
  ];
  if (bookmark.tags.length > 0) {
    lines.push('tags:', ...bookmark.tags.map((tag) => `  - ${tag}`));
  }
  lines.push('---', '', `# ${article.title}`, '', article.description || '*(no description)*', '');

  if (article.insight) {
    lines.push('## Insight', '', article.insight, '');
  }

  if (article.translated_title || article.translated_description || article.translated_body) {
    lines.push('## Translation', '');
    if (article.translated_title) lines.push(`**Title**: ${article.translated_title}`, '');
    if (article.translated_description) lines.push(`**Description**: ${article.translated_description}`, '');
    if (article.translated_body) lines.push(article.translated_body, '');
  }

  lines.push(MEMO_HEADING, '', memo || NO_MEMO, '');
  lines.push('---', `[${article.title}](${article.link})`, '');
  return lines.join('\n');
}

export function renderDigestNote(digest: DigestArtifact): string {
  return [
    '---',
    `scope: "${escapeYaml(digest.scope_key)}"`,
    `articles: ${digest.article_count}`,
    `generated_at: ${digest.generated_at}`,
    '---',
    '',
    `# Digest: ${digest.scope_key}`,
    '',
    digest.text,
    '',
  ].join('\n');
}

/**
 * Writes every bookmark and cached digest as Markdown. Reads the store only.
 *
 * Re-exporting overwrites a bookmark's note in place. When the bookmark has
 * no stored memo, the memo already written in the note is kept. A note whose
 * name is taken by another article gets the article id appended.
 */
export function exportMarkdown(store: ArticleStore, cache: ArtifactCache, dir: string): ExportSummary {
  ensureDir(dir);
  const summary: ExportSummary = { dir, bookmarks: [], digests: [], failed: 0 };
  const used = new Set<string>();

  for (const article of store.listBookmarks()) {
    try {
      let name = bookmarkFileName(article);
      let previous = readNote(join(dir, name));
      if (used.has(name) || (previous !== null && noteSource(previous) !== article.link)) {
        name = bookmarkFileName(article, article.id.slice(0, 8));
        previous = readNote(join(dir, name));
      }
      used.add(name);

      const path = join(dir, name);
      const memo = article.bookmark.memo ?? (previous === null ? null : extractMemo(previous));
      writeFileSync(path, renderBookmarkNote(article, memo), 'utf-8');
      summary.bookmarks.push(path);
    } catch (err) {
      summary.failed++;
      log.error(`Failed to export article ${article.id}: ${errorMessage(err)}`);
    }
  }

  for (const digest of cache.listDigests()) {
    const path = join(dir, digestFileName(digest.scope_key));
    try {
      writeFileSync(path, renderDigestNote(digest), 'utf-8');
      summary.digests.push(path);
    } catch (err) {
      summary.failed++;
      log.error(`Failed to export digest ${digest.scope_key}: ${errorMessage(err)}`);
    }
  }

  return summary;
}
