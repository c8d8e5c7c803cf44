import { JSDOM } from 'jsdom';
import { mkdirSync, readFileSync, statSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import type { FeedInput } from '../models/feed.js';
import { errorMessage } from '../utils/errors.js';

export const MAX_OPML_BYTES = 1_048_576;

export class OpmlError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'OpmlError';
  }
}

function isHttpUrl(value: string): boolean {
  return value.startsWith('http://') || value.startsWith('https://');
}

function childElements(parent: Element, name: string): Element[] {
  return Array.from(parent.children).filter((el) => el.localName === name);
}

// 递归遍历 outline，外层文件夹名作为分类
function collectFeeds(parent: Element, category: string | undefined, feeds: FeedInput[]): void {
  for (const outline of childElements(parent, 'outline')) {
    const xmlUrl = outline.getAttribute('xmlUrl')?.trim();
    const label = outline.getAttribute('title') || outline.getAttribute('text') || '';
    if (xmlUrl && isHttpUrl(xmlUrl)) {
      feeds.push({ name: label || xmlUrl, url: xmlUrl, ...(category ? { category } : {}) });
    }
    collectFeeds(outline, xmlUrl ? category : label || category, feeds);
  }
}

/** Lists the http(s) feeds in an OPML document, including those nested in folders. */
export function parseOpml(xml: string): FeedInput[] {
  if (Buffer.byteLength(xml) > MAX_OPML_BYTES) {
    throw new OpmlError(`OPML document too large (> ${MAX_OPML_BYTES} bytes)`);
  }

  let document: Document;
  try {
    document = new JSDOM(xml, { contentType: 'text/xml' }).window.document;
  } catch (error) {
    throw new OpmlError(`Invalid OPML: ${errorMessage(error)}`, { cause: error });
  }

  const root = document.documentElement;
  if (root.localName !== 'opml') {
    throw new OpmlError(`Invalid OPML: root element is <${root.localName}>`);
  }

  const feeds: FeedInput[] = [];
  for (const body of childElements(root, 'body')) {
    collectFeeds(body, undefined, feeds);
  }
  return feeds;
}

export function readOpmlFile(path: string): FeedInput[] {
  if (statSync(path).size > MAX_OPML_BYTES) {
    throw new OpmlError(`OPML file too large (> ${MAX_OPML_BYTES} bytes)`);
  }
  return parseOpml(readFileSync(path, 'utf-8'));
}

export function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

export function exportOpml(
  feeds: readonly Pick<FeedInput, 'name' | 'url'>[],
  title = 'feedmind feeds',
  now: Date = new Date()
): string {
  const outlines = feeds.map((feed) => {
    const name = escapeXml(feed.name);
    return `    <outline type="rss" text="${name}" title="${name}" xmlUrl="${escapeXml(feed.url)}" />`;
  });

  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<opml version="2.0">',
    '  <head>',
    `    <title>${escapeXml(title)}</title>`,
    `    <dateCreated>${now.toUTCString()}</dateCreated>`,
    '  </head>',
    '  <body>',
    ...outlines,
    '  </body>',
    '</opml>',
    '',
  ].join('\n');
}

export function writeOpmlFile(path: string, feeds: readonly Pick<FeedInput, 'name' | 'url'>[]): string {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, exportOpml(feeds), 'utf-8');
  return path;
}
