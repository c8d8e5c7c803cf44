import { describe, expect, it } from 'vitest';
import { RssService, toDescription } from '../rss.js';

const FEED = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0">
  <channel>
    <title>Example</title>
    <link>https://example.com</link>
    <description>Example feed</description>
    <item>
      <guid>a-1</guid>
      <title>  First  </title>
      <link>https://example.com/1</link>
      <description><![CDATA[<p>Hello <b>world</b></p>]]></description>
      <pubDate>Tue, 03 Mar 2026 10:00:00 GMT</pubDate>
    </item>
    <item>
      <link>https://example.com/2</link>
    </item>
    <item>
      <title>Orphan</title>
    </item>
  </channel>
</rss>`;

describe('RssService.parseItems', () => {
  it('maps items and skips those without guid or link', async () => {
    const items = await new RssService().parseItems(FEED, 7);

    expect(items).toEqual([
      {
        feed_id: 7,
        guid: 'a-1',
        title: 'First',
        link: 'https://example.com/1',
        description: 'Hello world',
        published_at: '2026-03-03T10:00:00.000Z',
      },
      {
        feed_id: 7,
        guid: 'https://example.com/2',
        title: 'Untitled',
        link: 'https://example.com/2',
        description: null,
        published_at: null,
      },
    ]);
  });
});

describe('toDescription', () => {
  it('collapses whitespace and drops markup', () => {
    expect(toDescription('<p>one</p>\n\n<p>two   three</p>')).toBe('one two three');
  });

  it('truncates long text', () => {
    const result = toDescription('a'.repeat(600));
    expect(result).toBe(`${'a'.repeat(500)}...`);
  });

  it('returns null for empty input', () => {
    expect(toDescription(undefined)).toBeNull();
    expect(toDescription('<img src="x.png">')).toBeNull();
  });
});
