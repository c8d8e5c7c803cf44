import { describe, expect, it } from 'vitest';
import { extractArticle } from '../reader.js';

const PARAGRAPH =
  'Gardens reward patience. The soil improves a little every season when leaves are left to rot in place, ' +
  'and the worms do most of the work that a spade would otherwise do. Compost made from kitchen scraps adds ' +
  'structure, while a thick layer of mulch keeps moisture in during the dry months of summer. Over a few years ' +
  'the beds need less watering, fewer inputs and much less digging than they did at the start.';

describe('extractArticle', () => {
  it('extracts the main text of a page', () => {
    const html = `<!doctype html>
<html>
  <head><title>A readable article about gardens</title></head>
  <body>
    <nav><a href="/">Home</a> <a href="/about">About</a></nav>
    <article>
      <h1>A readable article about gardens</h1>
      <p>${PARAGRAPH}</p>
      <p>${PARAGRAPH}</p>
    </article>
    <footer>Copyright notice</footer>
  </body>
</html>`;

    const article = extractArticle(html, 'https://example.com/gardens');

    expect(article?.title).toBe('A readable article about gardens');
    expect(article?.textContent).toContain('Gardens reward patience.');
  });

  it('returns null for a page without text', () => {
    expect(extractArticle('<html><body></body></html>', 'https://example.com/empty')).toBeNull();
  });
});
