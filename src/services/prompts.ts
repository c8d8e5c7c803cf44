import type { DigestScope } from '../models/digest.js';

export const LANG_NAMES: Record<string, string> = {
  en: 'English',
  ko: 'Korean',
  ja: 'Japanese',
  'zh-CN': 'Simplified Chinese',
  es: 'Spanish',
  de: 'German',
};

// 英文是源语言，不作为翻译目标
export const TRANSLATABLE_LANGS: ReadonlySet<string> = new Set(['ko', 'ja', 'zh-CN', 'es', 'de']);

export const TRANSLATE_TITLE_KEY = 'Title:';
export const TRANSLATE_DESCRIPTION_KEY = 'Description:';

export const BODY_TEXT_LIMIT = 10_000;
const NONE_TEXT = '(none)';

export function langName(lang: string): string {
  return LANG_NAMES[lang] ?? lang;
}

export interface InsightInput {
  title: string;
  description: string | null;
}

export function buildInsightPrompt(article: InsightInput, lang: string, persona: string | null): string {
  const reader = persona
    ? `## Reader
${persona}

Tailor the insight to this reader: what it means for their work, which opportunity or risk they should notice.`
    : 'Focus on why it matters: practical impact, hidden implications, what to watch out for.';

  return `You are a sharp reader commenting on an article from an RSS feed.
Write one or two sentences of insight about the article below. Do not restate the title or summarize.
${reader}
Keep technical terms as they are. Answer in ${langName(lang)}.

## Article
Title: ${article.title}
Description: ${article.description || NONE_TEXT}`;
}

export function buildTranslateMetaPrompt(article: InsightInput, lang: string): string {
  return `Translate the title and description of this English article into natural ${langName(lang)}.
Keep technical terms recognizable by adding the English term in parentheses.
Reply with exactly these two lines and nothing else:
${TRANSLATE_TITLE_KEY} <translated title>
${TRANSLATE_DESCRIPTION_KEY} <translated description>

## Article
Title: ${article.title}
Description: ${article.description || NONE_TEXT}`;
}

export function buildTranslateBodyPrompt(text: string, lang: string): string {
  return `Translate the English text below into natural ${langName(lang)}.
Keep technical terms recognizable by adding the English term in parentheses.
Output the translation only.

## Text
${text.slice(0, BODY_TEXT_LIMIT)}`;
}

export interface DigestItem {
  title: string;
  feedName: string;
  date: string;
  description: string | null;
  insight: string | null;
  tags: string[];
  memo: string | null;
}

function describeScope(scope: DigestScope): string {
  if (scope.kind === 'recent') {
    return `articles published in the last ${scope.days} days`;
  }
  return scope.tag ? `articles I bookmarked under the tag "${scope.tag}"` : 'articles I bookmarked';
}

export function buildDigestPrompt(
  scope: DigestScope,
  items: readonly DigestItem[],
  lang: string,
  persona: string | null
): string {
  const itemsText = items
    .map((item, i) => {
      const lines = [
        `[${i + 1}] ${item.title} (${item.feedName}, ${item.date})`,
        `Description: ${item.description || NONE_TEXT}`,
        `Insight: ${item.insight || NONE_TEXT}`,
      ];
      if (item.tags.length > 0) lines.push(`Tags: ${item.tags.join(', ')}`);
      if (item.memo) lines.push(`My note: ${item.memo}`);
      return lines.join('\n');
    })
    .join('\n\n');

  const reader = persona ? `\n## Reader\n${persona}\n\nPrioritize what matters most to this reader.\n` : '';

  return `Below are ${describeScope(scope)}.
${reader}
Write a digest in ${langName(lang)} with three parts:
1. Common themes across these articles
2. Key takeaways
3. Topics worth exploring next

## Articles
${itemsText}`;
}
