import type { ArticleTranslation } from '../models/article.js';
import type { DigestScope } from '../models/digest.js';
import type { DigestEntry } from './store.js';
import type { AiProvider } from './providers.js';
import {
  TRANSLATABLE_LANGS,
  TRANSLATE_DESCRIPTION_KEY,
  TRANSLATE_TITLE_KEY,
  buildDigestPrompt,
  buildInsightPrompt,
  buildTranslateBodyPrompt,
  buildTranslateMetaPrompt,
  type InsightInput,
} from './prompts.js';
import { TaskFailure } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const log = logger.scope('LLM');

export interface LlmCallOptions {
  lang: string;
  signal?: AbortSignal;
}

export interface LlmServiceOptions {
  persona?: string | null;
  timeoutMs: number;
}

/**
 * Parses the `Title:` / `Description:` reply of a meta translation. When the
 * model ignores the format, the first line becomes the title, and the
 * original title is used if even that is empty.
 */
export function parseTranslation(output: string, fallbackTitle: string): ArticleTranslation {
  let title = '';
  let description = '';

  for (const raw of output.split('\n')) {
    const line = raw.trim();
    if (line.startsWith(TRANSLATE_TITLE_KEY)) {
      title = line.slice(TRANSLATE_TITLE_KEY.length).trim();
    } else if (line.startsWith(TRANSLATE_DESCRIPTION_KEY)) {
      description = line.slice(TRANSLATE_DESCRIPTION_KEY.length).trim();
    }
  }

  if (!title) {
    const firstLine = output.split('\n')[0]?.trim() ?? '';
    const bareKey = TRANSLATE_TITLE_KEY.replace(/:$/, '');
    title = firstLine && firstLine !== TRANSLATE_TITLE_KEY && firstLine !== bareKey ? firstLine : fallbackTitle;
  }

  return { title, description };
}

export function assertTranslatable(lang: string): void {
  if (!TRANSLATABLE_LANGS.has(lang)) {
    throw new TaskFailure('unavailable', `Translation to "${lang}" is not supported`);
  }
}

function formatDate(value: string | null): string {
  return value ? value.slice(0, 10) : 'unknown';
}

/** Prompt building and output parsing on top of an `AiProvider`. */
export class LlmService {
  private readonly persona: string | null;
  private readonly timeoutMs: number;

  constructor(
    readonly provider: AiProvider,
    options: LlmServiceOptions
  ) {
    this.persona = options.persona?.trim() || null;
    this.timeoutMs = options.timeoutMs;
  }

  isAvailable(): boolean {
    return this.provider.isAvailable();
  }

  async generateInsight(article: InsightInput, options: LlmCallOptions): Promise<string> {
    log.debug(`Insight for "${article.title}" in ${options.lang}`);
    return this.generate(buildInsightPrompt(article, options.lang, this.persona), options, 300);
  }

  async translateMeta(article: InsightInput, options: LlmCallOptions): Promise<ArticleTranslation> {
    assertTranslatable(options.lang);
    const output = await this.generate(buildTranslateMetaPrompt(article, options.lang), options, 600);
    return parseTranslation(output, article.title);
  }

  async translateBody(text: string, options: LlmCallOptions): Promise<string> {
    assertTranslatable(options.lang);
    if (!text.trim()) {
      throw new TaskFailure('bad_response', 'Article body is empty');
    }
    return this.generate(buildTranslateBodyPrompt(text, options.lang), options, 4096);
  }

  async generateDigest(scope: DigestScope, entries: readonly DigestEntry[], options: LlmCallOptions): Promise<string> {
    const items = entries.map(({ article, memo, tags }) => ({
      title: article.title,
      feedName: article.feed_name,
      date: formatDate(article.published_at ?? article.fetched_at),
      description: article.description,
      insight: article.insight,
      tags,
      memo,
    }));
    log.debug(`Digest over ${items.length} articles in ${options.lang}`);
    return this.generate(buildDigestPrompt(scope, items, options.lang, this.persona), options, 2048);
  }

  private async generate(prompt: string, options: LlmCallOptions, maxTokens: number): Promise<string> {
    return this.provider.generate(prompt, { timeoutMs: this.timeoutMs, signal: options.signal, maxTokens });
  }
}
