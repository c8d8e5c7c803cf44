import { describe, expect, it } from 'vitest';
import { LlmService, assertTranslatable, parseTranslation } from '../llm.js';
import { buildDigestPrompt, buildTranslateBodyPrompt, BODY_TEXT_LIMIT } from '../prompts.js';
import { TaskFailure } from '../../utils/errors.js';
import { FakeProvider } from './fixtures.js';

const article = { title: 'Rust in the kernel', description: 'A look at the first drivers.' };

describe('parseTranslation', () => {
  it('reads the title and description lines', () => {
    expect(parseTranslation('Title: 커널 속 러스트\nDescription: 첫 드라이버 살펴보기', 'fallback')).toEqual({
      title: '커널 속 러스트',
      description: '첫 드라이버 살펴보기',
    });
  });

  it('tolerates surrounding chatter', () => {
    expect(parseTranslation('Sure!\n  Title: 제목  \n\nDescription: 설명\nThanks', 'fallback')).toEqual({
      title: '제목',
      description: '설명',
    });
  });

  it('falls back to the first line when the format is ignored', () => {
    expect(parseTranslation('그냥 번역된 제목\n다른 줄', 'fallback')).toEqual({ title: '그냥 번역된 제목', description: '' });
  });

  it('falls back to the original title when nothing usable came back', () => {
    expect(parseTranslation('', 'Original')).toEqual({ title: 'Original', description: '' });
    expect(parseTranslation('Title:\nDescription: 설명', 'Original')).toEqual({ title: 'Original', description: '설명' });
  });
});

describe('assertTranslatable', () => {
  it('accepts the supported target languages only', () => {
    expect(() => assertTranslatable('ko')).not.toThrow();
    expect(() => assertTranslatable('en')).toThrow(TaskFailure);
    expect(() => assertTranslatable('fr')).toThrow('not supported');
  });
});

describe('LlmService', () => {
  it('asks for an insight in the requested language', async () => {
    const provider = new FakeProvider((_prompt, _call, options) => `tokens=${options.maxTokens} timeout=${options.timeoutMs}`);
    const llm = new LlmService(provider, { timeoutMs: 1234, persona: '  backend engineer  ' });

    const text = await llm.generateInsight(article, { lang: 'ko' });

    expect(text).toBe('tokens=300 timeout=1234');
    expect(provider.prompts[0]).toContain('Title: Rust in the kernel');
    expect(provider.prompts[0]).toContain('Answer in Korean.');
    expect(provider.prompts[0]).toContain('## Reader\nbackend engineer\n');
  });

  it('parses a meta translation', async () => {
    const llm = new LlmService(new FakeProvider(() => 'Title: 제목\nDescription: 설명'), { timeoutMs: 1000 });

    expect(await llm.translateMeta(article, { lang: 'ja' })).toEqual({ title: '제목', description: '설명' });
  });

  it('refuses to translate into English', async () => {
    const provider = new FakeProvider();
    const llm = new LlmService(provider, { timeoutMs: 1000 });

    await expect(llm.translateMeta(article, { lang: 'en' })).rejects.toMatchObject({ reason: 'unavailable' });
    expect(provider.calls).toBe(0);
  });

  it('refuses an empty body', async () => {
    const llm = new LlmService(new FakeProvider(), { timeoutMs: 1000 });

    await expect(llm.translateBody('  \n ', { lang: 'ko' })).rejects.toMatchObject({ reason: 'bad_response' });
  });

  it('passes the abort signal to the provider', async () => {
    const controller = new AbortController();
    let received: AbortSignal | undefined;
    const llm = new LlmService(
      new FakeProvider((_prompt, _call, options) => {
        received = options.signal;
        return 'ok';
      }),
      { timeoutMs: 1000 }
    );

    await llm.generateInsight(article, { lang: 'en', signal: controller.signal });

    expect(received).toBe(controller.signal);
  });
});

describe('prompts', () => {
  it('caps the body sent for translation', () => {
    const prompt = buildTranslateBodyPrompt('x'.repeat(BODY_TEXT_LIMIT + 500), 'de');

    expect(prompt).toContain('into natural German.');
    expect(prompt.endsWith('x'.repeat(BODY_TEXT_LIMIT))).toBe(true);
    expect(prompt).not.toContain('x'.repeat(BODY_TEXT_LIMIT + 1));
  });

  it('lists digest items with their tags and notes', () => {
    const prompt = buildDigestPrompt(
      { kind: 'bookmarks', tag: 'rust' },
      [
        {
          title: 'Rust in the kernel',
          feedName: 'LWN',
          date: '2026-03-01',
          description: null,
          insight: 'Drivers first.',
          tags: ['rust', 'linux'],
          memo: 'share with the team',
        },
      ],
      'en',
      null
    );

    expect(prompt).toContain('Below are articles I bookmarked under the tag "rust".');
    expect(prompt).toContain(
      '[1] Rust in the kernel (LWN, 2026-03-01)\nDescription: (none)\nInsight: Drivers first.\nTags: rust, linux\nMy note: share with the team'
    );
  });
});
