import Anthropic from '@anthropic-ai/sdk';
import { execFile } from 'child_process';
import { accessSync, constants } from 'fs';
import { delimiter, join } from 'path';
import { promisify } from 'util';
import type { AppSettings } from '../models/config.js';
import { TaskFailure, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const log = logger.scope('LLM');
const execFileAsync = promisify(execFile);

export interface GenerateOptions {
  timeoutMs: number;
  signal?: AbortSignal;
  maxTokens?: number;
}

/**
 * Text generation backend. Failures are thrown as `TaskFailure` with a
 * structured reason so the coordinator can decide whether to retry.
 */
export interface AiProvider {
  readonly name: string;
  isAvailable(): boolean;
  generate(prompt: string, options: GenerateOptions): Promise<string>;
}

interface ChatResponse {
  id: string;
  choices: { message: { content: string | null }; finish_reason: string }[];
  usage?: { prompt_tokens: number; completion_tokens: number; total_tokens: number };
}

export function failureForStatus(status: number, body: string): TaskFailure {
  const message = `HTTP ${status}: ${body.slice(0, 200)}`;
  if (status === 401 || status === 403) return new TaskFailure('auth', message);
  if (status === 429) return new TaskFailure('rate_limited', message);
  if (status >= 500) return new TaskFailure('server', message);
  return new TaskFailure('bad_response', message);
}

// 外部 signal 与本地超时合并到同一个 controller
function linkAbort(controller: AbortController, signal?: AbortSignal): () => void {
  if (!signal) return () => undefined;
  if (signal.aborted) {
    controller.abort(signal.reason);
    return () => undefined;
  }
  const onAbort = () => controller.abort(signal.reason);
  signal.addEventListener('abort', onAbort, { once: true });
  return () => signal.removeEventListener('abort', onAbort);
}

/** Any server speaking the `/chat/completions` protocol. */
export class OpenAiCompatibleProvider implements AiProvider {
  readonly name = 'openai';

  constructor(
    private readonly apiKey: string | null,
    private readonly baseUrl: string,
    private readonly model: string
  ) {}

  isAvailable(): boolean {
    return Boolean(this.apiKey);
  }

  async generate(prompt: string, options: GenerateOptions): Promise<string> {
    if (!this.apiKey) {
      throw new TaskFailure('unavailable', 'LLM_API_KEY not set');
    }

    const url = `${this.baseUrl.replace(/\/+$/, '')}/chat/completions`;
    log.debug(`Calling ${url} with model ${this.model}`);

    const controller = new AbortController();
    const unlink = linkAbort(controller, options.signal);
    const timeout = setTimeout(() => controller.abort(), options.timeoutMs);

    try {
      const response = await fetch(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'Authorization': `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify({
          model: this.model,
          messages: [{ role: 'user', content: prompt }],
          temperature: 0.3,
          max_tokens: options.maxTokens ?? 1024,
        }),
        signal: controller.signal,
      });

      if (!response.ok) {
        throw failureForStatus(response.status, await response.text());
      }

      const data = (await response.json()) as ChatResponse;
      log.debug(`Response received, tokens: ${data.usage?.total_tokens ?? 'unknown'}`);

      const content = data.choices[0]?.message?.content?.trim();
      if (!content) {
        throw new TaskFailure('empty_response', 'Model returned no content');
      }
      return content;
    } catch (error) {
      if (error instanceof TaskFailure) throw error;
      if (controller.signal.aborted) {
        throw new TaskFailure('timeout', `Request aborted after ${options.timeoutMs}ms`, { cause: error });
      }
      // fetch 的网络错误是 TypeError
      if (error instanceof TypeError) {
        throw new TaskFailure('network', error.message, { cause: error });
      }
      throw new TaskFailure('error', errorMessage(error), { cause: error });
    } finally {
      clearTimeout(timeout);
      unlink();
    }
  }
}

export class AnthropicProvider implements AiProvider {
  readonly name = 'anthropic';
  private client: Anthropic | null = null;

  constructor(
    private readonly apiKey: string | null,
    private readonly model: string
  ) {}

  isAvailable(): boolean {
    return Boolean(this.apiKey);
  }

  private getClient(apiKey: string): Anthropic {
    if (!this.client) {
      // 重试交给 TaskCoordinator
      this.client = new Anthropic({ apiKey, maxRetries: 0 });
    }
    return this.client;
  }

  async generate(prompt: string, options: GenerateOptions): Promise<string> {
    if (!this.apiKey) {
      throw new TaskFailure('unavailable', 'ANTHROPIC_API_KEY not set');
    }

    try {
      const response = await this.getClient(this.apiKey).messages.create(
        {
          model: this.model,
          max_tokens: options.maxTokens ?? 1024,
          messages: [{ role: 'user', content: prompt }],
        },
        { timeout: options.timeoutMs, signal: options.signal }
      );
      const text = response.content
        .map((block) => (block.type === 'text' ? block.text : ''))
        .join('')
        .trim();
      if (!text) {
        throw new TaskFailure('empty_response', 'Model returned no text');
      }
      return text;
    } catch (error) {
      throw classifyAnthropicError(error);
    }
  }
}

export function classifyAnthropicError(error: unknown): TaskFailure {
  if (error instanceof TaskFailure) return error;
  const options = { cause: error };
  if (error instanceof Anthropic.APIUserAbortError || error instanceof Anthropic.APIConnectionTimeoutError) {
    return new TaskFailure('timeout', error.message, options);
  }
  if (error instanceof Anthropic.APIConnectionError) {
    return new TaskFailure('network', error.message, options);
  }
  if (error instanceof Anthropic.AuthenticationError || error instanceof Anthropic.PermissionDeniedError) {
    return new TaskFailure('auth', error.message, options);
  }
  if (error instanceof Anthropic.RateLimitError) {
    return new TaskFailure('rate_limited', error.message, options);
  }
  if (error instanceof Anthropic.InternalServerError) {
    return new TaskFailure('server', error.message, options);
  }
  if (error instanceof Anthropic.APIError) {
    return new TaskFailure('bad_response', error.message, options);
  }
  return new TaskFailure('error', errorMessage(error), options);
}

function findExecutable(command: string): string | null {
  if (command.includes('/')) {
    return isExecutable(command) ? command : null;
  }
  for (const dir of (process.env.PATH ?? '').split(delimiter)) {
    if (!dir) continue;
    const candidate = join(dir, command);
    if (isExecutable(candidate)) return candidate;
  }
  return null;
}

function isExecutable(path: string): boolean {
  try {
    accessSync(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/** A local model CLI invoked as `<command> -p <prompt> [--model <model>]`. */
export class CliProvider implements AiProvider {
  readonly name = 'cli';
  private resolved: string | null | undefined;

  constructor(
    private readonly command: string,
    private readonly model: string | null
  ) {}

  isAvailable(): boolean {
    if (this.resolved === undefined) {
      this.resolved = findExecutable(this.command);
    }
    return this.resolved !== null;
  }

  async generate(prompt: string, options: GenerateOptions): Promise<string> {
    const executable = this.isAvailable() ? this.resolved : null;
    if (!executable) {
      throw new TaskFailure('unavailable', `${this.command} not found on PATH`);
    }

    const args = ['-p', prompt];
    if (this.model) args.push('--model', this.model);

    try {
      const { stdout } = await execFileAsync(executable, args, {
        timeout: options.timeoutMs,
        signal: options.signal,
        maxBuffer: 4 * 1024 * 1024,
      });
      const text = stdout.trim();
      if (!text) {
        throw new TaskFailure('empty_response', `${this.command} printed nothing`);
      }
      return text;
    } catch (error) {
      if (error instanceof TaskFailure) throw error;
      if (options.signal?.aborted || (error instanceof Error && 'killed' in error && error.killed === true)) {
        throw new TaskFailure('timeout', `${this.command} did not finish in ${options.timeoutMs}ms`, { cause: error });
      }
      throw new TaskFailure('error', `${this.command} failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}

export function createProvider(llm: AppSettings['llm']): AiProvider {
  switch (llm.provider) {
    case 'anthropic':
      return new AnthropicProvider(
        llm.apiKey ?? process.env.ANTHROPIC_API_KEY ?? null,
        llm.model ?? 'claude-3-5-haiku-latest'
      );
    case 'cli':
      return new CliProvider(llm.command, llm.model);
    case 'openai':
      return new OpenAiCompatibleProvider(
        llm.apiKey ?? process.env.OPENAI_API_KEY ?? null,
        llm.baseUrl,
        llm.model ?? 'gpt-4o-mini'
      );
  }
}
