import fetch from 'node-fetch';
import { logger } from '../utils/logger.js';

const log = logger.scope('HTTP');

const USER_AGENT = 'Mozilla/5.0 (compatible; feedmind/1.0)';
const DEFAULT_TIMEOUT_MS = 20_000;

export interface FetchTextOptions {
  accept?: string;
  timeoutMs?: number;
  /** Responses larger than this are refused. */
  maxBytes?: number;
}

export class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

export async function fetchText(url: string, options: FetchTextOptions = {}): Promise<string> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), options.timeoutMs ?? DEFAULT_TIMEOUT_MS);

  try {
    log.debug(`GET ${url}`);
    const response = await fetch(url, {
      headers: {
        'User-Agent': USER_AGENT,
        'Accept': options.accept ?? '*/*',
      },
      signal: controller.signal,
    });
    if (!response.ok) {
      throw new HttpError(response.status, `HTTP ${response.status}: ${response.statusText}`);
    }

    const length = Number(response.headers.get('content-length') ?? 0);
    if (options.maxBytes && length > options.maxBytes) {
      throw new HttpError(response.status, `Response too large (${length} bytes)`);
    }
    const text = await response.text();
    if (options.maxBytes && Buffer.byteLength(text) > options.maxBytes) {
      throw new HttpError(response.status, `Response too large (${Buffer.byteLength(text)} bytes)`);
    }
    return text;
  } finally {
    clearTimeout(timeout);
  }
}
