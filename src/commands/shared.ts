import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import { getPool } from '../db/index.js';
import type { TaskHandle } from '../models/task.js';
import { Workbench } from '../services/workbench.js';
import { loadSettings } from '../utils/config.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export interface JsonOption {
  json?: boolean;
}

let workbench: Workbench | null = null;

export function getWorkbench(): Workbench {
  if (!workbench) {
    const pool = getPool();
    workbench = new Workbench({ pool, settings: loadSettings(pool.primary) });
    // CLI 是唯一的消费者，只在 debug 下打印事件
    workbench.events.attach((event) => {
      logger.debug(`event ${JSON.stringify(event)}`);
    });
  }
  return workbench;
}

export async function closeWorkbench(): Promise<void> {
  if (workbench) {
    const current = workbench;
    workbench = null;
    await current.close();
  }
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

export function spinner(text: string, json?: boolean): Ora {
  return ora({ text, isSilent: Boolean(json) }).start();
}

/** Prints an error in the requested format and marks the process as failed. */
export function reportError(error: unknown, options: JsonOption, spin?: Ora): void {
  const message = errorMessage(error);
  spin?.fail(message);
  process.exitCode = 1;
  if (options.json) {
    printJson({ error: message });
  } else if (!spin) {
    logger.error(message);
  }
}

/** Waits for a task with a spinner. Returns the value, or null after reporting the failure. */
export async function awaitTask<T>(handle: TaskHandle<T>, label: string, options: JsonOption): Promise<T | null> {
  const spin = spinner(handle.attached ? `${label} (already running)...` : `${label}...`, options.json);
  const outcome = await handle.result;

  switch (outcome.status) {
    case 'done':
      spin.succeed(label);
      return outcome.value;
    case 'failed': {
      const { failure } = outcome;
      spin.fail(`${label} failed: ${chalk.dim(`[${failure.reason}]`)} ${failure.message}`);
      process.exitCode = 1;
      if (options.json) {
        printJson({ error: failure.message, reason: failure.reason });
      }
      return null;
    }
    case 'canceled':
      spin.warn(`${label} canceled`);
      return null;
  }
}

export function parseId(raw: string, what: string): number {
  const id = Number.parseInt(raw, 10);
  if (!Number.isInteger(id) || id <= 0 || String(id) !== raw.trim()) {
    throw new Error(`Invalid ${what}: ${raw}`);
  }
  return id;
}

export function formatDate(value: string | null): string {
  return value ? new Date(value).toLocaleString() : 'Never';
}
