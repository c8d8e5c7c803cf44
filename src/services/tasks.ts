import PQueue from 'p-queue';
import type { AppEvent } from '../models/event.js';
import {
  isTerminal,
  type TaskContext,
  type TaskHandle,
  type TaskOutcome,
  type TaskRecord,
  type TaskSpec,
} from '../models/task.js';
import { TaskFailure, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const log = logger.scope('Tasks');

// 任务配置
const DEFAULT_CONCURRENCY = 3;
const DEFAULT_TIMEOUT_MS = 60_000;
const MAX_ATTEMPTS = 2; // 一次自动重试，仅限瞬时错误

type TaskEvent = Extract<AppEvent, { type: 'task' }>;

interface TaskEntry<T> {
  record: TaskRecord;
  spec: TaskSpec<T>;
  timeoutMs: number;
  result: Promise<TaskOutcome<T>>;
  resolve: (outcome: TaskOutcome<T>) => void;
}

type InFlight<R> = { [K in keyof R]?: Map<string, TaskEntry<R[K]>> };

export interface CoordinatorOptions {
  concurrency?: number;
  timeoutMs?: number;
  /** Called exactly once per task with its terminal outcome. */
  notify?: (event: TaskEvent) => void;
  now?: () => number;
}

export interface SubmitOptions {
  timeoutMs?: number;
}

function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

/**
 * Runs keyed background work on a bounded pool.
 *
 * `R` maps each task kind to its result type. While a (kind, id) task is
 * pending or running, further submissions attach to it instead of running
 * the work again. State transitions happen in synchronous blocks only, so
 * the event loop serializes them without an explicit lock.
 */
export class TaskCoordinator<R extends Record<string, unknown>> {
  private readonly queue: PQueue;
  private readonly freeLanes: number[];
  private readonly inflight: InFlight<R> = {};
  private readonly live = new Set<TaskRecord>();
  private readonly defaultTimeoutMs: number;
  private readonly notify: (event: TaskEvent) => void;
  private readonly now: () => number;

  constructor(options: CoordinatorOptions = {}) {
    const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
    this.queue = new PQueue({ concurrency });
    // 倒序放入，pop() 时先拿到 lane 0
    this.freeLanes = Array.from({ length: concurrency }, (_, i) => concurrency - 1 - i);
    this.defaultTimeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.notify = options.notify ?? (() => undefined);
    this.now = options.now ?? Date.now;
  }

  get concurrency(): number {
    return this.queue.concurrency;
  }

  submit<K extends keyof R & string>(
    kind: K,
    id: string,
    spec: TaskSpec<R[K]>,
    options: SubmitOptions = {}
  ): TaskHandle<R[K]> {
    const table = this.table(kind);
    const existing = table.get(id);
    if (existing) {
      log.debug(`${kind}:${id} already ${existing.record.status}, attaching`);
      return this.handle(kind, existing, true);
    }

    const { promise, resolve } = deferred<TaskOutcome<R[K]>>();
    const entry: TaskEntry<R[K]> = {
      record: {
        kind,
        id,
        status: 'pending',
        submittedAt: this.now(),
        startedAt: null,
        finishedAt: null,
        attempts: 0,
      },
      spec,
      timeoutMs: options.timeoutMs ?? this.defaultTimeoutMs,
      result: promise,
      resolve,
    };
    table.set(id, entry);
    this.live.add(entry.record);

    this.queue
      .add(() => this.execute(kind, entry))
      .catch((error: unknown) => {
        // execute() settles every path itself; this only guards the queue
        log.error(`${kind}:${id} escaped the worker: ${errorMessage(error)}`);
        this.settle(kind, entry, { status: 'failed', failure: TaskFailure.from(error) });
      });

    return this.handle(kind, entry, false);
  }

  /** Live (non-terminal) task records. */
  snapshot(): TaskRecord[] {
    return [...this.live].map((record) => ({ ...record }));
  }

  /** Resolves when nothing is queued or running. */
  async onIdle(): Promise<void> {
    await this.queue.onIdle();
  }

  private table<K extends keyof R>(kind: K): Map<string, TaskEntry<R[K]>> {
    const existing = this.inflight[kind];
    if (existing) return existing;
    const created = new Map<string, TaskEntry<R[K]>>();
    this.inflight[kind] = created;
    return created;
  }

  private handle<K extends keyof R & string>(kind: K, entry: TaskEntry<R[K]>, attached: boolean): TaskHandle<R[K]> {
    return {
      kind,
      id: entry.record.id,
      attached,
      result: entry.result,
      status: () => entry.record.status,
      cancel: () => {
        if (entry.record.status !== 'pending') return false;
        return this.settle(kind, entry, { status: 'canceled' });
      },
    };
  }

  private async execute<K extends keyof R & string>(kind: K, entry: TaskEntry<R[K]>): Promise<void> {
    const { record } = entry;
    // 排队期间被取消
    if (record.status !== 'pending') return;

    const lane = this.freeLanes.pop() ?? 0;
    record.status = 'running';
    record.startedAt = this.now();

    const controller = new AbortController();
    const ctx: TaskContext = { lane, signal: controller.signal, attempt: 0 };
    let timer: NodeJS.Timeout | undefined;

    const expired = new Promise<TaskOutcome<R[K]>>((resolve) => {
      timer = setTimeout(() => {
        const failure = TaskFailure.timeout(entry.timeoutMs);
        // abort first so a result racing in can no longer commit
        controller.abort(failure);
        resolve({ status: 'failed', failure });
      }, entry.timeoutMs);
    });

    try {
      const outcome = await Promise.race([this.attempt(entry, ctx), expired]);
      this.settle(kind, entry, outcome);
    } finally {
      clearTimeout(timer);
      this.freeLanes.push(lane);
    }
  }

  private async attempt<T>(entry: TaskEntry<T>, ctx: TaskContext): Promise<TaskOutcome<T>> {
    const { record } = entry;

    for (let attempt = 1; ; attempt++) {
      record.attempts = attempt;
      const context: TaskContext = { ...ctx, attempt };

      let value: T;
      try {
        value = await entry.spec.run(context);
      } catch (error) {
        const failure = TaskFailure.from(error);
        if (ctx.signal.aborted) {
          return { status: 'failed', failure: TaskFailure.timeout(entry.timeoutMs) };
        }
        if (failure.transient && attempt < MAX_ATTEMPTS) {
          log.warn(`${record.kind}:${record.id} failed (${failure.reason}), retrying once`);
          continue;
        }
        return { status: 'failed', failure };
      }

      // 超时之后才返回的结果直接丢弃
      if (ctx.signal.aborted) {
        log.debug(`${record.kind}:${record.id} returned after timeout, result discarded`);
        return { status: 'failed', failure: TaskFailure.timeout(entry.timeoutMs) };
      }

      try {
        entry.spec.commit?.(value, context);
      } catch (error) {
        return { status: 'failed', failure: TaskFailure.from(error) };
      }
      return { status: 'done', value };
    }
  }

  private settle<K extends keyof R & string>(kind: K, entry: TaskEntry<R[K]>, outcome: TaskOutcome<R[K]>): boolean {
    const { record } = entry;
    if (isTerminal(record.status)) return false;

    record.status = outcome.status;
    record.finishedAt = this.now();

    const table = this.table(kind);
    if (table.get(record.id) === entry) {
      table.delete(record.id);
    }
    this.live.delete(record);

    if (outcome.status === 'failed') {
      log.debug(`${kind}:${record.id} failed: ${outcome.failure.reason} ${outcome.failure.message}`);
    }

    entry.resolve(outcome);
    this.notify({ type: 'task', kind, id: record.id, outcome });
    return true;
  }
}
