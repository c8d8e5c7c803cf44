import type { TaskFailure } from '../utils/errors.js';

export type TaskStatus = 'pending' | 'running' | 'done' | 'failed' | 'canceled';

export type TaskOutcome<T> =
  | { status: 'done'; value: T }
  | { status: 'failed'; failure: TaskFailure }
  | { status: 'canceled' };

export interface TaskRecord {
  kind: string;
  id: string;
  status: TaskStatus;
  submittedAt: number;
  startedAt: number | null;
  finishedAt: number | null;
  attempts: number;
}

export interface TaskContext {
  /** Index of the worker lane; each lane owns a private store connection. */
  lane: number;
  /** Aborted when the task times out. Long calls should pass it on. */
  signal: AbortSignal;
  attempt: number;
}

export interface TaskSpec<T> {
  run(ctx: TaskContext): Promise<T>;
  /** Persists an accepted result. Never called for a result that arrives after the timeout. */
  commit?(value: T, ctx: TaskContext): void;
}

export interface TaskHandle<T> {
  readonly kind: string;
  readonly id: string;
  /** True when this submission joined an execution that was already in flight. */
  readonly attached: boolean;
  /** Resolves with the terminal outcome; never rejects. */
  readonly result: Promise<TaskOutcome<T>>;
  status(): TaskStatus;
  /** Cancels a task that has not started yet. */
  cancel(): boolean;
}

export function isTerminal(status: TaskStatus): boolean {
  return status === 'done' || status === 'failed' || status === 'canceled';
}
