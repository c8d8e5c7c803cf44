export type StorageFaultReason = 'busy' | 'io' | 'not_found' | 'constraint';

/** A single store operation failed; nothing it attempted was committed. */
export class StorageFault extends Error {
  override readonly name = 'StorageFault';

  constructor(
    readonly reason: StorageFaultReason,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** A migration failed. Startup must abort; the schema is left at `version - 1`. */
export class SchemaFault extends Error {
  override readonly name = 'SchemaFault';

  constructor(
    readonly version: number,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export type TaskFailureReason =
  | 'timeout'
  | 'unavailable'
  | 'auth'
  | 'rate_limited'
  | 'network'
  | 'server'
  | 'empty_response'
  | 'bad_response'
  | 'storage'
  | 'error';

const TRANSIENT_REASONS: ReadonlySet<TaskFailureReason> = new Set([
  'network',
  'rate_limited',
  'server',
  'empty_response',
]);

export class TaskFailure extends Error {
  override readonly name = 'TaskFailure';
  readonly transient: boolean;

  constructor(
    readonly reason: TaskFailureReason,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.transient = TRANSIENT_REASONS.has(reason);
  }

  static timeout(ms: number): TaskFailure {
    return new TaskFailure('timeout', `Timed out after ${ms}ms`);
  }

  /** Wraps anything a task threw into a classified failure. */
  static from(error: unknown): TaskFailure {
    if (error instanceof TaskFailure) return error;
    if (error instanceof StorageFault) {
      return new TaskFailure('storage', error.message, { cause: error });
    }
    return new TaskFailure('error', errorMessage(error), { cause: error });
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
