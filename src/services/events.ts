import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const log = logger.scope('Events');

export type Listener<E> = (event: E) => void;

/**
 * Hands events from any producer to the one consumer.
 *
 * Events are buffered in publish order and delivered on a later macrotask,
 * never inside the producer's call stack. A single FIFO buffer keeps
 * same-key events in order. Nothing is delivered (or lost) until a consumer
 * attaches.
 */
export class EventBridge<E> {
  private readonly buffer: E[] = [];
  private readonly listeners = new Map<string, Set<Listener<E>>>();
  private consumer: Listener<E> | null = null;
  private scheduled: NodeJS.Immediate | null = null;
  private idleWaiters: (() => void)[] = [];

  constructor(private readonly keyOf: (event: E) => string) {}

  publish(event: E): void {
    this.buffer.push(event);
    this.schedule();
  }

  /** Registers the consumer. Only one may be attached at a time. */
  attach(consumer: Listener<E>): () => void {
    if (this.consumer) {
      throw new Error('EventBridge already has a consumer');
    }
    this.consumer = consumer;
    this.schedule();
    return () => {
      if (this.consumer === consumer) {
        this.consumer = null;
      }
    };
  }

  /** Per-key listener, called after the consumer for events with this key. */
  subscribe(key: string, listener: Listener<E>): () => void {
    const set = this.listeners.get(key) ?? new Set<Listener<E>>();
    this.listeners.set(key, set);
    set.add(listener);
    return () => {
      set.delete(listener);
      if (set.size === 0) {
        this.listeners.delete(key);
      }
    };
  }

  get pending(): number {
    return this.buffer.length;
  }

  /** Resolves once every buffered event has been delivered. */
  flush(): Promise<void> {
    if (this.buffer.length === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
      this.schedule();
    });
  }

  private schedule(): void {
    if (this.scheduled || !this.consumer || this.buffer.length === 0) return;
    this.scheduled = setImmediate(() => this.drain());
  }

  private drain(): void {
    this.scheduled = null;

    while (this.consumer) {
      const event = this.buffer.shift();
      if (event === undefined) break;
      this.deliver(this.consumer, event);
    }

    if (this.buffer.length === 0) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      for (const resolve of waiters) resolve();
    }
  }

  private deliver(consumer: Listener<E>, event: E): void {
    const key = this.keyOf(event);
    this.invoke(consumer, event, key);
    const set = this.listeners.get(key);
    if (!set) return;
    for (const listener of [...set]) {
      this.invoke(listener, event, key);
    }
  }

  private invoke(listener: Listener<E>, event: E, key: string): void {
    try {
      listener(event);
    } catch (error) {
      log.error(`Listener for ${key} failed: ${errorMessage(error)}`);
    }
  }
}
