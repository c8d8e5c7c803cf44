import { describe, expect, it, vi } from 'vitest';
import { EventBridge } from '../events.js';
import { eventKey, type AppEvent } from '../../models/event.js';

function bridge(): EventBridge<AppEvent> {
  return new EventBridge<AppEvent>(eventKey);
}

const read = (id: string): AppEvent => ({ type: 'article', id, change: 'read' });

describe('EventBridge', () => {
  it('buffers events until a consumer attaches', async () => {
    const events = bridge();
    events.publish(read('a'));
    events.publish(read('b'));

    expect(events.pending).toBe(2);

    const seen: AppEvent[] = [];
    events.attach((event) => seen.push(event));
    await events.flush();

    expect(seen).toEqual([read('a'), read('b')]);
    expect(events.pending).toBe(0);
  });

  it('never delivers inside the publishing call', async () => {
    const events = bridge();
    const consumer = vi.fn();
    events.attach(consumer);

    events.publish(read('a'));
    expect(consumer).not.toHaveBeenCalled();

    await events.flush();
    expect(consumer).toHaveBeenCalledTimes(1);
  });

  it('allows a single consumer at a time', () => {
    const events = bridge();
    const detach = events.attach(() => undefined);

    expect(() => events.attach(() => undefined)).toThrow('already has a consumer');

    detach();
    expect(() => events.attach(() => undefined)).not.toThrow();
  });

  it('keeps events buffered after the consumer detaches', async () => {
    const events = bridge();
    const first = vi.fn();
    const detach = events.attach(first);
    detach();

    events.publish(read('a'));
    await new Promise((resolve) => setImmediate(resolve));

    expect(first).not.toHaveBeenCalled();
    expect(events.pending).toBe(1);
  });

  it('calls key subscribers after the consumer', async () => {
    const events = bridge();
    const order: string[] = [];
    events.attach((event) => order.push(`consumer:${eventKey(event)}`));
    events.subscribe('article:a', () => order.push('subscriber:a'));

    events.publish(read('a'));
    events.publish(read('b'));
    await events.flush();

    expect(order).toEqual(['consumer:article:a', 'subscriber:a', 'consumer:article:b']);
  });

  it('keeps delivering when a listener throws', async () => {
    const events = bridge();
    const seen: string[] = [];
    events.attach((event) => {
      if (event.type === 'article' && event.id === 'a') throw new Error('listener broke');
      seen.push(eventKey(event));
    });

    events.publish(read('a'));
    events.publish(read('b'));
    await events.flush();

    expect(seen).toEqual(['article:b']);
  });

  it('stops calling a subscriber once it unsubscribes', async () => {
    const events = bridge();
    const listener = vi.fn();
    events.attach(() => undefined);
    const unsubscribe = events.subscribe('cache', listener);

    events.publish({ type: 'cache', change: 'invalidated', count: 2 });
    await events.flush();
    unsubscribe();
    events.publish({ type: 'cache', change: 'invalidated', count: 1 });
    await events.flush();

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith({ type: 'cache', change: 'invalidated', count: 2 });
  });
});
