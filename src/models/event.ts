import type { TaskOutcome } from './task.js';

export type AppEvent =
  | { type: 'task'; kind: string; id: string; outcome: TaskOutcome<unknown> }
  | { type: 'article'; id: string; change: 'upserted' | 'read' | 'insight' | 'translation' }
  | { type: 'bookmark'; id: string; change: 'added' | 'removed' | 'tags' | 'memo' }
  | { type: 'feed'; id: number; change: 'added' | 'removed' | 'refreshed'; newCount?: number }
  | { type: 'cache'; change: 'invalidated'; count: number };

export function eventKey(event: AppEvent): string {
  switch (event.type) {
    case 'task':
      return `${event.kind}:${event.id}`;
    case 'article':
    case 'bookmark':
      return `${event.type}:${event.id}`;
    case 'feed':
      return `feed:${event.id}`;
    case 'cache':
      return 'cache';
  }
}
