import { describe, it, expect } from 'vitest';
import { TaskStore } from '../components/task-store';
import type { Task, TaskStatus } from '../types/task';

const BASE = Date.parse('2026-01-01T00:00:00.000Z');

function task(id: string, status: TaskStatus, finishedMinutesAfterBase?: number): Task {
  const at = new Date(BASE + (finishedMinutesAfterBase ?? 0) * 60_000).toISOString();
  return {
    id,
    command: `command ${id}`,
    status,
    plan: null,
    results: [],
    require_confirmation: false,
    created_at: at,
    updated_at: at,
    ...(finishedMinutesAfterBase === undefined ? {} : { completed_at: at }),
  };
}

describe('TaskStore', () => {
  it('should evict the oldest finished tasks beyond capacity', () => {
    const store = new TaskStore({ capacity: 2, maxAgeMs: 3_600_000, now: () => BASE + 10 * 60_000 });

    store.add(task('a', 'completed', 1));
    store.add(task('b', 'failed', 2));
    store.add(task('c', 'completed', 3));

    expect(store.values().map(t => t.id)).toEqual(['b', 'c']);
  });

  it('should never evict active tasks', () => {
    const store = new TaskStore({ capacity: 1, maxAgeMs: 3_600_000, now: () => BASE });

    store.add(task('a', 'running'));
    store.add(task('b', 'pending'));

    expect(store.size).toBe(2);
  });

  it('should drop finished tasks older than the maximum age', () => {
    let now = BASE;
    const store = new TaskStore({ capacity: 10, maxAgeMs: 60_000, now: () => now });
    store.add(task('old', 'cancelled', 0));
    store.add(task('active', 'running'));

    now = BASE + 5 * 60_000;
    const evicted = store.evict();

    expect(evicted).toEqual(['old']);
    expect(store.has('old')).toBe(false);
    expect(store.has('active')).toBe(true);
  });

  it('should clear everything', () => {
    const store = new TaskStore({ capacity: 10, maxAgeMs: 60_000 });
    store.add(task('a', 'running'));
    store.clear();

    expect(store.size).toBe(0);
    expect(store.get('a')).toBeUndefined();
  });
});
