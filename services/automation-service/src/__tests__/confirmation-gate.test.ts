import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { EventBus } from '@autopilot/shared-utils';
import { ConfirmationGate } from '../components/confirmation-gate';
import type { AutomationEvent, ConfirmationRequiredEvent } from '../types/events';

const typeText = { kind: 'type_text', parameters: { text: 'hello' } } as const;

describe('ConfirmationGate', () => {
  let events: EventBus<AutomationEvent>;
  let gate: ConfirmationGate;
  let requests: ConfirmationRequiredEvent[];

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-01T00:00:00.000Z'));
    events = new EventBus<AutomationEvent>();
    gate = new ConfirmationGate(events);
    requests = [];
    events.subscribe('confirmation_required', event => requests.push(event));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should publish a request and resolve true on approval', async () => {
    const decision = gate.request({ taskId: 'task-1', actionIndex: 2, action: typeText }, { timeoutMs: 60_000 });

    expect(requests).toHaveLength(1);
    expect(requests[0]).toMatchObject({
      task_id: 'task-1',
      action_index: 2,
      action: typeText,
      expires_at: '2026-01-01T00:01:00.000Z',
    });
    expect(gate.listPending().map(p => p.id)).toEqual([requests[0].confirmation_id]);

    expect(gate.approve(requests[0].confirmation_id)).toBe(true);
    await expect(decision).resolves.toBe(true);
    expect(gate.listPending()).toEqual([]);
  });

  it('should resolve false on denial', async () => {
    const decision = gate.request({ taskId: 'task-1', actionIndex: 0, action: typeText }, { timeoutMs: 60_000 });
    gate.deny(requests[0].confirmation_id);

    await expect(decision).resolves.toBe(false);
  });

  it('should resolve false when the request expires', async () => {
    const decision = gate.request({ taskId: 'task-1', actionIndex: 0, action: typeText }, { timeoutMs: 1000 });

    vi.advanceTimersByTime(1000);

    await expect(decision).resolves.toBe(false);
    expect(gate.listPending()).toEqual([]);
  });

  it('should resolve false when the signal aborts', async () => {
    const controller = new AbortController();
    const decision = gate.request(
      { taskId: 'task-1', actionIndex: 0, action: typeText },
      { timeoutMs: 60_000, signal: controller.signal }
    );

    controller.abort();

    await expect(decision).resolves.toBe(false);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('should not publish for an already aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      gate.request({ taskId: 'task-1', actionIndex: 0, action: typeText }, { timeoutMs: 1000, signal: controller.signal })
    ).resolves.toBe(false);
    expect(requests).toHaveLength(0);
  });

  it('should report unknown or settled ids', async () => {
    expect(gate.resolve('nope', true)).toBe(false);

    const decision = gate.request({ taskId: 'task-1', actionIndex: 0, action: typeText }, { timeoutMs: 60_000 });
    const id = requests[0].confirmation_id;
    expect(gate.resolve(id, true)).toBe(true);
    expect(gate.resolve(id, false)).toBe(false);
    await expect(decision).resolves.toBe(true);
  });

  it('should deny everything pending on clear', async () => {
    const first = gate.request({ taskId: 'a', actionIndex: 0, action: typeText }, { timeoutMs: 60_000 });
    const second = gate.request({ taskId: 'b', actionIndex: 1, action: typeText }, { timeoutMs: 60_000 });

    gate.clear();

    await expect(Promise.all([first, second])).resolves.toEqual([false, false]);
    expect(vi.getTimerCount()).toBe(0);
  });
});
