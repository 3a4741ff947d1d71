import { describe, expect, it } from 'vitest';

import { InMemoryTaskStore, TaskUpdater, canTransition } from '../src/agent/task-store.js';
import type { Message, TaskStatusUpdateEvent } from '../src/shared/protocol.js';
import { silentLogger } from '../src/utils/logger.js';

const userMessage: Message = {
  kind: 'message',
  messageId: 'm-1',
  role: 'user',
  parts: [{ kind: 'text', text: 'hi' }],
  contextId: 'ctx-1',
  taskId: 'task-1',
};

describe('task state machine', () => {
  it('allows only forward edges', () => {
    expect(canTransition(null, 'submitted')).toBe(true);
    expect(canTransition(null, 'working')).toBe(false);
    expect(canTransition('submitted', 'working')).toBe(true);
    expect(canTransition('submitted', 'completed')).toBe(false);
    expect(canTransition('working', 'working')).toBe(true);
    expect(canTransition('working', 'failed')).toBe(true);
    expect(canTransition('completed', 'working')).toBe(false);
    expect(canTransition('failed', 'failed')).toBe(false);
  });
});

describe('in-memory task store', () => {
  it('records the lifecycle and notifies subscribers in order', () => {
    const store = new InMemoryTaskStore(silentLogger());
    const events: TaskStatusUpdateEvent[] = [];
    store.subscribe('task-1', (event) => events.push(event));
    const updater = new TaskUpdater(store, 'task-1', 'ctx-1');

    expect(updater.submit(userMessage)).toBe(true);
    expect(updater.startWork()).toBe(true);
    expect(updater.startWork('partial')).toBe(true);
    expect(updater.complete('done')).toBe(true);

    expect(events.map((event) => [event.status.state, event.final])).toEqual([
      ['submitted', false],
      ['working', false],
      ['working', false],
      ['completed', true],
    ]);
    expect(events[3].status.message?.parts).toEqual([{ kind: 'text', text: 'done' }]);

    const task = store.get('task-1');
    expect(task?.status.state).toBe('completed');
    expect(task?.history.map((message) => message.role)).toEqual(['user', 'agent', 'agent']);
  });

  it('rejects transitions after a terminal state without side effects', () => {
    const store = new InMemoryTaskStore(silentLogger());
    const updater = new TaskUpdater(store, 'task-1', 'ctx-1');
    updater.submit();
    updater.startWork();
    updater.fail('Error: boom');

    const events: TaskStatusUpdateEvent[] = [];
    store.subscribe('task-1', (event) => events.push(event));

    expect(updater.startWork('late')).toBe(false);
    expect(updater.complete('late')).toBe(false);
    expect(store.stateOf('task-1')).toBe('failed');
    expect(events).toEqual([]);
  });

  it('skips a second submission of a tracked task', () => {
    const store = new InMemoryTaskStore(silentLogger());
    const updater = new TaskUpdater(store, 'task-1', 'ctx-1');

    expect(updater.submit()).toBe(true);
    expect(updater.submit()).toBe(false);
    expect(store.size).toBe(1);
  });

  it('trims history on request and returns copies', () => {
    const store = new InMemoryTaskStore(silentLogger());
    const updater = new TaskUpdater(store, 'task-1', 'ctx-1');
    updater.submit(userMessage);
    updater.startWork('one');
    updater.startWork('two');

    expect(store.get('task-1', 1)?.history).toHaveLength(1);
    expect(store.get('task-1', 0)?.history).toEqual([]);

    const copy = store.get('task-1');
    copy?.history.push(userMessage);
    expect(store.get('task-1')?.history).toHaveLength(3);
  });

  it('keeps publishing when a listener throws', () => {
    const store = new InMemoryTaskStore(silentLogger());
    const seen: string[] = [];
    store.subscribe('task-1', () => {
      throw new Error('listener failure');
    });
    store.subscribe('task-1', (event) => seen.push(event.status.state));

    new TaskUpdater(store, 'task-1', 'ctx-1').submit();
    expect(seen).toEqual(['submitted']);
  });

  it('stops notifying after unsubscribe', () => {
    const store = new InMemoryTaskStore(silentLogger());
    const seen: string[] = [];
    const unsubscribe = store.subscribe('task-1', (event) => seen.push(event.status.state));
    const updater = new TaskUpdater(store, 'task-1', 'ctx-1');

    updater.submit();
    unsubscribe();
    updater.startWork();

    expect(seen).toEqual(['submitted']);
    expect(store.get('missing')).toBeUndefined();
  });
});
