import { describe, expect, it } from 'vitest';

import { TaskExecutor, partsToText, raceAbort, type CancelMode } from '../src/agent/executor.js';
import { SessionRegistry } from '../src/agent/session-registry.js';
import { InMemoryTaskStore } from '../src/agent/task-store.js';
import { TaskNotCancelableError, TaskNotFoundError } from '../src/shared/errors.js';
import { isTextPart, type Message, type RequestContext, type TaskStatusUpdateEvent } from '../src/shared/protocol.js';
import { silentLogger } from '../src/utils/logger.js';
import { ScriptedBackend } from './helpers.js';

const buildExecutor = (options: { timeoutMs?: number; cancelMode?: CancelMode } = {}) => {
  const backend = new ScriptedBackend();
  const tasks = new InMemoryTaskStore(silentLogger());
  const sessions = new SessionRegistry({
    createThread: (credential, signal) => backend.createConversation(credential, signal),
    logger: silentLogger(),
  });
  const executor = new TaskExecutor({
    tasks,
    sessions,
    backend,
    remoteTimeoutMs: options.timeoutMs ?? 5_000,
    cancelMode: options.cancelMode,
    logger: silentLogger(),
  });
  return { backend, tasks, sessions, executor };
};

const message = (text: string, taskId = 'task-1', contextId = 'ctx-1'): Message => ({
  kind: 'message',
  messageId: `m-${taskId}-${text.length}`,
  role: 'user',
  parts: [{ kind: 'text', text }],
  taskId,
  contextId,
});

const context = (text: string, extra: Partial<RequestContext> = {}): RequestContext => ({
  taskId: 'task-1',
  contextId: 'ctx-1',
  message: message(text),
  ...extra,
});

const record = (tasks: InMemoryTaskStore, taskId = 'task-1') => {
  const events: TaskStatusUpdateEvent[] = [];
  tasks.subscribe(taskId, (event) => events.push(event));
  return events;
};

const textOf = (event: TaskStatusUpdateEvent | undefined) => {
  const part = event?.status.message?.parts[0];
  return part && isTextPart(part) ? part.text : undefined;
};

describe('parts to text', () => {
  it('joins text and file placeholders with spaces', () => {
    expect(
      partsToText([
        { kind: 'text', text: 'hello' },
        { kind: 'file', file: { uri: 'x' } },
      ]),
    ).toBe('hello [File: x]');
  });

  it('reports the decoded byte count of inline files', () => {
    expect(partsToText([{ kind: 'file', file: { bytes: Buffer.from('abcde').toString('base64'), name: 'a.txt' } }])).toBe(
      '[File: 5 bytes]',
    );
  });

  it('drops unsupported parts with a warning', () => {
    const warnings: unknown[][] = [];
    const logger = silentLogger();
    logger.warn = (...args: unknown[]) => {
      warnings.push(args);
    };

    const text = partsToText(
      [
        { kind: 'data', data: { a: 1 } },
        { kind: 'text', text: 'kept' },
        { kind: 'video', url: 'v' },
      ],
      logger,
    );

    expect(text).toBe('kept');
    expect(warnings).toEqual([['Unsupported part type: data'], ['Unsupported part type: video']]);
  });
});

describe('raceAbort', () => {
  it('rejects with the abort reason', async () => {
    const controller = new AbortController();
    const pending = raceAbort(new Promise<string>(() => undefined), controller.signal);
    controller.abort(new Error('stop now'));
    await expect(pending).rejects.toThrow('stop now');
  });

  it('passes the value through when not aborted', async () => {
    const controller = new AbortController();
    await expect(raceAbort(Promise.resolve(7), controller.signal)).resolves.toBe(7);
  });
});

describe('task executor', () => {
  it('walks submitted, working, replies and completed', async () => {
    const { backend, tasks, executor } = buildExecutor();
    backend.replies = [
      { kind: 'progress', activityType: 'typing' },
      { kind: 'text', text: 'first' },
      { kind: 'text', text: 'second' },
    ];
    const events = record(tasks);

    await executor.execute(context('hello', { credential: 'token-1' }));

    expect(events.map((event) => event.status.state)).toEqual([
      'submitted',
      'working',
      'working',
      'working',
      'working',
      'completed',
    ]);
    expect(events.map(textOf)).toEqual([undefined, undefined, 'Processing your request...', 'first', 'second', 'second']);
    expect(events.at(-1)?.final).toBe(true);
    expect(backend.conversations).toEqual(['token-1']);
    expect(backend.asks).toEqual([{ conversationId: 'thread-1', text: 'hello', credential: 'token-1' }]);
    expect(executor.runningCount).toBe(0);
  });

  it('completes with a generic notice when the backend sends no text', async () => {
    const { backend, tasks, executor } = buildExecutor();
    backend.replies = [{ kind: 'progress', activityType: 'typing' }];
    const events = record(tasks);

    await executor.execute(context('hello'));

    expect(textOf(events.at(-1))).toBe('Task completed.');
    expect(tasks.stateOf('task-1')).toBe('completed');
  });

  it('fails with the error text when the backend raises during ask', async () => {
    const { backend, tasks, executor } = buildExecutor();
    backend.replies = [{ kind: 'text', text: 'partial' }];
    backend.askError = new Error('stream reset');
    const events = record(tasks);

    await expect(executor.execute(context('hello'))).resolves.toBeUndefined();

    expect(events.map((event) => event.status.state)).toEqual(['submitted', 'working', 'working', 'working', 'failed']);
    expect(textOf(events.at(-1))).toBe('Error: stream reset');
  });

  it('fails when the remote conversation cannot be created', async () => {
    const { backend, tasks, executor } = buildExecutor();
    backend.createError = new Error('forbidden');

    await executor.execute(context('hello'));

    const task = tasks.get('task-1');
    expect(task?.status.state).toBe('failed');
    expect(task?.status.message?.parts).toEqual([
      { kind: 'text', text: 'Error: unable to create remote conversation: forbidden' },
    ]);
    expect(backend.asks).toEqual([]);
  });

  it('fails with a timeout message when the backend does not finish in time', async () => {
    const { backend, tasks, executor } = buildExecutor({ timeoutMs: 50 });
    backend.replies = [];
    backend.hang = true;

    await executor.execute(context('hello'));

    expect(tasks.stateOf('task-1')).toBe('failed');
    expect(tasks.get('task-1')?.status.message?.parts).toEqual([
      { kind: 'text', text: 'Error: remote backend did not answer within 50ms' },
    ]);
  });

  it('reuses the session of the context for later tasks', async () => {
    const { backend, executor } = buildExecutor();

    await executor.execute(context('one'));
    await executor.execute(context('two', { taskId: 'task-2', message: message('two', 'task-2') }));

    expect(backend.conversations).toHaveLength(1);
    expect(backend.asks.map((ask) => ask.conversationId)).toEqual(['thread-1', 'thread-1']);
  });

  it('does not re-emit submitted for a task that is already tracked', async () => {
    const { tasks, executor } = buildExecutor();
    const store = tasks;
    store.transition('task-1', 'ctx-1', 'submitted');
    const current = store.get('task-1');
    const events = record(tasks);

    await executor.execute(context('again', { currentTask: current }));

    expect(events[0]?.status.state).toBe('working');
    expect(events.some((event) => event.status.state === 'submitted')).toBe(false);
    expect(store.get('task-1')?.history[0]?.role).toBe('user');
  });

  it('cancels a running task by forcing it to failed', async () => {
    const { backend, tasks, executor } = buildExecutor();
    backend.replies = [];
    backend.hang = true;
    const events = record(tasks);

    const run = executor.execute(context('hello'));
    await new Promise((resolve) => setTimeout(resolve, 10));
    const cancelled = executor.cancel('task-1');
    await run;

    expect(cancelled.status.state).toBe('failed');
    expect(cancelled.status.message?.parts).toEqual([{ kind: 'text', text: 'Task cancelled by user' }]);
    expect(events.filter((event) => event.final)).toHaveLength(1);
    expect(executor.runningCount).toBe(0);
  });

  it('lets other tasks of the context finish when one is cancelled during session creation', async () => {
    const { backend, tasks, executor } = buildExecutor();
    backend.createDelayMs = 40;

    const first = executor.execute(context('one', { taskId: 'task-a', message: message('one', 'task-a') }));
    const second = executor.execute(context('two', { taskId: 'task-b', message: message('two', 'task-b') }));
    await new Promise((resolve) => setTimeout(resolve, 10));
    executor.cancel('task-a');
    await Promise.all([first, second]);

    expect(tasks.stateOf('task-a')).toBe('failed');
    expect(tasks.stateOf('task-b')).toBe('completed');
    expect(backend.conversations).toHaveLength(1);
    expect(backend.asks).toEqual([{ conversationId: 'thread-1', text: 'two', credential: undefined }]);
  });

  it('aborts every run of a task that received a follow-up message', async () => {
    const { backend, tasks, executor } = buildExecutor();
    backend.replies = [];
    backend.hang = true;

    const first = executor.execute(context('hello'));
    await new Promise((resolve) => setTimeout(resolve, 10));
    const second = executor.execute(context('more', { currentTask: tasks.get('task-1'), message: message('more') }));
    await new Promise((resolve) => setTimeout(resolve, 10));
    expect(executor.runningCount).toBe(1);

    executor.cancel('task-1');
    await Promise.all([first, second]);

    expect(backend.asks.map((ask) => ask.text)).toEqual(['hello', 'more']);
    expect(tasks.stateOf('task-1')).toBe('failed');
    expect(executor.runningCount).toBe(0);
  });

  it('answers not cancelable for a terminal task', async () => {
    const { executor } = buildExecutor();
    await executor.execute(context('hello'));

    expect(() => executor.cancel('task-1')).toThrow(TaskNotCancelableError);
  });

  it('answers not found for an unknown task', () => {
    const { executor } = buildExecutor();
    expect(() => executor.cancel('nope')).toThrow(TaskNotFoundError);
  });

  it('rejects every cancellation in reject mode and lets the task run on', async () => {
    const { backend, tasks, executor } = buildExecutor({ cancelMode: 'reject', timeoutMs: 80 });
    backend.replies = [];
    backend.hang = true;

    const run = executor.execute(context('hello'));
    await new Promise((resolve) => setTimeout(resolve, 10));

    expect(() => executor.cancel('task-1')).toThrow('Task cancellation is not supported');
    expect(tasks.stateOf('task-1')).toBe('working');

    await run;
    expect(tasks.get('task-1')?.status.message?.parts).toEqual([
      { kind: 'text', text: 'Error: remote backend did not answer within 80ms' },
    ]);
  });
});
