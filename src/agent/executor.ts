import type { RemoteBackend } from '../backend/types.js';
import {
  RemoteInvocationError,
  TaskCancelledError,
  TaskNotCancelableError,
  TaskNotFoundError,
  describeError,
} from '../shared/errors.js';
import {
  hasFileUri,
  isFilePart,
  isTerminalState,
  isTextPart,
  type InboundPart,
  type RequestContext,
  type Task,
} from '../shared/protocol.js';
import { createLogger, type Logger } from '../utils/logger.js';
import type { SessionRegistry } from './session-registry.js';
import { TaskUpdater, type InMemoryTaskStore } from './task-store.js';

export type CancelMode = 'fail' | 'reject';

export const PROCESSING_MESSAGE = 'Processing your request...';
export const COMPLETED_FALLBACK_MESSAGE = 'Task completed.';

export interface TaskExecutorOptions {
  tasks: InMemoryTaskStore;
  sessions: SessionRegistry;
  backend: RemoteBackend;
  remoteTimeoutMs: number;
  cancelMode?: CancelMode;
  logger?: Logger;
}

/**
 * Flattens message parts into the prompt sent to the remote agent. File payloads are never
 * forwarded, only a placeholder naming the file location or its size.
 */
export const partsToText = (parts: InboundPart[], logger?: Logger): string => {
  const segments: string[] = [];

  for (const part of parts) {
    if (isTextPart(part)) {
      segments.push(part.text);
    } else if (isFilePart(part)) {
      if (hasFileUri(part.file)) {
        segments.push(`[File: ${part.file.uri}]`);
      } else {
        segments.push(`[File: ${Buffer.from(part.file.bytes, 'base64').length} bytes]`);
      }
    } else {
      logger?.warn(`Unsupported part type: ${part.kind}`);
    }
  }

  return segments.join(' ');
};

const abortReason = (signal: AbortSignal): Error =>
  signal.reason instanceof Error ? signal.reason : new RemoteInvocationError('remote call aborted');

/** Settles with `promise`, or rejects with the abort reason as soon as `signal` fires. */
export const raceAbort = <T>(promise: Promise<T>, signal: AbortSignal): Promise<T> => {
  if (signal.aborted) {
    promise.catch(() => undefined);
    return Promise.reject(abortReason(signal));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(abortReason(signal));
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
};

export class TaskExecutor {
  // A follow-up message on a working task starts a second run, so one task may own several.
  private readonly running = new Map<string, Set<AbortController>>();
  private readonly logger: Logger;
  private readonly cancelMode: CancelMode;

  constructor(private readonly options: TaskExecutorOptions) {
    this.logger = options.logger ?? createLogger('agent.executor');
    this.cancelMode = options.cancelMode ?? 'fail';
  }

  get runningCount() {
    return this.running.size;
  }

  /** Runs one inbound message to a terminal state. Never rejects: failures end as a `failed` task. */
  async execute(context: RequestContext): Promise<void> {
    const { taskId, contextId } = context;
    const { tasks, sessions, backend, remoteTimeoutMs } = this.options;
    const updater = new TaskUpdater(tasks, taskId, contextId);
    this.logger.info(`executing task ${taskId} for context ${contextId}`);

    if (context.currentTask) {
      updater.addMessage(context.message);
    } else {
      updater.submit(context.message);
    }

    if (!updater.startWork()) {
      this.logger.warn('task could not enter working state', { taskId, state: tasks.stateOf(taskId) });
      return;
    }

    const controller = new AbortController();
    const controllers = this.running.get(taskId) ?? new Set<AbortController>();
    controllers.add(controller);
    this.running.set(taskId, controllers);
    const timer = setTimeout(() => {
      controller.abort(
        new RemoteInvocationError(`remote backend did not answer within ${remoteTimeoutMs}ms`, { timedOut: true }),
      );
    }, remoteTimeoutMs);

    try {
      const text = partsToText(context.message.parts, this.logger);
      const threadId = await raceAbort(sessions.getOrCreateSession(contextId, context.credential), controller.signal);

      updater.startWork(PROCESSING_MESSAGE);

      const replies: string[] = [];
      const iterator = backend.ask(threadId, text, context.credential, controller.signal)[Symbol.asyncIterator]();
      let drained = false;
      try {
        while (true) {
          const step = await raceAbort(iterator.next(), controller.signal);
          if (step.done) {
            drained = true;
            break;
          }
          const reply = step.value;
          if (reply.kind === 'text') {
            replies.push(reply.text);
            updater.startWork(reply.text);
          } else {
            this.logger.debug('non-text reply ignored', { taskId, activityType: reply.activityType });
          }
        }
      } finally {
        if (!drained && iterator.return) {
          void iterator.return().catch((error: unknown) => {
            this.logger.debug('reply stream close failed', { taskId, message: describeError(error) });
          });
        }
      }

      updater.complete(replies.at(-1) ?? COMPLETED_FALLBACK_MESSAGE);
      this.logger.debug(`task ${taskId} completed with ${replies.length} reply(ies)`);
    } catch (error) {
      const cause = controller.signal.aborted ? abortReason(controller.signal) : error;
      if (cause instanceof TaskCancelledError) {
        this.logger.info(`task ${taskId} stopped after cancellation`);
      } else {
        this.logger.error(`error processing task ${taskId}: ${describeError(cause)}`);
      }
      updater.fail(`Error: ${describeError(cause)}`);
    } finally {
      clearTimeout(timer);
      controllers.delete(controller);
      if (controllers.size === 0 && this.running.get(taskId) === controllers) this.running.delete(taskId);
    }
  }

  cancel(taskId: string): Task {
    const { tasks } = this.options;
    const task = tasks.get(taskId);
    if (!task) {
      throw new TaskNotFoundError(taskId);
    }

    this.logger.info(`cancelling task ${taskId} for context ${task.contextId}`);

    if (this.cancelMode === 'reject') {
      throw new TaskNotCancelableError(taskId, task.status.state, 'Task cancellation is not supported');
    }
    if (isTerminalState(task.status.state)) {
      throw new TaskNotCancelableError(taskId, task.status.state);
    }

    const updater = new TaskUpdater(tasks, taskId, task.contextId);
    const reason = new TaskCancelledError(taskId);
    if (!updater.fail(reason.message)) {
      throw new TaskNotCancelableError(taskId, task.status.state);
    }
    for (const controller of this.running.get(taskId) ?? []) {
      controller.abort(reason);
    }

    return tasks.get(taskId) ?? task;
  }
}
