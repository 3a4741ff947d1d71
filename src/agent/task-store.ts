import { randomUUID } from 'node:crypto';
import {
  isTerminalState,
  type Message,
  type Task,
  type TaskState,
  type TaskStatusUpdateEvent,
} from '../shared/protocol.js';
import { createLogger, type Logger } from '../utils/logger.js';

export type TaskEventListener = (event: TaskStatusUpdateEvent) => void;

const ALLOWED_TRANSITIONS: Record<TaskState | 'new', readonly TaskState[]> = {
  new: ['submitted'],
  submitted: ['working'],
  working: ['working', 'completed', 'failed'],
  completed: [],
  failed: [],
};

export const canTransition = (from: TaskState | null, to: TaskState) =>
  ALLOWED_TRANSITIONS[from ?? 'new'].includes(to);

export const agentTextMessage = (text: string, contextId: string, taskId?: string): Message => ({
  kind: 'message',
  messageId: randomUUID(),
  role: 'agent',
  parts: [{ kind: 'text', text }],
  contextId,
  taskId,
});

const cloneTask = (task: Task, historyLength?: number): Task => ({
  ...task,
  status: { ...task.status },
  history: historyLength === undefined ? [...task.history] : historyLength > 0 ? task.history.slice(-historyLength) : [],
});

/**
 * In-memory task table and the single authority on task state transitions.
 * Subscribers are notified synchronously, in transition order.
 */
export class InMemoryTaskStore {
  private readonly tasks = new Map<string, Task>();
  private readonly listeners = new Map<string, Set<TaskEventListener>>();
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? createLogger('agent.tasks');
  }

  get(taskId: string, historyLength?: number): Task | undefined {
    const task = this.tasks.get(taskId);
    return task ? cloneTask(task, historyLength) : undefined;
  }

  stateOf(taskId: string): TaskState | null {
    return this.tasks.get(taskId)?.status.state ?? null;
  }

  list(): Task[] {
    return Array.from(this.tasks.values()).map((task) => cloneTask(task));
  }

  get size() {
    return this.tasks.size;
  }

  appendHistory(taskId: string, message: Message) {
    this.tasks.get(taskId)?.history.push(message);
  }

  transition(taskId: string, contextId: string, state: TaskState, message?: Message): TaskStatusUpdateEvent | null {
    const current = this.tasks.get(taskId);
    const from = current?.status.state ?? null;

    if (!canTransition(from, state)) {
      this.logger.debug('task transition rejected', { taskId, from, to: state });
      return null;
    }

    const status = { state, message, timestamp: new Date().toISOString() };
    if (current) {
      current.status = status;
      if (message) current.history.push(message);
    } else {
      this.tasks.set(taskId, {
        kind: 'task',
        id: taskId,
        contextId,
        status,
        history: message ? [message] : [],
      });
    }

    const event: TaskStatusUpdateEvent = {
      kind: 'status-update',
      taskId,
      contextId: current?.contextId ?? contextId,
      status: { ...status },
      final: isTerminalState(state),
    };
    this.publish(event);
    return event;
  }

  subscribe(taskId: string, listener: TaskEventListener): () => void {
    let set = this.listeners.get(taskId);
    if (!set) {
      set = new Set();
      this.listeners.set(taskId, set);
    }
    set.add(listener);

    return () => {
      const current = this.listeners.get(taskId);
      if (!current) return;
      current.delete(listener);
      if (current.size === 0) this.listeners.delete(taskId);
    };
  }

  private publish(event: TaskStatusUpdateEvent) {
    const set = this.listeners.get(event.taskId);
    if (!set) return;
    for (const listener of Array.from(set)) {
      try {
        listener(event);
      } catch (error) {
        this.logger.warn('task listener failed', {
          taskId: event.taskId,
          message: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }
}

/** Emits transitions for one task; a transition the store rejects is reported as `false`. */
export class TaskUpdater {
  constructor(
    private readonly store: InMemoryTaskStore,
    readonly taskId: string,
    readonly contextId: string,
  ) {}

  submit(userMessage?: Message) {
    const accepted = this.store.transition(this.taskId, this.contextId, 'submitted') !== null;
    if (accepted && userMessage) this.store.appendHistory(this.taskId, userMessage);
    return accepted;
  }

  addMessage(message: Message) {
    this.store.appendHistory(this.taskId, message);
  }

  startWork(text?: string) {
    return this.store.transition(this.taskId, this.contextId, 'working', this.message(text)) !== null;
  }

  complete(text: string) {
    return this.store.transition(this.taskId, this.contextId, 'completed', this.message(text)) !== null;
  }

  fail(text: string) {
    return this.store.transition(this.taskId, this.contextId, 'failed', this.message(text)) !== null;
  }

  private message(text?: string) {
    return text === undefined ? undefined : agentTextMessage(text, this.contextId, this.taskId);
  }
}
