import type { TaskState } from './protocol.js';

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class SessionCreationError extends Error {
  readonly contextId: string;

  constructor(contextId: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SessionCreationError';
    this.contextId = contextId;
  }
}

export class RemoteInvocationError extends Error {
  readonly timedOut: boolean;

  constructor(message: string, options?: { cause?: unknown; timedOut?: boolean }) {
    super(message, { cause: options?.cause });
    this.name = 'RemoteInvocationError';
    this.timedOut = options?.timedOut ?? false;
  }
}

export class TaskNotFoundError extends Error {
  readonly taskId: string;

  constructor(taskId: string) {
    super(`Task ${taskId} not found`);
    this.name = 'TaskNotFoundError';
    this.taskId = taskId;
  }
}

export class TaskNotCancelableError extends Error {
  readonly taskId: string;
  readonly state: TaskState;

  constructor(taskId: string, state: TaskState, message = `Task ${taskId} cannot be canceled (state: ${state})`) {
    super(message);
    this.name = 'TaskNotCancelableError';
    this.taskId = taskId;
    this.state = state;
  }
}

export class InvalidTaskStateError extends Error {
  readonly taskId: string;
  readonly state: TaskState;

  constructor(taskId: string, state: TaskState) {
    super(`Task ${taskId} is already ${state} and accepts no further messages`);
    this.name = 'InvalidTaskStateError';
    this.taskId = taskId;
    this.state = state;
  }
}

export class TaskCancelledError extends Error {
  readonly taskId: string;

  constructor(taskId: string) {
    super('Task cancelled by user');
    this.name = 'TaskCancelledError';
    this.taskId = taskId;
  }
}

export const describeError = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  if (typeof error === 'string') {
    return error;
  }
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
};
