import { randomUUID } from 'node:crypto';
import { z, type ZodIssue } from 'zod';
import type { RelayContext } from '../relay.js';
import {
  InvalidTaskStateError,
  TaskNotCancelableError,
  TaskNotFoundError,
  describeError,
} from '../shared/errors.js';
import {
  JSON_RPC_ERRORS,
  isTerminalState,
  type JsonRpcErrorResponse,
  type JsonRpcId,
  type JsonRpcRequest,
  type JsonRpcResponse,
  type Message,
  type RequestContext,
  type Task,
  type TaskStatusUpdateEvent,
} from '../shared/protocol.js';

export const STREAM_METHOD = 'message/stream';

export class JsonRpcError extends Error {
  constructor(readonly code: number, message: string, readonly data?: unknown) {
    super(message);
    this.name = 'JsonRpcError';
  }
}

const metadataSchema = z.record(z.unknown()).optional();

const textPartSchema = z.object({ kind: z.literal('text'), text: z.string(), metadata: metadataSchema });

const fileSchema = z.union([
  z.object({ uri: z.string().min(1), name: z.string().optional(), mimeType: z.string().optional() }),
  z.object({ bytes: z.string(), name: z.string().optional(), mimeType: z.string().optional() }),
]);

const filePartSchema = z.object({ kind: z.literal('file'), file: fileSchema, metadata: metadataSchema });

const dataPartSchema = z.object({ kind: z.literal('data'), data: z.record(z.unknown()), metadata: metadataSchema });

const KNOWN_PART_KINDS = new Set(['text', 'file', 'data']);

// Unrecognized kinds are accepted here and dropped later, when the prompt is built.
const unknownPartSchema = z
  .object({ kind: z.string().min(1) })
  .passthrough()
  .refine((part) => !KNOWN_PART_KINDS.has(part.kind), { message: 'malformed part' });

const partSchema = z.union([textPartSchema, filePartSchema, dataPartSchema, unknownPartSchema]);

const messageSchema = z.object({
  kind: z.literal('message').default('message'),
  messageId: z.string().min(1),
  role: z.enum(['user', 'agent']),
  parts: z.array(partSchema),
  contextId: z.string().min(1).optional(),
  taskId: z.string().min(1).optional(),
  metadata: metadataSchema,
});

const messageSendParamsSchema = z.object({
  message: messageSchema,
  configuration: z
    .object({
      blocking: z.boolean().optional(),
      historyLength: z.number().int().min(0).optional(),
    })
    .passthrough()
    .optional(),
  metadata: metadataSchema,
});

const taskQueryParamsSchema = z.object({
  id: z.string().min(1),
  historyLength: z.number().int().min(0).optional(),
});

const taskIdParamsSchema = z.object({ id: z.string().min(1) });

const requestSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: z.union([z.string(), z.number(), z.null()]).optional(),
  method: z.string().min(1),
  params: z.unknown().optional(),
});

const describeIssues = (issues: ZodIssue[]) =>
  issues.map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : 'params'}: ${issue.message}`).join('; ');

const parseParams = <S extends z.ZodTypeAny>(schema: S, params: unknown): z.output<S> => {
  const parsed = schema.safeParse(params);
  if (!parsed.success) {
    throw new JsonRpcError(JSON_RPC_ERRORS.invalidParams, `Invalid params: ${describeIssues(parsed.error.issues)}`);
  }
  return parsed.data;
};

const idOf = (raw: unknown): JsonRpcId => {
  if (typeof raw !== 'object' || raw === null || !('id' in raw)) return null;
  const { id } = raw;
  return typeof id === 'string' || typeof id === 'number' ? id : null;
};

export const errorResponse = (id: JsonRpcId, code: number, message: string, data?: unknown): JsonRpcErrorResponse => ({
  jsonrpc: '2.0',
  id,
  error: data === undefined ? { code, message } : { code, message, data },
});

export const successResponse = <T>(id: JsonRpcId, result: T): JsonRpcResponse<T> => ({ jsonrpc: '2.0', id, result });

export type ParsedRequest = { ok: true; request: JsonRpcRequest } | { ok: false; response: JsonRpcErrorResponse };

export const parseJsonRpcRequest = (raw: unknown): ParsedRequest => {
  const parsed = requestSchema.safeParse(raw);
  if (!parsed.success) {
    return {
      ok: false,
      response: errorResponse(idOf(raw), JSON_RPC_ERRORS.invalidRequest, 'Invalid Request', describeIssues(parsed.error.issues)),
    };
  }
  const { id = null, method, params } = parsed.data;
  return { ok: true, request: { jsonrpc: '2.0', id, method, params } };
};

/** Maps a failure raised while serving a request onto its JSON-RPC error object. */
export const toErrorResponse = (id: JsonRpcId, error: unknown): JsonRpcErrorResponse => {
  if (error instanceof JsonRpcError) return errorResponse(id, error.code, error.message, error.data);
  if (error instanceof TaskNotFoundError) return errorResponse(id, JSON_RPC_ERRORS.taskNotFound, error.message);
  if (error instanceof TaskNotCancelableError) return errorResponse(id, JSON_RPC_ERRORS.taskNotCancelable, error.message);
  if (error instanceof InvalidTaskStateError) return errorResponse(id, JSON_RPC_ERRORS.invalidParams, error.message);
  return errorResponse(id, JSON_RPC_ERRORS.internalError, `Internal error: ${describeError(error)}`);
};

export type StreamWriter = (response: JsonRpcResponse<TaskStatusUpdateEvent>) => void;

export class JsonRpcHandler {
  constructor(private readonly relay: RelayContext) {}

  async handle(request: JsonRpcRequest, credential?: string): Promise<JsonRpcResponse<unknown>> {
    try {
      return successResponse(request.id, await this.dispatch(request, credential));
    } catch (error) {
      if (!(error instanceof JsonRpcError || error instanceof TaskNotFoundError)) {
        this.relay.logger.warn(`${request.method} failed: ${describeError(error)}`);
      }
      return toErrorResponse(request.id, error);
    }
  }

  /**
   * Serves `message/stream`: every accepted status update of the task goes to `write`, and the
   * returned promise settles once the final event has been written.
   */
  async stream(request: JsonRpcRequest, write: StreamWriter, credential?: string): Promise<void> {
    let context: RequestContext;
    try {
      context = this.resolveContext(parseParams(messageSendParamsSchema, request.params).message, credential);
    } catch (error) {
      write(toErrorResponse(request.id, error));
      return;
    }

    const unsubscribe = this.relay.tasks.subscribe(context.taskId, (event) => {
      write(successResponse(request.id, event));
    });
    try {
      await this.relay.executor.execute(context);
    } finally {
      unsubscribe();
    }
  }

  private async dispatch(request: JsonRpcRequest, credential?: string): Promise<unknown> {
    switch (request.method) {
      case 'message/send':
        return this.sendMessage(request.params, credential);
      case 'tasks/get': {
        const params = parseParams(taskQueryParamsSchema, request.params);
        return this.requireTask(params.id, params.historyLength);
      }
      case 'tasks/cancel': {
        const params = parseParams(taskIdParamsSchema, request.params);
        return this.relay.executor.cancel(params.id);
      }
      case STREAM_METHOD:
        throw new JsonRpcError(JSON_RPC_ERRORS.invalidRequest, `${STREAM_METHOD} must be served as an event stream`);
      default:
        throw new JsonRpcError(JSON_RPC_ERRORS.methodNotFound, `Method not found: ${request.method}`);
    }
  }

  private async sendMessage(rawParams: unknown, credential?: string): Promise<Task> {
    const params = parseParams(messageSendParamsSchema, rawParams);
    const context = this.resolveContext(params.message, credential);
    const historyLength = params.configuration?.historyLength;

    const run = this.relay.executor.execute(context);
    if (params.configuration?.blocking === false) {
      run.catch((error: unknown) => {
        this.relay.logger.error(`background task ${context.taskId} crashed: ${describeError(error)}`);
      });
      return this.requireTask(context.taskId, historyLength);
    }

    await run;
    return this.requireTask(context.taskId, historyLength);
  }

  private requireTask(taskId: string, historyLength?: number): Task {
    const task = this.relay.tasks.get(taskId, historyLength);
    if (!task) throw new TaskNotFoundError(taskId);
    return task;
  }

  private resolveContext(message: Message, credential?: string): RequestContext {
    if (message.taskId) {
      const currentTask = this.requireTask(message.taskId);
      if (isTerminalState(currentTask.status.state)) {
        throw new InvalidTaskStateError(currentTask.id, currentTask.status.state);
      }
      return {
        taskId: currentTask.id,
        contextId: currentTask.contextId,
        message: { ...message, taskId: currentTask.id, contextId: currentTask.contextId },
        currentTask,
        credential,
      };
    }

    const taskId = randomUUID();
    const contextId = message.contextId ?? randomUUID();
    return {
      taskId,
      contextId,
      message: { ...message, taskId, contextId },
      credential,
    };
  }
}
