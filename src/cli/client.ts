import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import type { FetchLike } from '../auth/keys.js';
import { readSseEvents } from '../backend/sse.js';
import { describeError } from '../shared/errors.js';
import { AGENT_CARD_PATH, type JsonRpcErrorObject, type Message } from '../shared/protocol.js';

export class CliError extends Error {
  readonly hint?: string;

  constructor(message: string, hint?: string) {
    super(message);
    this.name = 'CliError';
    this.hint = hint;
  }
}

export class HttpError extends CliError {
  readonly status: number;
  readonly payload: unknown;

  constructor(status: number, route: string, payload: unknown, hint?: string) {
    super(`HTTP ${status} ${route}: ${JSON.stringify(payload)}`, hint);
    this.name = 'HttpError';
    this.status = status;
    this.payload = payload;
  }
}

export class RpcError extends CliError {
  readonly code: number;

  constructor(method: string, error: JsonRpcErrorObject) {
    super(`${method} failed (${error.code}): ${error.message}`);
    this.name = 'RpcError';
    this.code = error.code;
  }
}

const httpHint = (status: number) => {
  if (status === 401) {
    return 'The endpoint wants a credential. Pass --token <access token> or --api-key <key>.';
  }
  if (status === 403) {
    return 'The API key was rejected. Check --api-key against the server API_KEY.';
  }
  if (status === 404) {
    return 'Route not found. Check that --url points at the agent base URL.';
  }
  if (status >= 500) {
    return 'The endpoint reported an internal error. Inspect the server logs.';
  }
  return undefined;
};

export interface RelayClientOptions {
  baseUrl: string;
  token?: string;
  apiKey?: string;
  fetchImpl?: FetchLike;
}

export interface SendOptions {
  contextId?: string;
  taskId?: string;
  blocking?: boolean;
}

const remoteMessageSchema = z
  .object({
    role: z.string(),
    parts: z.array(z.object({ kind: z.string(), text: z.string().optional() }).passthrough()),
  })
  .passthrough();

const remoteStatusSchema = z.object({
  state: z.string(),
  message: remoteMessageSchema.optional(),
  timestamp: z.string().optional(),
});

const remoteTaskSchema = z
  .object({
    kind: z.literal('task'),
    id: z.string(),
    contextId: z.string(),
    status: remoteStatusSchema,
    history: z.array(remoteMessageSchema).default([]),
  })
  .passthrough();

const remoteStatusUpdateSchema = z
  .object({
    kind: z.literal('status-update'),
    taskId: z.string(),
    contextId: z.string(),
    status: remoteStatusSchema,
    final: z.boolean(),
  })
  .passthrough();

const remoteCardSchema = z
  .object({
    name: z.string(),
    description: z.string().default(''),
    url: z.string(),
    version: z.string().optional(),
    protocolVersion: z.string().optional(),
    skills: z.array(z.object({ id: z.string(), name: z.string() }).passthrough()).default([]),
    securitySchemes: z.record(z.unknown()).optional(),
  })
  .passthrough();

export type RemoteTask = z.infer<typeof remoteTaskSchema>;
export type RemoteStatusUpdate = z.infer<typeof remoteStatusUpdateSchema>;
export type RemoteCard = z.infer<typeof remoteCardSchema>;

/** Text of the agent message attached to a status, if any. */
export const statusText = (status: RemoteTask['status']) =>
  (status.message?.parts ?? [])
    .map((part) => part.text)
    .filter((text): text is string => typeof text === 'string')
    .join(' ');

const isRecord = (value: unknown): value is Record<string, unknown> => typeof value === 'object' && value !== null;

const rpcErrorOf = (payload: Record<string, unknown>): JsonRpcErrorObject | undefined => {
  const { error } = payload;
  if (!isRecord(error) || typeof error.code !== 'number' || typeof error.message !== 'string') return undefined;
  return { code: error.code, message: error.message, data: error.data };
};

/** Talks to a running agent endpoint the way a remote caller would. */
export class RelayClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;
  private nextId = 1;

  constructor(private readonly options: RelayClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  async fetchCard(): Promise<RemoteCard> {
    const response = await this.call(AGENT_CARD_PATH, { method: 'GET', headers: { accept: 'application/json' } });
    const parsed = remoteCardSchema.safeParse(await this.readJson(response, AGENT_CARD_PATH));
    if (!parsed.success) {
      throw new CliError('agent card is missing name or url');
    }
    return parsed.data;
  }

  async send(text: string, options: SendOptions = {}): Promise<RemoteTask> {
    return this.rpc('message/send', remoteTaskSchema, {
      message: this.message(text, options),
      configuration: { blocking: options.blocking ?? true },
    });
  }

  async *stream(text: string, options: SendOptions = {}): AsyncGenerator<RemoteStatusUpdate> {
    const method = 'message/stream';
    const response = await this.call('/', {
      method: 'POST',
      headers: this.headers({ 'content-type': 'application/json', accept: 'text/event-stream' }),
      body: JSON.stringify({ jsonrpc: '2.0', id: this.nextId++, method, params: { message: this.message(text, options) } }),
    });
    if (!response.ok) {
      await this.readJson(response, '/');
    }
    if (!response.body) return;

    for await (const event of readSseEvents(response.body)) {
      let payload: unknown;
      try {
        payload = JSON.parse(event.data);
      } catch {
        throw new CliError(`unparseable stream event: ${event.data.slice(0, 200)}`);
      }
      if (!isRecord(payload)) continue;

      const error = rpcErrorOf(payload);
      if (error) throw new RpcError(method, error);

      const update = remoteStatusUpdateSchema.safeParse(payload.result);
      if (!update.success) continue;
      yield update.data;
      if (update.data.final) return;
    }
  }

  async getTask(taskId: string, historyLength?: number): Promise<RemoteTask> {
    return this.rpc('tasks/get', remoteTaskSchema, historyLength === undefined ? { id: taskId } : { id: taskId, historyLength });
  }

  async cancelTask(taskId: string): Promise<RemoteTask> {
    return this.rpc('tasks/cancel', remoteTaskSchema, { id: taskId });
  }

  private message(text: string, options: SendOptions): Message {
    return {
      kind: 'message',
      messageId: randomUUID(),
      role: 'user',
      parts: [{ kind: 'text', text }],
      contextId: options.contextId,
      taskId: options.taskId,
    };
  }

  private headers(extra: Record<string, string>) {
    const headers: Record<string, string> = { ...extra };
    if (this.options.token) headers.authorization = `Bearer ${this.options.token}`;
    if (this.options.apiKey) headers['x-api-key'] = this.options.apiKey;
    return headers;
  }

  private async rpc<S extends z.ZodTypeAny>(method: string, schema: S, params: unknown): Promise<z.output<S>> {
    const response = await this.call('/', {
      method: 'POST',
      headers: this.headers({ 'content-type': 'application/json', accept: 'application/json' }),
      body: JSON.stringify({ jsonrpc: '2.0', id: this.nextId++, method, params }),
    });
    const payload = await this.readJson(response, '/');
    if (!isRecord(payload)) {
      throw new CliError(`${method} returned a non-object response`);
    }
    const error = rpcErrorOf(payload);
    if (error) throw new RpcError(method, error);
    const result = schema.safeParse(payload.result);
    if (!result.success) {
      throw new CliError(`${method} returned an unexpected result: ${result.error.issues[0]?.message ?? 'invalid'}`);
    }
    return result.data;
  }

  private async call(route: string, init: RequestInit): Promise<Response> {
    try {
      return await this.fetchImpl(`${this.baseUrl}${route}`, init);
    } catch (error) {
      throw new CliError(`unable to reach agent at ${this.baseUrl}: ${describeError(error)}`, 'Check --url and that the server is running.');
    }
  }

  private async readJson(response: Response, route: string): Promise<unknown> {
    const raw = await response.text();
    let payload: unknown;
    try {
      payload = raw ? JSON.parse(raw) : {};
    } catch {
      payload = { raw };
    }

    if (!response.ok) {
      throw new HttpError(response.status, route, payload, httpHint(response.status));
    }
    return payload;
  }
}
