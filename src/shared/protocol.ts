export const AGENT_CARD_PATH = '/.well-known/agent-card.json';
export const PROTOCOL_VERSION = '0.3.0';

export type TaskState = 'submitted' | 'working' | 'completed' | 'failed';

export const TERMINAL_STATES: ReadonlySet<TaskState> = new Set<TaskState>(['completed', 'failed']);

export const isTerminalState = (state: TaskState) => TERMINAL_STATES.has(state);

export interface TextPart {
  kind: 'text';
  text: string;
  metadata?: Record<string, unknown>;
}

export interface FileWithUri {
  uri: string;
  name?: string;
  mimeType?: string;
}

export interface FileWithBytes {
  bytes: string;
  name?: string;
  mimeType?: string;
}

export interface FilePart {
  kind: 'file';
  file: FileWithUri | FileWithBytes;
  metadata?: Record<string, unknown>;
}

export interface DataPart {
  kind: 'data';
  data: Record<string, unknown>;
  metadata?: Record<string, unknown>;
}

/** A part kind this relay does not understand; kept on the wire, skipped when building the prompt. */
export interface UnknownPart {
  kind: string;
  [key: string]: unknown;
}

export type Part = TextPart | FilePart | DataPart;

export type InboundPart = Part | UnknownPart;

export type MessageRole = 'user' | 'agent';

export interface Message {
  kind: 'message';
  messageId: string;
  role: MessageRole;
  parts: InboundPart[];
  contextId?: string;
  taskId?: string;
  metadata?: Record<string, unknown>;
}

export interface TaskStatus {
  state: TaskState;
  message?: Message;
  timestamp: string;
}

export interface Task {
  kind: 'task';
  id: string;
  contextId: string;
  status: TaskStatus;
  history: Message[];
  metadata?: Record<string, unknown>;
}

export interface TaskStatusUpdateEvent {
  kind: 'status-update';
  taskId: string;
  contextId: string;
  status: TaskStatus;
  final: boolean;
}

export type JsonRpcId = string | number | null;

export interface JsonRpcRequest {
  jsonrpc: '2.0';
  id: JsonRpcId;
  method: string;
  params?: unknown;
}

export interface JsonRpcErrorObject {
  code: number;
  message: string;
  data?: unknown;
}

export interface JsonRpcSuccessResponse<T> {
  jsonrpc: '2.0';
  id: JsonRpcId;
  result: T;
}

export interface JsonRpcErrorResponse {
  jsonrpc: '2.0';
  id: JsonRpcId;
  error: JsonRpcErrorObject;
}

export type JsonRpcResponse<T> = JsonRpcSuccessResponse<T> | JsonRpcErrorResponse;

export const JSON_RPC_ERRORS = {
  parseError: -32700,
  invalidRequest: -32600,
  methodNotFound: -32601,
  invalidParams: -32602,
  internalError: -32603,
  taskNotFound: -32001,
  taskNotCancelable: -32002,
} as const;

export interface AgentSkill {
  id: string;
  name: string;
  description: string;
  tags: string[];
  examples?: string[];
}

export interface OAuth2SecurityScheme {
  type: 'oauth2';
  description?: string;
  flows: {
    authorizationCode: {
      authorizationUrl: string;
      tokenUrl: string;
      scopes: Record<string, string>;
    };
  };
}

export interface ApiKeySecurityScheme {
  type: 'apiKey';
  in: 'header';
  name: string;
  description?: string;
}

export type SecurityScheme = OAuth2SecurityScheme | ApiKeySecurityScheme;

export interface AgentCard {
  protocolVersion: string;
  name: string;
  description: string;
  url: string;
  preferredTransport: 'JSONRPC';
  version: string;
  defaultInputModes: string[];
  defaultOutputModes: string[];
  capabilities: {
    streaming: boolean;
    pushNotifications: boolean;
    stateTransitionHistory: boolean;
  };
  skills: AgentSkill[];
  securitySchemes?: Record<string, SecurityScheme>;
  security?: Array<Record<string, string[]>>;
}

/**
 * Per-request input to the task executor. The transport fills it in before
 * execution starts, including the caller's bearer credential when one was sent.
 */
export interface RequestContext {
  taskId: string;
  contextId: string;
  message: Message;
  currentTask?: Task;
  credential?: string;
}

export const isTextPart = (part: InboundPart): part is TextPart =>
  part.kind === 'text' && typeof part.text === 'string';

export const isFilePart = (part: InboundPart): part is FilePart =>
  part.kind === 'file' && typeof part.file === 'object' && part.file !== null;

export const hasFileUri = (file: FileWithUri | FileWithBytes): file is FileWithUri =>
  'uri' in file && typeof file.uri === 'string';
