import http from 'node:http';
import { exportJWK, generateKeyPair, SignJWT, type JWK, type JWTPayload, type KeyLike } from 'jose';

import { parseAppConfig, type AppConfig } from '../src/config.js';
import type { SigningKey } from '../src/auth/keys.js';
import type { RemoteBackend, ReplyEvent } from '../src/backend/types.js';

export const TENANT_ID = '00000000-0000-0000-0000-00000000aaaa';
export const CLIENT_ID = '11111111-2222-3333-4444-555555555555';

export const buildTestConfig = (env: Record<string, string> = {}): AppConfig =>
  parseAppConfig({ BACKEND_MODE: 'mock', LOG_LEVEL: 'error', ...env }, {});

export const bearerEnv = {
  COPILOTSTUDIOAGENT__TENANTID: TENANT_ID,
  COPILOTSTUDIOAGENT__AGENTAPPID: CLIENT_ID,
  COPILOTSTUDIOAGENT__CLIENTSECRET: 'test-secret',
};

export interface TestSigner {
  kid: string;
  publicJwk: SigningKey;
  sign(claims?: JWTPayload, options?: { kid?: string; expiresIn?: string | number; audience?: string }): Promise<string>;
}

export const createSigner = async (kid = 'test-key-1'): Promise<TestSigner> => {
  const { publicKey, privateKey } = await generateKeyPair('RS256');
  const exported: JWK = await exportJWK(publicKey);
  const publicJwk: SigningKey = { ...exported, kid, alg: 'RS256', use: 'sig' };

  return {
    kid,
    publicJwk,
    sign: (claims = {}, options = {}) => signWith(privateKey, claims, { ...options, kid: options.kid ?? kid }),
  };
};

const signWith = (
  key: KeyLike,
  claims: JWTPayload,
  options: { kid: string; expiresIn?: string | number; audience?: string },
) =>
  new SignJWT({ sub: 'user-1', ...claims })
    .setProtectedHeader({ alg: 'RS256', kid: options.kid })
    .setIssuedAt()
    .setAudience(options.audience ?? CLIENT_ID)
    .setExpirationTime(options.expiresIn ?? '5m')
    .sign(key);

export const keyLookup = (...keys: SigningKey[]) => {
  const map = new Map<string, SigningKey>(keys.map((key): [string, SigningKey] => [key.kid, key]));
  return { get: (kid: string) => map.get(kid) };
};

/** Backend double: records calls and replays the scripted replies for every `ask`. */
export class ScriptedBackend implements RemoteBackend {
  readonly name = 'scripted';
  readonly conversations: Array<string | undefined> = [];
  readonly asks: Array<{ conversationId: string; text: string; credential?: string }> = [];
  replies: ReplyEvent[] = [{ kind: 'text', text: 'hello back' }];
  askError: Error | null = null;
  createError: Error | null = null;
  hang = false;
  createDelayMs = 0;

  async createConversation(credential: string | undefined, signal?: AbortSignal): Promise<string> {
    this.conversations.push(credential);
    if (this.createDelayMs > 0) {
      await new Promise<void>((resolve, reject) => {
        const timer = setTimeout(resolve, this.createDelayMs);
        if (!signal) return;
        const aborted = signal;
        aborted.addEventListener(
          'abort',
          () => {
            clearTimeout(timer);
            reject(aborted.reason);
          },
          { once: true },
        );
      });
    }
    if (this.createError) throw this.createError;
    return `thread-${this.conversations.length}`;
  }

  async *ask(conversationId: string, text: string, credential: string | undefined, signal?: AbortSignal): AsyncIterable<ReplyEvent> {
    this.asks.push({ conversationId, text, credential });
    for (const reply of this.replies) {
      yield reply;
    }
    if (this.askError) throw this.askError;
    if (this.hang) {
      await new Promise<void>((resolve) => {
        signal?.addEventListener('abort', () => resolve(), { once: true });
      });
    }
  }
}

export const readHttpBody = async (res: http.IncomingMessage): Promise<string> => {
  const chunks: Buffer[] = [];
  for await (const chunk of res) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf8');
};

export interface HttpResult {
  statusCode: number;
  headers: http.IncomingHttpHeaders;
  text: string;
  payload: unknown;
}

export const requestHttp = (
  port: number,
  route: string,
  init: {
    method?: string;
    body?: unknown;
    rawBody?: string;
    headers?: Record<string, string>;
  } = {},
): Promise<HttpResult> => {
  const method = init.method ?? 'GET';
  return new Promise((resolve, reject) => {
    const headers: Record<string, string> = { ...(init.headers || {}) };
    const body = init.rawBody ?? (init.body === undefined ? undefined : JSON.stringify(init.body));
    if (body !== undefined && !headers['content-type']) {
      headers['content-type'] = 'application/json';
    }
    const req = http.request({ method, hostname: '127.0.0.1', port, path: route, headers }, async (res) => {
      try {
        const text = await readHttpBody(res);
        let payload: unknown = null;
        if (String(res.headers['content-type'] ?? '').includes('application/json') && text) {
          payload = JSON.parse(text);
        }
        resolve({ statusCode: res.statusCode || 0, headers: res.headers, text, payload });
      } catch (error) {
        reject(error);
      }
    });
    req.on('error', reject);
    if (body !== undefined) {
      req.write(body);
    }
    req.end();
  });
};

export const rpcBody = (method: string, params: unknown, id: string | number = 1) => ({ jsonrpc: '2.0', id, method, params });

export const userMessage = (text: string, extra: Record<string, unknown> = {}) => ({
  kind: 'message',
  messageId: `m-${Math.random().toString(36).slice(2, 8)}`,
  role: 'user',
  parts: [{ kind: 'text', text }],
  ...extra,
});

/** Parses `data:` lines of an event-stream body into JSON payloads. */
export const parseSseBody = (text: string): unknown[] =>
  text
    .split('\n\n')
    .map((block) => block.trim())
    .filter((block) => block.startsWith('data:'))
    .map((block) => JSON.parse(block.slice('data:'.length).trim()));

/** Walks `path` through nested objects; undefined as soon as a step is missing. */
export const pick = (value: unknown, ...path: Array<string | number>): unknown => {
  let current: unknown = value;
  for (const key of path) {
    if (typeof current !== 'object' || current === null) return undefined;
    current = Reflect.get(current, key);
  }
  return current;
};

export const pickString = (value: unknown, ...path: Array<string | number>): string => {
  const found = pick(value, ...path);
  if (typeof found !== 'string') {
    throw new Error(`expected a string at ${path.join('.')}`);
  }
  return found;
};
