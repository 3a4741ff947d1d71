import crypto from 'node:crypto';
import type { IncomingHttpHeaders } from 'node:http';
import type { JWTPayload } from 'jose';
import { resolveAuthMode, type AppConfig, type AuthMode } from '../config.js';
import { AGENT_CARD_PATH } from '../shared/protocol.js';
import { ConfigurationError } from '../shared/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';
import type { KeyLookup } from './keys.js';
import { audiencesForClient, validateBearerToken, type TokenValidationOptions } from './token.js';

export interface GateRequest {
  method: string;
  path: string;
  headers: IncomingHttpHeaders;
}

export interface AuthErrorBody {
  error: string;
  message: string;
}

export type AuthDecision =
  | { allowed: true; reason: string; claims?: JWTPayload }
  | {
      allowed: false;
      reason: string;
      status: 401 | 403;
      body: AuthErrorBody;
      headers: Record<string, string>;
    };

export interface AuthGate {
  readonly mode: AuthMode;
  authorize(request: GateRequest): Promise<AuthDecision>;
}

export const isPublicRoute = (method: string, path: string) => method === 'GET' && path === AGENT_CARD_PATH;

const headerValue = (headers: IncomingHttpHeaders, name: string): string | undefined => {
  const value = headers[name.toLowerCase()];
  if (Array.isArray(value)) return value[0];
  return value;
};

/** Extracts `<token>` from `Authorization: Bearer <token>`; the scheme match is case-insensitive. */
export const extractBearerToken = (headers: IncomingHttpHeaders): string | undefined => {
  const raw = headerValue(headers, 'authorization');
  if (!raw) return undefined;
  const match = raw.match(/^Bearer\s+(\S+)\s*$/i);
  return match ? match[1] : undefined;
};

const publicDecision = (): AuthDecision => ({ allowed: true, reason: 'public_route' });

const deny = (
  status: 401 | 403,
  reason: string,
  body: AuthErrorBody,
  headers: Record<string, string> = {},
): AuthDecision => ({ allowed: false, reason, status, body, headers });

export interface BearerTokenGateOptions {
  tenantId: string;
  clientId: string;
  keys: KeyLookup;
  algorithms?: string[];
  logger?: Logger;
}

export class BearerTokenGate implements AuthGate {
  readonly mode = 'bearer' as const;
  private readonly logger: Logger;
  private readonly challenge: string;
  private readonly validation: TokenValidationOptions;

  constructor(private readonly options: BearerTokenGateOptions) {
    this.logger = options.logger ?? createLogger('auth.gate');
    this.challenge =
      `Bearer realm="", authorization_uri="https://login.microsoftonline.com/${options.tenantId}/oauth2/authorize", ` +
      `client_id="${options.clientId}"`;
    this.validation = {
      audiences: audiencesForClient(options.clientId),
      algorithms: options.algorithms,
    };
  }

  async authorize(request: GateRequest): Promise<AuthDecision> {
    if (isPublicRoute(request.method, request.path)) return publicDecision();

    const challengeHeaders = { 'www-authenticate': this.challenge };
    const token = extractBearerToken(request.headers);
    if (!token) {
      return deny(
        401,
        'missing_bearer_token',
        { error: 'Unauthorized', message: 'Bearer token is required in the Authorization header' },
        challengeHeaders,
      );
    }

    const result = await validateBearerToken(token, this.options.keys, this.validation);
    if (!result.valid) {
      this.logger.warn('bearer token rejected', { path: request.path, reason: result.reason });
      return deny(
        401,
        result.reason,
        { error: 'Unauthorized', message: `Invalid bearer token (${result.reason}): ${result.detail}` },
        challengeHeaders,
      );
    }

    this.logger.debug('bearer token accepted', { path: request.path, kid: result.keyId, sub: result.claims.sub });
    return { allowed: true, reason: 'valid_bearer_token', claims: result.claims };
  }
}

const constantTimeEquals = (provided: string, expected: string) => {
  const a = crypto.createHash('sha256').update(provided).digest();
  const b = crypto.createHash('sha256').update(expected).digest();
  return crypto.timingSafeEqual(a, b);
};

export class ApiKeyGate implements AuthGate {
  readonly mode = 'api-key' as const;
  private readonly logger: Logger;

  constructor(private readonly apiKey: string, logger?: Logger) {
    this.logger = logger ?? createLogger('auth.gate');
  }

  async authorize(request: GateRequest): Promise<AuthDecision> {
    if (isPublicRoute(request.method, request.path)) return publicDecision();

    const provided = headerValue(request.headers, 'x-api-key');
    if (!provided) {
      return deny(401, 'missing_api_key', { error: 'Unauthorized', message: 'X-API-Key header is required' });
    }

    if (!constantTimeEquals(provided, this.apiKey)) {
      this.logger.warn('api key rejected', { path: request.path });
      return deny(403, 'invalid_api_key', { error: 'Forbidden', message: 'Invalid API key' });
    }

    return { allowed: true, reason: 'valid_api_key' };
  }
}

export class DisabledGate implements AuthGate {
  readonly mode = 'disabled' as const;

  async authorize(request: GateRequest): Promise<AuthDecision> {
    if (isPublicRoute(request.method, request.path)) return publicDecision();
    return { allowed: true, reason: 'auth_disabled' };
  }
}

export const createAuthGate = (config: AppConfig, keys: KeyLookup | null, logger = createLogger('auth.gate')): AuthGate => {
  const mode = resolveAuthMode(config);

  if (mode === 'bearer') {
    if (!keys) {
      throw new ConfigurationError('bearer-token auth requires a loaded signing key set');
    }
    logger.info('auth mode: bearer token', { tenantId: config.COPILOTSTUDIOAGENT__TENANTID });
    return new BearerTokenGate({
      tenantId: config.COPILOTSTUDIOAGENT__TENANTID,
      clientId: config.COPILOTSTUDIOAGENT__AGENTAPPID,
      keys,
      logger,
    });
  }

  if (mode === 'api-key') {
    logger.info('auth mode: static API key');
    return new ApiKeyGate(config.API_KEY, logger);
  }

  logger.warn('!!! authentication is DISABLED: no client secret and no API_KEY configured; all endpoints are open !!!');
  return new DisabledGate();
};
