import type { JWK } from 'jose';
import { createLogger, type Logger } from '../utils/logger.js';
import { ConfigurationError, describeError } from '../shared/errors.js';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface SigningKey extends JWK {
  kid: string;
}

export interface KeySetCacheOptions {
  url: string;
  fetchImpl?: FetchLike;
  logger?: Logger;
}

const isSigningKey = (value: unknown): value is SigningKey => {
  if (!value || typeof value !== 'object') return false;
  if (!('kid' in value) || typeof value.kid !== 'string' || value.kid.length === 0) return false;
  if (!('kty' in value) || typeof value.kty !== 'string') return false;
  return !('use' in value) || value.use !== 'enc';
};

/**
 * Signing keys published by the token issuer. Loaded once at startup and read-only afterwards;
 * key rotation requires a restart.
 */
export class KeySetCache {
  private readonly keys = new Map<string, SigningKey>();
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;
  private loadedAt: string | null = null;

  constructor(private readonly options: KeySetCacheOptions) {
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.logger = options.logger ?? createLogger('auth.keys');
  }

  async load() {
    let response: Response;
    try {
      response = await this.fetchImpl(this.options.url, { headers: { accept: 'application/json' } });
    } catch (error) {
      throw new ConfigurationError(`unable to fetch signing keys from ${this.options.url}: ${describeError(error)}`);
    }

    if (!response.ok) {
      throw new ConfigurationError(`signing key discovery ${this.options.url} answered HTTP ${response.status}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new ConfigurationError(`signing key discovery ${this.options.url} returned invalid JSON: ${describeError(error)}`);
    }
    const entries = body && typeof body === 'object' && 'keys' in body ? body.keys : undefined;
    if (!Array.isArray(entries)) {
      throw new ConfigurationError(`signing key discovery ${this.options.url} returned no "keys" array`);
    }

    const next = new Map<string, SigningKey>();
    let skipped = 0;
    for (const entry of entries) {
      if (isSigningKey(entry)) {
        next.set(entry.kid, entry);
      } else {
        skipped += 1;
      }
    }

    if (next.size === 0) {
      throw new ConfigurationError(`signing key discovery ${this.options.url} returned no usable signing keys`);
    }

    this.keys.clear();
    for (const [kid, key] of next) {
      this.keys.set(kid, key);
    }
    this.loadedAt = new Date().toISOString();
    this.logger.info(`loaded ${this.keys.size} signing key(s)`, { url: this.options.url, skipped });
    return this;
  }

  get(kid: string): SigningKey | undefined {
    return this.keys.get(kid);
  }

  get size() {
    return this.keys.size;
  }

  get lastLoadedAt() {
    return this.loadedAt;
  }
}

export type KeyLookup = Pick<KeySetCache, 'get'>;
