import { RemoteInvocationError, SessionCreationError, describeError } from '../shared/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';

export interface Session {
  contextId: string;
  threadId: string;
  createdAt: string;
  lastUsedAt: string;
}

/** Creates the remote conversation thread for a context the registry has not seen yet. */
export type ThreadFactory = (credential: string | undefined, signal?: AbortSignal) => Promise<string>;

/**
 * Both limits are off by default, which keeps every session for the lifetime of the process.
 * `maxEntries` evicts the least recently used context once the cap is exceeded.
 */
export interface SessionEvictionPolicy {
  ttlMs?: number;
  maxEntries?: number;
}

export interface SessionRegistryOptions {
  createThread: ThreadFactory;
  /** Upper bound on one creation; it is shared by every waiter, so no single caller can abort it. */
  createTimeoutMs?: number;
  eviction?: SessionEvictionPolicy;
  now?: () => number;
  logger?: Logger;
}

export class SessionRegistry {
  // Map iteration order doubles as the LRU order: oldest use first.
  private readonly sessions = new Map<string, Session>();
  private readonly pending = new Map<string, Promise<Session>>();
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(private readonly options: SessionRegistryOptions) {
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? createLogger('agent.sessions');
  }

  async getOrCreateSession(contextId: string, credential?: string): Promise<string> {
    const existing = this.lookup(contextId);
    if (existing) {
      return existing.threadId;
    }

    const inFlight = this.pending.get(contextId);
    if (inFlight) {
      return (await inFlight).threadId;
    }

    const creation = this.create(contextId, credential);
    this.pending.set(contextId, creation);
    try {
      return (await creation).threadId;
    } finally {
      this.pending.delete(contextId);
    }
  }

  get(contextId: string): Session | undefined {
    return this.lookup(contextId, false);
  }

  list(): Session[] {
    return Array.from(this.sessions.values()).map((session) => ({ ...session }));
  }

  get size() {
    return this.sessions.size;
  }

  evict(contextId: string): boolean {
    return this.sessions.delete(contextId);
  }

  clear() {
    this.sessions.clear();
  }

  private lookup(contextId: string, touch = true): Session | undefined {
    const session = this.sessions.get(contextId);
    if (!session) return undefined;

    const ttlMs = this.options.eviction?.ttlMs;
    if (ttlMs && this.now() - Date.parse(session.lastUsedAt) > ttlMs) {
      this.sessions.delete(contextId);
      this.logger.info('session expired', { contextId, threadId: session.threadId });
      return undefined;
    }

    if (touch) {
      session.lastUsedAt = new Date(this.now()).toISOString();
      this.sessions.delete(contextId);
      this.sessions.set(contextId, session);
    }
    return session;
  }

  private async create(contextId: string, credential: string | undefined): Promise<Session> {
    const { createTimeoutMs } = this.options;
    const controller = createTimeoutMs ? new AbortController() : undefined;
    const timer = controller
      ? setTimeout(() => {
          controller.abort(
            new RemoteInvocationError(`remote conversation was not created within ${createTimeoutMs}ms`, { timedOut: true }),
          );
        }, createTimeoutMs)
      : undefined;

    let threadId: string;
    try {
      threadId = await this.options.createThread(credential, controller?.signal);
    } catch (error) {
      if (error instanceof SessionCreationError) throw error;
      throw new SessionCreationError(contextId, `unable to create remote conversation: ${describeError(error)}`, {
        cause: error,
      });
    } finally {
      clearTimeout(timer);
    }

    const at = new Date(this.now()).toISOString();
    const session: Session = { contextId, threadId, createdAt: at, lastUsedAt: at };
    this.sessions.set(contextId, session);
    this.logger.info(`created thread ${threadId} for context ${contextId}`);
    this.enforceCapacity();
    return session;
  }

  private enforceCapacity() {
    const maxEntries = this.options.eviction?.maxEntries;
    if (!maxEntries) return;

    while (this.sessions.size > maxEntries) {
      const oldest = this.sessions.keys().next();
      if (oldest.done) break;
      this.sessions.delete(oldest.value);
      this.logger.info('session evicted (capacity)', { contextId: oldest.value, maxEntries });
    }
  }
}
