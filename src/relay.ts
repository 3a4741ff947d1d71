import type { AppConfig, AuthMode } from './config.js';
import { buildAgentCard } from './agent/card.js';
import { TaskExecutor } from './agent/executor.js';
import { SessionRegistry } from './agent/session-registry.js';
import { InMemoryTaskStore } from './agent/task-store.js';
import { createAuthGate, type AuthGate } from './auth/gate.js';
import type { KeyLookup } from './auth/keys.js';
import { buildBackend, type RemoteBackend } from './backend/index.js';
import type { AgentCard } from './shared/protocol.js';
import { createLogger, type Logger } from './utils/logger.js';

/**
 * Everything one relay instance owns. Built once per process by `createRelay` and handed to the
 * transport, so nothing below it reaches for module-level state.
 */
export interface RelayContext {
  config: AppConfig;
  authMode: AuthMode;
  gate: AuthGate;
  sessions: SessionRegistry;
  tasks: InMemoryTaskStore;
  executor: TaskExecutor;
  backend: RemoteBackend;
  card: AgentCard;
  logger: Logger;
  startedAt: number;
}

export interface RelayOverrides {
  keys?: KeyLookup | null;
  backend?: RemoteBackend;
  gate?: AuthGate;
  logger?: Logger;
}

export const createRelay = (config: AppConfig, overrides: RelayOverrides = {}): RelayContext => {
  const logger = overrides.logger ?? createLogger('relay', config.LOG_LEVEL);
  const gate = overrides.gate ?? createAuthGate(config, overrides.keys ?? null, logger.child('auth'));
  const backend = overrides.backend ?? buildBackend(config, logger.child('backend'));

  const sessions = new SessionRegistry({
    createThread: (credential, signal) => backend.createConversation(credential, signal),
    createTimeoutMs: config.REMOTE_TIMEOUT_MS,
    eviction: {
      ttlMs: config.SESSION_TTL_SECONDS > 0 ? config.SESSION_TTL_SECONDS * 1000 : undefined,
      maxEntries: config.SESSION_MAX_ENTRIES > 0 ? config.SESSION_MAX_ENTRIES : undefined,
    },
    logger: logger.child('sessions'),
  });
  const tasks = new InMemoryTaskStore(logger.child('tasks'));
  const executor = new TaskExecutor({
    tasks,
    sessions,
    backend,
    remoteTimeoutMs: config.REMOTE_TIMEOUT_MS,
    cancelMode: config.CANCEL_MODE,
    logger: logger.child('executor'),
  });

  logger.info(`relay ready (auth=${gate.mode}, backend=${backend.name})`);

  return {
    config,
    authMode: gate.mode,
    gate,
    sessions,
    tasks,
    executor,
    backend,
    card: buildAgentCard(config, gate.mode),
    logger,
    startedAt: Date.now(),
  };
};
