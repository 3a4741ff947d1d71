import { config, resolveAuthMode } from './config.js';
import { KeySetCache } from './auth/keys.js';
import { createRelay } from './relay.js';
import { createHttpServer } from './runtime/http.js';
import { describeError } from './shared/errors.js';
import { createLogger } from './utils/logger.js';
import {
  formatStartupIssue,
  StartupValidationError,
  type StartupIssue,
  validateStartupConfigOrThrow,
} from './utils/startup.js';

const logger = createLogger('a2a-relay', config.LOG_LEVEL);

const run = async () => {
  let startupIssues: StartupIssue[];
  try {
    startupIssues = validateStartupConfigOrThrow(config);
  } catch (error) {
    if (error instanceof StartupValidationError) {
      startupIssues = error.issues;
    } else {
      throw error;
    }
  }
  const hasStartupError = startupIssues.some((issue) => issue.severity === 'error');

  for (const issue of startupIssues) {
    const rendered = formatStartupIssue(issue);
    if (issue.severity === 'error') {
      logger.error(`[startup/${issue.area}] ${rendered}`);
    } else {
      logger.warn(`[startup/${issue.area}] ${rendered}`);
    }
  }

  if (hasStartupError) {
    throw new StartupValidationError(startupIssues);
  }

  let keys: KeySetCache | null = null;
  if (resolveAuthMode(config) === 'bearer') {
    keys = new KeySetCache({ url: config.JWKS_URL, logger: createLogger('auth.keys', config.LOG_LEVEL) });
    await keys.load();
  }

  const relay = createRelay(config, { keys });
  const httpServer = await createHttpServer(relay, config.PORT, createLogger('runtime.http', config.LOG_LEVEL));

  const shutdown = async () => {
    logger.info('shutdown signal received');
    await new Promise<void>((resolve, reject) => {
      httpServer.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((error: unknown) => {
      logger.error(`shutdown failed: ${describeError(error)}`);
      process.exit(1);
    });
  };

  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);
};

run().catch((err: unknown) => {
  if (err instanceof StartupValidationError) {
    logger.error(`startup checks failed, aborting (${err.errorCount} error(s))`);
    process.exit(1);
    return;
  }
  logger.error(`fatal: ${describeError(err)}`);
  process.exit(1);
});
