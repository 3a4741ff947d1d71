import type { AppConfig } from '../config.js';
import type { Logger } from '../utils/logger.js';
import { CopilotStudioBackend } from './copilot-studio.js';
import { MockBackend } from './mock.js';
import type { RemoteBackend } from './types.js';

export const buildBackend = (config: AppConfig, logger?: Logger): RemoteBackend => {
  if (config.BACKEND_MODE === 'mock') {
    return new MockBackend();
  }

  return new CopilotStudioBackend(
    {
      tenantId: config.COPILOTSTUDIOAGENT__TENANTID,
      clientId: config.COPILOTSTUDIOAGENT__AGENTAPPID,
      clientSecret: config.COPILOTSTUDIOAGENT__CLIENTSECRET,
      environmentId: config.COPILOTSTUDIOAGENT__ENVIRONMENTID,
      schemaName: config.COPILOTSTUDIOAGENT__SCHEMANAME,
    },
    { logger },
  );
};

export type { RemoteBackend, ReplyEvent } from './types.js';
