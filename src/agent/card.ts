import { publicBaseUrl, type AppConfig, type AuthMode } from '../config.js';
import { PROTOCOL_VERSION, type AgentCard, type AgentSkill, type SecurityScheme } from '../shared/protocol.js';

export const AGENT_VERSION = '1.0.0';

const invokeSkill: AgentSkill = {
  id: 'CopilotStudioInvokeSkill',
  name: 'Invoke Skill',
  description: 'Invokes a copilot studio agent',
  tags: ['echo', 'test'],
  examples: ['hi', 'hello world'],
};

const securityFor = (
  config: AppConfig,
  mode: AuthMode,
): Pick<AgentCard, 'securitySchemes' | 'security'> => {
  if (mode === 'bearer') {
    const tenant = config.COPILOTSTUDIOAGENT__TENANTID;
    const scope = `api://${config.COPILOTSTUDIOAGENT__AGENTAPPID}/invoke`;
    const entra: SecurityScheme = {
      type: 'oauth2',
      description: 'Microsoft Entra ID access token for this agent application',
      flows: {
        authorizationCode: {
          authorizationUrl: `https://login.microsoftonline.com/${tenant}/oauth2/v2.0/authorize`,
          tokenUrl: `https://login.microsoftonline.com/${tenant}/oauth2/v2.0/token`,
          scopes: { [scope]: 'Invoke the agent' },
        },
      },
    };
    return { securitySchemes: { entra }, security: [{ entra: [scope] }] };
  }

  if (mode === 'api-key') {
    const apiKey: SecurityScheme = {
      type: 'apiKey',
      in: 'header',
      name: 'X-API-Key',
      description: 'Static API key shared with the caller',
    };
    return { securitySchemes: { apiKey }, security: [{ apiKey: [] }] };
  }

  return {};
};

export const buildAgentCard = (config: AppConfig, mode: AuthMode): AgentCard => ({
  protocolVersion: PROTOCOL_VERSION,
  name: config.AGENT_NAME,
  description: config.AGENT_DESCRIPTION,
  url: publicBaseUrl(config),
  preferredTransport: 'JSONRPC',
  version: AGENT_VERSION,
  defaultInputModes: ['text'],
  defaultOutputModes: ['text'],
  capabilities: {
    streaming: true,
    pushNotifications: false,
    stateTransitionHistory: false,
  },
  skills: [invokeSkill],
  ...securityFor(config, mode),
});
