import { ConfidentialClientApplication } from '@azure/msal-node';
import { z } from 'zod';
import type { FetchLike } from '../auth/keys.js';
import { RemoteInvocationError, describeError } from '../shared/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { readSseEvents } from './sse.js';
import type { RemoteBackend, ReplyEvent } from './types.js';

export const POWER_PLATFORM_SCOPE = 'https://api.powerplatform.com/.default';
const API_VERSION = '2022-03-01-preview';
const CONVERSATION_ID_HEADER = 'x-ms-conversationid';

export interface CopilotStudioSettings {
  tenantId: string;
  clientId: string;
  clientSecret: string;
  environmentId: string;
  schemaName: string;
}

/** Exchanges the caller's access token for a token the Power Platform API accepts. */
export interface TokenExchanger {
  exchange(userAssertion: string): Promise<string>;
}

export class OnBehalfOfTokenExchanger implements TokenExchanger {
  private readonly client: ConfidentialClientApplication;

  constructor(settings: Pick<CopilotStudioSettings, 'tenantId' | 'clientId' | 'clientSecret'>, private readonly scopes = [POWER_PLATFORM_SCOPE]) {
    this.client = new ConfidentialClientApplication({
      auth: {
        clientId: settings.clientId,
        authority: `https://login.microsoftonline.com/${settings.tenantId}`,
        clientSecret: settings.clientSecret,
      },
    });
  }

  async exchange(userAssertion: string): Promise<string> {
    const result = await this.client.acquireTokenOnBehalfOf({ oboAssertion: userAssertion, scopes: this.scopes });
    if (!result?.accessToken) {
      throw new RemoteInvocationError('on-behalf-of token exchange returned no access token');
    }
    return result.accessToken;
  }
}

/**
 * Environment ids map onto a per-environment host: dashes dropped, the last two hex
 * characters split off as their own label.
 */
export const copilotStudioBaseUrl = (environmentId: string, schemaName: string) => {
  const normalized = environmentId.toLowerCase().replace(/-/g, '');
  const prefix = normalized.slice(0, -2);
  const suffix = normalized.slice(-2);
  return (
    `https://${prefix}.${suffix}.environment.api.powerplatform.com` +
    `/copilotstudio/dataverse-backed/authenticated/bots/${encodeURIComponent(schemaName)}`
  );
};

const activitySchema = z
  .object({
    type: z.string(),
    text: z.string().optional(),
    conversation: z.object({ id: z.string() }).partial().optional(),
  })
  .passthrough();

export type Activity = z.infer<typeof activitySchema>;

export interface CopilotStudioBackendOptions {
  exchanger?: TokenExchanger;
  fetchImpl?: FetchLike;
  logger?: Logger;
}

export class CopilotStudioBackend implements RemoteBackend {
  readonly name = 'copilot-studio';
  private readonly baseUrl: string;
  private readonly exchanger: TokenExchanger;
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;

  constructor(settings: CopilotStudioSettings, options: CopilotStudioBackendOptions = {}) {
    this.baseUrl = copilotStudioBaseUrl(settings.environmentId, settings.schemaName);
    this.exchanger = options.exchanger ?? new OnBehalfOfTokenExchanger(settings);
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.logger = options.logger ?? createLogger('backend.copilot-studio');
  }

  async createConversation(credential: string | undefined, signal?: AbortSignal): Promise<string> {
    const response = await this.post(`${this.baseUrl}/conversations?api-version=${API_VERSION}`, credential, { emitStartConversationEvent: true }, signal);

    let conversationId = response.headers.get(CONVERSATION_ID_HEADER) ?? '';
    for await (const activity of this.activities(response)) {
      if (!conversationId && activity.conversation?.id) {
        conversationId = activity.conversation.id;
      }
      if (activity.type === 'message' && activity.text) {
        this.logger.debug('greeting activity ignored', { length: activity.text.length });
      }
    }

    if (!conversationId) {
      throw new RemoteInvocationError('Copilot Studio did not return a conversation id');
    }
    this.logger.info(`started conversation ${conversationId}`);
    return conversationId;
  }

  async *ask(conversationId: string, text: string, credential: string | undefined, signal?: AbortSignal): AsyncIterable<ReplyEvent> {
    const response = await this.post(
      `${this.baseUrl}/conversations/${encodeURIComponent(conversationId)}?api-version=${API_VERSION}`,
      credential,
      { activity: { type: 'message', text, conversation: { id: conversationId } } },
      signal,
    );

    for await (const activity of this.activities(response)) {
      if (activity.type === 'message' && activity.text) {
        yield { kind: 'text', text: activity.text };
      } else {
        yield { kind: 'progress', activityType: activity.type };
      }
    }
  }

  private async post(url: string, credential: string | undefined, body: unknown, signal?: AbortSignal): Promise<Response> {
    if (!credential) {
      throw new RemoteInvocationError('a bearer credential is required for the on-behalf-of token exchange');
    }

    const token = await this.exchanger.exchange(credential);
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: 'POST',
        headers: {
          authorization: `Bearer ${token}`,
          'content-type': 'application/json',
          accept: 'text/event-stream',
        },
        body: JSON.stringify(body),
        signal,
      });
    } catch (error) {
      throw new RemoteInvocationError(`Copilot Studio request failed: ${describeError(error)}`, { cause: error });
    }

    if (!response.ok) {
      const detail = (await response.text().catch(() => '')).slice(0, 300);
      throw new RemoteInvocationError(`Copilot Studio answered HTTP ${response.status}${detail ? `: ${detail}` : ''}`);
    }
    return response;
  }

  private async *activities(response: Response): AsyncGenerator<Activity> {
    if (!response.body) return;

    for await (const event of readSseEvents(response.body)) {
      if (event.event === 'end' || event.data === 'end') return;
      if (event.event !== 'activity' && event.event !== 'message') continue;

      let raw: unknown;
      try {
        raw = JSON.parse(event.data);
      } catch {
        this.logger.warn('unparseable activity payload skipped', { bytes: event.data.length });
        continue;
      }

      const parsed = activitySchema.safeParse(raw);
      if (!parsed.success) {
        this.logger.warn('activity without a type skipped');
        continue;
      }
      yield parsed.data;
    }
  }
}
