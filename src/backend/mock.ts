import { randomUUID } from 'node:crypto';
import type { RemoteBackend, ReplyEvent } from './types.js';

export class MockBackend implements RemoteBackend {
  readonly name = 'mock';

  async createConversation(_credential: string | undefined, signal?: AbortSignal): Promise<string> {
    signal?.throwIfAborted();
    return `mock-${randomUUID()}`;
  }

  async *ask(conversationId: string, text: string, _credential: string | undefined, signal?: AbortSignal): AsyncIterable<ReplyEvent> {
    signal?.throwIfAborted();
    yield { kind: 'progress', activityType: 'typing' };

    const trimmed = text.trim();
    if (!trimmed) {
      yield { kind: 'text', text: 'Received an empty message. Send a concrete request and I will answer it.' };
      return;
    }

    yield { kind: 'text', text: `Echo (${conversationId}): ${trimmed.slice(0, 500)}` };
  }
}
