export type ReplyEvent =
  | { kind: 'text'; text: string }
  | { kind: 'progress'; activityType: string };

export interface RemoteBackend {
  readonly name: string;
  createConversation(credential: string | undefined, signal?: AbortSignal): Promise<string>;
  ask(conversationId: string, text: string, credential: string | undefined, signal?: AbortSignal): AsyncIterable<ReplyEvent>;
}
