export type ChatRole = 'user' | 'assistant' | 'tool';

/**
 * One entry of a conversation. Entries are frozen on creation; a
 * conversation only ever grows by appending.
 */
export interface ChatMessage {
  readonly role: ChatRole;
  readonly content: string;
  /** ISO 8601 */
  readonly timestamp: string;
}

export function createChatMessage(
  role: ChatRole,
  content: string,
  now: Date = new Date(),
): ChatMessage {
  return Object.freeze({ role, content, timestamp: now.toISOString() });
}
