/**
 * Type guards and conversions for LangChain messages.
 */
import {
  AIMessage,
  BaseMessage,
  HumanMessage,
} from '@langchain/core/messages';
import type { ChatMessage } from '../types/chat-message';

/**
 * Type guard to check if a message is an AIMessage.
 * Accepts undefined to handle .at(-1) return type safely.
 */
export function isAiMessage(msg: BaseMessage | undefined): msg is AIMessage {
  return msg !== undefined && msg instanceof AIMessage;
}

/**
 * Plain text of a message's content. Structured content keeps only its text
 * parts.
 */
export function extractText(content: BaseMessage['content']): string {
  if (typeof content === 'string') {
    return content.trim();
  }
  return content
    .map((part) =>
      part.type === 'text' && 'text' in part && typeof part.text === 'string'
        ? part.text
        : '',
    )
    .join('')
    .trim();
}

/**
 * Drop the `tool_use` blocks of structured content except the one for
 * `callId`. Providers that send tool calls as content blocks replay them on
 * the next request, where each needs a matching tool result.
 */
export function keepToolUseBlock(
  content: BaseMessage['content'],
  callId: string,
): BaseMessage['content'] {
  if (typeof content === 'string') {
    return content;
  }
  return content.filter(
    (part) =>
      part.type !== 'tool_use' || ('id' in part && part.id === callId),
  );
}

/**
 * Convert a stored conversation into the transcript sent to the model.
 *
 * Tool entries are left out: a tool message must answer a tool call of the
 * same turn, and the assistant reply that followed an earlier tool entry
 * already carries its outcome. Empty entries are dropped.
 */
export function toLangChainMessages(
  history: readonly ChatMessage[],
): BaseMessage[] {
  return history
    .filter((m) => m.content.trim().length > 0)
    .flatMap((m): BaseMessage[] => {
      switch (m.role) {
        case 'user':
          return [new HumanMessage(m.content)];
        case 'assistant':
          return [new AIMessage(m.content)];
        case 'tool':
          return [];
      }
    });
}
