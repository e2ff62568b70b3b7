import { useCallback, useState } from 'react';
import { sendChatMessage } from '@/lib/chat-api';
import { describeChatError } from '@/lib/chat-errors';
import type { ChatHistoryEntry, ChatRole, DisplayMessage } from '@/types/chat';

export const GREETING_ID = 'greeting';

export const GREETING =
  "Hi! I'm your access support assistant. How can I help you today?";

/**
 * Generate a unique ID for chat messages.
 */
function generateId(): string {
  return `msg_${Date.now()}_${Math.random().toString(36).slice(2, 11)}`;
}

function createMessage(
  role: ChatRole,
  content: string,
  extra: Pick<DisplayMessage, 'actionTaken' | 'isError'> = {},
): DisplayMessage {
  return { id: generateId(), role, content, timestamp: new Date(), ...extra };
}

/**
 * Prior turns for the backend. The greeting, error messages and the user
 * messages of failed turns are UI-only.
 */
export function toHistory(messages: DisplayMessage[]): ChatHistoryEntry[] {
  return messages
    .filter((m) => m.id !== GREETING_ID && !m.isError && !m.failed)
    .map((m) => ({
      role: m.role,
      content: m.content,
      timestamp: m.timestamp.toISOString(),
    }));
}

/**
 * Hook holding the conversation shown in the chat window.
 *
 * Messages are only ever appended. A failed request marks its user message
 * as failed and adds an assistant-role error message instead of a reply.
 */
export function useSupportChat() {
  const [messages, setMessages] = useState<DisplayMessage[]>(() => [
    {
      id: GREETING_ID,
      role: 'assistant',
      content: GREETING,
      timestamp: new Date(),
    },
  ]);
  const [isLoading, setIsLoading] = useState(false);

  const sendMessage = useCallback(
    async (text: string): Promise<void> => {
      const content = text.trim();
      if (!content || isLoading) return;

      const history = toHistory(messages);
      const userMessage = createMessage('user', content);
      setMessages((prev) => [...prev, userMessage]);
      setIsLoading(true);

      try {
        const reply = await sendChatMessage(content, history);
        setMessages((prev) => [
          ...prev,
          createMessage('assistant', reply.response, {
            actionTaken: reply.actionTaken,
          }),
        ]);
      } catch (error) {
        console.error('Chat error:', error);
        setMessages((prev) => [
          ...prev.map((m) =>
            m.id === userMessage.id ? { ...m, failed: true } : m,
          ),
          createMessage('assistant', `Error: ${describeChatError(error)}`, {
            isError: true,
          }),
        ]);
      } finally {
        setIsLoading(false);
      }
    },
    [messages, isLoading],
  );

  return { messages, isLoading, sendMessage };
}
