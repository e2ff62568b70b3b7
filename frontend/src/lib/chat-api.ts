import axios from 'axios';
import type {
  ChatHistoryEntry,
  ChatReply,
  ChatResponseBody,
} from '@/types/chat';

// API base URL
export const API_BASE = 'http://localhost:3000';

export const DEMO_USER_ID = 'demo_user';

// The backend makes up to two LLM calls and one identity API call per turn
export const CHAT_TIMEOUT_MS = 60000;

/**
 * Send one chat turn to the backend.
 */
export async function sendChatMessage(
  message: string,
  history: ChatHistoryEntry[],
): Promise<ChatReply> {
  const { data } = await axios.post<ChatResponseBody>(
    `${API_BASE}/chat`,
    { message, user_id: DEMO_USER_ID, history },
    { timeout: CHAT_TIMEOUT_MS },
  );
  return {
    response: data.response,
    actionTaken: data.action_taken ?? null,
  };
}
