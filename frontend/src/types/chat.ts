export type ChatRole = 'user' | 'assistant';

/**
 * A message as shown in the chat window.
 */
export interface DisplayMessage {
  id: string;
  role: ChatRole;
  content: string;
  timestamp: Date;
  /** Tool the backend ran for this reply, if any */
  actionTaken?: string | null;
  /** Synthetic message describing a failed request */
  isError?: boolean;
  /** User message whose request failed */
  failed?: boolean;
}

/**
 * Prior turn sent to the backend with each request.
 */
export interface ChatHistoryEntry {
  role: ChatRole;
  content: string;
  timestamp: string;
}

/**
 * Body of a successful POST /chat response.
 */
export interface ChatResponseBody {
  response: string;
  action_taken: string | null;
}

export interface ChatReply {
  response: string;
  actionTaken: string | null;
}
