import { z } from 'zod';

/**
 * One prior message as sent by the chat front end. `timestamp` is optional
 * because the front end keeps its own display times.
 */
export const chatHistoryEntrySchema = z.object({
  role: z.enum(['user', 'assistant', 'tool']),
  content: z.string(),
  timestamp: z.string().optional(),
});

/**
 * Request body for POST /chat.
 */
export const chatRequestSchema = z.object({
  message: z.string({ required_error: 'message is required' }),
  /** Informational only; the assistant extracts user ids from the message */
  user_id: z.string().optional(),
  history: z.array(chatHistoryEntrySchema).default([]),
});

export type ChatHistoryEntryDto = z.infer<typeof chatHistoryEntrySchema>;
export type ParsedChatRequest = z.output<typeof chatRequestSchema>;
