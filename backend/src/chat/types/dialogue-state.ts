import { Annotation, MessagesAnnotation } from '@langchain/langgraph';
import type {
  IdentityOperation,
  ToolResult,
} from '../../identity/identity.types';

/**
 * Phases of one chat turn.
 *
 * awaiting_initial_reply -> tool_requested -> awaiting_followup_reply -> done
 * awaiting_initial_reply -> done (no tool requested)
 */
export type DialoguePhase =
  | 'awaiting_initial_reply'
  | 'tool_requested'
  | 'awaiting_followup_reply'
  | 'done';

/**
 * The tool call honored for this turn. Only the first call of the model's
 * reply is kept.
 */
export interface ToolInvocationRequest {
  toolName: string;
  arguments: Record<string, unknown>;
  callId: string;
  /** Set when the provider could not parse the call's arguments */
  argumentError?: string;
}

function replace<T>(_previous: T, next: T): T {
  return next;
}

/**
 * Graph state for one chat turn. `messages` uses the LangGraph messages
 * reducer (append by id); every other channel keeps the latest write.
 */
export const DialogueStateAnnotation = Annotation.Root({
  ...MessagesAnnotation.spec,
  phase: Annotation<DialoguePhase>({
    reducer: replace,
    default: () => 'awaiting_initial_reply',
  }),
  toolRequest: Annotation<ToolInvocationRequest | null>({
    reducer: replace,
    default: () => null,
  }),
  toolResult: Annotation<ToolResult | null>({
    reducer: replace,
    default: () => null,
  }),
  actionTaken: Annotation<IdentityOperation | null>({
    reducer: replace,
    default: () => null,
  }),
});

export type DialogueState = typeof DialogueStateAnnotation.State;
