/**
 * Test doubles for the tool-calling chat model.
 *
 * ScriptedModel hands out prepared replies in order and records every
 * transcript it was sent, so tests can check both what the dialogue did and
 * what the model saw. No network calls are made.
 */
import { AIMessage, type BaseMessage } from '@langchain/core/messages';
import type { ToolCallingModel } from '../llm-provider.service';

export class ScriptedModel implements ToolCallingModel {
  readonly calls: BaseMessage[][] = [];

  constructor(private readonly replies: Array<AIMessage | Error>) {}

  invoke(input: BaseMessage[]): Promise<AIMessage> {
    this.calls.push([...input]);
    const next = this.replies.shift();
    if (!next) {
      return Promise.reject(new Error('ScriptedModel has no replies left'));
    }
    if (next instanceof Error) {
      return Promise.reject(next);
    }
    return Promise.resolve(next);
  }
}

/**
 * Create an AIMessage that contains a single tool call.
 *
 * @example
 * ```typescript
 * const message = createToolCallMessage('trigger_identity_refresh', { user_id: 'Ram' });
 * ```
 */
export function createToolCallMessage(
  toolName: string,
  args: Record<string, unknown>,
  id?: string,
): AIMessage {
  return new AIMessage({
    content: '',
    tool_calls: [{ name: toolName, args, id: id ?? `call_${toolName}` }],
  });
}

/**
 * Create an AIMessage with several tool calls in one reply.
 */
export function createMultiToolCallMessage(
  toolCalls: Array<{
    name: string;
    args: Record<string, unknown>;
    id?: string;
  }>,
): AIMessage {
  return new AIMessage({
    content: '',
    tool_calls: toolCalls.map((tc, index) => ({
      name: tc.name,
      args: tc.args,
      id: tc.id ?? `call_${tc.name}_${index}`,
    })),
  });
}
