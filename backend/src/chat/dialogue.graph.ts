import { Logger } from '@nestjs/common';
import { END, START, StateGraph } from '@langchain/langgraph';
import {
  AIMessage,
  SystemMessage,
  ToolMessage,
  type AIMessageChunk,
  type BaseMessage,
} from '@langchain/core/messages';
import { errorResult, isIdentityOperation } from '../identity/identity.types';
import type { ToolRegistry } from '../tools/tool-registry';
import type { ToolCallingModel } from './llm-provider.service';
import {
  DialogueStateAnnotation,
  type DialogueState,
  type ToolInvocationRequest,
} from './types/dialogue-state';
import { extractText, keepToolUseBlock } from './utils/message-utils';
import { formatToolResultReply } from './utils/reply-formatter';

export const EMPTY_REPLY_FALLBACK =
  "I'm sorry, I couldn't come up with a response. Could you rephrase your question?";

export interface DialogueGraphOptions {
  model: ToolCallingModel;
  registry: Pick<ToolRegistry, 'dispatch'>;
  systemPrompt: string;
  timeoutMs: number;
  logger?: Logger;
}

/**
 * The first tool call of a reply. A call whose arguments the provider could
 * not parse is honored too, so the model hears back about it.
 */
function pickToolRequest(
  response: AIMessage | AIMessageChunk,
  logger: Logger,
): ToolInvocationRequest | null {
  const toolCalls = response.tool_calls ?? [];
  const invalidCalls = response.invalid_tool_calls ?? [];
  const requested = toolCalls.length + invalidCalls.length;
  if (requested > 1) {
    logger.warn(
      `Model requested ${requested} tool calls, honoring only the first`,
    );
  }

  const [first] = toolCalls;
  if (first) {
    return {
      toolName: first.name,
      arguments: first.args,
      callId: first.id ?? `call_${first.name}_${Date.now()}`,
    };
  }

  const [invalid] = invalidCalls;
  const name = invalid?.name;
  if (!invalid || !name) {
    return null;
  }
  logger.warn(`Model sent unparseable arguments for ${name}`);
  return {
    toolName: name,
    arguments: {},
    callId: invalid.id ?? `call_${name}_${Date.now()}`,
    argumentError: invalid.error ?? 'arguments are not valid JSON',
  };
}

/**
 * Build the two-step tool round trip for one chat turn:
 *
 *   initial_reply -> done
 *   initial_reply -> execute_tool -> followup_reply -> done
 *
 * Only the first tool call of the initial reply is honored. Tool calls in
 * the follow-up reply are ignored.
 */
export function buildDialogueGraph(options: DialogueGraphOptions) {
  const { model, registry, systemPrompt, timeoutMs } = options;
  const logger = options.logger ?? new Logger('DialogueGraph');

  const complete = (messages: BaseMessage[]) =>
    model.invoke([new SystemMessage(systemPrompt), ...messages], {
      signal: AbortSignal.timeout(timeoutMs),
    });

  const initialReply = async (
    state: DialogueState,
  ): Promise<Partial<DialogueState>> => {
    const response = await complete(state.messages);
    const request = pickToolRequest(response, logger);

    if (!request) {
      const text = extractText(response.content);
      logger.debug('No tool requested, replying directly');
      return {
        messages: [new AIMessage(text || EMPTY_REPLY_FALLBACK)],
        phase: 'done',
      };
    }

    return {
      messages: [
        new AIMessage({
          content: keepToolUseBlock(response.content, request.callId),
          tool_calls: [
            {
              name: request.toolName,
              args: request.arguments,
              id: request.callId,
            },
          ],
        }),
      ],
      phase: 'tool_requested',
      toolRequest: request,
    };
  };

  const executeTool = async (
    state: DialogueState,
  ): Promise<Partial<DialogueState>> => {
    const request = state.toolRequest;
    if (!request) {
      return { phase: 'done' };
    }

    logger.log(`Executing tool ${request.toolName}`);
    const result = request.argumentError
      ? errorResult(
          'validation',
          `Invalid arguments for ${request.toolName}: ${request.argumentError}`,
        )
      : await registry.dispatch(request.toolName, request.arguments);
    logger.debug(`Tool ${request.toolName} finished with ${result.status}`);

    return {
      messages: [
        new ToolMessage({
          content: JSON.stringify(result),
          tool_call_id: request.callId,
          name: request.toolName,
        }),
      ],
      phase: 'awaiting_followup_reply',
      toolResult: result,
      actionTaken: isIdentityOperation(request.toolName)
        ? request.toolName
        : null,
    };
  };

  const followupReply = async (
    state: DialogueState,
  ): Promise<Partial<DialogueState>> => {
    const response = await complete(state.messages);
    let text = extractText(response.content);

    if (!text && state.toolRequest && state.toolResult) {
      logger.debug('Follow-up reply was empty, summarizing tool result');
      text = formatToolResultReply(
        state.toolRequest.toolName,
        state.toolResult,
      );
    }

    return {
      messages: [new AIMessage(text || EMPTY_REPLY_FALLBACK)],
      phase: 'done',
    };
  };

  const routeAfterInitialReply = (
    state: DialogueState,
  ): 'execute_tool' | 'done' =>
    state.phase === 'tool_requested' ? 'execute_tool' : 'done';

  return new StateGraph(DialogueStateAnnotation)
    .addNode('initial_reply', initialReply)
    .addNode('execute_tool', executeTool)
    .addNode('followup_reply', followupReply)
    .addEdge(START, 'initial_reply')
    .addConditionalEdges('initial_reply', routeAfterInitialReply, {
      execute_tool: 'execute_tool',
      done: END,
    })
    .addEdge('execute_tool', 'followup_reply')
    .addEdge('followup_reply', END)
    .compile();
}

export type DialogueGraph = ReturnType<typeof buildDialogueGraph>;
