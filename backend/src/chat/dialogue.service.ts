import { Injectable, Logger } from '@nestjs/common';
import { HumanMessage } from '@langchain/core/messages';
import {
  describeError,
  isSupportBotError,
  UpstreamError,
  ValidationError,
} from '../common/errors';
import type { IdentityOperation } from '../identity/identity.types';
import { ToolRegistry } from '../tools/tool-registry';
import { buildDialogueGraph, type DialogueGraph } from './dialogue.graph';
import { LlmProviderService } from './llm-provider.service';
import { SUPPORT_SYSTEM_PROMPT } from './prompts/support.prompt';
import { createChatMessage } from './types/chat-message';
import type { ChatMessage } from './types/chat-message';
import {
  extractText,
  isAiMessage,
  toLangChainMessages,
} from './utils/message-utils';

export interface DialogueOutcome {
  replyText: string;
  actionTaken: IdentityOperation | null;
  history: ChatMessage[];
}

/**
 * Runs one chat turn through the dialogue graph.
 */
@Injectable()
export class DialogueService {
  private readonly logger = new Logger(DialogueService.name);
  private graph: DialogueGraph | null = null;

  constructor(
    private readonly llmProvider: LlmProviderService,
    private readonly toolRegistry: ToolRegistry,
  ) {}

  isReady(): boolean {
    return this.llmProvider.isReady();
  }

  getStatus(): { provider: string; model: string; ready: boolean } {
    return {
      provider: this.llmProvider.getProvider(),
      model: this.llmProvider.getModelName(),
      ready: this.isReady(),
    };
  }

  /**
   * Answer `userMessage` given the prior conversation. The returned history
   * is a new array; `history` itself is left untouched.
   */
  async handle(
    userMessage: string,
    history: readonly ChatMessage[] = [],
  ): Promise<DialogueOutcome> {
    const text = userMessage.trim();
    if (!text) {
      throw new ValidationError('Message must not be empty');
    }

    const graph = this.getGraph();
    const userEntry = createChatMessage('user', text);
    this.logger.log(
      `Handling chat turn (${history.length} prior messages, ${text.length} chars)`,
    );

    const finalState = await graph
      .invoke({
        messages: [...toLangChainMessages(history), new HumanMessage(text)],
      })
      .catch((error: unknown) => {
        throw this.toUpstreamError(error);
      });

    const last = finalState.messages.at(-1);
    const replyText = isAiMessage(last) ? extractText(last.content) : '';
    const actionTaken = finalState.actionTaken;

    const appended: ChatMessage[] = [userEntry];
    if (finalState.toolResult) {
      appended.push(
        createChatMessage('tool', JSON.stringify(finalState.toolResult)),
      );
    }
    appended.push(createChatMessage('assistant', replyText));

    this.logger.log(
      `Chat turn finished (action: ${actionTaken ?? 'none'}, ${replyText.length} chars)`,
    );

    return {
      replyText,
      actionTaken,
      history: [...history, ...appended],
    };
  }

  private toUpstreamError(error: unknown): Error {
    if (isSupportBotError(error)) {
      return error;
    }
    const message = `LLM request failed: ${describeError(error)}`;
    this.logger.error(message);
    return new UpstreamError(message, undefined, { cause: error });
  }

  private getGraph(): DialogueGraph {
    if (!this.graph) {
      const model = this.llmProvider.getToolCallingModel(
        this.toolRegistry.toLangChainTools(),
      );
      this.graph = buildDialogueGraph({
        model,
        registry: this.toolRegistry,
        systemPrompt: SUPPORT_SYSTEM_PROMPT,
        timeoutMs: this.llmProvider.getTimeoutMs(),
        logger: this.logger,
      });
    }
    return this.graph;
  }
}
