import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import type {
  AIMessage,
  AIMessageChunk,
  BaseMessage,
} from '@langchain/core/messages';
import type { StructuredToolInterface } from '@langchain/core/tools';
import { ChatAnthropic } from '@langchain/anthropic';
import { ChatGoogleGenerativeAI } from '@langchain/google-genai';
import { ChatGroq } from '@langchain/groq';
import { ChatOllama } from '@langchain/ollama';
import { ChatOpenAI } from '@langchain/openai';
import { ConfigurationError } from '../common/errors';
import { AI_PROVIDERS, type AIProvider } from '../config/environment';

/**
 * The slice of a tool-bound chat model the orchestrator needs.
 */
export interface ToolCallingModel {
  invoke(
    input: BaseMessage[],
    options?: { signal?: AbortSignal },
  ): Promise<AIMessage | AIMessageChunk>;
}

/**
 * Creates the chat model for the configured provider.
 *
 * Supports Groq (default), OpenAI, Anthropic, Gemini and a local Ollama.
 * The model is built lazily and cached; a missing API key surfaces as a
 * ConfigurationError on first use.
 */
@Injectable()
export class LlmProviderService {
  private readonly logger = new Logger(LlmProviderService.name);
  private model: BaseChatModel | null = null;

  constructor(private readonly configService: ConfigService) {
    this.logger.log(`LLM provider configured: ${this.getProvider()}`);
  }

  getProvider(): AIProvider {
    const provider = this.configService.get<string>('AI_PROVIDER', 'groq');
    const match = AI_PROVIDERS.find((candidate) => candidate === provider);
    if (match) {
      return match;
    }
    this.logger.warn(`Invalid AI_PROVIDER "${provider}", falling back to groq`);
    return 'groq';
  }

  getModelName(): string {
    switch (this.getProvider()) {
      case 'openai':
        return this.configService.get<string>('OPENAI_MODEL', 'gpt-4o-mini');
      case 'anthropic':
        return this.configService.get<string>(
          'ANTHROPIC_MODEL',
          'claude-3-5-sonnet-20241022',
        );
      case 'gemini':
        return this.configService.get<string>('GEMINI_MODEL', 'gemini-1.5-flash');
      case 'ollama':
        return this.configService.get<string>('OLLAMA_MODEL', 'llama3.1');
      case 'groq':
        return this.configService.get<string>(
          'GROQ_MODEL',
          'llama-3.3-70b-versatile',
        );
    }
  }

  getTimeoutMs(): number {
    return this.configService.get<number>('LLM_TIMEOUT_MS', 30000);
  }

  /**
   * Bind the given tools to the chat model.
   */
  getToolCallingModel(tools: StructuredToolInterface[]): ToolCallingModel {
    const model = this.getModel();
    if (!model.bindTools) {
      throw new ConfigurationError(
        `Provider ${this.getProvider()} does not support tool calling`,
      );
    }
    return model.bindTools(tools);
  }

  isReady(): boolean {
    try {
      this.getModel();
      return true;
    } catch {
      return false;
    }
  }

  getModel(): BaseChatModel {
    if (this.model) {
      return this.model;
    }

    const provider = this.getProvider();
    const model = this.getModelName();
    const temperature = this.configService.get<number>('LLM_TEMPERATURE', 0.3);
    const maxTokens = this.configService.get<number>('LLM_MAX_TOKENS', 500);

    switch (provider) {
      case 'openai': {
        const apiKey = this.requireKey('OPENAI_API_KEY', provider);
        this.model = new ChatOpenAI({ apiKey, model, temperature, maxTokens });
        break;
      }

      case 'anthropic': {
        const apiKey = this.requireKey('ANTHROPIC_API_KEY', provider);
        this.model = new ChatAnthropic({
          apiKey,
          model,
          temperature,
          maxTokens,
        });
        break;
      }

      case 'gemini': {
        const apiKey = this.requireKey('GOOGLE_GENERATIVE_AI_API_KEY', provider);
        this.model = new ChatGoogleGenerativeAI({
          apiKey,
          model,
          temperature,
          maxOutputTokens: maxTokens,
        });
        break;
      }

      case 'ollama': {
        const baseUrl = this.configService.get<string>(
          'OLLAMA_BASE_URL',
          'http://127.0.0.1:11434',
        );
        this.logger.debug(`Using Ollama at ${baseUrl}`);
        this.model = new ChatOllama({
          baseUrl,
          model,
          temperature,
          numPredict: maxTokens,
        });
        break;
      }

      case 'groq': {
        const apiKey = this.requireKey('GROQ_API_KEY', provider);
        this.model = new ChatGroq({ apiKey, model, temperature, maxTokens });
        break;
      }
    }

    this.logger.log(`Using ${provider} model: ${model}`);
    return this.model;
  }

  private requireKey(key: string, provider: AIProvider): string {
    const value = this.configService.get<string>(key);
    if (!value) {
      throw new ConfigurationError(
        `${key} is required when AI_PROVIDER=${provider}`,
      );
    }
    return value;
  }
}
