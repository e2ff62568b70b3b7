import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { ChatGroq } from '@langchain/groq';
import { ChatOllama } from '@langchain/ollama';
import { ChatOpenAI } from '@langchain/openai';
import { ConfigurationError } from '../common/errors';
import { LlmProviderService } from './llm-provider.service';

describe('LlmProviderService', () => {
  async function createService(
    config: Record<string, string | number>,
  ): Promise<LlmProviderService> {
    const configService: Partial<ConfigService> = {
      get: jest.fn((key: string, defaultValue?: unknown) => config[key] ?? defaultValue),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        LlmProviderService,
        { provide: ConfigService, useValue: configService },
      ],
    }).compile();

    return module.get<LlmProviderService>(LlmProviderService);
  }

  describe('getProvider', () => {
    it('should default to groq', async () => {
      const service = await createService({});

      expect(service.getProvider()).toBe('groq');
      expect(service.getModelName()).toBe('llama-3.3-70b-versatile');
    });

    it('should fall back to groq for an unknown provider', async () => {
      const service = await createService({ AI_PROVIDER: 'mystery' });

      expect(service.getProvider()).toBe('groq');
    });

    it('should use the configured model name', async () => {
      const service = await createService({
        AI_PROVIDER: 'openai',
        OPENAI_MODEL: 'gpt-4o',
      });

      expect(service.getModelName()).toBe('gpt-4o');
    });
  });

  describe('getModel', () => {
    it('should build a Groq model when a key is set', async () => {
      const service = await createService({ GROQ_API_KEY: 'test-key' });

      expect(service.getModel()).toBeInstanceOf(ChatGroq);
      expect(service.isReady()).toBe(true);
    });

    it('should build an OpenAI model for AI_PROVIDER=openai', async () => {
      const service = await createService({
        AI_PROVIDER: 'openai',
        OPENAI_API_KEY: 'test-key',
      });

      expect(service.getModel()).toBeInstanceOf(ChatOpenAI);
    });

    it('should build an Ollama model without an API key', async () => {
      const service = await createService({ AI_PROVIDER: 'ollama' });

      expect(service.getModel()).toBeInstanceOf(ChatOllama);
    });

    it('should cache the model', async () => {
      const service = await createService({ GROQ_API_KEY: 'test-key' });

      expect(service.getModel()).toBe(service.getModel());
    });

    it('should throw ConfigurationError when the key is missing', async () => {
      const service = await createService({ AI_PROVIDER: 'anthropic' });

      expect(() => service.getModel()).toThrow(ConfigurationError);
      expect(() => service.getModel()).toThrow(
        'ANTHROPIC_API_KEY is required when AI_PROVIDER=anthropic',
      );
      expect(service.isReady()).toBe(false);
    });
  });

  describe('getTimeoutMs', () => {
    it('should default to 30 seconds', async () => {
      const service = await createService({});

      expect(service.getTimeoutMs()).toBe(30000);
    });
  });
});
