import { Test, TestingModule } from '@nestjs/testing';
import { HttpException, HttpStatus } from '@nestjs/common';
import {
  ConfigurationError,
  UpstreamError,
  ValidationError,
} from '../common/errors';
import { ChatController } from './chat.controller';
import { DialogueService } from './dialogue.service';

describe('ChatController', () => {
  let controller: ChatController;
  let mockDialogueService: Partial<DialogueService>;

  beforeEach(async () => {
    mockDialogueService = {
      isReady: jest.fn().mockReturnValue(true),
      handle: jest.fn().mockResolvedValue({
        replyText: 'I triggered an identity refresh for Ram.',
        actionTaken: 'trigger_identity_refresh',
        history: [],
      }),
    };

    const module: TestingModule = await Test.createTestingModule({
      controllers: [ChatController],
      providers: [{ provide: DialogueService, useValue: mockDialogueService }],
    }).compile();

    controller = module.get<ChatController>(ChatController);
  });

  async function statusOf(promise: Promise<unknown>): Promise<number> {
    const error: unknown = await promise.catch((e: unknown) => e);
    if (!(error instanceof HttpException)) {
      throw new Error('Expected an HttpException');
    }
    return error.getStatus();
  }

  it('should return the reply and the action taken', async () => {
    const result = await controller.chat({
      message: 'Ram cannot access the portal',
      user_id: 'demo_user',
    });

    expect(result).toEqual({
      response: 'I triggered an identity refresh for Ram.',
      action_taken: 'trigger_identity_refresh',
    });
    expect(mockDialogueService.handle).toHaveBeenCalledWith(
      'Ram cannot access the portal',
      [],
    );
  });

  it('should pass prior history to the dialogue service', async () => {
    await controller.chat({
      message: 'Thanks',
      history: [
        { role: 'user', content: 'Hi', timestamp: '2025-01-10T10:00:00.000Z' },
        { role: 'assistant', content: 'Hello!' },
      ],
    });

    expect(mockDialogueService.handle).toHaveBeenCalledWith('Thanks', [
      { role: 'user', content: 'Hi', timestamp: '2025-01-10T10:00:00.000Z' },
      { role: 'assistant', content: 'Hello!', timestamp: expect.any(String) },
    ]);
  });

  it('should answer 400 for an empty message', async () => {
    await expect(statusOf(controller.chat({ message: '  ' }))).resolves.toBe(
      HttpStatus.BAD_REQUEST,
    );
    expect(mockDialogueService.handle).not.toHaveBeenCalled();
  });

  it('should answer 400 for a malformed body', async () => {
    await expect(statusOf(controller.chat({ text: 'hello' }))).resolves.toBe(
      HttpStatus.BAD_REQUEST,
    );
    await expect(
      statusOf(controller.chat({ message: 'hi', history: [{ role: 'system' }] })),
    ).resolves.toBe(HttpStatus.BAD_REQUEST);
  });

  it('should answer 503 when the LLM is not configured', async () => {
    mockDialogueService.isReady = jest.fn().mockReturnValue(false);

    await expect(controller.chat({ message: 'Hello' })).rejects.toThrow(
      new HttpException(
        'AI service is not properly configured. Check API keys.',
        HttpStatus.SERVICE_UNAVAILABLE,
      ),
    );
  });

  it.each([
    [new ValidationError('Message must not be empty'), HttpStatus.BAD_REQUEST],
    [new ConfigurationError('GROQ_API_KEY is required'), HttpStatus.SERVICE_UNAVAILABLE],
    [new UpstreamError('LLM request failed: timeout'), HttpStatus.BAD_GATEWAY],
    [new Error('unexpected'), HttpStatus.INTERNAL_SERVER_ERROR],
  ])('should map %s to HTTP %i', async (error, status) => {
    mockDialogueService.handle = jest.fn().mockRejectedValue(error);

    await expect(statusOf(controller.chat({ message: 'Hello' }))).resolves.toBe(
      status,
    );
  });
});
