import {
  Body,
  Controller,
  HttpCode,
  HttpException,
  HttpStatus,
  Logger,
  Post,
} from '@nestjs/common';
import {
  ConfigurationError,
  describeError,
  UpstreamError,
  ValidationError,
} from '../common/errors';
import { DialogueService } from './dialogue.service';
import { chatRequestSchema } from './dto/chat-request.dto';
import type {
  ChatHistoryEntryDto,
  ParsedChatRequest,
} from './dto/chat-request.dto';
import type { ChatResponseDto } from './dto/chat-response.dto';
import { createChatMessage, type ChatMessage } from './types/chat-message';

/**
 * Chat endpoint used by the web front end.
 *
 * Endpoints:
 * - POST /chat: run one chat turn and return the assistant reply
 */
@Controller('chat')
export class ChatController {
  private readonly logger = new Logger(ChatController.name);

  constructor(private readonly dialogueService: DialogueService) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  async chat(@Body() body: unknown): Promise<ChatResponseDto> {
    const request = this.parseRequest(body);
    const userSuffix = request.user_id ? `, user: ${request.user_id}` : '';
    this.logger.log(
      `Chat request received with ${request.history.length} history messages${userSuffix}`,
    );

    if (!request.message.trim()) {
      throw new HttpException('Message must not be empty', HttpStatus.BAD_REQUEST);
    }

    if (!this.dialogueService.isReady()) {
      throw new HttpException(
        'AI service is not properly configured. Check API keys.',
        HttpStatus.SERVICE_UNAVAILABLE,
      );
    }

    try {
      const outcome = await this.dialogueService.handle(
        request.message,
        request.history.map(toChatMessage),
      );
      return {
        response: outcome.replyText,
        action_taken: outcome.actionTaken,
      };
    } catch (error) {
      throw this.toHttpException(error);
    }
  }

  private parseRequest(body: unknown): ParsedChatRequest {
    const parsed = chatRequestSchema.safeParse(body ?? {});
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) =>
        issue.path.length > 0
          ? `${issue.path.join('.')}: ${issue.message}`
          : issue.message,
      );
      throw new HttpException(
        `Invalid chat request: ${issues.join('; ')}`,
        HttpStatus.BAD_REQUEST,
      );
    }
    return parsed.data;
  }

  private toHttpException(error: unknown): HttpException {
    if (error instanceof ValidationError) {
      return new HttpException(error.message, HttpStatus.BAD_REQUEST);
    }
    if (error instanceof ConfigurationError) {
      this.logger.warn(`Chat unavailable: ${error.message}`);
      return new HttpException(error.message, HttpStatus.SERVICE_UNAVAILABLE);
    }
    if (error instanceof UpstreamError) {
      this.logger.error(`Chat upstream failure: ${error.message}`);
      return new HttpException(error.message, HttpStatus.BAD_GATEWAY);
    }
    this.logger.error(`Chat error: ${describeError(error)}`);
    return new HttpException(
      'Chat processing failed',
      HttpStatus.INTERNAL_SERVER_ERROR,
    );
  }
}

function toChatMessage(entry: ChatHistoryEntryDto): ChatMessage {
  if (entry.timestamp) {
    return Object.freeze({
      role: entry.role,
      content: entry.content,
      timestamp: entry.timestamp,
    });
  }
  return createChatMessage(entry.role, entry.content);
}
