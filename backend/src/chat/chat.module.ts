import { Module } from '@nestjs/common';
import { ToolsModule } from '../tools/tools.module';
import { ChatController } from './chat.controller';
import { DialogueService } from './dialogue.service';
import { LlmProviderService } from './llm-provider.service';

@Module({
  imports: [ToolsModule],
  controllers: [ChatController],
  providers: [LlmProviderService, DialogueService],
  exports: [DialogueService],
})
export class ChatModule {}
