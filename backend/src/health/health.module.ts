import { Module } from '@nestjs/common';
import { ChatModule } from '../chat/chat.module';
import { IdentityModule } from '../identity/identity.module';
import { HealthController } from './health.controller';

@Module({
  imports: [ChatModule, IdentityModule],
  controllers: [HealthController],
})
export class HealthModule {}
