import { Controller, Get } from '@nestjs/common';
import { DialogueService } from '../chat/dialogue.service';
import { IdentityApiClient } from '../identity/identity-api.client';

export interface HealthStatus {
  status: 'ok';
  llmClient: 'active' | 'inactive';
  provider: string;
  identityApi: 'configured' | 'unconfigured';
  mcpEndpoint: string;
  timestamp: string;
}

@Controller('health')
export class HealthController {
  constructor(
    private readonly dialogueService: DialogueService,
    private readonly identityClient: IdentityApiClient,
  ) {}

  @Get()
  check(): HealthStatus {
    const llm = this.dialogueService.getStatus();
    return {
      status: 'ok',
      llmClient: llm.ready ? 'active' : 'inactive',
      provider: llm.provider,
      identityApi: this.identityClient.isConfigured()
        ? 'configured'
        : 'unconfigured',
      mcpEndpoint: '/mcp',
      timestamp: new Date().toISOString(),
    };
  }
}
