import { Module } from '@nestjs/common';
import { IdentityModule } from '../identity/identity.module';
import { ToolRegistry } from './tool-registry';

@Module({
  imports: [IdentityModule],
  providers: [ToolRegistry],
  exports: [ToolRegistry],
})
export class ToolsModule {}
