import { Controller, Get } from '@nestjs/common';

export const SERVICE_NAME = 'Access Support Bot';
export const SERVICE_VERSION = '1.0.0';

@Controller()
export class AppController {
  @Get()
  getInfo(): { status: 'active'; service: string; version: string } {
    return {
      status: 'active',
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
    };
  }
}
