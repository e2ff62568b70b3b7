import 'reflect-metadata';
import { Logger, type LogLevel } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { describeError } from './common/errors';
import { environmentSchema, parseOrigins } from './config/environment';

const DEFAULT_LOG_LEVELS: LogLevel[] = ['log', 'warn', 'error', 'fatal'];
const DEBUG_LOG_LEVELS: LogLevel[] = [...DEFAULT_LOG_LEVELS, 'debug', 'verbose'];

async function bootstrap(): Promise<void> {
  // Log levels are fixed before ConfigModule loads, so DEBUG is read directly.
  const debug = environmentSchema.shape.DEBUG.parse(process.env.DEBUG);
  const app = await NestFactory.create(AppModule, {
    logger: debug ? DEBUG_LOG_LEVELS : DEFAULT_LOG_LEVELS,
  });
  const configService = app.get(ConfigService);

  app.enableCors({
    origin: parseOrigins(configService.get<string>('CORS_ORIGINS', '')),
    methods: ['GET', 'POST', 'DELETE'],
    credentials: true,
  });

  const port = configService.get<number>('PORT', 3000);
  await app.listen(port);
  Logger.log(`Support bot listening on port ${port}`, 'Bootstrap');
}

bootstrap().catch((error: unknown) => {
  Logger.error(`Failed to start: ${describeError(error)}`, 'Bootstrap');
  process.exit(1);
});
