import 'reflect-metadata';
import { Logger, LogLevel } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { WorkerModule } from './worker.module';

const LOG_LEVELS: Record<string, LogLevel[]> = {
  fatal: ['fatal'],
  error: ['fatal', 'error'],
  warn: ['fatal', 'error', 'warn'],
  info: ['fatal', 'error', 'warn', 'log'],
  debug: ['fatal', 'error', 'warn', 'log', 'debug'],
  trace: ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'],
};

async function bootstrap(): Promise<void> {
  const logLevel = process.env.LOG_LEVEL ?? 'info';
  const app = await NestFactory.create(WorkerModule, {
    logger: LOG_LEVELS[logLevel] ?? LOG_LEVELS.info,
  });
  app.enableShutdownHooks();

  const configService = app.get(ConfigService);
  const port = configService.get<number>('PORT', 3001);
  const host = '0.0.0.0';
  const logger = new Logger('WorkerBootstrap');

  await app.listen(port, host);
  logger.log(`Worker listening on ${host}:${port}`);
}

bootstrap().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : 'Unknown error';
  new Logger('WorkerBootstrap').fatal(`Worker failed to start: ${message}`);
  process.exit(1);
});
