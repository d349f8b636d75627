#!/usr/bin/env node
import 'reflect-metadata';
import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { ScanClientModule } from './app.module';
import { AppConfig } from './config/configuration';
import { PinoLoggerService } from './shared/logging/pino-logger.service';
import { ScanSessionService } from './scanning/scan-session.service';
import { serializeScanJobEvent } from './scanning/scan-event.serializer';

/**
 * CLI: scan-client <image...>
 * Uploads each image and prints every job event as one JSON line on stdout.
 * Logs go to stderr.
 */
async function bootstrap(): Promise<number> {
  const files = process.argv.slice(2);
  if (files.length === 0) {
    process.stderr.write('Usage: scan-client <image...>\n');
    return 2;
  }

  const app = await NestFactory.createApplicationContext(ScanClientModule, {
    bufferLogs: true,
  });

  const configService = app.get(ConfigService<AppConfig>);
  const logger = app.get(PinoLoggerService);
  app.useLogger(logger);
  logger.setContext('Bootstrap');

  const controller = new AbortController();
  const shutdownHandler = (signal: string) => {
    logger.info({ signal }, 'Received shutdown signal, aborting running jobs...');
    controller.abort(new Error(`Received ${signal}`));
  };
  process.once('SIGTERM', () => shutdownHandler('SIGTERM'));
  process.once('SIGINT', () => shutdownHandler('SIGINT'));

  try {
    const images = await Promise.all(files.map((file) => readFile(file)));
    const session = app.get(ScanSessionService);

    logger.info(
      {
        files: files.length,
        baseUrl: configService.get('scanApi', { infer: true })?.baseUrl,
        maxConcurrentStreams: configService.get('session', { infer: true })?.maxConcurrentStreams,
      },
      'Starting scan session',
    );

    const outcomes = await session.scanAll(
      images,
      (index, event) => {
        const line = { file: basename(files[index] ?? ''), ...serializeScanJobEvent(event) };
        process.stdout.write(`${JSON.stringify(line)}\n`);
      },
      { signal: controller.signal },
    );

    const failed = outcomes.filter((outcome) => outcome.type === 'failed').length;
    logger.info({ jobs: outcomes.length, failed }, 'Scan session finished');
    return failed > 0 ? 1 : 0;
  } finally {
    await app.close();
  }
}

bootstrap()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error('Scan client failed:', error);
    process.exitCode = 1;
  });
