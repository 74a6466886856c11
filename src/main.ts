import 'reflect-metadata';
import { config } from 'dotenv';
config();

import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { loadSettings } from './config/settings';

async function bootstrap(): Promise<void> {
  const settings = loadSettings();
  const app = await NestFactory.create(AppModule.forRoot(settings), {
    logger: settings.debug
      ? ['log', 'warn', 'error', 'debug']
      : ['log', 'warn', 'error'],
  });
  configureApp(app, settings);
  await app.listen(settings.port);
  new Logger('Bootstrap').log(
    `listening: port=${settings.port} prefix=${settings.apiPrefix}`,
  );
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    error instanceof Error ? error.stack ?? error.message : String(error),
  );
  process.exit(1);
});
