#!/usr/bin/env node
import 'reflect-metadata';
import { config } from 'dotenv';
config();

import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from '../app.module';
import { loadSettings } from '../config/settings';
import { runCommand } from './commands';

async function main(): Promise<number> {
  const settings = loadSettings();
  const app = await NestFactory.createApplicationContext(
    AppModule.forRoot(settings),
    {
    logger: settings.debug
      ? ['log', 'warn', 'error', 'debug']
      : ['warn', 'error'],
  });
  try {
    return await runCommand(app, process.argv.slice(2), {
      log: (line) => process.stdout.write(`${line}\n`),
      error: (line) => process.stderr.write(`${line}\n`),
    });
  } finally {
    await app.close();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    new Logger('Cli').error(
      error instanceof Error ? error.stack ?? error.message : String(error),
    );
    process.exitCode = 1;
  });
