#!/usr/bin/env node
// CLI: 전투 요청 JSON 파일 하나를 돌려서 결과를 stdout 으로

import 'reflect-metadata';
import { readFile } from 'fs/promises';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module.js';
import { BattleRunnerService } from './battles/battle-runner.service.js';
import { GameError } from './common/errors/game-errors.js';

const logger = new Logger('Main');

async function bootstrap(): Promise<void> {
  const file = process.argv[2];
  if (!file) {
    logger.error('Usage: pet-arena <battle.json>');
    process.exitCode = 1;
    return;
  }

  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: ['error', 'warn', 'log'],
  });
  try {
    const request: unknown = JSON.parse(await readFile(file, 'utf-8'));
    const report = app.get(BattleRunnerService).run(request);
    process.stdout.write(`${JSON.stringify(report, null, 2)}\n`);
  } finally {
    await app.close();
  }
}

bootstrap().catch((err: unknown) => {
  if (err instanceof GameError) {
    logger.error(`${err.code}: ${err.message}`, JSON.stringify(err.details ?? {}));
  } else {
    logger.error(err instanceof Error ? err.stack : String(err));
  }
  process.exitCode = 1;
});
