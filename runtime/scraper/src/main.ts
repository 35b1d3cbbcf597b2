// SPDX-License-Identifier: Apache-2.0
// Copyright 2025 Provability-Fabric Contributors

import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { ScraperEnv } from './config/scraper.config';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const configService = app.get<ConfigService<ScraperEnv, true>>(ConfigService);
  const logger = new Logger('FeedScraper');

  app.enableShutdownHooks();

  const port = configService.get('PORT', { infer: true });
  await app.listen(port);

  logger.log(`Feed scraper started on port ${port}`);
  logger.log(`Mirroring feed '${configService.get('FEED_ID', { infer: true })}' of organisation '${configService.get('ORG_NAME', { infer: true })}'`);
  logger.log(`Metrics endpoint: http://localhost:${port}/metrics`);
}

bootstrap().catch((error) => {
  console.error('Failed to start feed scraper:', error);
  process.exit(1);
});
