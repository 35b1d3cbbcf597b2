// SPDX-License-Identifier: Apache-2.0
// Copyright 2025 Provability-Fabric Contributors

import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { ProxyEnv } from './config/proxy.config';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const configService = app.get<ConfigService<ProxyEnv, true>>(ConfigService);
  const logger = new Logger('RegistryProxy');

  app.enableShutdownHooks();

  const port = configService.get('PORT', { infer: true });
  await app.listen(port);

  logger.log(`Registry proxy started on port ${port}`);
  logger.log(`Serving database '${configService.get('MONGO_DB', { infer: true })}'`);
}

bootstrap().catch((error) => {
  console.error('Failed to start registry proxy:', error);
  process.exit(1);
});
