// SPDX-License-Identifier: Apache-2.0
// Copyright 2025 Provability-Fabric Contributors

import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ScraperEnv } from '../config/scraper.config';
import { CATALOG_CLIENT } from './catalog-client';
import { DevOpsCatalogClient } from './devops.client';

@Module({
  providers: [
    {
      provide: CATALOG_CLIENT,
      inject: [ConfigService],
      useFactory: (configService: ConfigService<ScraperEnv, true>) =>
        new DevOpsCatalogClient({
          organization: configService.get('ORG_NAME', { infer: true }),
          feedId: configService.get('FEED_ID', { infer: true }),
          pat: configService.get('PAT', { infer: true }),
          timeoutMs: configService.get('FETCH_TIMEOUT_MS', { infer: true }),
          retries: configService.get('FETCH_RETRIES', { infer: true }),
        }),
    },
  ],
  exports: [CATALOG_CLIENT],
})
export class DevOpsModule {}
