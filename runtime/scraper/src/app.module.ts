// SPDX-License-Identifier: Apache-2.0
// Copyright 2025 Provability-Fabric Contributors

import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { TerminusModule } from '@nestjs/terminus';
import { HealthController } from '../../common/src/health/health.controller';
import { StoreModule } from '../../common/src/store/store.module';
import { validateScraperEnv } from './config/scraper.config';
import { MetricsModule } from './metrics/metrics.module';
import { SyncModule } from './sync/sync.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env.local', '.env'],
      validate: validateScraperEnv,
    }),
    ScheduleModule.forRoot(),
    TerminusModule,
    StoreModule,
    MetricsModule,
    SyncModule,
  ],
  controllers: [HealthController],
})
export class AppModule {}
