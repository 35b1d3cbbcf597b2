// SPDX-License-Identifier: Apache-2.0
// Copyright 2025 Provability-Fabric Contributors

import { Module } from '@nestjs/common';
import { DevOpsModule } from '../devops/devops.module';
import { MetricsModule } from '../metrics/metrics.module';
import { SyncController } from './sync.controller';
import { SyncScheduler } from './sync.scheduler';
import { SyncService } from './sync.service';

@Module({
  imports: [DevOpsModule, MetricsModule],
  controllers: [SyncController],
  providers: [SyncService, SyncScheduler],
  exports: [SyncService, SyncScheduler],
})
export class SyncModule {}
