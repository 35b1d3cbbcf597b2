// SPDX-License-Identifier: Apache-2.0
// Copyright 2025 Provability-Fabric Contributors

import { Controller, Get } from '@nestjs/common';
import { SchedulerStatus, SyncScheduler } from './sync.scheduler';

@Controller('sync')
export class SyncController {
  constructor(private readonly syncScheduler: SyncScheduler) {}

  @Get('status')
  getStatus(): SchedulerStatus {
    return this.syncScheduler.getStatus();
  }
}
