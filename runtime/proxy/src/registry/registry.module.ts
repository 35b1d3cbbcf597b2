// SPDX-License-Identifier: Apache-2.0
// Copyright 2025 Provability-Fabric Contributors

import { Module } from '@nestjs/common';
import { TerminusModule } from '@nestjs/terminus';
import { HealthController } from '../../../common/src/health/health.controller';
import { RegistryController } from './registry.controller';
import { RegistryService } from './registry.service';

// Health is listed first so /-/health wins over the /:name route.
@Module({
  imports: [TerminusModule],
  controllers: [HealthController, RegistryController],
  providers: [RegistryService],
})
export class RegistryModule {}
