// SPDX-License-Identifier: Apache-2.0
// Copyright 2025 Provability-Fabric Contributors

import { Inject, Injectable } from '@nestjs/common';
import { HealthCheckError, HealthIndicator, HealthIndicatorResult } from '@nestjs/terminus';
import { describeError } from '../errors';
import { PACKAGE_STORE, PackageStore } from '../store/package-store';

@Injectable()
export class StoreHealthIndicator extends HealthIndicator {
  constructor(@Inject(PACKAGE_STORE) private readonly store: PackageStore) {
    super();
  }

  async isHealthy(key: string): Promise<HealthIndicatorResult> {
    try {
      await this.store.ping();
      return this.getStatus(key, true);
    } catch (error) {
      throw new HealthCheckError(
        'Metadata store is unreachable',
        this.getStatus(key, false, { message: describeError(error) }),
      );
    }
  }
}
