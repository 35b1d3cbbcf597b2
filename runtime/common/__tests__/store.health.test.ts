// SPDX-License-Identifier: Apache-2.0
// Copyright 2025 Provability-Fabric Contributors

import { HealthCheckError } from '@nestjs/terminus';
import { StoreUnavailableError } from '../src/errors';
import { StoreHealthIndicator } from '../src/health/store.health';
import { MemoryPackageStore } from '../src/store/memory-package-store';

class UnreachableStore extends MemoryPackageStore {
  async ping(): Promise<void> {
    throw new StoreUnavailableError('connection refused');
  }
}

describe('StoreHealthIndicator', () => {
  it('should report the store up while it answers a ping', async () => {
    const indicator = new StoreHealthIndicator(new MemoryPackageStore());

    await expect(indicator.isHealthy('store')).resolves.toEqual({ store: { status: 'up' } });
  });

  it('should fail the check when the store is unreachable', async () => {
    const indicator = new StoreHealthIndicator(new UnreachableStore());

    const error = await indicator.isHealthy('store').catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(HealthCheckError);
    expect(error).toMatchObject({
      message: 'Metadata store is unreachable',
      causes: { store: { status: 'down', message: 'connection refused' } },
    });
  });
});
