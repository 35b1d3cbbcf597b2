// SPDX-License-Identifier: Apache-2.0
// Copyright 2025 Provability-Fabric Contributors

import { Injectable } from '@nestjs/common';
import { Counter, Gauge, Histogram, Registry } from 'prom-client';

export type CycleOutcome = 'success' | 'partial' | 'failed' | 'cancelled';

@Injectable()
export class MetricsService {
  private readonly registry: Registry;

  // Counters
  private readonly syncCyclesTotal: Counter;
  private readonly packagesSyncedTotal: Counter;
  private readonly packageSyncFailures: Counter;

  // Histograms
  private readonly cycleDuration: Histogram;

  // Gauges
  private readonly lastSuccessfulSync: Gauge;
  private readonly packagesListed: Gauge;

  constructor() {
    this.registry = new Registry();

    this.syncCyclesTotal = new Counter({
      name: 'feed_mirror_sync_cycles_total',
      help: 'Total number of sync cycles by outcome',
      labelNames: ['outcome'],
      registers: [this.registry],
    });

    this.packagesSyncedTotal = new Counter({
      name: 'feed_mirror_packages_synced_total',
      help: 'Total number of package records written to the store',
      registers: [this.registry],
    });

    this.packageSyncFailures = new Counter({
      name: 'feed_mirror_package_sync_failures_total',
      help: 'Total number of packages skipped because their sync failed',
      labelNames: ['kind'],
      registers: [this.registry],
    });

    this.cycleDuration = new Histogram({
      name: 'feed_mirror_sync_cycle_duration_seconds',
      help: 'Sync cycle duration in seconds',
      buckets: [1, 5, 15, 30, 60, 120, 300, 600],
      registers: [this.registry],
    });

    this.lastSuccessfulSync = new Gauge({
      name: 'feed_mirror_last_successful_sync_timestamp_seconds',
      help: 'Unix time at which the last cycle without failures finished',
      registers: [this.registry],
    });

    this.packagesListed = new Gauge({
      name: 'feed_mirror_feed_packages',
      help: 'Number of packages listed in the feed during the last cycle',
      registers: [this.registry],
    });
  }

  recordCycle(outcome: CycleOutcome, durationMs: number, finishedAt: Date = new Date()) {
    this.syncCyclesTotal.inc({ outcome });
    this.cycleDuration.observe(durationMs / 1000);
    if (outcome === 'success') {
      this.lastSuccessfulSync.set(Math.floor(finishedAt.getTime() / 1000));
    }
  }

  recordPackagesListed(count: number) {
    this.packagesListed.set(count);
  }

  incrementPackagesSynced() {
    this.packagesSyncedTotal.inc();
  }

  incrementPackageFailures(kind: string) {
    this.packageSyncFailures.inc({ kind });
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }
}
