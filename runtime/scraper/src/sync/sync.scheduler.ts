// SPDX-License-Identifier: Apache-2.0
// Copyright 2025 Provability-Fabric Contributors

import { BeforeApplicationShutdown, Inject, Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';
import { describeError } from '../../../common/src/errors';
import { PACKAGE_STORE, PackageStore } from '../../../common/src/store/package-store';
import { ScraperEnv } from '../config/scraper.config';
import { SyncCycleReport, SyncService } from './sync.service';

export const SYNC_TIMEOUT_NAME = 'feed-sync';

export interface SchedulerStatus {
  running: boolean;
  nextRunAt: Date | null;
  lastReport: SyncCycleReport | null;
}

/**
 * Drives sync cycles back to back: the next cycle starts `REFRESH` seconds
 * after the previous one started, or as soon as it finishes when it overran.
 * Only one cycle runs at a time.
 */
@Injectable()
export class SyncScheduler implements OnApplicationBootstrap, BeforeApplicationShutdown {
  private readonly logger = new Logger(SyncScheduler.name);
  private readonly intervalMs: number;
  private readonly wipeOnStart: boolean;
  private readonly shutdown = new AbortController();

  private nextRunAt: Date | null = null;
  private inFlight: Promise<void> | null = null;
  private lastReport: SyncCycleReport | null = null;

  constructor(
    private readonly configService: ConfigService<ScraperEnv, true>,
    private readonly syncService: SyncService,
    private readonly schedulerRegistry: SchedulerRegistry,
    @Inject(PACKAGE_STORE) private readonly store: PackageStore,
  ) {
    this.intervalMs = this.configService.get('REFRESH', { infer: true }) * 1000;
    this.wipeOnStart = this.configService.get('WIPE_DB', { infer: true });
  }

  async onApplicationBootstrap() {
    if (this.wipeOnStart) {
      // Runs once; a failure here stops startup rather than being retried.
      const deleted = await this.store.deleteAll();
      this.logger.warn(`WIPE_DB is set: removed ${deleted} packages from the store`);
    }

    this.logger.log(`Sync scheduled every ${this.intervalMs / 1000}s`);
    this.scheduleNext(0);
  }

  // Runs before any onApplicationShutdown hook, so the store is still open
  // while the running cycle winds down.
  async beforeApplicationShutdown() {
    this.shutdown.abort();
    this.clearTimer();
    this.nextRunAt = null;

    if (this.inFlight) {
      this.logger.log('Waiting for the running sync cycle to stop');
      await this.inFlight;
    }
  }

  getStatus(): SchedulerStatus {
    return {
      running: this.inFlight !== null,
      nextRunAt: this.nextRunAt,
      lastReport: this.lastReport,
    };
  }

  private scheduleNext(delayMs: number) {
    if (this.shutdown.signal.aborted) {
      return;
    }

    this.nextRunAt = new Date(Date.now() + delayMs);
    const timer = setTimeout(() => {
      this.inFlight = this.runCycle();
    }, delayMs);
    this.schedulerRegistry.addTimeout(SYNC_TIMEOUT_NAME, timer);
  }

  private async runCycle(): Promise<void> {
    this.clearTimer();
    this.nextRunAt = null;
    const startedAt = Date.now();

    try {
      this.lastReport = await this.syncService.runSyncCycle(this.shutdown.signal);
    } catch (error) {
      this.logger.error(`Sync cycle failed, retrying at the next interval: ${describeError(error)}`);
    } finally {
      this.inFlight = null;
    }

    const elapsed = Date.now() - startedAt;
    this.scheduleNext(Math.max(0, this.intervalMs - elapsed));
  }

  private clearTimer() {
    if (this.schedulerRegistry.doesExist('timeout', SYNC_TIMEOUT_NAME)) {
      this.schedulerRegistry.deleteTimeout(SYNC_TIMEOUT_NAME);
    }
  }
}
