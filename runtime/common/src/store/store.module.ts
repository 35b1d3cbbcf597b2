// SPDX-License-Identifier: Apache-2.0
// Copyright 2025 Provability-Fabric Contributors

import {
  Global,
  Inject,
  Injectable,
  Logger,
  Module,
  OnApplicationShutdown,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { MongoClient } from 'mongodb';
import { buildMongoUri, MongoEnv } from '../config/env';
import { describeError } from '../errors';
import { StoreHealthIndicator } from '../health/store.health';
import { MongoPackageStore } from './mongo-package-store';
import { PACKAGE_STORE } from './package-store';

@Injectable()
export class StoreLifecycle implements OnModuleInit, OnApplicationShutdown {
  private readonly logger = new Logger(StoreLifecycle.name);

  constructor(
    private readonly client: MongoClient,
    @Inject(PACKAGE_STORE) private readonly store: MongoPackageStore,
  ) {}

  async onModuleInit() {
    // The store may still be starting; the health check reports it meanwhile.
    try {
      await this.store.ensureIndexes();
    } catch (error) {
      this.logger.warn(`Could not create store indexes: ${describeError(error)}`);
    }
  }

  async onApplicationShutdown() {
    await this.client.close();
    this.logger.log('MongoDB connection closed');
  }
}

@Global()
@Module({
  providers: [
    {
      provide: MongoClient,
      inject: [ConfigService],
      useFactory: (config: ConfigService<MongoEnv, true>) =>
        new MongoClient(
          buildMongoUri({
            MONGO_HOST: config.get('MONGO_HOST', { infer: true }),
            MONGO_PORT: config.get('MONGO_PORT', { infer: true }),
            MONGO_USER: config.get('MONGO_USER', { infer: true }),
            MONGO_PASS: config.get('MONGO_PASS', { infer: true }),
          }),
          { serverSelectionTimeoutMS: config.get('MONGO_TIMEOUT_MS', { infer: true }) },
        ),
    },
    {
      provide: PACKAGE_STORE,
      inject: [MongoClient, ConfigService],
      useFactory: (client: MongoClient, config: ConfigService<MongoEnv, true>) =>
        new MongoPackageStore(
          client.db(config.get('MONGO_DB', { infer: true })),
          config.get('MONGO_COLLECTION', { infer: true }),
        ),
    },
    StoreLifecycle,
    StoreHealthIndicator,
  ],
  exports: [PACKAGE_STORE, StoreHealthIndicator],
})
export class StoreModule {}
