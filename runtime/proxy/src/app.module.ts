// SPDX-License-Identifier: Apache-2.0
// Copyright 2025 Provability-Fabric Contributors

import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { APP_FILTER } from '@nestjs/core';
import { StoreModule } from '../../common/src/store/store.module';
import { validateProxyEnv } from './config/proxy.config';
import { RegistryModule } from './registry/registry.module';
import { StoreErrorFilter } from './registry/store-error.filter';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env.local', '.env'],
      validate: validateProxyEnv,
    }),
    StoreModule,
    RegistryModule,
  ],
  providers: [{ provide: APP_FILTER, useClass: StoreErrorFilter }],
})
export class AppModule {}
