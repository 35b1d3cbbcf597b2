// SPDX-License-Identifier: Apache-2.0
// Copyright 2025 Provability-Fabric Contributors

import { Controller, Get, NotFoundException, Param, Query } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ProxyEnv } from '../config/proxy.config';
import { RegistryService } from './registry.service';
import { AllPackagesResponse, PackageDocument, SearchPage } from './registry.types';

@Controller()
export class RegistryController {
  constructor(
    private readonly registryService: RegistryService,
    private readonly configService: ConfigService<ProxyEnv, true>,
  ) {}

  @Get()
  index(): { db_name: string } {
    return { db_name: this.configService.get('MONGO_DB', { infer: true }) };
  }

  @Get('-/all')
  async listAll(): Promise<AllPackagesResponse> {
    const response: AllPackagesResponse = { _updated: Math.floor(Date.now() / 1000) };
    for await (const summary of this.registryService.listAll()) {
      response[summary.name] = summary;
    }
    return response;
  }

  @Get('-/v1/search')
  search(
    @Query('text') text?: string,
    @Query('from') from?: string,
    @Query('size') size?: string,
  ): Promise<SearchPage> {
    return this.registryService.search({
      text: typeof text === 'string' ? text : '',
      from: parseIntParam(from),
      size: parseIntParam(size),
    });
  }

  @Get(':scope/:name')
  getScopedPackage(
    @Param('scope') scope: string,
    @Param('name') name: string,
  ): Promise<PackageDocument> {
    if (!scope.startsWith('@')) {
      throw notFound();
    }
    return this.getPackage(`${scope}/${name}`);
  }

  @Get(':name')
  async getPackage(@Param('name') name: string): Promise<PackageDocument> {
    const document = await this.registryService.getPackage(name);
    if (!document) {
      throw notFound();
    }
    return document;
  }
}

function notFound(): NotFoundException {
  return new NotFoundException({ error: 'Not found' });
}

function parseIntParam(value: unknown): number | undefined {
  if (typeof value !== 'string' || !/^-?\d+$/.test(value.trim())) {
    return undefined;
  }
  return Number.parseInt(value, 10);
}
