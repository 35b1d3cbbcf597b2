// SPDX-License-Identifier: Apache-2.0
// Copyright 2025 Provability-Fabric Contributors

import { z } from 'zod';
import { MongoEnvSchema, parseEnv, positiveInt } from '../../../common/src/config/env';

export const ProxyEnvSchema = MongoEnvSchema.extend({
  PORT: positiveInt(8080),
});

export type ProxyEnv = z.infer<typeof ProxyEnvSchema>;

export function validateProxyEnv(config: Record<string, unknown>): ProxyEnv {
  return parseEnv(ProxyEnvSchema, config);
}
