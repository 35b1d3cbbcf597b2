// SPDX-License-Identifier: Apache-2.0
// Copyright 2025 Provability-Fabric Contributors

import { z } from 'zod';
import { flag, MongoEnvSchema, parseEnv, positiveInt, requiredString } from '../../../common/src/config/env';

export const ScraperEnvSchema = MongoEnvSchema.extend({
  ORG_NAME: requiredString('DevOps organisation name'),
  FEED_ID: requiredString('DevOps feed name'),
  PAT: requiredString('DevOps personal access token'),
  FALLBACK_AUTHOR: requiredString('Fallback author name'),
  /** Seconds between the starts of two sync cycles */
  REFRESH: positiveInt(900),
  SYNC_CONCURRENCY: positiveInt(4),
  FETCH_TIMEOUT_MS: positiveInt(10000),
  FETCH_RETRIES: positiveInt(3),
  WIPE_DB: flag(),
  PORT: positiveInt(8081),
});

export type ScraperEnv = z.infer<typeof ScraperEnvSchema>;

export function validateScraperEnv(config: Record<string, unknown>): ScraperEnv {
  return parseEnv(ScraperEnvSchema, config);
}
