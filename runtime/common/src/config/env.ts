// SPDX-License-Identifier: Apache-2.0
// Copyright 2025 Provability-Fabric Contributors

import { z } from 'zod';

const blankAsMissing = (value: unknown) => (value === '' ? undefined : value);

export const requiredString = (name: string) =>
  z.string({ required_error: `${name} is required` }).min(1, `${name} is required`);

export const positiveInt = (fallback: number) =>
  z.preprocess(blankAsMissing, z.coerce.number().int().positive().default(fallback));

/** Set to anything except '', '0' or 'false' to enable. */
export const flag = () =>
  z
    .string()
    .optional()
    .transform((value) => value !== undefined && !['', '0', 'false'].includes(value.toLowerCase()));

export const MongoEnvSchema = z.object({
  MONGO_HOST: requiredString('MongoDB host'),
  MONGO_PORT: positiveInt(27017),
  MONGO_USER: requiredString('MongoDB username'),
  MONGO_PASS: requiredString('MongoDB password'),
  MONGO_DB: requiredString('MongoDB database'),
  MONGO_COLLECTION: z.preprocess(blankAsMissing, z.string().default('packages')),
  MONGO_TIMEOUT_MS: positiveInt(5000),
});

export type MongoEnv = z.infer<typeof MongoEnvSchema>;

/**
 * Validates raw environment values. Used as the `validate` hook of
 * ConfigModule, so a bad value stops the process before anything connects.
 */
export function parseEnv<Output>(
  schema: z.ZodType<Output, z.ZodTypeDef, unknown>,
  config: Record<string, unknown>,
): Output {
  const result = schema.safeParse(config);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${problems}`);
  }
  return result.data;
}

export function buildMongoUri(env: Pick<MongoEnv, 'MONGO_HOST' | 'MONGO_PORT' | 'MONGO_USER' | 'MONGO_PASS'>): string {
  const credentials = `${encodeURIComponent(env.MONGO_USER)}:${encodeURIComponent(env.MONGO_PASS)}`;
  return `mongodb://${credentials}@${env.MONGO_HOST}:${env.MONGO_PORT}/?authSource=admin`;
}
