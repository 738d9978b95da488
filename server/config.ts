/**
 * Worker configuration
 *
 * Validated once at startup from the environment (after dotenv has loaded
 * `.env`) and injected into every component. Nothing below reads
 * process.env on its own.
 */

import { z } from 'zod';
import { AGGREGATE_KINDS, WATCHED_TABLES } from '@shared/aggregate-types';

const csvList = (defaults: readonly string[]) =>
  z
    .string()
    .optional()
    .transform((value) =>
      value === undefined || value.trim() === ''
        ? [...defaults]
        : value
            .split(',')
            .map((item) => item.trim())
            .filter(Boolean)
    );

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  DATABASE_URL: z.string().min(1),
  NEO4J_URI: z.string().min(1),
  NEO4J_USER: z.string().min(1).default('neo4j'),
  NEO4J_PASSWORD: z.string().min(1),
  NEO4J_DATABASE: z.string().min(1).optional(),
  OUTBOX_BATCH_SIZE: z.coerce.number().int().positive().default(100),
  OUTBOX_MAX_ATTEMPTS: z.coerce.number().int().positive().default(5),
  OUTBOX_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(1000),
  OUTBOX_STALE_CLAIM_MS: z.coerce.number().int().nonnegative().default(300_000),
  OUTBOX_WATCHED_TABLES: csvList(WATCHED_TABLES),
  OUTBOX_WATCHED_AGGREGATE_TYPES: csvList(AGGREGATE_KINDS),
  HEALTH_PORT: z.coerce.number().int().positive().optional(),
  PIPELINE_NAME: z.string().min(1).default('customer_pipeline'),
});

export interface WorkerConfig {
  nodeEnv: 'development' | 'test' | 'production';
  pipelineName: string;
  databaseUrl: string;
  neo4j: {
    uri: string;
    user: string;
    password: string;
    database?: string;
  };
  outbox: {
    batchSize: number;
    maxAttempts: number;
    pollIntervalMs: number;
    staleClaimMs: number;
    watchedTables: string[];
    watchedAggregateTypes: string[];
  };
  healthPort?: number;
}

export class ConfigError extends Error {
  constructor(readonly fieldErrors: Record<string, string[] | undefined>) {
    super(
      `Invalid environment configuration: ${Object.entries(fieldErrors)
        .map(([field, errors]) => `${field} (${(errors ?? []).join('; ')})`)
        .join(', ')}`
    );
    this.name = 'ConfigError';
  }
}

/**
 * Parse worker configuration from an environment map.
 * @throws ConfigError listing every invalid field
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): WorkerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.flatten().fieldErrors);
  }

  const data = parsed.data;
  return {
    nodeEnv: data.NODE_ENV,
    pipelineName: data.PIPELINE_NAME,
    databaseUrl: data.DATABASE_URL,
    neo4j: {
      uri: data.NEO4J_URI,
      user: data.NEO4J_USER,
      password: data.NEO4J_PASSWORD,
      database: data.NEO4J_DATABASE,
    },
    outbox: {
      batchSize: data.OUTBOX_BATCH_SIZE,
      maxAttempts: data.OUTBOX_MAX_ATTEMPTS,
      pollIntervalMs: data.OUTBOX_POLL_INTERVAL_MS,
      staleClaimMs: data.OUTBOX_STALE_CLAIM_MS,
      watchedTables: data.OUTBOX_WATCHED_TABLES,
      watchedAggregateTypes: data.OUTBOX_WATCHED_AGGREGATE_TYPES,
    },
    healthPort: data.HEALTH_PORT,
  };
}
