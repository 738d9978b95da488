/**
 * Service Health Checker
 * Probes the worker's backing services and the consumer loop.
 */

import { sql, type SQL } from 'drizzle-orm';
import { errorMessage } from './logger';
import type { OutboxConsumer } from './outbox-consumer';

export interface ServiceHealthCheck {
  service: string;
  status: 'up' | 'down' | 'warning';
  latencyMs?: number;
  error?: string;
  details?: Record<string, unknown>;
}

/** Probes slower than this report `warning` instead of `up`. */
export const SLOW_PROBE_MS = 1000;

export interface HealthDependencies {
  db: { execute(query: SQL): PromiseLike<unknown> };
  graph: { verifyConnectivity(): Promise<void> };
  consumer: Pick<OutboxConsumer, 'isRunning' | 'getStats'>;
  now?: () => number;
}

export async function checkAllServices(deps: HealthDependencies): Promise<ServiceHealthCheck[]> {
  const now = deps.now ?? Date.now;
  const checks: ServiceHealthCheck[] = [];

  // 1. PostgreSQL (outbox + system-of-record)
  checks.push(await probe('PostgreSQL', now, () => deps.db.execute(sql`SELECT 1`)));

  // 2. Neo4j (graph projection)
  checks.push(await probe('Neo4j', now, () => deps.graph.verifyConnectivity()));

  // 3. Outbox consumer loop
  checks.push(checkConsumer(deps.consumer));

  return checks;
}

/** Healthy unless at least one check is down; warnings still count as healthy. */
export function isHealthy(checks: readonly ServiceHealthCheck[]): boolean {
  return checks.every((check) => check.status !== 'down');
}

async function probe(
  service: string,
  now: () => number,
  run: () => PromiseLike<unknown>
): Promise<ServiceHealthCheck> {
  const startTime = now();
  try {
    await run();
    const latency = now() - startTime;
    return {
      service,
      status: latency < SLOW_PROBE_MS ? 'up' : 'warning',
      latencyMs: latency,
    };
  } catch (error) {
    return {
      service,
      status: 'down',
      latencyMs: now() - startTime,
      error: errorMessage(error),
    };
  }
}

function checkConsumer(consumer: HealthDependencies['consumer']): ServiceHealthCheck {
  const stats = consumer.getStats();
  return {
    service: 'Outbox Consumer',
    status: consumer.isRunning() ? 'up' : 'down',
    details: {
      eventsProcessed: stats.eventsProcessed,
      eventsFailed: stats.eventsFailed,
      lastProcessedAt: stats.lastProcessedAt?.toISOString() ?? null,
    },
  };
}
