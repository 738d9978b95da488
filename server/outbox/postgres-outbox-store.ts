/**
 * Postgres outbox store
 *
 * Claiming is a single transaction: `SELECT ... FOR UPDATE SKIP LOCKED`
 * picks the eligible rows (locked rows belong to another claimer and are
 * skipped, not waited on), then the same transaction flips them to
 * `processing` and bumps `attempts`. The commit happens before any event
 * is projected, so a crash afterwards leaves rows in `processing`; those
 * are picked up again once `claimed_at` is older than `staleClaimMs`.
 * A stale row with no attempts left is moved to `failed` in the same
 * transaction so it does not sit in `processing` forever.
 */

import { and, asc, eq, gte, inArray, lt, or, sql, type SQL } from 'drizzle-orm';
import type { OutboxEvent } from '@shared/aggregate-types';
import { outboxEvents, type OutboxEventRow } from '@shared/outbox-schema';
import type { SourceDb } from '../storage';
import {
  CLAIM_EXPIRED_ERROR,
  compareByCreation,
  truncateErrorText,
  type ClaimOptions,
  type OutboxStore,
} from './outbox-store';

function toOutboxEvent(row: OutboxEventRow): OutboxEvent {
  return {
    id: row.id,
    tableName: row.tableName,
    aggregateType: row.aggregateType,
    aggregateId: row.aggregateId,
    op: row.op,
    attempts: row.attempts,
    status: row.status,
    createdAt: row.createdAt,
  };
}

export class PostgresOutboxStore implements OutboxStore {
  constructor(
    private readonly db: SourceDb,
    private readonly now: () => Date = () => new Date()
  ) {}

  async claimPending(options: ClaimOptions): Promise<OutboxEvent[]> {
    if (
      options.limit <= 0 ||
      options.watchedTables.length === 0 ||
      options.watchedAggregateTypes.length === 0
    ) {
      return [];
    }

    const claimedAt = this.now();
    const watched = and(
      inArray(outboxEvents.tableName, [...options.watchedTables]),
      inArray(
        sql`lower(${outboxEvents.aggregateType})`,
        options.watchedAggregateTypes.map((type) => type.toLowerCase())
      )
    );
    const staleClaim =
      options.staleClaimMs > 0
        ? and(
            eq(outboxEvents.status, 'processing'),
            lt(outboxEvents.claimedAt, new Date(claimedAt.getTime() - options.staleClaimMs))
          )
        : undefined;
    const claimable: Array<SQL | undefined> = [inArray(outboxEvents.status, ['pending', 'failed'])];
    if (staleClaim) {
      claimable.push(staleClaim);
    }

    return this.db.transaction(async (tx) => {
      if (staleClaim) {
        await tx
          .update(outboxEvents)
          .set({ status: 'failed', lastError: CLAIM_EXPIRED_ERROR, claimedAt: null })
          .where(and(staleClaim, gte(outboxEvents.attempts, options.maxAttempts), watched));
      }

      const eligible = await tx
        .select({ id: outboxEvents.id })
        .from(outboxEvents)
        .where(and(lt(outboxEvents.attempts, options.maxAttempts), watched, or(...claimable)))
        .orderBy(asc(outboxEvents.createdAt), asc(outboxEvents.id))
        .limit(options.limit)
        .for('update', { skipLocked: true });

      if (eligible.length === 0) {
        return [];
      }

      const claimed = await tx
        .update(outboxEvents)
        .set({
          status: 'processing',
          attempts: sql`${outboxEvents.attempts} + 1`,
          claimedAt,
        })
        .where(
          inArray(
            outboxEvents.id,
            eligible.map((row) => row.id)
          )
        )
        .returning();

      // RETURNING does not preserve the SELECT ordering.
      return claimed.map(toOutboxEvent).sort(compareByCreation);
    });
  }

  async ack(eventId: number): Promise<void> {
    await this.db
      .update(outboxEvents)
      .set({ status: 'processed', processedAt: this.now(), lastError: null, claimedAt: null })
      .where(eq(outboxEvents.id, eventId));
  }

  async nack(eventId: number, errorText: string): Promise<void> {
    await this.db
      .update(outboxEvents)
      .set({ status: 'failed', lastError: truncateErrorText(errorText), claimedAt: null })
      .where(eq(outboxEvents.id, eventId));
  }

  async release(eventIds: readonly number[]): Promise<void> {
    if (eventIds.length === 0) return;

    await this.db
      .update(outboxEvents)
      .set({
        status: 'pending',
        attempts: sql`greatest(${outboxEvents.attempts} - 1, 0)`,
        claimedAt: null,
      })
      .where(and(inArray(outboxEvents.id, [...eventIds]), eq(outboxEvents.status, 'processing')));
  }
}
