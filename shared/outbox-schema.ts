import { bigserial, index, integer, pgTable, text, timestamp } from 'drizzle-orm/pg-core';
import { OUTBOX_STATUSES } from './aggregate-types';

/**
 * Outbox Events Table
 * Append-only change log written by the customer service alongside every
 * mutating write to a watched table. The worker claims, projects and
 * acknowledges rows; it never inserts them.
 */
export const outboxEvents = pgTable(
  'outbox_events',
  {
    id: bigserial('id', { mode: 'number' }).primaryKey(),
    tableName: text('table_name').notNull(),
    aggregateType: text('aggregate_type').notNull(),
    aggregateId: text('aggregate_id').notNull(),
    op: text('op').notNull(),
    status: text('status', { enum: OUTBOX_STATUSES }).notNull().default('pending'),
    attempts: integer('attempts').notNull().default(0),
    lastError: text('last_error'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    claimedAt: timestamp('claimed_at', { withTimezone: true }),
    processedAt: timestamp('processed_at', { withTimezone: true }),
  },
  (table) => [
    index('idx_outbox_events_claim').on(table.status, table.createdAt, table.id),
    index('idx_outbox_events_aggregate').on(table.aggregateType, table.aggregateId),
  ]
);

export type OutboxEventRow = typeof outboxEvents.$inferSelect;
