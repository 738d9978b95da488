/**
 * Event Dispatcher
 *
 * Routes one claimed outbox event to its handler:
 *
 *   unknown aggregate_type or op   → ignored (acked, never retried)
 *   row present                    → loader → projector   → projected
 *   row absent                     → tombstone handler    → deleted | skipped
 *
 * The current state of the row decides, not the op: a DELETE whose row has
 * been re-inserted is projected, an UPDATE whose row is gone is skipped.
 * Thrown errors propagate to the consumer, which records them on the event.
 */

import {
  parseAggregateKind,
  parseOutboxOp,
  type OutboxEvent,
} from '@shared/aggregate-types';
import type { AggregateLoader } from '../customers/aggregate-loader';
import { createLogger, type Logger } from '../logger';
import type { CustomerGraphProjector } from './customer-graph-projector';
import type { TombstoneHandler } from './tombstone-handler';

export const EVENT_OUTCOMES = ['projected', 'deleted', 'skipped', 'ignored'] as const;
export type EventOutcome = (typeof EVENT_OUTCOMES)[number];

/** Anything that can turn an outbox event into an outcome. */
export interface EventHandler {
  dispatch(event: OutboxEvent): Promise<EventOutcome>;
}

export class EventDispatcher implements EventHandler {
  constructor(
    private readonly loader: Pick<AggregateLoader, 'load'>,
    private readonly projector: Pick<CustomerGraphProjector, 'project'>,
    private readonly tombstones: Pick<TombstoneHandler, 'handle'>,
    private readonly logger: Logger = createLogger('EventDispatcher')
  ) {}

  async dispatch(event: OutboxEvent): Promise<EventOutcome> {
    const kind = parseAggregateKind(event.aggregateType);
    if (!kind) {
      this.logger.warn(`Ignoring event ${event.id}: unknown aggregate type "${event.aggregateType}"`);
      return 'ignored';
    }

    const op = parseOutboxOp(event.op);
    if (!op) {
      this.logger.warn(`Ignoring event ${event.id}: unknown op "${event.op}"`);
      return 'ignored';
    }

    const result = await this.loader.load(kind, event.aggregateId);
    if (result.status === 'not_found') {
      return this.tombstones.handle(kind, event.aggregateId, op);
    }

    await this.projector.project(result.snapshot);
    return 'projected';
  }
}
