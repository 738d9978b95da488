/**
 * Tombstone Handler
 *
 * Runs when the loader finds no primary row. Only a DELETE event removes
 * the aggregate from the graph; any other op with a missing row is treated
 * as benign (an insert not yet visible, or a row already gone again) and
 * leaves the graph untouched.
 */

import type { AggregateKind, OutboxOp } from '@shared/aggregate-types';
import type { GraphWriter } from '../graph/graph-writer';
import { createLogger, type Logger } from '../logger';

export type TombstoneOutcome = 'deleted' | 'skipped';

export class TombstoneHandler {
  constructor(
    private readonly graph: GraphWriter,
    private readonly logger: Logger = createLogger('TombstoneHandler')
  ) {}

  async handle(kind: AggregateKind, aggregateId: string, op: OutboxOp): Promise<TombstoneOutcome> {
    if (op !== 'DELETE') {
      this.logger.warn(`${kind} ${aggregateId} not found for ${op} event, skipping`);
      return 'skipped';
    }

    await this.graph.detachDelete(kind, aggregateId);
    this.logger.info(`Deleted ${kind} ${aggregateId} from graph`);
    return 'deleted';
  }
}
