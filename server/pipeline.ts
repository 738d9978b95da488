/**
 * Customer pipeline wiring
 *
 * Assembles loader → projector / tombstone handler → dispatcher → consumer
 * around whatever store, reader and graph implementations the caller hands
 * in. The process entry point passes Postgres and Neo4j; tests pass the
 * in-memory stand-ins from server/test.
 */

import { AggregateLoader } from './customers/aggregate-loader';
import type { CustomerReadSource } from './customers/customer-reader';
import type { GraphWriter } from './graph/graph-writer';
import { createLogger, type LogSink } from './logger';
import { OutboxConsumer, type OutboxConsumerOptions } from './outbox-consumer';
import type { OutboxStore } from './outbox/outbox-store';
import { CustomerGraphProjector } from './projections/customer-graph-projector';
import { EventDispatcher } from './projections/event-dispatcher';
import { TombstoneHandler } from './projections/tombstone-handler';

export interface PipelineDependencies {
  store: OutboxStore;
  readSource: CustomerReadSource;
  graph: GraphWriter;
  options: OutboxConsumerOptions;
  /** Prefixes every component name, e.g. `customer_pipeline:OutboxConsumer`. */
  pipelineName?: string;
  logSink?: LogSink;
}

export interface CustomerPipeline {
  consumer: OutboxConsumer;
  dispatcher: EventDispatcher;
}

export function createCustomerPipeline(deps: PipelineDependencies): CustomerPipeline {
  const logger = (component: string) =>
    createLogger(deps.pipelineName ? `${deps.pipelineName}:${component}` : component, deps.logSink);

  const dispatcher = new EventDispatcher(
    new AggregateLoader(deps.readSource),
    new CustomerGraphProjector(deps.graph, logger('GraphProjector')),
    new TombstoneHandler(deps.graph, logger('TombstoneHandler')),
    logger('EventDispatcher')
  );
  const consumer = new OutboxConsumer(
    deps.store,
    dispatcher,
    deps.options,
    logger('OutboxConsumer')
  );

  return { consumer, dispatcher };
}
