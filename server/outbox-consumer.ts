/**
 * Outbox Consumer
 *
 * Drains the outbox table into the graph projection. Each iteration claims
 * up to `batchSize` eligible events and handles them one after another in
 * creation order, which keeps events of the same aggregate in causal order.
 *
 * Every handled outcome is acked. A thrown error is nacked with its message
 * and the event stays claimable until it has used `maxAttempts` claims. One
 * event's failure never stops the rest of the batch.
 *
 * Shutdown: stop() lets the in-flight event finish, hands the unprocessed
 * rest of the batch back to the store and resolves once the loop has exited.
 */

import type { OutboxEvent } from '@shared/aggregate-types';
import { createLogger, errorMessage, type Logger } from './logger';
import type { OutboxStore } from './outbox/outbox-store';
import type { EventHandler, EventOutcome } from './projections/event-dispatcher';

export interface OutboxConsumerOptions {
  batchSize: number;
  maxAttempts: number;
  pollIntervalMs: number;
  staleClaimMs: number;
  watchedTables: readonly string[];
  watchedAggregateTypes: readonly string[];
}

export interface OutboxConsumerStats {
  isRunning: boolean;
  batchesClaimed: number;
  /** Events acked with any outcome. */
  eventsProcessed: number;
  /** Events nacked after a thrown error. */
  eventsFailed: number;
  /** Nacked events that had used their last attempt. */
  eventsExhausted: number;
  lastProcessedAt: Date | null;
  outcomes: Record<EventOutcome, number>;
  aggregateStats: Record<string, { processed: number; failed: number }>;
}

function emptyOutcomes(): Record<EventOutcome, number> {
  return { projected: 0, deleted: 0, skipped: 0, ignored: 0 };
}

export class OutboxConsumer {
  private running = false;
  /** Set by stop(); the loop checks it between events and before sleeping. */
  private stopping = false;
  private loop: Promise<void> | null = null;
  private wake: (() => void) | null = null;
  private stats: OutboxConsumerStats = {
    isRunning: false,
    batchesClaimed: 0,
    eventsProcessed: 0,
    eventsFailed: 0,
    eventsExhausted: 0,
    lastProcessedAt: null,
    outcomes: emptyOutcomes(),
    aggregateStats: {},
  };

  constructor(
    private readonly store: OutboxStore,
    private readonly handler: EventHandler,
    private readonly options: OutboxConsumerOptions,
    private readonly logger: Logger = createLogger('OutboxConsumer')
  ) {}

  /** Begin polling in the background; stop() waits for the loop to exit. */
  start(): void {
    if (this.running) {
      this.logger.info('Already running');
      return;
    }

    this.running = true;
    this.stopping = false;
    this.stats.isRunning = true;
    this.logger.info('Running', {
      batchSize: this.options.batchSize,
      maxAttempts: this.options.maxAttempts,
      pollIntervalMs: this.options.pollIntervalMs,
    });
    this.loop = this.runLoop();
  }

  async stop(): Promise<void> {
    this.stopping = true;
    this.wake?.();

    if (this.loop) {
      await this.loop;
    }

    this.loop = null;
    if (this.running) {
      this.logger.info('Stopped');
    }
    this.running = false;
    this.stats.isRunning = false;
  }

  isRunning(): boolean {
    return this.running;
  }

  getStats(): OutboxConsumerStats {
    return {
      ...this.stats,
      outcomes: { ...this.stats.outcomes },
      aggregateStats: Object.fromEntries(
        Object.entries(this.stats.aggregateStats).map(([type, counts]) => [type, { ...counts }])
      ),
    };
  }

  /**
   * Claim and handle one batch.
   * @returns number of events claimed; 0 when there was nothing to do
   * @throws when the claim itself fails
   */
  async runOnce(): Promise<number> {
    const batch = await this.store.claimPending({
      limit: this.options.batchSize,
      maxAttempts: this.options.maxAttempts,
      watchedTables: this.options.watchedTables,
      watchedAggregateTypes: this.options.watchedAggregateTypes,
      staleClaimMs: this.options.staleClaimMs,
    });
    if (batch.length === 0) return 0;

    this.stats.batchesClaimed++;

    for (const [index, event] of batch.entries()) {
      if (this.stopping) {
        await this.release(batch.slice(index));
        break;
      }
      await this.processEvent(event);
    }

    return batch.length;
  }

  // ============================================================================
  // Loop
  // ============================================================================

  private async runLoop(): Promise<void> {
    while (!this.stopping) {
      let claimed = 0;
      try {
        claimed = await this.runOnce();
      } catch (err) {
        this.logger.error('Failed to claim outbox events', { error: errorMessage(err) });
      }

      if (claimed === 0 && !this.stopping) {
        await this.sleep(this.options.pollIntervalMs);
      }
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.wake = null;
        resolve();
      }, ms);
      this.wake = () => {
        clearTimeout(timer);
        this.wake = null;
        resolve();
      };
    });
  }

  // ============================================================================
  // Per-event handling
  // ============================================================================

  private async processEvent(event: OutboxEvent): Promise<void> {
    let outcome: EventOutcome;
    try {
      outcome = await this.handler.dispatch(event);
    } catch (err) {
      await this.recordFailure(event, errorMessage(err));
      return;
    }
    await this.recordSuccess(event, outcome);
  }

  private async recordSuccess(event: OutboxEvent, outcome: EventOutcome): Promise<void> {
    try {
      await this.store.ack(event.id);
    } catch (err) {
      // Row stays `processing` until the stale-claim timeout makes it claimable again.
      this.logger.error(`Failed to ack event ${event.id}`, { error: errorMessage(err) });
      return;
    }

    this.stats.eventsProcessed++;
    this.stats.outcomes[outcome]++;
    this.stats.lastProcessedAt = new Date();
    this.aggregateCounts(event.aggregateType).processed++;
  }

  private async recordFailure(event: OutboxEvent, message: string): Promise<void> {
    const exhausted = event.attempts >= this.options.maxAttempts;
    this.logger.error(`Event ${event.id} failed`, {
      aggregateType: event.aggregateType,
      aggregateId: event.aggregateId,
      attempt: event.attempts,
      error: message,
    });

    try {
      await this.store.nack(event.id, message);
    } catch (err) {
      this.logger.error(`Failed to nack event ${event.id}`, { error: errorMessage(err) });
      return;
    }

    this.stats.eventsFailed++;
    this.aggregateCounts(event.aggregateType).failed++;

    if (exhausted) {
      this.stats.eventsExhausted++;
      this.logger.error(
        `Event ${event.id} exhausted ${this.options.maxAttempts} attempts and will not be retried`,
        { aggregateType: event.aggregateType, aggregateId: event.aggregateId }
      );
    }
  }

  private async release(events: readonly OutboxEvent[]): Promise<void> {
    const ids = events.map((event) => event.id);
    try {
      await this.store.release(ids);
      this.logger.info(`Released ${ids.length} unprocessed events`);
    } catch (err) {
      this.logger.error('Failed to release unprocessed events', {
        ids,
        error: errorMessage(err),
      });
    }
  }

  private aggregateCounts(aggregateType: string): { processed: number; failed: number } {
    const key = aggregateType.trim().toLowerCase();
    let counts = this.stats.aggregateStats[key];
    if (!counts) {
      counts = { processed: 0, failed: 0 };
      this.stats.aggregateStats[key] = counts;
    }
    return counts;
  }
}
