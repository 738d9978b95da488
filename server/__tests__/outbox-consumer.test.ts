import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import type { OutboxEvent } from '@shared/aggregate-types';
import { OutboxConsumer } from '../outbox-consumer';
import type { OutboxStore } from '../outbox/outbox-store';
import type { EventHandler, EventOutcome } from '../projections/event-dispatcher';
import { InMemoryOutboxStore } from '../test/in-memory-outbox-store';
import { TEST_CONSUMER_OPTIONS, createSpyLogger, type SpyLogger } from '../test/fixtures';

type Dispatch = EventHandler['dispatch'];

function handlerFrom(
  fn: (event: OutboxEvent) => Promise<EventOutcome>
): { dispatch: Mock<Dispatch> } {
  return { dispatch: vi.fn<Dispatch>(fn) };
}

describe('OutboxConsumer', () => {
  let store: InMemoryOutboxStore;
  let logger: SpyLogger;

  beforeEach(() => {
    store = new InMemoryOutboxStore();
    logger = createSpyLogger();
  });

  // --------------------------------------------------------------------------
  // Outcomes
  // --------------------------------------------------------------------------

  describe('runOnce', () => {
    it('should ack every handled outcome and count it', async () => {
      store.append({ aggregateType: 'b2c_customer', aggregateId: 'c-1' });
      store.append({ aggregateType: 'household', aggregateId: 'hh-1', op: 'DELETE' });
      store.append({ aggregateType: 'b2c_customer', aggregateId: 'c-2' });
      const outcomes: Record<string, EventOutcome> = {
        'c-1': 'projected',
        'hh-1': 'deleted',
        'c-2': 'skipped',
      };
      const handler = handlerFrom(async (event) => outcomes[event.aggregateId] ?? 'ignored');
      const consumer = new OutboxConsumer(store, handler, TEST_CONSUMER_OPTIONS, logger);

      const claimed = await consumer.runOnce();

      expect(claimed).toBe(3);
      expect(store.countByStatus('processed')).toBe(3);
      const stats = consumer.getStats();
      expect(stats.batchesClaimed).toBe(1);
      expect(stats.eventsProcessed).toBe(3);
      expect(stats.eventsFailed).toBe(0);
      expect(stats.outcomes).toEqual({ projected: 1, deleted: 1, skipped: 1, ignored: 0 });
      expect(stats.aggregateStats).toEqual({
        b2c_customer: { processed: 2, failed: 0 },
        household: { processed: 1, failed: 0 },
      });
      expect(stats.lastProcessedAt).toBeInstanceOf(Date);
    });

    it('should ack ignored events so they are never retried', async () => {
      const row = store.append({
        aggregateType: 'b2c_customer',
        aggregateId: 'c-1',
        op: 'TRUNCATE',
      });
      const consumer = new OutboxConsumer(
        store,
        handlerFrom(async () => 'ignored'),
        TEST_CONSUMER_OPTIONS,
        logger
      );

      await consumer.runOnce();

      expect(store.get(row.id)?.status).toBe('processed');
      expect(await consumer.runOnce()).toBe(0);
    });

    it('should return 0 and not count a batch when nothing is claimable', async () => {
      const consumer = new OutboxConsumer(
        store,
        handlerFrom(async () => 'projected'),
        TEST_CONSUMER_OPTIONS,
        logger
      );

      expect(await consumer.runOnce()).toBe(0);
      expect(consumer.getStats().batchesClaimed).toBe(0);
    });

    it('should handle events in creation order', async () => {
      store.append({
        aggregateType: 'b2c_customer',
        aggregateId: 'late',
        createdAt: new Date('2026-03-01T10:00:02Z'),
      });
      store.append({
        aggregateType: 'b2c_customer',
        aggregateId: 'early',
        createdAt: new Date('2026-03-01T10:00:01Z'),
      });
      const seen: string[] = [];
      const consumer = new OutboxConsumer(
        store,
        handlerFrom(async (event) => {
          seen.push(event.aggregateId);
          return 'projected';
        }),
        TEST_CONSUMER_OPTIONS,
        logger
      );

      await consumer.runOnce();

      expect(seen).toEqual(['early', 'late']);
    });
  });

  // --------------------------------------------------------------------------
  // Failures
  // --------------------------------------------------------------------------

  describe('failures', () => {
    it('should nack a failing event with its message and keep processing the batch', async () => {
      const first = store.append({ aggregateType: 'b2c_customer', aggregateId: 'c-1' });
      const failing = store.append({ aggregateType: 'b2c_customer', aggregateId: 'c-2' });
      const last = store.append({ aggregateType: 'b2c_customer', aggregateId: 'c-3' });
      const consumer = new OutboxConsumer(
        store,
        handlerFrom(async (event) => {
          if (event.aggregateId === 'c-2') throw new Error('graph unavailable');
          return 'projected';
        }),
        TEST_CONSUMER_OPTIONS,
        logger
      );

      await consumer.runOnce();

      expect(store.get(first.id)?.status).toBe('processed');
      expect(store.get(failing.id)).toMatchObject({
        status: 'failed',
        attempts: 1,
        lastError: 'graph unavailable',
      });
      expect(store.get(last.id)?.status).toBe('processed');
      expect(consumer.getStats().eventsFailed).toBe(1);
      expect(consumer.getStats().aggregateStats.b2c_customer).toEqual({ processed: 2, failed: 1 });
      expect(logger.error).toHaveBeenCalledWith(`Event ${failing.id} failed`, {
        aggregateType: 'b2c_customer',
        aggregateId: 'c-2',
        attempt: 1,
        error: 'graph unavailable',
      });
    });

    it('should retry a failed event until its attempts are used up', async () => {
      const row = store.append({ aggregateType: 'b2c_customer', aggregateId: 'c-1' });
      const handler = handlerFrom(async () => {
        throw new Error('still broken');
      });
      const consumer = new OutboxConsumer(store, handler, TEST_CONSUMER_OPTIONS, logger);

      expect(await consumer.runOnce()).toBe(1);
      expect(await consumer.runOnce()).toBe(1);
      expect(await consumer.runOnce()).toBe(1);
      expect(await consumer.runOnce()).toBe(0);

      expect(handler.dispatch).toHaveBeenCalledTimes(3);
      expect(store.get(row.id)).toMatchObject({ status: 'failed', attempts: 3 });
      const stats = consumer.getStats();
      expect(stats.eventsFailed).toBe(3);
      expect(stats.eventsExhausted).toBe(1);
      expect(logger.error).toHaveBeenLastCalledWith(
        `Event ${row.id} exhausted 3 attempts and will not be retried`,
        { aggregateType: 'b2c_customer', aggregateId: 'c-1' }
      );
    });

    it('should record non-Error throws as their string form', async () => {
      const row = store.append({ aggregateType: 'household', aggregateId: 'hh-1' });
      const consumer = new OutboxConsumer(
        store,
        handlerFrom(() => Promise.reject('plain failure')),
        TEST_CONSUMER_OPTIONS,
        logger
      );

      await consumer.runOnce();

      expect(store.get(row.id)?.lastError).toBe('plain failure');
    });

    it('should log an ack failure without counting the event', async () => {
      const failingStore: OutboxStore = {
        claimPending: store.claimPending.bind(store),
        ack: vi.fn().mockRejectedValue(new Error('connection reset')),
        nack: store.nack.bind(store),
        release: store.release.bind(store),
      };
      const row = store.append({ aggregateType: 'b2c_customer', aggregateId: 'c-1' });
      const consumer = new OutboxConsumer(
        failingStore,
        handlerFrom(async () => 'projected'),
        TEST_CONSUMER_OPTIONS,
        logger
      );

      await consumer.runOnce();

      expect(store.get(row.id)?.status).toBe('processing');
      expect(consumer.getStats().eventsProcessed).toBe(0);
      expect(logger.error).toHaveBeenCalledWith(`Failed to ack event ${row.id}`, {
        error: 'connection reset',
      });
    });
  });

  // --------------------------------------------------------------------------
  // Loop lifecycle
  // --------------------------------------------------------------------------

  describe('start / stop', () => {
    it('should drain the outbox in the background until stopped', async () => {
      store.append({ aggregateType: 'b2c_customer', aggregateId: 'c-1' });
      store.append({ aggregateType: 'b2b_customer', aggregateId: 'b-1' });
      const consumer = new OutboxConsumer(
        store,
        handlerFrom(async () => 'projected'),
        TEST_CONSUMER_OPTIONS,
        logger
      );

      consumer.start();
      expect(consumer.isRunning()).toBe(true);
      await vi.waitFor(() => expect(store.countByStatus('processed')).toBe(2));
      await consumer.stop();

      expect(consumer.isRunning()).toBe(false);
      expect(consumer.getStats().isRunning).toBe(false);
    });

    it('should finish the in-flight event and release the rest of the batch on stop', async () => {
      const rows = [
        store.append({ aggregateType: 'b2c_customer', aggregateId: 'c-1' }),
        store.append({ aggregateType: 'b2c_customer', aggregateId: 'c-2' }),
        store.append({ aggregateType: 'b2c_customer', aggregateId: 'c-3' }),
      ];
      let stopping: Promise<void> | undefined;
      const consumer: OutboxConsumer = new OutboxConsumer(
        store,
        handlerFrom(async () => {
          stopping ??= consumer.stop();
          return 'projected';
        }),
        TEST_CONSUMER_OPTIONS,
        logger
      );

      consumer.start();
      await vi.waitFor(() => expect(stopping).toBeDefined());
      await stopping;

      expect(store.get(rows[0].id)?.status).toBe('processed');
      expect(store.get(rows[1].id)).toMatchObject({ status: 'pending', attempts: 0 });
      expect(store.get(rows[2].id)).toMatchObject({ status: 'pending', attempts: 0 });
      expect(logger.info).toHaveBeenCalledWith('Released 2 unprocessed events');
    });

    it('should log a claim error and keep polling', async () => {
      const claimPending = vi
        .fn<OutboxStore['claimPending']>()
        .mockRejectedValueOnce(new Error('connection refused'))
        .mockResolvedValue([]);
      const flakyStore: OutboxStore = {
        claimPending,
        ack: vi.fn(),
        nack: vi.fn(),
        release: vi.fn(),
      };
      const consumer = new OutboxConsumer(
        flakyStore,
        handlerFrom(async () => 'projected'),
        TEST_CONSUMER_OPTIONS,
        logger
      );

      consumer.start();
      await vi.waitFor(() => expect(claimPending.mock.calls.length).toBeGreaterThanOrEqual(2));
      await consumer.stop();

      expect(logger.error).toHaveBeenCalledWith('Failed to claim outbox events', {
        error: 'connection refused',
      });
    });

    it('should pass the claim options through to the store', async () => {
      const claimPending = vi.fn<OutboxStore['claimPending']>().mockResolvedValue([]);
      const consumer = new OutboxConsumer(
        { claimPending, ack: vi.fn(), nack: vi.fn(), release: vi.fn() },
        handlerFrom(async () => 'projected'),
        { ...TEST_CONSUMER_OPTIONS, batchSize: 25, staleClaimMs: 60_000 },
        logger
      );

      await consumer.runOnce();

      expect(claimPending).toHaveBeenCalledWith({
        limit: 25,
        maxAttempts: TEST_CONSUMER_OPTIONS.maxAttempts,
        watchedTables: TEST_CONSUMER_OPTIONS.watchedTables,
        watchedAggregateTypes: TEST_CONSUMER_OPTIONS.watchedAggregateTypes,
        staleClaimMs: 60_000,
      });
    });

    it('should resolve stop() when the consumer never started', async () => {
      const consumer = new OutboxConsumer(
        store,
        handlerFrom(async () => 'projected'),
        TEST_CONSUMER_OPTIONS,
        logger
      );

      await expect(consumer.stop()).resolves.toBeUndefined();
      expect(logger.info).not.toHaveBeenCalledWith('Stopped');
    });
  });
});
