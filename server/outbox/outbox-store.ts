import type { OutboxEvent } from '@shared/aggregate-types';

export interface ClaimOptions {
  /** Maximum number of events to claim. */
  limit: number;
  /** Events whose attempts have reached this value are never claimed again. */
  maxAttempts: number;
  watchedTables: readonly string[];
  watchedAggregateTypes: readonly string[];
  /**
   * Rows left in `processing` longer than this are claimable again
   * (the claimer crashed before ack/nack). A stale row that already used
   * its last attempt is moved to `failed` instead. 0 disables reclaiming.
   */
  staleClaimMs: number;
}

/**
 * Outbox store contract.
 *
 * claimPending must be exclusive across concurrent callers: selecting the
 * eligible rows and flipping them to `processing` happens atomically, so a
 * row returned to one caller is never returned to another until it is
 * acked, nacked or released.
 */
export interface OutboxStore {
  /** Claim eligible events in creation order (created_at, then id). */
  claimPending(options: ClaimOptions): Promise<OutboxEvent[]>;
  /** Mark a claimed event processed. */
  ack(eventId: number): Promise<void>;
  /** Mark a claimed event failed and record the error text. */
  nack(eventId: number, errorText: string): Promise<void>;
  /** Return claimed-but-unprocessed events to pending without spending an attempt. */
  release(eventIds: readonly number[]): Promise<void>;
}

/** Longest error text stored on an outbox row. */
export const MAX_ERROR_TEXT_LENGTH = 2000;

/** Error recorded on a stale claim that had no attempts left. */
export const CLAIM_EXPIRED_ERROR = 'claim expired after final attempt';

export function truncateErrorText(errorText: string): string {
  if (errorText.length <= MAX_ERROR_TEXT_LENGTH) {
    return errorText;
  }
  let head = errorText.slice(0, MAX_ERROR_TEXT_LENGTH - 3);
  // Never keep half of a surrogate pair.
  const last = head.charCodeAt(head.length - 1);
  if (last >= 0xd800 && last <= 0xdbff) {
    head = head.slice(0, -1);
  }
  return `${head}...`;
}

/** Creation-order comparator used to keep per-aggregate causal order. */
export function compareByCreation(a: OutboxEvent, b: OutboxEvent): number {
  const byTime = a.createdAt.getTime() - b.createdAt.getTime();
  return byTime !== 0 ? byTime : a.id - b.id;
}
