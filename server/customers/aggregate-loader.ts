/**
 * Aggregate Loader
 *
 * Assembles the full current state of one aggregate from the
 * system-of-record. The primary row is read first; dependent sets are only
 * read when it exists, and every read for the aggregate goes through one
 * read snapshot. Nothing is cached between loads: a household shared by
 * several customers is re-read for each of them.
 *
 * A `not_found` result can mean a real upstream delete or a read racing an
 * insert that is not yet visible; the caller decides using the event's op.
 */

import type {
  AggregateKind,
  AggregateSnapshot,
  B2bCustomerSnapshot,
  B2cCustomerSnapshot,
  HealthAssociations,
  HouseholdSnapshot,
} from '@shared/aggregate-types';
import type { CustomerReadSource, CustomerReader, CustomerSegment } from './customer-reader';

export type LoadResult =
  | { status: 'found'; snapshot: AggregateSnapshot }
  | { status: 'not_found' };

const NOT_FOUND: LoadResult = { status: 'not_found' };

/** Raised when a row references a parent row that does not exist. */
export class DanglingReferenceError extends Error {
  constructor(
    readonly kind: AggregateKind,
    readonly aggregateId: string,
    readonly reference: string
  ) {
    super(`${kind} ${aggregateId} references missing ${reference}`);
    this.name = 'DanglingReferenceError';
  }
}

export class AggregateLoader {
  constructor(private readonly source: CustomerReadSource) {}

  load(kind: AggregateKind, aggregateId: string): Promise<LoadResult> {
    return this.source.readSnapshot(async (reader) => {
      switch (kind) {
        case 'household':
          return found(await loadHousehold(reader, aggregateId));
        case 'b2c_customer':
          return found(await loadB2cCustomer(reader, aggregateId));
        case 'b2b_customer':
          return found(await loadB2bCustomer(reader, aggregateId));
      }
    });
  }
}

function found(snapshot: AggregateSnapshot | null): LoadResult {
  return snapshot ? { status: 'found', snapshot } : NOT_FOUND;
}

async function loadHousehold(
  reader: CustomerReader,
  householdId: string
): Promise<HouseholdSnapshot | null> {
  const household = await reader.loadHousehold(householdId);
  if (!household) return null;

  return {
    kind: 'household',
    household,
    preferences: await reader.loadHouseholdPreferences(householdId),
    budgets: await reader.loadHouseholdBudgets(householdId),
  };
}

async function loadHealthAssociations(
  reader: CustomerReader,
  segment: CustomerSegment,
  customerId: string
): Promise<HealthAssociations> {
  // Sequential on purpose: all reads share the snapshot's single connection.
  const profile = await reader.loadHealthProfile(segment, customerId);
  const conditions = await reader.loadConditions(segment, customerId);
  const allergens = await reader.loadAllergens(segment, customerId);
  const diets = await reader.loadDiets(segment, customerId);
  return { profile, conditions, allergens, diets };
}

async function loadB2cCustomer(
  reader: CustomerReader,
  customerId: string
): Promise<B2cCustomerSnapshot | null> {
  const customer = await reader.loadB2cCustomer(customerId);
  if (!customer) return null;

  const household = await loadHousehold(reader, customer.householdId);
  if (!household) {
    throw new DanglingReferenceError('b2c_customer', customerId, `household ${customer.householdId}`);
  }

  return {
    kind: 'b2c_customer',
    customer,
    household: {
      household: household.household,
      preferences: household.preferences,
      budgets: household.budgets,
    },
    ...(await loadHealthAssociations(reader, 'b2c', customerId)),
  };
}

async function loadB2bCustomer(
  reader: CustomerReader,
  customerId: string
): Promise<B2bCustomerSnapshot | null> {
  const row = await reader.loadB2bCustomer(customerId);
  if (!row) return null;

  if (!row.vendor) {
    throw new DanglingReferenceError('b2b_customer', customerId, `vendor ${row.customer.vendorId}`);
  }

  return {
    kind: 'b2b_customer',
    customer: row.customer,
    vendor: row.vendor,
    ...(await loadHealthAssociations(reader, 'b2b', customerId)),
  };
}
