import type {
  AllergenAssociation,
  B2bCustomerRecord,
  B2cCustomerRecord,
  ConditionAssociation,
  DietAssociation,
  HealthProfileRecord,
  HouseholdBudgetRecord,
  HouseholdPreferenceRecord,
  HouseholdRecord,
  VendorRecord,
} from '@shared/aggregate-types';
import type { CustomerSegment } from '@shared/customer-schema';

export type { CustomerSegment } from '@shared/customer-schema';

export interface B2bCustomerWithVendor {
  customer: B2bCustomerRecord;
  /** Null when vendor_id points at a missing vendor row. */
  vendor: VendorRecord | null;
}

/**
 * Read operations against the customer system-of-record.
 * Single-row reads resolve to null when the row does not exist.
 */
export interface CustomerReader {
  loadHousehold(householdId: string): Promise<HouseholdRecord | null>;
  loadHouseholdPreferences(householdId: string): Promise<HouseholdPreferenceRecord[]>;
  loadHouseholdBudgets(householdId: string): Promise<HouseholdBudgetRecord[]>;
  loadB2cCustomer(customerId: string): Promise<B2cCustomerRecord | null>;
  /** The b2b customer joined with its vendor; null when the customer row is absent. */
  loadB2bCustomer(customerId: string): Promise<B2bCustomerWithVendor | null>;
  loadHealthProfile(segment: CustomerSegment, customerId: string): Promise<HealthProfileRecord | null>;
  loadConditions(segment: CustomerSegment, customerId: string): Promise<ConditionAssociation[]>;
  loadAllergens(segment: CustomerSegment, customerId: string): Promise<AllergenAssociation[]>;
  loadDiets(segment: CustomerSegment, customerId: string): Promise<DietAssociation[]>;
}

/**
 * Hands out a reader bound to one consistent read snapshot. Every read made
 * through the reader inside `work` sees the same committed state.
 */
export interface CustomerReadSource {
  readSnapshot<T>(work: (reader: CustomerReader) => Promise<T>): Promise<T>;
}
