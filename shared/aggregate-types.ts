/**
 * Customer Aggregate Types
 *
 * Wire values carried by outbox rows and the typed snapshots the loader
 * assembles for each aggregate kind. Snapshots are plain, read-only
 * documents: one per event, discarded once the graph write finishes.
 *
 * Kinds:
 * - b2c_customer  → a consumer and the household they belong to
 * - b2b_customer  → a vendor-managed customer
 * - household     → the grouping entity shared by b2c customers
 */

// ============================================================================
// Outbox wire values
// ============================================================================

export const AGGREGATE_KINDS = ['b2c_customer', 'b2b_customer', 'household'] as const;
export type AggregateKind = (typeof AGGREGATE_KINDS)[number];

export const OUTBOX_OPS = ['INSERT', 'UPDATE', 'DELETE'] as const;
export type OutboxOp = (typeof OUTBOX_OPS)[number];

export const OUTBOX_STATUSES = ['pending', 'processing', 'processed', 'failed'] as const;
export type OutboxStatus = (typeof OUTBOX_STATUSES)[number];

/** Tables whose writes produce outbox rows for the customer aggregates. */
export const WATCHED_TABLES = [
  'households',
  'b2c_customers',
  'b2c_customer_health_profiles',
  'b2c_customer_health_conditions',
  'b2c_customer_allergens',
  'b2c_customer_dietary_preferences',
  'household_preferences',
  'household_budgets',
  'vendors',
  'b2b_customers',
  'b2b_customer_health_profiles',
  'b2b_customer_health_conditions',
  'b2b_customer_allergens',
  'b2b_customer_dietary_preferences',
] as const;

/**
 * A claimed outbox row. `aggregateType` and `op` keep their raw wire values;
 * the dispatcher decides whether they are meaningful.
 */
export interface OutboxEvent {
  id: number;
  tableName: string;
  aggregateType: string;
  aggregateId: string;
  op: string;
  attempts: number;
  status: OutboxStatus;
  createdAt: Date;
}

function normalizeWireValue(value: string): string {
  return value.trim().toLowerCase();
}

export function isAggregateKind(value: string): value is AggregateKind {
  return (AGGREGATE_KINDS as readonly string[]).includes(value);
}

/** Resolve a raw aggregate_type to a known kind, or null when unhandled. */
export function parseAggregateKind(value: string): AggregateKind | null {
  const normalized = normalizeWireValue(value);
  return isAggregateKind(normalized) ? normalized : null;
}

export function parseOutboxOp(value: string): OutboxOp | null {
  const normalized = value.trim().toUpperCase();
  return OUTBOX_OPS.find((op) => op === normalized) ?? null;
}

// ============================================================================
// Relational records
// ============================================================================

export interface HouseholdRecord {
  id: string;
  householdName: string | null;
  householdType: string | null;
  accountStatus: string | null;
  totalMembers: number | null;
  locationCountry: string | null;
  locationRegion: string | null;
  locationCity: string | null;
  locationPostalCode: string | null;
  createdAt: string | null;
  updatedAt: string | null;
}

export interface HouseholdPreferenceRecord {
  id: string;
  preferenceType: string | null;
  preferenceValue: string | null;
  priority: number | null;
  createdAt: string | null;
}

export interface HouseholdBudgetRecord {
  id: string;
  budgetType: string | null;
  amount: number | null;
  currency: string | null;
  period: string | null;
  startDate: string | null;
  endDate: string | null;
  isActive: boolean | null;
  createdAt: string | null;
}

export interface B2cCustomerRecord {
  id: string;
  householdId: string;
  fullName: string | null;
  firstName: string | null;
  lastName: string | null;
  email: string | null;
  phone: string | null;
  householdRole: string | null;
  birthYear: number | null;
  birthMonth: number | null;
  dateOfBirth: string | null;
  age: number | null;
  gender: string | null;
  isProfileOwner: boolean | null;
  accountStatus: string | null;
  createdAt: string | null;
  updatedAt: string | null;
}

export interface B2bCustomerRecord {
  id: string;
  vendorId: string;
  fullName: string | null;
  email: string | null;
  phone: string | null;
  externalId: string | null;
  accountStatus: string | null;
  dateOfBirth: string | null;
  gender: string | null;
  createdAt: string | null;
  updatedAt: string | null;
}

export interface VendorRecord {
  id: string;
  name: string | null;
  vendorType: string | null;
  slug: string | null;
}

export interface HealthProfileRecord {
  id: string;
  heightCm: number | null;
  weightKg: number | null;
  bmi: number | null;
  bmr: number | null;
  tdee: number | null;
  activityLevel: string | null;
  healthGoal: string | null;
  targetWeightKg: number | null;
  targetCalories: number | null;
  targetProteinG: number | null;
  targetCarbsG: number | null;
  targetFatG: number | null;
  targetFiberG: number | null;
  targetSodiumMg: number | null;
  targetSugarG: number | null;
  createdAt: string | null;
  updatedAt: string | null;
}

/** Customer ↔ health_conditions association, joined with the catalog name. */
export interface ConditionAssociation {
  id: string;
  name: string | null;
  severity: string | null;
  diagnosisDate: string | null;
  isActive: boolean | null;
  notes: string | null;
}

export interface AllergenAssociation {
  id: string;
  name: string | null;
  severity: string | null;
  diagnosisDate: string | null;
  isActive: boolean | null;
  reactionDescription: string | null;
}

export interface DietAssociation {
  id: string;
  name: string | null;
  strictness: string | null;
  startDate: string | null;
  isActive: boolean | null;
}

// ============================================================================
// Snapshots
// ============================================================================

export interface HouseholdSnapshot {
  readonly kind: 'household';
  readonly household: Readonly<HouseholdRecord>;
  readonly preferences: readonly HouseholdPreferenceRecord[];
  readonly budgets: readonly HouseholdBudgetRecord[];
}

/** Health sub-records shared by both customer segments. */
export interface HealthAssociations {
  readonly profile: Readonly<HealthProfileRecord> | null;
  readonly conditions: readonly ConditionAssociation[];
  readonly allergens: readonly AllergenAssociation[];
  readonly diets: readonly DietAssociation[];
}

export interface B2cCustomerSnapshot extends HealthAssociations {
  readonly kind: 'b2c_customer';
  readonly customer: Readonly<B2cCustomerRecord>;
  readonly household: Omit<HouseholdSnapshot, 'kind'>;
}

export interface B2bCustomerSnapshot extends HealthAssociations {
  readonly kind: 'b2b_customer';
  readonly customer: Readonly<B2bCustomerRecord>;
  readonly vendor: Readonly<VendorRecord>;
}

export type AggregateSnapshot = B2cCustomerSnapshot | B2bCustomerSnapshot | HouseholdSnapshot;

/** Id of the primary entity the snapshot was loaded for. */
export function snapshotId(snapshot: AggregateSnapshot): string {
  switch (snapshot.kind) {
    case 'household':
      return snapshot.household.id;
    case 'b2c_customer':
    case 'b2b_customer':
      return snapshot.customer.id;
  }
}
