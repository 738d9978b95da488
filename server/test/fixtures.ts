/**
 * Record builders and shared helpers for tests. Each builder returns one
 * plausible row; overrides replace whatever the test cares about.
 */

import { vi, type Mock } from 'vitest';
import { AGGREGATE_KINDS, WATCHED_TABLES } from '@shared/aggregate-types';
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
import type { LogContext, Logger } from '../logger';
import type { OutboxConsumerOptions } from '../outbox-consumer';

export const CREATED_AT = '2026-01-05T10:00:00.000Z';
export const UPDATED_AT = '2026-02-01T08:30:00.000Z';

export function makeHousehold(overrides: Partial<HouseholdRecord> = {}): HouseholdRecord {
  return {
    id: 'hh-1',
    householdName: 'Rivera Household',
    householdType: 'family',
    accountStatus: 'active',
    totalMembers: 3,
    locationCountry: 'US',
    locationRegion: null,
    locationCity: 'Austin',
    locationPostalCode: null,
    createdAt: CREATED_AT,
    updatedAt: UPDATED_AT,
    ...overrides,
  };
}

export function makePreference(
  overrides: Partial<HouseholdPreferenceRecord> = {}
): HouseholdPreferenceRecord {
  return {
    id: 'pref-1',
    preferenceType: 'cuisine',
    preferenceValue: 'mediterranean',
    priority: 1,
    createdAt: CREATED_AT,
    ...overrides,
  };
}

export function makeBudget(overrides: Partial<HouseholdBudgetRecord> = {}): HouseholdBudgetRecord {
  return {
    id: 'budget-1',
    budgetType: 'grocery',
    amount: 250.5,
    currency: 'USD',
    period: 'weekly',
    startDate: '2026-01-01',
    endDate: null,
    isActive: true,
    createdAt: CREATED_AT,
    ...overrides,
  };
}

export function makeB2cCustomer(overrides: Partial<B2cCustomerRecord> = {}): B2cCustomerRecord {
  return {
    id: 'c-1',
    householdId: 'hh-1',
    fullName: 'Ana Rivera',
    firstName: 'Ana',
    lastName: 'Rivera',
    email: 'ana@example.test',
    phone: null,
    householdRole: 'adult',
    birthYear: 1988,
    birthMonth: 4,
    dateOfBirth: '1988-04-12',
    age: 37,
    gender: null,
    isProfileOwner: true,
    accountStatus: 'active',
    createdAt: CREATED_AT,
    updatedAt: UPDATED_AT,
    ...overrides,
  };
}

export function makeVendor(overrides: Partial<VendorRecord> = {}): VendorRecord {
  return {
    id: 'vendor-1',
    name: 'Green Clinic',
    vendorType: 'clinic',
    slug: 'green-clinic',
    ...overrides,
  };
}

export function makeB2bCustomer(overrides: Partial<B2bCustomerRecord> = {}): B2bCustomerRecord {
  return {
    id: 'b-1',
    vendorId: 'vendor-1',
    fullName: 'Sam Okafor',
    email: null,
    phone: null,
    externalId: 'ext-42',
    accountStatus: 'active',
    dateOfBirth: null,
    gender: null,
    createdAt: CREATED_AT,
    updatedAt: UPDATED_AT,
    ...overrides,
  };
}

export function makeProfile(overrides: Partial<HealthProfileRecord> = {}): HealthProfileRecord {
  return {
    id: 'profile-1',
    heightCm: 170,
    weightKg: 68.5,
    bmi: 23.7,
    bmr: null,
    tdee: null,
    activityLevel: 'moderate',
    healthGoal: 'maintain',
    targetWeightKg: null,
    targetCalories: 2000,
    targetProteinG: null,
    targetCarbsG: null,
    targetFatG: null,
    targetFiberG: null,
    targetSodiumMg: null,
    targetSugarG: null,
    createdAt: CREATED_AT,
    updatedAt: UPDATED_AT,
    ...overrides,
  };
}

export function makeCondition(overrides: Partial<ConditionAssociation> = {}): ConditionAssociation {
  return {
    id: 'cond-diabetes',
    name: 'Type 2 Diabetes',
    severity: 'moderate',
    diagnosisDate: '2024-06-01',
    isActive: true,
    notes: null,
    ...overrides,
  };
}

export function makeAllergen(overrides: Partial<AllergenAssociation> = {}): AllergenAssociation {
  return {
    id: 'allergen-peanut',
    name: 'Peanut',
    severity: 'severe',
    diagnosisDate: null,
    isActive: true,
    reactionDescription: 'anaphylaxis',
    ...overrides,
  };
}

export function makeDiet(overrides: Partial<DietAssociation> = {}): DietAssociation {
  return {
    id: 'diet-vegan',
    name: 'Vegan',
    strictness: 'strict',
    startDate: '2025-01-01',
    isActive: true,
    ...overrides,
  };
}

export const TEST_CONSUMER_OPTIONS: OutboxConsumerOptions = {
  batchSize: 100,
  maxAttempts: 3,
  pollIntervalMs: 10,
  staleClaimMs: 0,
  watchedTables: WATCHED_TABLES,
  watchedAggregateTypes: AGGREGATE_KINDS,
};

type LogFn = (message: string, context?: LogContext) => void;

export interface SpyLogger extends Logger {
  info: Mock<LogFn>;
  warn: Mock<LogFn>;
  error: Mock<LogFn>;
}

export function createSpyLogger(): SpyLogger {
  return { info: vi.fn<LogFn>(), warn: vi.fn<LogFn>(), error: vi.fn<LogFn>() };
}
