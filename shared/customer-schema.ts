import {
  boolean,
  date,
  integer,
  numeric,
  pgTable,
  text,
  timestamp,
  uuid,
} from 'drizzle-orm/pg-core';

/**
 * Customer system-of-record tables (read-only for this worker).
 *
 * The b2c and b2b segments share the same health sub-record layout; the
 * factories below build both segments' tables from one column set so the
 * reader can treat them uniformly.
 */

const createdAt = () => timestamp('created_at', { withTimezone: true, mode: 'string' });
const updatedAt = () => timestamp('updated_at', { withTimezone: true, mode: 'string' });

// ============================================================================
// Households
// ============================================================================

export const households = pgTable('households', {
  id: uuid('id').primaryKey(),
  householdName: text('household_name'),
  householdType: text('household_type'),
  accountStatus: text('account_status'),
  totalMembers: integer('total_members'),
  locationCountry: text('location_country'),
  locationRegion: text('location_region'),
  locationCity: text('location_city'),
  locationPostalCode: text('location_postal_code'),
  createdAt: createdAt(),
  updatedAt: updatedAt(),
});

export const householdPreferences = pgTable('household_preferences', {
  id: uuid('id').primaryKey(),
  householdId: uuid('household_id').notNull(),
  preferenceType: text('preference_type'),
  preferenceValue: text('preference_value'),
  priority: integer('priority'),
  createdAt: createdAt(),
});

export const householdBudgets = pgTable('household_budgets', {
  id: uuid('id').primaryKey(),
  householdId: uuid('household_id').notNull(),
  budgetType: text('budget_type'),
  amount: numeric('amount'),
  currency: text('currency'),
  period: text('period'),
  startDate: date('start_date'),
  endDate: date('end_date'),
  isActive: boolean('is_active'),
  createdAt: createdAt(),
});

// ============================================================================
// Catalogs
// ============================================================================

export const healthConditions = pgTable('health_conditions', {
  id: uuid('id').primaryKey(),
  name: text('name'),
});

export const allergens = pgTable('allergens', {
  id: uuid('id').primaryKey(),
  name: text('name'),
});

export const dietaryPreferences = pgTable('dietary_preferences', {
  id: uuid('id').primaryKey(),
  name: text('name'),
});

export const vendors = pgTable('vendors', {
  id: uuid('id').primaryKey(),
  name: text('name'),
  vendorType: text('vendor_type'),
  slug: text('slug'),
});

// ============================================================================
// Customers
// ============================================================================

export const b2cCustomers = pgTable('b2c_customers', {
  id: uuid('id').primaryKey(),
  householdId: uuid('household_id').notNull(),
  fullName: text('full_name'),
  firstName: text('first_name'),
  lastName: text('last_name'),
  email: text('email'),
  phone: text('phone'),
  householdRole: text('household_role'),
  birthYear: integer('birth_year'),
  birthMonth: integer('birth_month'),
  dateOfBirth: date('date_of_birth'),
  age: integer('age'),
  gender: text('gender'),
  isProfileOwner: boolean('is_profile_owner'),
  accountStatus: text('account_status'),
  createdAt: createdAt(),
  updatedAt: updatedAt(),
});

export const b2bCustomers = pgTable('b2b_customers', {
  id: uuid('id').primaryKey(),
  vendorId: uuid('vendor_id').notNull(),
  fullName: text('full_name'),
  email: text('email'),
  phone: text('phone'),
  externalId: text('external_id'),
  accountStatus: text('account_status'),
  dateOfBirth: date('date_of_birth'),
  gender: text('gender'),
  createdAt: createdAt(),
  updatedAt: updatedAt(),
});

// ============================================================================
// Per-segment health sub-records
// ============================================================================

function healthProfilesTable(tableName: string, customerColumn: string) {
  return pgTable(tableName, {
    id: uuid('id').primaryKey(),
    customerId: uuid(customerColumn).notNull(),
    heightCm: numeric('height_cm'),
    weightKg: numeric('weight_kg'),
    bmi: numeric('bmi'),
    bmr: numeric('bmr'),
    tdee: numeric('tdee'),
    activityLevel: text('activity_level'),
    healthGoal: text('health_goal'),
    targetWeightKg: numeric('target_weight_kg'),
    targetCalories: numeric('target_calories'),
    targetProteinG: numeric('target_protein_g'),
    targetCarbsG: numeric('target_carbs_g'),
    targetFatG: numeric('target_fat_g'),
    targetFiberG: numeric('target_fiber_g'),
    targetSodiumMg: numeric('target_sodium_mg'),
    targetSugarG: numeric('target_sugar_g'),
    createdAt: createdAt(),
    updatedAt: updatedAt(),
  });
}

function customerConditionsTable(tableName: string, customerColumn: string) {
  return pgTable(tableName, {
    customerId: uuid(customerColumn).notNull(),
    conditionId: uuid('condition_id').notNull(),
    severity: text('severity'),
    diagnosisDate: date('diagnosis_date'),
    isActive: boolean('is_active'),
    notes: text('notes'),
  });
}

function customerAllergensTable(tableName: string, customerColumn: string) {
  return pgTable(tableName, {
    customerId: uuid(customerColumn).notNull(),
    allergenId: uuid('allergen_id').notNull(),
    severity: text('severity'),
    diagnosisDate: date('diagnosis_date'),
    isActive: boolean('is_active'),
    reactionDescription: text('reaction_description'),
  });
}

function customerDietsTable(tableName: string, customerColumn: string) {
  return pgTable(tableName, {
    customerId: uuid(customerColumn).notNull(),
    dietId: uuid('diet_id').notNull(),
    strictness: text('strictness'),
    startDate: date('start_date'),
    isActive: boolean('is_active'),
  });
}

export const b2cHealthProfiles = healthProfilesTable(
  'b2c_customer_health_profiles',
  'b2c_customer_id'
);
export const b2cCustomerConditions = customerConditionsTable(
  'b2c_customer_health_conditions',
  'b2c_customer_id'
);
export const b2cCustomerAllergens = customerAllergensTable(
  'b2c_customer_allergens',
  'b2c_customer_id'
);
export const b2cCustomerDiets = customerDietsTable(
  'b2c_customer_dietary_preferences',
  'b2c_customer_id'
);

export const b2bHealthProfiles = healthProfilesTable(
  'b2b_customer_health_profiles',
  'b2b_customer_id'
);
export const b2bCustomerConditions = customerConditionsTable(
  'b2b_customer_health_conditions',
  'b2b_customer_id'
);
export const b2bCustomerAllergens = customerAllergensTable(
  'b2b_customer_allergens',
  'b2b_customer_id'
);
export const b2bCustomerDiets = customerDietsTable(
  'b2b_customer_dietary_preferences',
  'b2b_customer_id'
);

export type CustomerSegment = 'b2c' | 'b2b';

/** Health sub-record tables for one customer segment. */
export interface SegmentTables {
  profiles: ReturnType<typeof healthProfilesTable>;
  conditions: ReturnType<typeof customerConditionsTable>;
  allergens: ReturnType<typeof customerAllergensTable>;
  diets: ReturnType<typeof customerDietsTable>;
}

export const SEGMENT_TABLES: Record<CustomerSegment, SegmentTables> = {
  b2c: {
    profiles: b2cHealthProfiles,
    conditions: b2cCustomerConditions,
    allergens: b2cCustomerAllergens,
    diets: b2cCustomerDiets,
  },
  b2b: {
    profiles: b2bHealthProfiles,
    conditions: b2bCustomerConditions,
    allergens: b2bCustomerAllergens,
    diets: b2bCustomerDiets,
  },
};
