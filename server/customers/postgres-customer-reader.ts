/**
 * Postgres-backed customer reader.
 *
 * All reads for one aggregate run on one connection inside a read-only,
 * REPEATABLE READ transaction, so the primary row and its dependent sets
 * come from the same committed snapshot.
 */

import { asc, eq } from 'drizzle-orm';
import type {
  AllergenAssociation,
  B2cCustomerRecord,
  ConditionAssociation,
  DietAssociation,
  HealthProfileRecord,
  HouseholdBudgetRecord,
  HouseholdPreferenceRecord,
  HouseholdRecord,
} from '@shared/aggregate-types';
import {
  SEGMENT_TABLES,
  allergens,
  b2bCustomers,
  b2cCustomers,
  dietaryPreferences,
  healthConditions,
  householdBudgets,
  householdPreferences,
  households,
  vendors,
} from '@shared/customer-schema';
import { toNullableNumber } from '@shared/utils/number-utils';
import type { SourceDb, SourceTransaction } from '../storage';
import type {
  B2bCustomerWithVendor,
  CustomerReadSource,
  CustomerReader,
  CustomerSegment,
} from './customer-reader';

export class PostgresCustomerReader implements CustomerReader {
  constructor(private readonly tx: SourceTransaction) {}

  async loadHousehold(householdId: string): Promise<HouseholdRecord | null> {
    const [row] = await this.tx
      .select()
      .from(households)
      .where(eq(households.id, householdId))
      .limit(1);
    return row ?? null;
  }

  async loadHouseholdPreferences(householdId: string): Promise<HouseholdPreferenceRecord[]> {
    return this.tx
      .select({
        id: householdPreferences.id,
        preferenceType: householdPreferences.preferenceType,
        preferenceValue: householdPreferences.preferenceValue,
        priority: householdPreferences.priority,
        createdAt: householdPreferences.createdAt,
      })
      .from(householdPreferences)
      .where(eq(householdPreferences.householdId, householdId))
      .orderBy(asc(householdPreferences.id));
  }

  async loadHouseholdBudgets(householdId: string): Promise<HouseholdBudgetRecord[]> {
    const rows = await this.tx
      .select({
        id: householdBudgets.id,
        budgetType: householdBudgets.budgetType,
        amount: householdBudgets.amount,
        currency: householdBudgets.currency,
        period: householdBudgets.period,
        startDate: householdBudgets.startDate,
        endDate: householdBudgets.endDate,
        isActive: householdBudgets.isActive,
        createdAt: householdBudgets.createdAt,
      })
      .from(householdBudgets)
      .where(eq(householdBudgets.householdId, householdId))
      .orderBy(asc(householdBudgets.id));

    return rows.map((row) => ({
      ...row,
      amount: toNullableNumber('amount', row.amount, { context: 'household_budgets', id: row.id }),
    }));
  }

  async loadB2cCustomer(customerId: string): Promise<B2cCustomerRecord | null> {
    const [row] = await this.tx
      .select()
      .from(b2cCustomers)
      .where(eq(b2cCustomers.id, customerId))
      .limit(1);
    return row ?? null;
  }

  async loadB2bCustomer(customerId: string): Promise<B2bCustomerWithVendor | null> {
    const [row] = await this.tx
      .select({ customer: b2bCustomers, vendor: vendors })
      .from(b2bCustomers)
      .leftJoin(vendors, eq(vendors.id, b2bCustomers.vendorId))
      .where(eq(b2bCustomers.id, customerId))
      .limit(1);
    return row ?? null;
  }

  async loadHealthProfile(
    segment: CustomerSegment,
    customerId: string
  ): Promise<HealthProfileRecord | null> {
    const table = SEGMENT_TABLES[segment].profiles;
    const [row] = await this.tx
      .select()
      .from(table)
      .where(eq(table.customerId, customerId))
      .limit(1);
    if (!row) return null;

    const context = { context: `${segment}_customer_health_profiles`, id: row.id };
    return {
      id: row.id,
      heightCm: toNullableNumber('height_cm', row.heightCm, context),
      weightKg: toNullableNumber('weight_kg', row.weightKg, context),
      bmi: toNullableNumber('bmi', row.bmi, context),
      bmr: toNullableNumber('bmr', row.bmr, context),
      tdee: toNullableNumber('tdee', row.tdee, context),
      activityLevel: row.activityLevel,
      healthGoal: row.healthGoal,
      targetWeightKg: toNullableNumber('target_weight_kg', row.targetWeightKg, context),
      targetCalories: toNullableNumber('target_calories', row.targetCalories, context),
      targetProteinG: toNullableNumber('target_protein_g', row.targetProteinG, context),
      targetCarbsG: toNullableNumber('target_carbs_g', row.targetCarbsG, context),
      targetFatG: toNullableNumber('target_fat_g', row.targetFatG, context),
      targetFiberG: toNullableNumber('target_fiber_g', row.targetFiberG, context),
      targetSodiumMg: toNullableNumber('target_sodium_mg', row.targetSodiumMg, context),
      targetSugarG: toNullableNumber('target_sugar_g', row.targetSugarG, context),
      createdAt: row.createdAt,
      updatedAt: row.updatedAt,
    };
  }

  async loadConditions(
    segment: CustomerSegment,
    customerId: string
  ): Promise<ConditionAssociation[]> {
    const table = SEGMENT_TABLES[segment].conditions;
    return this.tx
      .select({
        id: table.conditionId,
        name: healthConditions.name,
        severity: table.severity,
        diagnosisDate: table.diagnosisDate,
        isActive: table.isActive,
        notes: table.notes,
      })
      .from(table)
      .innerJoin(healthConditions, eq(healthConditions.id, table.conditionId))
      .where(eq(table.customerId, customerId))
      .orderBy(asc(table.conditionId));
  }

  async loadAllergens(segment: CustomerSegment, customerId: string): Promise<AllergenAssociation[]> {
    const table = SEGMENT_TABLES[segment].allergens;
    return this.tx
      .select({
        id: table.allergenId,
        name: allergens.name,
        severity: table.severity,
        diagnosisDate: table.diagnosisDate,
        isActive: table.isActive,
        reactionDescription: table.reactionDescription,
      })
      .from(table)
      .innerJoin(allergens, eq(allergens.id, table.allergenId))
      .where(eq(table.customerId, customerId))
      .orderBy(asc(table.allergenId));
  }

  async loadDiets(segment: CustomerSegment, customerId: string): Promise<DietAssociation[]> {
    const table = SEGMENT_TABLES[segment].diets;
    return this.tx
      .select({
        id: table.dietId,
        name: dietaryPreferences.name,
        strictness: table.strictness,
        startDate: table.startDate,
        isActive: table.isActive,
      })
      .from(table)
      .innerJoin(dietaryPreferences, eq(dietaryPreferences.id, table.dietId))
      .where(eq(table.customerId, customerId))
      .orderBy(asc(table.dietId));
  }
}

export class PostgresCustomerReadSource implements CustomerReadSource {
  constructor(private readonly db: SourceDb) {}

  readSnapshot<T>(work: (reader: CustomerReader) => Promise<T>): Promise<T> {
    return this.db.transaction((tx) => work(new PostgresCustomerReader(tx)), {
      isolationLevel: 'repeatable read',
      accessMode: 'read only',
    });
  }
}
