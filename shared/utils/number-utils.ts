/**
 * Number Utility Functions
 *
 * Postgres `numeric` columns arrive as strings through node-postgres; these
 * helpers turn them into graph-friendly numbers while keeping SQL NULL as null.
 */

export interface TransformContext {
  /** Record identifier (for debugging) */
  id?: string;
  /** Context description (e.g., 'household_budgets', 'b2c_customer_health_profiles') */
  context: string;
}

/**
 * Nullable numeric value with validation.
 *
 * Returns null for SQL NULL and for values that do not parse as a finite
 * number (the latter is logged, since it means the column held garbage).
 *
 * @example
 * ```typescript
 * const amount = toNullableNumber('amount', row.amount, { context: 'household_budgets', id: row.id });
 * ```
 */
export function toNullableNumber(
  fieldName: string,
  value: number | string | null | undefined,
  context: TransformContext
): number | null {
  if (value === null || value === undefined) {
    return null;
  }

  const num = typeof value === 'string' ? Number.parseFloat(value) : value;

  if (!Number.isFinite(num)) {
    console.warn(
      `[DataTransform] Invalid numeric value for '${fieldName}' in ${context.context}` +
        `${context.id ? ` (id=${context.id})` : ''}: ${value}, using null`
    );
    return null;
  }

  return num;
}
