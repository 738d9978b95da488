/**
 * Case transformation utilities
 *
 * Relational records are camelCase in TypeScript; graph properties keep the
 * snake_case column names of the system-of-record.
 */

/**
 * Convert a camelCase key to snake_case.
 *
 * @example
 * camelToSnakeKey('targetProteinG') // 'target_protein_g'
 */
export function camelToSnakeKey(key: string): string {
  return key.replace(/[A-Z]/g, (letter) => `_${letter.toLowerCase()}`);
}

/**
 * Transform camelCase object keys to snake_case
 *
 * @example
 * camelToSnake({ userName: 'john', createdAt: '2024-01-01' })
 * // Returns: { user_name: 'john', created_at: '2024-01-01' }
 */
export function camelToSnake(obj: object): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    result[camelToSnakeKey(key)] = value;
  }
  return result;
}
