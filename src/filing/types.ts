/**
 * Shared value types for the filing record model and the query DSL.
 */

/**
 * Declared type of a filing field.
 */
export type FieldType = 'string' | 'number' | 'boolean' | 'date';

/**
 * Any non-null scalar a field can hold.
 */
export type FieldValue = string | number | boolean | Date;

/**
 * Raw key/value input to a filing constructor or `fromDict`.
 */
export type FilingValues = Record<string, unknown>;

/**
 * Serialized form of a filing (dates as ISO-8601 strings).
 */
export type FilingDict = Record<string, unknown>;

/**
 * Describe the runtime type of a value for error messages.
 */
export function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (value === undefined) return 'undefined';
  if (Array.isArray(value)) return 'array';
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? 'invalid date' : 'date';
  }
  return typeof value;
}
