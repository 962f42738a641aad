/**
 * Query operand rules shared by every Catalog engine.
 *
 * A field's type is known when the expression carries a hint or a filing
 * class declares it. Operands for known types are checked and converted
 * (dates to ISO-8601 strings); a mismatch is an error, never a coercion.
 * Fields of unknown type only match stored values of the operand's own
 * kind.
 */

import { CatalogQueryError } from '../core/errors.js';
import type { FieldRef } from '../filing/Expr.js';
import type { FieldMap } from '../filing/Field.js';
import { Filing } from '../filing/Filing.js';
import type { FilingResolver } from '../filing/FilingResolver.js';
import type { FieldType, FieldValue } from '../filing/types.js';
import { describeType } from '../filing/types.js';
import type { OrderBy, SearchOptions } from './types.js';
import { DEFAULT_SEARCH_LIMIT } from './types.js';

/**
 * Normalized operand: what the engines compare against.
 */
export type Operand = string | number | boolean;

/**
 * Runtime kind of a stored or operand value.
 */
export type ValueKind = 'string' | 'number' | 'boolean';

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function isIdentifier(name: string): boolean {
  return IDENTIFIER.test(name);
}

/**
 * Reject field names that are not plain identifiers.
 */
export function assertIdentifier(name: string): void {
  if (!isIdentifier(name)) {
    throw new CatalogQueryError(`Invalid field name '${name}'`, { field: name });
  }
}

export function valueKind(value: unknown): ValueKind | null {
  if (typeof value === 'string') return 'string';
  if (typeof value === 'number') return 'number';
  if (typeof value === 'boolean') return 'boolean';
  return null;
}

/**
 * Field types declared across the base class and every registered class.
 * A name declared with conflicting types maps to null.
 */
export function declaredFieldTypes(
  resolver: FilingResolver,
  extra: readonly FieldMap[] = []
): Map<string, FieldType | null> {
  const types = new Map<string, FieldType | null>();
  const maps = [Filing.fields, ...resolver.classList().map((cls) => cls.fields), ...extra];
  for (const fields of maps) {
    for (const decl of Object.values(fields)) {
      if (decl.type === undefined) continue;
      const seen = types.get(decl.name);
      if (seen === undefined) {
        types.set(decl.name, decl.type);
      } else if (seen !== decl.type) {
        types.set(decl.name, null);
      }
    }
  }
  return types;
}

/**
 * Type of a referenced field: the expression hint, else the declared type.
 */
export function fieldTypeOf(
  ref: FieldRef,
  declared: ReadonlyMap<string, FieldType | null>
): FieldType | undefined {
  return ref.type ?? declared.get(ref.name) ?? undefined;
}

/**
 * Check an operand against a field type and convert it to its stored form.
 */
export function normalizeOperand(field: string, type: FieldType | undefined, value: FieldValue): Operand {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw mismatch(field, type ?? 'date', 'invalid date');
    }
    if (type !== undefined && type !== 'date') {
      throw mismatch(field, type, 'date');
    }
    return value.toISOString();
  }

  switch (type) {
    case undefined:
      return value;
    case 'date': {
      if (typeof value !== 'string') {
        throw mismatch(field, type, describeType(value));
      }
      const parsed = new Date(value);
      if (Number.isNaN(parsed.getTime())) {
        throw mismatch(field, type, `unparseable string '${value}'`);
      }
      return parsed.toISOString();
    }
    case 'number':
      if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw mismatch(field, type, describeType(value));
      }
      return value;
    case 'string':
    case 'boolean':
      if (typeof value !== type) {
        throw mismatch(field, type, describeType(value));
      }
      return value;
  }
}

/**
 * Normalize the operands of a set expression. For fields of unknown type
 * every value must be of the same kind.
 */
export function normalizeSet(
  field: string,
  type: FieldType | undefined,
  values: readonly FieldValue[]
): Operand[] {
  const operands = values.map((v) => normalizeOperand(field, type, v));
  if (type === undefined) {
    const kinds = new Set(operands.map(valueKind));
    if (kinds.size > 1) {
      throw new CatalogQueryError(
        `Field '${field}' has no declared type; set values must share one kind`,
        { field, kinds: [...kinds] }
      );
    }
  }
  return operands;
}

/**
 * Check that a text operation targets a string field.
 */
export function assertTextField(field: string, type: FieldType | undefined): void {
  if (type !== undefined && type !== 'string') {
    throw new CatalogQueryError(`Text match on non-string field '${field}' (${type})`, {
      field,
      type,
    });
  }
}

function mismatch(field: string, expected: string, actual: string): CatalogQueryError {
  return new CatalogQueryError(`Field '${field}' expects ${expected} operands, got ${actual}`, {
    field,
    expected,
    actual,
  });
}

// ============================================================================
// Window and ordering
// ============================================================================

export interface ResolvedWindow {
  limit: number | null;
  offset: number;
  order: Array<Required<OrderBy>>;
}

/**
 * Validate search options and apply defaults. Requested orders get an
 * `id asc` tie breaker unless they already order by id.
 */
export function resolveWindow(options: SearchOptions = {}): ResolvedWindow {
  const limit = options.limit === undefined ? DEFAULT_SEARCH_LIMIT : options.limit;
  const offset = options.offset ?? 0;

  if (limit !== null && (!Number.isInteger(limit) || limit < 0)) {
    throw new CatalogQueryError(`limit must be a non-negative integer, got ${limit}`, { limit });
  }
  if (!Number.isInteger(offset) || offset < 0) {
    throw new CatalogQueryError(`offset must be a non-negative integer, got ${offset}`, { offset });
  }

  const order = (options.order ?? []).map((term) => {
    assertIdentifier(term.field);
    const direction = term.direction ?? 'asc';
    if (direction !== 'asc' && direction !== 'desc') {
      throw new CatalogQueryError(`Invalid order direction '${String(direction)}'`, {
        field: term.field,
      });
    }
    return { field: term.field, direction };
  });
  if (order.length > 0 && !order.some((term) => term.field === 'id')) {
    order.push({ field: 'id', direction: 'asc' });
  }

  return { limit, offset, order };
}
