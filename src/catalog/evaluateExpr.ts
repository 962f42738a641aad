/**
 * evaluateExpr: evaluates Expr trees against serialized filings.
 *
 * Evaluation follows SQL three-valued logic so MemoryCatalog and
 * SqliteCatalog agree: a comparison against a missing or null value is
 * unknown (null), `not(unknown)` is unknown, and only rows evaluating to
 * true match.
 */

import { CatalogQueryError } from '../core/errors.js';
import type { Expr, LeafExpr } from '../filing/Expr.js';
import type { FieldType } from '../filing/types.js';
import type { Operand } from './operands.js';
import {
  assertIdentifier,
  assertTextField,
  fieldTypeOf,
  normalizeOperand,
  normalizeSet,
  valueKind,
} from './operands.js';

/**
 * true, false, or unknown.
 */
export type Truth = boolean | null;

/**
 * Order two stored values the way SQLite does: null < numbers
 * (booleans as 0/1) < text.
 */
export function compareValues(a: unknown, b: unknown): number {
  const left = comparable(a);
  const right = comparable(b);
  const rankDiff = rank(left) - rank(right);
  if (rankDiff !== 0) {
    return rankDiff;
  }
  if (left === null || right === null) {
    return 0;
  }
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

function comparable(value: unknown): string | number | null {
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (typeof value === 'number' || typeof value === 'string') return value;
  return null;
}

function rank(value: string | number | null): number {
  if (value === null) return 0;
  return typeof value === 'number' ? 1 : 2;
}

/**
 * Evaluate an expression against one serialized filing.
 */
export function evaluateExpr(
  expr: Expr,
  row: Readonly<Record<string, unknown>>,
  declared: ReadonlyMap<string, FieldType | null>
): Truth {
  switch (expr.op) {
    case 'and': {
      let result: Truth = true;
      for (const operand of expr.operands) {
        const value = evaluateExpr(operand, row, declared);
        if (value === false) return false;
        if (value === null) result = null;
      }
      return result;
    }
    case 'or': {
      let result: Truth = false;
      for (const operand of expr.operands) {
        const value = evaluateExpr(operand, row, declared);
        if (value === true) return true;
        if (value === null) result = null;
      }
      return result;
    }
    case 'not': {
      const value = evaluateExpr(expr.operand, row, declared);
      return value === null ? null : !value;
    }
    default:
      return evaluateLeaf(expr, row, declared);
  }
}

/**
 * Check an expression without evaluating it, so invalid queries fail even
 * when there are no rows.
 */
export function validateExpr(expr: Expr, declared: ReadonlyMap<string, FieldType | null>): void {
  evaluateExpr(expr, {}, declared);
}

function evaluateLeaf(
  expr: LeafExpr,
  row: Readonly<Record<string, unknown>>,
  declared: ReadonlyMap<string, FieldType | null>
): Truth {
  const name = expr.field.name;
  assertIdentifier(name);
  const type = fieldTypeOf(expr.field, declared);
  const raw = Object.prototype.hasOwnProperty.call(row, name) ? row[name] : undefined;
  const stored = raw ?? null;

  switch (expr.op) {
    case 'isNull':
      return stored === null;
    case 'isNotNull':
      return stored !== null;
    case 'eq':
    case 'ne':
    case 'gt':
    case 'gte':
    case 'lt':
    case 'lte': {
      const value = expr.value;
      if (value === null) {
        if (expr.op === 'eq') return stored === null;
        if (expr.op === 'ne') return stored !== null;
        throw new CatalogQueryError(`Operator '${expr.op}' does not accept null`, { field: name });
      }
      const operand = normalizeOperand(name, type, value);
      return guarded(type, raw, operand, () => compare(expr.op, compareValues(stored, operand)));
    }
    case 'in':
    case 'notIn': {
      const operands = normalizeSet(name, type, expr.values);
      const [first] = operands;
      if (first === undefined) {
        return expr.op === 'notIn';
      }
      return guarded(type, raw, first, () => {
        const found = operands.some((operand) => compareValues(stored, operand) === 0);
        return expr.op === 'in' ? found : !found;
      });
    }
    case 'contains':
    case 'startsWith':
    case 'endsWith': {
      assertTextField(name, type);
      const needle = expr.value;
      return guarded(type, raw, needle, () => {
        if (typeof stored !== 'string') return false;
        if (expr.op === 'contains') return stored.includes(needle);
        return expr.op === 'startsWith' ? stored.startsWith(needle) : stored.endsWith(needle);
      });
    }
    case 'between': {
      const lower = normalizeOperand(name, type, expr.lower);
      const upper = normalizeOperand(name, type, expr.upper);
      if (type === undefined && valueKind(lower) !== valueKind(upper)) {
        throw new CatalogQueryError(`BETWEEN bounds for '${name}' must share one kind`, { field: name });
      }
      return guarded(
        type,
        raw,
        lower,
        () => compareValues(stored, lower) >= 0 && compareValues(stored, upper) <= 0
      );
    }
  }
}

/**
 * Null stored values are unknown. For fields of unknown type a stored value
 * of another kind (or an explicit JSON null) never matches.
 */
function guarded(type: FieldType | undefined, raw: unknown, operand: Operand, test: () => boolean): Truth {
  if (type === undefined && raw !== undefined && valueKind(raw) !== valueKind(operand)) {
    return false;
  }
  if (raw === undefined || raw === null) {
    return null;
  }
  return test();
}

function compare(op: 'eq' | 'ne' | 'gt' | 'gte' | 'lt' | 'lte', diff: number): boolean {
  switch (op) {
    case 'eq':
      return diff === 0;
    case 'ne':
      return diff !== 0;
    case 'gt':
      return diff > 0;
    case 'gte':
      return diff >= 0;
    case 'lt':
      return diff < 0;
    case 'lte':
      return diff <= 0;
  }
}
