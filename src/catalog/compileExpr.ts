/**
 * compileExpr: translates Expr trees into SQLite WHERE clauses.
 *
 * Values are always bound through `?` placeholders; identifiers come from
 * the column resolver and are validated before use. Combinators are fully
 * parenthesised, and parameters are emitted in operand order.
 */

import { CatalogQueryError } from '../core/errors.js';
import type { Expr, LeafExpr } from '../filing/Expr.js';
import type { FieldType } from '../filing/types.js';
import type { Operand, ValueKind } from './operands.js';
import {
  assertIdentifier,
  assertTextField,
  normalizeOperand,
  normalizeSet,
  valueKind,
} from './operands.js';

/**
 * SQLite bind value.
 */
export type SqlParam = string | number | null;

/**
 * Where and how a field is stored.
 */
export interface ColumnInfo {
  /** SQL expression reading the field */
  sql: string;
  /** Known type, or undefined when only the JSON document holds the field */
  type: FieldType | undefined;
  /** SQL giving the stored JSON type (set for document fields) */
  jsonTypeSql?: string;
}

/**
 * Maps a field reference to its column.
 */
export type ColumnResolver = (name: string, hint: FieldType | undefined) => ColumnInfo;

export interface CompiledExpr {
  sql: string;
  params: SqlParam[];
}

const COMPARISON_SQL = {
  eq: '=',
  ne: '!=',
  gt: '>',
  gte: '>=',
  lt: '<',
  lte: '<=',
} as const;

const JSON_TYPES: Record<ValueKind, string> = {
  string: "('text')",
  number: "('integer', 'real')",
  boolean: "('true', 'false')",
};

/**
 * Bind form of an operand: booleans become 0/1.
 */
export function toSqlParam(value: Operand): SqlParam {
  if (typeof value === 'boolean') {
    return value ? 1 : 0;
  }
  return value;
}

/**
 * Escape GLOB metacharacters so the value matches literally.
 */
export function escapeGlob(value: string): string {
  return value.replace(/[*?[]/g, (ch) => `[${ch}]`);
}

/**
 * Compile an expression to a WHERE clause body.
 */
export function compileExpr(expr: Expr, columns: ColumnResolver): CompiledExpr {
  const params: SqlParam[] = [];
  const sql = compileNode(expr, columns, params);
  return { sql, params };
}

function compileNode(expr: Expr, columns: ColumnResolver, params: SqlParam[]): string {
  switch (expr.op) {
    case 'and':
    case 'or': {
      const joiner = expr.op === 'and' ? ' AND ' : ' OR ';
      return `(${expr.operands.map((operand) => compileNode(operand, columns, params)).join(joiner)})`;
    }
    case 'not':
      return `(NOT ${compileNode(expr.operand, columns, params)})`;
    default:
      return compileLeaf(expr, columns, params);
  }
}

function compileLeaf(expr: LeafExpr, columns: ColumnResolver, params: SqlParam[]): string {
  const name = expr.field.name;
  assertIdentifier(name);
  const column = columns(name, expr.field.type);
  const type = column.type;

  switch (expr.op) {
    case 'isNull':
      return `${column.sql} IS NULL`;
    case 'isNotNull':
      return `${column.sql} IS NOT NULL`;
    case 'eq':
    case 'ne':
    case 'gt':
    case 'gte':
    case 'lt':
    case 'lte': {
      const value = expr.value;
      if (value === null) {
        if (expr.op === 'eq') return `${column.sql} IS NULL`;
        if (expr.op === 'ne') return `${column.sql} IS NOT NULL`;
        throw new CatalogQueryError(`Operator '${expr.op}' does not accept null`, { field: name });
      }
      const operand = normalizeOperand(name, type, value);
      params.push(toSqlParam(operand));
      return guarded(column, valueKind(operand), `${column.sql} ${COMPARISON_SQL[expr.op]} ?`);
    }
    case 'in':
    case 'notIn': {
      const operands = normalizeSet(name, type, expr.values);
      const [first] = operands;
      if (first === undefined) {
        return expr.op === 'in' ? '0' : '1';
      }
      params.push(...operands.map(toSqlParam));
      const placeholders = operands.map(() => '?').join(', ');
      const keyword = expr.op === 'in' ? 'IN' : 'NOT IN';
      return guarded(column, valueKind(first), `${column.sql} ${keyword} (${placeholders})`);
    }
    case 'contains':
    case 'startsWith':
    case 'endsWith': {
      assertTextField(name, type);
      const escaped = escapeGlob(expr.value);
      const pattern =
        expr.op === 'contains' ? `*${escaped}*` : expr.op === 'startsWith' ? `${escaped}*` : `*${escaped}`;
      params.push(pattern);
      return guarded(column, 'string', `${column.sql} GLOB ?`);
    }
    case 'between': {
      const lower = normalizeOperand(name, type, expr.lower);
      const upper = normalizeOperand(name, type, expr.upper);
      if (type === undefined && valueKind(lower) !== valueKind(upper)) {
        throw new CatalogQueryError(`BETWEEN bounds for '${name}' must share one kind`, { field: name });
      }
      params.push(toSqlParam(lower), toSqlParam(upper));
      return guarded(column, valueKind(lower), `${column.sql} BETWEEN ? AND ?`);
    }
  }
}

/**
 * Prefix a predicate with a JSON type guard when the field type is unknown.
 */
function guarded(column: ColumnInfo, kind: ValueKind | null, predicate: string): string {
  if (column.type !== undefined || column.jsonTypeSql === undefined || kind === null) {
    return predicate;
  }
  return `(${column.jsonTypeSql} IN ${JSON_TYPES[kind]} AND ${predicate})`;
}
