/**
 * Expr: immutable boolean filter trees over filing fields.
 *
 * Expressions are plain frozen objects tagged by `op`. They carry no
 * storage-engine syntax: each Catalog translates them on its own
 * (SQL with bound parameters for SqliteCatalog, direct evaluation for
 * MemoryCatalog).
 */

import type { FieldType, FieldValue } from './types.js';

/**
 * Reference to one filing field, optionally with a type hint.
 */
export interface FieldRef {
  readonly name: string;
  readonly type?: FieldType;
}

export type ComparisonOp = 'eq' | 'ne' | 'gt' | 'gte' | 'lt' | 'lte';
export type SetOp = 'in' | 'notIn';
export type TextOp = 'contains' | 'startsWith' | 'endsWith';
export type NullOp = 'isNull' | 'isNotNull';

/**
 * All expression operation tags.
 */
export type ExprOp = ComparisonOp | SetOp | TextOp | NullOp | 'between' | 'and' | 'or' | 'not';

/**
 * Comparison leaf. A null value is only meaningful for eq/ne and means
 * "is null" / "is not null".
 */
export interface ComparisonExpr {
  readonly op: ComparisonOp;
  readonly field: FieldRef;
  readonly value: FieldValue | null;
}

/**
 * Set membership leaf.
 */
export interface SetExpr {
  readonly op: SetOp;
  readonly field: FieldRef;
  readonly values: readonly FieldValue[];
}

/**
 * Substring leaf (case-sensitive).
 */
export interface TextExpr {
  readonly op: TextOp;
  readonly field: FieldRef;
  readonly value: string;
}

export interface NullExpr {
  readonly op: NullOp;
  readonly field: FieldRef;
}

/**
 * Inclusive range leaf.
 */
export interface BetweenExpr {
  readonly op: 'between';
  readonly field: FieldRef;
  readonly lower: FieldValue;
  readonly upper: FieldValue;
}

export interface AndExpr {
  readonly op: 'and';
  readonly operands: readonly Expr[];
}

export interface OrExpr {
  readonly op: 'or';
  readonly operands: readonly Expr[];
}

export interface NotExpr {
  readonly op: 'not';
  readonly operand: Expr;
}

/**
 * Union of all expression nodes.
 */
export type Expr =
  | ComparisonExpr
  | SetExpr
  | TextExpr
  | NullExpr
  | BetweenExpr
  | AndExpr
  | OrExpr
  | NotExpr;

/**
 * Leaf nodes (those that reference a field).
 */
export type LeafExpr = ComparisonExpr | SetExpr | TextExpr | NullExpr | BetweenExpr;

export function isLeaf(expr: Expr): expr is LeafExpr {
  return expr.op !== 'and' && expr.op !== 'or' && expr.op !== 'not';
}

function freezeRef(ref: FieldRef): FieldRef {
  return Object.freeze(ref.type !== undefined ? { name: ref.name, type: ref.type } : { name: ref.name });
}

export function comparison(op: ComparisonOp, ref: FieldRef, value: FieldValue | null): ComparisonExpr {
  return Object.freeze({ op, field: freezeRef(ref), value });
}

export function membership(op: SetOp, ref: FieldRef, values: readonly FieldValue[]): SetExpr {
  return Object.freeze({ op, field: freezeRef(ref), values: Object.freeze([...values]) });
}

export function text(op: TextOp, ref: FieldRef, value: string): TextExpr {
  return Object.freeze({ op, field: freezeRef(ref), value });
}

export function nullCheck(op: NullOp, ref: FieldRef): NullExpr {
  return Object.freeze({ op, field: freezeRef(ref) });
}

export function range(ref: FieldRef, lower: FieldValue, upper: FieldValue): BetweenExpr {
  return Object.freeze({ op: 'between', field: freezeRef(ref), lower, upper });
}

/**
 * Conjunction. Operand order is preserved; a single operand is returned as is.
 */
export function and(...operands: Expr[]): Expr {
  const [first] = operands;
  if (first === undefined) {
    throw new TypeError('and() requires at least one operand');
  }
  if (operands.length === 1) {
    return first;
  }
  return Object.freeze({ op: 'and', operands: Object.freeze([...operands]) });
}

/**
 * Disjunction. Operand order is preserved; a single operand is returned as is.
 */
export function or(...operands: Expr[]): Expr {
  const [first] = operands;
  if (first === undefined) {
    throw new TypeError('or() requires at least one operand');
  }
  if (operands.length === 1) {
    return first;
  }
  return Object.freeze({ op: 'or', operands: Object.freeze([...operands]) });
}

export function not(operand: Expr): Expr {
  return Object.freeze({ op: 'not', operand });
}

const OP_SYMBOLS: Record<ComparisonOp, string> = {
  eq: '==',
  ne: '!=',
  gt: '>',
  gte: '>=',
  lt: '<',
  lte: '<=',
};

function describeValue(value: FieldValue | null): string {
  if (value === null) return 'null';
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'string') return JSON.stringify(value);
  return String(value);
}

/**
 * Render an expression as a deterministic human-readable string.
 *
 * @example
 * describeExpr(and(field('source').eq('edinet'), field('isZip').eq(true)))
 * // (source == "edinet" AND isZip == true)
 */
export function describeExpr(expr: Expr): string {
  switch (expr.op) {
    case 'eq':
    case 'ne':
    case 'gt':
    case 'gte':
    case 'lt':
    case 'lte':
      return `${expr.field.name} ${OP_SYMBOLS[expr.op]} ${describeValue(expr.value)}`;
    case 'in':
    case 'notIn':
      return `${expr.field.name} ${expr.op === 'in' ? 'IN' : 'NOT IN'} [${expr.values.map(describeValue).join(', ')}]`;
    case 'contains':
    case 'startsWith':
    case 'endsWith':
      return `${expr.field.name} ${expr.op} ${describeValue(expr.value)}`;
    case 'isNull':
      return `${expr.field.name} IS NULL`;
    case 'isNotNull':
      return `${expr.field.name} IS NOT NULL`;
    case 'between':
      return `${expr.field.name} BETWEEN ${describeValue(expr.lower)} AND ${describeValue(expr.upper)}`;
    case 'and':
      return `(${expr.operands.map(describeExpr).join(' AND ')})`;
    case 'or':
      return `(${expr.operands.map(describeExpr).join(' OR ')})`;
    case 'not':
      return `NOT ${describeExpr(expr.operand)}`;
  }
}
