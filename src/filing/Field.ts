/**
 * Field: declaration of one filing attribute and a builder for Expr leaves.
 *
 * The same class serves two roles: filing classes declare their schema as a
 * map of Fields, and callers use Fields (or the `field()` shortcut) to build
 * search expressions:
 *
 *   EdinetFiling.fields.secCode.eq('7203')
 *   field('source').in(['edinet', 'edgar'])
 */

import type { FieldType, FieldValue } from './types.js';
import { describeType } from './types.js';
import type { Expr, FieldRef } from './Expr.js';
import { comparison, membership, text, nullCheck, range } from './Expr.js';

/**
 * Options for declaring a field.
 */
export interface FieldOptions {
  /** Declared value type (unchecked when omitted) */
  type?: FieldType;
  /** Must be present and non-null at construction */
  required?: boolean;
  /** Cannot be reassigned once it holds a value */
  immutable?: boolean;
  /** Queryable by the Catalog */
  indexed?: boolean;
  /** Default value, or factory evaluated per construction */
  default?: FieldValue | null | (() => FieldValue | null);
  /** The only value this field accepts */
  fixed?: FieldValue;
  /** Human-readable description */
  description?: string;
}

export class Field implements FieldRef {
  readonly name: string;
  readonly type?: FieldType;
  readonly required: boolean;
  readonly immutable: boolean;
  readonly indexed: boolean;
  readonly fixed?: FieldValue;
  readonly description?: string;
  private readonly defaultSource: FieldValue | null | (() => FieldValue | null);

  constructor(name: string, options: FieldOptions = {}) {
    this.name = name;
    if (options.type !== undefined) this.type = options.type;
    if (options.fixed !== undefined) this.fixed = options.fixed;
    if (options.description !== undefined) this.description = options.description;
    this.required = options.required ?? false;
    this.immutable = options.immutable ?? false;
    this.indexed = options.indexed ?? false;
    this.defaultSource = options.default ?? null;
  }

  /**
   * Value used when the field is absent from constructor input.
   */
  defaultValue(): FieldValue | null {
    return typeof this.defaultSource === 'function' ? this.defaultSource() : this.defaultSource;
  }

  /**
   * Check a non-null value against the declared type.
   *
   * @returns null when the value conforms, else a description of the actual type
   */
  checkType(value: unknown): string | null {
    const actual = describeType(value);
    if (this.type === undefined) {
      return null;
    }
    if (this.type === 'number') {
      return typeof value === 'number' && Number.isFinite(value) ? null : actual;
    }
    return actual === this.type ? null : actual;
  }

  /**
   * Check a value against the fixed value, if any.
   */
  matchesFixed(value: unknown): boolean {
    if (this.fixed === undefined) {
      return true;
    }
    if (this.fixed instanceof Date) {
      return value instanceof Date && value.getTime() === this.fixed.getTime();
    }
    return value === this.fixed;
  }

  /**
   * Plain reference used inside expressions.
   */
  ref(): FieldRef {
    return this.type !== undefined ? { name: this.name, type: this.type } : { name: this.name };
  }

  eq(value: FieldValue | null): Expr {
    return comparison('eq', this.ref(), value);
  }

  ne(value: FieldValue | null): Expr {
    return comparison('ne', this.ref(), value);
  }

  gt(value: FieldValue): Expr {
    return comparison('gt', this.ref(), value);
  }

  gte(value: FieldValue): Expr {
    return comparison('gte', this.ref(), value);
  }

  lt(value: FieldValue): Expr {
    return comparison('lt', this.ref(), value);
  }

  lte(value: FieldValue): Expr {
    return comparison('lte', this.ref(), value);
  }

  in(values: readonly FieldValue[]): Expr {
    return membership('in', this.ref(), values);
  }

  notIn(values: readonly FieldValue[]): Expr {
    return membership('notIn', this.ref(), values);
  }

  contains(value: string): Expr {
    return text('contains', this.ref(), value);
  }

  startsWith(value: string): Expr {
    return text('startsWith', this.ref(), value);
  }

  endsWith(value: string): Expr {
    return text('endsWith', this.ref(), value);
  }

  isNull(): Expr {
    return nullCheck('isNull', this.ref());
  }

  isNotNull(): Expr {
    return nullCheck('isNotNull', this.ref());
  }

  between(lower: FieldValue, upper: FieldValue): Expr {
    return range(this.ref(), lower, upper);
  }

  toString(): string {
    return this.type !== undefined ? `Field(${this.name}: ${this.type})` : `Field(${this.name})`;
  }
}

/**
 * Field reference without a schema declaration.
 */
export function field(name: string, type?: FieldType): Field {
  return new Field(name, type !== undefined ? { type } : {});
}

/**
 * Field map of a filing class, keyed by field name.
 */
export type FieldMap = Readonly<Record<string, Field>>;

/**
 * Merge field declarations over a parent map. A redeclared name replaces the
 * parent's declaration in place; new names are appended.
 */
export function extendFields(parent: FieldMap, fields: readonly Field[]): FieldMap {
  const merged: Record<string, Field> = { ...parent };
  for (const f of fields) {
    merged[f.name] = f;
  }
  return Object.freeze(merged);
}
