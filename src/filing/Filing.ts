/**
 * Filing: polymorphic metadata record for one disclosure document.
 *
 * A filing class declares its schema as a static `fields` map. Subclasses
 * extend the parent's map with `extendFields`, so base fields are never
 * removed. Construction validates every declared field and collects all
 * violations before throwing. Keys not declared by the class are kept as
 * opaque extra attributes and survive `toDict()` / `fromDict()`.
 */

import { isDeepStrictEqual } from 'node:util';
import {
  FieldError,
  FieldImmutableError,
  FieldValidationError,
  FilingValidationError,
  RequiredFieldError,
} from '../core/errors.js';
import { Field, extendFields } from './Field.js';
import type { FieldMap } from './Field.js';
import type { FieldValue, FilingDict, FilingValues } from './types.js';
import { describeType } from './types.js';

/**
 * Fields shared by every filing, whatever its source.
 */
export type FilingCore = {
  /** Globally unique id, conventionally `source:externalId:checksumPrefix` */
  id: string;
  /** Logical file name */
  name: string;
  /** Lowercase hex SHA-256 of the payload */
  checksum: string;
  /** Payload format such as "xbrl" or "pdf" */
  format?: string | null;
  /** Whether the payload is a zip archive */
  isZip: boolean;
  /** Defaults to construction time */
  createdAt?: Date;
};

/**
 * Constructor input for the base Filing.
 */
export type BaseFilingInit = FilingCore & {
  source: string;
  [extra: string]: unknown;
};

/**
 * Constructor-side view of a filing class. Used by the resolver and catalogs
 * to build instances of a class chosen at runtime.
 */
export type FilingClass<T extends Filing = Filing> = {
  new (init: FilingValues): T;
  readonly name: string;
  readonly fields: FieldMap;
  readonly fixedSource: string | null;
};

/**
 * Base filing record.
 */
export class Filing {
  static readonly fields: FieldMap = extendFields({}, [
    new Field('id', { type: 'string', required: true, immutable: true, indexed: true }),
    new Field('source', { type: 'string', required: true, immutable: true, indexed: true }),
    new Field('name', { type: 'string', required: true, immutable: true, indexed: true }),
    new Field('checksum', { type: 'string', required: true, immutable: true, indexed: true }),
    new Field('format', { type: 'string', indexed: true }),
    new Field('isZip', { type: 'boolean', required: true, indexed: true }),
    new Field('createdAt', {
      type: 'date',
      immutable: true,
      indexed: true,
      default: () => new Date(),
    }),
  ]);

  /** Source discriminator every instance of this class must carry (null: any) */
  static readonly fixedSource: string | null = null;

  private readonly values: Record<string, FieldValue | null>;
  private readonly extras: Record<string, unknown>;

  constructor(init: BaseFilingInit) {
    const cls = new.target;
    const { values, extras } = validateValues(cls.fields, cls.fixedSource, init);
    this.values = values;
    this.extras = extras;
  }

  // ==========================================================================
  // Typed accessors
  // ==========================================================================

  get id(): string {
    return this.requireString('id');
  }

  get source(): string {
    return this.requireString('source');
  }

  get name(): string {
    return this.requireString('name');
  }

  get checksum(): string {
    return this.requireString('checksum');
  }

  get format(): string | null {
    return this.optionalString('format');
  }

  get isZip(): boolean {
    return this.requireBoolean('isZip');
  }

  get createdAt(): Date {
    return this.requireDate('createdAt');
  }

  // ==========================================================================
  // Generic access
  // ==========================================================================

  /**
   * Field map of this instance's class.
   */
  get fields(): FieldMap {
    return this.filingClass().fields;
  }

  /**
   * Value of a declared field or extra attribute; null when absent.
   */
  get(name: string): unknown {
    if (name in this.values) {
      return this.values[name] ?? null;
    }
    return this.extras[name] ?? null;
  }

  /**
   * Assign a field. Declared fields are type-checked; an immutable field that
   * already holds a value cannot be reassigned. Undeclared names are stored
   * as extra attributes.
   */
  set(name: string, value: unknown): this {
    const decl = this.fields[name];
    if (decl === undefined) {
      this.extras[name] = value;
      return this;
    }

    const current = this.values[name] ?? null;
    if (decl.immutable && current !== null) {
      throw new FieldImmutableError(name, current, value);
    }

    if (value === null || value === undefined) {
      if (decl.required) {
        throw new RequiredFieldError([name]);
      }
      this.values[name] = null;
      return this;
    }

    const error = checkField(decl, value);
    if (error !== null) {
      throw error;
    }
    if (!isFieldValue(value)) {
      throw new FieldValidationError(name, decl.type ?? 'scalar', describeType(value));
    }
    this.values[name] = value;
    return this;
  }

  /**
   * Extra attributes not declared by this class.
   */
  getExtras(): Record<string, unknown> {
    return { ...this.extras };
  }

  /**
   * Values of every indexed field, keyed by field name.
   */
  getIndexedFields(): Record<string, FieldValue | null> {
    const result: Record<string, FieldValue | null> = {};
    for (const decl of Object.values(this.fields)) {
      if (decl.indexed) {
        result[decl.name] = this.values[decl.name] ?? null;
      }
    }
    return result;
  }

  /**
   * Names of the indexed fields declared by a filing class.
   */
  static indexedFieldNames(this: { readonly fields: FieldMap }): string[] {
    return Object.values(this.fields)
      .filter((f) => f.indexed)
      .map((f) => f.name);
  }

  // ==========================================================================
  // Serialization
  // ==========================================================================

  /**
   * Plain JSON-safe dictionary: declared fields in declaration order, then
   * extras. Dates become ISO-8601 strings.
   */
  toDict(): FilingDict {
    const result: FilingDict = {};
    for (const name of Object.keys(this.fields)) {
      result[name] = serializeValue(this.values[name] ?? null);
    }
    for (const [name, value] of Object.entries(this.extras)) {
      result[name] = serializeValue(value);
    }
    return result;
  }

  toJSON(): FilingDict {
    return this.toDict();
  }

  /**
   * Rebuild an instance from `toDict()` output. ISO strings in date fields
   * are parsed back to Dates; everything else goes through normal
   * construction and raises the same errors.
   */
  static fromDict<T extends Filing>(this: FilingClass<T>, data: FilingValues): T {
    return filingFromDict(this, data);
  }

  // ==========================================================================
  // Value semantics
  // ==========================================================================

  /**
   * Same class and same values (dates compared by instant).
   */
  equals(other: unknown): boolean {
    if (!(other instanceof Filing) || other.constructor !== this.constructor) {
      return false;
    }
    return isDeepStrictEqual(this.toDict(), other.toDict());
  }

  toString(): string {
    return `${this.filingClass().name}(id='${this.id}', source='${this.source}')`;
  }

  // ==========================================================================
  // Helpers for subclasses
  // ==========================================================================

  protected requireString(name: string): string {
    const value = this.values[name];
    if (typeof value !== 'string') {
      throw new FieldValidationError(name, 'string', describeType(value));
    }
    return value;
  }

  protected optionalString(name: string): string | null {
    const value = this.values[name] ?? null;
    if (value !== null && typeof value !== 'string') {
      throw new FieldValidationError(name, 'string', describeType(value));
    }
    return value;
  }

  protected requireBoolean(name: string): boolean {
    const value = this.values[name];
    if (typeof value !== 'boolean') {
      throw new FieldValidationError(name, 'boolean', describeType(value));
    }
    return value;
  }

  protected requireDate(name: string): Date {
    const value = this.values[name];
    if (!(value instanceof Date)) {
      throw new FieldValidationError(name, 'date', describeType(value));
    }
    return value;
  }

  protected optionalDate(name: string): Date | null {
    const value = this.values[name] ?? null;
    if (value !== null && !(value instanceof Date)) {
      throw new FieldValidationError(name, 'date', describeType(value));
    }
    return value;
  }

  private filingClass(): { readonly name: string; readonly fields: FieldMap } {
    const ctor: unknown = this.constructor;
    return isFilingClassLike(ctor) ? ctor : Filing;
  }
}

// ============================================================================
// Validation
// ============================================================================

function isFilingClassLike(value: unknown): value is { readonly name: string; readonly fields: FieldMap } {
  return typeof value === 'function' && 'fields' in value && typeof value.fields === 'object';
}

function isFieldValue(value: unknown): value is FieldValue {
  return (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    value instanceof Date
  );
}

function checkField(decl: Field, value: unknown): FieldError | null {
  const actual = decl.checkType(value);
  if (actual !== null) {
    return new FieldValidationError(decl.name, decl.type ?? 'scalar', actual);
  }
  if (!decl.matchesFixed(value)) {
    return new FieldValidationError(
      decl.name,
      describeFixed(decl.fixed),
      typeof value === 'string' ? `'${value}'` : String(value)
    );
  }
  return null;
}

function describeFixed(value: FieldValue | undefined): string {
  if (value instanceof Date) return value.toISOString();
  return typeof value === 'string' ? `'${value}'` : String(value);
}

/**
 * Validate constructor input against a field map.
 *
 * All missing required fields are reported as one RequiredFieldError. A single
 * violation is thrown as is; several are wrapped in FilingValidationError.
 */
function validateValues(
  fields: FieldMap,
  fixedSource: string | null,
  init: FilingValues
): { values: Record<string, FieldValue | null>; extras: Record<string, unknown> } {
  const values: Record<string, FieldValue | null> = {};
  const extras: Record<string, unknown> = {};
  const missing: string[] = [];
  const errors: FieldError[] = [];

  for (const decl of Object.values(fields)) {
    const raw = init[decl.name];
    const value = raw === undefined ? decl.defaultValue() : raw;

    if (value === null) {
      if (decl.required) {
        missing.push(decl.name);
      }
      values[decl.name] = null;
      continue;
    }

    const error = checkField(decl, value);
    if (error !== null) {
      errors.push(error);
      continue;
    }
    if (!isFieldValue(value)) {
      errors.push(new FieldValidationError(decl.name, 'scalar', describeType(value)));
      continue;
    }
    values[decl.name] = value;
  }

  if (fixedSource !== null) {
    const source = values['source'];
    if (typeof source === 'string' && source !== fixedSource) {
      errors.push(new FieldValidationError('source', `'${fixedSource}'`, `'${source}'`));
    }
  }

  for (const [key, value] of Object.entries(init)) {
    if (!(key in fields) && value !== undefined) {
      extras[key] = value;
    }
  }

  if (missing.length > 0) {
    errors.unshift(new RequiredFieldError(missing));
  }
  const [first] = errors;
  if (first !== undefined && errors.length === 1) {
    throw first;
  }
  if (errors.length > 1) {
    throw new FilingValidationError(errors);
  }

  return { values, extras };
}

// ============================================================================
// Serialization helpers
// ============================================================================

/**
 * `fromDict` for a class chosen at runtime.
 */
export function filingFromDict<T extends Filing>(cls: FilingClass<T>, data: FilingValues): T {
  return new cls(parseDates(cls.fields, data));
}

function serializeValue(value: unknown): unknown {
  return value instanceof Date ? value.toISOString() : value;
}

function parseDates(fields: FieldMap, data: FilingValues): FilingValues {
  const result: FilingValues = { ...data };
  for (const decl of Object.values(fields)) {
    if (decl.type !== 'date') continue;
    const raw = data[decl.name];
    if (typeof raw === 'string') {
      const parsed = new Date(raw);
      // Unparseable strings stay as strings and fail type validation.
      if (!Number.isNaN(parsed.getTime())) {
        result[decl.name] = parsed;
      }
    }
  }
  return result;
}
