/**
 * Error taxonomy for filing-vault.
 *
 * Every error raised by this package derives from FilingVaultError and
 * carries a human-readable message plus an optional structured `details`
 * map suitable for logging. Not-found is never an error at the Collection
 * level: read operations return null instead.
 */

/**
 * Base class for all filing-vault errors.
 */
export class FilingVaultError extends Error {
  readonly details: Record<string, unknown>;

  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = new.target.name;
    this.details = details;
  }
}

// ============================================================================
// Field-level errors
// ============================================================================

/**
 * Base class for violations of a single declared field.
 */
export abstract class FieldError extends FilingVaultError {
  /** Field names involved in the violation */
  abstract readonly fields: readonly string[];
}

/**
 * One or more required fields are absent or null.
 */
export class RequiredFieldError extends FieldError {
  readonly fields: readonly string[];

  constructor(fields: readonly string[]) {
    const list = fields.map((f) => `'${f}'`).join(', ');
    super(`Required field${fields.length === 1 ? '' : 's'} missing or null: ${list}`, {
      fields: [...fields],
    });
    this.fields = [...fields];
  }
}

/**
 * A value disagrees with the declared type (or fixed value) of a field.
 */
export class FieldValidationError extends FieldError {
  readonly field: string;
  readonly expected: string;
  readonly actual: string;

  constructor(field: string, expected: string, actual: string) {
    super(`Field '${field}': expected ${expected}, got ${actual}`, { field, expected, actual });
    this.field = field;
    this.expected = expected;
    this.actual = actual;
  }

  get fields(): readonly string[] {
    return [this.field];
  }
}

/**
 * An immutable field that already holds a value was reassigned.
 */
export class FieldImmutableError extends FieldError {
  readonly field: string;
  readonly current: unknown;
  readonly attempted: unknown;

  constructor(field: string, current: unknown, attempted: unknown) {
    super(
      `Field '${field}' is immutable: current value ${formatValue(current)}, attempted ${formatValue(attempted)}`,
      { field, current, attempted }
    );
    this.field = field;
    this.current = current;
    this.attempted = attempted;
  }

  get fields(): readonly string[] {
    return [this.field];
  }
}

/**
 * Several field violations found while validating one filing.
 */
export class FilingValidationError extends FilingVaultError {
  readonly errors: readonly FieldError[];
  readonly fields: readonly string[];

  constructor(errors: readonly FieldError[]) {
    const fields = errors.flatMap((e) => e.fields);
    super(
      `Filing validation failed (${errors.length} violations)\n  ` +
        errors.map((e) => e.message).join('\n  '),
      { fields }
    );
    this.errors = [...errors];
    this.fields = fields;
  }
}

// ============================================================================
// Integrity and resolution errors
// ============================================================================

/**
 * Payload bytes do not hash to the checksum declared in the filing metadata.
 */
export class ChecksumMismatchError extends FilingVaultError {
  readonly filingId: string;
  readonly expected: string;
  readonly actual: string;

  constructor(filingId: string, expected: string, actual: string) {
    super(
      `Checksum mismatch for filing '${filingId}': expected ${expected}, actual ${actual}`,
      { filingId, expected, actual }
    );
    this.filingId = filingId;
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * A storage key could not be derived from filing metadata.
 */
export class LocatorPathResolutionError extends FilingVaultError {
  readonly filingId: string;
  readonly reason: string;

  constructor(filingId: string, reason: string, fields: readonly string[] = []) {
    super(`Cannot resolve storage key for filing '${filingId}': ${reason}`, {
      filingId,
      reason,
      fields: [...fields],
    });
    this.filingId = filingId;
    this.reason = reason;
  }
}

// ============================================================================
// Storage errors
// ============================================================================

/**
 * A storage key is malformed or escapes the storage root.
 */
export class StorageKeyError extends FilingVaultError {
  readonly key: string;

  constructor(key: string, reason: string) {
    super(`Invalid storage key '${key}': ${reason}`, { key, reason });
    this.key = key;
  }
}

/**
 * No payload is stored under the requested key.
 */
export class StorageNotFoundError extends FilingVaultError {
  readonly key: string;

  constructor(key: string) {
    super(`No content stored under key '${key}'`, { key });
    this.key = key;
  }
}

// ============================================================================
// Catalog errors
// ============================================================================

/**
 * The catalog refused to evaluate a query expression.
 */
export class CatalogQueryError extends FilingVaultError {}

// ============================================================================
// Configuration errors
// ============================================================================

/**
 * Config validation error.
 */
export class ConfigValidationError extends FilingVaultError {
  readonly path: string;
  readonly value: unknown;

  constructor(message: string, path: string, value: unknown) {
    super(`Config validation error at '${path}': ${message}`, { path, value });
    this.path = path;
    this.value = value;
  }
}

function formatValue(value: unknown): string {
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === 'string') {
    return `'${value}'`;
  }
  return String(value);
}
