/**
 * FilingResolver: maps a source discriminator to a filing class.
 *
 * Lookups are case-insensitive and ignore surrounding whitespace, so a
 * record stored with source "EDGAR" resolves the "edgar" registration.
 * Unknown sources resolve to null; `reconstruct` then falls back to the
 * base Filing class and keeps unknown attributes as extras. The same
 * fallback applies when the registered class rejects the stored values,
 * e.g. a base Filing that was stored with source "edinet".
 */

import { FieldError, FilingValidationError } from '../core/errors.js';
import { componentLogger } from '../logging/logger.js';

import { Filing, filingFromDict } from './Filing.js';
import type { FilingClass } from './Filing.js';
import { EdinetFiling } from './EdinetFiling.js';
import { EdgarFiling } from './EdgarFiling.js';
import type { FilingValues } from './types.js';

const log = componentLogger('resolver');

function normalizeSource(source: string): string {
  return source.trim().toLowerCase();
}

export class FilingResolver {
  private readonly classes: Map<string, FilingClass> = new Map();

  /**
   * Register (or replace) the class for a source.
   */
  register(source: string, cls: FilingClass): this {
    const key = normalizeSource(source);
    if (key === '') {
      throw new TypeError('Cannot register a filing class for an empty source');
    }
    this.classes.set(key, cls);
    return this;
  }

  /**
   * Register a class under its fixed source.
   */
  registerClass(cls: FilingClass): this {
    if (cls.fixedSource === null) {
      throw new TypeError(`${cls.name} has no fixed source; use register(source, cls)`);
    }
    return this.register(cls.fixedSource, cls);
  }

  /**
   * Class registered for a source, or null. Never throws.
   */
  resolve(source: string | null | undefined): FilingClass | null {
    if (typeof source !== 'string') {
      return null;
    }
    return this.classes.get(normalizeSource(source)) ?? null;
  }

  has(source: string): boolean {
    return this.resolve(source) !== null;
  }

  /**
   * Registered sources, sorted.
   */
  sources(): string[] {
    return [...this.classes.keys()].sort();
  }

  /**
   * Registered classes in registration order.
   */
  classList(): FilingClass[] {
    return [...new Set(this.classes.values())];
  }

  /**
   * Rebuild a filing from its dictionary form, choosing the class by the
   * dictionary's `source`. Values the resolved class rejects are rebuilt
   * as a base Filing instead.
   */
  reconstruct(data: FilingValues): Filing {
    const source = data['source'];
    const cls = this.resolve(typeof source === 'string' ? source : null);
    if (cls === null) {
      return filingFromDict(Filing, data);
    }
    try {
      return filingFromDict(cls, data);
    } catch (err) {
      if (!(err instanceof FieldError || err instanceof FilingValidationError)) {
        throw err;
      }
      log.warn(
        { id: data['id'], source, filingClass: cls.name, err },
        'stored values do not fit the registered class; rebuilding as a base filing'
      );
      return filingFromDict(Filing, data);
    }
  }
}

/**
 * New resolver with the built-in EDINET and EDGAR classes registered.
 */
export function createDefaultResolver(): FilingResolver {
  return new FilingResolver().registerClass(EdinetFiling).registerClass(EdgarFiling);
}
