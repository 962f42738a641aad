/**
 * EdgarFiling: filings from the SEC's EDGAR system.
 */

import { Field, extendFields } from './Field.js';
import type { FieldMap } from './Field.js';
import { Filing } from './Filing.js';
import type { FilingCore } from './Filing.js';

export const EDGAR_SOURCE = 'edgar';

/**
 * Constructor input for EdgarFiling. `source` defaults to "edgar".
 */
export type EdgarFilingInit = FilingCore & {
  source?: string;
  /** Central Index Key, zero-padded to 10 digits */
  cik: string;
  /** Accession number, e.g. "0000320193-23-000106" */
  accessionNumber: string;
  companyName: string;
  /** Form type, e.g. "10-K" */
  formType: string;
  filingDate: Date;
  periodOfReport?: Date | null;
  sicCode?: string | null;
  stateOfIncorporation?: string | null;
  /** MMDD, e.g. "0930" */
  fiscalYearEnd?: string | null;
  [extra: string]: unknown;
};

export class EdgarFiling extends Filing {
  static override readonly fields: FieldMap = extendFields(Filing.fields, [
    new Field('cik', { type: 'string', required: true, indexed: true }),
    new Field('accessionNumber', { type: 'string', required: true, indexed: true }),
    new Field('companyName', { type: 'string', required: true }),
    new Field('formType', { type: 'string', required: true, indexed: true }),
    new Field('filingDate', { type: 'date', required: true, indexed: true }),
    new Field('periodOfReport', { type: 'date' }),
    new Field('sicCode', { type: 'string' }),
    new Field('stateOfIncorporation', { type: 'string' }),
    new Field('fiscalYearEnd', { type: 'string' }),
  ]);

  static override readonly fixedSource: string | null = EDGAR_SOURCE;

  constructor(init: EdgarFilingInit) {
    super({ ...init, source: init.source ?? EDGAR_SOURCE });
  }

  get cik(): string {
    return this.requireString('cik');
  }

  get accessionNumber(): string {
    return this.requireString('accessionNumber');
  }

  get companyName(): string {
    return this.requireString('companyName');
  }

  get formType(): string {
    return this.requireString('formType');
  }

  get filingDate(): Date {
    return this.requireDate('filingDate');
  }

  get periodOfReport(): Date | null {
    return this.optionalDate('periodOfReport');
  }

  get sicCode(): string | null {
    return this.optionalString('sicCode');
  }

  get stateOfIncorporation(): string | null {
    return this.optionalString('stateOfIncorporation');
  }

  get fiscalYearEnd(): string | null {
    return this.optionalString('fiscalYearEnd');
  }
}
