/**
 * EdinetFiling: filings from Japan's EDINET disclosure system.
 */

import { Field, extendFields } from './Field.js';
import type { FieldMap } from './Field.js';
import { Filing } from './Filing.js';
import type { FilingCore } from './Filing.js';

export const EDINET_SOURCE = 'edinet';

/**
 * Constructor input for EdinetFiling. `source` defaults to "edinet".
 */
export type EdinetFilingInit = FilingCore & {
  source?: string;
  /** EDINET filer code, e.g. "E02144" */
  edinetCode: string;
  /** Securities code of the listed issuer, e.g. "72030" */
  secCode: string;
  /** Japan Corporate Number */
  jcn: string;
  filerName: string;
  ordinanceCode: string;
  formCode: string;
  /** Document type code, e.g. "120" for an annual securities report */
  docTypeCode: string;
  docDescription: string;
  periodStart: Date;
  periodEnd: Date;
  submitDatetime: Date;
  /** Id of the document this one amends, if any */
  parentDocId?: string | null;
  [extra: string]: unknown;
};

export class EdinetFiling extends Filing {
  static override readonly fields: FieldMap = extendFields(Filing.fields, [
    new Field('edinetCode', { type: 'string', required: true, indexed: true }),
    new Field('secCode', { type: 'string', required: true, indexed: true }),
    new Field('jcn', { type: 'string', required: true }),
    new Field('filerName', { type: 'string', required: true }),
    new Field('ordinanceCode', { type: 'string', required: true }),
    new Field('formCode', { type: 'string', required: true }),
    new Field('docTypeCode', { type: 'string', required: true, indexed: true }),
    new Field('docDescription', { type: 'string', required: true }),
    new Field('periodStart', { type: 'date', required: true }),
    new Field('periodEnd', { type: 'date', required: true, indexed: true }),
    new Field('submitDatetime', { type: 'date', required: true, indexed: true }),
    new Field('parentDocId', { type: 'string' }),
  ]);

  static override readonly fixedSource: string | null = EDINET_SOURCE;

  constructor(init: EdinetFilingInit) {
    super({ ...init, source: init.source ?? EDINET_SOURCE });
  }

  get edinetCode(): string {
    return this.requireString('edinetCode');
  }

  get secCode(): string {
    return this.requireString('secCode');
  }

  get jcn(): string {
    return this.requireString('jcn');
  }

  get filerName(): string {
    return this.requireString('filerName');
  }

  get ordinanceCode(): string {
    return this.requireString('ordinanceCode');
  }

  get formCode(): string {
    return this.requireString('formCode');
  }

  get docTypeCode(): string {
    return this.requireString('docTypeCode');
  }

  get docDescription(): string {
    return this.requireString('docDescription');
  }

  get periodStart(): Date {
    return this.requireDate('periodStart');
  }

  get periodEnd(): Date {
    return this.requireDate('periodEnd');
  }

  get submitDatetime(): Date {
    return this.requireDate('submitDatetime');
  }

  get parentDocId(): string | null {
    return this.optionalString('parentDocId');
  }
}
