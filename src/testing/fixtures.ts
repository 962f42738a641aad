/**
 * Shared test fixtures.
 */

import { EdinetFiling } from '../filing/EdinetFiling.js';
import type { EdinetFilingInit } from '../filing/EdinetFiling.js';
import { EdgarFiling } from '../filing/EdgarFiling.js';
import type { EdgarFilingInit } from '../filing/EdgarFiling.js';
import { sha256Hex } from '../filing/FilingId.js';

export const HELLO = Buffer.from('hello');
export const HELLO_SHA256 = '2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824';

export function edinetInit(overrides: Partial<EdinetFilingInit> = {}): EdinetFilingInit {
  return {
    id: 'edinet:S100TEST:abcd',
    name: 'S100TEST.xbrl',
    checksum: HELLO_SHA256,
    format: 'xbrl',
    isZip: false,
    createdAt: new Date('2024-06-20T06:00:00.000Z'),
    edinetCode: 'E99999',
    secCode: '99990',
    jcn: '1234567890123',
    filerName: 'Example Industries KK',
    ordinanceCode: '010',
    formCode: '030000',
    docTypeCode: '120',
    docDescription: 'Annual Securities Report',
    periodStart: new Date('2023-04-01T00:00:00.000Z'),
    periodEnd: new Date('2024-03-31T00:00:00.000Z'),
    submitDatetime: new Date('2024-06-20T06:00:00.000Z'),
    ...overrides,
  };
}

export function edgarInit(overrides: Partial<EdgarFilingInit> = {}): EdgarFilingInit {
  return {
    id: 'edgar:0000000001-24-000001:2cf24dba',
    name: 'example-10k.htm',
    checksum: HELLO_SHA256,
    format: 'htm',
    isZip: false,
    createdAt: new Date('2024-02-01T00:00:00.000Z'),
    cik: '0000000001',
    accessionNumber: '0000000001-24-000001',
    companyName: 'Example Corp',
    formType: '10-K',
    filingDate: new Date('2024-02-01T00:00:00.000Z'),
    periodOfReport: new Date('2023-12-31T00:00:00.000Z'),
    fiscalYearEnd: '1231',
    ...overrides,
  };
}

export function makeEdinet(overrides: Partial<EdinetFilingInit> = {}): EdinetFiling {
  return new EdinetFiling(edinetInit(overrides));
}

export function makeEdgar(overrides: Partial<EdgarFilingInit> = {}): EdgarFiling {
  return new EdgarFiling(edgarInit(overrides));
}

/**
 * EDINET filing whose checksum matches the given payload.
 */
export function edinetFor(content: string | Buffer, overrides: Partial<EdinetFilingInit> = {}): EdinetFiling {
  return makeEdinet({ checksum: sha256Hex(content), ...overrides });
}

/**
 * EDGAR filing whose checksum matches the given payload.
 */
export function edgarFor(content: string | Buffer, overrides: Partial<EdgarFilingInit> = {}): EdgarFiling {
  return makeEdgar({ checksum: sha256Hex(content), ...overrides });
}
