import { describe, it, expect } from 'vitest';

import { FilingResolver, createDefaultResolver } from './FilingResolver.js';
import { Filing } from './Filing.js';
import { EdinetFiling } from './EdinetFiling.js';
import { EdgarFiling } from './EdgarFiling.js';
import { HELLO_SHA256, makeEdgar, makeEdinet } from '../testing/fixtures.js';

describe('FilingResolver', () => {
  it('resolves the built-in sources by default', () => {
    const resolver = createDefaultResolver();

    expect(resolver.resolve('edinet')).toBe(EdinetFiling);
    expect(resolver.resolve('edgar')).toBe(EdgarFiling);
    expect(resolver.sources()).toEqual(['edgar', 'edinet']);
  });

  it('normalizes case and whitespace', () => {
    const resolver = createDefaultResolver();

    expect(resolver.resolve(' EDGAR ')).toBe(EdgarFiling);
    expect(resolver.has('Edinet')).toBe(true);
  });

  it('returns null for unknown or missing sources', () => {
    const resolver = createDefaultResolver();

    expect(resolver.resolve('companies-house')).toBeNull();
    expect(resolver.resolve(null)).toBeNull();
    expect(resolver.resolve(undefined)).toBeNull();
  });

  it('overwrites an existing registration', () => {
    const resolver = createDefaultResolver().register('edgar', Filing);

    expect(resolver.resolve('edgar')).toBe(Filing);
  });

  it('keeps separate resolvers independent', () => {
    const empty = new FilingResolver();
    createDefaultResolver();

    expect(empty.resolve('edinet')).toBeNull();
  });

  it('refuses classes without a fixed source', () => {
    expect(() => new FilingResolver().registerClass(Filing)).toThrow(TypeError);
  });

  it('reconstructs the registered subtype', () => {
    const original = makeEdinet();
    const restored = createDefaultResolver().reconstruct(original.toDict());

    expect(restored).toBeInstanceOf(EdinetFiling);
    expect(restored.equals(original)).toBe(true);
  });

  it('falls back to the base shape for unknown sources', () => {
    const dict = { ...makeEdgar().toDict(), source: 'archive' };
    const restored = new FilingResolver().reconstruct(dict);

    expect(restored.constructor).toBe(Filing);
    expect(restored.source).toBe('archive');
    expect(restored.get('cik')).toBe('0000000001');
    expect(restored.get('filingDate')).toBe('2024-02-01T00:00:00.000Z');
  });

  it('rebuilds values the registered class rejects as a base filing', () => {
    const base = new Filing({
      id: 'edgar:plain:2cf24dba',
      source: 'EDGAR',
      name: 'plain.htm',
      checksum: HELLO_SHA256,
      isZip: false,
      createdAt: new Date('2024-02-01T00:00:00.000Z'),
    });
    const restored = createDefaultResolver().reconstruct(base.toDict());

    expect(restored.constructor).toBe(Filing);
    expect(restored.equals(base)).toBe(true);
  });
});
