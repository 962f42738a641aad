import { describe, it, expect } from 'vitest';

import { and, or, not, describeExpr, isLeaf } from './Expr.js';
import { field } from './Field.js';
import { EdinetFiling } from './EdinetFiling.js';

describe('Expr', () => {
  it('builds frozen comparison leaves', () => {
    const expr = field('source').eq('edinet');

    expect(expr).toEqual({ op: 'eq', field: { name: 'source' }, value: 'edinet' });
    expect(Object.isFrozen(expr)).toBe(true);
    expect(isLeaf(expr)).toBe(true);
  });

  it('carries the declared type of schema fields', () => {
    const expr = EdinetFiling.fields.periodEnd?.gte(new Date('2024-01-01T00:00:00.000Z'));

    expect(expr).toMatchObject({ op: 'gte', field: { name: 'periodEnd', type: 'date' } });
  });

  it('preserves operand order in combinators', () => {
    const a = field('a').eq(1);
    const b = field('b').eq(2);
    const c = field('c').eq(3);
    const expr = or(c, a, b);

    expect(expr).toEqual({ op: 'or', operands: [c, a, b] });
    expect(isLeaf(expr)).toBe(false);
  });

  it('returns a single operand unchanged', () => {
    const leaf = field('a').eq(1);

    expect(and(leaf)).toBe(leaf);
    expect(or(leaf)).toBe(leaf);
  });

  it('rejects empty combinators', () => {
    expect(() => and()).toThrow(TypeError);
    expect(() => or()).toThrow(TypeError);
  });

  it('copies membership values', () => {
    const values = ['edinet'];
    const expr = field('source').in(values);
    values.push('edgar');

    expect(expr).toEqual({ op: 'in', field: { name: 'source' }, values: ['edinet'] });
  });

  it('describes expressions deterministically', () => {
    const expr = and(
      field('source').eq('edinet'),
      or(field('isZip').eq(true), not(field('format').isNull())),
      field('createdAt').between(
        new Date('2024-01-01T00:00:00.000Z'),
        new Date('2024-12-31T00:00:00.000Z')
      ),
      field('secCode').in(['72030', '67580']),
      field('name').startsWith('S100')
    );

    expect(describeExpr(expr)).toBe(
      '(source == "edinet" AND (isZip == true OR NOT format IS NULL) AND ' +
        'createdAt BETWEEN 2024-01-01T00:00:00.000Z AND 2024-12-31T00:00:00.000Z AND ' +
        'secCode IN ["72030", "67580"] AND name startsWith "S100")'
    );
  });
});
