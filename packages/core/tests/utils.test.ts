import { describe, expect, it } from 'vitest';
import {
  compareValues,
  containsText,
  formatZodError,
  isPlainObject,
  recordTypeDefinitionSchema,
  toFieldMap,
  valuesEqual,
} from '../src/index.js';

describe('valuesEqual', () => {
  it('compares scalars strictly, with NaN equal to itself', () => {
    expect(valuesEqual(Number.NaN, Number.NaN)).toBe(true);
    expect(valuesEqual('1', 1)).toBe(false);
    expect(valuesEqual(null, undefined)).toBe(false);
    expect(valuesEqual(null, null)).toBe(true);
  });

  it('compares dates by timestamp', () => {
    expect(valuesEqual(new Date(1), new Date(1))).toBe(true);
    expect(valuesEqual(new Date(1), new Date(2))).toBe(false);
    expect(valuesEqual(new Date(1), 1)).toBe(false);
  });

  it('compares arrays and objects structurally', () => {
    expect(valuesEqual([1, [2]], [1, [2]])).toBe(true);
    expect(valuesEqual([1, 2], [2, 1])).toBe(false);
    expect(valuesEqual({ a: 1, b: { c: 2 } }, { b: { c: 2 }, a: 1 })).toBe(true);
    expect(valuesEqual({ a: 1 }, { a: 1, b: undefined })).toBe(false);
    expect(valuesEqual([], {})).toBe(false);
  });
});

describe('valuesEqual on collections', () => {
  it('compares set members', () => {
    expect(valuesEqual(new Set(['x']), new Set(['x']))).toBe(true);
    expect(valuesEqual(new Set(['x']), new Set(['y']))).toBe(false);
    expect(valuesEqual(new Set([{ a: 1 }]), new Set([{ a: 1 }]))).toBe(true);
    expect(valuesEqual(new Set([1, 2]), new Set([1]))).toBe(false);
  });

  it('compares map entries', () => {
    expect(valuesEqual(new Map([['k', 1]]), new Map([['k', 1]]))).toBe(true);
    expect(valuesEqual(new Map([['k', 1]]), new Map([['k', 2]]))).toBe(false);
    expect(valuesEqual(new Map([['k', 1]]), new Map([['j', 1]]))).toBe(false);
    expect(valuesEqual(new Map(), {})).toBe(false);
    expect(valuesEqual(new Set(), new Map())).toBe(false);
  });

  it('treats objects with different prototypes as unequal', () => {
    class Point {
      x = 1;
    }

    expect(valuesEqual(new Point(), { x: 1 })).toBe(false);
    expect(valuesEqual(new Point(), new Point())).toBe(true);
  });
});

describe('compareValues', () => {
  it('sorts absent values first', () => {
    expect([3, null, 1].sort(compareValues)).toEqual([null, 1, 3]);
    expect(compareValues(undefined, 0)).toBeLessThan(0);
    expect(compareValues(null, undefined)).toBe(0);
  });

  it('orders numbers, dates, booleans and strings', () => {
    expect(compareValues(2, 10)).toBeLessThan(0);
    expect(compareValues(new Date(5), new Date(1))).toBeGreaterThan(0);
    expect(compareValues(false, true)).toBeLessThan(0);
    expect(compareValues('b', 'a')).toBeGreaterThan(0);
    expect(compareValues('a', 'a')).toBe(0);
  });
});

describe('containsText', () => {
  it('matches substrings ignoring case', () => {
    expect(containsText('Hello', 'ELL')).toBe(true);
    expect(containsText(42, '4')).toBe(true);
    expect(containsText('Hello', 'xyz')).toBe(false);
  });

  it('never matches absent or empty values', () => {
    expect(containsText(null, '')).toBe(false);
    expect(containsText('', '')).toBe(false);
  });
});

describe('record utilities', () => {
  it('recognises plain objects', () => {
    expect(isPlainObject({})).toBe(true);
    expect(isPlainObject(Object.create(null))).toBe(true);
    expect(isPlainObject([])).toBe(false);
    expect(isPlainObject(new Date())).toBe(false);
    expect(isPlainObject(new (class Point {})())).toBe(false);
  });

  it('builds field maps from objects, maps and entries', () => {
    function* entries(): Generator<[string, unknown]> {
      yield ['k', 1];
      yield ['j', 2];
    }

    expect(Array.from(toFieldMap({ b: 1, a: 2 }).keys())).toEqual(['b', 'a']);
    expect(toFieldMap(new Map([['x', 1]])).get('x')).toBe(1);
    expect(Object.fromEntries(toFieldMap(entries()))).toEqual({ k: 1, j: 2 });
    expect(toFieldMap(null).size).toBe(0);
  });
});

describe('record type definition schema', () => {
  const field = { name: 'a', kind: 'string', nullable: false, readable: true, writable: true };

  it('accepts a valid definition', () => {
    expect(recordTypeDefinitionSchema.safeParse({ name: 'T', fields: [field] }).success).toBe(true);
  });

  it('reports duplicate field names', () => {
    const result = recordTypeDefinitionSchema.safeParse({ name: 'T', fields: [field, field] });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatZodError(result.error, 'record type')).toBe(
        'Invalid record type:\n- fields.1.name: Duplicate field name: a'
      );
    }
  });

  it('reports unknown kinds', () => {
    const result = recordTypeDefinitionSchema.safeParse({ name: 'T', fields: [{ ...field, kind: 'money' }] });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual(['fields', 0, 'kind']);
    }
  });
});
