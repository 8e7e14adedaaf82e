/**
 * Utility functions for working with records
 */

import type { DataRecord, FieldMap, FieldMapInput } from '../types/index.js';

export function isPlainObject(value: unknown): value is DataRecord {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function isIterable(value: unknown): value is Iterable<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    Symbol.iterator in value &&
    typeof value[Symbol.iterator] === 'function'
  );
}

function isEntry(value: unknown): value is readonly [string, unknown] {
  return Array.isArray(value) && value.length === 2 && typeof value[0] === 'string';
}

/**
 * Normalise any accepted mapping shape into an ordered field map.
 * Entries that are not `[name, value]` pairs are dropped.
 */
export function toFieldMap(input: FieldMapInput | null | undefined): FieldMap {
  const map: FieldMap = new Map();
  if (input == null) {
    return map;
  }

  if (input instanceof Map) {
    for (const [key, value] of input) {
      if (typeof key === 'string') map.set(key, value);
    }
    return map;
  }

  if (isIterable(input)) {
    for (const entry of input) {
      if (isEntry(entry)) map.set(entry[0], entry[1]);
    }
    return map;
  }

  for (const [key, value] of Object.entries(input)) {
    map.set(key, value);
  }
  return map;
}
