/**
 * Collection helpers driven by field names
 *
 * Fields are resolved through the accessor, so these work on any record
 * shape. A field name the first item does not declare leaves the collection
 * as it is.
 */

import { compareValues, containsText, valuesEqual } from '@recordkit/core';
import { defaultAccessor, type RecordAccessor } from './accessor.js';

export type SortDirection = 'asc' | 'desc';

export const DEFAULT_PAGE_SIZE = 10;

function normalizePageSize(size: number): number {
  return Number.isFinite(size) && size >= 1 ? Math.floor(size) : DEFAULT_PAGE_SIZE;
}

function declares<T extends object>(items: readonly T[], name: string, accessor: RecordAccessor): boolean {
  const [first] = items;
  return first !== undefined && accessor.hasField(first, name);
}

export function isNullOrEmpty<T>(collection: Iterable<T> | null | undefined): boolean {
  if (collection == null) return true;
  return collection[Symbol.iterator]().next().done === true;
}

/**
 * Split into consecutive chunks; the last chunk may be shorter
 */
export function chunkBy<T>(items: readonly T[], size: number): T[][] {
  const chunkSize = normalizePageSize(size);
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += chunkSize) {
    chunks.push(items.slice(i, i + chunkSize));
  }
  return chunks;
}

/**
 * One page of items. Pages start at 1; a page below 1 reads as page 1 and a
 * size below 1 as the default page size.
 */
export function getPage<T>(items: readonly T[], page: number, size: number): T[] {
  const pageSize = normalizePageSize(size);
  const pageNumber = Number.isFinite(page) && page >= 1 ? Math.floor(page) : 1;
  const offset = (pageNumber - 1) * pageSize;
  return items.slice(offset, offset + pageSize);
}

export function getTotalPages(items: readonly unknown[], size: number): number {
  return Math.ceil(items.length / normalizePageSize(size));
}

/**
 * Stable sort by a field's value. Absent values sort first.
 */
export function orderByField<T extends object>(
  items: readonly T[],
  name: string,
  direction: SortDirection = 'asc',
  accessor: RecordAccessor = defaultAccessor
): T[] {
  if (!declares(items, name, accessor)) return [...items];

  const sign = direction === 'desc' ? -1 : 1;
  return items
    .map((item, index) => ({ item, index, key: accessor.getField(item, name) }))
    .sort((a, b) => sign * compareValues(a.key, b.key) || a.index - b.index)
    .map(({ item }) => item);
}

export function whereFieldEquals<T extends object>(
  items: readonly T[],
  name: string,
  value: unknown,
  accessor: RecordAccessor = defaultAccessor
): T[] {
  if (!declares(items, name, accessor)) return [...items];
  return items.filter((item) => valuesEqual(accessor.getField(item, name), value));
}

/**
 * Items whose field contains the text, ignoring case
 */
export function whereFieldContains<T extends object>(
  items: readonly T[],
  name: string,
  text: string,
  accessor: RecordAccessor = defaultAccessor
): T[] {
  if (!declares(items, name, accessor)) return [...items];
  return items.filter((item) => containsText(accessor.getField(item, name), text));
}

/**
 * Group items by a field's value. Groups are keyed by the first value seen of
 * each deep-equal class and keep encounter order.
 */
export function groupByField<T extends object>(
  items: readonly T[],
  name: string,
  accessor: RecordAccessor = defaultAccessor
): Map<unknown, T[]> {
  const groups = new Map<unknown, T[]>();
  if (!declares(items, name, accessor)) {
    if (items.length > 0) groups.set(undefined, [...items]);
    return groups;
  }

  for (const item of items) {
    const value = accessor.getField(item, name);
    let key: unknown = value;
    for (const existing of groups.keys()) {
      if (valuesEqual(existing, value)) {
        key = existing;
        break;
      }
    }
    const group = groups.get(key);
    if (group) {
      group.push(item);
    } else {
      groups.set(key, [item]);
    }
  }
  return groups;
}

/**
 * First item for each distinct field value
 */
export function distinctByField<T extends object>(
  items: readonly T[],
  name: string,
  accessor: RecordAccessor = defaultAccessor
): T[] {
  if (!declares(items, name, accessor)) return [...items];
  return Array.from(groupByField(items, name, accessor).values(), (group) => group[0]).filter(
    (item): item is T => item !== undefined
  );
}

function numericValues<T extends object>(
  items: readonly T[],
  name: string,
  accessor: RecordAccessor
): number[] {
  return items.map((item) => accessor.convertToScalar(accessor.getField(item, name), 'number'));
}

/**
 * Sum of a field; absent or non-numeric values count as 0
 */
export function sumByField<T extends object>(
  items: readonly T[],
  name: string,
  accessor: RecordAccessor = defaultAccessor
): number {
  if (!declares(items, name, accessor)) return 0;
  return numericValues(items, name, accessor).reduce((sum, n) => sum + n, 0);
}

export function averageByField<T extends object>(
  items: readonly T[],
  name: string,
  accessor: RecordAccessor = defaultAccessor
): number {
  if (!declares(items, name, accessor)) return 0;
  return sumByField(items, name, accessor) / items.length;
}

function extremeByField<T extends object>(
  items: readonly T[],
  name: string,
  sign: 1 | -1,
  accessor: RecordAccessor
): T | undefined {
  const [first] = items;
  if (first === undefined || !declares(items, name, accessor)) return first;

  let best = first;
  let bestValue = accessor.getField(first, name);
  for (const item of items.slice(1)) {
    const value = accessor.getField(item, name);
    if (sign * compareValues(value, bestValue) < 0) {
      best = item;
      bestValue = value;
    }
  }
  return best;
}

/**
 * Item with the smallest field value (first one on ties)
 */
export function minByField<T extends object>(
  items: readonly T[],
  name: string,
  accessor: RecordAccessor = defaultAccessor
): T | undefined {
  return extremeByField(items, name, 1, accessor);
}

/**
 * Item with the largest field value (first one on ties)
 */
export function maxByField<T extends object>(
  items: readonly T[],
  name: string,
  accessor: RecordAccessor = defaultAccessor
): T | undefined {
  return extremeByField(items, name, -1, accessor);
}
