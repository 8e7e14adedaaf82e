/**
 * Record types shared by the accessor and its callers
 */

/** Generic record type - a bag of named fields */
export type DataRecord = {
  [key: string]: unknown;
};

/**
 * Ordered snapshot of a record's readable fields.
 * Iteration order is the declaration order of the record's type.
 */
export type FieldMap = Map<string, unknown>;

/** Anything a field map can be built from */
export type FieldMapInput =
  | ReadonlyMap<string, unknown>
  | Iterable<readonly [string, unknown]>
  | DataRecord;
