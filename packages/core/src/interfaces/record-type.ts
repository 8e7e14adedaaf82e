/**
 * Record Type Interface
 *
 * The capability table every record type exposes to the accessor. Field
 * resolution goes through this table only; the accessor never inspects a
 * record's prototype or constructor.
 */

import type { FieldDescriptor } from '../types/index.js';

/**
 * Resolved field: its descriptor plus the functions that read and write it
 */
export interface FieldAccessor<TRecord extends object = object> extends FieldDescriptor {
  /**
   * Read the raw field value
   */
  get(record: TRecord): unknown;

  /**
   * Store an already coerced value
   * @throws when the underlying record refuses the write (frozen, throwing setter)
   */
  set(record: TRecord, value: unknown): void;
}

export interface RecordType<TRecord extends object = object> {
  /** Type name used in logs and errors */
  readonly name: string;

  /** Fields in declaration order */
  readonly fields: readonly FieldAccessor<TRecord>[];

  /**
   * Resolve a field by name
   */
  field(name: string): FieldAccessor<TRecord> | undefined;

  /**
   * Build a new zero-initialized instance
   * @throws if the type cannot be default-constructed
   */
  create(): TRecord;

  /**
   * Whether a value already is an instance of this type
   */
  is(value: unknown): value is TRecord;
}
