/**
 * RecordAccessor
 *
 * Reads, writes, copies and compares record fields by name. Every operation
 * resolves names through the record's type table at call time, and no data
 * problem escapes as an exception: misses read as absent (or the expected
 * kind's zero value) and failed writes report `false`.
 */

import {
  toFieldMap,
  valuesEqual,
  wrapError,
  type FieldDescriptor,
  type FieldKind,
  type FieldMap,
  type FieldMapInput,
  type KindValue,
  type RecordType,
  type ScalarKind,
} from '@recordkit/core';
import { Coercer, zeroValue } from './coercion.js';
import { resolveCoercionOptions, type AccessorConfig } from './config.js';
import { Logger } from './logger.js';
import type { ReadOutcome, WriteOutcome } from './outcomes.js';
import { typeOf } from './record-type.js';
import { mappingTranscoder, type MappingTranscoder, type TranscodeContext } from './transcoder.js';

export interface AccessorOptions {
  /** Coercion switches and logging settings */
  config?: AccessorConfig;
  /** Logger for swallowed failures (default: built from `config.logging`) */
  logger?: Logger;
  /** Round-trip used by `convertTo` (default: strict mapping transcoder) */
  transcoder?: MappingTranscoder;
}

type MaybeRecord = object | null | undefined;
type FieldNames = readonly string[] | null | undefined;

function isRecord(value: unknown): value is object {
  return typeof value === 'object' && value !== null;
}

export class RecordAccessor implements TranscodeContext {
  readonly config: AccessorConfig;
  private readonly coercer: Coercer;
  private readonly logger: Logger;
  private readonly transcoder: MappingTranscoder;

  constructor(options: AccessorOptions = {}) {
    this.config = options.config ?? {};
    this.coercer = new Coercer(resolveCoercionOptions(this.config));
    const base =
      options.logger ??
      new Logger({
        level: this.config.logging?.level,
        format: this.config.logging?.format,
      });
    this.logger = base.child({ component: 'accessor' });
    this.transcoder = options.transcoder ?? mappingTranscoder;
  }

  /**
   * Descriptors of every field the record's type exposes, in declaration order
   */
  describeFields(record: MaybeRecord): FieldDescriptor[] {
    if (!isRecord(record)) return [];
    return typeOf(record).fields.map((field) => ({
      name: field.name,
      kind: field.kind,
      nullable: field.nullable,
      readable: field.readable,
      writable: field.writable,
      ...(field.description !== undefined ? { description: field.description } : {}),
    }));
  }

  /**
   * Whether the record's type declares the field, whatever its value
   */
  hasField(record: MaybeRecord, name: string): boolean {
    return isRecord(record) && typeOf(record).field(name) !== undefined;
  }

  /**
   * Read a field and report exactly why a read did not produce a value
   */
  readField(record: MaybeRecord, name: string, kind?: FieldKind): ReadOutcome {
    const raw = this.readRaw(record, name);
    if (raw.status !== 'ok' || kind === undefined || raw.value == null) {
      return raw;
    }

    const coerced = this.coercer.coerce(raw.value, kind);
    if (coerced.ok) {
      return { status: 'ok', value: coerced.value };
    }
    this.logger.debug('Field value does not convert to the expected kind', {
      recordType: this.typeName(record),
      field: name,
      kind,
      issue: coerced.issue,
    });
    return { status: 'coercion_failed', value: raw.value, kind, issue: coerced.issue };
  }

  /**
   * Write a field and report exactly why a write did not happen
   */
  writeField(record: MaybeRecord, name: string, value: unknown): WriteOutcome {
    if (!isRecord(record)) {
      return { status: 'unresolved', reason: 'no_record' };
    }

    const type = typeOf(record);
    const field = type.field(name);
    if (!field) {
      this.logger.debug('Write to unknown field ignored', { recordType: type.name, field: name });
      return { status: 'unresolved', reason: 'unknown_field' };
    }
    if (!field.writable) {
      this.logger.debug('Write to read-only field ignored', { recordType: type.name, field: name });
      return { status: 'unresolved', reason: 'read_only' };
    }

    const coerced = this.coercer.coerceForField(value, field);
    if (!coerced.ok) {
      this.logger.debug('Value rejected by field kind', {
        recordType: type.name,
        field: name,
        kind: field.kind,
        issue: coerced.issue,
      });
      return { status: 'coercion_failed', value, kind: field.kind, issue: coerced.issue };
    }

    try {
      field.set(record, coerced.value);
    } catch (err) {
      const error = wrapError(err, 'UNKNOWN', { recordType: type.name, field: name });
      this.logger.debug('Field setter failed', { recordType: type.name, field: name, error });
      return { status: 'rejected', error };
    }
    return { status: 'written', value: coerced.value };
  }

  /**
   * Read a field by name. Misses, unreadable fields and failed conversions all
   * read as undefined, or as the zero value of `kind` when one is given, so a
   * missing field and a field holding the zero value look the same.
   */
  getField(record: MaybeRecord, name: string): unknown;
  getField<K extends FieldKind>(record: MaybeRecord, name: string, kind: K): KindValue<K>;
  getField(record: MaybeRecord, name: string, kind?: FieldKind): unknown {
    const raw = this.readRaw(record, name);
    if (kind === undefined) {
      return raw.status === 'ok' ? raw.value : undefined;
    }
    if (raw.status !== 'ok' || raw.value == null) {
      return zeroValue(kind);
    }
    const coerced = this.coercer.coerce(raw.value, kind);
    return coerced.ok ? coerced.value : zeroValue(kind);
  }

  /**
   * Write a field by name, converting the value to the field's kind.
   * Returns true only when the field was updated.
   */
  setField(record: MaybeRecord, name: string, value: unknown): boolean {
    return this.writeField(record, name, value).status === 'written';
  }

  /**
   * Snapshot every readable field, in declaration order
   */
  toMapping(record: MaybeRecord): FieldMap {
    const mapping: FieldMap = new Map();
    if (!isRecord(record)) return mapping;

    for (const field of typeOf(record).fields) {
      if (!field.readable) continue;
      const outcome = this.readRaw(record, field.name);
      if (outcome.status === 'ok') {
        mapping.set(field.name, outcome.value);
      }
    }
    return mapping;
  }

  /**
   * Build a new record from a mapping. Entries that cannot be set leave the
   * field at its zero value.
   */
  fromMapping<TRecord extends object>(
    mapping: FieldMapInput | null | undefined,
    targetType: RecordType<TRecord>
  ): TRecord | undefined {
    if (mapping == null) return undefined;

    const target = this.construct(targetType);
    if (target === undefined) return undefined;

    for (const [name, value] of toFieldMap(mapping)) {
      this.writeField(target, name, value);
    }
    return target;
  }

  /**
   * Reinterpret a value as the target type: the value itself when it already
   * is one, otherwise a copy rebuilt through the transcoder.
   */
  convertTo<TRecord extends object>(source: unknown, targetType: RecordType<TRecord>): TRecord | undefined {
    if (source == null) return undefined;
    if (targetType.is(source)) return source;
    if (!isRecord(source)) {
      this.logger.debug('Only records convert to record types', {
        recordType: targetType.name,
        sourceType: typeof source,
      });
      return undefined;
    }

    try {
      const mapping = this.transcoder.encode(source, this);
      return mapping ? this.transcoder.decode(mapping, targetType, this) : undefined;
    } catch (err) {
      const error = wrapError(err, 'TRANSCODE_FAILED', { recordType: targetType.name });
      this.logger.warn('Conversion failed', { recordType: targetType.name, error });
      return undefined;
    }
  }

  /**
   * Convert to a scalar kind; absent or unconvertible input gives the zero value
   */
  convertToScalar<K extends ScalarKind>(source: unknown, kind: K): KindValue<K> {
    if (source == null) return zeroValue(kind);
    const coerced = this.coercer.coerce(source, kind);
    return coerced.ok ? coerced.value : zeroValue(kind);
  }

  /**
   * Default-construct an instance of a type; undefined when construction throws
   */
  construct<TRecord extends object>(type: RecordType<TRecord>): TRecord | undefined {
    try {
      return type.create();
    } catch (err) {
      const error = wrapError(err, 'CONSTRUCTION_FAILED', { recordType: type.name });
      this.logger.warn('Record type cannot be constructed', { recordType: type.name, error });
      return undefined;
    }
  }

  /**
   * Copy the named fields into a new record of the target type, in order.
   * Names missing on the source write an absent value, which non-nullable
   * target fields refuse and keep at zero.
   */
  copyFields<TRecord extends object>(
    source: MaybeRecord,
    targetType: RecordType<TRecord>,
    fieldNames: FieldNames
  ): TRecord | undefined {
    if (!isRecord(source) || !fieldNames || fieldNames.length === 0) return undefined;

    const target = this.construct(targetType);
    if (target === undefined) return undefined;

    for (const name of fieldNames) {
      this.writeField(target, name, this.getField(source, name));
    }
    return target;
  }

  /**
   * Copy every readable field of the source into a new record of the target type
   */
  copyAllFields<TRecord extends object>(
    source: MaybeRecord,
    targetType: RecordType<TRecord>
  ): TRecord | undefined {
    if (!isRecord(source)) return undefined;
    const names = typeOf(source)
      .fields.filter((field) => field.readable)
      .map((field) => field.name);
    return this.copyFields(source, targetType, names);
  }

  /**
   * Set each named field to null; fields that refuse null keep their value
   */
  clearFields(record: MaybeRecord, fieldNames: FieldNames): void {
    if (!isRecord(record) || !fieldNames) return;
    for (const name of fieldNames) {
      this.writeField(record, name, null);
    }
  }

  /**
   * Set each named field to its kind's zero value
   */
  resetFields(record: MaybeRecord, fieldNames: FieldNames): void {
    if (!isRecord(record) || !fieldNames) return;
    const type = typeOf(record);
    for (const name of fieldNames) {
      const field = type.field(name);
      if (!field) continue;
      this.writeField(record, name, zeroValue(field.kind));
    }
  }

  /**
   * Whether every named field holds deep-equal values on both records.
   * An empty name list compares equal.
   */
  fieldsEqual(a: MaybeRecord, b: MaybeRecord, fieldNames: FieldNames): boolean {
    if (!isRecord(a) || !isRecord(b) || !fieldNames) return false;
    return fieldNames.every((name) => valuesEqual(this.getField(a, name), this.getField(b, name)));
  }

  /**
   * Names of the fields whose values differ, in the order given
   */
  changedFields(original: MaybeRecord, current: MaybeRecord, fieldNames: FieldNames): string[] {
    if (!isRecord(original) || !isRecord(current) || !fieldNames) return [];
    return fieldNames.filter(
      (name) => !valuesEqual(this.getField(original, name), this.getField(current, name))
    );
  }

  private readRaw(record: MaybeRecord, name: string): ReadOutcome {
    if (!isRecord(record)) {
      return { status: 'unresolved', reason: 'no_record' };
    }

    const type = typeOf(record);
    const field = type.field(name);
    if (!field) {
      this.logger.debug('Read of unknown field', { recordType: type.name, field: name });
      return { status: 'unresolved', reason: 'unknown_field' };
    }
    if (!field.readable) {
      this.logger.debug('Read of write-only field', { recordType: type.name, field: name });
      return { status: 'unresolved', reason: 'not_readable' };
    }

    try {
      return { status: 'ok', value: field.get(record) };
    } catch (err) {
      const error = wrapError(err, 'FIELD_NOT_READABLE', { recordType: type.name, field: name });
      this.logger.debug('Field getter failed', { recordType: type.name, field: name, error });
      return { status: 'rejected', error };
    }
  }

  private typeName(record: MaybeRecord): string | undefined {
    return isRecord(record) ? typeOf(record).name : undefined;
  }
}

/**
 * Create an accessor with its own configuration, logger and transcoder
 */
export function createAccessor(options?: AccessorOptions): RecordAccessor {
  return new RecordAccessor(options);
}

/** Accessor with default settings, used by the free functions */
export const defaultAccessor = new RecordAccessor();
