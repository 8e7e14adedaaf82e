/**
 * @recordkit/accessor
 *
 * Dynamic field access, record conversion and change detection over record
 * types described by capability tables
 */

import type {
  FieldDescriptor,
  FieldKind,
  FieldMap,
  FieldMapInput,
  KindValue,
  RecordType,
  ScalarKind,
} from '@recordkit/core';
import { defaultAccessor } from './accessor.js';
import type { ReadOutcome, WriteOutcome } from './outcomes.js';

// Accessor
export { RecordAccessor, createAccessor, defaultAccessor } from './accessor.js';
export type { AccessorOptions } from './accessor.js';
export type { ReadOutcome, WriteOutcome, ReadMissReason, WriteMissReason } from './outcomes.js';

// Record types
export {
  defineRecordType,
  inferRecordType,
  bindRecordType,
  boundRecordType,
  typeOf,
} from './record-type.js';
export type { FieldSpec, RecordTypeDefinition } from './record-type.js';

// Coercion
export { Coercer, zeroValue } from './coercion.js';
export type { CoercionResult } from './coercion.js';

// Transcoders
export {
  createMappingTranscoder,
  createJsonTranscoder,
  mappingTranscoder,
  jsonTranscoder,
} from './transcoder.js';
export type { MappingTranscoder, MappingTranscoderOptions, TranscodeContext } from './transcoder.js';

// Collections
export {
  DEFAULT_PAGE_SIZE,
  isNullOrEmpty,
  chunkBy,
  getPage,
  getTotalPages,
  orderByField,
  whereFieldEquals,
  whereFieldContains,
  groupByField,
  distinctByField,
  sumByField,
  averageByField,
  minByField,
  maxByField,
} from './collections.js';
export type { SortDirection } from './collections.js';

// Configuration
export {
  ConfigError,
  accessorConfigSchema,
  parseAccessorConfig,
  loadAccessorConfig,
  configFromEnv,
  expandEnvVars,
  resolveCoercionOptions,
  DEFAULT_COERCION,
} from './config.js';
export type { AccessorConfig, AccessorConfigInput, CoercionOptions } from './config.js';

// Logging
export { Logger, redactSecrets } from './logger.js';
export type { LogLevel, LogFormat, LoggerOptions } from './logger.js';

type MaybeRecord = object | null | undefined;
type FieldNames = readonly string[] | null | undefined;

/*
 * Free functions bound to the default accessor
 */

export function getField(record: MaybeRecord, name: string): unknown;
export function getField<K extends FieldKind>(record: MaybeRecord, name: string, kind: K): KindValue<K>;
export function getField(record: MaybeRecord, name: string, kind?: FieldKind): unknown {
  return kind === undefined
    ? defaultAccessor.getField(record, name)
    : defaultAccessor.getField(record, name, kind);
}

export function setField(record: MaybeRecord, name: string, value: unknown): boolean {
  return defaultAccessor.setField(record, name, value);
}

export function readField(record: MaybeRecord, name: string, kind?: FieldKind): ReadOutcome {
  return defaultAccessor.readField(record, name, kind);
}

export function writeField(record: MaybeRecord, name: string, value: unknown): WriteOutcome {
  return defaultAccessor.writeField(record, name, value);
}

export function hasField(record: MaybeRecord, name: string): boolean {
  return defaultAccessor.hasField(record, name);
}

export function describeFields(record: MaybeRecord): FieldDescriptor[] {
  return defaultAccessor.describeFields(record);
}

export function toMapping(record: MaybeRecord): FieldMap {
  return defaultAccessor.toMapping(record);
}

export function fromMapping<TRecord extends object>(
  mapping: FieldMapInput | null | undefined,
  targetType: RecordType<TRecord>
): TRecord | undefined {
  return defaultAccessor.fromMapping(mapping, targetType);
}

export function convertTo<TRecord extends object>(
  source: unknown,
  targetType: RecordType<TRecord>
): TRecord | undefined {
  return defaultAccessor.convertTo(source, targetType);
}

export function convertToScalar<K extends ScalarKind>(source: unknown, kind: K): KindValue<K> {
  return defaultAccessor.convertToScalar(source, kind);
}

export function copyFields<TRecord extends object>(
  source: MaybeRecord,
  targetType: RecordType<TRecord>,
  fieldNames: FieldNames
): TRecord | undefined {
  return defaultAccessor.copyFields(source, targetType, fieldNames);
}

export function copyAllFields<TRecord extends object>(
  source: MaybeRecord,
  targetType: RecordType<TRecord>
): TRecord | undefined {
  return defaultAccessor.copyAllFields(source, targetType);
}

export function clearFields(record: MaybeRecord, fieldNames: FieldNames): void {
  defaultAccessor.clearFields(record, fieldNames);
}

export function resetFields(record: MaybeRecord, fieldNames: FieldNames): void {
  defaultAccessor.resetFields(record, fieldNames);
}

export function fieldsEqual(a: MaybeRecord, b: MaybeRecord, fieldNames: FieldNames): boolean {
  return defaultAccessor.fieldsEqual(a, b, fieldNames);
}

export function changedFields(original: MaybeRecord, current: MaybeRecord, fieldNames: FieldNames): string[] {
  return defaultAccessor.changedFields(original, current, fieldNames);
}
