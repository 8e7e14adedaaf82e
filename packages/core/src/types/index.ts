/**
 * Type exports for core
 */

export type { DataRecord, FieldMap, FieldMapInput } from './record.js';
export type {
  FieldKind,
  ScalarKind,
  KindValue,
  FieldDefinition,
  FieldDescriptor,
} from './schema.js';
