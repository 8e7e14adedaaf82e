/**
 * Record type capability tables
 *
 * A record type lists its fields with typed get/set functions. Types are
 * declared with `defineRecordType`; objects without a declared type get one
 * derived from their property descriptors by `inferRecordType`.
 */

import {
  AccessorError,
  formatZodError,
  recordTypeDefinitionSchema,
  type FieldAccessor,
  type FieldKind,
  type RecordType,
} from '@recordkit/core';
import { zeroValue } from './coercion.js';

/** Declaration of one field on a record type */
export interface FieldSpec<TRecord extends object> {
  kind: FieldKind;
  /** Accept null (default: false) */
  nullable?: boolean;
  /** Reject writes (default: false) */
  readonly?: boolean;
  /** Reject reads (default: false) */
  writeOnly?: boolean;
  description?: string;
  /** Custom reader (default: property read) */
  get?(record: TRecord): unknown;
  /** Custom writer (default: property assignment) */
  set?(record: TRecord, value: unknown): void;
}

export interface RecordTypeDefinition<TRecord extends object> {
  name: string;
  /** Build a zero-initialized instance */
  create: () => TRecord;
  /** Fields in declaration order */
  fields: { [K in keyof TRecord & string]?: FieldSpec<TRecord> };
  /** Instance check; defaults to "was created by or bound to this type" */
  is?: (value: unknown) => value is TRecord;
}

// Binds instances (or prototypes) to their declared type.
const bindings = new WeakMap<object, RecordType<object>>();

/**
 * Attach a record type to an object. Binding a prototype binds every object
 * that inherits from it.
 */
export function bindRecordType<TRecord extends object>(
  target: TRecord,
  type: RecordType<TRecord>
): TRecord {
  bindings.set(target, type);
  return target;
}

/**
 * The declared type bound to a value or to one of its prototypes
 */
export function boundRecordType(value: object): RecordType<object> | undefined {
  let current: object | null = value;
  while (current !== null && current !== Object.prototype) {
    const type = bindings.get(current);
    if (type) return type;
    current = Object.getPrototypeOf(current);
  }
  return undefined;
}

/**
 * Resolve the record type of a value: its bound type, or one derived from its
 * current properties. Nothing is cached between calls.
 */
export function typeOf(value: object): RecordType<object> {
  return boundRecordType(value) ?? inferRecordType(value);
}

function propertyGetter(name: string) {
  return (record: object): unknown => Reflect.get(record, name);
}

function propertySetter(typeName: string, name: string) {
  return (record: object, value: unknown): void => {
    if (!Reflect.set(record, name, value)) {
      throw new AccessorError({
        code: 'FIELD_READ_ONLY',
        message: `Property '${name}' refused the assignment`,
        recordType: typeName,
        field: name,
        suggestion: 'Check whether the record is frozen or the property is non-writable',
      });
    }
  };
}

class TableRecordType<TRecord extends object> implements RecordType<TRecord> {
  private readonly index: Map<string, FieldAccessor<TRecord>>;

  constructor(
    readonly name: string,
    readonly fields: readonly FieldAccessor<TRecord>[],
    private readonly factory: () => TRecord,
    private readonly instanceCheck?: (value: unknown) => value is TRecord
  ) {
    this.index = new Map(fields.map((field) => [field.name, field]));
  }

  field(name: string): FieldAccessor<TRecord> | undefined {
    return this.index.get(name);
  }

  create(): TRecord {
    return bindRecordType(this.factory(), this);
  }

  is(value: unknown): value is TRecord {
    if (typeof value !== 'object' || value === null) return false;
    if (this.instanceCheck) return this.instanceCheck(value);
    return boundRecordType(value) === this;
  }
}

/**
 * Declare a record type from its fields
 *
 * @throws AccessorError (INVALID_ARGUMENT) for duplicate or unusable field declarations
 */
export function defineRecordType<TRecord extends object>(
  definition: RecordTypeDefinition<TRecord>
): RecordType<TRecord> {
  const entries: [string, FieldSpec<TRecord>][] = [];
  for (const [name, spec] of Object.entries<FieldSpec<TRecord> | undefined>(definition.fields)) {
    if (spec) entries.push([name, spec]);
  }

  const fields = entries.map(([name, spec]): FieldAccessor<TRecord> => ({
    name,
    kind: spec.kind,
    nullable: spec.nullable ?? false,
    readable: !(spec.writeOnly ?? false),
    writable: !(spec.readonly ?? false),
    ...(spec.description !== undefined ? { description: spec.description } : {}),
    get: spec.get ?? propertyGetter(name),
    set: spec.set ?? propertySetter(definition.name, name),
  }));

  const checked = recordTypeDefinitionSchema.safeParse({ name: definition.name, fields });
  if (!checked.success) {
    throw new AccessorError({
      code: 'INVALID_ARGUMENT',
      message: formatZodError(checked.error, `record type '${definition.name}'`),
      recordType: definition.name,
    });
  }

  return new TableRecordType(definition.name, fields, definition.create, definition.is);
}

function inferKind(value: unknown): FieldKind {
  if (value === null || value === undefined) return 'unknown';
  if (typeof value === 'string') return 'string';
  if (typeof value === 'number') return 'number';
  if (typeof value === 'boolean') return 'boolean';
  if (value instanceof Date) return 'date';
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'object') return 'object';
  return 'unknown';
}

function readQuietly(record: object, name: string): unknown {
  try {
    return Reflect.get(record, name);
  } catch {
    // A throwing getter reads as absent.
    return undefined;
  }
}

/**
 * Field of an inferred type. The kind comes from the property's value on the
 * inspected object, read the first time the kind is asked for, so resolving
 * one field never runs the getters of the others.
 */
class InferredField implements FieldAccessor<object> {
  private sample?: { value: unknown };

  constructor(
    readonly name: string,
    readonly readable: boolean,
    readonly writable: boolean,
    private readonly typeName: string,
    private readonly inspected: object
  ) {}

  /** Value of the property on the inspected object */
  get initial(): unknown {
    if (!this.sample) {
      this.sample = { value: this.readable ? readQuietly(this.inspected, this.name) : undefined };
    }
    return this.sample.value;
  }

  get kind(): FieldKind {
    return inferKind(this.initial);
  }

  get nullable(): boolean {
    return this.initial === null || this.initial === undefined;
  }

  get(record: object): unknown {
    return Reflect.get(record, this.name);
  }

  set(record: object, value: unknown): void {
    propertySetter(this.typeName, this.name)(record, value);
  }
}

function inferField(
  typeName: string,
  record: object,
  name: string,
  descriptor: PropertyDescriptor
): InferredField {
  const isAccessor = descriptor.get !== undefined || descriptor.set !== undefined;
  const readable = isAccessor ? descriptor.get !== undefined : true;
  const writable = isAccessor ? descriptor.set !== undefined : descriptor.writable === true;
  return new InferredField(name, readable, writable, typeName, record);
}

/**
 * Derive a record type from an object's own enumerable properties and the
 * accessor properties of its class.
 *
 * Building the type reads no values. A field's kind comes from its current
 * value once asked for; a field holding null or undefined is nullable with
 * kind `unknown`.
 */
export function inferRecordType(record: object, name?: string): RecordType<object> {
  const prototype: object | null = Object.getPrototypeOf(record);
  const typeName =
    name ??
    (prototype && prototype !== Object.prototype && typeof prototype.constructor === 'function'
      ? prototype.constructor.name
      : 'Object');

  const fields: InferredField[] = [];
  const seen = new Set<string>();

  for (const [key, descriptor] of Object.entries(Object.getOwnPropertyDescriptors(record))) {
    if (!descriptor.enumerable) continue;
    seen.add(key);
    fields.push(inferField(typeName, record, key, descriptor));
  }

  let current = prototype;
  while (current !== null && current !== Object.prototype) {
    for (const [key, descriptor] of Object.entries(Object.getOwnPropertyDescriptors(current))) {
      if (key === 'constructor' || seen.has(key)) continue;
      if (descriptor.get === undefined && descriptor.set === undefined) continue;
      seen.add(key);
      fields.push(inferField(typeName, record, key, descriptor));
    }
    current = Object.getPrototypeOf(current);
  }

  const factory = (): object => {
    const instance: object = Object.create(prototype);
    for (const field of fields) {
      if (!field.writable) continue;
      const zero =
        field.kind === 'unknown' ? (field.initial === undefined ? undefined : null) : zeroValue(field.kind);
      field.set(instance, zero);
    }
    return instance;
  };

  const isShaped = (value: unknown): value is object =>
    typeof value === 'object' && value !== null && fields.every((field) => field.name in value);

  return new TableRecordType<object>(typeName, fields, factory, isShaped);
}
