/**
 * Value coercion between field kinds
 *
 * Each kind is described by a zod schema that accepts the values convertible
 * to it and transforms them into the canonical representation.
 */

import { z } from 'zod';
import type { FieldDescriptor, FieldKind, KindValue } from '@recordkit/core';
import { DEFAULT_COERCION, type CoercionOptions } from './config.js';

export type CoercionResult<T> = { ok: true; value: T } | { ok: false; issue: string };

type KindSchemas = {
  [K in FieldKind]: z.ZodType<KindValue<K>, z.ZodTypeDef, unknown>;
};

const finiteNumber = z.number().finite();
const safeInteger = z.number().int().safe('Integer is outside the safe integer range');
const nonBlankString = z.string().trim().min(1);
const integerLiteral = z
  .string()
  .trim()
  .regex(/^[+-]?\d+$/)
  .transform(Number)
  .pipe(safeInteger);
const booleanLiteral = z
  .string()
  .transform((s) => s.trim().toLowerCase())
  .pipe(z.enum(['true', 'false']))
  .transform((s) => s === 'true');

function isObjectValue(value: unknown): value is { [key: string]: unknown } {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function buildSchemas(options: CoercionOptions): KindSchemas {
  const fromBoolean = z.boolean().transform((b) => (b ? 1 : 0));
  const fromBigInt = z.bigint().transform(Number).pipe(finiteNumber);
  const integerFromNumber = finiteNumber.transform(Math.round).pipe(safeInteger);
  const integerFromBigInt = z.bigint().transform(Number).pipe(safeInteger);

  const number = options.numericStrings
    ? z.union([finiteNumber, fromBoolean, fromBigInt, nonBlankString.pipe(z.coerce.number().finite())])
    : z.union([finiteNumber, fromBoolean, fromBigInt]);

  const integer = options.numericStrings
    ? z.union([integerFromNumber, fromBoolean, integerFromBigInt, integerLiteral])
    : z.union([integerFromNumber, fromBoolean, integerFromBigInt]);

  const fromNumber = finiteNumber.transform((n) => n !== 0);
  const boolean = options.booleanStrings
    ? z.union([z.boolean(), fromNumber, booleanLiteral])
    : z.union([z.boolean(), fromNumber]);

  const date = options.dateStrings
    ? z.union([z.date(), nonBlankString.pipe(z.coerce.date())])
    : z.date();

  return {
    string: z.union([
      z.string(),
      finiteNumber.transform(String),
      z.boolean().transform(String),
      z.bigint().transform(String),
      z.date().transform((d) => d.toISOString()),
    ]),
    number,
    integer,
    boolean,
    date,
    // Arrays and objects keep their identity; only the shape is checked.
    array: z.custom<unknown[]>((value) => Array.isArray(value), 'Expected an array'),
    object: z.custom<{ [key: string]: unknown }>(isObjectValue, 'Expected an object'),
    unknown: z.unknown(),
  };
}

/**
 * Zero value of a kind. Returns a fresh instance for dates, arrays and objects.
 */
export function zeroValue<K extends FieldKind>(kind: K): KindValue<K>;
export function zeroValue(kind: FieldKind): unknown {
  switch (kind) {
    case 'string':
      return '';
    case 'number':
    case 'integer':
      return 0;
    case 'boolean':
      return false;
    case 'date':
      return new Date(0);
    case 'array':
      return [];
    case 'object':
      return {};
    case 'unknown':
      return undefined;
  }
}

export class Coercer {
  private readonly schemas: KindSchemas;

  constructor(readonly options: CoercionOptions = DEFAULT_COERCION) {
    this.schemas = buildSchemas(options);
  }

  /**
   * Convert a present value to the given kind
   */
  coerce<K extends FieldKind>(value: unknown, kind: K): CoercionResult<KindValue<K>> {
    const schema: z.ZodType<KindValue<K>, z.ZodTypeDef, unknown> = this.schemas[kind];
    const result = schema.safeParse(value);
    if (result.success) {
      return { ok: true, value: result.data };
    }
    return { ok: false, issue: result.error.issues[0]?.message ?? `Cannot convert to ${kind}` };
  }

  /**
   * Convert a value for storage in a field. Absent values become null when the
   * field accepts null and are rejected otherwise.
   */
  coerceForField(value: unknown, field: Pick<FieldDescriptor, 'kind' | 'nullable'>): CoercionResult<unknown> {
    if (value === null || value === undefined) {
      if (field.kind === 'unknown') {
        return { ok: true, value };
      }
      return field.nullable
        ? { ok: true, value: null }
        : { ok: false, issue: `Field of kind ${field.kind} does not accept ${String(value)}` };
    }
    return this.coerce(value, field.kind);
  }
}
