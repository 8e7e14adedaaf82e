/**
 * Mapping transcoders
 *
 * `convertTo` falls back to encoding the source as a field map and decoding
 * that map into the target type. Transcoders are injectable so callers can
 * decide how strict the round trip is.
 */

import { isPlainObject, toFieldMap, type FieldMap, type RecordType } from '@recordkit/core';
import type { WriteOutcome } from './outcomes.js';

/** Accessor operations a transcoder may use */
export interface TranscodeContext {
  toMapping(record: object): FieldMap;
  writeField(record: object, name: string, value: unknown): WriteOutcome;
  construct<TRecord extends object>(type: RecordType<TRecord>): TRecord | undefined;
}

export interface MappingTranscoder {
  /**
   * Encode a record; undefined when it cannot be represented
   */
  encode(record: object, context: TranscodeContext): FieldMap | undefined;

  /**
   * Rebuild a record of the target type; undefined when the mapping cannot be bridged
   */
  decode<TRecord extends object>(
    mapping: FieldMap,
    type: RecordType<TRecord>,
    context: TranscodeContext
  ): TRecord | undefined;
}

export interface MappingTranscoderOptions {
  /**
   * Fail the decode when a field known to the target rejects its value
   * (default: true). Names unknown to the target and read-only targets are
   * always skipped.
   */
  strict?: boolean;
}

/**
 * Transcoder that passes the field map through unchanged
 */
export function createMappingTranscoder(options: MappingTranscoderOptions = {}): MappingTranscoder {
  const strict = options.strict ?? true;

  return {
    encode(record, context) {
      return context.toMapping(record);
    },

    decode(mapping, type, context) {
      const target = context.construct(type);
      if (target === undefined) return undefined;

      for (const [name, value] of mapping) {
        const outcome = context.writeField(target, name, value);
        if (strict && (outcome.status === 'coercion_failed' || outcome.status === 'rejected')) {
          return undefined;
        }
      }
      return target;
    },
  };
}

/**
 * Transcoder that round-trips the field map through JSON text. Dates arrive
 * as ISO strings and are coerced back by the target's date fields. Values
 * JSON cannot hold (bigint, cycles) make `encode` throw, which `convertTo`
 * reports as an absent result.
 */
export function createJsonTranscoder(options: MappingTranscoderOptions = {}): MappingTranscoder {
  const inner = createMappingTranscoder(options);

  return {
    encode(record, context) {
      const mapping = inner.encode(record, context);
      if (!mapping) return undefined;

      const parsed: unknown = JSON.parse(JSON.stringify(Object.fromEntries(mapping)));
      return isPlainObject(parsed) ? toFieldMap(parsed) : undefined;
    },

    decode(mapping, type, context) {
      return inner.decode(mapping, type, context);
    },
  };
}

export const mappingTranscoder: MappingTranscoder = createMappingTranscoder();
export const jsonTranscoder: MappingTranscoder = createJsonTranscoder();
