/**
 * Zod schemas for envelopes received from other layers
 */

import { z } from 'zod';
import { formatZodError } from '@recordkit/core';
import { fail, ok, type OperationResult } from './operation-result.js';

const totalCountSchema = z.number().int().min(0).default(0);

/** Raw envelope shape; the payload is checked separately */
export const operationEnvelopeSchema = z.discriminatedUnion('success', [
  z
    .object({
      success: z.literal(true),
      payload: z.unknown(),
      errors: z.array(z.string()).max(0, 'A successful result cannot carry errors').default([]),
      totalCount: totalCountSchema,
    })
    .strict(),
  z
    .object({
      success: z.literal(false),
      payload: z.undefined().optional(),
      errors: z.array(z.string()).min(1, 'A failed result needs at least one error'),
      totalCount: totalCountSchema,
    })
    .strict(),
]);

export type OperationEnvelopeInput = z.input<typeof operationEnvelopeSchema>;

/**
 * Validate a raw envelope and its payload. A malformed envelope reads as a
 * failure whose errors describe what is wrong with it.
 */
export function parseOperationResult<T>(
  raw: unknown,
  payloadSchema: z.ZodType<T, z.ZodTypeDef, unknown>
): OperationResult<T> {
  const envelope = operationEnvelopeSchema.safeParse(raw);
  if (!envelope.success) {
    return fail(formatZodError(envelope.error, 'operation result').split('\n'));
  }

  const data = envelope.data;
  if (!data.success) {
    return fail(data.errors, { totalCount: data.totalCount });
  }

  const payload = payloadSchema.safeParse(data.payload);
  if (!payload.success) {
    return fail(formatZodError(payload.error, 'operation result payload').split('\n'));
  }
  return ok(payload.data, { totalCount: data.totalCount });
}
