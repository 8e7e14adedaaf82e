/**
 * Operation Result Envelope
 *
 * Uniform success/failure wrapper for callers of the accessor. A success
 * never carries errors; a failure never carries a payload and always carries
 * at least one error message.
 */

import { AccessorError } from '@recordkit/core';

export const UNKNOWN_ERROR_MESSAGE = 'Unknown error';

export interface OperationSuccess<T> {
  readonly success: true;
  readonly payload: T;
  readonly errors: readonly [];
  /** Total number of items available (for paging); 0 when not applicable */
  readonly totalCount: number;
}

export interface OperationFailure {
  readonly success: false;
  readonly payload?: undefined;
  readonly errors: readonly [string, ...string[]];
  readonly totalCount: number;
}

export type OperationResult<T = void> = OperationSuccess<T> | OperationFailure;

export interface ResultOptions {
  totalCount?: number;
}

function normalizeCount(count: number | undefined): number {
  return count !== undefined && Number.isInteger(count) && count >= 0 ? count : 0;
}

/**
 * Successful outcome, with or without a payload
 */
export function ok(): OperationSuccess<undefined>;
export function ok<T>(payload: T, options?: ResultOptions): OperationSuccess<T>;
export function ok<T>(payload?: T, options: ResultOptions = {}): OperationSuccess<T | undefined> {
  return {
    success: true,
    payload,
    errors: [],
    totalCount: normalizeCount(options.totalCount),
  };
}

/**
 * Failed outcome. Blank messages are dropped; an empty list becomes a single
 * "Unknown error" entry.
 */
export function fail(errors: string | readonly string[], options: ResultOptions = {}): OperationFailure {
  const list = (typeof errors === 'string' ? [errors] : errors).filter(
    (message) => message.trim().length > 0
  );
  const [first = UNKNOWN_ERROR_MESSAGE, ...rest] = list;
  return {
    success: false,
    errors: [first, ...rest],
    totalCount: normalizeCount(options.totalCount),
  };
}

/**
 * Failed outcome describing a caught error
 */
export function fromError(error: unknown): OperationFailure {
  if (error instanceof AccessorError) {
    return fail(error.toActionableMessage());
  }
  if (error instanceof Error) {
    return fail(error.message);
  }
  return fail(String(error));
}

export function isOk<T>(result: OperationResult<T>): result is OperationSuccess<T> {
  return result.success;
}

export function isFailure<T>(result: OperationResult<T>): result is OperationFailure {
  return !result.success;
}

/**
 * Transform the payload of a success; failures pass through
 */
export function map<T, U>(result: OperationResult<T>, fn: (payload: T) => U): OperationResult<U> {
  return result.success ? ok(fn(result.payload), { totalCount: result.totalCount }) : result;
}

export function unwrapOr<T>(result: OperationResult<T>, fallback: T): T {
  return result.success ? result.payload : fallback;
}

export function withTotalCount<T>(result: OperationResult<T>, totalCount: number): OperationResult<T> {
  return { ...result, totalCount: normalizeCount(totalCount) };
}

/**
 * All payloads when every result succeeded, otherwise one failure holding
 * every error message in order. The total count is the sum of the inputs'.
 */
export function combine<T>(results: readonly OperationResult<T>[]): OperationResult<T[]> {
  const totalCount = results.reduce((sum, result) => sum + result.totalCount, 0);
  const errors = results.flatMap((result) => (result.success ? [] : [...result.errors]));

  if (errors.length > 0) {
    return fail(errors, { totalCount });
  }

  const payloads: T[] = [];
  for (const result of results) {
    if (result.success) payloads.push(result.payload);
  }
  return ok(payloads, { totalCount });
}
