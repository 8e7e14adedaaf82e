/**
 * @recordkit/result
 *
 * Operation result envelope shared by the layers above the accessor
 */

export {
  UNKNOWN_ERROR_MESSAGE,
  ok,
  fail,
  fromError,
  isOk,
  isFailure,
  map,
  unwrapOr,
  withTotalCount,
  combine,
} from './operation-result.js';
export type {
  OperationResult,
  OperationSuccess,
  OperationFailure,
  ResultOptions,
} from './operation-result.js';

export { operationEnvelopeSchema, parseOperationResult } from './schemas.js';
export type { OperationEnvelopeInput } from './schemas.js';
