export { AccessorError, wrapError } from './accessor-error.js';
export type { ErrorCode, AccessorErrorDetails } from './accessor-error.js';
