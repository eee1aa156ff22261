/**
 * seqview error system
 *
 * Every failure raised while applying or translating a delta is a `SeqError`
 * carrying a code, a category and the offending context.
 *
 * @example
 * ```typescript
 * import { SeqError } from '@seqview/core';
 *
 * try {
 *   source.apply(remove(3, 'x'));
 * } catch (error) {
 *   if (SeqError.isCategory(error, 'delta')) {
 *     console.log(error.format());
 *   }
 * }
 * ```
 *
 * @module errors
 */

export {
  ERROR_CODES,
  getErrorCategory,
  getErrorInfo,
  type ErrorCategory,
  type ErrorCode,
} from './error-codes.js';

export {
  ConcurrentModificationError,
  ConfigError,
  InconsistentDeltaError,
  IndexOutOfRangeError,
  MalformedBatchError,
  SeqError,
  ensureSeqError,
  type SeqErrorOptions,
  type SerializedSeqError,
} from './seq-error.js';
