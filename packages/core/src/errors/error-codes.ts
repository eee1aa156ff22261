/**
 * seqview error codes
 *
 * Error codes are structured as SEQ_[CATEGORY][NUMBER]:
 * - D: Delta errors (D100-D199)
 * - C: Configuration errors (C200-C299)
 * - X: Internal errors (X900-X999)
 */

/**
 * Error code definitions with messages and suggestions
 */
export const ERROR_CODES = {
  // Delta errors (D100-D199)
  SEQ_D100: {
    code: 'SEQ_D100',
    message: 'Delta index out of range',
    suggestion: 'The delta references a position outside the current bounds of the sequence.',
  },
  SEQ_D101: {
    code: 'SEQ_D101',
    message: 'Inconsistent delta',
    suggestion:
      'The element carried by a remove or update delta does not match the element at that position. Check the producer of the delta.',
  },
  SEQ_D102: {
    code: 'SEQ_D102',
    message: 'Malformed batch',
    suggestion: 'Batches must contain at least one delta.',
  },
  SEQ_D103: {
    code: 'SEQ_D103',
    message: 'Concurrent modification',
    suggestion:
      'A delta was applied while the view was still delivering the previous one. Defer the mutation until delivery completes.',
  },

  // Configuration errors (C200-C299)
  SEQ_C200: {
    code: 'SEQ_C200',
    message: 'Invalid view options',
    suggestion: 'Check the options passed when creating the view.',
  },

  // Internal errors (X900-X999)
  SEQ_X900: {
    code: 'SEQ_X900',
    message: 'Internal error',
    suggestion: 'An unexpected error occurred. Please report this issue.',
  },
} as const;

/**
 * Error code type
 */
export type ErrorCode = keyof typeof ERROR_CODES;

/**
 * Error category type
 */
export type ErrorCategory = 'delta' | 'config' | 'internal';

/**
 * Get the category of an error code
 */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  const letter = code.charAt(4);
  switch (letter) {
    case 'D':
      return 'delta';
    case 'C':
      return 'config';
    default:
      return 'internal';
  }
}

/**
 * Get error info by code
 */
export function getErrorInfo(code: ErrorCode): (typeof ERROR_CODES)[ErrorCode] {
  return ERROR_CODES[code];
}
