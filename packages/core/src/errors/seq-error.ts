/**
 * SeqError - structured error class for incremental views
 */

import {
  type ErrorCategory,
  type ErrorCode,
  getErrorCategory,
  getErrorInfo,
} from './error-codes.js';

/**
 * Options for creating a SeqError
 */
export interface SeqErrorOptions {
  /** The error code */
  code: ErrorCode;
  /** Custom message (overrides default) */
  message?: string;
  /** Custom suggestion (overrides default) */
  suggestion?: string;
  /** Additional context information */
  context?: Record<string, unknown>;
  /** The original error that caused this error */
  cause?: Error;
}

/**
 * Serialized format of a SeqError
 */
export interface SerializedSeqError {
  name: string;
  code: string;
  message: string;
  suggestion?: string;
  category: ErrorCategory;
  context: Record<string, unknown>;
  stack?: string;
  cause?: SerializedSeqError | { name: string; message: string; stack?: string };
}

/**
 * Error raised by delta processing and view construction.
 *
 * @example
 * ```typescript
 * try {
 *   source.remove(10);
 * } catch (error) {
 *   if (SeqError.isCode(error, 'SEQ_D100')) {
 *     console.log('No such position');
 *   }
 * }
 * ```
 */
export class SeqError extends Error {
  /** Unique error code */
  readonly code: ErrorCode;

  /** Suggestion for resolving the error */
  readonly suggestion?: string;

  /** Error category for grouping */
  readonly category: ErrorCategory;

  /** Additional context information */
  readonly context: Record<string, unknown>;

  /** Original error that caused this error */
  override readonly cause?: Error;

  constructor(options: SeqErrorOptions) {
    const errorInfo = getErrorInfo(options.code);
    const message = options.message ?? errorInfo.message;

    super(message, { cause: options.cause });

    this.name = 'SeqError';
    this.code = options.code;
    this.suggestion = options.suggestion ?? errorInfo.suggestion;
    this.category = getErrorCategory(options.code);
    this.context = options.context ?? {};
    this.cause = options.cause;

    // Maintain proper stack trace for V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SeqError);
    }
  }

  /**
   * Create a SeqError from an error code with minimal options
   */
  static fromCode(code: ErrorCode, context?: Record<string, unknown>): SeqError {
    return new SeqError({ code, context });
  }

  /**
   * Wrap an existing error with a SeqError
   */
  static wrap(error: Error, code: ErrorCode, context?: Record<string, unknown>): SeqError {
    return new SeqError({
      code,
      message: error.message,
      context,
      cause: error,
    });
  }

  static isSeqError(error: unknown): error is SeqError {
    return error instanceof SeqError;
  }

  static isCode(error: unknown, code: ErrorCode): boolean {
    return SeqError.isSeqError(error) && error.code === code;
  }

  static isCategory(error: unknown, category: ErrorCategory): boolean {
    return SeqError.isSeqError(error) && error.category === category;
  }

  /**
   * Format the error for display
   */
  format(): string {
    const lines = [`[${this.code}] ${this.message}`];

    if (Object.keys(this.context).length > 0) {
      lines.push(`Context: ${JSON.stringify(this.context)}`);
    }

    if (this.suggestion) {
      lines.push(`Suggestion: ${this.suggestion}`);
    }

    return lines.join('\n');
  }

  /**
   * Convert to a plain object for serialization
   */
  toJSON(): SerializedSeqError {
    const result: SerializedSeqError = {
      name: this.name,
      code: this.code,
      message: this.message,
      category: this.category,
      context: this.context,
    };

    if (this.suggestion) {
      result.suggestion = this.suggestion;
    }

    if (this.stack) {
      result.stack = this.stack;
    }

    if (this.cause) {
      if (SeqError.isSeqError(this.cause)) {
        result.cause = this.cause.toJSON();
      } else {
        result.cause = {
          name: this.cause.name,
          message: this.cause.message,
          stack: this.cause.stack,
        };
      }
    }

    return result;
  }

  override toString(): string {
    return this.format();
  }
}

/**
 * A delta referenced a position outside `[0, length)` (or `[0, length]` for inserts)
 */
export class IndexOutOfRangeError extends SeqError {
  readonly index: number;
  readonly length: number;

  constructor(index: number, length: number, context?: Record<string, unknown>) {
    super({
      code: 'SEQ_D100',
      message: `Index ${index} is out of range for length ${length}`,
      context: { ...context, index, length },
    });

    this.name = 'IndexOutOfRangeError';
    this.index = index;
    this.length = length;
  }
}

/**
 * The element carried by a remove/update delta is not the element at its position
 */
export class InconsistentDeltaError extends SeqError {
  readonly index: number;

  constructor(index: number, message: string, context?: Record<string, unknown>) {
    super({
      code: 'SEQ_D101',
      message,
      context: { ...context, index },
    });

    this.name = 'InconsistentDeltaError';
    this.index = index;
  }
}

/**
 * Empty or otherwise unresolvable batch
 */
export class MalformedBatchError extends SeqError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({ code: 'SEQ_D102', message, context });
    this.name = 'MalformedBatchError';
  }
}

/**
 * A view was asked to apply a delta while still delivering one
 */
export class ConcurrentModificationError extends SeqError {
  constructor(view: string) {
    super({
      code: 'SEQ_D103',
      message: `View "${view}" received a delta while delivering another`,
      context: { view },
    });
    this.name = 'ConcurrentModificationError';
  }
}

/**
 * Invalid options
 */
export class ConfigError extends SeqError {
  readonly issues: string[];

  constructor(issues: string[], context?: Record<string, unknown>) {
    super({
      code: 'SEQ_C200',
      message: `Invalid view options: ${issues.join('; ')}`,
      context: { ...context, issues },
    });
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Helper function to ensure errors are SeqErrors
 */
export function ensureSeqError(error: unknown, defaultCode: ErrorCode = 'SEQ_X900'): SeqError {
  if (SeqError.isSeqError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return SeqError.wrap(error, defaultCode);
  }

  return new SeqError({
    code: defaultCode,
    message: String(error),
  });
}
