import { describe, expect, it } from 'vitest';
import {
  ConcurrentModificationError,
  ConfigError,
  ERROR_CODES,
  InconsistentDeltaError,
  IndexOutOfRangeError,
  MalformedBatchError,
  SeqError,
  ensureSeqError,
  getErrorCategory,
  getErrorInfo,
} from '../errors/index.js';

describe('error codes', () => {
  it('should key every entry by its own code', () => {
    for (const [key, info] of Object.entries(ERROR_CODES)) {
      expect(info.code).toBe(key);
    }
  });

  it('should derive the category from the letter after the prefix', () => {
    expect(getErrorCategory('SEQ_D100')).toBe('delta');
    expect(getErrorCategory('SEQ_D103')).toBe('delta');
    expect(getErrorCategory('SEQ_C200')).toBe('config');
    expect(getErrorCategory('SEQ_X900')).toBe('internal');
  });

  it('should look up messages', () => {
    expect(getErrorInfo('SEQ_D102').message).toBe('Malformed batch');
  });
});

describe('SeqError', () => {
  it('should use the default message and suggestion of its code', () => {
    const error = SeqError.fromCode('SEQ_D101', { view: 'odd' });
    expect(error.message).toBe('Inconsistent delta');
    expect(error.suggestion).toBe(ERROR_CODES.SEQ_D101.suggestion);
    expect(error.category).toBe('delta');
    expect(error.context).toEqual({ view: 'odd' });
    expect(error).toBeInstanceOf(Error);
  });

  it('should wrap an existing error', () => {
    const cause = new TypeError('bad element');
    const error = SeqError.wrap(cause, 'SEQ_X900');
    expect(error.message).toBe('bad element');
    expect(error.cause).toBe(cause);
    expect(error.category).toBe('internal');
  });

  it('should check codes and categories', () => {
    const error = new IndexOutOfRangeError(5, 3);
    expect(SeqError.isSeqError(error)).toBe(true);
    expect(SeqError.isCode(error, 'SEQ_D100')).toBe(true);
    expect(SeqError.isCode(error, 'SEQ_D101')).toBe(false);
    expect(SeqError.isCategory(error, 'delta')).toBe(true);
    expect(SeqError.isSeqError(new Error('plain'))).toBe(false);
    expect(SeqError.isCode('SEQ_D100', 'SEQ_D100')).toBe(false);
  });

  it('should format code, context and suggestion on separate lines', () => {
    const error = new SeqError({
      code: 'SEQ_D102',
      message: 'Batch contains no deltas',
      suggestion: 'Add a delta.',
      context: { view: 'v' },
    });
    expect(error.format()).toBe(
      '[SEQ_D102] Batch contains no deltas\nContext: {"view":"v"}\nSuggestion: Add a delta.'
    );
    expect(error.toString()).toBe(error.format());
  });

  it('should omit empty context when formatting', () => {
    const error = new SeqError({ code: 'SEQ_X900', message: 'oops', suggestion: 'retry' });
    expect(error.format()).toBe('[SEQ_X900] oops\nSuggestion: retry');
  });

  it('should serialize nested causes', () => {
    const inner = new MalformedBatchError('empty');
    const outer = new SeqError({ code: 'SEQ_X900', message: 'outer', cause: inner });
    const json = outer.toJSON();
    expect(json.code).toBe('SEQ_X900');
    expect(json.category).toBe('internal');
    expect(json.cause).toMatchObject({ code: 'SEQ_D102', message: 'empty' });
  });

  it('should serialize plain causes by name and message', () => {
    const json = SeqError.wrap(new RangeError('too far'), 'SEQ_X900').toJSON();
    expect(json.cause).toMatchObject({ name: 'RangeError', message: 'too far' });
  });
});

describe('error subclasses', () => {
  it('IndexOutOfRangeError carries index and length', () => {
    const error = new IndexOutOfRangeError(4, 2, { view: 'src' });
    expect(error.name).toBe('IndexOutOfRangeError');
    expect(error.code).toBe('SEQ_D100');
    expect(error.message).toBe('Index 4 is out of range for length 2');
    expect(error.index).toBe(4);
    expect(error.length).toBe(2);
    expect(error.context).toEqual({ view: 'src', index: 4, length: 2 });
    expect(error).toBeInstanceOf(SeqError);
  });

  it('InconsistentDeltaError carries the index', () => {
    const error = new InconsistentDeltaError(1, 'wrong element');
    expect(error.code).toBe('SEQ_D101');
    expect(error.message).toBe('wrong element');
    expect(error.context).toEqual({ index: 1 });
  });

  it('ConcurrentModificationError names the view', () => {
    const error = new ConcurrentModificationError('todos');
    expect(error.code).toBe('SEQ_D103');
    expect(error.message).toBe('View "todos" received a delta while delivering another');
  });

  it('ConfigError joins its issues', () => {
    const error = new ConfigError(['name: too short', 'validate: not a boolean']);
    expect(error.code).toBe('SEQ_C200');
    expect(error.category).toBe('config');
    expect(error.message).toBe('Invalid view options: name: too short; validate: not a boolean');
    expect(error.issues).toEqual(['name: too short', 'validate: not a boolean']);
  });
});

describe('ensureSeqError', () => {
  it('should return SeqErrors unchanged', () => {
    const error = new MalformedBatchError('empty');
    expect(ensureSeqError(error)).toBe(error);
  });

  it('should wrap plain errors with the default code', () => {
    const wrapped = ensureSeqError(new Error('boom'));
    expect(wrapped.code).toBe('SEQ_X900');
    expect(wrapped.message).toBe('boom');
  });

  it('should wrap non-errors using their string form', () => {
    const wrapped = ensureSeqError('boom', 'SEQ_D101');
    expect(wrapped.code).toBe('SEQ_D101');
    expect(wrapped.message).toBe('boom');
    expect(wrapped.cause).toBeUndefined();
  });
});
