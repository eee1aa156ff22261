import { describe, expect, it } from 'vitest';
import { ConfigError } from '../errors/index.js';
import { parseSliceBounds, parseViewSettings } from '../config/options.js';

function captureConfigError(fn: () => unknown): ConfigError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigError) return error;
    throw error;
  }
  throw new Error('expected a ConfigError');
}

describe('parseViewSettings', () => {
  it('should apply defaults', () => {
    expect(parseViewSettings({})).toEqual({ validate: true });
    expect(parseViewSettings(undefined)).toEqual({ validate: true });
  });

  it('should keep valid settings', () => {
    expect(parseViewSettings({ name: 'todos', validate: false, logLevel: 'debug' })).toEqual({
      name: 'todos',
      validate: false,
      logLevel: 'debug',
    });
  });

  it('should reject a wrongly typed setting with its path', () => {
    const error = captureConfigError(() => parseViewSettings({ validate: 'yes' }));
    expect(error.code).toBe('SEQ_C200');
    expect(error.issues).toHaveLength(1);
    expect(error.issues[0]).toMatch(/^validate: /);
  });

  it('should reject an empty name', () => {
    const error = captureConfigError(() => parseViewSettings({ name: '' }));
    expect(error.issues[0]).toMatch(/^name: /);
  });

  it('should reject an unknown log level', () => {
    const error = captureConfigError(() => parseViewSettings({ logLevel: 'trace' }));
    expect(error.issues[0]).toMatch(/^logLevel: /);
  });
});

describe('parseSliceBounds', () => {
  it('should accept integer bounds', () => {
    expect(parseSliceBounds(1, 3)).toEqual({ from: 1, until: 3 });
  });

  it('should accept an open upper bound', () => {
    expect(parseSliceBounds(2, Infinity)).toEqual({ from: 2, until: Infinity });
  });

  it('should clamp from to zero and until to from', () => {
    expect(parseSliceBounds(-2, 3)).toEqual({ from: 0, until: 3 });
    expect(parseSliceBounds(4, 1)).toEqual({ from: 4, until: 4 });
    expect(parseSliceBounds(-5, -1)).toEqual({ from: 0, until: 0 });
  });

  it('should reject fractional bounds', () => {
    const error = captureConfigError(() => parseSliceBounds(1.5, 3));
    expect(error.issues[0]).toMatch(/^from: /);
    expect(error.context).toMatchObject({ from: 1.5, until: 3 });
  });

  it('should reject NaN', () => {
    expect(() => parseSliceBounds(0, Number.NaN)).toThrow(ConfigError);
  });
});
