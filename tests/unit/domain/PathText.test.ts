import { describe, it, expect } from 'vitest';
import { formatPathText, parsePathText } from '../../../src/domain/value-objects/PathText.js';
import { PathParseError } from '../../../src/domain/errors/DomainErrors.js';

function parseError(text: string): PathParseError {
  try {
    parsePathText(text);
  } catch (err) {
    if (err instanceof PathParseError) return err;
    throw err;
  }
  throw new Error(`expected "${text}" to fail`);
}

describe('PathText', () => {
  it('should parse the empty string as the root', () => {
    expect(parsePathText('')).toEqual([]);
  });

  it('should parse dot-separated components', () => {
    expect(parsePathText('3.12.5')).toEqual([3n, 12n, 5n]);
    expect(parsePathText('0')).toEqual([0n]);
  });

  it('should normalise leading zeros away', () => {
    expect(formatPathText(parsePathText('007.00.10'))).toBe('7.0.10');
  });

  it('should format vectors back to the same text', () => {
    for (const text of ['', '0', '3.12.5', '3.12.5.1.21', '18446744073709551613']) {
      expect(formatPathText(parsePathText(text))).toBe(text);
    }
  });

  it('should report empty components with their position', () => {
    const leading = parseError('.3');
    expect(leading.component).toBe('');
    expect(leading.index).toBe(0);
    expect(leading.message).toBe('Invalid path component "" at position 0: empty component');

    expect(parseError('3..5').index).toBe(1);
    expect(parseError('3.').index).toBe(1);
  });

  it('should report non-numeric components', () => {
    const err = parseError('3.a');
    expect(err.component).toBe('a');
    expect(err.index).toBe(1);
    expect(err.code).toBe('PATH_PARSE');
    expect(err.message).toBe('Invalid path component "a" at position 1: not a non-negative decimal integer');

    expect(parseError('-1').component).toBe('-1');
    expect(parseError('+1').component).toBe('+1');
    expect(parseError(' 1').component).toBe(' 1');
    expect(parseError('1e3').component).toBe('1e3');
  });

  it('should report components beyond the supported width', () => {
    const err = parseError('1.18446744073709551614');
    expect(err.index).toBe(1);
    expect(err.message).toContain('exceeds maximum element 18446744073709551613');
  });
});
