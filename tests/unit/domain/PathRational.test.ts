import { describe, it, expect } from 'vitest';
import { PathRational } from '../../../src/domain/value-objects/PathRational.js';
import { PathIdentifier } from '../../../src/domain/value-objects/PathIdentifier.js';
import { MAX_PATH_ELEMENT } from '../../../src/domain/value-objects/PathOffset.js';
import { U64_MAX } from '../../../src/domain/value-objects/U64.js';
import {
  MalformedPathIdentifierError,
  PathOverflowError,
  PathParseError,
} from '../../../src/domain/errors/DomainErrors.js';

const KNOWN: Array<[number[], bigint, bigint]> = [
  [[3], 5n, 1n],
  [[3, 12], 71n, 14n],
  [[3, 12, 5], 502n, 99n],
  [[3, 12, 5, 1], 1577n, 311n],
  [[3, 12, 5, 1, 21], 36773n, 7252n],
];

/**
 * Feature: 有理數形式的路徑識別值
 *
 * 路徑向量以連分數折疊成最簡分數，並以 Euclid 演算法還原。
 */
describe('PathRational', () => {
  it.each(KNOWN)('should encode %j as %s/%s', (vector, numerator, denominator) => {
    const rational = PathRational.fromVector(vector);
    expect(rational.numerator).toBe(numerator);
    expect(rational.denominator).toBe(denominator);
  });

  it.each(KNOWN)('should decode %j from %s/%s', (vector, numerator, denominator) => {
    expect(PathRational.fromParts(numerator, denominator).toVector()).toEqual(vector.map(BigInt));
  });

  /**
   * Scenario: root
   * Given 空向量
   * When 編碼
   * Then 得到 1/0，解碼不產生任何元素
   */
  it('should encode the empty vector as the 1/0 sentinel', () => {
    const root = PathRational.fromVector([]);
    expect(root.numerator).toBe(1n);
    expect(root.denominator).toBe(0n);
    expect(root.isRoot()).toBe(true);
    expect(root.equals(PathRational.ROOT)).toBe(true);
    expect(root.toVector()).toEqual([]);
    expect(root.toFractionString()).toBe('1/0');
  });

  it('should agree with the matrix form', () => {
    for (const [vector] of KNOWN) {
      const fromMatrix = PathRational.fromIdentifier(PathIdentifier.fromVector(vector));
      expect(fromMatrix.equals(PathRational.fromVector(vector))).toBe(true);
      expect(PathRational.fromVector(vector).toIdentifier().equals(PathIdentifier.fromVector(vector))).toBe(true);
    }
    expect(PathRational.fromIdentifier(PathIdentifier.ROOT).isRoot()).toBe(true);
    expect(PathRational.ROOT.toIdentifier().equals(PathIdentifier.ROOT)).toBe(true);
  });

  it('should keep [3,5,1] and [3,6] apart', () => {
    expect(PathRational.fromVector([3, 5, 1]).toFractionString()).not.toBe(
      PathRational.fromVector([3, 6]).toFractionString(),
    );
  });

  it('should restart decoding on every call', () => {
    const rational = PathRational.parse('3.12.5');
    expect([...rational]).toEqual([3n, 12n, 5n]);
    expect([...rational.path()]).toEqual([3n, 12n, 5n]);
    expect(rational.toFractionString()).toBe('502/99');
  });

  it('should print and serialize as dot text', () => {
    expect(PathRational.parse('3.12').toString()).toBe('3.12');
    expect(JSON.stringify([PathRational.parse('0.1')])).toBe('["0.1"]');
  });

  it('should handle the largest element and report overflow beyond it', () => {
    const largest = PathRational.fromVector([MAX_PATH_ELEMENT]);
    expect(largest.toFractionString()).toBe(`${U64_MAX}/1`);
    expect(largest.toVector()).toEqual([MAX_PATH_ELEMENT]);
    expect(() => PathRational.fromVector([MAX_PATH_ELEMENT + 1n])).toThrow(PathOverflowError);
    expect(() => PathRational.fromVector([2n ** 32n, 2n ** 32n])).toThrow(PathOverflowError);
  });

  describe('fromParts', () => {
    it('should reject fractions outside lowest terms', () => {
      expect(() => PathRational.fromParts(142n, 28n)).toThrow('not in lowest terms');
      expect(() => PathRational.fromParts(4n, 0n)).toThrow(MalformedPathIdentifierError);
    });

    it('should reject fractions with a continued-fraction term below the offset', () => {
      expect(() => PathRational.fromParts(3n, 2n)).toThrow('term 1 below 2');
      expect(() => PathRational.fromParts(0n, 1n)).toThrow(MalformedPathIdentifierError);
      expect(() => PathRational.fromParts(1n, 1n)).toThrow(MalformedPathIdentifierError);
    });

    it('should reject values outside 64 bits', () => {
      expect(() => PathRational.fromParts(U64_MAX + 2n, 1n)).toThrow('outside the unsigned 64-bit range');
    });
  });

  describe('parseFraction', () => {
    it('should parse n/d text', () => {
      expect(PathRational.parseFraction('71/14').toVector()).toEqual([3n, 12n]);
      expect(PathRational.parseFraction('1/0').isRoot()).toBe(true);
    });

    it('should reject other shapes', () => {
      expect(() => PathRational.parseFraction('71:14')).toThrow(PathParseError);
      expect(() => PathRational.parseFraction('-5/1')).toThrow(PathParseError);
      expect(() => PathRational.parseFraction('5/')).toThrow(PathParseError);
      expect(() => PathRational.parseFraction(' 5/1 ')).toThrow(PathParseError);
    });
  });
});
