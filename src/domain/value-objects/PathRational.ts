import { MalformedPathIdentifierError, PathParseError } from '../errors/DomainErrors.js';
import { applyOffset, PATH_OFFSET, removeOffset } from './PathOffset.js';
import { toPathVector, type PathElement } from './PathElement.js';
import { PathIdentifier } from './PathIdentifier.js';
import { formatPathText, parsePathText } from './PathText.js';
import { checkedAdd, checkedMul, gcd, isU64 } from './U64.js';

/**
 * 路徑識別值（有理數形式）
 *
 * numerator / denominator 恆為最簡分數。root 以 1/0 表示，
 * 解碼時不產生任何元素。
 */
export class PathRational {
  static readonly ROOT = new PathRational(1n, 0n);

  private constructor(
    readonly numerator: bigint,
    readonly denominator: bigint,
  ) {}

  /**
   * 由路徑向量編碼
   *
   * 連分數由最內層（最後一個元素）往外建：
   * 從 0/1 開始，反向對每個元素做 ratio = 1 / (ratio + e + 2)，最後取倒數。
   * 連分數的漸近分數必為互質，不需要再約分。
   */
  static fromVector(elements: Iterable<PathElement>): PathRational {
    const vector = toPathVector(elements);

    // ratio = p / q
    let p = 0n;
    let q = 1n;
    for (let i = vector.length - 1; i >= 0; i--) {
      const term = applyOffset(vector[i]);
      [p, q] = [q, checkedAdd(p, checkedMul(term, q))];
    }
    return new PathRational(q, p);
  }

  static parse(text: string): PathRational {
    return PathRational.fromVector(parsePathText(text));
  }

  /** 矩陣形式的 a / c 即為同一路徑的有理數值 */
  static fromIdentifier(id: PathIdentifier): PathRational {
    return new PathRational(id.a, id.c);
  }

  /** 由 numerator / denominator 重建；不是 encoder 輸出時丟出 MalformedPathIdentifierError */
  static fromParts(numerator: bigint, denominator: bigint): PathRational {
    if (!isU64(numerator) || !isU64(denominator)) {
      throw new MalformedPathIdentifierError(
        `Rational path identifier ${numerator}/${denominator} is outside the unsigned 64-bit range`,
      );
    }
    if (gcd(numerator, denominator) !== 1n) {
      throw new MalformedPathIdentifierError(
        `Rational path identifier ${numerator}/${denominator} is not in lowest terms`,
      );
    }

    const rational = new PathRational(numerator, denominator);
    for (const term of rational.terms()) {
      if (term < PATH_OFFSET) {
        throw new MalformedPathIdentifierError(
          `Rational path identifier ${numerator}/${denominator} has continued-fraction term ${term} below ${PATH_OFFSET}`,
        );
      }
    }
    return rational;
  }

  /** 解析 "71/14" 形式的文字 */
  static parseFraction(text: string): PathRational {
    const match = /^([0-9]+)\/([0-9]+)$/.exec(text);
    if (!match) {
      throw new PathParseError(text, 0, 'expected "numerator/denominator"');
    }
    return PathRational.fromParts(BigInt(match[1]), BigInt(match[2]));
  }

  isRoot(): boolean {
    return this.denominator === 0n;
  }

  /**
   * Euclid 展開：每步 q = n / d、r = n mod d，輸出 q - 2，繼續 (d, r)，
   * 直到除數為 0。每次呼叫都從頭開始。
   */
  *path(): Generator<bigint, void, undefined> {
    for (const term of this.terms()) {
      yield removeOffset(term);
    }
  }

  [Symbol.iterator](): Generator<bigint, void, undefined> {
    return this.path();
  }

  toVector(): bigint[] {
    return [...this.path()];
  }

  /** 轉為矩陣形式（重新編碼解出的路徑） */
  toIdentifier(): PathIdentifier {
    return PathIdentifier.fromVector(this.path());
  }

  equals(other: PathRational): boolean {
    return this.numerator === other.numerator && this.denominator === other.denominator;
  }

  toFractionString(): string {
    return `${this.numerator}/${this.denominator}`;
  }

  toString(): string {
    return formatPathText(this.toVector());
  }

  toJSON(): string {
    return this.toString();
  }

  private *terms(): Generator<bigint, void, undefined> {
    let n = this.numerator;
    let d = this.denominator;
    while (d !== 0n) {
      const q = n / d;
      [n, d] = [d, n % d];
      yield q;
    }
  }
}
