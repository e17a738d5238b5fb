import { PathParseError } from '../domain/errors/DomainErrors.js';
import { PathIdentifier } from '../domain/value-objects/PathIdentifier.js';
import { PathRational } from '../domain/value-objects/PathRational.js';
import { comparePaths } from '../domain/value-objects/PathOrder.js';
import type { PathElement } from '../domain/value-objects/PathElement.js';
import type { PathDescription } from './dto/PathDescription.js';
import type { PathComparison } from './dto/PathComparison.js';

/**
 * Codec Use Case
 *
 * 路徑文字／向量與識別值之間的轉換，輸出可序列化的 DTO。
 * decode 接受兩種外部表示：有理數 "n/d" 與矩陣 "a,b,c,d"。
 */
export class CodecUseCase {
  /** 編碼點分隔文字或路徑向量 */
  encode(input: string | Iterable<PathElement>): PathDescription {
    const id = typeof input === 'string'
      ? PathIdentifier.parse(input)
      : PathIdentifier.fromVector(input);
    return this.describe(id);
  }

  /** 解碼 "n/d" 或 "a,b,c,d" */
  decode(identifier: string): PathDescription {
    return this.describe(this.parseIdentifier(identifier));
  }

  /** 比較兩條點分隔文字路徑 */
  compare(left: string, right: string): PathComparison {
    const l = PathIdentifier.parse(left);
    const r = PathIdentifier.parse(right);
    const order = comparePaths(l, r);

    return {
      left: l.toString(),
      right: r.toString(),
      order: order < 0 ? -1 : order > 0 ? 1 : 0,
      equal: l.equals(r),
      leftIsAncestor: l.isAncestorOf(r),
      rightIsAncestor: r.isAncestorOf(l),
    };
  }

  describe(id: PathIdentifier): PathDescription {
    const vector = id.toVector();
    const parent = id.parent();
    const [a, b, c, d] = id.toComponents();

    return {
      text: id.toString(),
      vector: vector.map((element) => element.toString()),
      depth: vector.length,
      isRoot: id.isRoot(),
      parent: parent ? parent.toString() : null,
      rational: PathRational.fromIdentifier(id).toFractionString(),
      matrix: [a.toString(), b.toString(), c.toString(), d.toString()],
    };
  }

  private parseIdentifier(text: string): PathIdentifier {
    const trimmed = text.trim();

    if (trimmed.includes('/')) {
      return PathRational.parseFraction(trimmed).toIdentifier();
    }

    if (trimmed.includes(',')) {
      const parts = trimmed.split(',').map((part, index) => {
        const value = part.trim();
        if (!/^[0-9]+$/.test(value)) {
          throw new PathParseError(value, index, 'matrix component is not a non-negative decimal integer');
        }
        return BigInt(value);
      });
      return PathIdentifier.fromComponents(parts);
    }

    throw new PathParseError(trimmed, 0, 'expected "numerator/denominator" or "a,b,c,d"');
  }
}
