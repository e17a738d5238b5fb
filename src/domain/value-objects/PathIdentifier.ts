import { MalformedPathIdentifierError } from '../errors/DomainErrors.js';
import { applyOffset, PATH_OFFSET, removeOffset } from './PathOffset.js';
import { toPathElement, type PathElement } from './PathElement.js';
import { formatPathText, parsePathText } from './PathText.js';
import { checkedAdd, checkedMul, isU64 } from './U64.js';

/** 矩陣的四個分量 [a, b, c, d]，對應 | a b ; c d | */
export type MatrixComponents = readonly [bigint, bigint, bigint, bigint];

/**
 * 路徑識別值（矩陣形式）
 *
 * 每個路徑元素 e 對應基本矩陣 | e+2 1 ; 1 0 |，識別值即依序右乘的乘積，
 * root 為單位矩陣。a/c 是整條路徑的連分數值，b/d 是 parent 的值。
 *
 * 不可變；只能由 encoder（fromVector / parse / child / concat）
 * 或經過驗證的 fromComponents 建立。
 */
export class PathIdentifier {
  static readonly ROOT = new PathIdentifier(1n, 0n, 0n, 1n);

  private constructor(
    readonly a: bigint,
    readonly b: bigint,
    readonly c: bigint,
    readonly d: bigint,
  ) {}

  /** 由路徑向量編碼；溢位時丟出 PathOverflowError */
  static fromVector(elements: Iterable<PathElement>): PathIdentifier {
    let id = PathIdentifier.ROOT;
    for (const element of elements) {
      id = id.child(element);
    }
    return id;
  }

  /** 解析點分隔文字，例如 "3.12.5" */
  static parse(text: string): PathIdentifier {
    return PathIdentifier.fromVector(parsePathText(text));
  }

  /**
   * 由儲存的四個分量重建
   * 走一次解碼流程確認它是基本矩陣的乘積，否則丟出 MalformedPathIdentifierError
   */
  static fromComponents(components: readonly bigint[]): PathIdentifier {
    if (components.length !== 4) {
      throw new MalformedPathIdentifierError(
        `Path identifier needs 4 components, got ${components.length}`,
      );
    }
    const [a, b, c, d] = components;
    if (![a, b, c, d].every(isU64)) {
      throw new MalformedPathIdentifierError(
        `Path identifier components must be unsigned 64-bit values: ${components.join(',')}`,
      );
    }

    const id = new PathIdentifier(a, b, c, d);
    id.assertWellFormed();
    return id;
  }

  /** 基本矩陣 | element+2 1 ; 1 0 | */
  private static elementary(element: PathElement): PathIdentifier {
    return new PathIdentifier(applyOffset(toPathElement(element)), 1n, 1n, 0n);
  }

  isRoot(): boolean {
    return this.b === 0n;
  }

  /** 附加一個子元素（O(1)） */
  child(element: PathElement): PathIdentifier {
    return this.multiply(PathIdentifier.elementary(element));
  }

  /** 串接兩條路徑：this 的路徑後接 other 的路徑 */
  concat(other: PathIdentifier): PathIdentifier {
    return this.multiply(other);
  }

  /**
   * 移除最後一個元素（O(1)）
   *
   * 最後一項 k = a / b（因為每項 ≥ 2，parent 的 b 必小於目前的 b），
   * parent = | b  a-k·b ; d  c-k·d |。root 沒有 parent。
   */
  parent(): PathIdentifier | undefined {
    if (this.isRoot()) return undefined;
    const k = this.a / this.b;
    return new PathIdentifier(this.b, this.a - k * this.b, this.d, this.c - k * this.d);
  }

  /** 路徑長度；root 為 0 */
  depth(): number {
    let count = 0;
    const walk = this.terms(false);
    while (!walk.next().done) count++;
    return count;
  }

  /** 是否為 other 的真祖先（路徑為 other 的真前綴） */
  isAncestorOf(other: PathIdentifier): boolean {
    const mine = this.path();
    const theirs = other.path();
    for (;;) {
      const m = mine.next();
      const t = theirs.next();
      if (m.done) return !t.done;
      if (t.done || m.value !== t.value) return false;
    }
  }

  /**
   * 解碼為路徑元素序列
   * 每次呼叫都從內部狀態的副本重新開始，identifier 本身不會改變
   */
  *path(): Generator<bigint, void, undefined> {
    for (const term of this.terms(false)) {
      yield removeOffset(term);
    }
  }

  [Symbol.iterator](): Generator<bigint, void, undefined> {
    return this.path();
  }

  toVector(): bigint[] {
    return [...this.path()];
  }

  toComponents(): MatrixComponents {
    return [this.a, this.b, this.c, this.d];
  }

  equals(other: PathIdentifier): boolean {
    return this.a === other.a && this.b === other.b && this.c === other.c && this.d === other.d;
  }

  toString(): string {
    return formatPathText(this.toVector());
  }

  toJSON(): string {
    return this.toString();
  }

  /**
   * 逐步分解出基本矩陣，產生連分數項（含偏移量）
   *
   * 每步 q = a / c，狀態變為 | c d ; a-c·q b-d·q |，直到 b = 0。
   * validate 為 true 時檢查每一步都符合 encoder 的輸出形式。
   */
  private *terms(validate: boolean): Generator<bigint, void, undefined> {
    let [a, b, c, d] = [this.a, this.b, this.c, this.d];

    while (b !== 0n) {
      if (validate && c === 0n) {
        throw this.malformed('zero divisor before reaching the root');
      }
      const q = a / c;
      if (validate && q < PATH_OFFSET) {
        throw this.malformed(`continued-fraction term ${q} is below ${PATH_OFFSET}`);
      }
      const nextC = a - c * q;
      const nextD = b - d * q;
      if (validate && nextD < 0n) {
        throw this.malformed('inconsistent parent column');
      }
      [a, b, c, d] = [c, d, nextC, nextD];
      yield q;
    }

    if (validate && !(a === 1n && c === 0n && d === 1n)) {
      throw this.malformed('does not reduce to the identity matrix');
    }
  }

  private assertWellFormed(): void {
    const walk = this.terms(true);
    while (!walk.next().done);
  }

  private malformed(reason: string): MalformedPathIdentifierError {
    return new MalformedPathIdentifierError(
      `Malformed path identifier (${this.toComponents().join(',')}): ${reason}`,
    );
  }

  private multiply(o: PathIdentifier): PathIdentifier {
    // | a b |   | oa ob |   | a·oa + b·oc  a·ob + b·od |
    // | c d | x | oc od | = | c·oa + d·oc  c·ob + d·od |
    return new PathIdentifier(
      checkedAdd(checkedMul(this.a, o.a), checkedMul(this.b, o.c)),
      checkedAdd(checkedMul(this.a, o.b), checkedMul(this.b, o.d)),
      checkedAdd(checkedMul(this.c, o.a), checkedMul(this.d, o.c)),
      checkedAdd(checkedMul(this.c, o.b), checkedMul(this.d, o.d)),
    );
  }
}
