import { z } from 'zod';
import { InvalidPathElementError } from '../errors/DomainErrors.js';

/** 程式介面接受的路徑元素：safe integer 的 number 或 bigint */
export type PathElement = number | bigint;

/** 解碼後的路徑向量；空陣列代表 root */
export type PathVector = readonly bigint[];

const pathElementSchema = z.union([
  z.bigint().nonnegative(),
  z.number().int().nonnegative().refine(Number.isSafeInteger, 'must be a safe integer'),
]);

/** 驗證並正規化成 bigint；上限由編碼時的溢位檢查負責 */
export function toPathElement(value: unknown): bigint {
  const parsed = pathElementSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidPathElementError(value, { cause: parsed.error });
  }
  return BigInt(parsed.data);
}

export function toPathVector(elements: Iterable<PathElement>): bigint[] {
  return Array.from(elements, toPathElement);
}
