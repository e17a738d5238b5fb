import { PathOverflowError } from '../errors/DomainErrors.js';

/** 無號 64-bit 整數的上限 */
export const U64_MAX = (1n << 64n) - 1n;

function ensureInRange(value: bigint, op: string): bigint {
  if (value < 0n || value > U64_MAX) {
    throw new PathOverflowError(`u64 ${op} overflow: result ${value} is outside [0, ${U64_MAX}]`);
  }
  return value;
}

export function checkedAdd(x: bigint, y: bigint): bigint {
  return ensureInRange(x + y, 'add');
}

export function checkedMul(x: bigint, y: bigint): bigint {
  return ensureInRange(x * y, 'mul');
}

export function isU64(value: bigint): boolean {
  return value >= 0n && value <= U64_MAX;
}

/** 最大公因數（Euclid） */
export function gcd(x: bigint, y: bigint): bigint {
  let a = x;
  let b = y;
  while (b !== 0n) {
    [a, b] = [b, a % b];
  }
  return a;
}
