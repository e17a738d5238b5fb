import { checkedAdd, U64_MAX } from './U64.js';

/**
 * 路徑元素偏移量（fudge）
 *
 * 每個有理數對應兩種連分數展開：結尾為 1 的與不是 1 的。
 * 若直接把路徑元素當成連分數項，`[3,5,1]` 與 `[3,6]` 會得到同一個數。
 * 編碼時每個元素加 2、解碼時減 2，所有內部項因此都 ≥ 2，
 * 結尾為 1 的展開永遠不會出現，對應變成雙射（0 也能使用）。
 */
export const PATH_OFFSET = 2n;

/** 可以安全加上偏移量的最大路徑元素 */
export const MAX_PATH_ELEMENT = U64_MAX - PATH_OFFSET;

/** 路徑元素 → 連分數項 */
export function applyOffset(element: bigint): bigint {
  return checkedAdd(element, PATH_OFFSET);
}

/** 連分數項 → 路徑元素；呼叫端保證 term ≥ PATH_OFFSET */
export function removeOffset(term: bigint): bigint {
  return term - PATH_OFFSET;
}
