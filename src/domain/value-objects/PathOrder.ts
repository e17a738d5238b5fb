/**
 * 路徑的全序：依解碼後的元素逐一比較，前綴排在其延伸之前（文件順序）。
 * 兩種識別值形式都是 Iterable<bigint>，可直接比較。
 */
export function comparePaths(x: Iterable<bigint>, y: Iterable<bigint>): number {
  const xs = x[Symbol.iterator]();
  const ys = y[Symbol.iterator]();
  for (;;) {
    const xn = xs.next();
    const yn = ys.next();
    if (xn.done) return yn.done ? 0 : -1;
    if (yn.done) return 1;
    if (xn.value !== yn.value) return xn.value < yn.value ? -1 : 1;
  }
}
