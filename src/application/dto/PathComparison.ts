/** 兩條路徑的比較結果 */
export interface PathComparison {
  left: string;
  right: string;
  /** 文件順序：-1 表示 left 在前 */
  order: -1 | 0 | 1;
  equal: boolean;
  leftIsAncestor: boolean;
  rightIsAncestor: boolean;
}
