/** 單一路徑識別值的完整描述；數值皆以十進位字串表示，可直接 JSON 序列化 */
export interface PathDescription {
  /** 點分隔文字，root 為空字串 */
  text: string;
  vector: string[];
  depth: number;
  isRoot: boolean;
  /** parent 的點分隔文字；root 為 null */
  parent: string | null;
  /** 有理數形式，例如 "71/14"；root 為 "1/0" */
  rational: string;
  /** 矩陣形式 [a, b, c, d] */
  matrix: [string, string, string, string];
}
