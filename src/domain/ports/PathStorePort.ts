import type { StoredPath } from '../entities/StoredPath.js';
import type { PathIdentifier } from '../value-objects/PathIdentifier.js';

/**
 * 路徑識別值的持久化介面
 * 實作必須讓識別值的四個分量原樣往返，不得截斷或轉成浮點數
 */
export interface PathStorePort {
  /** 新增或覆寫 label 對應的識別值 */
  save(label: string, id: PathIdentifier): StoredPath;
  get(label: string): StoredPath | undefined;
  /** 依 label 排序 */
  list(): StoredPath[];
  remove(label: string): boolean;
}
