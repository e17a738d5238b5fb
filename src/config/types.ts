import type { LogLevel } from '../shared/Logger.js';

export type OutputFormat = 'json' | 'text';

/** 路徑儲存設定 */
export interface StoreConfig {
  /** SQLite 檔案路徑（相對於 root） */
  dbPath: string;
}

export interface OutputConfig {
  /** CLI 預設輸出格式 */
  format: OutputFormat;
}

export interface LogConfig {
  level: LogLevel;
}

/** 完整設定 */
export interface PathFracConfig {
  version: number;
  store: StoreConfig;
  output: OutputConfig;
  log: LogConfig;
}

/** 部分設定（用於 merge） */
export type PartialConfig = {
  [K in keyof PathFracConfig]?: PathFracConfig[K] extends object
    ? Partial<PathFracConfig[K]>
    : PathFracConfig[K];
};
