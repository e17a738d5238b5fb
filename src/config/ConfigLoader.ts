import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { CONFIG_FILE_NAME, DEFAULT_CONFIG } from './defaults.js';
import { isLogLevel, LOG_LEVELS } from '../shared/Logger.js';
import type { PathFracConfig, PartialConfig } from './types.js';

export type { PathFracConfig, PartialConfig, OutputFormat } from './types.js';

/** 設定檔內容的 schema；未知欄位視為錯誤 */
const fileConfigSchema = z
  .object({
    version: z.number().int().positive(),
    store: z.object({ dbPath: z.string() }).partial(),
    output: z.object({ format: z.enum(['json', 'text']) }).partial(),
    log: z.object({ level: z.enum(LOG_LEVELS) }).partial(),
  })
  .partial()
  .strict();

/** 合併：partial 中有值的欄位覆蓋 base */
function merge(base: PathFracConfig, partial: PartialConfig): PathFracConfig {
  return {
    version: partial.version ?? base.version,
    store: {
      dbPath: partial.store?.dbPath ?? base.store.dbPath,
    },
    output: {
      format: partial.output?.format ?? base.output.format,
    },
    log: {
      level: partial.log?.level ?? base.log.level,
    },
  };
}

/** 環境變數覆蓋：PATHFRAC_DB_PATH → store.dbPath、PATHFRAC_LOG_LEVEL → log.level */
function applyEnvOverrides(config: PathFracConfig): void {
  const dbPath = process.env.PATHFRAC_DB_PATH;
  if (dbPath) {
    config.store.dbPath = dbPath;
  }

  const level = process.env.PATHFRAC_LOG_LEVEL;
  if (level) {
    if (!isLogLevel(level)) {
      throw new Error(`PATHFRAC_LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}`);
    }
    config.log.level = level;
  }
}

/** 驗證設定值的合法性；format 與 level 已由 schema 與環境變數檢查把關 */
function validate(config: PathFracConfig): void {
  if (config.store.dbPath.trim() === '') {
    throw new Error('store.dbPath must not be empty');
  }
}

function readConfigFile(root: string): PartialConfig {
  const configPath = path.join(root, CONFIG_FILE_NAME);
  if (!fs.existsSync(configPath)) return {};

  const raw: unknown = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  const parsed = fileConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join('.') : '(root)';
    throw new Error(`Invalid ${CONFIG_FILE_NAME} at ${where}: ${issue?.message ?? 'unknown error'}`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

/**
 * 載入設定：讀取 .pathfrac.json（若存在）並合併到預設值上
 * @param root - 設定檔所在目錄，也是 store.dbPath 的基準目錄
 * @param overrides - 程式碼層級的覆蓋值（優先於檔案）
 */
export function loadConfig(root: string, overrides?: PartialConfig): PathFracConfig {
  // 合併順序：defaults < file config < overrides < 環境變數
  let merged = merge(DEFAULT_CONFIG, readConfigFile(root));
  if (overrides) {
    merged = merge(merged, overrides);
  }

  applyEnvOverrides(merged);

  validate(merged);
  return merged;
}
