export const PRAGMA_SQL = `
PRAGMA journal_mode = WAL;
PRAGMA busy_timeout = 5000;
PRAGMA synchronous = NORMAL;
`;

/**
 * 矩陣分量為無號 64-bit，超出 SQLite INTEGER（有號 64-bit）範圍，
 * 因此以十進位 TEXT 儲存。path_text 僅供閱讀與查詢，重建時以分量為準。
 */
export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS schema_meta (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS stored_paths (
  label TEXT PRIMARY KEY,
  m_a TEXT NOT NULL,
  m_b TEXT NOT NULL,
  m_c TEXT NOT NULL,
  m_d TEXT NOT NULL,
  path_text TEXT NOT NULL,
  depth INTEGER NOT NULL,
  created_at INTEGER NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_stored_paths_text ON stored_paths(path_text);
`;

export const SCHEMA_VERSION = '1';
