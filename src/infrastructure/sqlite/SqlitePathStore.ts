import type Database from 'better-sqlite3';
import type { PathStorePort } from '../../domain/ports/PathStorePort.js';
import type { StoredPath } from '../../domain/entities/StoredPath.js';
import { PathIdentifier } from '../../domain/value-objects/PathIdentifier.js';

interface StoredPathRow {
  label: string;
  m_a: string;
  m_b: string;
  m_c: string;
  m_d: string;
  created_at: number;
}

/**
 * 以 better-sqlite3 實作的路徑儲存
 * 四個分量以十進位字串寫入，讀回時經 PathIdentifier.fromComponents 驗證
 */
export class SqlitePathStore implements PathStorePort {
  constructor(private readonly db: Database.Database) {}

  save(label: string, id: PathIdentifier): StoredPath {
    const now = Date.now();
    const [a, b, c, d] = id.toComponents();

    this.db.prepare(`
      INSERT INTO stored_paths (label, m_a, m_b, m_c, m_d, path_text, depth, created_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(label) DO UPDATE SET
        m_a = excluded.m_a,
        m_b = excluded.m_b,
        m_c = excluded.m_c,
        m_d = excluded.m_d,
        path_text = excluded.path_text,
        depth = excluded.depth,
        created_at = excluded.created_at
    `).run(label, a.toString(), b.toString(), c.toString(), d.toString(), id.toString(), id.depth(), now);

    return { label, id, createdAt: now };
  }

  get(label: string): StoredPath | undefined {
    const row = this.db.prepare<[string], StoredPathRow>(
      'SELECT label, m_a, m_b, m_c, m_d, created_at FROM stored_paths WHERE label = ?',
    ).get(label);

    return row ? this.toStoredPath(row) : undefined;
  }

  list(): StoredPath[] {
    const rows = this.db.prepare<[], StoredPathRow>(
      'SELECT label, m_a, m_b, m_c, m_d, created_at FROM stored_paths ORDER BY label',
    ).all();

    return rows.map((row) => this.toStoredPath(row));
  }

  remove(label: string): boolean {
    const result = this.db.prepare('DELETE FROM stored_paths WHERE label = ?').run(label);
    return result.changes > 0;
  }

  private toStoredPath(row: StoredPathRow): StoredPath {
    return {
      label: row.label,
      id: PathIdentifier.fromComponents([
        BigInt(row.m_a),
        BigInt(row.m_b),
        BigInt(row.m_c),
        BigInt(row.m_d),
      ]),
      createdAt: row.created_at,
    };
  }
}
