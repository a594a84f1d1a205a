/** 备份历史表的原始 SQL 访问，只追加 */
import type Database from 'better-sqlite3';
import type { BackupHistory, BackupStatus } from '../../shared/types';

interface RawBackupRow {
  id: number;
  backup_time: string;
  backup_type: string | null;
  file_path: string | null;
  status: string | null;
  message: string | null;
}

function parseBackupRow(row: RawBackupRow): BackupHistory {
  const status: BackupStatus = row.status === 'success' ? 'success' : 'failed';
  return {
    id: row.id,
    backup_time: row.backup_time,
    backup_type: row.backup_type ?? '',
    file_path: row.file_path ?? '',
    status,
    message: row.message ?? '',
  };
}

export function insertBackupHistory(db: Database.Database, entry: BackupHistory, at: string): number {
  const result = db.prepare(
    'INSERT INTO backup_history (backup_time, backup_type, file_path, status, message) VALUES (?, ?, ?, ?, ?)'
  ).run(entry.backup_time || at, entry.backup_type, entry.file_path, entry.status, entry.message);
  return Number(result.lastInsertRowid);
}

export function getBackupHistory(db: Database.Database, limit: number): BackupHistory[] {
  const rows = db.prepare<[number], RawBackupRow>('SELECT * FROM backup_history ORDER BY backup_time DESC, id DESC LIMIT ?').all(limit);
  return rows.map(parseBackupRow);
}

/** 只保留最新的 keep 条，返回删除条数 */
export function pruneBackupHistory(db: Database.Database, keep: number): number {
  const result = db.prepare(`
    DELETE FROM backup_history WHERE id NOT IN (
      SELECT id FROM backup_history ORDER BY backup_time DESC, id DESC LIMIT ?
    )
  `).run(keep);
  return result.changes;
}
