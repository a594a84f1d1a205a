/** 设置表的原始 SQL 访问（key/value 字符串对） */
import type Database from 'better-sqlite3';

export function getSettingValue(db: Database.Database, key: string): string | undefined {
  const row = db.prepare<[string], { value: string | null }>('SELECT value FROM settings WHERE key = ?').get(key);
  return row ? row.value ?? '' : undefined;
}

export function getAllSettings(db: Database.Database): Record<string, string> {
  const rows = db.prepare<[], { key: string; value: string | null }>('SELECT key, value FROM settings ORDER BY key').all();
  const out: Record<string, string> = {};
  for (const row of rows) out[row.key] = row.value ?? '';
  return out;
}

export function upsertSetting(db: Database.Database, key: string, value: string): void {
  db.prepare('INSERT INTO settings (key, value) VALUES (?, ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value').run(key, value);
}

export function countSettings(db: Database.Database): number {
  const row = db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM settings').get();
  return row?.count ?? 0;
}
