/** 密码条目、自定义字段值与修改历史的原始 SQL 访问 */
import type Database from 'better-sqlite3';
import type { ModificationHistory, PasswordItem } from '../../shared/types';

export interface RawPasswordRow {
  id: number;
  site_name: string;
  url: string | null;
  login_account: string | null;
  password: string;
  phone: string | null;
  email: string | null;
  category: string | null;
  notes: string | null;
  register_date: string | null;
  created_at: string;
  updated_at: string;
  is_deleted: number;
  deleted_at: string | null;
}

/** 写入 passwords 表的核心字段（顺序与 SQL 占位符一致） */
export type PasswordColumns = Pick<
  PasswordItem,
  'site_name' | 'url' | 'login_account' | 'password' | 'phone' | 'email' | 'category' | 'notes' | 'register_date'
>;

interface CustomFieldValueRow {
  password_id: number;
  field_name: string;
  value: string | null;
}

export function parsePasswordRow(row: RawPasswordRow, customFields: Record<string, string>): PasswordItem {
  return {
    id: row.id,
    site_name: row.site_name,
    url: row.url ?? '',
    login_account: row.login_account ?? '',
    password: row.password,
    phone: row.phone ?? '',
    email: row.email ?? '',
    category: row.category ?? '',
    notes: row.notes ?? '',
    register_date: row.register_date ?? '',
    created_at: row.created_at,
    updated_at: row.updated_at,
    is_deleted: Boolean(row.is_deleted),
    deleted_at: row.deleted_at,
    custom_fields: customFields,
  };
}

export function selectPasswordRows(db: Database.Database, where: string, params: unknown[], orderBy: string): RawPasswordRow[] {
  const query = `SELECT * FROM passwords${where ? ` WHERE ${where}` : ''} ORDER BY ${orderBy}`;
  return db.prepare<unknown[], RawPasswordRow>(query).all(...params);
}

export function getPasswordRow(db: Database.Database, id: number): RawPasswordRow | undefined {
  return db.prepare<[number], RawPasswordRow>('SELECT * FROM passwords WHERE id = ?').get(id);
}

/** 批量加载自定义字段值，按字段定义的排序组装 */
export function loadCustomFieldValues(db: Database.Database, passwordIds: number[]): Map<number, Record<string, string>> {
  const byPassword = new Map<number, Record<string, string>>();
  if (passwordIds.length === 0) return byPassword;
  const placeholders = passwordIds.map(() => '?').join(',');
  const rows = db.prepare<number[], CustomFieldValueRow>(`
    SELECT cfv.password_id, cfd.field_name, cfv.value
    FROM custom_field_values cfv
    JOIN custom_field_definitions cfd ON cfv.field_id = cfd.id
    WHERE cfv.password_id IN (${placeholders})
    ORDER BY cfd.sort_order, cfd.id
  `).all(...passwordIds);
  for (const row of rows) {
    const fields = byPassword.get(row.password_id) ?? {};
    fields[row.field_name] = row.value ?? '';
    byPassword.set(row.password_id, fields);
  }
  return byPassword;
}

export function hydratePasswords(db: Database.Database, rows: RawPasswordRow[]): PasswordItem[] {
  const values = loadCustomFieldValues(db, rows.map(r => r.id));
  return rows.map(r => parsePasswordRow(r, values.get(r.id) ?? {}));
}

export function insertPassword(db: Database.Database, columns: PasswordColumns, now: string): number {
  const result = db.prepare(`
    INSERT INTO passwords (site_name, url, login_account, password, phone, email, category, notes, register_date, created_at, updated_at, is_deleted, deleted_at)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, 0, NULL)
  `).run(
    columns.site_name,
    columns.url,
    columns.login_account,
    columns.password,
    columns.phone,
    columns.email,
    columns.category,
    columns.notes,
    columns.register_date,
    now,
    now
  );
  return Number(result.lastInsertRowid);
}

export function updatePasswordRow(db: Database.Database, id: number, columns: PasswordColumns, updatedAt: string): number {
  const result = db.prepare(`
    UPDATE passwords SET
      site_name = ?, url = ?, login_account = ?, password = ?, phone = ?, email = ?,
      category = ?, notes = ?, register_date = ?, updated_at = ?
    WHERE id = ?
  `).run(
    columns.site_name,
    columns.url,
    columns.login_account,
    columns.password,
    columns.phone,
    columns.email,
    columns.category,
    columns.notes,
    columns.register_date,
    updatedAt,
    id
  );
  return result.changes;
}

/** 按字段名写入自定义字段值；没有对应定义的字段名直接跳过，返回写入条数 */
export function insertCustomFieldValues(db: Database.Database, passwordId: number, fields: Record<string, string>): number {
  const findField = db.prepare<[string], { id: number }>('SELECT id FROM custom_field_definitions WHERE field_name = ?');
  const insert = db.prepare('INSERT INTO custom_field_values (password_id, field_id, value) VALUES (?, ?, ?)');
  let written = 0;
  for (const [name, value] of Object.entries(fields)) {
    const def = findField.get(name);
    if (!def) continue;
    insert.run(passwordId, def.id, value);
    written++;
  }
  return written;
}

export function deleteCustomFieldValues(db: Database.Database, passwordId: number): void {
  db.prepare('DELETE FROM custom_field_values WHERE password_id = ?').run(passwordId);
}

export function insertModification(db: Database.Database, passwordId: number, fieldName: string, oldValue: string, newValue: string, at: string): void {
  db.prepare(
    'INSERT INTO modification_history (password_id, field_name, old_value, new_value, modified_at) VALUES (?, ?, ?, ?, ?)'
  ).run(passwordId, fieldName, oldValue, newValue, at);
}

export function getModificationHistory(db: Database.Database, passwordId: number): ModificationHistory[] {
  return db.prepare<[number], ModificationHistory>(
    'SELECT * FROM modification_history WHERE password_id = ? ORDER BY modified_at DESC, id DESC'
  ).all(passwordId);
}
