/** 自定义字段定义的原始 SQL 访问 */
import type Database from 'better-sqlite3';
import type { CustomFieldDefinition } from '../../shared/types';

export interface RawCustomFieldRow {
  id: number;
  field_name: string;
  field_type: string | null;
  sort_order: number | null;
  created_at: string;
}

export function parseCustomFieldRow(row: RawCustomFieldRow): CustomFieldDefinition {
  return {
    id: row.id,
    field_name: row.field_name,
    field_type: 'text',
    sort_order: row.sort_order ?? 0,
    created_at: row.created_at,
  };
}

export function getCustomFields(db: Database.Database): CustomFieldDefinition[] {
  const rows = db.prepare<[], RawCustomFieldRow>('SELECT * FROM custom_field_definitions ORDER BY sort_order ASC, id ASC').all();
  return rows.map(parseCustomFieldRow);
}

export function getCustomFieldById(db: Database.Database, id: number): CustomFieldDefinition | undefined {
  const row = db.prepare<[number], RawCustomFieldRow>('SELECT * FROM custom_field_definitions WHERE id = ?').get(id);
  return row ? parseCustomFieldRow(row) : undefined;
}

export function getCustomFieldByName(db: Database.Database, name: string): CustomFieldDefinition | undefined {
  const row = db.prepare<[string], RawCustomFieldRow>('SELECT * FROM custom_field_definitions WHERE field_name = ?').get(name);
  return row ? parseCustomFieldRow(row) : undefined;
}

export function countValues(db: Database.Database, fieldId: number): number {
  const row = db.prepare<[number], { count: number }>('SELECT COUNT(*) AS count FROM custom_field_values WHERE field_id = ?').get(fieldId);
  return row?.count ?? 0;
}

export function getNextSortOrder(db: Database.Database): number {
  const row = db.prepare<[], { max_sort: number }>('SELECT COALESCE(MAX(sort_order), 0) AS max_sort FROM custom_field_definitions').get();
  return (row?.max_sort ?? 0) + 1;
}
