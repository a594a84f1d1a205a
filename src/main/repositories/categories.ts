/** 分类表的原始 SQL 访问，按 sort_order 排序 */
import type Database from 'better-sqlite3';
import type { Category } from '../../shared/types';

export interface RawCategoryRow {
  id: number;
  name: string;
  color: string | null;
  sort_order: number | null;
  is_default: number;
  created_at: string;
}

export function parseCategoryRow(row: RawCategoryRow): Category {
  return {
    id: row.id,
    name: row.name,
    color: row.color || '#999999',
    sort_order: row.sort_order ?? 0,
    is_default: Boolean(row.is_default),
    created_at: row.created_at,
  };
}

export function getCategories(db: Database.Database): Category[] {
  const rows = db.prepare<[], RawCategoryRow>('SELECT * FROM categories ORDER BY sort_order ASC, id ASC').all();
  return rows.map(parseCategoryRow);
}

export function getCategoryById(db: Database.Database, id: number): Category | undefined {
  const row = db.prepare<[number], RawCategoryRow>('SELECT * FROM categories WHERE id = ?').get(id);
  return row ? parseCategoryRow(row) : undefined;
}

export function getCategoryByName(db: Database.Database, name: string): Category | undefined {
  const row = db.prepare<[string], RawCategoryRow>('SELECT * FROM categories WHERE name = ?').get(name);
  return row ? parseCategoryRow(row) : undefined;
}

export function countCategories(db: Database.Database): number {
  const row = db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM categories').get();
  return row?.count ?? 0;
}

/** 统计未删除条目中引用该分类名的数量 */
export function countActiveUsage(db: Database.Database, name: string): number {
  const row = db.prepare<[string], { count: number }>(
    'SELECT COUNT(*) AS count FROM passwords WHERE category = ? AND is_deleted = 0'
  ).get(name);
  return row?.count ?? 0;
}

export function getNextSortOrder(db: Database.Database): number {
  const row = db.prepare<[], { max_sort: number }>('SELECT COALESCE(MAX(sort_order), 0) AS max_sort FROM categories').get();
  return (row?.max_sort ?? 0) + 1;
}
