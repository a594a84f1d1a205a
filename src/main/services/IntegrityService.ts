import type Database from 'better-sqlite3';
import type { IntegrityReport, RepairResult } from '../../shared/types';
import { logError, logInfo } from '../logger';

interface OrphanRow {
  id: number;
  ref_id: number;
}

interface EmptyFieldRow {
  id: number;
  field_name: string;
}

interface DuplicateRow {
  name: string;
  count: number;
}

interface DanglingCategoryRow {
  id: number;
  site_name: string;
  category: string;
}

export default class IntegrityService {
  private db: Database.Database;
  constructor(db: Database.Database) {
    this.db = db;
  }

  public check(): IntegrityReport {
    const errors: string[] = [];
    const warnings: string[] = [];
    try {
      this.checkOrphans(errors);
      this.checkRequiredFields(errors);
      this.checkUniqueness(errors);
      this.checkCategoryReferences(warnings);
    } catch (error) {
      errors.push(`数据完整性检查失败: ${error instanceof Error ? error.message : String(error)}`);
    }
    logInfo('INTEGRITY_CHECKED', 'integrity check finished', { errors: errors.length, warnings: warnings.length });
    return { isValid: errors.length === 0, errors, warnings };
  }

  /** 删除失去主记录的自定义字段值与修改历史 */
  public repair(): RepairResult {
    const repaired: string[] = [];
    const failed: string[] = [];
    try {
      this.db.transaction(() => {
        const r1 = this.db.prepare(
          'DELETE FROM custom_field_values WHERE password_id NOT IN (SELECT id FROM passwords) OR field_id NOT IN (SELECT id FROM custom_field_definitions)'
        ).run();
        if (r1.changes > 0) repaired.push(`删除了 ${r1.changes} 条无效的自定义字段值`);
        const r2 = this.db.prepare('DELETE FROM modification_history WHERE password_id NOT IN (SELECT id FROM passwords)').run();
        if (r2.changes > 0) repaired.push(`删除了 ${r2.changes} 条无效的修改历史`);
      })();
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      logError('INTEGRITY_REPAIR_FAILED', 'integrity repair failed', err);
      failed.push(`数据修复失败: ${err.message}`);
    }
    return { repaired, failed };
  }

  private checkOrphans(errors: string[]): void {
    const badValues = this.db.prepare<[], OrphanRow>(
      'SELECT v.id, v.password_id AS ref_id FROM custom_field_values v LEFT JOIN passwords p ON v.password_id = p.id WHERE p.id IS NULL'
    ).all();
    for (const r of badValues) errors.push(`自定义字段值 (ID: ${r.id}) 引用了不存在的密码 (ID: ${r.ref_id})`);
    const badDefs = this.db.prepare<[], OrphanRow>(
      'SELECT v.id, v.field_id AS ref_id FROM custom_field_values v LEFT JOIN custom_field_definitions d ON v.field_id = d.id WHERE d.id IS NULL'
    ).all();
    for (const r of badDefs) errors.push(`自定义字段值 (ID: ${r.id}) 引用了不存在的字段 (ID: ${r.ref_id})`);
    const badHistory = this.db.prepare<[], OrphanRow>(
      'SELECT h.id, h.password_id AS ref_id FROM modification_history h LEFT JOIN passwords p ON h.password_id = p.id WHERE p.id IS NULL'
    ).all();
    for (const r of badHistory) errors.push(`修改历史 (ID: ${r.id}) 引用了不存在的密码 (ID: ${r.ref_id})`);
  }

  private checkRequiredFields(errors: string[]): void {
    const rows = this.db.prepare<[], EmptyFieldRow>(
      "SELECT id, 'site_name' AS field_name FROM passwords WHERE site_name IS NULL OR TRIM(site_name) = '' UNION ALL SELECT id, 'password' AS field_name FROM passwords WHERE password IS NULL OR password = ''"
    ).all();
    for (const r of rows) errors.push(`passwords 表中的记录 (ID: ${r.id}) 必填字段 ${r.field_name} 为空`);
  }

  private checkUniqueness(errors: string[]): void {
    const dupCategories = this.db.prepare<[], DuplicateRow>(
      'SELECT name, COUNT(*) AS count FROM categories GROUP BY name HAVING COUNT(*) > 1'
    ).all();
    for (const r of dupCategories) errors.push(`分类名称 "${r.name}" 重复了 ${r.count} 次`);
    const dupFields = this.db.prepare<[], DuplicateRow>(
      'SELECT field_name AS name, COUNT(*) AS count FROM custom_field_definitions GROUP BY field_name HAVING COUNT(*) > 1'
    ).all();
    for (const r of dupFields) errors.push(`自定义字段 "${r.name}" 重复了 ${r.count} 次`);
  }

  private checkCategoryReferences(warnings: string[]): void {
    const rows = this.db.prepare<[], DanglingCategoryRow>(
      "SELECT p.id, p.site_name, p.category FROM passwords p WHERE p.category != '' AND p.category NOT IN (SELECT name FROM categories)"
    ).all();
    for (const r of rows) warnings.push(`密码 "${r.site_name}" (ID: ${r.id}) 的分类 "${r.category}" 不存在`);
  }
}
