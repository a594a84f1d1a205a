import type Database from 'better-sqlite3';
import type { CustomFieldDefinition, DeleteResult } from '../../shared/types';
import { ConflictError, ValidationError } from '../errors';
import { runInTransaction, runQuery } from '../database/transaction';
import { logInfo } from '../logger';
import * as FieldsRepo from '../repositories/customFields';

/**
 * 自定义字段定义服务。字段对所有条目统一生效，值存放在 custom_field_values
 */
export class CustomFieldService {
  private db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  public getCustomFields(): CustomFieldDefinition[] {
    return runQuery('读取自定义字段失败', () => FieldsRepo.getCustomFields(this.db));
  }

  /** 新增字段定义，未指定排序时排在最后 */
  public addCustomField(field: CustomFieldDefinition): number {
    this.validateCustomField(field);
    const name = field.field_name.trim();
    const id = runInTransaction(this.db, '添加自定义字段失败', () => {
      if (FieldsRepo.getCustomFieldByName(this.db, name)) throw new ConflictError('自定义字段已存在');
      const sortOrder = field.sort_order ?? FieldsRepo.getNextSortOrder(this.db);
      const result = this.db.prepare(
        'INSERT INTO custom_field_definitions (field_name, field_type, sort_order, created_at) VALUES (?, ?, ?, ?)'
      ).run(name, 'text', sortOrder, new Date().toISOString());
      return Number(result.lastInsertRowid);
    });
    logInfo('CUSTOM_FIELD_ADDED', 'custom field added', { id, name });
    return id;
  }

  /** 重命名或调整排序 */
  public updateCustomField(field: CustomFieldDefinition): boolean {
    this.validateCustomField(field);
    const id = field.id;
    if (id == null) throw new ValidationError('自定义字段ID不能为空');
    const name = field.field_name.trim();
    return runInTransaction(this.db, '更新自定义字段失败', () => {
      const current = FieldsRepo.getCustomFieldById(this.db, id);
      if (!current) return false;
      const clash = FieldsRepo.getCustomFieldByName(this.db, name);
      if (clash && clash.id !== id) throw new ConflictError('自定义字段已存在');
      this.db.prepare('UPDATE custom_field_definitions SET field_name = ?, sort_order = ? WHERE id = ?').run(
        name,
        field.sort_order ?? current.sort_order ?? 0,
        id
      );
      return true;
    });
  }

  /** 删除字段定义；仍有值引用时拒绝 */
  public deleteCustomField(id: number): DeleteResult {
    return runInTransaction(this.db, '删除自定义字段失败', (): DeleteResult => {
      if (!FieldsRepo.getCustomFieldById(this.db, id)) return { success: false, reason: 'not_found' };
      const usage = FieldsRepo.countValues(this.db, id);
      if (usage > 0) return { success: false, reason: 'in_use', usage };
      this.db.prepare('DELETE FROM custom_field_definitions WHERE id = ?').run(id);
      return { success: true };
    });
  }

  public getCustomFieldUsageCount(id: number): number {
    return runQuery('统计自定义字段使用次数失败', () => FieldsRepo.countValues(this.db, id));
  }

  public validateCustomField(field: CustomFieldDefinition): void {
    if (!field.field_name || field.field_name.trim().length === 0) throw new ValidationError('字段名称不能为空');
    if (field.field_name.length > 100) throw new ValidationError('字段名称长度不能超过100个字符');
    if (field.field_type && field.field_type !== 'text') throw new ValidationError('无效的字段类型');
  }
}

export default CustomFieldService;
