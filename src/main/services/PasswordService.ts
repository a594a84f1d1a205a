import type Database from 'better-sqlite3';
import type { ModificationHistory, PasswordDraft, PasswordItem } from '../../shared/types';
import { TRACKED_FIELDS } from '../config';
import { ValidationError } from '../errors';
import { runInTransaction, runQuery } from '../database/transaction';
import { logInfo } from '../logger';
import * as PasswordsRepo from '../repositories/passwords';

/** 本地日期 YYYY-MM-DD，作为注册时间默认值 */
export function todayString(date: Date = new Date()): string {
  const pad = (n: number) => (n < 10 ? `0${n}` : `${n}`);
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/** 补全可选字段，得到写入 passwords 表的列值 */
export function toPasswordColumns(draft: PasswordDraft): PasswordsRepo.PasswordColumns {
  return {
    site_name: draft.site_name ?? '',
    url: draft.url ?? '',
    login_account: draft.login_account ?? '',
    password: draft.password ?? '',
    phone: draft.phone ?? '',
    email: draft.email ?? '',
    category: draft.category ?? '',
    notes: draft.notes ?? '',
    register_date: draft.register_date || todayString(),
  };
}

/**
 * 密码条目服务：增删改查、回收站、存储层模糊搜索与修改历史
 */
export class PasswordService {
  private db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  /** 校验必填字段（网站名称、密码） */
  public validatePassword(draft: PasswordDraft): void {
    if (!draft.site_name || draft.site_name.trim().length === 0) throw new ValidationError('网站名称不能为空');
    if (!draft.password || draft.password.trim().length === 0) throw new ValidationError('密码不能为空');
  }

  /** 新增条目并写入自定义字段值，返回新ID */
  public addPassword(draft: PasswordDraft): number {
    this.validatePassword(draft);
    const columns = toPasswordColumns(draft);
    const id = runInTransaction(this.db, '添加密码失败', () => {
      const newId = PasswordsRepo.insertPassword(this.db, columns, new Date().toISOString());
      PasswordsRepo.insertCustomFieldValues(this.db, newId, draft.custom_fields ?? {});
      return newId;
    });
    logInfo('PASSWORD_ADDED', 'password added', { id });
    return id;
  }

  /**
   * 更新条目。传入旧快照时逐字段比对并写入修改历史；
   * 自定义字段值整体删除后重新写入。条目不存在时返回 false
   */
  public updatePassword(record: PasswordItem, previous?: PasswordItem): boolean {
    this.validatePassword(record);
    const columns = toPasswordColumns(record);
    const updated = runInTransaction(this.db, '更新密码失败', () => {
      const existing = PasswordsRepo.getPasswordRow(this.db, record.id);
      if (!existing) return false;
      const now = new Date().toISOString();
      const updatedAt = now > existing.updated_at ? now : existing.updated_at;
      PasswordsRepo.updatePasswordRow(this.db, record.id, columns, updatedAt);
      if (previous) {
        const before = toPasswordColumns(previous);
        for (const [field, label] of TRACKED_FIELDS) {
          if (before[field] !== columns[field]) {
            PasswordsRepo.insertModification(this.db, record.id, label, before[field], columns[field], updatedAt);
          }
        }
      }
      PasswordsRepo.deleteCustomFieldValues(this.db, record.id);
      PasswordsRepo.insertCustomFieldValues(this.db, record.id, record.custom_fields ?? {});
      return true;
    });
    if (updated) logInfo('PASSWORD_UPDATED', 'password updated', { id: record.id });
    return updated;
  }

  /** 移入回收站 */
  public softDeletePassword(id: number): boolean {
    const res = runInTransaction(this.db, '删除密码失败', () =>
      this.db.prepare('UPDATE passwords SET is_deleted = 1, deleted_at = ? WHERE id = ? AND is_deleted = 0').run(new Date().toISOString(), id)
    );
    return res.changes > 0;
  }

  /** 从回收站恢复 */
  public restorePassword(id: number): boolean {
    const res = runInTransaction(this.db, '恢复密码失败', () =>
      this.db.prepare('UPDATE passwords SET is_deleted = 0, deleted_at = NULL WHERE id = ? AND is_deleted = 1').run(id)
    );
    return res.changes > 0;
  }

  /** 彻底删除回收站中的条目，自定义字段值与历史随外键级联删除 */
  public purgePassword(id: number): boolean {
    const res = runInTransaction(this.db, '彻底删除密码失败', () =>
      this.db.prepare('DELETE FROM passwords WHERE id = ? AND is_deleted = 1').run(id)
    );
    if (res.changes > 0) logInfo('PASSWORD_PURGED', 'password purged', { id });
    return res.changes > 0;
  }

  /** 清空回收站，返回删除条数 */
  public emptyRecycleBin(): number {
    const res = runInTransaction(this.db, '清空回收站失败', () =>
      this.db.prepare('DELETE FROM passwords WHERE is_deleted = 1').run()
    );
    logInfo('RECYCLE_BIN_EMPTIED', 'recycle bin emptied', { count: res.changes });
    return res.changes;
  }

  public getPassword(id: number): PasswordItem | null {
    return runQuery('读取密码失败', () => {
      const row = PasswordsRepo.getPasswordRow(this.db, id);
      if (!row) return null;
      return PasswordsRepo.hydratePasswords(this.db, [row])[0] ?? null;
    });
  }

  /** 获取条目列表，按创建时间倒序 */
  public listPasswords(includeDeleted = false): PasswordItem[] {
    return runQuery('读取密码列表失败', () => {
      const rows = PasswordsRepo.selectPasswordRows(this.db, includeDeleted ? '' : 'is_deleted = 0', [], 'created_at DESC, id DESC');
      return PasswordsRepo.hydratePasswords(this.db, rows);
    });
  }

  /** 回收站内容，按删除时间倒序 */
  public listDeletedPasswords(): PasswordItem[] {
    return runQuery('读取回收站失败', () => {
      const rows = PasswordsRepo.selectPasswordRows(this.db, 'is_deleted = 1', [], 'deleted_at DESC, id DESC');
      return PasswordsRepo.hydratePasswords(this.db, rows);
    });
  }

  /** 存储层 LIKE 搜索：网站名称、账号、邮箱、手机号、备注、网址任一包含关键字 */
  public searchPasswords(keyword: string, includeDeleted = false): PasswordItem[] {
    const pattern = `%${keyword}%`;
    const columns = ['site_name', 'login_account', 'email', 'phone', 'notes', 'url'];
    let where = `(${columns.map(c => `${c} LIKE ?`).join(' OR ')})`;
    if (!includeDeleted) where += ' AND is_deleted = 0';
    const rows = runQuery('搜索密码失败', () =>
      PasswordsRepo.hydratePasswords(
        this.db,
        PasswordsRepo.selectPasswordRows(this.db, where, columns.map(() => pattern), 'created_at DESC, id DESC')
      )
    );
    logInfo('PASSWORD_SEARCH', 'storage search finished', { keyword, count: rows.length });
    return rows;
  }

  /** 按分类名精确筛选 */
  public filterPasswordsByCategory(category: string, includeDeleted = false): PasswordItem[] {
    const where = includeDeleted ? 'category = ?' : 'category = ? AND is_deleted = 0';
    return runQuery('按分类筛选失败', () =>
      PasswordsRepo.hydratePasswords(this.db, PasswordsRepo.selectPasswordRows(this.db, where, [category], 'created_at DESC, id DESC'))
    );
  }

  public getModificationHistory(passwordId: number): ModificationHistory[] {
    return runQuery('读取修改历史失败', () => PasswordsRepo.getModificationHistory(this.db, passwordId));
  }
}

export default PasswordService;
