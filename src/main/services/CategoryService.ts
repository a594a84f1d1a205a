import type Database from 'better-sqlite3';
import type { Category, DeleteResult } from '../../shared/types';
import { DEFAULT_CATEGORIES } from '../config';
import { ConflictError, ValidationError } from '../errors';
import { runInTransaction, runQuery } from '../database/transaction';
import { logInfo } from '../logger';
import * as CategoriesRepo from '../repositories/categories';

const HEX_COLOR = /^#(?:[0-9a-fA-F]{3}|[0-9a-fA-F]{6})$/;

/**
 * 分类模块服务，负责分类的查询、保存、删除及默认分类初始化
 */
export class CategoryService {
  private db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  /** 分类表为空时写入默认分类（调用方负责事务） */
  public seedDefaults(): number {
    if (CategoriesRepo.countCategories(this.db) > 0) return 0;
    const now = new Date().toISOString();
    const stmt = this.db.prepare('INSERT INTO categories (name, color, sort_order, is_default, created_at) VALUES (?, ?, ?, 1, ?)');
    for (const c of DEFAULT_CATEGORIES) {
      stmt.run(c.name, c.color, c.sort_order, now);
    }
    logInfo('CATEGORIES_SEEDED', '已插入默认分类', { count: DEFAULT_CATEGORIES.length });
    return DEFAULT_CATEGORIES.length;
  }

  /** 获取所有分类，按 sort_order 排序 */
  public getCategories(): Category[] {
    return runQuery('读取分类失败', () => CategoriesRepo.getCategories(this.db));
  }

  public getCategoryById(id: number): Category | undefined {
    return runQuery('读取分类失败', () => CategoriesRepo.getCategoryById(this.db, id));
  }

  /** 新增分类，名称重复时抛出 ConflictError */
  public addCategory(category: Category): number {
    this.validateCategory(category);
    const name = category.name.trim();
    const id = runInTransaction(this.db, '添加分类失败', () => {
      if (CategoriesRepo.getCategoryByName(this.db, name)) throw new ConflictError('分类名称已存在');
      const sortOrder = category.sort_order ?? CategoriesRepo.getNextSortOrder(this.db);
      const result = this.db.prepare(
        'INSERT INTO categories (name, color, sort_order, is_default, created_at) VALUES (?, ?, ?, ?, ?)'
      ).run(name, category.color || '#999999', sortOrder, category.is_default ? 1 : 0, new Date().toISOString());
      return Number(result.lastInsertRowid);
    });
    logInfo('CATEGORY_ADDED', 'category added', { id, name });
    return id;
  }

  /**
   * 更新分类名称、颜色与排序。条目中保存的分类名称不随之改变
   */
  public updateCategory(category: Category): boolean {
    this.validateCategory(category);
    const id = category.id;
    if (id == null) throw new ValidationError('分类ID不能为空');
    const name = category.name.trim();
    return runInTransaction(this.db, '更新分类失败', () => {
      const current = CategoriesRepo.getCategoryById(this.db, id);
      if (!current) return false;
      const clash = CategoriesRepo.getCategoryByName(this.db, name);
      if (clash && clash.id !== id) throw new ConflictError('分类名称已存在');
      this.db.prepare('UPDATE categories SET name = ?, color = ?, sort_order = ? WHERE id = ?').run(
        name,
        category.color || current.color || '#999999',
        category.sort_order ?? current.sort_order ?? 0,
        id
      );
      return true;
    });
  }

  /** 删除分类：默认分类或仍被未删除条目引用时拒绝 */
  public deleteCategory(id: number): DeleteResult {
    const result = runInTransaction(this.db, '删除分类失败', (): DeleteResult => {
      const category = CategoriesRepo.getCategoryById(this.db, id);
      if (!category) return { success: false, reason: 'not_found' };
      if (category.is_default) return { success: false, reason: 'default' };
      const usage = CategoriesRepo.countActiveUsage(this.db, category.name);
      if (usage > 0) return { success: false, reason: 'in_use', usage };
      this.db.prepare('DELETE FROM categories WHERE id = ?').run(id);
      return { success: true };
    });
    if (result.success) logInfo('CATEGORY_DELETED', 'category deleted', { id });
    return result;
  }

  /** 未删除条目中使用该分类名的数量 */
  public getCategoryUsageCount(name: string): number {
    return runQuery('统计分类使用次数失败', () => CategoriesRepo.countActiveUsage(this.db, name));
  }

  /** 验证分类数据的合法性（名称、颜色） */
  public validateCategory(category: Category): void {
    if (!category.name || category.name.trim().length === 0) {
      throw new ValidationError('分类名称不能为空');
    }
    if (category.name.length > 100) {
      throw new ValidationError('分类名称长度不能超过100个字符');
    }
    if (category.color && !HEX_COLOR.test(category.color)) {
      throw new ValidationError('无效的分类颜色');
    }
  }
}

export default CategoryService;
