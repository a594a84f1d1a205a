import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DatabaseService } from '../src/main/database/DatabaseService';
import { ConflictError, ValidationError } from '../src/main/errors';
import { makeTempDir, removeDir } from './helpers';

describe('CategoryService', () => {
  let dir: string;
  let store: DatabaseService;

  beforeEach(() => {
    dir = makeTempDir();
    store = new DatabaseService({ dbPath: path.join(dir, 'passwords.db') });
  });

  afterEach(() => {
    store.close();
    removeDir(dir);
  });

  it('appends new categories after the defaults', () => {
    const id = store.addCategory({ name: ' 游戏 ', color: '#123ABC' });
    expect(store.getCategory(id)).toMatchObject({ name: '游戏', color: '#123ABC', sort_order: 7, is_default: false });
    expect(store.listCategories().map(c => c.name).slice(-1)).toEqual(['游戏']);
  });

  it('rejects duplicate names', () => {
    expect(() => store.addCategory({ name: '工作' })).toThrow(ConflictError);
  });

  it('rejects an invalid colour', () => {
    expect(() => store.addCategory({ name: '游戏', color: 'blue' })).toThrow(ValidationError);
  });

  it('refuses to delete a default category', () => {
    const work = store.listCategories().find(c => c.name === '工作');
    expect(work?.id).toBeDefined();
    expect(store.deleteCategory(work?.id ?? -1)).toEqual({ success: false, reason: 'default' });
  });

  it('refuses to delete a category still used by active records', () => {
    const id = store.addCategory({ name: '游戏' });
    const pid = store.addPassword({ site_name: 'Steam', password: 'test-secret', category: '游戏' });

    expect(store.getCategoryUsageCount('游戏')).toBe(1);
    expect(store.deleteCategory(id)).toEqual({ success: false, reason: 'in_use', usage: 1 });

    store.softDeletePassword(pid);
    expect(store.getCategoryUsageCount('游戏')).toBe(0);
    expect(store.deleteCategory(id)).toEqual({ success: true });
    expect(store.getCategory(id)).toBeUndefined();
  });

  it('reports unknown ids as not found', () => {
    expect(store.deleteCategory(9999)).toEqual({ success: false, reason: 'not_found' });
  });

  it('renaming a category leaves records that use the old name untouched', () => {
    const id = store.addCategory({ name: '游戏' });
    const pid = store.addPassword({ site_name: 'Steam', password: 'test-secret', category: '游戏' });
    const before = store.getPassword(pid);

    expect(store.updateCategory({ id, name: '电子游戏' })).toBe(true);
    expect(store.getCategory(id)?.name).toBe('电子游戏');
    expect(store.getCategory(id)?.sort_order).toBe(7);
    const after = store.getPassword(pid);
    expect(after?.category).toBe('游戏');
    expect(after?.updated_at).toBe(before?.updated_at);
    expect(store.getModificationHistory(pid)).toEqual([]);
    expect(store.getCategoryUsageCount('电子游戏')).toBe(0);
  });

  it('refuses to rename onto an existing name', () => {
    const id = store.addCategory({ name: '游戏' });
    expect(() => store.updateCategory({ id, name: '购物' })).toThrow('分类名称已存在');
  });

  it('returns false when updating a missing category', () => {
    expect(store.updateCategory({ id: 9999, name: '不存在' })).toBe(false);
  });
});
