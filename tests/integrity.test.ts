import Database from 'better-sqlite3';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DatabaseService } from '../src/main/database/DatabaseService';
import { makeTempDir, removeDir } from './helpers';

describe('IntegrityService', () => {
  let dir: string;
  let dbPath: string;

  beforeEach(() => {
    dir = makeTempDir();
    dbPath = path.join(dir, 'passwords.db');
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('accepts a fresh store', () => {
    const store = new DatabaseService({ dbPath });
    expect(store.checkIntegrity()).toEqual({ isValid: true, errors: [], warnings: [] });
    store.close();
  });

  it('warns about records pointing at an unknown category', () => {
    const store = new DatabaseService({ dbPath });
    const id = store.addPassword({ site_name: 'Bank', password: 'test-secret', category: '旧分类' });
    expect(store.checkIntegrity()).toEqual({
      isValid: true,
      errors: [],
      warnings: [`密码 "Bank" (ID: ${id}) 的分类 "旧分类" 不存在`],
    });
    store.close();
  });

  it('finds and removes orphaned history rows', () => {
    new DatabaseService({ dbPath }).close();
    const raw = new Database(dbPath);
    raw.pragma('foreign_keys = OFF');
    raw
      .prepare('INSERT INTO modification_history (password_id, field_name, old_value, new_value, modified_at) VALUES (?, ?, ?, ?, ?)')
      .run(99, '备注', 'a', 'b', '2024-01-01T00:00:00.000Z');
    raw.close();

    const store = new DatabaseService({ dbPath });
    expect(store.checkIntegrity()).toEqual({
      isValid: false,
      errors: ['修改历史 (ID: 1) 引用了不存在的密码 (ID: 99)'],
      warnings: [],
    });
    expect(store.repairIntegrity()).toEqual({ repaired: ['删除了 1 条无效的修改历史'], failed: [] });
    expect(store.checkIntegrity().isValid).toBe(true);
    store.close();
  });
});
