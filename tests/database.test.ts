import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DatabaseService } from '../src/main/database/DatabaseService';
import { makeTempDir, removeDir } from './helpers';

describe('DatabaseService schema', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('creates missing parent directories for the store file', () => {
    const dbPath = path.join(dir, 'nested', 'data', 'passwords.db');
    const store = new DatabaseService({ dbPath });
    store.close();
    expect(fs.existsSync(dbPath)).toBe(true);
  });

  it('creates the seven tables', () => {
    const dbPath = path.join(dir, 'passwords.db');
    new DatabaseService({ dbPath }).close();

    const raw = new Database(dbPath, { readonly: true });
    const names = raw
      .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name")
      .all()
      .map(r => r.name);
    raw.close();

    expect(names).toEqual([
      'backup_history',
      'categories',
      'custom_field_definitions',
      'custom_field_values',
      'modification_history',
      'passwords',
      'settings',
    ]);
  });

  it('seeds default categories in sort order', () => {
    const store = new DatabaseService({ dbPath: path.join(dir, 'passwords.db') });
    const categories = store.listCategories();
    store.close();

    expect(categories.map(c => c.name)).toEqual(['社交媒体', '购物', '工作', '娱乐', '金融', '其他']);
    expect(categories.map(c => c.color)).toEqual(['#FF6B6B', '#4ECDC4', '#95E1D3', '#FFE66D', '#C06C84', '#999999']);
    expect(categories.every(c => c.is_default === true)).toBe(true);
  });

  it('seeds default settings', () => {
    const store = new DatabaseService({ dbPath: path.join(dir, 'passwords.db') });
    const settings = store.getAllSettings();
    store.close();

    expect(Object.keys(settings)).toHaveLength(16);
    expect(settings.show_password).toBe('1');
    expect(settings.default_sort).toBe('created_at_desc');
    expect(settings.smtp_port).toBe('465');
    expect(settings.show_url).toBe('0');
    expect(settings.column_order).toBe('');
  });

  it('reopening an initialized store does not seed again', () => {
    const dbPath = path.join(dir, 'passwords.db');
    const first = new DatabaseService({ dbPath });
    first.addCategory({ name: '游戏' });
    first.setSetting('show_password', '0');
    first.close();

    const second = new DatabaseService({ dbPath });
    expect(second.listCategories()).toHaveLength(7);
    expect(second.getSetting('show_password')).toBe('0');
    expect(Object.keys(second.getAllSettings())).toHaveLength(16);
    second.close();
  });

  it('close can be called twice', () => {
    const store = new DatabaseService({ dbPath: path.join(dir, 'passwords.db') });
    store.close();
    expect(() => store.close()).not.toThrow();
  });
});
