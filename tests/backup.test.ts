import * as fs from 'fs';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DatabaseService } from '../src/main/database/DatabaseService';
import { ValidationError } from '../src/main/errors';
import { backupFileName } from '../src/main/services/BackupService';
import { makeTempDir, removeDir } from './helpers';

describe('BackupService', () => {
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

  it('names backup files with a local timestamp', () => {
    const at = new Date(2024, 0, 2, 3, 4, 5);
    expect(backupFileName('json', at)).toBe('credvault_backup_2024-01-02_03-04-05.json');
    expect(backupFileName('excel', at)).toBe('credvault_backup_2024-01-02_03-04-05.xlsx');
    expect(backupFileName('csv', at)).toBe('credvault_backup_2024-01-02_03-04-05.csv');
  });

  it('writes a local backup and records it', async () => {
    store.addPassword({ site_name: 'Bank', password: 'test-secret' });
    const target = path.join(dir, 'backups', 'daily');

    const filePath = await store.backupToLocal(target, 'csv');

    expect(path.dirname(filePath)).toBe(target);
    expect(path.basename(filePath)).toMatch(/^credvault_backup_\d{4}-\d{2}-\d{2}_\d{2}-\d{2}-\d{2}\.csv$/);
    expect(fs.existsSync(filePath)).toBe(true);
    expect(store.getBackupHistory()).toMatchObject([
      { backup_type: 'local', file_path: filePath, status: 'success', message: '备份了 1 条记录' },
    ]);
  });

  it('records a failed backup and rethrows', async () => {
    const target = path.join(dir, 'backups');
    await expect(store.backupToLocal(target, 'excel')).rejects.toThrow(ValidationError);
    expect(store.getBackupHistory()).toMatchObject([
      { backup_type: 'local', file_path: target, status: 'failed', message: '没有要导出的数据' },
    ]);
  });

  it('keeps every history entry until pruned explicitly', () => {
    for (let i = 1; i <= 51; i++) {
      store.addBackupHistory({ backup_type: 'email', file_path: `f${i}`, status: 'success', message: `m${i}` });
    }
    const history = store.getBackupHistory(1000);
    expect(history.length).toBe(51);
    expect(history[50].message).toBe('m1');
  });

  it('rejects inherited object keys as formats before touching the disk', async () => {
    const target = path.join(dir, 'snapshots');
    const format = JSON.parse('"toString"');
    await expect(store.getBackupService().exportSnapshot([], format, target)).rejects.toThrow(ValidationError);
    expect(fs.existsSync(target)).toBe(false);
  });

  it('returns history newest first and prunes old entries', () => {
    for (let i = 1; i <= 5; i++) {
      store.addBackupHistory({ backup_type: 'email', file_path: `f${i}`, status: 'success', message: `m${i}` });
    }
    expect(store.getBackupHistory(3).map(h => h.message)).toEqual(['m5', 'm4', 'm3']);
    expect(store.pruneBackupHistory(2)).toBe(3);
    expect(store.getBackupHistory().map(h => h.message)).toEqual(['m5', 'm4']);
  });
});
