import type Database from 'better-sqlite3';
import * as fs from 'fs/promises';
import * as path from 'path';
import type { BackupHistory, ExportFormat, PasswordItem } from '../../shared/types';
import { BACKUP_CONFIG } from '../config';
import { ValidationError } from '../errors';
import { runInTransaction, runQuery } from '../database/transaction';
import { logError, logInfo } from '../logger';
import * as BackupRepo from '../repositories/backupHistory';
import ImportExportService from './ImportExportService';

const EXTENSIONS: Record<ExportFormat, string> = { excel: 'xlsx', csv: 'csv', json: 'json' };

/** 备份文件名中的本地时间戳 YYYY-MM-DD_HH-mm-ss */
export function backupTimestamp(date: Date = new Date()): string {
  const pad = (n: number) => (n < 10 ? `0${n}` : `${n}`);
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}_${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`;
}

export function backupFileName(format: ExportFormat, date: Date = new Date()): string {
  return `${BACKUP_CONFIG.filePrefix}${backupTimestamp(date)}.${EXTENSIONS[format]}`;
}

export default class BackupService {
  private db: Database.Database;
  private codec: ImportExportService;

  constructor(db: Database.Database, codec: ImportExportService) {
    this.db = db;
    this.codec = codec;
  }

  /** 将快照写入目录（不存在时创建），返回文件路径 */
  public async exportSnapshot(passwords: PasswordItem[], format: ExportFormat, directory: string): Promise<string> {
    if (!Object.prototype.hasOwnProperty.call(EXTENSIONS, format)) throw new ValidationError(`不支持的文件格式: ${String(format)}`);
    await fs.mkdir(directory, { recursive: true });
    const filePath = path.join(directory, backupFileName(format));
    await this.codec.exportToFile(passwords, format, filePath);
    return filePath;
  }

  /**
   * 本地备份：导出快照并记录结果。失败时先记录 failed 再抛出原异常
   */
  public async backupToLocal(passwords: PasswordItem[], directory: string, format: ExportFormat = 'excel'): Promise<string> {
    try {
      const filePath = await this.exportSnapshot(passwords, format, directory);
      this.recordBackup({ backup_type: 'local', file_path: filePath, status: 'success', message: `备份了 ${passwords.length} 条记录` });
      logInfo('BACKUP_LOCAL_DONE', 'local backup written', { filePath, count: passwords.length });
      return filePath;
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.recordBackup({ backup_type: 'local', file_path: directory, status: 'failed', message: err.message });
      logError('BACKUP_LOCAL_FAILED', 'local backup failed', err, { directory, format });
      throw error;
    }
  }

  /** 追加一条备份历史，原样保存（邮件等外部备份由调用方报告结果） */
  public recordBackup(entry: BackupHistory): number {
    return runInTransaction(this.db, '记录备份历史失败', () =>
      BackupRepo.insertBackupHistory(this.db, entry, new Date().toISOString())
    );
  }

  /** 最近的备份历史，新的在前 */
  public getBackupHistory(limit = 20): BackupHistory[] {
    return runQuery('读取备份历史失败', () => BackupRepo.getBackupHistory(this.db, limit));
  }

  /** 只保留最新 keep 条，返回删除条数；只在调用方显式要求时执行 */
  public pruneBackupHistory(keep: number = BACKUP_CONFIG.maxHistory): number {
    return runInTransaction(this.db, '清理备份历史失败', () => BackupRepo.pruneBackupHistory(this.db, keep));
  }
}
