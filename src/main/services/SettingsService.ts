import type Database from 'better-sqlite3';
import { DEFAULT_SETTINGS } from '../config';
import { ValidationError } from '../errors';
import { runInTransaction, runQuery } from '../database/transaction';
import { logInfo } from '../logger';
import * as SettingsRepo from '../repositories/settings';

/**
 * 用户设置模块服务，负责设置的读取、保存与重置
 */
export class SettingsService {
  private db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  /** 设置表为空时写入默认设置（调用方负责事务） */
  public seedDefaults(): number {
    if (SettingsRepo.countSettings(this.db) > 0) return 0;
    const entries = Object.entries(DEFAULT_SETTINGS);
    for (const [key, value] of entries) {
      SettingsRepo.upsertSetting(this.db, key, value);
    }
    logInfo('SETTINGS_SEEDED', '已插入默认设置', { count: entries.length });
    return entries.length;
  }

  /** 读取设置值，不存在时返回 fallback */
  public getSetting(key: string, fallback = ''): string {
    const value = runQuery('读取设置失败', () => SettingsRepo.getSettingValue(this.db, key));
    return value ?? fallback;
  }

  /** 类型化读取：按 fallback 的类型解析，解析失败返回 fallback */
  public getTypedSetting(key: string, fallback: boolean): boolean;
  public getTypedSetting(key: string, fallback: number): number;
  public getTypedSetting(key: string, fallback: string): string;
  public getTypedSetting(key: string, fallback: string | number | boolean): string | number | boolean {
    const value = runQuery('读取设置失败', () => SettingsRepo.getSettingValue(this.db, key));
    if (value === undefined) return fallback;
    if (typeof fallback === 'boolean') {
      if (value === '1' || value === 'true') return true;
      if (value === '0' || value === 'false') return false;
      return fallback;
    }
    if (typeof fallback === 'number') {
      const n = Number(value);
      return value.trim() !== '' && Number.isFinite(n) ? n : fallback;
    }
    return value;
  }

  /** 写入或覆盖设置 */
  public setSetting(key: string, value: string): void {
    if (!key || key.trim().length === 0) throw new ValidationError('设置键名不能为空');
    runInTransaction(this.db, '保存设置失败', () => SettingsRepo.upsertSetting(this.db, key, value));
  }

  public getAllSettings(): Record<string, string> {
    return runQuery('读取设置失败', () => SettingsRepo.getAllSettings(this.db));
  }

  /** 将指定键重置为默认值，没有默认值的键返回 false */
  public resetSettingToDefault(key: string): boolean {
    const def = DEFAULT_SETTINGS[key];
    if (def === undefined) return false;
    this.setSetting(key, def);
    return true;
  }

  /** 重置所有默认设置，返回重置数量 */
  public resetAllSettingsToDefault(): number {
    const entries = Object.entries(DEFAULT_SETTINGS);
    runInTransaction(this.db, '重置设置失败', () => {
      for (const [key, value] of entries) SettingsRepo.upsertSetting(this.db, key, value);
    });
    return entries.length;
  }
}

export default SettingsService;
