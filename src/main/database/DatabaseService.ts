import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import type {
  BackupHistory,
  Category,
  CustomFieldDefinition,
  DeleteResult,
  ExportFormat,
  ImportMode,
  ImportResult,
  IntegrityReport,
  ModificationHistory,
  PasswordDraft,
  PasswordItem,
  RepairResult,
} from '../../shared/types';
import { loadConfig } from '../config';
import { toVaultError } from '../errors';
import { logError, logInfo } from '../logger';
import BackupService from '../services/BackupService';
import CategoryService from '../services/CategoryService';
import CustomFieldService from '../services/CustomFieldService';
import ImportExportService, { type PasswordSink } from '../services/ImportExportService';
import IntegrityService from '../services/IntegrityService';
import PasswordService from '../services/PasswordService';
import SettingsService from '../services/SettingsService';
import { runInTransaction } from './transaction';

export interface DatabaseOptions {
  /** 数据库文件路径，缺省为 <dataDir>/passwords.db */
  dbPath?: string;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS passwords (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    site_name TEXT NOT NULL,
    url TEXT,
    login_account TEXT,
    password TEXT NOT NULL,
    phone TEXT,
    email TEXT,
    category TEXT,
    notes TEXT,
    register_date TEXT,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL,
    is_deleted INTEGER NOT NULL DEFAULT 0,
    deleted_at TEXT
  );

  CREATE TABLE IF NOT EXISTS categories (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL UNIQUE,
    color TEXT,
    sort_order INTEGER DEFAULT 0,
    is_default INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS custom_field_definitions (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    field_name TEXT NOT NULL UNIQUE,
    field_type TEXT NOT NULL DEFAULT 'text',
    sort_order INTEGER DEFAULT 0,
    created_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS custom_field_values (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    password_id INTEGER NOT NULL,
    field_id INTEGER NOT NULL,
    value TEXT,
    FOREIGN KEY (password_id) REFERENCES passwords (id) ON DELETE CASCADE,
    FOREIGN KEY (field_id) REFERENCES custom_field_definitions (id) ON DELETE CASCADE
  );

  CREATE TABLE IF NOT EXISTS modification_history (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    password_id INTEGER NOT NULL,
    field_name TEXT NOT NULL,
    old_value TEXT,
    new_value TEXT,
    modified_at TEXT NOT NULL,
    FOREIGN KEY (password_id) REFERENCES passwords (id) ON DELETE CASCADE
  );

  CREATE TABLE IF NOT EXISTS settings (
    key TEXT PRIMARY KEY,
    value TEXT
  );

  CREATE TABLE IF NOT EXISTS backup_history (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    backup_time TEXT NOT NULL,
    backup_type TEXT,
    file_path TEXT,
    status TEXT,
    message TEXT
  );

  CREATE INDEX IF NOT EXISTS idx_passwords_site_name ON passwords(site_name);
  CREATE INDEX IF NOT EXISTS idx_passwords_category ON passwords(category);
  CREATE INDEX IF NOT EXISTS idx_passwords_is_deleted ON passwords(is_deleted);
  CREATE INDEX IF NOT EXISTS idx_passwords_created_at ON passwords(created_at DESC);
  CREATE INDEX IF NOT EXISTS idx_custom_field_values_password ON custom_field_values(password_id);
  CREATE INDEX IF NOT EXISTS idx_custom_field_values_field ON custom_field_values(field_id);
  CREATE INDEX IF NOT EXISTS idx_modification_history_password ON modification_history(password_id);
  CREATE INDEX IF NOT EXISTS idx_backup_history_time ON backup_history(backup_time DESC);
`;

/** 本地数据库入口：建表、初始化默认数据，并把操作分派给各模块服务 */
export class DatabaseService implements PasswordSink {
  private db: Database.Database;
  private readonly dbPath: string;
  private passwordService: PasswordService;
  private categoryService: CategoryService;
  private customFieldService: CustomFieldService;
  private settingsService: SettingsService;
  private importExportService: ImportExportService;
  private backupService: BackupService;
  private integrityService: IntegrityService;

  constructor(options: DatabaseOptions = {}) {
    this.dbPath = options.dbPath ?? loadConfig().dbPath;
    this.db = DatabaseService.open(this.dbPath);

    // 初始化各模块服务
    this.passwordService = new PasswordService(this.db);
    this.categoryService = new CategoryService(this.db);
    this.customFieldService = new CustomFieldService(this.db);
    this.settingsService = new SettingsService(this.db);
    this.importExportService = new ImportExportService();
    this.backupService = new BackupService(this.db, this.importExportService);
    this.integrityService = new IntegrityService(this.db);

    try {
      this.initializeSchema();
    } catch (error) {
      this.db.close();
      throw error;
    }
    logInfo('DB_READY', 'database ready', { dbPath: this.dbPath });
  }

  /** 创建父目录并打开数据库文件，启用 WAL 与外键约束 */
  private static open(dbPath: string): Database.Database {
    try {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
      const db = new Database(dbPath);
      db.pragma('journal_mode = WAL');
      db.pragma('foreign_keys = ON');
      return db;
    } catch (error) {
      const wrapped = toVaultError(error, '打开数据库失败');
      logError('DB_OPEN_FAILED', wrapped.message, wrapped, { dbPath });
      throw wrapped;
    }
  }

  /** 建表与默认数据在同一事务中完成，重复执行不产生变化 */
  private initializeSchema(): void {
    runInTransaction(this.db, '初始化数据库失败', () => {
      this.db.exec(SCHEMA);
      this.categoryService.seedDefaults();
      this.settingsService.seedDefaults();
    });
  }

  public getPath(): string {
    return this.dbPath;
  }

  public close(): void {
    if (this.db.open) {
      this.db.close();
      logInfo('DB_CLOSED', 'database closed', { dbPath: this.dbPath });
    }
  }

  public getPasswordService(): PasswordService {
    return this.passwordService;
  }
  public getCategoryService(): CategoryService {
    return this.categoryService;
  }
  public getCustomFieldService(): CustomFieldService {
    return this.customFieldService;
  }
  public getSettingsService(): SettingsService {
    return this.settingsService;
  }
  public getImportExportService(): ImportExportService {
    return this.importExportService;
  }
  public getBackupService(): BackupService {
    return this.backupService;
  }
  public getIntegrityService(): IntegrityService {
    return this.integrityService;
  }

  // 密码条目
  public addPassword(draft: PasswordDraft): number {
    return this.passwordService.addPassword(draft);
  }

  public updatePassword(record: PasswordItem, previous?: PasswordItem): boolean {
    return this.passwordService.updatePassword(record, previous);
  }

  public softDeletePassword(id: number): boolean {
    return this.passwordService.softDeletePassword(id);
  }

  public restorePassword(id: number): boolean {
    return this.passwordService.restorePassword(id);
  }

  public purgePassword(id: number): boolean {
    return this.passwordService.purgePassword(id);
  }

  public emptyRecycleBin(): number {
    return this.passwordService.emptyRecycleBin();
  }

  public getPassword(id: number): PasswordItem | null {
    return this.passwordService.getPassword(id);
  }

  public listPasswords(includeDeleted = false): PasswordItem[] {
    return this.passwordService.listPasswords(includeDeleted);
  }

  public listDeletedPasswords(): PasswordItem[] {
    return this.passwordService.listDeletedPasswords();
  }

  public searchPasswords(keyword: string, includeDeleted = false): PasswordItem[] {
    return this.passwordService.searchPasswords(keyword, includeDeleted);
  }

  public filterPasswordsByCategory(category: string, includeDeleted = false): PasswordItem[] {
    return this.passwordService.filterPasswordsByCategory(category, includeDeleted);
  }

  public getModificationHistory(passwordId: number): ModificationHistory[] {
    return this.passwordService.getModificationHistory(passwordId);
  }

  // 分类
  public listCategories(): Category[] {
    return this.categoryService.getCategories();
  }

  public getCategory(id: number): Category | undefined {
    return this.categoryService.getCategoryById(id);
  }

  public addCategory(category: Category): number {
    return this.categoryService.addCategory(category);
  }

  public updateCategory(category: Category): boolean {
    return this.categoryService.updateCategory(category);
  }

  public deleteCategory(id: number): DeleteResult {
    return this.categoryService.deleteCategory(id);
  }

  public getCategoryUsageCount(name: string): number {
    return this.categoryService.getCategoryUsageCount(name);
  }

  // 自定义字段
  public listCustomFields(): CustomFieldDefinition[] {
    return this.customFieldService.getCustomFields();
  }

  public addCustomField(field: CustomFieldDefinition): number {
    return this.customFieldService.addCustomField(field);
  }

  public updateCustomField(field: CustomFieldDefinition): boolean {
    return this.customFieldService.updateCustomField(field);
  }

  public deleteCustomField(id: number): DeleteResult {
    return this.customFieldService.deleteCustomField(id);
  }

  public getCustomFieldUsageCount(id: number): number {
    return this.customFieldService.getCustomFieldUsageCount(id);
  }

  // 设置
  public getSetting(key: string, fallback = ''): string {
    return this.settingsService.getSetting(key, fallback);
  }

  public getTypedSetting(key: string, fallback: boolean): boolean;
  public getTypedSetting(key: string, fallback: number): number;
  public getTypedSetting(key: string, fallback: string): string;
  public getTypedSetting(key: string, fallback: string | number | boolean): string | number | boolean {
    if (typeof fallback === 'boolean') return this.settingsService.getTypedSetting(key, fallback);
    if (typeof fallback === 'number') return this.settingsService.getTypedSetting(key, fallback);
    return this.settingsService.getTypedSetting(key, fallback);
  }

  public setSetting(key: string, value: string): void {
    this.settingsService.setSetting(key, value);
  }

  public getAllSettings(): Record<string, string> {
    return this.settingsService.getAllSettings();
  }

  public resetSettingToDefault(key: string): boolean {
    return this.settingsService.resetSettingToDefault(key);
  }

  public resetAllSettingsToDefault(): number {
    return this.settingsService.resetAllSettingsToDefault();
  }

  // 备份历史
  public addBackupHistory(entry: BackupHistory): number {
    return this.backupService.recordBackup(entry);
  }

  public getBackupHistory(limit = 20): BackupHistory[] {
    return this.backupService.getBackupHistory(limit);
  }

  public pruneBackupHistory(keep?: number): number {
    return this.backupService.pruneBackupHistory(keep);
  }

  // 导入导出与备份
  /** 导出当前条目（默认不含回收站） */
  public async exportPasswords(format: ExportFormat, filePath: string, includeDeleted = false): Promise<void> {
    await this.importExportService.exportToFile(this.listPasswords(includeDeleted), format, filePath);
  }

  /** 读取文件并写入数据库，逐行汇总结果 */
  public async importPasswords(filePath: string, format: ExportFormat, mode: ImportMode = 'skip'): Promise<ImportResult> {
    const rows = await this.importExportService.importFromFile(filePath, format);
    return this.importExportService.importIntoStore(this, rows, mode);
  }

  public async backupToLocal(directory: string, format: ExportFormat = 'excel'): Promise<string> {
    return this.backupService.backupToLocal(this.listPasswords(), directory, format);
  }

  // 完整性
  public checkIntegrity(): IntegrityReport {
    return this.integrityService.check();
  }

  public repairIntegrity(): RepairResult {
    return this.integrityService.repair();
  }
}

export default DatabaseService;
