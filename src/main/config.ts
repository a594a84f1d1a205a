import * as os from 'os';
import * as path from 'path';
import type { TrackedField } from '../shared/types';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface AppConfig {
  dataDir: string;
  dbPath: string;
  logDir: string;
  logLevel: LogLevel;
}

const LOG_LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

function parseLogLevel(value: string | undefined): LogLevel {
  const level = (value || '').trim().toLowerCase();
  return LOG_LEVELS.find(l => l === level) ?? 'info';
}

/** 从环境变量解析运行配置，未设置时落在用户主目录下 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const home = os.homedir();
  const dataDir = env.CREDVAULT_DATA_DIR || path.join(home, '.credvault', 'data');
  return {
    dataDir,
    dbPath: path.join(dataDir, 'passwords.db'),
    logDir: env.CREDVAULT_LOG_DIR || path.join(home, '.credvault', 'logs'),
    logLevel: parseLogLevel(env.CREDVAULT_LOG_LEVEL),
  };
}

export function isLogLevelEnabled(threshold: LogLevel, level: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(threshold);
}

export const DEFAULT_CATEGORIES: ReadonlyArray<{ name: string; color: string; sort_order: number }> = [
  { name: '社交媒体', color: '#FF6B6B', sort_order: 1 },
  { name: '购物', color: '#4ECDC4', sort_order: 2 },
  { name: '工作', color: '#95E1D3', sort_order: 3 },
  { name: '娱乐', color: '#FFE66D', sort_order: 4 },
  { name: '金融', color: '#C06C84', sort_order: 5 },
  { name: '其他', color: '#999999', sort_order: 6 },
];

export const DEFAULT_SETTINGS: Readonly<Record<string, string>> = {
  show_password: '1',
  default_sort: 'created_at_desc',
  smtp_server: '',
  smtp_port: '465',
  smtp_email: '',
  smtp_password: '',
  backup_email: '',
  confirm_delete: '1',
  show_account: '1',
  show_password_column: '1',
  show_category: '1',
  show_register_date: '1',
  show_url: '0',
  show_phone: '0',
  show_email: '0',
  column_order: '',
};

/** 修改历史追踪的字段及其显示名（顺序即写入顺序） */
export const TRACKED_FIELDS: ReadonlyArray<readonly [TrackedField, string]> = [
  ['site_name', '网站名称'],
  ['url', '网址'],
  ['login_account', '登录账号'],
  ['password', '密码'],
  ['phone', '手机号'],
  ['email', '邮箱'],
  ['category', '分类'],
  ['notes', '备注'],
  ['register_date', '注册时间'],
];

export const SEARCH_CONFIG = {
  fieldWeights: {
    site_name: 10,
    login_account: 8,
    email: 7,
    phone: 6,
    url: 5,
    notes: 3,
  },
  minKeywordLength: 1,
  maxResults: 100,
} as const;

export const BACKUP_CONFIG = {
  maxHistory: 50,
  filePrefix: 'credvault_backup_',
} as const;
