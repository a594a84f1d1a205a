export interface PasswordItem {
  id: number;
  site_name: string;
  url: string;
  login_account: string;
  password: string;
  phone: string;
  email: string;
  category: string;
  notes: string;
  register_date: string;
  created_at: string;
  updated_at: string;
  is_deleted: boolean;
  deleted_at: string | null;
  custom_fields: Record<string, string>;
}

/** 新增条目时的输入：只有网站名称与密码必填 */
export type PasswordDraft = Pick<PasswordItem, 'site_name' | 'password'> &
  Partial<Pick<PasswordItem, 'url' | 'login_account' | 'phone' | 'email' | 'category' | 'notes' | 'register_date' | 'custom_fields'>>;

/** 可被修改历史追踪的字段 */
export type TrackedField =
  | 'site_name'
  | 'url'
  | 'login_account'
  | 'password'
  | 'phone'
  | 'email'
  | 'category'
  | 'notes'
  | 'register_date';

export interface Category {
  id?: number;
  name: string;
  color?: string;
  sort_order?: number;
  is_default?: boolean;
  created_at?: string;
}

export interface CustomFieldDefinition {
  id?: number;
  field_name: string;
  field_type?: 'text';
  sort_order?: number;
  created_at?: string;
}

export interface ModificationHistory {
  id: number;
  password_id: number;
  field_name: string;
  old_value: string;
  new_value: string;
  modified_at: string;
}

export type BackupStatus = 'success' | 'failed';

export interface BackupHistory {
  id?: number;
  backup_time?: string;
  backup_type: string;
  file_path: string;
  status: BackupStatus;
  message: string;
}

export type DeleteResult =
  | { success: true }
  | { success: false; reason: 'not_found' | 'default' | 'in_use'; usage?: number };

export type ExportFormat = 'csv' | 'excel' | 'json';

/** 导入解析出的宽松字段表 */
export interface ImportRow {
  [field: string]: unknown;
  custom_fields?: Record<string, string>;
}

export type ImportValidation = {
  valid: ImportRow[];
  errors: string[];
};

/** 重复条目的处理方式 */
export type ImportMode = 'skip' | 'overwrite' | 'all';

export type ImportResult = {
  imported: number;
  updated: number;
  skipped: number;
  errors: string[];
};

export interface SearchCriteria {
  keyword?: string;
  category?: string;
  hasEmail?: boolean;
  hasPhone?: boolean;
}

export type IntegrityReport = {
  isValid: boolean;
  errors: string[];
  warnings: string[];
};

export type RepairResult = {
  repaired: string[];
  failed: string[];
};
