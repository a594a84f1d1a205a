import Database from 'better-sqlite3';

export type VaultErrorCode = 'VALIDATION' | 'CONFLICT' | 'STORAGE' | 'FORMAT';

export class VaultError extends Error {
  public readonly code: VaultErrorCode;

  constructor(code: VaultErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** 缺少必填字段、导出数据为空、格式不支持等，在写入之前抛出 */
export class ValidationError extends VaultError {
  constructor(message: string) {
    super('VALIDATION', message);
  }
}

/** 唯一约束冲突（分类名、自定义字段名重复） */
export class ConflictError extends VaultError {
  constructor(message: string, cause?: unknown) {
    super('CONFLICT', message, { cause });
  }
}

/** 数据库读写或事务失败，保留底层原因 */
export class StorageError extends VaultError {
  constructor(message: string, cause?: unknown) {
    super('STORAGE', message, { cause });
  }
}

/** 导入文件无法解析 */
export class FormatError extends VaultError {
  constructor(message: string, cause?: unknown) {
    super('FORMAT', message, { cause });
  }
}

function isUniqueViolation(error: InstanceType<Database.SqliteError>): boolean {
  return error.code === 'SQLITE_CONSTRAINT_UNIQUE' || error.code === 'SQLITE_CONSTRAINT_PRIMARYKEY';
}

/** 把 better-sqlite3 抛出的异常归类为 VaultError */
export function toVaultError(error: unknown, context: string): VaultError {
  if (error instanceof VaultError) return error;
  const msg = error instanceof Error ? error.message : String(error);
  if (error instanceof Database.SqliteError && isUniqueViolation(error)) {
    return new ConflictError(`${context}: 名称已存在`, error);
  }
  return new StorageError(`${context}: ${msg}`, error);
}
