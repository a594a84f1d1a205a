import type Database from 'better-sqlite3';
import { toVaultError } from '../errors';
import { logError } from '../logger';

/**
 * 在单个事务中执行写操作：任一步失败整体回滚，异常归类后重新抛出
 */
export function runInTransaction<T>(db: Database.Database, context: string, fn: () => T): T {
  try {
    return db.transaction(fn)();
  } catch (error) {
    const wrapped = toVaultError(error, context);
    if (wrapped.code === 'STORAGE') {
      logError('DB_TRANSACTION_FAILED', context, wrapped);
    }
    throw wrapped;
  }
}

/** 只读查询，失败时归类为 StorageError */
export function runQuery<T>(context: string, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    const wrapped = toVaultError(error, context);
    logError('DB_QUERY_FAILED', context, wrapped);
    throw wrapped;
  }
}
