export { DatabaseService, type DatabaseOptions } from './main/database/DatabaseService';
export { SearchService } from './main/services/SearchService';
export { ImportExportService, CORE_COLUMNS, type PasswordSink } from './main/services/ImportExportService';
export { default as BackupService, backupFileName, backupTimestamp } from './main/services/BackupService';
export { default as IntegrityService } from './main/services/IntegrityService';
export { VaultError, ValidationError, ConflictError, StorageError, FormatError, type VaultErrorCode } from './main/errors';
export { loadConfig, type AppConfig, type LogLevel } from './main/config';
export { initLogger, shutdownLogger } from './main/logger';
export type * from './shared/types';
