import * as fs from 'fs';
import * as path from 'path';
import { isLogLevelEnabled, type LogLevel } from './config';

export type LogContext = Record<string, unknown>;

export interface LoggerOptions {
  logDir: string;
  level?: LogLevel;
  fileName?: string;
}

let initialized = false;
let logFilePath = '';
let threshold: LogLevel = 'info';

function ts() {
  const d = new Date();
  const pad = (n: number) => (n < 10 ? `0${n}` : `${n}`);
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
}

function formatError(error: Error): string {
  return `${error.name}: ${error.message}\n${error.stack || ''}`;
}

function write(level: LogLevel, code: string, message: string, context?: LogContext, error?: Error) {
  if (!initialized || !isLogLevelEnabled(threshold, level)) return;
  try {
    let line = `[${ts()}] [${level.toUpperCase()}] ${code} ${message}`;
    if (context && Object.keys(context).length > 0) line += ` ${JSON.stringify(context)}`;
    if (error) line += `\n${formatError(error)}`;
    fs.appendFileSync(logFilePath, line + '\n');
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    process.stderr.write(`log write error: ${msg}\n`);
  }
}

/** 初始化文件日志；目录与级别由启动方注入 */
export function initLogger(options: LoggerOptions) {
  if (initialized) return;
  try {
    if (!fs.existsSync(options.logDir)) fs.mkdirSync(options.logDir, { recursive: true });
    logFilePath = path.join(options.logDir, options.fileName || 'credvault.log');
    threshold = options.level || 'info';
    initialized = true;
    write('info', 'LOGGER_INIT', 'logger initialized', { logFilePath });
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    process.stderr.write(`logger init failed: ${msg}\n`);
  }
}

/** 停止写入日志文件，之后可重新 initLogger */
export function shutdownLogger() {
  initialized = false;
  logFilePath = '';
  threshold = 'info';
}

export function getLogFilePath() {
  return logFilePath;
}

export function logDebug(code: string, message: string, context?: LogContext) {
  write('debug', code, message, context);
}

export function logInfo(code: string, message: string, context?: LogContext) {
  write('info', code, message, context);
}

export function logWarn(code: string, message: string, context?: LogContext) {
  write('warn', code, message, context);
}

export function logError(code: string, message: string, error?: Error, context?: LogContext) {
  write('error', code, message, context, error);
}
