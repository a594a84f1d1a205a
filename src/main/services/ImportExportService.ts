import * as fs from 'fs/promises';
import ExcelJS, { type Cell } from 'exceljs';
import type { ExportFormat, ImportMode, ImportResult, ImportRow, ImportValidation, PasswordDraft, PasswordItem } from '../../shared/types';
import { FormatError, StorageError, ValidationError } from '../errors';
import { logInfo, logWarn } from '../logger';
import { parseCsv, toCsv } from '../utils/csv';

/** 表格导出的核心列：表头 → 字段名 */
export const CORE_COLUMNS: ReadonlyArray<readonly [string, keyof PasswordItem]> = [
  ['网站名称', 'site_name'],
  ['网址', 'url'],
  ['登录账号', 'login_account'],
  ['密码', 'password'],
  ['手机号', 'phone'],
  ['邮箱', 'email'],
  ['分类', 'category'],
  ['备注', 'notes'],
  ['注册时间', 'register_date'],
  ['创建时间', 'created_at'],
  ['最后修改时间', 'updated_at'],
];

/** 导入时忽略的时间戳列 */
const TIMESTAMP_HEADERS = new Set(['创建时间', '最后修改时间']);

const IMPORT_FIELD_MAP = new Map<string, string>(
  CORE_COLUMNS.filter(([header]) => !TIMESTAMP_HEADERS.has(header)).map(([header, field]): [string, string] => [header, field])
);

const FORMAT_LABELS: Record<ExportFormat, string> = { csv: 'CSV', excel: 'Excel', json: 'JSON' };

/** 接收导入结果的存储端 */
export interface PasswordSink {
  addPassword(draft: PasswordDraft): number;
  updatePassword(record: PasswordItem, previous?: PasswordItem): boolean;
  listPasswords(): PasswordItem[];
  getPassword(id: number): PasswordItem | null;
}

/** 重复判定：网站名称 + 登录账号 */
function duplicateKey(siteName: string, loginAccount: string): string {
  return JSON.stringify([siteName, loginAccount]);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asText(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return '';
}

function hasText(value: unknown): boolean {
  return asText(value).trim().length > 0;
}

function toStringMap(value: unknown): Record<string, string> | undefined {
  if (!isPlainObject(value)) return undefined;
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(value)) out[k] = asText(v);
  return out;
}

/** 表格单元格转文本；日期单元格输出 YYYY-MM-DD */
function cellText(cell: Cell): string {
  const value = cell.value;
  if (value === null || value === undefined) return '';
  if (value instanceof Date) return value.toISOString().slice(0, 10);
  return cell.text;
}

/**
 * 导入导出编解码：CSV、Excel 工作簿与 JSON 三种格式
 */
export class ImportExportService {
  /** 表格投影：核心列在前，之后按首次出现顺序追加自定义字段列 */
  public buildTable(passwords: PasswordItem[]): string[][] {
    const customNames: string[] = [];
    const seen = new Set<string>();
    for (const p of passwords) {
      for (const name of Object.keys(p.custom_fields)) {
        if (!seen.has(name)) {
          seen.add(name);
          customNames.push(name);
        }
      }
    }
    const header = [...CORE_COLUMNS.map(([label]) => label), ...customNames];
    const rows = passwords.map(p => [
      ...CORE_COLUMNS.map(([, field]) => asText(p[field])),
      ...customNames.map(name => p.custom_fields[name] ?? ''),
    ]);
    return [header, ...rows];
  }

  /** JSON 导出的完整对象 */
  public toExportObject(p: PasswordItem): PasswordItem {
    return {
      id: p.id,
      site_name: p.site_name,
      url: p.url,
      login_account: p.login_account,
      password: p.password,
      phone: p.phone,
      email: p.email,
      category: p.category,
      notes: p.notes,
      register_date: p.register_date,
      created_at: p.created_at,
      updated_at: p.updated_at,
      is_deleted: p.is_deleted,
      deleted_at: p.deleted_at,
      custom_fields: { ...p.custom_fields },
    };
  }

  /**
   * 导出到文件。CSV 与 Excel 需要至少一条记录来生成表头；JSON 允许空数组
   */
  public async exportToFile(passwords: PasswordItem[], format: ExportFormat, filePath: string): Promise<void> {
    switch (format) {
      case 'csv':
        await fs.writeFile(filePath, toCsv(this.requireTable(passwords)), 'utf8');
        break;
      case 'excel': {
        const workbook = new ExcelJS.Workbook();
        const sheet = workbook.addWorksheet('密码');
        for (const row of this.requireTable(passwords)) sheet.addRow(row);
        await workbook.xlsx.writeFile(filePath);
        break;
      }
      case 'json':
        await fs.writeFile(filePath, JSON.stringify(passwords.map(p => this.toExportObject(p)), null, 2), 'utf8');
        break;
      default:
        throw new ValidationError(`不支持的文件格式: ${String(format)}`);
    }
    logInfo('EXPORT_DONE', 'export finished', { format, filePath, count: passwords.length });
  }

  private requireTable(passwords: PasswordItem[]): string[][] {
    if (passwords.length === 0) throw new ValidationError('没有要导出的数据');
    return this.buildTable(passwords);
  }

  /** 从文件导入，解析失败统一包装为 FormatError */
  public async importFromFile(filePath: string, format: ExportFormat): Promise<ImportRow[]> {
    if (!Object.prototype.hasOwnProperty.call(FORMAT_LABELS, format)) throw new ValidationError(`不支持的文件格式: ${String(format)}`);
    try {
      switch (format) {
        case 'csv':
          return this.rowsFromTable(parseCsv(await fs.readFile(filePath, 'utf8')));
        case 'excel':
          return this.rowsFromTable(await this.readWorkbook(filePath));
        default:
          return this.parseJson(await fs.readFile(filePath, 'utf8'));
      }
    } catch (error) {
      const msg = error instanceof Error ? error.message : String(error);
      logWarn('IMPORT_FAILED', 'import failed', { format, filePath, message: msg });
      throw new FormatError(`${FORMAT_LABELS[format]}导入失败: ${msg}`, error);
    }
  }

  private async readWorkbook(filePath: string): Promise<string[][]> {
    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.readFile(filePath);
    if (workbook.worksheets.length === 0) return [];
    const sheet = workbook.worksheets[0];
    const header = sheet.getRow(1);
    const width = header.cellCount;
    const table: string[][] = [];
    for (let r = 1; r <= sheet.rowCount; r++) {
      const row = sheet.getRow(r);
      const cells: string[] = [];
      for (let c = 1; c <= width; c++) cells.push(cellText(row.getCell(c)));
      if (cells.some(v => v !== '')) table.push(cells);
    }
    return table;
  }

  /** 表头映射回字段名；未知列作为自定义字段，时间戳列忽略 */
  public rowsFromTable(table: string[][]): ImportRow[] {
    if (table.length === 0) throw new Error('缺少表头');
    const [header, ...body] = table;
    return body.map(cells => {
      const row: ImportRow = {};
      const custom: Record<string, string> = {};
      let hasCustom = false;
      header.forEach((rawName, i) => {
        const name = rawName.trim();
        const value = cells[i] ?? '';
        const field = IMPORT_FIELD_MAP.get(name);
        if (field) {
          row[field] = value;
        } else if (!TIMESTAMP_HEADERS.has(name) && name !== '') {
          custom[name] = value;
          hasCustom = true;
        }
      });
      if (hasCustom) row.custom_fields = custom;
      return row;
    });
  }

  private parseJson(text: string): ImportRow[] {
    const data: unknown = JSON.parse(text);
    if (!Array.isArray(data)) throw new Error('JSON格式错误：应为数组格式');
    return data.map((item, idx) => {
      if (!isPlainObject(item)) throw new Error(`JSON格式错误：第 ${idx + 1} 条不是对象`);
      const row: ImportRow = {};
      for (const [key, value] of Object.entries(item)) {
        if (key === 'custom_fields') {
          const fields = toStringMap(value);
          if (fields) row.custom_fields = fields;
        } else {
          row[key] = value;
        }
      }
      return row;
    });
  }

  /** 单行校验，返回错误信息或 null；position 从 1 开始 */
  private checkRow(row: ImportRow, position: number): string | null {
    if (!hasText(row.site_name)) return `第 ${position} 条：缺少网站名称`;
    if (!hasText(row.password)) return `第 ${position} 条：缺少密码`;
    return null;
  }

  /** 过滤缺少网站名称或密码的行，返回有效行与逐行错误 */
  public validateImportData(rows: ImportRow[]): ImportValidation {
    const valid: ImportRow[] = [];
    const errors: string[] = [];
    rows.forEach((row, i) => {
      const problem = this.checkRow(row, i + 1);
      if (problem) errors.push(problem);
      else valid.push(row);
    });
    return { valid, errors };
  }

  /** 已校验的导入行 → addPassword 输入 */
  public toPasswordDraft(row: ImportRow): PasswordDraft {
    return {
      site_name: asText(row.site_name).trim(),
      url: asText(row.url),
      login_account: asText(row.login_account),
      password: asText(row.password),
      phone: asText(row.phone),
      email: asText(row.email),
      category: asText(row.category),
      notes: asText(row.notes),
      register_date: asText(row.register_date),
      custom_fields: row.custom_fields ?? {},
    };
  }

  /**
   * 校验后逐条写入。网站名称与登录账号相同视为重复：
   * skip 保留现有条目，overwrite 用导入内容更新现有条目，all 全部新增。
   * 单行失败记录后继续；存储不可用时立即中止
   */
  public importIntoStore(store: PasswordSink, rows: ImportRow[], mode: ImportMode = 'skip'): ImportResult {
    const result: ImportResult = { imported: 0, updated: 0, skipped: 0, errors: [] };
    const existing = new Map<string, PasswordItem>();
    if (mode !== 'all') {
      for (const p of store.listPasswords()) {
        const key = duplicateKey(p.site_name, p.login_account);
        if (!existing.has(key)) existing.set(key, p);
      }
    }

    rows.forEach((row, i) => {
      const problem = this.checkRow(row, i + 1);
      if (problem) {
        result.errors.push(problem);
        result.skipped++;
        return;
      }
      const draft = this.toPasswordDraft(row);
      const match = mode === 'all' ? undefined : existing.get(duplicateKey(draft.site_name, draft.login_account ?? ''));
      try {
        if (match && mode === 'skip') {
          result.skipped++;
        } else if (match) {
          store.updatePassword(this.mergeInto(match, draft), match);
          result.updated++;
        } else {
          const id = store.addPassword(draft);
          result.imported++;
          // 同一批次中后出现的重复行也按模式处理
          const created = mode === 'all' ? null : store.getPassword(id);
          if (created) existing.set(duplicateKey(created.site_name, created.login_account), created);
        }
      } catch (error) {
        if (error instanceof StorageError) throw error;
        const msg = error instanceof Error ? error.message : String(error);
        result.errors.push(`第 ${i + 1} 条：导入失败 - ${msg}`);
        result.skipped++;
      }
    });
    logInfo('IMPORT_DONE', 'import finished', { mode, imported: result.imported, updated: result.updated, skipped: result.skipped });
    return result;
  }

  /** 覆盖导入：网站名称与账号不变，其余字段取导入值；注册时间为空时保留原值 */
  private mergeInto(current: PasswordItem, draft: PasswordDraft): PasswordItem {
    return {
      ...current,
      url: draft.url ?? '',
      password: draft.password,
      phone: draft.phone ?? '',
      email: draft.email ?? '',
      category: draft.category ?? '',
      notes: draft.notes ?? '',
      register_date: draft.register_date || current.register_date,
      custom_fields: draft.custom_fields ?? {},
    };
  }
}

export default ImportExportService;
