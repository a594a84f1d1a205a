const BOM = '\uFEFF';

const escapeCell = (value: string) => {
  if (value.includes('"') || value.includes(',') || value.includes('\n') || value.includes('\r')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
};

/** 生成带 BOM 的 CSV 文本，便于表格软件识别 UTF-8 */
export function toCsv(rows: string[][]): string {
  return BOM + rows.map(row => row.map(escapeCell).join(',')).join('\n') + '\n';
}

/**
 * 解析 CSV：支持引号内的逗号、换行与成对双引号，忽略开头的 BOM 和完全空白的行
 */
export function parseCsv(text: string): string[][] {
  const source = text.startsWith(BOM) ? text.slice(1) : text;
  const rows: string[][] = [];
  let row: string[] = [];
  let cell = '';
  let inQuotes = false;

  const endRow = () => {
    row.push(cell);
    if (row.length > 1 || row[0] !== '') rows.push(row);
    row = [];
    cell = '';
  };

  for (let i = 0; i < source.length; i++) {
    const ch = source[i];
    if (inQuotes) {
      if (ch === '"' && source[i + 1] === '"') {
        cell += '"';
        i++;
      } else if (ch === '"') {
        inQuotes = false;
      } else {
        cell += ch;
      }
    } else if (ch === '"') {
      inQuotes = true;
    } else if (ch === ',') {
      row.push(cell);
      cell = '';
    } else if (ch === '\r' && source[i + 1] === '\n') {
      endRow();
      i++;
    } else if (ch === '\n' || ch === '\r') {
      endRow();
    } else {
      cell += ch;
    }
  }
  if (inQuotes) throw new Error('引号未闭合');
  if (cell !== '' || row.length > 0) endRow();
  return rows;
}
