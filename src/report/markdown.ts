import type { CsvRow } from '../types';

/** 单行 markdown 表格（表头 + 分隔 + 数据），便于直接贴进文档 */
export function to_markdown(row: CsvRow): string {
  const keys = Object.keys(row);
  const header = '| ' + keys.join(' | ') + ' |';
  const sep = '| ' + keys.map(() => '---').join(' | ') + ' |';
  const vals = '| ' + keys.map((k) => String(row[k] ?? '')).join(' | ') + ' |';
  return [header, sep, vals].join('\n');
}
