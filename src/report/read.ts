import type { CsvCell, Vec6 } from '../types';
import { is_record } from '../utils/canonical.util';

/** 报告侧的宽松读取：输入可能是原始（未校验）计划，任何形状都不抛错 */

export function get_sequence(plan: unknown): unknown[] {
  if (!is_record(plan)) return [];
  const seq = plan.sequence;
  return Array.isArray(seq) ? seq : [];
}

export function as_step(x: unknown): Record<string, unknown> {
  return is_record(x) ? x : {};
}

function loose_number(v: unknown): number {
  if (typeof v === 'number') return Number.isNaN(v) ? 0 : v;
  if (typeof v === 'string' && v.trim() !== '') {
    const n = Number(v);
    return Number.isNaN(n) ? 0 : n;
  }
  return 0;
}

/** 长度为 6 的数组逐项转数值（失败记 0）；其他形状视为全零 */
export function loose_vec6(x: unknown): Vec6 {
  if (!Array.isArray(x) || x.length !== 6) return [0, 0, 0, 0, 0, 0];
  return [
    loose_number(x[0]),
    loose_number(x[1]),
    loose_number(x[2]),
    loose_number(x[3]),
    loose_number(x[4]),
    loose_number(x[5]),
  ];
}

/** null / undefined → ""，字符串原样，其余转字符串 */
export function as_text(v: unknown): string {
  if (v === null || v === undefined) return '';
  if (typeof v === 'string') return v;
  if (typeof v === 'number' || typeof v === 'boolean') return String(v);
  return JSON.stringify(v);
}

/** 表格单元格：标量原样，结构化值转 JSON 文本 */
export function as_cell(v: unknown): CsvCell {
  if (v === undefined) return null;
  if (v === null || typeof v === 'string' || typeof v === 'number' || typeof v === 'boolean') return v;
  return JSON.stringify(v);
}
