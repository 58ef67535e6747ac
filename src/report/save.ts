import { join } from 'node:path';
import type { CsvRow, ReportPaths, ValidationResult } from '../types';
import { canonical_stringify, hash_sha256 } from '../utils/canonical.util';
import { append_text, create_folder_writer, file_exists } from '../utils/fs.util';
import { task_slug } from '../utils/slug.util';
import { compare_raw_validated } from './compare';
import { csv_line, to_csv } from './csv';
import { plan_to_step_rows } from './rows';
import { issue_code_counts, issues_to_text } from './text';

/** 汇总行中单独列出计数的常见修正码（没有则为 0） */
export const SUMMARY_FIX_CODES = ['VM_RULE_FIXED', 'FRAME_HARD_FIXED', 'POINT_PARSED', 'ZERO_STEP', 'ZERO_STEP_FILLED'] as const;

export const NO_ISSUES_TEXT = '[Validator] No issues.';

/**
 * 一次校验的汇总行：
 * task / ok / 错误与告警数 / 原始-净化差异 / 常见修正码计数 / plan_id
 * plan_id = sha256(canonical_stringify(sanitized))，同内容的净化计划得到同一个 id。
 */
export function summary_row(task_name: string, raw_plan: unknown, result: ValidationResult): CsvRow {
  const counts = issue_code_counts(result.issues);
  const row: CsvRow = {
    task: task_name,
    ok: result.ok,
    errors: result.issues.filter((x) => x.level === 'ERROR').length,
    warnings: result.issues.filter((x) => x.level === 'WARN').length,
    ...compare_raw_validated(raw_plan, result.sanitized),
  };
  for (const code of SUMMARY_FIX_CODES) row[code] = counts[code] ?? 0;
  row.plan_id = hash_sha256(canonical_stringify(result.sanitized));
  return row;
}

/**
 * save_reports()
 * ----------------
 * 在 <output_dir>/reports/ 下写出：
 *   <slug>__steps_raw.csv
 *   <slug>__steps_validated.csv
 *   <slug>__validator_issues.txt
 *   <slug>__validator_summary.csv
 *   summary.csv（追加；文件新建时才写表头）
 */
export async function save_reports(
  task_name: string,
  raw_plan: unknown,
  result: ValidationResult,
  output_dir = 'results'
): Promise<ReportPaths> {
  const reports_dir = join(output_dir, 'reports');
  const write = create_folder_writer(reports_dir);
  const slug = task_slug(task_name);

  const raw_steps_csv = await write(to_csv(plan_to_step_rows(raw_plan)), `${slug}__steps_raw.csv`);
  const validated_steps_csv = await write(
    to_csv(plan_to_step_rows(result.sanitized)),
    `${slug}__steps_validated.csv`
  );
  const issues_txt = await write(
    result.issues.length > 0 ? issues_to_text(result.issues) : NO_ISSUES_TEXT,
    `${slug}__validator_issues.txt`
  );

  const row = summary_row(task_name, raw_plan, result);
  const summary_csv = await write(to_csv([row]), `${slug}__validator_summary.csv`);

  const global_summary_csv = join(reports_dir, 'summary.csv');
  const header = (await file_exists(global_summary_csv)) ? '' : csv_line(Object.keys(row));
  await append_text(global_summary_csv, header + csv_line(Object.values(row)));

  return { raw_steps_csv, validated_steps_csv, issues_txt, summary_csv, global_summary_csv };
}
