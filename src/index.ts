export {
  validate_plan,
  resolve_options,
  errors_of,
  warnings_of,
  build_point_id_index,
  empty_point_index,
  parse_point_id,
  normalize_frame,
  normalize_subtask,
  CODE,
  CORRECTION_CODES,
  DEFAULT_VALIDATE_OPTIONS,
} from './validator';
export type { IssueCode } from './validator';
export {
  compare_raw_validated,
  format_issue,
  issue_code_counts,
  issues_to_text,
  plan_to_step_rows,
  save_reports,
  summary_row,
  to_csv,
  to_markdown,
} from './report';
export { parse_plan, parse_validate_options, PlanSchema, ValidateOptionsSchema } from './schema';
export type { PlanType, PlanStepType } from './schema';
export type * from './types';
