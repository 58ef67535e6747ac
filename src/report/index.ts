export { compare_raw_validated } from './compare';
export { csv_line, to_csv } from './csv';
export { to_markdown } from './markdown';
export { plan_to_step_rows } from './rows';
export { NO_ISSUES_TEXT, SUMMARY_FIX_CODES, save_reports, summary_row } from './save';
export { format_issue, issue_code_counts, issues_to_text } from './text';
