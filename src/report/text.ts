import type { ValidationIssue } from '../types';

/** "[LEVEL] CODE @ path: message"；path 为空时省略 " @ path" */
export function format_issue(it: ValidationIssue): string {
  const loc = it.path ? ` @ ${it.path}` : '';
  return `[${it.level}] ${it.code}${loc}: ${it.message}`;
}

export function issues_to_text(issues: readonly ValidationIssue[]): string {
  return issues.map(format_issue).join('\n');
}

/** 错误码 → 出现次数（按首次出现顺序） */
export function issue_code_counts(issues: readonly ValidationIssue[]): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const it of issues) {
    counts[it.code] = (counts[it.code] ?? 0) + 1;
  }
  return counts;
}
