import type { IssueLevel, ValidationIssue } from '../types';

export * from './plan.schema';
export * from './points.schema';
export * from './options.schema';

/** 构造统一的校验问题对象（引擎各阶段与 CLI 复用） */
export function issue(
  level: IssueLevel,
  code: string,
  path: string,
  message: string,
  hint?: string
): ValidationIssue {
  return hint === undefined ? { level, code, path, message } : { level, code, path, message, hint };
}
