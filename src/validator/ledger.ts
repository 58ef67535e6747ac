import { issue } from '../schema';
import type { PlanRecord, ValidationIssue, ValidationResult } from '../types';
import type { IssueCode } from './constants';

/**
 * 问题账本：一次校验调用共享一份，只追加、保持产生顺序。
 * 追加后的条目被冻结。
 */
export class IssueLedger {
  private readonly items: ValidationIssue[] = [];
  private error_count = 0;

  error(code: IssueCode, path: string, message: string, hint?: string): void {
    this.items.push(Object.freeze(issue('ERROR', code, path, message, hint)));
    this.error_count++;
  }

  warn(code: IssueCode, path: string, message: string, hint?: string): void {
    this.items.push(Object.freeze(issue('WARN', code, path, message, hint)));
  }

  get has_errors(): boolean {
    return this.error_count > 0;
  }

  get size(): number {
    return this.items.length;
  }

  to_array(): ValidationIssue[] {
    return [...this.items];
  }

  /** 组装最终结果：ok 仅取决于是否记录过 ERROR */
  result(sanitized: PlanRecord): ValidationResult {
    return { ok: !this.has_errors, sanitized, issues: this.to_array() };
  }
}
