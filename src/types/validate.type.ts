import type { ValidationIssue } from './issue.type';
import type { PlanRecord } from './plan.type';

/** ---------------------------
 *  校验阶段（选项 / 输出）
 * ---------------------------*/

/** 校验选项（均可选，缺省值见 DEFAULT_VALIDATE_OPTIONS） */
export interface ValidateOptions {
  /**
   * 自动修复：可恢复的违规被修正并记为 WARN，而不是 ERROR。
   * 关闭时净化文档与输入保持一致。
   */
  auto_fix?: boolean;
  /** 严格模式：未知 subtask 由 WARN 升级为 ERROR。 */
  strict_subtasks?: boolean;
  /** V 分量的绝对值上限。 */
  max_abs_v?: number;
  /** M 分量的绝对值上限。 */
  max_abs_m?: number;
  /** 建议的最大步数（超出仅告警）。 */
  max_steps?: number;
}

export type ResolvedValidateOptions = Required<ValidateOptions>;

/** 校验输出 */
export interface ValidationResult {
  /** 无任何 ERROR 时为 true（WARN 可能非空）。 */
  ok: boolean;
  /** 输入的深拷贝，按策略修正后的结果；失败时同样返回。 */
  sanitized: PlanRecord;
  /** 按产生顺序排列的问题列表。 */
  issues: ValidationIssue[];
}
