import type {
  PlanRecord,
  PointIndex,
  ResolvedValidateOptions,
  ValidateOptions,
  ValidationIssue,
  ValidationResult,
} from '../types';
import { deep_copy, is_record, set_own } from '../utils/canonical.util';
import { StepBuilder } from './builder';
import { check_frame_and_points } from './consistency';
import { CODE, DEFAULT_VALIDATE_OPTIONS } from './constants';
import type { StepContext } from './context';
import { IssueLedger } from './ledger';
import { normalize_step } from './normalize';
import { enforce_numeric } from './numeric';

/** 用缺省值补齐选项（显式传入的 undefined 同样取缺省值） */
export function resolve_options(options: ValidateOptions = {}): ResolvedValidateOptions {
  const d = DEFAULT_VALIDATE_OPTIONS;
  return {
    auto_fix: options.auto_fix ?? d.auto_fix,
    strict_subtasks: options.strict_subtasks ?? d.strict_subtasks,
    max_abs_v: options.max_abs_v ?? d.max_abs_v,
    max_abs_m: options.max_abs_m ?? d.max_abs_m,
    max_steps: options.max_steps ?? d.max_steps,
  };
}

/** 单步：规范化 → 数值规则 → frame/点一致性，最后合成净化记录 */
function sanitize_step(
  raw: unknown,
  i: number,
  index: PointIndex,
  options: ResolvedValidateOptions,
  ledger: IssueLedger
): unknown {
  const path = `/sequence/${i}`;
  if (!is_record(raw)) {
    ledger.error(CODE.STEP_NOT_OBJECT, path, 'Each step must be an object.');
    return deep_copy(raw);
  }

  const ctx: StepContext = { path, options, ledger, draft: new StepBuilder(raw) };
  const normalized = normalize_step(raw, ctx);
  const numeric = enforce_numeric(normalized, ctx);
  check_frame_and_points(numeric, ctx, index);
  return ctx.draft.build();
}

/**
 * validate_plan()
 * ----------------
 * 用途：校验并净化一份由模型生成的任务计划。
 * 设计原则：
 *  - 纯函数：不做 IO；调用方的 plan 与 point_index 都不会被修改。
 *  - 不抛异常：任何字段问题都降级为一条 issue，继续检查后续字段与后续步骤。
 *  - 只有结构性问题（plan 非对象、sequence 缺失/非数组/为空）会提前返回。
 *  - ok === 不存在 ERROR；即使失败也返回尽力净化后的文档。
 */
export function validate_plan(
  plan: unknown,
  point_index: PointIndex,
  options: ValidateOptions = {}
): ValidationResult {
  const opts = resolve_options(options);
  const ledger = new IssueLedger();

  if (!is_record(plan)) {
    ledger.error(CODE.PLAN_NOT_OBJECT, '', 'Plan must be an object.');
    return ledger.result({});
  }

  const task = plan.task;
  if (typeof task !== 'string' || task.trim() === '') {
    ledger.warn(CODE.MISSING_TASK, '/task', "Top-level 'task' is missing/invalid (recommended).");
  }

  const seq = plan.sequence;
  if (!Array.isArray(seq)) {
    ledger.error(CODE.NO_SEQUENCE, '/sequence', "Top-level 'sequence' must be a list.");
    return ledger.result(deep_copy(plan));
  }
  if (seq.length === 0) {
    ledger.error(CODE.EMPTY_SEQUENCE, '/sequence', 'Sequence must contain at least one step.');
    return ledger.result(deep_copy(plan));
  }
  if (seq.length > opts.max_steps) {
    ledger.warn(
      CODE.TOO_MANY_STEPS,
      '/sequence',
      `Sequence has ${seq.length} steps; recommended <= ${opts.max_steps}.`
    );
  }

  const sequence = seq.map((raw: unknown, i: number) => sanitize_step(raw, i, point_index, opts, ledger));

  // 保持顶层键顺序，只替换 sequence
  const sanitized: PlanRecord = {};
  for (const key of Object.keys(plan)) {
    set_own(sanitized, key, key === 'sequence' ? sequence : deep_copy(plan[key]));
  }
  return ledger.result(sanitized);
}

export function errors_of(result: ValidationResult): ValidationIssue[] {
  return result.issues.filter((i) => i.level === 'ERROR');
}

export function warnings_of(result: ValidationResult): ValidationIssue[] {
  return result.issues.filter((i) => i.level === 'WARN');
}

export { build_point_id_index, empty_point_index } from './points';
export { parse_point_id, normalize_frame, normalize_subtask } from './normalize';
export { CODE, CORRECTION_CODES, DEFAULT_VALIDATE_OPTIONS } from './constants';
export type { IssueCode } from './constants';
