import { CODE, DEFAULT_APPROACH_SPEED, MAX_SPARSE_TWIST_AXES, ZERO_FILL_SUBTASKS } from './constants';
import type { NormalizedStep, StepContext } from './context';
import { clamp_vec, count_nonzero, is_zero_vec, map6, vm_violations } from './vector';

/**
 * enforce_numeric()
 * ----------------
 * V / M 的数值规则，顺序固定：
 *  1. auto_fix 时截断到 ±max_abs_v / ±max_abs_m（静默，不记账）
 *  2. 同一轴 V 与 M 互斥：auto_fix 清零 M 并记一条 VM_RULE_FIXED，否则 VM_RULE_VIOLATION
 *  3. 全零步：ZERO_FILL_SUBTASKS 内的子任务补 V[2]=+1（或报错），其余只提示 ZERO_STEP
 *  4. V 非零分量过多时提示 DENSE_TWIST
 * 任一向量形状不合规时只记 BAD_V / BAD_M，跳过其余数值检查。
 */
export function enforce_numeric(step: NormalizedStep, ctx: StepContext): NormalizedStep {
  const { path, options, ledger, draft } = ctx;

  if (step.V === null) ledger.error(CODE.BAD_V, `${path}/V`, "'V' must be a list of 6 numbers.");
  if (step.M === null) ledger.error(CODE.BAD_M, `${path}/M`, "'M' must be a list of 6 numbers.");
  if (step.V === null || step.M === null) return step;

  let V = step.V;
  let M = step.M;

  if (options.auto_fix) {
    V = clamp_vec(V, options.max_abs_v);
    M = clamp_vec(M, options.max_abs_m);
  }

  const violated = vm_violations(V, M);
  if (violated.length > 0) {
    const indices = `[${violated.join(', ')}]`;
    if (options.auto_fix) {
      const hit = new Set(violated);
      M = map6(M, (m, k) => (hit.has(k) ? 0 : m));
      ledger.warn(CODE.VM_RULE_FIXED, path, `Auto-fixed: zeroed M at indices ${indices}.`);
    } else {
      ledger.error(
        CODE.VM_RULE_VIOLATION,
        path,
        `Rule violated at indices ${indices}: V and M both non-zero.`,
        'A step commands either motion or force along an axis, never both.'
      );
    }
  }

  if (is_zero_vec(V) && is_zero_vec(M)) {
    const subtask = step.subtask;
    if (subtask !== null && ZERO_FILL_SUBTASKS.has(subtask)) {
      if (options.auto_fix) {
        const speed = Math.min(DEFAULT_APPROACH_SPEED, options.max_abs_v);
        V = map6(V, (v, k) => (k === 2 ? speed : v));
        ledger.warn(
          CODE.ZERO_STEP_FILLED,
          path,
          `Filled all-zero step with default approach Vz=+${Number.isInteger(speed) ? speed.toFixed(1) : speed} in frame=${step.frame ?? 'unresolved'}.`
        );
      } else {
        ledger.error(CODE.ZERO_STEP_NOT_ALLOWED, path, `All-zero V/M not allowed for subtask '${subtask}'.`);
      }
    } else {
      ledger.warn(CODE.ZERO_STEP, path, 'V and M are all zeros (step may be redundant).');
    }
  }

  const nz = count_nonzero(V);
  if (nz > MAX_SPARSE_TWIST_AXES) {
    ledger.warn(CODE.DENSE_TWIST, path, `V has ${nz} non-zero components; prefer sparse.`);
  }

  if (options.auto_fix) {
    draft.put('V', [...V]);
    draft.put('M', [...M]);
  }
  return { ...step, V, M };
}
