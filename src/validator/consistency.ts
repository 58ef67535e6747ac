import type { Frame, PointIndex } from '../types';
import { CODE, HARD_FRAME_BY_SUBTASK } from './constants';
import type { NormalizedStep, StepContext } from './context';
import { expected_kind_for, lookup_object } from './points';

type PointField = 'actor_point' | 'target_point';

/**
 * 点 id 成员检查，分三层：
 * - WORLD：只查全体 any_point 并集，缺失仅告警（低置信度层）
 * - CONTACT/FUNCTIONAL 且对象名在索引中：查该对象对应种类的集合，缺失为错误
 * - CONTACT/FUNCTIONAL 且无对象名（或索引不认识）：查跨对象的同种类并集，缺失为错误
 * 参照集合为空表示没有该层的元数据，跳过检查。
 */
function check_point_id(
  field: PointField,
  id: number | null,
  obj: string | null,
  frame: Frame,
  index: PointIndex,
  ctx: StepContext
): void {
  if (id === null) return;
  const at = `${ctx.path}/${field}`;

  const kind = expected_kind_for(frame);
  if (kind === null) {
    const any = index._union.any_point;
    if (any.size > 0 && !any.has(id)) {
      ctx.ledger.warn(CODE.POINT_ID_NOT_FOUND, at, `${field}=${id} not found in any object's point ids.`);
    }
    return;
  }

  const sets = obj === null ? undefined : lookup_object(index, obj);
  if (sets) {
    const allowed = sets[kind];
    if (allowed.size > 0 && !allowed.has(id)) {
      ctx.ledger.error(CODE.POINT_ID_INVALID_FOR_OBJECT, at, `${field}=${id} not in ${obj}.${kind} ids.`);
    }
    return;
  }

  const union = index._union[kind];
  if (union.size > 0 && !union.has(id)) {
    ctx.ledger.error(
      CODE.POINT_ID_INVALID_FOR_FRAME,
      at,
      `${field}=${id} not valid for frame=${frame} (expected ${kind}).`
    );
  }
}

/**
 * check_frame_and_points()
 * ----------------
 * 1. 子任务强制 frame（grasp→CONTACT, rotate→FUNCTIONAL）：auto_fix 改写并告警，否则报错
 * 2. 用（可能刚被改写的）frame 决定点种类，再检查 actor_point / target_point
 * frame 无法解析时两项都跳过（BAD_FRAME 已记账）。
 */
export function check_frame_and_points(
  step: NormalizedStep,
  ctx: StepContext,
  index: PointIndex
): NormalizedStep {
  const { path, options, ledger, draft } = ctx;
  let frame = step.frame;
  if (frame === null) return step;

  const required = step.subtask === null ? undefined : HARD_FRAME_BY_SUBTASK.get(step.subtask);
  if (required !== undefined && frame !== required) {
    if (options.auto_fix) {
      ledger.warn(
        CODE.FRAME_HARD_FIXED,
        `${path}/frame`,
        `Auto-fixed frame: ${frame} -> ${required} for '${step.subtask}'.`
      );
      draft.put('frame', required);
      frame = required;
    } else {
      ledger.error(
        CODE.FRAME_HARD_VIOLATION,
        `${path}/frame`,
        `Subtask '${step.subtask}' requires frame '${required}' (got '${frame}').`
      );
    }
  }

  check_point_id('actor_point', step.actor_point, step.actor_obj, frame, index, ctx);
  check_point_id('target_point', step.target_point, step.target_obj, frame, index, ctx);

  return { ...step, frame };
}
