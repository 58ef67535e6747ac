import type { Frame, PlanComparison } from '../types';
import { as_step, as_text, get_sequence, loose_vec6 } from './read';

const CHANGE_EPS = 1e-9;

/** 净化后 M 分量视为“已清零”的阈值 */
const ZEROED_EPS = 1e-12;

function point_of(v: unknown): unknown {
  return v === undefined ? null : v;
}

/**
 * compare_raw_validated()
 * ----------------
 * 统计原始计划与净化计划之间的差异（按下标对齐前 min(n_raw, n_validated) 步）：
 * - frame / subtask / 点 id 被改动的步数（frame 忽略大小写，subtask 只忽略大小写）
 * - V / M 逐分量变化次数
 * - vm_rule_fixed_steps：原始同轴 V、M 都非零而净化后该轴 M 为零的步数
 * - 净化计划的 frame 分布与 WORLD 下 Vz>0 的抬升步数
 */
export function compare_raw_validated(raw: unknown, validated: unknown): PlanComparison {
  const rseq = get_sequence(raw);
  const vseq = get_sequence(validated);
  const n = Math.min(rseq.length, vseq.length);

  let frame_changed_steps = 0;
  let subtask_changed_steps = 0;
  let V_index_changes = 0;
  let M_index_changes = 0;
  let point_changed_steps = 0;
  let vm_rule_fixed_steps = 0;

  for (let i = 0; i < n; i++) {
    const rs = as_step(rseq[i]);
    const vs = as_step(vseq[i]);

    if (as_text(rs.frame).toUpperCase() !== as_text(vs.frame).toUpperCase()) frame_changed_steps++;
    if (as_text(rs.subtask).toLowerCase() !== as_text(vs.subtask).toLowerCase()) subtask_changed_steps++;

    const rV = loose_vec6(rs.V);
    const rM = loose_vec6(rs.M);
    const vV = loose_vec6(vs.V);
    const vM = loose_vec6(vs.M);

    let vm_fixed = false;
    for (let k = 0; k < 6; k++) {
      if (Math.abs(rV[k] - vV[k]) > CHANGE_EPS) V_index_changes++;
      if (Math.abs(rM[k] - vM[k]) > CHANGE_EPS) M_index_changes++;
      if (Math.abs(rV[k]) > CHANGE_EPS && Math.abs(rM[k]) > CHANGE_EPS && Math.abs(vM[k]) < ZEROED_EPS) {
        vm_fixed = true;
      }
    }
    if (vm_fixed) vm_rule_fixed_steps++;

    if (
      point_of(rs.actor_point) !== point_of(vs.actor_point) ||
      point_of(rs.target_point) !== point_of(vs.target_point)
    ) {
      point_changed_steps++;
    }
  }

  const frames: Record<Frame, number> = { WORLD: 0, CONTACT: 0, FUNCTIONAL: 0 };
  let world_lift_steps = 0;
  for (const item of vseq) {
    const s = as_step(item);
    const f = as_text(s.frame).toUpperCase();
    if (f === 'WORLD' || f === 'CONTACT' || f === 'FUNCTIONAL') frames[f]++;
    if (f === 'WORLD' && loose_vec6(s.V)[2] > CHANGE_EPS) world_lift_steps++;
  }

  return {
    steps_raw: rseq.length,
    steps_validated: vseq.length,
    frame_changed_steps,
    subtask_changed_steps,
    V_index_changes,
    M_index_changes,
    point_changed_steps,
    vm_rule_fixed_steps,
    frames_WORLD: frames.WORLD,
    frames_CONTACT: frames.CONTACT,
    frames_FUNCTIONAL: frames.FUNCTIONAL,
    world_lift_steps,
  };
}
