import type { StepRow } from '../types';
import { is_record } from '../utils/canonical.util';
import { as_cell, as_text, get_sequence, loose_vec6 } from './read';

/**
 * 计划 → 逐步表格行（每个对象步骤一行，非对象步骤跳过；idx 保留原下标）。
 * 向量缺失或形状不对时按全零展开。
 */
export function plan_to_step_rows(plan: unknown): StepRow[] {
  const rows: StepRow[] = [];

  get_sequence(plan).forEach((step, idx) => {
    if (!is_record(step)) return;
    const [vx, vy, vz, wx, wy, wz] = loose_vec6(step.V);
    const [mx, my, mz, mrx, mry, mrz] = loose_vec6(step.M);

    rows.push({
      idx,
      subtask: as_text(step.subtask),
      frame: as_text(step.frame),
      actor_obj: as_text(step.actor_obj ?? step.actor),
      actor_point: as_cell(step.actor_point),
      target_obj: as_text(step.target_obj ?? step.target),
      target_point: as_cell(step.target_point),
      vx, vy, vz, wx, wy, wz,
      mx, my, mz, mrx, mry, mrz,
      notes: as_text(step.notes),
    });
  });

  return rows;
}
