/** ---------------------------
 *  报告（逐步表格 / 对比摘要）
 * ---------------------------*/

export type CsvCell = string | number | boolean | null;
export type CsvRow = Record<string, CsvCell>;

/** plan_to_step_rows 的单行 */
export interface StepRow extends CsvRow {
  idx: number;
  subtask: string;
  frame: string;
  actor_obj: string;
  actor_point: CsvCell;
  target_obj: string;
  target_point: CsvCell;
  vx: number;
  vy: number;
  vz: number;
  wx: number;
  wy: number;
  wz: number;
  mx: number;
  my: number;
  mz: number;
  mrx: number;
  mry: number;
  mrz: number;
  notes: string;
}

/** 原始计划与净化计划的差异统计 */
export interface PlanComparison extends CsvRow {
  steps_raw: number;
  steps_validated: number;
  frame_changed_steps: number;
  subtask_changed_steps: number;
  V_index_changes: number;
  M_index_changes: number;
  point_changed_steps: number;
  vm_rule_fixed_steps: number;
  frames_WORLD: number;
  frames_CONTACT: number;
  frames_FUNCTIONAL: number;
  world_lift_steps: number;
}

/** save_reports 写出的文件路径 */
export interface ReportPaths {
  raw_steps_csv: string;
  validated_steps_csv: string;
  issues_txt: string;
  summary_csv: string;
  global_summary_csv: string;
}
