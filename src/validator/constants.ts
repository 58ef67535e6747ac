import type { Frame, ResolvedValidateOptions } from '../types';

/** 缺省校验选项 */
export const DEFAULT_VALIDATE_OPTIONS: ResolvedValidateOptions = {
  auto_fix: true,
  strict_subtasks: false,
  max_abs_v: 3.0,
  max_abs_m: 50.0,
  max_steps: 8,
};

/** |x| 超过该值才算“非零” */
export const NONZERO_EPS = 1e-9;

/** V 中非零分量超过该数量时给出 DENSE_TWIST 提示 */
export const MAX_SPARSE_TWIST_AXES = 2;

/** 全零步补全时写入 V[2]（frame 的 +z）的接近速度 */
export const DEFAULT_APPROACH_SPEED = 1.0;

/** 这些子任务不允许 V/M 全零（auto_fix 时补一个默认接近运动） */
export const ZERO_FILL_SUBTASKS: ReadonlySet<string> = new Set([
  'move_to_pose',
  'place',
  'move_by_displacement',
]);

/** 子任务 → 强制 frame */
export const HARD_FRAME_BY_SUBTASK: ReadonlyMap<string, Frame> = new Map<string, Frame>([
  ['grasp', 'CONTACT'],
  ['rotate', 'FUNCTIONAL'],
]);

/** 记录了一次修改的告警码；对已净化的计划再校验时不应再出现 */
export const CORRECTION_CODES: ReadonlySet<string> = new Set([
  'VM_RULE_FIXED',
  'FRAME_HARD_FIXED',
  'ZERO_STEP_FILLED',
  'POINT_PARSED',
  'MISSING_POINT_KEY',
  'BAD_ACTOR_OBJ',
  'BAD_TARGET_OBJ',
]);

// 错误码常量
export const CODE = {
  PLAN_NOT_OBJECT: 'PLAN_NOT_OBJECT',
  MISSING_TASK: 'MISSING_TASK',
  NO_SEQUENCE: 'NO_SEQUENCE',
  EMPTY_SEQUENCE: 'EMPTY_SEQUENCE',
  TOO_MANY_STEPS: 'TOO_MANY_STEPS',
  STEP_NOT_OBJECT: 'STEP_NOT_OBJECT',

  BAD_SUBTASK: 'BAD_SUBTASK',
  UNKNOWN_SUBTASK: 'UNKNOWN_SUBTASK',
  SUBTASK_NOT_ALLOWED: 'SUBTASK_NOT_ALLOWED',
  BAD_FRAME: 'BAD_FRAME',
  BAD_ACTOR_OBJ: 'BAD_ACTOR_OBJ',
  BAD_TARGET_OBJ: 'BAD_TARGET_OBJ',
  MISSING_POINT_KEY: 'MISSING_POINT_KEY',
  POINT_NOT_INT: 'POINT_NOT_INT',
  POINT_PARSED: 'POINT_PARSED',

  BAD_V: 'BAD_V',
  BAD_M: 'BAD_M',
  VM_RULE_FIXED: 'VM_RULE_FIXED',
  VM_RULE_VIOLATION: 'VM_RULE_VIOLATION',
  ZERO_STEP: 'ZERO_STEP',
  ZERO_STEP_FILLED: 'ZERO_STEP_FILLED',
  ZERO_STEP_NOT_ALLOWED: 'ZERO_STEP_NOT_ALLOWED',
  DENSE_TWIST: 'DENSE_TWIST',

  FRAME_HARD_FIXED: 'FRAME_HARD_FIXED',
  FRAME_HARD_VIOLATION: 'FRAME_HARD_VIOLATION',
  POINT_ID_NOT_FOUND: 'POINT_ID_NOT_FOUND',
  POINT_ID_INVALID_FOR_OBJECT: 'POINT_ID_INVALID_FOR_OBJECT',
  POINT_ID_INVALID_FOR_FRAME: 'POINT_ID_INVALID_FOR_FRAME',
} as const;

export type IssueCode = (typeof CODE)[keyof typeof CODE];
