/** ---------------------------
 *  任务计划（规范形状）
 * ---------------------------*/

/** 参考坐标系 */
export type Frame = 'WORLD' | 'CONTACT' | 'FUNCTIONAL';

/** 允许的子任务名（规范化后：小写 + 下划线） */
export type Subtask =
  | 'grasp'
  | 'pre_grasp'
  | 'move_by_displacement'
  | 'move_to_pose'
  | 'rotate'
  | 'place'
  | 'release';

/** 6 维向量：前 3 个线性分量，后 3 个角分量 */
export type Vec6 = [number, number, number, number, number, number];

/**
 * 单个操作步骤（完全自动修复后的规范形状）。
 * 未知字段原样透传。
 */
export interface PlanStep {
  /** 子任务名；未知名称在非严格模式下也会保留。 */
  subtask: string;
  frame: Frame;
  actor_obj?: string | null;
  target_obj?: string | null;
  actor_point: number | null;
  target_point: number | null;
  /** 速度 twist（在 frame 下表达）。 */
  V: Vec6;
  /** 力 wrench（在 frame 下表达）。 */
  M: Vec6;
  notes?: string;
  [extra: string]: unknown;
}

/** 规范计划 */
export interface Plan {
  task?: string;
  sequence: PlanStep[];
  [extra: string]: unknown;
}

/**
 * 引擎返回的“尽力而为”净化文档：
 * 结构上是 JSON 对象；ok 且开启 auto_fix 时可用 parse_plan 得到 Plan。
 */
export type PlanRecord = Record<string, unknown>;
