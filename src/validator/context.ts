import type { Frame, ResolvedValidateOptions, Vec6 } from '../types';
import type { StepBuilder } from './builder';
import type { IssueLedger } from './ledger';

/** 单步校验上下文（各阶段共享） */
export interface StepContext {
  /** 步骤路径，如 "/sequence/2" */
  readonly path: string;
  readonly options: ResolvedValidateOptions;
  readonly ledger: IssueLedger;
  /** 净化后的步骤记录（仅 auto_fix 时写入修正） */
  readonly draft: StepBuilder;
}

/**
 * 规范化之后的强类型步骤视图。
 * 后续规则只读这里，不再碰原始记录。
 */
export interface NormalizedStep {
  subtask: string | null;
  frame: Frame | null;
  actor_obj: string | null;
  target_obj: string | null;
  /** 规范整数 id；缺失、null 或无法解析时为 null */
  actor_point: number | null;
  target_point: number | null;
  V: Vec6 | null;
  M: Vec6 | null;
}
