import { z } from 'zod';
import { NONZERO_EPS } from '../validator/constants';

/**
 * 任务计划的结构定义。
 * 引擎本身按字段逐个容错解析（见 validator/normalize）；这里的 PlanSchema 描述的是
 * “净化完成后”的规范形状，供下游以强类型读取。
 */

/** 合法参考坐标系 */
export const FRAMES = ['WORLD', 'CONTACT', 'FUNCTIONAL'] as const;

/** 允许的子任务集合（规范化后） */
export const SUBTASKS = [
  'grasp',
  'pre_grasp',
  'move_by_displacement',
  'move_to_pose',
  'rotate',
  'place',
  'release',
] as const;

export const FrameSchema = z.enum(FRAMES);
export const SubtaskSchema = z.enum(SUBTASKS);

/** 恰好 6 个数值（z.number 拒绝 NaN、布尔与数字字符串） */
export const Vec6Schema = z.tuple([
  z.number(),
  z.number(),
  z.number(),
  z.number(),
  z.number(),
  z.number(),
]);

/** 规范点 id：非负整数 */
export const PointIdSchema = z.number().int().nonnegative();

/**
 * 规范步骤：
 * - actor_point / target_point 必须存在（可为 null）
 * - V 与 M 在同一轴上不得同时非零
 */
export const PlanStepSchema = z
  .object({
    subtask: z.string().min(1),
    frame: FrameSchema,
    actor_obj: z.string().nullable().optional(),
    target_obj: z.string().nullable().optional(),
    actor_point: PointIdSchema.nullable(),
    target_point: PointIdSchema.nullable(),
    V: Vec6Schema,
    M: Vec6Schema,
    notes: z.string().optional(),
  })
  .passthrough()
  .superRefine((step, ctx) => {
    step.V.forEach((v, k) => {
      if (Math.abs(v) > NONZERO_EPS && Math.abs(step.M[k]) > NONZERO_EPS) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `V[${k}] and M[${k}] are both non-zero`,
          path: ['M', k],
        });
      }
    });
  });

export const PlanSchema = z
  .object({
    task: z.string().optional(),
    sequence: z.array(PlanStepSchema).min(1, 'sequence must contain at least one step'),
  })
  .passthrough();

export type PlanType = z.infer<typeof PlanSchema>;
export type PlanStepType = z.infer<typeof PlanStepSchema>;

/** 安全解析规范计划：成功返回 { success:true, data }；失败返回 { success:false, error } */
export function parse_plan(input: unknown) {
  return PlanSchema.safeParse(input);
}
