import { z } from 'zod';

/** 校验选项文件（--config）的结构；未知键直接拒绝，防止拼写错误被静默忽略 */
export const ValidateOptionsSchema = z
  .object({
    auto_fix: z.boolean().optional(),
    strict_subtasks: z.boolean().optional(),
    max_abs_v: z.number().positive('max_abs_v 必须为正数').optional(),
    max_abs_m: z.number().positive('max_abs_m 必须为正数').optional(),
    max_steps: z.number().int().min(1, 'max_steps 不能小于 1').optional(),
  })
  .strict();

export function parse_validate_options(input: unknown) {
  return ValidateOptionsSchema.safeParse(input);
}
