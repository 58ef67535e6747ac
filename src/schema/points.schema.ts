import { z } from 'zod';

/**
 * 物体点元数据（points_info.json）的宽松结构。
 * 元数据由外部手写，解析策略是“能用则用”：任何一层不合规都降级为空，而不是报错。
 */

/** 单个条目：id 为整数或整数列表（列表中的非整数成员在构建索引时丢弃） */
export const PointEntrySchema = z
  .object({
    id: z.union([z.number().int(), z.array(z.unknown())]),
  })
  .passthrough();

export const PointsInfoSchema = z
  .object({
    contact_points: z.array(z.unknown()).catch([]),
    functional_points: z.array(z.unknown()).catch([]),
  })
  .passthrough();
