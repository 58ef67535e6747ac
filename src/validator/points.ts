import { PointEntrySchema, PointsInfoSchema } from '../schema';
import type { Frame, PointIndex, PointKind, PointKindSets } from '../types';

/** 全体并集在索引中的键名 */
export const UNION_KEY = '_union';

function empty_sets(): PointKindSets {
  return { contact_point: new Set(), functional_point: new Set(), any_point: new Set() };
}

/** 把条目列表里的 id（整数或整数列表）展开为整数集合；不合规的条目直接跳过 */
function collect_ids(entries: unknown[]): Set<number> {
  const ids = new Set<number>();
  for (const entry of entries) {
    const parsed = PointEntrySchema.safeParse(entry);
    if (!parsed.success) continue;
    const id = parsed.data.id;
    if (typeof id === 'number') {
      ids.add(id);
      continue;
    }
    for (const x of id) {
      if (typeof x === 'number' && Number.isInteger(x)) ids.add(x);
    }
  }
  return ids;
}

function union_of(a: Set<number>, b: Set<number>): Set<number> {
  return new Set([...a, ...b]);
}

/**
 * build_point_id_index()
 * ----------------
 * 用途：把每个物体的点元数据（points_info.json）转成成员查询用的整数集合，
 * 并额外汇总一份跨物体的 _union。
 * 纯函数；元数据来自人工编写，任何不合规的层级都被静默忽略。
 */
export function build_point_id_index(points_info_by_object: Record<string, unknown>): PointIndex {
  const objects: Record<string, PointKindSets> = {};
  const union = empty_sets();

  for (const [obj, info] of Object.entries(points_info_by_object)) {
    const parsed = PointsInfoSchema.safeParse(info);
    const contact = parsed.success ? collect_ids(parsed.data.contact_points) : new Set<number>();
    const functional = parsed.success ? collect_ids(parsed.data.functional_points) : new Set<number>();

    contact.forEach((id) => union.contact_point.add(id));
    functional.forEach((id) => union.functional_point.add(id));

    objects[obj] = {
      contact_point: contact,
      functional_point: functional,
      any_point: union_of(contact, functional),
    };
  }

  union.any_point = union_of(union.contact_point, union.functional_point);
  return { objects, [UNION_KEY]: union };
}

/** 空索引：不做任何点 id 成员检查 */
export function empty_point_index(): PointIndex {
  return { objects: {}, [UNION_KEY]: empty_sets() };
}

/** 按物体名查找（只认自有属性，避免原型链上的键） */
export function lookup_object(index: PointIndex, name: string): PointKindSets | undefined {
  return Object.prototype.hasOwnProperty.call(index.objects, name) ? index.objects[name] : undefined;
}

/** frame → 期望的点种类；WORLD 不约束种类 */
export function expected_kind_for(frame: Frame): PointKind | null {
  switch (frame) {
    case 'CONTACT':
      return 'contact_point';
    case 'FUNCTIONAL':
      return 'functional_point';
    case 'WORLD':
      return null;
  }
}
