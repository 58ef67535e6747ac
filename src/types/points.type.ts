/** 点的种类 */
export type PointKind = 'contact_point' | 'functional_point';

/** 单个物体（或全体并集）的点 id 集合 */
export interface PointKindSets {
  contact_point: Set<number>;
  functional_point: Set<number>;
  /** contact ∪ functional */
  any_point: Set<number>;
}

/**
 * 点索引：每次校验前构建一次，校验期间只读。
 * - objects：按物体名做键
 * - _union：所有物体的并集（低置信度兜底层）
 */
export interface PointIndex {
  objects: Record<string, PointKindSets>;
  _union: PointKindSets;
}
