import { deep_copy, has_own, set_own } from '../utils/canonical.util';

/** 输出步骤中已知字段的固定顺序；其余字段按原始顺序排在后面 */
const STEP_KEY_ORDER = [
  'subtask',
  'frame',
  'actor_obj',
  'target_obj',
  'actor_point',
  'target_point',
  'V',
  'M',
  'notes',
] as const;

/**
 * 净化步骤的构建器。
 * 原始步骤只读；各阶段通过 put/drop 记录修正，build() 时逐字段合成新记录：
 * 有修正取修正值，否则取原值的深拷贝，原本不存在的键不会凭空出现。
 */
export class StepBuilder {
  private readonly corrected = new Map<string, unknown>();
  private readonly dropped = new Set<string>();

  constructor(private readonly raw: Readonly<Record<string, unknown>>) {}

  put(key: string, value: unknown): void {
    this.corrected.set(key, value);
    this.dropped.delete(key);
  }

  drop(key: string): void {
    this.dropped.add(key);
    this.corrected.delete(key);
  }

  build(): Record<string, unknown> {
    const out: Record<string, unknown> = {};
    const keys = new Set<string>([
      ...STEP_KEY_ORDER,
      ...Object.keys(this.raw),
      ...this.corrected.keys(),
    ]);
    for (const key of keys) {
      if (this.dropped.has(key)) continue;
      if (this.corrected.has(key)) {
        set_own(out, key, this.corrected.get(key));
      } else if (has_own(this.raw, key)) {
        set_own(out, key, deep_copy(this.raw[key]));
      }
    }
    return out;
  }
}
