/** 测试共用的最小步骤/计划构造器 */

/** 一条零告警的合法步骤：WORLD 下沿 +z 移动 */
export function step(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    subtask: 'move_by_displacement',
    frame: 'WORLD',
    actor_obj: null,
    target_obj: null,
    actor_point: null,
    target_point: null,
    V: [0, 0, 1, 0, 0, 0],
    M: [0, 0, 0, 0, 0, 0],
    ...overrides,
  };
}

export function plan_of(...steps: unknown[]): { task: string; sequence: unknown[] } {
  return { task: 'demo task', sequence: steps };
}

export const ZERO6 = [0, 0, 0, 0, 0, 0];

/** wrench：contact {0,1,2} / functional {0,1,2}；bolt：contact {0} / functional 无 */
export const POINTS_INFO = {
  wrench: {
    contact_points: [{ id: 0 }, { id: [1, 2] }],
    functional_points: [{ id: [0, 1, 2] }],
  },
  bolt: {
    contact_points: [{ id: 0 }],
    functional_points: [],
  },
};

/** 只取 level/code/path，便于整体断言顺序 */
export function brief(issues: ReadonlyArray<{ level: string; code: string; path: string }>) {
  return issues.map(({ level, code, path }) => ({ level, code, path }));
}
