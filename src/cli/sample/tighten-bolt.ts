// 示例：扳手拧紧螺栓。计划故意带有几处模型常见的小毛病
// （frame 写错、点 id 写成字符串、同轴 V/M 同时非零、全零的 move_to_pose），
// 用来演示自动修复。
export const points_info = {
  wrench: {
    contact_points: [{ id: 0, description: 'handle end' }, { id: [1, 2], description: 'grip' }],
    functional_points: [{ id: 0, description: 'jaw' }],
  },
  bolt: {
    contact_points: [{ id: 0 }],
    functional_points: [{ id: [0, 1], description: 'head' }],
  },
};

export default {
  task: 'Tighten Bolt',
  sequence: [
    {
      subtask: 'Grasp',
      frame: 'world',
      actor_obj: 'wrench',
      target_obj: null,
      actor_point: 'contact_point_1',
      target_point: null,
      V: [0, 0, 0, 0, 0, 0],
      M: [0, 0, 0, 0, 0, 0],
      notes: 'grip the handle',
    },
    {
      subtask: 'move_to_pose',
      frame: 'WORLD',
      actor_obj: 'wrench',
      target_obj: 'bolt',
      actor_point: 0,
      target_point: 1,
      V: [0, 0, 0, 0, 0, 0],
      M: [0, 0, 0, 0, 0, 0],
      notes: 'align over the bolt head',
    },
    {
      subtask: 'rotate',
      frame: 'FUNCTIONAL',
      actor_obj: 'wrench',
      target_obj: 'bolt',
      actor_point: 0,
      target_point: 1,
      V: [0, 0, 0, 0, 0, 4.5],
      M: [0, 0, -5, 0, 0, 2],
      notes: 'tighten',
    },
    {
      subtask: 'release',
      frame: 'CONTACT',
      actor_obj: 'wrench',
      target_obj: null,
      actor_point: 1,
      target_point: null,
      V: [0, 0, 0, 0, 0, 0],
      M: [0, 0, 0, 0, 0, 0],
    },
  ],
};
