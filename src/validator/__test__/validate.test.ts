/**
 * validate_plan() 的端到端场景
 *
 * - 结构性短路：plan 非对象 / sequence 缺失 / 空 sequence
 * - 典型修复场景（frame 强制、点 id 解析、VM 互斥、全零补全、点 id 越界）
 * - 结果性质：幂等、VM 互斥、截断上界、ok 与 ERROR 的等价关系
 */
import { describe, it, expect } from 'vitest';

import { validate_plan, errors_of, warnings_of, resolve_options, build_point_id_index, empty_point_index, CORRECTION_CODES } from '../index';
import { parse_plan } from '../../schema';
import { is_record } from '../../utils/canonical.util';
import { read_vec6 } from '../normalize';
import sample_plan, { points_info as sample_points } from '../../cli/sample/tighten-bolt';
import { POINTS_INFO, ZERO6, brief, plan_of, step } from './fixtures';

const no_points = empty_point_index();

describe('validate_plan: structural checks', () => {
	it('rejects a non-object plan with PLAN_NOT_OBJECT and an empty sanitized record', () => {
		for (const bad of ['nope', null, [1, 2], 42]) {
			const res = validate_plan(bad, no_points);
			expect(res.ok).toBe(false);
			expect(brief(res.issues)).toEqual([{ level: 'ERROR', code: 'PLAN_NOT_OBJECT', path: '' }]);
			expect(res.sanitized).toEqual({});
		}
	});

	it('short-circuits with NO_SEQUENCE when sequence is not a list', () => {
		const res = validate_plan({ task: 't', sequence: { 0: step() } }, no_points);
		expect(res.ok).toBe(false);
		expect(brief(res.issues)).toEqual([{ level: 'ERROR', code: 'NO_SEQUENCE', path: '/sequence' }]);
		expect(res.sanitized).toEqual({ task: 't', sequence: { 0: step() } });
	});

	// 场景 E：空 sequence
	it('short-circuits with exactly one EMPTY_SEQUENCE error and leaves the plan as is', () => {
		const plan = { task: 'noop', sequence: [] };
		const res = validate_plan(plan, no_points);
		expect(res.ok).toBe(false);
		expect(errors_of(res).map((i) => i.code)).toEqual(['EMPTY_SEQUENCE']);
		expect(res.issues).toHaveLength(1);
		expect(res.sanitized).toEqual({ task: 'noop', sequence: [] });
		expect(res.sanitized).not.toBe(plan);
	});

	it('warns about a missing task but keeps validating', () => {
		const res = validate_plan({ sequence: [step()] }, no_points);
		expect(res.ok).toBe(true);
		expect(brief(res.issues)).toEqual([{ level: 'WARN', code: 'MISSING_TASK', path: '/task' }]);
	});

	it('warns when the sequence is longer than max_steps', () => {
		const steps = Array.from({ length: 9 }, () => step());
		const res = validate_plan(plan_of(...steps), no_points);
		expect(res.ok).toBe(true);
		expect(res.issues).toHaveLength(1);
		expect(res.issues[0]).toMatchObject({
			level: 'WARN',
			code: 'TOO_MANY_STEPS',
			message: 'Sequence has 9 steps; recommended <= 8.',
		});

		const relaxed = validate_plan(plan_of(...steps), no_points, { max_steps: 9 });
		expect(relaxed.issues).toEqual([]);
	});

	it('records STEP_NOT_OBJECT and still evaluates the remaining steps', () => {
		const res = validate_plan(plan_of('oops', step({ frame: 'BASE' })), no_points);
		expect(res.ok).toBe(false);
		expect(brief(res.issues)).toEqual([
			{ level: 'ERROR', code: 'STEP_NOT_OBJECT', path: '/sequence/0' },
			{ level: 'ERROR', code: 'BAD_FRAME', path: '/sequence/1/frame' },
		]);
		const seq = res.sanitized.sequence;
		expect(Array.isArray(seq) && seq[0]).toBe('oops');
	});

	it('keeps unknown top-level keys and passthrough step keys', () => {
		const res = validate_plan({ task: 't', version: 2, sequence: [step({ notes: 'n', extra: { a: 1 } })] }, no_points);
		expect(res.sanitized).toEqual({
			task: 't',
			version: 2,
			sequence: [{ ...step(), notes: 'n', extra: { a: 1 } }],
		});
	});

	it('keeps own __proto__ keys from parsed JSON as plain data', () => {
		const plan = JSON.parse(
			'{"task":"t","__proto__":{"a":1},"sequence":[{"subtask":"place","frame":"WORLD","actor_point":null,"target_point":null,"V":[0,0,1,0,0,0],"M":[0,0,0,0,0,0],"__proto__":{"b":2}}]}'
		);
		const res = validate_plan(plan, no_points);
		expect(res.issues).toEqual([]);
		expect(Object.keys(res.sanitized)).toEqual(['task', '__proto__', 'sequence']);
		expect(Object.getPrototypeOf(res.sanitized)).toBe(Object.prototype);
		expect(Object.getOwnPropertyDescriptor(res.sanitized, '__proto__')?.value).toEqual({ a: 1 });

		const seq = res.sanitized.sequence;
		const first: unknown = Array.isArray(seq) ? seq[0] : undefined;
		expect(is_record(first) && Object.keys(first)).toEqual([
			'subtask',
			'frame',
			'actor_point',
			'target_point',
			'V',
			'M',
			'__proto__',
		]);
		expect(is_record(first) && Object.getOwnPropertyDescriptor(first, '__proto__')?.value).toEqual({ b: 2 });
	});

	it('never mutates the caller plan', () => {
		const plan = plan_of(
			{ subtask: ' Grasp ', frame: 'world', actor_point: '3', V: [9, 0, 0, 0, 0, 0], M: [80, 0, 0, 0, 0, 0] },
			step({ subtask: 'place', V: ZERO6 })
		);
		const before = JSON.parse(JSON.stringify(plan));
		const res = validate_plan(plan, no_points);
		expect(plan).toEqual(before);

		// 修改净化结果也不会影响输入
		const seq = res.sanitized.sequence;
		if (Array.isArray(seq)) seq.length = 0;
		expect(plan).toEqual(before);
	});
});

describe('validate_plan: repair scenarios', () => {
	// 场景 A
	it('normalizes a grasp step: subtask, hard frame, parsed point id, zero step kept', () => {
		const res = validate_plan(
			plan_of({
				subtask: 'Grasp',
				frame: 'world',
				V: ZERO6,
				M: ZERO6,
				actor_point: 'contact_point_2',
				target_point: null,
			}),
			no_points
		);

		expect(res.ok).toBe(true);
		expect(brief(res.issues)).toEqual([
			{ level: 'WARN', code: 'POINT_PARSED', path: '/sequence/0/actor_point' },
			{ level: 'WARN', code: 'ZERO_STEP', path: '/sequence/0' },
			{ level: 'WARN', code: 'FRAME_HARD_FIXED', path: '/sequence/0/frame' },
		]);
		expect(res.issues[2].message).toBe("Auto-fixed frame: WORLD -> CONTACT for 'grasp'.");
		expect(res.sanitized.sequence).toEqual([
			{
				subtask: 'grasp',
				frame: 'CONTACT',
				actor_point: 2,
				target_point: null,
				V: [0, 0, 0, 0, 0, 0],
				M: [0, 0, 0, 0, 0, 0],
			},
		]);
	});

	// 场景 B
	it('zeroes M on the violated axis and records one VM_RULE_FIXED', () => {
		const res = validate_plan(plan_of(step({ V: [1, 0, 0, 0, 0, 0], M: [5, 0, 0, 0, 0, 0] })), no_points);
		expect(res.ok).toBe(true);
		expect(res.issues).toEqual([
			{ level: 'WARN', code: 'VM_RULE_FIXED', path: '/sequence/0', message: 'Auto-fixed: zeroed M at indices [0].' },
		]);
		expect(res.sanitized.sequence).toEqual([step({ V: [1, 0, 0, 0, 0, 0], M: [0, 0, 0, 0, 0, 0] })]);
	});

	// 场景 C
	it('reports VM_RULE_VIOLATION and leaves M untouched without auto-fix', () => {
		const res = validate_plan(plan_of(step({ V: [1, 0, 0, 0, 0, 0], M: [5, 0, 0, 0, 0, 0] })), no_points, {
			auto_fix: false,
		});
		expect(res.ok).toBe(false);
		expect(brief(res.issues)).toEqual([{ level: 'ERROR', code: 'VM_RULE_VIOLATION', path: '/sequence/0' }]);
		expect(res.issues[0].message).toBe('Rule violated at indices [0]: V and M both non-zero.');
		expect(res.sanitized.sequence).toEqual([step({ V: [1, 0, 0, 0, 0, 0], M: [5, 0, 0, 0, 0, 0] })]);
	});

	// 场景 D
	it('fills an all-zero place step with a default +z approach', () => {
		const res = validate_plan(plan_of(step({ subtask: 'place', V: ZERO6, M: ZERO6 })), no_points);
		expect(res.ok).toBe(true);
		expect(res.issues).toEqual([
			{
				level: 'WARN',
				code: 'ZERO_STEP_FILLED',
				path: '/sequence/0',
				message: 'Filled all-zero step with default approach Vz=+1.0 in frame=WORLD.',
			},
		]);
		expect(res.sanitized.sequence).toEqual([step({ subtask: 'place', V: [0, 0, 1, 0, 0, 0], M: ZERO6 })]);
	});

	// 场景 F
	it('rejects a functional point id that the object does not declare', () => {
		const index = build_point_id_index({ wrench: { contact_points: [{ id: 0 }], functional_points: [{ id: [0, 1, 2] }] } });
		const res = validate_plan(
			plan_of(step({ subtask: 'rotate', frame: 'FUNCTIONAL', actor_obj: 'wrench', actor_point: 7, V: [0, 0, 0, 0, 0, 1] })),
			index
		);
		expect(res.ok).toBe(false);
		expect(res.issues).toEqual([
			{
				level: 'ERROR',
				code: 'POINT_ID_INVALID_FOR_OBJECT',
				path: '/sequence/0/actor_point',
				message: 'actor_point=7 not in wrench.functional_point ids.',
			},
		]);
	});

	it('walks the sample plan and reports issues in step order', () => {
		const res = validate_plan(sample_plan, build_point_id_index(sample_points));
		expect(res.ok).toBe(true);
		expect(brief(res.issues)).toEqual([
			{ level: 'WARN', code: 'POINT_PARSED', path: '/sequence/0/actor_point' },
			{ level: 'WARN', code: 'ZERO_STEP', path: '/sequence/0' },
			{ level: 'WARN', code: 'FRAME_HARD_FIXED', path: '/sequence/0/frame' },
			{ level: 'WARN', code: 'ZERO_STEP_FILLED', path: '/sequence/1' },
			{ level: 'WARN', code: 'VM_RULE_FIXED', path: '/sequence/2' },
			{ level: 'WARN', code: 'ZERO_STEP', path: '/sequence/3' },
		]);
		expect(warnings_of(res)).toHaveLength(6);

		const seq = res.sanitized.sequence;
		expect(Array.isArray(seq) && seq[2]).toEqual({
			subtask: 'rotate',
			frame: 'FUNCTIONAL',
			actor_obj: 'wrench',
			target_obj: 'bolt',
			actor_point: 0,
			target_point: 1,
			V: [0, 0, 0, 0, 0, 3],
			M: [0, 0, -5, 0, 0, 0],
			notes: 'tighten',
		});

		const typed = parse_plan(res.sanitized);
		expect(typed.success).toBe(true);
		if (typed.success) {
			expect(typed.data.sequence.map((s) => s.frame)).toEqual(['CONTACT', 'WORLD', 'FUNCTIONAL', 'CONTACT']);
		}
	});
});

describe('validate_plan: options', () => {
	it('fills defaults for omitted and undefined options', () => {
		expect(resolve_options({ auto_fix: undefined, max_abs_v: 1 })).toEqual({
			auto_fix: true,
			strict_subtasks: false,
			max_abs_v: 1,
			max_abs_m: 50,
			max_steps: 8,
		});
	});

	it('promotes unknown subtasks to SUBTASK_NOT_ALLOWED in strict mode', () => {
		const lenient = validate_plan(plan_of(step({ subtask: 'Wiggle' })), no_points);
		expect(lenient.ok).toBe(true);
		expect(lenient.issues).toEqual([
			{
				level: 'WARN',
				code: 'UNKNOWN_SUBTASK',
				path: '/sequence/0/subtask',
				message: "Subtask 'wiggle' not in allowed set (will continue).",
			},
		]);

		const strict = validate_plan(plan_of(step({ subtask: 'Wiggle' })), no_points, { strict_subtasks: true });
		expect(strict.ok).toBe(false);
		expect(brief(strict.issues)).toEqual([{ level: 'ERROR', code: 'SUBTASK_NOT_ALLOWED', path: '/sequence/0/subtask' }]);
	});
});

/** 一组带各种毛病的计划，用来检查结果性质 */
function messy_plans(): unknown[] {
	return [
		sample_plan,
		plan_of(
			step({ V: [9, -9, 0, 0, 0, 0], M: [70, 0, -70, 0, 0, 0] }),
			step({ subtask: 'Move To Pose', frame: 'contact', V: ZERO6, M: ZERO6, actor_point: 'point_9' }),
			step({ subtask: 'rotate', frame: 'CONTACT', actor_obj: 'wrench', actor_point: 1, V: [0, 0, 0, 2.5, 2.5, 2.5], M: [0, 0, 3, 1, 0, 0] })
		),
		plan_of(
			step({ subtask: 'release', V: ZERO6 }),
			step({ actor: 'bolt', target: 7, V: [0, 0, 0, 0, 0, 0.5], M: [1e-12, 0, 0, 0, 0, 4] }),
			step({ subtask: 'grasp', frame: 'FUNCTIONAL', actor_obj: 'bolt', actor_point: 0 })
		),
		plan_of(step({ V: [1, 2, 3] }), step({ frame: 'BASE', actor_point: 'left' }), 17),
	];
}

describe('validate_plan: result properties', () => {
	const index = build_point_id_index(POINTS_INFO);

	it('is idempotent on its own auto-fixed output', () => {
		for (const plan of messy_plans()) {
			const first = validate_plan(plan, index);
			if (!first.ok) continue;
			const second = validate_plan(first.sanitized, index);
			expect(second.ok).toBe(true);
			expect(second.sanitized).toEqual(first.sanitized);
			expect(second.issues.filter((i) => CORRECTION_CODES.has(i.code))).toEqual([]);
			expect(second.issues.every((i) => first.issues.some((j) => j.code === i.code && j.path === i.path))).toBe(true);
		}
	});

	it('keeps V and M mutually exclusive and within the clamp bounds', () => {
		for (const plan of messy_plans()) {
			const res = validate_plan(plan, index);
			const seq = res.sanitized.sequence;
			if (!Array.isArray(seq)) continue;
			for (const s of seq) {
				if (!is_record(s)) continue;
				const V = read_vec6(s.V);
				const M = read_vec6(s.M);
				if (V === null || M === null) continue;
				for (let k = 0; k < 6; k++) {
					expect(V[k] !== 0 && M[k] !== 0).toBe(false);
					expect(Math.abs(V[k])).toBeLessThanOrEqual(3);
					expect(Math.abs(M[k])).toBeLessThanOrEqual(50);
				}
			}
		}
	});

	it('reports ok=false exactly when an ERROR was recorded', () => {
		for (const plan of messy_plans()) {
			for (const auto_fix of [true, false]) {
				const res = validate_plan(plan, index, { auto_fix });
				expect(res.ok).toBe(errors_of(res).length === 0);
			}
		}
	});
});
