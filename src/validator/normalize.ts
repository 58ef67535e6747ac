import { FrameSchema, SubtaskSchema, Vec6Schema } from '../schema';
import type { Frame, Vec6 } from '../types';
import { has_own } from '../utils/canonical.util';
import { CODE } from './constants';
import type { NormalizedStep, StepContext } from './context';

type ObjectField = 'actor_obj' | 'target_obj';
type PointField = 'actor_point' | 'target_point';

/** 对象名字段的旧写法别名 */
const OBJECT_ALIAS: Record<ObjectField, string> = { actor_obj: 'actor', target_obj: 'target' };

const OBJECT_CODE = {
  actor_obj: CODE.BAD_ACTOR_OBJ,
  target_obj: CODE.BAD_TARGET_OBJ,
} as const;

/** 前缀可选的点 id 写法：3 / "3" / "contact_point_3" / "functional_point_3" / "point_3" */
const POINT_ID_PATTERN = /^(?:contact_point_|functional_point_|point_)?(\d+)$/;

/** "Move To  Pose" → "move_to_pose"；非字符串或空串返回 null */
export function normalize_subtask(x: unknown): string | null {
  if (typeof x !== 'string') return null;
  const s = x.trim().toLowerCase().replace(/\s+/g, '_');
  return s.length > 0 ? s : null;
}

/** " contact " → "CONTACT"；不在合法集合内返回 null */
export function normalize_frame(x: unknown): Frame | null {
  if (typeof x !== 'string') return null;
  const parsed = FrameSchema.safeParse(x.trim().toUpperCase());
  return parsed.success ? parsed.data : null;
}

/** 解析为规范（非负）整数 id；无法解析返回 null */
export function parse_point_id(v: unknown): number | null {
  if (typeof v === 'number') {
    return Number.isSafeInteger(v) && v >= 0 ? v : null;
  }
  if (typeof v !== 'string') return null;
  const m = POINT_ID_PATTERN.exec(v.trim().toLowerCase());
  if (!m) return null;
  const id = Number(m[1]);
  return Number.isSafeInteger(id) ? id : null;
}

/** 恰好 6 个数值才返回向量，否则 null */
export function read_vec6(x: unknown): Vec6 | null {
  const parsed = Vec6Schema.safeParse(x);
  return parsed.success ? parsed.data : null;
}

function read_subtask(raw: Record<string, unknown>, ctx: StepContext): string | null {
  const { path, options, ledger, draft } = ctx;
  const subtask = normalize_subtask(raw.subtask);

  if (subtask === null) {
    ledger.error(CODE.BAD_SUBTASK, `${path}/subtask`, "Missing/invalid 'subtask'.");
    return null;
  }

  if (options.auto_fix) draft.put('subtask', subtask);

  if (!SubtaskSchema.safeParse(subtask).success) {
    if (options.strict_subtasks) {
      ledger.error(CODE.SUBTASK_NOT_ALLOWED, `${path}/subtask`, `Subtask '${subtask}' not allowed.`);
    } else {
      ledger.warn(
        CODE.UNKNOWN_SUBTASK,
        `${path}/subtask`,
        `Subtask '${subtask}' not in allowed set (will continue).`
      );
    }
  }
  return subtask;
}

function read_frame(raw: Record<string, unknown>, ctx: StepContext): Frame | null {
  const frame = normalize_frame(raw.frame);
  if (frame === null) {
    ctx.ledger.error(
      CODE.BAD_FRAME,
      `${ctx.path}/frame`,
      `'frame' must be one of ${FrameSchema.options.join(', ')}.`
    );
    return null;
  }
  if (ctx.options.auto_fix) ctx.draft.put('frame', frame);
  return frame;
}

/**
 * 对象名：字符串或 null。
 * 使用了别名键（actor / target）时，auto_fix 会把它改写为规范键。
 */
function read_object(raw: Record<string, unknown>, field: ObjectField, ctx: StepContext): string | null {
  const { path, options, ledger, draft } = ctx;
  const alias = OBJECT_ALIAS[field];
  const from_alias = !has_own(raw, field) && has_own(raw, alias);
  const value = from_alias ? raw[alias] : raw[field];

  if (from_alias && options.auto_fix) {
    draft.drop(alias);
    draft.put(field, value ?? null);
  }

  if (value === null || value === undefined) return null;
  if (typeof value === 'string') return value;

  ledger.warn(OBJECT_CODE[field], `${path}/${field}`, `'${field}' should be a string or null.`);
  if (options.auto_fix) draft.put(field, null);
  return null;
}

function read_point(raw: Record<string, unknown>, field: PointField, ctx: StepContext): number | null {
  const { path, options, ledger, draft } = ctx;

  if (!has_own(raw, field)) {
    ledger.warn(CODE.MISSING_POINT_KEY, `${path}/${field}`, `Missing '${field}' (allowed to be null).`);
    if (options.auto_fix) draft.put(field, null);
    return null;
  }

  const value = raw[field];
  if (value === null || value === undefined) {
    if (value === undefined && options.auto_fix) draft.put(field, null);
    return null;
  }

  const id = parse_point_id(value);
  if (id === null) {
    ledger.error(
      CODE.POINT_NOT_INT,
      `${path}/${field}`,
      `'${field}' must be a non-negative int or null (got ${JSON.stringify(value)}).`
    );
    return null;
  }

  if (typeof value !== 'number') {
    ledger.warn(CODE.POINT_PARSED, `${path}/${field}`, `Parsed '${field}' ${JSON.stringify(value)} -> int (${id}).`);
    if (options.auto_fix) draft.put(field, id);
  }
  return id;
}

/**
 * normalize_step()
 * ----------------
 * 把一条原始步骤读成 NormalizedStep：分类字段大小写/空白规范化，点 id 统一成整数，
 * V/M 只做形状解析（是否恰好 6 个数值），数值规则留给 enforce_numeric。
 * 问题按 subtask → frame → 对象名 → 点 id 的顺序记账。
 */
export function normalize_step(raw: Record<string, unknown>, ctx: StepContext): NormalizedStep {
  const subtask = read_subtask(raw, ctx);
  const frame = read_frame(raw, ctx);
  const actor_obj = read_object(raw, 'actor_obj', ctx);
  const target_obj = read_object(raw, 'target_obj', ctx);
  const actor_point = read_point(raw, 'actor_point', ctx);
  const target_point = read_point(raw, 'target_point', ctx);

  return {
    subtask,
    frame,
    actor_obj,
    target_obj,
    actor_point,
    target_point,
    V: read_vec6(raw.V),
    M: read_vec6(raw.M),
  };
}
