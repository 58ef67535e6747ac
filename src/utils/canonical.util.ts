import { createHash } from "crypto";

/** 普通对象（非数组、非 null） */
export function is_record(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function has_own(obj: Record<string, unknown>, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(obj, key);
}

/**
 * 写入自有数据属性。
 * JSON.parse 会产生名为 "__proto__" 的自有键，直接赋值会改写原型而丢失数据。
 */
export function set_own(obj: Record<string, unknown>, key: string, value: unknown): void {
  Object.defineProperty(obj, key, { value, writable: true, enumerable: true, configurable: true });
}

/**
 * JSON 语义下的深拷贝：数组与普通对象递归复制，其余值原样返回。
 * 与 JSON 往返不同，NaN / Infinity 会被保留，交给校验去发现。
 */
export function deep_copy<T>(v: T): T;
export function deep_copy(v: unknown): unknown {
  if (Array.isArray(v)) return v.map(deep_copy);

  if (is_record(v)) {
    const out: Record<string, unknown> = {};
    for (const k of Object.keys(v)) set_own(out, k, deep_copy(v[k]));
    return out;
  }

  return v;
}

/**
 * 将输入对象转化为“规范化”的字符串：
 * - 删除所有 null / undefined 值
 * - 深度排序对象的 key
 * - 使用 JSON.stringify 序列化
 *
 * 语义相同的计划（无关 key 顺序、无关 null 值）会得到完全一致的字符串，
 * 用于生成 plan_id。
 */
export function canonical_stringify(input: unknown): string {
  return JSON.stringify(sort_deep(strip_nulls(input)));
}

/**
 * 计算输入字符串的 SHA-256 哈希值，并返回带前缀的十六进制表示。
 *
 * 示例：
 *   hash_sha256("hello")
 *   => "sha256:2cf24dba5...9ca5"
 */
export function hash_sha256(text: string): string {
  const h = createHash("sha256").update(text, "utf8").digest("hex");
  return `sha256:${h}`;
}

function strip_nulls(v: unknown): unknown {
  if (Array.isArray(v)) return v.map(strip_nulls);

  if (is_record(v)) {
    const out: Record<string, unknown> = {};
    for (const k of Object.keys(v)) {
      const val = v[k];
      if (val === null || typeof val === "undefined") continue;
      set_own(out, k, strip_nulls(val));
    }
    return out;
  }

  return v;
}

function sort_deep(v: unknown): unknown {
  if (Array.isArray(v)) return v.map(sort_deep);

  if (is_record(v)) {
    const out: Record<string, unknown> = {};
    for (const k of Object.keys(v).sort()) {
      set_own(out, k, sort_deep(v[k]));
    }
    return out;
  }

  return v;
}
