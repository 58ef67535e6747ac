import type { Vec6 } from '../types';
import { NONZERO_EPS } from './constants';

/** 逐分量映射，保持 6 元组类型 */
export function map6(v: Vec6, fn: (x: number, k: number) => number): Vec6 {
  return [fn(v[0], 0), fn(v[1], 1), fn(v[2], 2), fn(v[3], 3), fn(v[4], 4), fn(v[5], 5)];
}

export function is_nonzero(x: number): boolean {
  return Math.abs(x) > NONZERO_EPS;
}

export function count_nonzero(v: Vec6): number {
  return v.filter(is_nonzero).length;
}

export function is_zero_vec(v: Vec6): boolean {
  return count_nonzero(v) === 0;
}

export function clamp(x: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(hi, x));
}

/** 对称截断到 [-limit, limit] */
export function clamp_vec(v: Vec6, limit: number): Vec6 {
  return map6(v, (x) => clamp(x, -limit, limit));
}

/** V 与 M 同时非零的轴下标 */
export function vm_violations(V: Vec6, M: Vec6): number[] {
  const out: number[] = [];
  for (let k = 0; k < 6; k++) {
    if (is_nonzero(V[k]) && is_nonzero(M[k])) out.push(k);
  }
  return out;
}
