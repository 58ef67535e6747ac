import { readdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import { parse_validate_options } from "../schema";
import type { ValidateOptions } from "../types";
import { file_exists } from "../utils/fs.util";
import { InvalidJsonError, InvalidOptionsError } from "./errors";

/** 每个物体目录下的点元数据文件名 */
export const POINTS_INFO_FILE = "points_info.json";

export async function read_json_file(path: string): Promise<unknown> {
  const text = await readFile(path, "utf8");
  try {
    return JSON.parse(text);
  } catch (e: unknown) {
    throw new InvalidJsonError(path, e instanceof Error ? e.message : String(e));
  }
}

/** 读取 --config 指定的选项文件，并用 zod 校验 */
export async function load_options_file(path: string): Promise<ValidateOptions> {
  const parsed = parse_validate_options(await read_json_file(path));
  if (!parsed.success) {
    throw new InvalidOptionsError(
      path,
      parsed.error.issues.map((e) => `/${e.path.join("/")}: ${e.message}`)
    );
  }
  return parsed.data;
}

/** objects_dir 下所有带 points_info.json 的子目录名（字典序） */
export async function discover_objects(objects_dir: string): Promise<string[]> {
  const entries = await readdir(objects_dir, { withFileTypes: true });
  const names: string[] = [];
  for (const e of entries) {
    if (e.isDirectory() && (await file_exists(join(objects_dir, e.name, POINTS_INFO_FILE)))) {
      names.push(e.name);
    }
  }
  return names.sort();
}

export interface LoadedPoints {
  points_info_by_object: Record<string, unknown>;
  /** 指定了但没有元数据文件的物体 */
  missing: string[];
}

/**
 * 读取 <objects_dir>/<name>/points_info.json。
 * 缺失的物体记入 missing 而不是报错；JSON 语法错误仍然抛出 InvalidJsonError。
 */
export async function load_points_info(objects_dir: string, names?: string[]): Promise<LoadedPoints> {
  const wanted = names ?? (await discover_objects(objects_dir));
  const points_info_by_object: Record<string, unknown> = {};
  const missing: string[] = [];

  for (const raw_name of wanted) {
    const name = clean_name(raw_name);
    const path = join(objects_dir, name, POINTS_INFO_FILE);
    if (!(await file_exists(path))) {
      missing.push(name);
      continue;
    }
    points_info_by_object[name] = await read_json_file(path);
  }
  return { points_info_by_object, missing };
}

/** 去掉物体名两侧的空白与引号 */
export function clean_name(name: string): string {
  return name.trim().replace(/^["']+|["']+$/g, "");
}
