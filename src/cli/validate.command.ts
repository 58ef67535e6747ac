import { basename, dirname, extname, resolve } from "node:path";
import { format_issue, NO_ISSUES_TEXT, save_reports } from "../report";
import type { ValidateOptions } from "../types";
import { is_record } from "../utils/canonical.util";
import { create_folder_writer, to_json_text } from "../utils/fs.util";
import { task_slug } from "../utils/slug.util";
import { build_point_id_index, empty_point_index, validate_plan } from "../validator";
import { report_failure } from "./errors";
import { load_options_file, load_points_info, read_json_file } from "./load";

export type ValidateCliOptions = {
  /** 物体元数据根目录（<dir>/<object>/points_info.json） */
  objects?: string;
  /** 只加载这些物体；缺省为 objects 下的全部 */
  object?: string[];
  /** 未在命令行显式给出时为 undefined，交给选项文件/缺省值 */
  autoFix?: boolean;
  strict?: boolean;
  config?: string;
  task?: string;
  out?: string;
  pretty?: string | boolean;
  minify?: boolean;
};

export function to_pretty_spaces(opt: Pick<ValidateCliOptions, "pretty" | "minify">): number {
  if (opt.minify) return 0;
  if (opt.pretty === false) return 0;
  if (opt.pretty === true || opt.pretty === undefined) return 2;
  const n = Number(opt.pretty);
  return Number.isFinite(n) && n >= 0 ? Math.floor(n) : 2;
}

/** 任务名：--task > plan.task > 计划文件名（去扩展名） */
export function resolve_task_name(plan: unknown, plan_path: string, explicit?: string): string {
  if (explicit && explicit.trim()) return explicit.trim();
  if (is_record(plan) && typeof plan.task === "string" && plan.task.trim()) return plan.task.trim();
  return basename(plan_path, extname(plan_path));
}

/**
 * tpv validate <plan.json>
 * 读取计划与物体点元数据 → 校验/净化 → 写出 raw / 净化 JSON 与报告。
 * 返回进程退出码：校验失败或 IO 失败为 1。
 */
export async function run_validate(plan_file: string, opts: ValidateCliOptions): Promise<number> {
  const plan_path = resolve(plan_file);
  const spaces = to_pretty_spaces(opts);

  try {
    console.log(`Reading plan: ${plan_path}`);
    const raw_plan = await read_json_file(plan_path);

    const file_options: ValidateOptions = opts.config ? await load_options_file(resolve(opts.config)) : {};
    const options: ValidateOptions = {
      ...file_options,
      ...(opts.autoFix === undefined ? {} : { auto_fix: opts.autoFix }),
      ...(opts.strict === undefined ? {} : { strict_subtasks: opts.strict }),
    };

    let point_index = empty_point_index();
    if (opts.objects) {
      const loaded = await load_points_info(resolve(opts.objects), opts.object);
      for (const name of loaded.missing) {
        console.log(`⚠️  No points_info.json for object '${name}' (skipped)`);
      }
      const names = Object.keys(loaded.points_info_by_object);
      console.log(`Point metadata: ${names.length ? names.join(", ") : "(none)"}`);
      point_index = build_point_id_index(loaded.points_info_by_object);
    }

    const val = validate_plan(raw_plan, point_index, options);

    const task_name = resolve_task_name(raw_plan, plan_path, opts.task);
    const slug = task_slug(task_name);
    const out_dir = resolve(opts.out ?? dirname(plan_path));
    const write = create_folder_writer(out_dir);

    const raw_out = await write(to_json_text(raw_plan, spaces), `${slug}__raw.json`);
    const validated_out = await write(to_json_text(val.sanitized, spaces), `${slug}.json`);

    if (val.issues.length > 0) {
      console.log("\n[Validator Issues]");
      for (const it of val.issues) console.log(format_issue(it));
    } else {
      console.log(`\n${NO_ISSUES_TEXT}`);
    }

    const reports = await save_reports(task_name, raw_plan, val, out_dir);
    console.log("\n[Saved]");
    for (const [k, v] of Object.entries({ raw_json: raw_out, validated_json: validated_out, ...reports })) {
      console.log(`- ${k}: ${v}`);
    }

    if (!val.ok) {
      const n = val.issues.filter((i) => i.level === "ERROR").length;
      console.error(`❌ Validation failed with ${n} error(s)`);
      return 1;
    }
    console.log(`✅ Plan OK: ${task_name}`);
    return 0;
  } catch (err: unknown) {
    return report_failure(err);
  }
}
