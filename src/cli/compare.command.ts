import { basename, dirname, resolve } from "node:path";
import { compare_raw_validated, to_csv, to_markdown } from "../report";
import { create_folder_writer } from "../utils/fs.util";
import { read_json_file } from "./load";
import { report_failure } from "./errors";

export type CompareCliOptions = {
  /** 同时把摘要写成 CSV */
  csv?: string;
};

/**
 * tpv compare <raw.json> <validated.json>
 * 打印原始/净化计划的差异摘要（markdown 表格，可直接贴进文档）。
 */
export async function run_compare(raw_file: string, validated_file: string, opts: CompareCliOptions): Promise<number> {
  try {
    const raw = await read_json_file(resolve(raw_file));
    const validated = await read_json_file(resolve(validated_file));
    const summary = compare_raw_validated(raw, validated);

    console.log("=== Validator Before/After Summary ===");
    console.log(to_markdown(summary));

    if (opts.csv) {
      const target = resolve(opts.csv);
      const write = create_folder_writer(dirname(target));
      const saved = await write(to_csv([summary]), basename(target));
      console.log(`\nSaved: ${saved}`);
    }
    return 0;
  } catch (err: unknown) {
    return report_failure(err);
  }
}
