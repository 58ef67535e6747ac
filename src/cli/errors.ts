import { is_errno } from "../utils/fs.util";

/** JSON 文件内容不合法 */
export class InvalidJsonError extends Error {
  constructor(readonly path: string, detail: string) {
    super(`Invalid JSON in ${path}: ${detail}`);
    this.name = "InvalidJsonError";
  }
}

/** 选项文件结构不合法 */
export class InvalidOptionsError extends Error {
  constructor(readonly path: string, readonly problems: string[]) {
    super(`Invalid options in ${path}`);
    this.name = "InvalidOptionsError";
  }
}

/** CLI 层的 IO/输入错误统一输出一行并返回退出码 1 */
export function report_failure(err: unknown): number {
  if (err instanceof InvalidJsonError) {
    console.error(`❌ ${err.message}`);
  } else if (err instanceof InvalidOptionsError) {
    console.error(`❌ ${err.message}:`);
    for (const p of err.problems) console.error(`  - ${p}`);
  } else if (is_errno(err) && err.code === "ENOENT") {
    console.error(`❌ Not found: ${err.path ?? "(unknown path)"}`);
  } else {
    console.error(`💥 Unexpected error: ${err instanceof Error ? err.message : String(err)}`);
  }
  return 1;
}
