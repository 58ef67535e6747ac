/**
 * 把任务名转成安全的文件名片段：
 * 空白折叠为 "_"，只保留字母（含非拉丁文字）、数字、"_" 与 "-"。
 */
export function safe_filename(name: string): string {
  return name
    .trim()
    .replace(/\s+/g, "_")
    .replace(/[^\p{L}\p{N}_-]+/gu, "");
}

/** 文件名前缀：任务名清洗后为空时退回 "plan" */
export function task_slug(name: string): string {
  return safe_filename(name) || "plan";
}
