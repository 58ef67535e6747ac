import { access, appendFile, mkdir, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";

/** 生成一个“写入器”：接收字符串和文件名，落到 baseDir 下；非空内容保证末尾换行 */
export function create_folder_writer(baseDir: string) {
  return async (content: string, filename: string): Promise<string> => {
    const target = join(baseDir, filename);
    await mkdir(dirname(target), { recursive: true });

    const text = content === "" || content.endsWith("\n") ? content : content + "\n";
    await writeFile(target, text, "utf8");
    return target;
  };
}

/** JSON 文本：spaces=0 时压缩为单行 */
export function to_json_text(value: unknown, spaces = 2): string {
  return JSON.stringify(value, null, spaces > 0 ? spaces : undefined);
}

export async function file_exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch (err: unknown) {
    if (is_errno(err) && err.code === "ENOENT") return false;
    throw err;
  }
}

/** 追加写入（目录不存在时先创建） */
export async function append_text(path: string, content: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await appendFile(path, content, "utf8");
}

export function is_errno(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}
