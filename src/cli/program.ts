import { Command } from "commander";
import { run_compare, type CompareCliOptions } from "./compare.command";
import { run_validate, type ValidateCliOptions } from "./validate.command";

export const CLI_NAME = "tpv";
export const CLI_VERSION = "0.1.0";

/** 构造 CLI；各子命令把退出码写回 process.exitCode */
export function create_program(): Command {
  const program = new Command();

  program
    .name(CLI_NAME)
    .description("Validate and sanitize robot manipulation task plans")
    .version(CLI_VERSION);

  program
    .command("validate")
    .description("validate a plan JSON, write the sanitized plan and reports")
    .argument("<plan>", "path to the raw plan JSON")
    .option("--objects <dir>", "directory holding <object>/points_info.json")
    .option("--object <names...>", "objects to load (default: every object under --objects)")
    .option("--no-auto-fix", "report recoverable violations as errors instead of fixing them")
    .option("--strict", "treat unknown subtasks as errors")
    .option("--config <file>", "JSON options file (flags override it)")
    .option("--task <name>", "task name used for output files (default: plan.task)")
    .option("-o, --out <dir>", "output directory (default: the plan's directory)")
    .option("--pretty [n]", "pretty-print JSON with n spaces (default: 2)")
    .option("--minify", "minify JSON (overrides --pretty)", false)
    .action(async (plan: string, opts: ValidateCliOptions, cmd: Command) => {
      // --no-auto-fix 的缺省值恒为 true；只有命令行显式给出时才覆盖选项文件
      const explicit = (key: string) => cmd.getOptionValueSource(key) === "cli";
      process.exitCode = await run_validate(plan, {
        ...opts,
        autoFix: explicit("autoFix") ? opts.autoFix : undefined,
        strict: explicit("strict") ? opts.strict : undefined,
      });
    });

  program
    .command("compare")
    .description("summarize the differences between a raw and a validated plan")
    .argument("<raw>", "raw plan JSON")
    .argument("<validated>", "validated plan JSON")
    .option("--csv <file>", "also write the summary as CSV")
    .action(async (raw: string, validated: string, opts: CompareCliOptions) => {
      process.exitCode = await run_compare(raw, validated, opts);
    });

  return program;
}
