import { Command } from "commander";
import { runRewriteCommand } from "./run-rewrite";
import type { CliIO } from "./run-rewrite";

export function createProgram(io: CliIO, onExit: (code: number) => void): Command {
  const program = new Command();

  program
    .name("fstring-rewrite")
    .description("将指定行范围内的百分号格式化改写为 f-string，只输出这些行")
    .version("1.0.0")
    .argument("[firstLine]", "起始行，1 起，包含")
    .argument("[lastLine]", "结束行，包含；两个行号都省略时处理整个文件")
    .option("-i, --input <file>", "从文件读取源码（默认读取标准输入）")
    .option("-r, --report", "在标准错误输出中列出每处格式化的处理结果")
    .option("--no-numeric", "不改写 %d %x %.2f 等数值占位符")
    .option("--no-quote-swap", "参数含有同样的引号时不切换引号风格")
    .action(
      async (
        firstLine: string | undefined,
        lastLine: string | undefined,
        cmdOptions: {
          input?: string;
          report?: boolean;
          numeric: boolean;
          quoteSwap: boolean;
        }
      ) => {
        const code = await runRewriteCommand(
          {
            firstLine,
            lastLine,
            input: cmdOptions.input,
            report: cmdOptions.report,
            numeric: cmdOptions.numeric,
            quoteSwap: cmdOptions.quoteSwap,
          },
          io
        );
        onExit(code);
      }
    );

  return program;
}
