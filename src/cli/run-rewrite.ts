/**
 * 命令行调用契约：读取完整源码，输出改写后的行范围
 */
import { promises as fs } from "fs";
import {
  InputError,
  createRewriteError,
  enhanceError,
  formatErrorForUser,
} from "../core/error-handler";
import { rewriteWithReport } from "../core/rewriter";
import type { RewriteOptions, SiteReport } from "../types";

export interface CliIO {
  /** 读取标准输入的全部内容 */
  readStdin(): Promise<string>;
  readFile(filePath: string): Promise<string>;
  /** 结果输出，原样写出不追加换行 */
  writeOut(text: string): void;
  /** 诊断输出 */
  writeErr(text: string): void;
}

export interface RewriteCommandArgs {
  firstLine?: string;
  lastLine?: string;
  input?: string;
  report?: boolean;
  numeric?: boolean;
  quoteSwap?: boolean;
}

export function createProcessIO(): CliIO {
  return {
    readStdin: async () => {
      const chunks: Buffer[] = [];
      for await (const chunk of process.stdin) {
        chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
      }
      return Buffer.concat(chunks).toString("utf8");
    },
    readFile: (filePath) => fs.readFile(filePath, "utf8"),
    writeOut: (text) => {
      process.stdout.write(text);
    },
    writeErr: (text) => {
      console.error(text);
    },
  };
}

function parseLineNumber(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  if (!/^\d+$/.test(value)) {
    throw new InputError(createRewriteError("INPUT002", [value]));
  }
  return Number(value);
}

export function formatSiteReport(report: SiteReport): string {
  const location = `${report.line}:${report.column}`;
  if (report.status === "converted") {
    return `${location} converted  ${report.originalText} -> ${report.replacement ?? ""}`;
  }
  const detail = report.detail ? ` (${report.detail})` : "";
  return `${location} skipped    ${report.reason ?? "unknown"}${detail}  ${report.originalText}`;
}

/**
 * 执行一次改写，返回进程退出码；失败时不写出任何结果
 */
export async function runRewriteCommand(
  args: RewriteCommandArgs,
  io: CliIO
): Promise<number> {
  try {
    const firstLine = parseLineNumber(args.firstLine);
    const lastLine = parseLineNumber(args.lastLine);

    let source: string;
    try {
      source = args.input ? await io.readFile(args.input) : await io.readStdin();
    } catch (error) {
      throw new InputError(
        createRewriteError("INPUT001", [args.input ?? "<stdin>"], {
          filePath: args.input,
          originalError: error instanceof Error ? error : undefined,
        })
      );
    }

    const options: RewriteOptions = {
      convertNumeric: args.numeric,
      allowQuoteSwap: args.quoteSwap,
    };

    const { output, sites } = rewriteWithReport(source, firstLine, lastLine, options);

    if (args.report) {
      const lines = sites.map(formatSiteReport);
      const converted = sites.filter((site) => site.status === "converted").length;
      lines.push(`${converted}/${sites.length} 处已改写`);
      io.writeErr(lines.join("\n"));
    }

    io.writeOut(output);
    return 0;
  } catch (error) {
    io.writeErr(formatErrorForUser(enhanceError(error, args.input)));
    return 1;
  }
}
