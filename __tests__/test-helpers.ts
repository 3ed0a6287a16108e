/**
 * 测试辅助工具
 */
import type { CliIO } from "../src/cli/run-rewrite";

/**
 * 由多行拼出源码，末尾带换行
 */
export function source(...lines: string[]): string {
  return lines.join("\n") + "\n";
}

/**
 * 内存中的 CLI 输入输出
 */
export function createMemoryIO(
  stdin: string,
  files: Record<string, string> = {}
): { io: CliIO; out: string[]; err: string[] } {
  const out: string[] = [];
  const err: string[] = [];
  const io: CliIO = {
    readStdin: async () => stdin,
    readFile: async (filePath) => {
      const content = files[filePath];
      if (content === undefined) {
        throw new Error(`ENOENT: no such file or directory, open '${filePath}'`);
      }
      return content;
    },
    writeOut: (text) => {
      out.push(text);
    },
    writeErr: (text) => {
      err.push(text);
    },
  };
  return { io, out, err };
}
