/**
 * 源码文档
 * 预计算每行的起止偏移，提供行号与偏移之间的换算，避免重复分割字符串
 */
import { LineRangeError, createRewriteError } from "./error-handler";

export interface SourcePosition {
  /** 1 起的行号 */
  line: number;
  /** 1 起的列号 */
  column: number;
}

const LINE_TERMINATOR = /\r\n|\n|\r/g;

export class SourceDocument {
  readonly text: string;
  // 第 i 行（0 起）的起始偏移
  private readonly lineStarts: number[];
  // 第 i 行内容结束（换行符之前）的偏移
  private readonly contentEnds: number[];

  constructor(text: string) {
    this.text = text;
    this.lineStarts = [];
    this.contentEnds = [];

    let lineStart = 0;
    for (const match of text.matchAll(LINE_TERMINATOR)) {
      const index = match.index ?? 0;
      this.lineStarts.push(lineStart);
      this.contentEnds.push(index);
      lineStart = index + match[0].length;
    }
    // 最后一行没有换行符
    if (lineStart < text.length) {
      this.lineStarts.push(lineStart);
      this.contentEnds.push(text.length);
    }
  }

  get lineCount(): number {
    return this.lineStarts.length;
  }

  /**
   * 行起始偏移
   */
  lineStart(line: number): number {
    this.assertLine(line);
    return this.lineStarts[line - 1];
  }

  /**
   * 行结束偏移（包含换行符）
   */
  lineEnd(line: number): number {
    this.assertLine(line);
    return line < this.lineCount ? this.lineStarts[line] : this.text.length;
  }

  /**
   * 不含换行符的行内容
   */
  lineText(line: number): string {
    this.assertLine(line);
    return this.text.slice(this.lineStarts[line - 1], this.contentEnds[line - 1]);
  }

  /**
   * 偏移所在的行号，二分查找
   */
  lineAt(offset: number): number {
    if (this.lineCount === 0) return 1;
    let low = 0;
    let high = this.lineCount - 1;
    while (low < high) {
      const mid = (low + high + 1) >> 1;
      if (this.lineStarts[mid] <= offset) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }
    return low + 1;
  }

  positionAt(offset: number): SourcePosition {
    const line = this.lineAt(offset);
    const start = this.lineCount === 0 ? 0 : this.lineStarts[line - 1];
    return { line, column: offset - start + 1 };
  }

  /**
   * 校验行范围，不合法时抛出 LineRangeError
   */
  assertRange(firstLine: number, lastLine: number): void {
    if (
      !Number.isInteger(firstLine) ||
      !Number.isInteger(lastLine) ||
      firstLine < 1 ||
      firstLine > lastLine
    ) {
      throw new LineRangeError(
        createRewriteError("RANGE001", [`${firstLine}-${lastLine}`])
      );
    }
    if (lastLine > this.lineCount) {
      throw new LineRangeError(
        createRewriteError("RANGE002", [
          `${firstLine}-${lastLine}`,
          String(this.lineCount),
        ])
      );
    }
  }

  /**
   * 行范围对应的偏移区间，末行包含换行符
   */
  rangeOffsets(firstLine: number, lastLine: number): { start: number; end: number } {
    this.assertRange(firstLine, lastLine);
    return { start: this.lineStart(firstLine), end: this.lineEnd(lastLine) };
  }

  private assertLine(line: number): void {
    if (!Number.isInteger(line) || line < 1 || line > this.lineCount) {
      throw new LineRangeError(
        createRewriteError("RANGE002", [String(line), String(this.lineCount)])
      );
    }
  }
}
