import { describe, expect, it } from "vitest";
import { SourceDocument } from "../../src/core/source-document";
import { LineRangeError } from "../../src/core/error-handler";

describe("SourceDocument", () => {
  const document = new SourceDocument("a\nb\r\nc");

  it("should split lines on every terminator style", () => {
    expect(document.lineCount).toBe(3);
    expect(document.lineText(1)).toBe("a");
    expect(document.lineText(2)).toBe("b");
    expect(document.lineText(3)).toBe("c");
  });

  it("should not open an extra line after a final terminator", () => {
    expect(new SourceDocument("a\n").lineCount).toBe(1);
    expect(new SourceDocument("a\n\n").lineCount).toBe(2);
    expect(new SourceDocument("").lineCount).toBe(0);
    expect(new SourceDocument("x\ry").lineCount).toBe(2);
  });

  it("should map offsets to 1-based positions", () => {
    expect(document.lineAt(0)).toBe(1);
    expect(document.lineAt(3)).toBe(2);
    expect(document.lineAt(5)).toBe(3);
    expect(document.positionAt(3)).toEqual({ line: 2, column: 2 });
    expect(document.positionAt(5)).toEqual({ line: 3, column: 1 });
  });

  it("should cover whole lines including their terminators", () => {
    expect(document.rangeOffsets(1, 2)).toEqual({ start: 0, end: 5 });
    expect(document.rangeOffsets(2, 3)).toEqual({ start: 2, end: 6 });
    expect(document.rangeOffsets(2, 2)).toEqual({ start: 2, end: 5 });
  });

  it("should reject invalid ranges", () => {
    expect(() => document.assertRange(0, 1)).toThrow(LineRangeError);
    expect(() => document.assertRange(2, 1)).toThrow(LineRangeError);
    expect(() => document.assertRange(1.5, 2)).toThrow(LineRangeError);

    try {
      document.assertRange(1, 4);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(RangeError);
      if (error instanceof LineRangeError) {
        expect(error.info.code).toBe("RANGE002");
        expect(error.info.suggestion).toBe("文档共 3 行，请确认结束行不超过该值");
      }
    }
  });
});
