/**
 * 错误处理单元测试
 */
import { describe, expect, test } from "vitest";
import {
  ErrorCategory,
  ErrorSeverity,
  LineRangeError,
  ParseError,
  buildCodeFrame,
  createRewriteError,
  enhanceError,
  formatError,
  formatErrorForUser,
} from "../../src/core/error-handler";

describe("错误处理单元测试", () => {
  test("应该正确创建错误对象", () => {
    const error = createRewriteError("RANGE002", ["5-9", "3"]);

    expect(error.code).toBe("RANGE002");
    expect(error.category).toBe(ErrorCategory.RANGE);
    expect(error.severity).toBe(ErrorSeverity.ERROR);
    expect(error.message).toBe("行范围超出文档: 5-9");
    expect(error.suggestion).toBe("文档共 3 行，请确认结束行不超过该值");
  });

  test("未知错误代码回退到 GENERAL001", () => {
    const error = createRewriteError("NOPE", ["boom"]);
    expect(error.code).toBe("GENERAL001");
    expect(error.message).toBe("未知错误: boom");
  });

  test("参数中的 $ 模式与占位符原样插入", () => {
    const error = createRewriteError("PARSING001", ["\"x = '$&' {1} $'\"", "4"]);
    expect(error.message).toBe("源码解析失败: \"x = '$&' {1} $'\"");
    expect(error.suggestion).toBe(
      "请检查第 4 行附近的语法，需要传入完整且语法正确的 Python 文件"
    );
  });

  test("代码片段中的插入符与列对齐", () => {
    expect(buildCodeFrame("    x = = 1", 7)).toBe("    x = = 1\n      ^");
    expect(buildCodeFrame("\tx = = 1", 3)).toBe("\tx = = 1\n\t ^");
  });

  test("应该正确格式化错误信息", () => {
    const error = createRewriteError("PARSING001", ["第 2 行第 3 列存在无法识别的语法", "2"], {
      line: 2,
      column: 3,
      codeFrame: "a = = 1\n  ^",
    });

    expect(formatError(error)).toBe(
      [
        "[PARSING001] 源码解析失败: 第 2 行第 3 列存在无法识别的语法",
        "位置: <stdin>:2:3",
        "a = = 1",
        "  ^",
        "建议: 请检查第 2 行附近的语法，需要传入完整且语法正确的 Python 文件",
      ].join("\n")
    );

    expect(formatErrorForUser(error)).toBe(
      [
        "错误(PARSING001): 源码解析失败: 第 2 行第 3 列存在无法识别的语法",
        "文件位置: <stdin> 第 2 行 第 3 列",
        "",
        "a = = 1",
        "  ^",
        "",
        "修复建议:",
        "请检查第 2 行附近的语法，需要传入完整且语法正确的 Python 文件",
      ].join("\n")
    );
  });

  test("enhanceError 保留已知错误的信息", () => {
    const info = createRewriteError("RANGE001", ["3-2"]);
    expect(enhanceError(new LineRangeError(info))).toBe(info);
    expect(enhanceError(new ParseError(info), "a.py").filePath).toBe("a.py");
  });

  test("enhanceError 识别文件错误与未知错误", () => {
    const missing = enhanceError(new Error("ENOENT: no such file"), "/tmp/a.py");
    expect(missing.code).toBe("INPUT001");
    expect(missing.message).toBe("读取输入失败: /tmp/a.py");
    expect(missing.details).toBe("ENOENT: no such file");

    const unknown = enhanceError("boom");
    expect(unknown.code).toBe("GENERAL001");
    expect(unknown.message).toBe("未知错误: boom");
  });

  test("错误类的名称", () => {
    const info = createRewriteError("RANGE001", ["3-2"]);
    expect(new LineRangeError(info).name).toBe("RangeError");
    expect(new ParseError(info).name).toBe("ParseError");
  });
});
