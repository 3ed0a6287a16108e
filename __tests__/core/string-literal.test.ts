import { describe, expect, it } from "vitest";
import {
  escapeBraces,
  findEscapeHazard,
  interpolatedPrefix,
  isConvertibleLiteral,
  parseStringLiteral,
} from "../../src/core/string-literal";

function literal(source: string) {
  const parsed = parseStringLiteral(source);
  if (!parsed) throw new Error(`not a literal: ${source}`);
  return parsed;
}

describe("string literal helpers", () => {
  it("should split prefix, quote and body", () => {
    expect(parseStringLiteral("'''a'b'''")).toEqual({
      prefix: "",
      quote: "'''",
      body: "a'b",
      isRaw: false,
      isTripleQuoted: true,
    });
    expect(literal('Rb"x"')).toMatchObject({ prefix: "Rb", quote: '"', isRaw: true });
    expect(parseStringLiteral("name")).toBeNull();
  });

  it("should reject bytes and existing f-strings", () => {
    expect(isConvertibleLiteral(literal("b'%s'"))).toBe(false);
    expect(isConvertibleLiteral(literal("F'%s'"))).toBe(false);
    expect(isConvertibleLiteral(literal("u'%s'"))).toBe(true);
  });

  it("should build the f-string prefix", () => {
    expect(interpolatedPrefix(literal("'x'"))).toBe("f");
    expect(interpolatedPrefix(literal("u'x'"))).toBe("f");
    expect(interpolatedPrefix(literal("R'x'"))).toBe("fR");
  });

  it("should find escapes that decode to format characters", () => {
    expect(findEscapeHazard(literal("'\\x25s'"))).toBe("\\x25");
    expect(findEscapeHazard(literal("'\\173'"))).toBe("\\173");
    expect(findEscapeHazard(literal("'\\u007d'"))).toBe("\\u007d");
    expect(findEscapeHazard(literal("'\\N{BULLET}'"))).toBe("\\N{BULLET}");
    expect(findEscapeHazard(literal("'\\\\x25'"))).toBeNull();
    expect(findEscapeHazard(literal("'\\n\\x41'"))).toBeNull();
    expect(findEscapeHazard(literal("r'\\x25'"))).toBeNull();
  });

  it("should double braces", () => {
    expect(escapeBraces("{a}")).toBe("{{a}}");
  });
});
