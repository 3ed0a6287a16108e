/**
 * Python 字符串字面量工具
 */
import type { StringLiteralInfo } from "../types";

const LITERAL_PATTERN = /^([A-Za-z]{0,2})('''|"""|'|")([\s\S]*)\2$/;

/**
 * 拆分字面量为前缀、引号与主体，无法识别时返回 null
 */
export function parseStringLiteral(source: string): StringLiteralInfo | null {
  const match = LITERAL_PATTERN.exec(source);
  if (!match) return null;
  const [, prefix, quote, body] = match;
  return {
    prefix,
    quote,
    body,
    isRaw: /r/i.test(prefix),
    isTripleQuoted: quote.length === 3,
  };
}

/**
 * 能否改写为 f-string：排除 bytes 与已有的 f-string
 */
export function isConvertibleLiteral(literal: StringLiteralInfo): boolean {
  return !/[bf]/i.test(literal.prefix);
}

/**
 * f-string 的前缀：去掉 u，保留原始 r 的大小写
 */
export function interpolatedPrefix(literal: StringLiteralInfo): string {
  const raw = literal.prefix.match(/r/i);
  return raw ? `f${raw[0]}` : "f";
}

const SIMPLE_ESCAPES = new Set([
  "\\", "'", '"', "a", "b", "f", "n", "r", "t", "v", "\n", "\r",
]);

/**
 * 非原始字符串中，解码后得到 % { } 的转义或 \N{...} 会让逐字扫描失真
 * 返回发现的问题转义，没有则返回 null
 */
export function findEscapeHazard(literal: StringLiteralInfo): string | null {
  if (literal.isRaw) return null;
  const { body } = literal;

  for (let i = 0; i < body.length; i++) {
    if (body[i] !== "\\") continue;
    const next = body[i + 1];
    if (next === undefined) return null;

    if (next === "{" || next === "}") {
      return body.slice(i, i + 2);
    }
    if (SIMPLE_ESCAPES.has(next)) {
      i++;
      continue;
    }

    let digits: string | undefined;
    let radix = 16;
    if (next === "N" && body[i + 2] === "{") {
      const close = body.indexOf("}", i);
      return close === -1 ? body.slice(i) : body.slice(i, close + 1);
    } else if (next === "x") {
      digits = body.slice(i + 2, i + 4);
    } else if (next === "u") {
      digits = body.slice(i + 2, i + 6);
    } else if (next === "U") {
      digits = body.slice(i + 2, i + 10);
    } else if (/[0-7]/.test(next)) {
      digits = /^[0-7]{1,3}/.exec(body.slice(i + 1))?.[0];
      radix = 8;
    }

    if (digits) {
      const codePoint = parseInt(digits, radix);
      // "%" "{" "}"
      if (codePoint === 0x25 || codePoint === 0x7b || codePoint === 0x7d) {
        const length = radix === 8 ? digits.length : digits.length + 1;
        return body.slice(i, i + 1 + length);
      }
    }
  }
  return null;
}

/**
 * f-string 文本片段中花括号需要成对转义
 */
export function escapeBraces(text: string): string {
  return text.replace(/[{}]/g, (brace) => brace + brace);
}
