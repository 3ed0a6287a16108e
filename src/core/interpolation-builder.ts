/**
 * 插值字符串构建
 * 将一处 FormatSite 改写为 f-string 文本；无法等价改写时返回跳过原因
 */
import type {
  ConversionSpec,
  FormatArgument,
  FormatSite,
  InterpolationResult,
  SkipReason,
  StringLiteralInfo,
} from "../types";
import type { NormalizedRewriteOptions } from "./config-normalizer";
import { parseConversions } from "./conversion-parser";
import {
  escapeBraces,
  findEscapeHazard,
  interpolatedPrefix,
  isConvertibleLiteral,
} from "./string-literal";

type SuffixResult =
  | { ok: true; suffix: string }
  | { ok: false; reason: SkipReason; detail: string };

const STRING_CONVERSIONS = new Set(["s", "r", "a"]);
const INTEGER_CONVERSIONS = new Set(["d", "i", "u"]);
const NUMERIC_CONVERSIONS = new Set(["e", "E", "f", "F", "g", "G", "x", "X", "o"]);

function skip(reason: SkipReason, detail: string): { ok: false; reason: SkipReason; detail: string } {
  return { ok: false, reason, detail };
}

/**
 * 占位符在花括号内、表达式之后的部分，如 "!r"、":>5"、":.2f"
 */
export function buildConversionSuffix(
  spec: ConversionSpec,
  convertNumeric: boolean
): SuffixResult {
  const { conversion, flags, width, precision } = spec;

  if (spec.mappingKey !== undefined) {
    return skip("mapping-key", spec.raw);
  }
  if (width === "*" || precision === "*") {
    return skip("star-width", spec.raw);
  }

  if (STRING_CONVERSIONS.has(conversion)) {
    if (/[^-]/.test(flags)) {
      return skip("unsupported-modifier", spec.raw);
    }
    const align = width !== undefined ? (flags.includes("-") ? "<" : ">") : "";
    const formatSpec =
      (width !== undefined ? `${align}${width}` : "") +
      (precision !== undefined ? `.${precision}` : "");

    if (!formatSpec) {
      return { ok: true, suffix: conversion === "s" ? "" : `!${conversion}` };
    }
    // 字符串默认左对齐，% 默认右对齐，因此对齐方式需要显式写出
    return { ok: true, suffix: `!${conversion}:${formatSpec}` };
  }

  const isInteger = INTEGER_CONVERSIONS.has(conversion);
  if (isInteger || NUMERIC_CONVERSIONS.has(conversion)) {
    if (!convertNumeric) {
      return skip("numeric-disabled", spec.raw);
    }
    if (isInteger && !flags && width === undefined && precision === undefined) {
      return { ok: true, suffix: "" };
    }
    // 整数类型的格式说明不接受精度，%d 的 # 标志也没有对应写法
    const integerLike = isInteger || /[xXo]/.test(conversion);
    if (integerLike && precision !== undefined) {
      return skip("unsupported-modifier", spec.raw);
    }
    if (isInteger && flags.includes("#")) {
      return skip("unsupported-modifier", spec.raw);
    }

    const leftAlign = flags.includes("-");
    const sign = flags.includes("+") ? "+" : flags.includes(" ") ? " " : "";
    const alternate = flags.includes("#") ? "#" : "";
    const zeroPad = flags.includes("0") && !leftAlign && width !== undefined ? "0" : "";
    const formatSpec =
      (leftAlign && width !== undefined ? "<" : "") +
      sign +
      alternate +
      zeroPad +
      (width ?? "") +
      (precision !== undefined ? `.${precision}` : "") +
      (isInteger ? "d" : conversion);

    return { ok: true, suffix: `:${formatSpec}` };
  }

  if (conversion === "%") {
    return spec.raw === "%%"
      ? { ok: true, suffix: "" }
      : skip("unsupported-modifier", spec.raw);
  }

  return skip("unsupported-conversion", spec.raw);
}

/**
 * 参数能否原样嵌入 f-string 表达式
 */
function checkArgument(argument: FormatArgument): SuffixResult {
  if (/[\r\n]/.test(argument.text)) {
    return skip("argument-not-embeddable", "参数跨越多行");
  }
  if (argument.text.includes("\\")) {
    return skip("argument-not-embeddable", "参数包含反斜杠");
  }
  if (argument.text.includes("#")) {
    return skip("argument-not-embeddable", "参数包含 #");
  }
  return { ok: true, suffix: "" };
}

/**
 * 表达式放入花括号时的写法
 */
function embedArgument(argument: FormatArgument): string {
  // lambda 与海象表达式中的冒号会被当作格式说明
  if (argument.nodeType === "lambda" || argument.nodeType === "named_expression") {
    return `(${argument.text})`;
  }
  // 避免与 {{ 转义混淆
  if (argument.text.startsWith("{")) {
    return ` ${argument.text}`;
  }
  return argument.text;
}

/**
 * 选择引号：参数中出现同样的引号时尝试切换为另一种
 */
function chooseQuote(
  literal: StringLiteralInfo,
  argumentTexts: string[],
  allowQuoteSwap: boolean
): string | null {
  const quoteChar = literal.quote[0];
  if (!argumentTexts.some((text) => text.includes(quoteChar))) {
    return literal.quote;
  }
  if (!allowQuoteSwap) return null;

  const alternateChar = quoteChar === "'" ? '"' : "'";
  if (
    literal.body.includes(alternateChar) ||
    argumentTexts.some((text) => text.includes(alternateChar))
  ) {
    return null;
  }
  return alternateChar.repeat(literal.quote.length);
}

export function buildInterpolation(
  site: FormatSite,
  options: NormalizedRewriteOptions
): InterpolationResult {
  const { literal, arguments: args } = site;

  if (!literal || !isConvertibleLiteral(literal)) {
    return skip("unsupported-literal", literal ? literal.prefix : "implicit concatenation");
  }

  const hazard = findEscapeHazard(literal);
  if (hazard) {
    return skip("escape-hazard", hazard);
  }

  const parsed = parseConversions(literal.body);
  if (parsed.malformed) {
    return skip("malformed-format", literal.body);
  }

  const suffixes = new Map<ConversionSpec, string>();
  for (const spec of parsed.conversions) {
    const result = buildConversionSuffix(spec, options.convertNumeric);
    if (!result.ok) return result;
    suffixes.set(spec, result.suffix);
  }

  if (args === null) {
    return skip("starred-argument", site.originalText);
  }
  if (args.length !== parsed.argumentCount) {
    return skip(
      "arity-mismatch",
      `${parsed.argumentCount} 个占位符, ${args.length} 个参数`
    );
  }

  if (site.hasComment) {
    return skip("argument-not-embeddable", "参数中含有注释");
  }
  for (const argument of args) {
    const checked = checkArgument(argument);
    if (!checked.ok) return checked;
  }

  const quote = chooseQuote(
    literal,
    args.map((argument) => argument.text),
    options.allowQuoteSwap
  );
  if (quote === null) {
    return skip("quote-conflict", literal.quote);
  }

  let body = "";
  for (const segment of parsed.segments) {
    if (segment.kind === "text") {
      body += escapeBraces(segment.text);
      continue;
    }
    const { spec } = segment;
    if (spec.conversion === "%") {
      body += "%";
      continue;
    }
    // 非原始字符串里紧贴 { 的反斜杠会改变转义含义
    if (!literal.isRaw && /(^|[^\\])(\\\\)*\\$/.test(body)) {
      return skip("escape-hazard", spec.raw);
    }
    const argument = args[spec.argumentIndex];
    body += `{${embedArgument(argument)}${suffixes.get(spec) ?? ""}}`;
  }

  return { ok: true, text: `${interpolatedPrefix(literal)}${quote}${body}${quote}` };
}
