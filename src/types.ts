/**
 * 一个 % 占位符的描述
 * One `%` placeholder inside a format string.
 */
export interface ConversionSpec {
  /** 转换字符，如 s / r / d / x；`%%` 为 "%" */
  conversion: string;
  /** 映射键，`%(name)s` 中的 name（不支持，出现即跳过） */
  mappingKey?: string;
  /** 标志位 `#0- +` */
  flags: string;
  /** 宽度，可能为 "*" */
  width?: string;
  /** 精度，可能为 "*" */
  precision?: string;
  /** h / l / L，Python 中无实际作用 */
  lengthModifier?: string;
  /**
   * 消耗的位置参数下标，`%%` 为 -1
   * Positional index of the consumed argument, -1 for `%%`.
   */
  argumentIndex: number;
  /** 在字面量主体中的起止位置 */
  start: number;
  end: number;
  /** 原始文本，例如 "%-5s" */
  raw: string;
}

/**
 * 格式字符串拆分后的片段：普通文本或占位符
 */
export type FormatSegment =
  | { kind: "text"; text: string }
  | { kind: "conversion"; spec: ConversionSpec };

/**
 * 源码中的 Python 字符串字面量
 */
export interface StringLiteralInfo {
  /** 前缀，例如 "", "u", "r", "Rb" */
  prefix: string;
  /** 引号，' " ''' 或 """ */
  quote: string;
  /** 引号之间的原始源码文本 */
  body: string;
  isRaw: boolean;
  isTripleQuoted: boolean;
}

/**
 * 位置参数
 */
export interface FormatArgument {
  /** 参数在源码中的文本（已应用内层替换） */
  text: string;
  /** tree-sitter 节点类型 */
  nodeType: string;
  start: number;
  end: number;
}

/**
 * 一处 `'fmt' % args` 表达式
 * One percent-format occurrence discovered while walking the tree.
 */
export interface FormatSite {
  /** 字面量起始行（1 起） */
  line: number;
  column: number;
  /** 整个二元表达式的结束行 */
  endLine: number;
  /** 整个表达式在源码中的偏移范围 */
  start: number;
  end: number;
  /** 原始文本 */
  originalText: string;
  /** 隐式拼接等无法识别的字面量为 null */
  literal: StringLiteralInfo | null;
  /** 右操作数拆出的位置参数；含 `*args` 时为 null */
  arguments: FormatArgument[] | null;
  /** 右操作数中含有注释，改写会丢失注释 */
  hasComment: boolean;
}

export type SkipReason =
  | "crosses-range"
  | "unsupported-literal"
  | "escape-hazard"
  | "mapping-key"
  | "star-width"
  | "unsupported-conversion"
  | "unsupported-modifier"
  | "numeric-disabled"
  | "malformed-format"
  | "arity-mismatch"
  | "starred-argument"
  | "argument-not-embeddable"
  | "quote-conflict";

/**
 * 重写后的 f-string 或跳过原因
 */
export type InterpolationResult =
  | { ok: true; text: string }
  | { ok: false; reason: SkipReason; detail?: string };

/**
 * 站点分析报告
 */
export interface SiteReport {
  line: number;
  column: number;
  originalText: string;
  status: "converted" | "skipped";
  /** status 为 converted 时的新文本 */
  replacement?: string;
  reason?: SkipReason;
  detail?: string;
}

/**
 * Options accepted by the rewriter.
 * 重写器选项。
 */
export interface RewriteOptions {
  /**
   * 是否转换数值类占位符（%d %x %.2f 等）。
   * Default is true.
   */
  convertNumeric?: boolean;

  /**
   * 参数中出现与字面量相同的引号时，是否允许切换引号风格。
   * Default is true.
   */
  allowQuoteSwap?: boolean;
}

export interface RewriteResult {
  /** 请求行范围改写后的文本 */
  output: string;
  /** 范围内每个候选站点的处理结果 */
  sites: SiteReport[];
}
