/**
 * 核心模块索引文件
 * 导出重写器和相关类型
 */

export { rewrite, rewriteWithReport, analyzeFormatSites, resolveLineRange } from "./rewriter";
export { parseConversions } from "./conversion-parser";
export type { ParsedFormat } from "./conversion-parser";
export { buildConversionSuffix, buildInterpolation } from "./interpolation-builder";
export { collectFormatSites, isPercentFormat } from "./site-collector";
export type { LineRange } from "./site-collector";
export { SourceDocument } from "./source-document";
export type { SourcePosition } from "./source-document";
export { parsePython, createPythonParser } from "./python-parser";

// 导出配置规范化系统
export { normalizeRewriteOptions, REWRITE_DEFAULTS } from "./config-normalizer";
export type { NormalizedRewriteOptions } from "./config-normalizer";

// 导出错误处理系统
export {
  createRewriteError,
  enhanceError,
  formatError,
  formatErrorForUser,
  buildCodeFrame,
  ParseError,
  LineRangeError,
  InputError,
  ErrorCategory,
  ErrorSeverity,
} from "./error-handler";
export type { RewriteErrorInfo } from "./error-handler";
