import { rewrite } from "./core/rewriter";

// 导出核心模块
export {
  rewrite,
  rewriteWithReport,
  analyzeFormatSites,
  parseConversions,
  buildConversionSuffix,
  buildInterpolation,
  SourceDocument,
  normalizeRewriteOptions,
  REWRITE_DEFAULTS,
} from "./core";
export type { NormalizedRewriteOptions } from "./core";

// 导出错误处理系统
export {
  ParseError,
  LineRangeError,
  InputError,
  createRewriteError,
  enhanceError,
  formatError,
  formatErrorForUser,
  ErrorCategory,
  ErrorSeverity,
} from "./core";
export type { RewriteErrorInfo } from "./core";

export { runRewriteCommand, createProcessIO } from "./cli/run-rewrite";
export type { CliIO, RewriteCommandArgs } from "./cli/run-rewrite";

export type {
  ConversionSpec,
  FormatArgument,
  FormatSegment,
  FormatSite,
  InterpolationResult,
  RewriteOptions,
  RewriteResult,
  SiteReport,
  SkipReason,
  StringLiteralInfo,
} from "./types";

export default rewrite;
