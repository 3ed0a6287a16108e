/**
 * 配置规范化模块
 * 处理和规范化重写选项，确保下游拿到的每个配置项都有确定的值
 */
import type { RewriteOptions } from "../types";

/**
 * 默认值常量 - 集中定义所有默认值
 */
export const REWRITE_DEFAULTS = {
  CONVERT_NUMERIC: true,
  ALLOW_QUOTE_SWAP: true,
} as const;

/**
 * 规范化的重写选项，所有配置项都不会是 undefined
 */
export interface NormalizedRewriteOptions {
  convertNumeric: boolean;
  allowQuoteSwap: boolean;
}

export function normalizeRewriteOptions(
  options: RewriteOptions = {}
): NormalizedRewriteOptions {
  return {
    convertNumeric: options.convertNumeric ?? REWRITE_DEFAULTS.CONVERT_NUMERIC,
    allowQuoteSwap: options.allowQuoteSwap ?? REWRITE_DEFAULTS.ALLOW_QUOTE_SWAP,
  };
}
