/**
 * 行范围重写器
 * 解析整个文件，只改写范围内的百分号格式化表达式，并只输出请求的行
 */
import type {
  FormatSite,
  RewriteOptions,
  RewriteResult,
  SiteReport,
} from "../types";
import { LineRangeError, createRewriteError } from "./error-handler";
import { normalizeRewriteOptions } from "./config-normalizer";
import type { NormalizedRewriteOptions } from "./config-normalizer";
import { buildInterpolation } from "./interpolation-builder";
import { parsePython } from "./python-parser";
import {
  addReplacement,
  createEmptyPlan,
  renderSpan,
} from "./replacement-planner";
import type { ReplacementPlan } from "./replacement-planner";
import { collectFormatSites } from "./site-collector";
import type { LineRange } from "./site-collector";
import { SourceDocument } from "./source-document";
import { applyReplacements } from "./text-patcher";

interface RewritePlan {
  document: SourceDocument;
  range: LineRange | null;
  plan: ReplacementPlan;
  reports: SiteReport[];
}

/**
 * 两个行号要么都给出，要么都省略（处理整个文件）
 */
export function resolveLineRange(
  document: SourceDocument,
  firstLine?: number,
  lastLine?: number
): LineRange | null {
  if (firstLine === undefined && lastLine === undefined) {
    return document.lineCount === 0
      ? null
      : { firstLine: 1, lastLine: document.lineCount };
  }
  if (firstLine === undefined || lastLine === undefined) {
    throw new LineRangeError(
      createRewriteError("RANGE003", [
        `firstLine=${firstLine ?? "?"}, lastLine=${lastLine ?? "?"}`,
      ])
    );
  }
  document.assertRange(firstLine, lastLine);
  return { firstLine, lastLine };
}

function planSite(
  site: FormatSite,
  document: SourceDocument,
  range: LineRange,
  plan: ReplacementPlan,
  options: NormalizedRewriteOptions
): SiteReport {
  const base = {
    line: site.line,
    column: site.column,
    originalText: site.originalText,
  };

  // 只有整个表达式都在范围内才改写，范围外的行必须保持不变
  if (site.endLine > range.lastLine) {
    return {
      ...base,
      status: "skipped",
      reason: "crosses-range",
      detail: `表达式结束于第 ${site.endLine} 行`,
    };
  }

  const rendered: FormatSite = {
    ...site,
    arguments:
      site.arguments?.map((argument) => ({
        ...argument,
        text: renderSpan(document.text, argument.start, argument.end, plan),
      })) ?? null,
  };

  const result = buildInterpolation(rendered, options);
  if (!result.ok) {
    return { ...base, status: "skipped", reason: result.reason, detail: result.detail };
  }

  addReplacement(plan, { start: site.start, end: site.end, newText: result.text });
  return { ...base, status: "converted", replacement: result.text };
}

function planRewrite(
  sourceText: string,
  firstLine: number | undefined,
  lastLine: number | undefined,
  options: RewriteOptions
): RewritePlan {
  const document = new SourceDocument(sourceText);
  const range = resolveLineRange(document, firstLine, lastLine);
  const tree = parsePython(document);
  const plan = createEmptyPlan();
  const normalized = normalizeRewriteOptions(options);

  const reports = range
    ? collectFormatSites(tree.rootNode, document, range).map((site) =>
        planSite(site, document, range, plan, normalized)
      )
    : [];

  return { document, range, plan, reports };
}

/**
 * 改写 [firstLine, lastLine] 内的百分号格式化，同时返回每个站点的处理结果
 */
export function rewriteWithReport(
  sourceText: string,
  firstLine?: number,
  lastLine?: number,
  options: RewriteOptions = {}
): RewriteResult {
  const { document, range, plan, reports } = planRewrite(
    sourceText,
    firstLine,
    lastLine,
    options
  );
  if (!range) return { output: "", sites: reports };

  const { start, end } = document.rangeOffsets(range.firstLine, range.lastLine);
  return {
    output: applyReplacements(document.text.slice(start, end), plan.replacements, start),
    sites: reports,
  };
}

/**
 * 改写 [firstLine, lastLine] 内的百分号格式化，返回这些行的新文本
 *
 * 省略两个行号时处理整个文件。行号非法时抛出 LineRangeError，
 * 源码存在语法错误时抛出 ParseError；无法等价改写的表达式原样保留。
 */
export function rewrite(
  sourceText: string,
  firstLine?: number,
  lastLine?: number,
  options: RewriteOptions = {}
): string {
  return rewriteWithReport(sourceText, firstLine, lastLine, options).output;
}

/**
 * 列出范围内的所有候选站点及其处理结果
 */
export function analyzeFormatSites(
  sourceText: string,
  firstLine?: number,
  lastLine?: number,
  options: RewriteOptions = {}
): SiteReport[] {
  return rewriteWithReport(sourceText, firstLine, lastLine, options).sites;
}
