/**
 * 格式化站点收集器
 * 遍历整棵语法树，收集字面量起始行落在指定范围内的 `'fmt' % args` 表达式
 */
import type { FormatArgument, FormatSite } from "../types";
import type { SyntaxNode } from "./python-parser";
import type { SourceDocument } from "./source-document";
import { parseStringLiteral } from "./string-literal";

export interface LineRange {
  firstLine: number;
  lastLine: number;
}

const LITERAL_TYPES = new Set(["string", "concatenated_string"]);

/**
 * 是否为左操作数是字符串字面量的取模运算
 */
export function isPercentFormat(node: SyntaxNode): boolean {
  if (node.type !== "binary_operator") return false;
  const operator = node.childForFieldName("operator");
  const left = node.childForFieldName("left");
  return (
    operator !== null &&
    operator.type === "%" &&
    left !== null &&
    LITERAL_TYPES.has(left.type)
  );
}

function significantChildren(node: SyntaxNode): SyntaxNode[] {
  return node.namedChildren.filter((child) => child.type !== "comment");
}

function containsComment(node: SyntaxNode): boolean {
  return node.children.some(
    (child) => child.type === "comment" || containsComment(child)
  );
}

/**
 * 拆分右操作数为位置参数；含 `*args` 时返回 null
 */
export function collectArguments(
  right: SyntaxNode,
  document: SourceDocument
): FormatArgument[] | null {
  let operand = right;
  // (x) 与 x 等价
  while (operand.type === "parenthesized_expression") {
    const inner = significantChildren(operand);
    if (inner.length !== 1) break;
    operand = inner[0];
  }

  const elements = operand.type === "tuple" ? significantChildren(operand) : [operand];
  if (elements.some((element) => element.type === "list_splat")) {
    return null;
  }

  return elements.map((element) => ({
    text: document.text.slice(element.startIndex, element.endIndex),
    nodeType: element.type,
    start: element.startIndex,
    end: element.endIndex,
  }));
}

function toFormatSite(node: SyntaxNode, document: SourceDocument): FormatSite | null {
  const left = node.childForFieldName("left");
  const right = node.childForFieldName("right");
  if (!left || !right) return null;

  const position = document.positionAt(left.startIndex);
  const literal =
    left.type === "string"
      ? parseStringLiteral(document.text.slice(left.startIndex, left.endIndex))
      : null;

  return {
    line: position.line,
    column: position.column,
    endLine: document.lineAt(Math.max(node.startIndex, node.endIndex - 1)),
    start: node.startIndex,
    end: node.endIndex,
    originalText: document.text.slice(node.startIndex, node.endIndex),
    literal,
    arguments: collectArguments(right, document),
    hasComment: containsComment(right),
  };
}

/**
 * 按后序收集站点：内层站点排在外层之前
 */
export function collectFormatSites(
  root: SyntaxNode,
  document: SourceDocument,
  range: LineRange
): FormatSite[] {
  const sites: FormatSite[] = [];

  const visit = (node: SyntaxNode): void => {
    for (const child of node.namedChildren) {
      visit(child);
    }
    if (!isPercentFormat(node)) return;
    const site = toFormatSite(node, document);
    if (site && site.line >= range.firstLine && site.line <= range.lastLine) {
      sites.push(site);
    }
  };

  visit(root);
  return sites;
}
