/**
 * Python 源码解析
 * 使用 tree-sitter-python 对整个文件建立语法树
 */
import Parser from "tree-sitter";
import Python from "tree-sitter-python";
import {
  ParseError,
  buildCodeFrame,
  createRewriteError,
} from "./error-handler";
import type { SourceDocument } from "./source-document";

export type SyntaxNode = Parser.SyntaxNode;

export function createPythonParser(): Parser {
  const parser = new Parser();
  parser.setLanguage(Python);
  return parser;
}

export type SyntaxProblemKind = "unrecognized" | "missing" | "legacy" | "indentation";

export interface SyntaxProblem {
  kind: SyntaxProblemKind;
  /** 出错位置的起止偏移 */
  start: number;
  end: number;
  /** 节点类型或旧语法的写法 */
  token: string;
}

// tree-sitter-python 兼容的 Python 2 语法
const LEGACY_STATEMENTS = new Set(["print_statement", "exec_statement"]);
// 不进入其内部检查的节点
const OPAQUE_TYPES = new Set(["string", "comment"]);
const STATEMENT_CONTAINERS = new Set(["module", "block"]);

/**
 * 查找第一个语法错误节点（ERROR 节点或零宽度的缺失 token）
 */
export function findFirstSyntaxError(node: SyntaxNode): SyntaxNode | null {
  if (node.type === "ERROR") return node;
  if (node.childCount === 0) {
    // tree-sitter 用零宽度叶子表示补全的缺失 token
    return node.parent !== null && node.startIndex === node.endIndex
      ? node
      : null;
  }
  for (const child of node.children) {
    const found = findFirstSyntaxError(child);
    if (found) return found;
  }
  return null;
}

/**
 * 语句块内每条独占一行的语句必须与第一条语句缩进相同，模块级语句不能缩进
 */
function findIndentationProblem(
  container: SyntaxNode,
  document: SourceDocument
): SyntaxProblem | null {
  let expected: string | null = container.type === "module" ? "" : null;

  for (const statement of container.namedChildren) {
    if (statement.type === "comment") continue;
    const line = document.lineAt(statement.startIndex);
    const indent = document.text.slice(document.lineStart(line), statement.startIndex);
    // 同一行上 ; 之后的语句
    if (/\S/.test(indent)) continue;

    if (expected === null) {
      expected = indent;
    } else if (indent !== expected) {
      return {
        kind: "indentation",
        start: statement.startIndex,
        end: statement.endIndex,
        token: statement.type,
      };
    }
  }
  return null;
}

/**
 * 查找 tree-sitter 能接受但 Python 3 会拒绝的写法：
 * print/exec 语句、<> 运算符、反引号、不一致的缩进
 */
export function findLegacySyntax(
  root: SyntaxNode,
  document: SourceDocument
): SyntaxProblem | null {
  let previousEnd = 0;

  const backtickBetween = (start: number, end: number): SyntaxProblem | null => {
    const offset = document.text.slice(start, end).indexOf("`");
    return offset === -1
      ? null
      : { kind: "legacy", start: start + offset, end: start + offset + 1, token: "`" };
  };

  const visit = (node: SyntaxNode): SyntaxProblem | null => {
    if (LEGACY_STATEMENTS.has(node.type)) {
      return { kind: "legacy", start: node.startIndex, end: node.endIndex, token: node.type };
    }
    if (STATEMENT_CONTAINERS.has(node.type)) {
      const problem = findIndentationProblem(node, document);
      if (problem) return problem;
    }

    if (node.childCount === 0 || OPAQUE_TYPES.has(node.type)) {
      const gap = backtickBetween(previousEnd, node.startIndex);
      if (gap) return gap;
      const text = document.text.slice(node.startIndex, node.endIndex);
      if (node.type === "<>" || text === "<>") {
        return { kind: "legacy", start: node.startIndex, end: node.endIndex, token: "<>" };
      }
      if (!OPAQUE_TYPES.has(node.type)) {
        const inside = backtickBetween(node.startIndex, node.endIndex);
        if (inside) return inside;
      }
      previousEnd = Math.max(previousEnd, node.endIndex);
      return null;
    }

    for (const child of node.children) {
      const found = visit(child);
      if (found) return found;
    }
    return null;
  };

  return visit(root) ?? backtickBetween(previousEnd, document.text.length);
}

function describeProblem(problem: SyntaxProblem, snippet: string): string {
  switch (problem.kind) {
    case "unrecognized":
      return `存在无法识别的语法${snippet ? ` "${snippet}"` : ""}`;
    case "missing":
      return `缺少 "${problem.token}"`;
    case "legacy":
      return `使用了 Python 3 不支持的写法 "${snippet || problem.token}"`;
    case "indentation":
      return "缩进与所在语句块不一致";
  }
}

/**
 * 解析整个文档，语法错误时抛出 ParseError
 */
export function parsePython(document: SourceDocument): Parser.Tree {
  const parser = createPythonParser();
  // 默认缓冲区较小，大文件需要显式指定
  const tree = parser.parse(document.text, undefined, {
    bufferSize: Math.max(32 * 1024, document.text.length * 2 + 1),
  });

  const errorNode = findFirstSyntaxError(tree.rootNode);
  const problem: SyntaxProblem | null = errorNode
    ? {
        kind: errorNode.type === "ERROR" ? "unrecognized" : "missing",
        start: errorNode.startIndex,
        end: errorNode.endIndex,
        token: errorNode.type,
      }
    : findLegacySyntax(tree.rootNode, document);

  if (problem) {
    const { line, column } = document.positionAt(problem.start);
    const snippet = document.text
      .slice(problem.start, problem.end)
      .split(/\r\n|\n|\r/)[0];
    const description = `第 ${line} 行第 ${column} 列${describeProblem(problem, snippet)}`;
    throw new ParseError(
      createRewriteError("PARSING001", [description, String(line)], {
        line,
        column,
        codeFrame:
          line <= document.lineCount
            ? buildCodeFrame(document.lineText(line), column)
            : undefined,
      })
    );
  }

  return tree;
}
