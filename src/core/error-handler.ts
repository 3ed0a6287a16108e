/**
 * 错误处理模块
 * 提供统一的错误处理机制，包括错误类型、错误生成和格式化方法
 */

// 错误类别枚举
export enum ErrorCategory {
  PARSING = "PARSING", // 源码解析错误
  RANGE = "RANGE", // 行范围错误
  INPUT = "INPUT", // 输入读取错误
  UNKNOWN = "UNKNOWN", // 未知错误
}

// 错误严重级别
export enum ErrorSeverity {
  ERROR = "ERROR", // 错误，中断本次调用
}

// 统一错误接口
export interface RewriteErrorInfo {
  code: string; // 错误代码，例如 PARSING001
  category: ErrorCategory; // 错误类别
  message: string; // 错误信息
  details?: string; // 详细信息
  filePath?: string; // 相关文件路径
  line?: number; // 行号
  column?: number; // 列号
  codeFrame?: string; // 出错行及列指示
  severity: ErrorSeverity; // 严重级别
  suggestion?: string; // 修复建议
  originalError?: Error; // 原始错误
}

// 预定义错误代码和对应信息
interface ErrorDefinition {
  code: string;
  category: ErrorCategory;
  messageTemplate: string;
  severity: ErrorSeverity;
  suggestionTemplate?: string;
}

// 错误定义集
const errorDefinitions: Record<string, ErrorDefinition> = {
  // 解析错误
  PARSING001: {
    code: "PARSING001",
    category: ErrorCategory.PARSING,
    messageTemplate: "源码解析失败: {0}",
    severity: ErrorSeverity.ERROR,
    suggestionTemplate:
      "请检查第 {1} 行附近的语法，需要传入完整且语法正确的 Python 文件",
  },

  // 行范围错误
  RANGE001: {
    code: "RANGE001",
    category: ErrorCategory.RANGE,
    messageTemplate: "行范围无效: {0}",
    severity: ErrorSeverity.ERROR,
    suggestionTemplate: "行号从 1 开始，且起始行不能大于结束行",
  },
  RANGE002: {
    code: "RANGE002",
    category: ErrorCategory.RANGE,
    messageTemplate: "行范围超出文档: {0}",
    severity: ErrorSeverity.ERROR,
    suggestionTemplate: "文档共 {1} 行，请确认结束行不超过该值",
  },
  RANGE003: {
    code: "RANGE003",
    category: ErrorCategory.RANGE,
    messageTemplate: "行号参数不完整: {0}",
    severity: ErrorSeverity.ERROR,
    suggestionTemplate: "请同时提供起始行和结束行，或都不提供以处理整个文件",
  },

  // 输入错误
  INPUT001: {
    code: "INPUT001",
    category: ErrorCategory.INPUT,
    messageTemplate: "读取输入失败: {0}",
    severity: ErrorSeverity.ERROR,
    suggestionTemplate: "请确认文件存在且有读取权限，检查文件路径是否正确",
  },
  INPUT002: {
    code: "INPUT002",
    category: ErrorCategory.INPUT,
    messageTemplate: "行号不是整数: {0}",
    severity: ErrorSeverity.ERROR,
    suggestionTemplate: "行号参数必须是正整数，例如 `fstring-rewrite 3 10`",
  },

  // 通用错误
  GENERAL001: {
    code: "GENERAL001",
    category: ErrorCategory.UNKNOWN,
    messageTemplate: "未知错误: {0}",
    severity: ErrorSeverity.ERROR,
    suggestionTemplate: "如果问题持续存在，请附上输入文件提交问题报告",
  },
};

/**
 * 一次性替换模板中的 {n}，参数原样插入，不会被再次替换
 */
function fillTemplate(template: string, params: string[]): string {
  return template.replace(/\{(\d+)\}/g, (placeholder: string, index: string) => {
    const param = params[Number(index)];
    return param === undefined ? placeholder : String(param);
  });
}

/**
 * 创建格式化的错误对象
 */
export function createRewriteError(
  errorCode: string,
  params: string[] = [],
  options: {
    filePath?: string;
    line?: number;
    column?: number;
    codeFrame?: string;
    originalError?: Error;
  } = {}
): RewriteErrorInfo {
  const definition = errorDefinitions[errorCode] ?? errorDefinitions.GENERAL001;

  // 替换消息模板中的参数
  const message = fillTemplate(definition.messageTemplate, params);
  const suggestion = fillTemplate(definition.suggestionTemplate ?? "", params);

  const details = options.originalError
    ? options.originalError.message
    : undefined;

  return {
    code: definition.code,
    category: definition.category,
    message,
    details,
    filePath: options.filePath,
    line: options.line,
    column: options.column,
    codeFrame: options.codeFrame,
    severity: definition.severity,
    suggestion,
    originalError: options.originalError,
  };
}

/**
 * 源码语法错误
 */
export class ParseError extends Error {
  readonly info: RewriteErrorInfo;

  constructor(info: RewriteErrorInfo) {
    super(info.message);
    this.name = "ParseError";
    this.info = info;
  }
}

/**
 * 行范围错误，继承内置 RangeError
 */
export class LineRangeError extends RangeError {
  readonly info: RewriteErrorInfo;

  constructor(info: RewriteErrorInfo) {
    super(info.message);
    this.name = "RangeError";
    this.info = info;
  }
}

/**
 * 输入读取或参数错误
 */
export class InputError extends Error {
  readonly info: RewriteErrorInfo;

  constructor(info: RewriteErrorInfo) {
    super(info.message);
    this.name = "InputError";
    this.info = info;
  }
}

/**
 * 生成出错行的代码片段，列号 1 起
 */
export function buildCodeFrame(sourceLine: string, column: number): string {
  const caretOffset = Math.max(0, column - 1);
  // tab 保留，保证插入符与源码对齐
  const padding = sourceLine
    .slice(0, caretOffset)
    .replace(/[^\t]/g, " ");
  return `${sourceLine}\n${padding}^`;
}

/**
 * 格式化错误为单段消息
 */
export function formatError(error: RewriteErrorInfo): string {
  let formattedMessage = `[${error.code}] ${error.message}`;

  if (error.filePath || error.line) {
    formattedMessage += `\n位置: ${error.filePath ?? "<stdin>"}`;
    if (error.line) {
      formattedMessage += `:${error.line}`;
      if (error.column) {
        formattedMessage += `:${error.column}`;
      }
    }
  }

  if (error.codeFrame) {
    formattedMessage += `\n${error.codeFrame}`;
  }

  if (error.details && error.details !== error.message) {
    formattedMessage += `\n详情: ${error.details}`;
  }

  if (error.suggestion) {
    formattedMessage += `\n建议: ${error.suggestion}`;
  }

  return formattedMessage;
}

/**
 * 提供给最终用户的错误格式化方法
 * 返回简化的、更友好的错误消息
 */
export function formatErrorForUser(error: RewriteErrorInfo): string {
  let message = `错误(${error.code}): ${error.message}`;

  if (error.line) {
    message += `\n文件位置: ${error.filePath ?? "<stdin>"} 第 ${error.line} 行`;
    if (error.column) {
      message += ` 第 ${error.column} 列`;
    }
  }

  if (error.codeFrame) {
    message += `\n\n${error.codeFrame}`;
  }

  if (error.suggestion) {
    message += `\n\n修复建议:\n${error.suggestion}`;
  }

  return message;
}

/**
 * 将任意抛出值转换为 RewriteErrorInfo
 */
export function enhanceError(error: unknown, filePath?: string): RewriteErrorInfo {
  if (
    error instanceof ParseError ||
    error instanceof LineRangeError ||
    error instanceof InputError
  ) {
    return filePath && !error.info.filePath
      ? { ...error.info, filePath }
      : error.info;
  }

  const original = error instanceof Error ? error : new Error(String(error));
  const errorMessage = original.message;

  // 文件错误
  if (errorMessage.includes("ENOENT") || errorMessage.includes("no such file")) {
    return createRewriteError("INPUT001", [filePath ?? errorMessage], {
      filePath,
      originalError: original,
    });
  }

  return createRewriteError("GENERAL001", [errorMessage], {
    filePath,
    originalError: original,
  });
}
