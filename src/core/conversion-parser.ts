/**
 * 百分号格式字符串解析
 * 按从左到右的顺序拆分为文本片段与占位符，占位符按位置依次对应参数
 */
import type { ConversionSpec, FormatSegment } from "../types";

export interface ParsedFormat {
  segments: FormatSegment[];
  conversions: ConversionSpec[];
  /** 消耗参数的占位符数量 */
  argumentCount: number;
  /** 末尾存在没有转换字符的 % */
  malformed: boolean;
}

// %[(key)][flags][width][.precision][length]type
const CONVERSION_PATTERN =
  /%(?:\(([^)]*)\))?([#0 +-]*)(\*|\d+)?(?:\.(\*|\d*))?([hlL])?([\s\S])?/g;

export function parseConversions(body: string): ParsedFormat {
  const segments: FormatSegment[] = [];
  const conversions: ConversionSpec[] = [];
  let argumentCount = 0;
  let malformed = false;
  let cursor = 0;

  for (const match of body.matchAll(CONVERSION_PATTERN)) {
    const start = match.index ?? 0;
    const raw = match[0];
    // 未参与匹配的分组为 undefined
    const mappingKey: string | undefined = match[1];
    const flags: string = match[2] ?? "";
    const width: string | undefined = match[3];
    const precision: string | undefined = match[4];
    const lengthModifier: string | undefined = match[5];
    const conversion: string | undefined = match[6];

    if (start > cursor) {
      segments.push({ kind: "text", text: body.slice(cursor, start) });
    }
    cursor = start + raw.length;

    if (conversion === undefined) {
      malformed = true;
      segments.push({ kind: "text", text: raw });
      continue;
    }

    const consumes = conversion !== "%";
    const spec: ConversionSpec = {
      conversion,
      mappingKey,
      flags,
      width,
      // "%.f" 等价于精度 0
      precision: precision === "" ? "0" : precision,
      lengthModifier,
      argumentIndex: consumes ? argumentCount : -1,
      start,
      end: cursor,
      raw,
    };
    if (consumes) argumentCount++;

    conversions.push(spec);
    segments.push({ kind: "conversion", spec });
  }

  if (cursor < body.length) {
    segments.push({ kind: "text", text: body.slice(cursor) });
  }

  return { segments, conversions, argumentCount, malformed };
}
