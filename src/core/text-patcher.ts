/**
 * Text Patcher
 * 把替换应用到源码的一个切片上，替换之外的字符原样保留
 */
import type { Replacement } from "./replacement-planner";

/**
 * @param slice 源码切片
 * @param replacements 使用整份源码偏移的替换
 * @param baseOffset 切片在整份源码中的起始偏移
 */
export function applyReplacements(
  slice: string,
  replacements: Replacement[],
  baseOffset = 0
): string {
  const sliceEnd = baseOffset + slice.length;
  const inside = replacements
    .filter((r) => r.start >= baseOffset && r.end <= sliceEnd)
    .sort((a, b) => a.start - b.start);
  if (!inside.length) return slice;

  let out = "";
  let cursor = baseOffset;
  for (const r of inside) {
    // 规划阶段已去掉被包含的替换，这里只会出现相互独立的区间
    if (r.start < cursor) continue;
    out += slice.slice(cursor - baseOffset, r.start - baseOffset) + r.newText;
    cursor = r.end;
  }
  return out + slice.slice(cursor - baseOffset);
}
