/**
 * Replacement Planner
 * 收集需要替换的范围与新文本；外层替换覆盖其内部已有的替换
 */
import { applyReplacements } from "./text-patcher";

export type Replacement = { start: number; end: number; newText: string };
export interface ReplacementPlan {
  replacements: Replacement[];
}

export function createEmptyPlan(): ReplacementPlan {
  return { replacements: [] };
}

/**
 * 加入一处替换，移除被它完全包含的内层替换
 */
export function addReplacement(plan: ReplacementPlan, replacement: Replacement): void {
  plan.replacements = plan.replacements.filter(
    (existing) =>
      existing.start < replacement.start || existing.end > replacement.end
  );
  plan.replacements.push(replacement);
}

/**
 * 取出源码片段，并应用落在片段内的替换
 */
export function renderSpan(
  source: string,
  start: number,
  end: number,
  plan: ReplacementPlan
): string {
  return applyReplacements(source.slice(start, end), plan.replacements, start);
}
