/**
 * Keyword rule scoring.
 * Each category has a table of keywords and weights; a description scores
 * the sum of weights of the keywords it contains as whole words or phrases.
 */

import { type CategoryName, isValidCategory } from "../types";

export type RuleTable = Record<string, Record<string, number>>;

export interface RuleMatch {
  category: CategoryName;
  score: number;
  confidence: number;
}

export interface RuleMatcherOptions {
  /** Category order used to break score ties */
  priority: readonly CategoryName[];
  /** Score at which confidence reaches 1 */
  normalizer: number;
}

interface CompiledRule {
  keyword: string;
  weight: number;
  regex: RegExp;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function compileKeyword(keyword: string): RegExp {
  const phrase = escapeRegExp(keyword.toLowerCase().trim()).replace(/\s+/g, "\\s+");
  return new RegExp(`(?<![\\p{L}\\p{N}])${phrase}(?![\\p{L}\\p{N}])`, "u");
}

export type RuleMatcher = (description: string) => RuleMatch | null;

/** Compile a rule table into a matcher. Returns null for descriptions with no keyword hits. */
export function createRuleMatcher(rules: RuleTable, options: RuleMatcherOptions): RuleMatcher {
  const compiled = new Map<CategoryName, CompiledRule[]>();
  for (const [category, keywords] of Object.entries(rules)) {
    if (!isValidCategory(category)) continue;
    compiled.set(
      category,
      Object.entries(keywords).map(([keyword, weight]) => ({ keyword, weight, regex: compileKeyword(keyword) })),
    );
  }

  return (description: string): RuleMatch | null => {
    const text = description.toLowerCase();
    let best: CategoryName | null = null;
    let bestScore = 0;
    for (const category of options.priority) {
      const score = (compiled.get(category) ?? []).reduce(
        (sum, rule) => (rule.regex.test(text) ? sum + rule.weight : sum),
        0,
      );
      // Strict comparison keeps the higher-priority category on ties
      if (score > bestScore) {
        best = category;
        bestScore = score;
      }
    }
    if (best === null) return null;
    return { category: best, score: bestScore, confidence: Math.min(1, bestScore / options.normalizer) };
  };
}
