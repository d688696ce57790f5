/**
 * Hybrid categorizer: statement-provided category, then the classifier
 * model, then keyword rules, then "other".
 */

import { getConfig, type AppConfig } from "../config";
import type { ClassifierModel } from "./model";
import { createRuleMatcher, type RuleTable } from "./rules";
import {
  DEFAULT_DECISION,
  modelStrategy,
  providedStrategy,
  rulesStrategy,
  type CategorizationInput,
  type CategoryDecision,
  type CategoryStrategy,
} from "./strategies";

export interface Categorizer {
  categorize(input: CategorizationInput): CategoryDecision;
}

export interface CategorizerDeps {
  model?: ClassifierModel | null;
  config?: AppConfig["categorizer"];
  warn?: (message: string) => void;
}

/**
 * Build a categorizer. Without a model it runs rule-only.
 * Results depend only on the input, the model and the configuration.
 */
export function createCategorizer(deps: CategorizerDeps = {}): Categorizer {
  const config = deps.config ?? getConfig().categorizer;
  const rules: RuleTable = config.rules;
  const matcher = createRuleMatcher(rules, {
    priority: config.priority,
    normalizer: config.ruleScoreNormalizer,
  });

  const strategies: CategoryStrategy[] = [providedStrategy(config.providedConfidence)];
  if (deps.model) {
    strategies.push(modelStrategy(deps.model, config.confidenceThreshold, deps.warn));
  }
  strategies.push(rulesStrategy(matcher));

  return {
    categorize(input: CategorizationInput): CategoryDecision {
      for (const strategy of strategies) {
        const decision = strategy(input);
        if (decision) return decision;
      }
      return { ...DEFAULT_DECISION };
    },
  };
}
