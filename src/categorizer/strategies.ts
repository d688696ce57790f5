/**
 * Categorization strategies, tried in order. Each returns a decision or null
 * when it has nothing confident to say.
 */

import { errorMessage } from "../errors";
import { type CategoryName, type CategorySource, isValidCategory } from "../types";
import type { ClassifierModel, Prediction } from "./model";
import { tokenize } from "./preprocess";
import type { RuleMatcher } from "./rules";

export interface CategorizationInput {
  description: string;
  /** The statement's own category column, if it had one */
  providedCategory?: string;
}

export interface CategoryDecision {
  category: CategoryName;
  confidence: number;
  source: CategorySource;
}

export type CategoryStrategy = (input: CategorizationInput) => CategoryDecision | null;

/** Keep a category the statement already names, unless it is "other". */
export function providedStrategy(confidence: number): CategoryStrategy {
  return (input) => {
    const category = input.providedCategory?.trim().toLowerCase();
    if (!category || category === "other" || !isValidCategory(category)) return null;
    return { category, confidence, source: "provided" };
  };
}

function isProbability(value: number): boolean {
  return Number.isFinite(value) && value >= 0 && value <= 1;
}

/**
 * Ask the classifier. Predictions below the threshold or outside [0, 1],
 * labels outside the category set and model failures all yield null.
 */
export function modelStrategy(
  model: ClassifierModel,
  threshold: number,
  warn: (message: string) => void = console.warn,
): CategoryStrategy {
  let warned = false;
  return (input) => {
    const tokens = tokenize(input.description);
    if (tokens.length === 0) return null;

    let prediction: Prediction;
    try {
      prediction = model.predict(tokens);
    } catch (err) {
      if (!warned) {
        warned = true;
        warn(`categorizer: model prediction failed (${errorMessage(err)}); falling back to rules`);
      }
      return null;
    }

    const label = prediction.label.toLowerCase();
    const { probability } = prediction;
    if (!isProbability(probability) || probability < threshold || !isValidCategory(label)) return null;
    return { category: label, confidence: probability, source: "model" };
  };
}

export function rulesStrategy(matcher: RuleMatcher): CategoryStrategy {
  return (input) => {
    const match = matcher(input.description);
    return match ? { category: match.category, confidence: match.confidence, source: "rules" } : null;
  };
}

export const DEFAULT_DECISION: CategoryDecision = { category: "other", confidence: 0, source: "default" };
