export { createCategorizer, type Categorizer, type CategorizerDeps } from "./categorize";
export {
  loadClassifierModel,
  loadClassifierModelOrNull,
  modelFromArtifact,
  NaiveBayesModel,
  softmax,
  type ClassifierModel,
  type ModelArtifact,
  type Prediction,
} from "./model";
export { normalizeDescription, tokenize, STOPWORDS } from "./preprocess";
export { createRuleMatcher, type RuleMatch, type RuleMatcher, type RuleTable } from "./rules";
export {
  DEFAULT_DECISION,
  modelStrategy,
  providedStrategy,
  rulesStrategy,
  type CategorizationInput,
  type CategoryDecision,
  type CategoryStrategy,
} from "./strategies";
