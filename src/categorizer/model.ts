/**
 * Multinomial naive-Bayes classifier loaded from a JSON artifact.
 *
 * Artifact layout:
 *   labels          class names, in the order of the rows below
 *   vocabulary      token -> feature index
 *   classLogPrior   log P(class), one per label
 *   featureLogProb  log P(token | class), one row per label
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import { ModelUnavailableError, errorMessage } from "../errors";

export interface Prediction {
  label: string;
  probability: number;
}

/** Anything that can label a token list. Tests inject fakes through this. */
export interface ClassifierModel {
  predict(tokens: string[]): Prediction;
}

const artifactSchema = z
  .object({
    labels: z.array(z.string()).min(1),
    vocabulary: z.record(z.string(), z.number().int().nonnegative()),
    classLogPrior: z.array(z.number()),
    featureLogProb: z.array(z.array(z.number())),
  })
  .superRefine((artifact, ctx) => {
    const classes = artifact.labels.length;
    if (artifact.classLogPrior.length !== classes || artifact.featureLogProb.length !== classes) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "label, prior and likelihood counts differ" });
      return;
    }
    const features = Object.keys(artifact.vocabulary).length;
    const maxIndex = Math.max(-1, ...Object.values(artifact.vocabulary));
    if (artifact.featureLogProb.some((row) => row.length < features || row.length <= maxIndex)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "likelihood rows are shorter than the vocabulary" });
    }
  });

export type ModelArtifact = z.infer<typeof artifactSchema>;

/** Turn log scores into probabilities without overflowing. */
export function softmax(scores: number[]): number[] {
  const max = Math.max(...scores);
  const exps = scores.map((s) => Math.exp(s - max));
  const total = exps.reduce((sum, e) => sum + e, 0);
  return exps.map((e) => e / total);
}

export class NaiveBayesModel implements ClassifierModel {
  private readonly vocabulary: Map<string, number>;

  constructor(private readonly artifact: ModelArtifact) {
    this.vocabulary = new Map(Object.entries(artifact.vocabulary));
  }

  predict(tokens: string[]): Prediction {
    const scores = [...this.artifact.classLogPrior];
    for (const token of tokens) {
      const index = this.vocabulary.get(token);
      if (index === undefined) continue;
      this.artifact.featureLogProb.forEach((row, c) => {
        scores[c] += row[index];
      });
    }

    const probabilities = softmax(scores);
    let best = 0;
    for (let c = 1; c < probabilities.length; c++) {
      if (probabilities[c] > probabilities[best]) best = c;
    }
    return { label: this.artifact.labels[best], probability: probabilities[best] };
  }
}

/** Validate a parsed artifact and build a model from it. */
export function modelFromArtifact(data: unknown, source = "<inline>"): NaiveBayesModel {
  const parsed = artifactSchema.safeParse(data);
  if (!parsed.success) {
    throw new ModelUnavailableError(source, parsed.error.issues[0]?.message ?? "invalid artifact");
  }
  return new NaiveBayesModel(parsed.data);
}

/**
 * Load a classifier artifact from disk.
 * Throws ModelUnavailableError when the file is missing, unreadable or malformed.
 */
export function loadClassifierModel(path: string): NaiveBayesModel {
  let data: unknown;
  try {
    data = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new ModelUnavailableError(path, errorMessage(err));
  }
  return modelFromArtifact(data, path);
}

/** Like loadClassifierModel, but reports the failure and returns null so callers run rule-only. */
export function loadClassifierModelOrNull(path: string, warn: (message: string) => void): NaiveBayesModel | null {
  try {
    return loadClassifierModel(path);
  } catch (err) {
    if (!(err instanceof ModelUnavailableError)) throw err;
    warn(`categorizer: ${err.message}; using keyword rules only`);
    return null;
  }
}
