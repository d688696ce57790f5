/**
 * Central configuration module.
 * Loads optional ~/.ledgerline/config.json (or $LEDGERLINE_CONFIG), merges with defaults.
 */

import { readFileSync } from "node:fs";
import { join } from "node:path";
import { homedir } from "node:os";
import { z } from "zod";
import defaultRules from "./categorizer/category-rules.json";
import { CATEGORIES } from "./types";

const weightTable = z.record(z.string(), z.number().nonnegative());

const configSchema = z.object({
  processing: z.object({
    chunkSize: z.number().int().positive(),
    maxRows: z.number().int().positive(),
    maxWorkers: z.number().int().positive(),
    pdfMaxPages: z.number().int().positive(),
    maxFileBytes: z.number().int().positive(),
  }),
  categorizer: z.object({
    confidenceThreshold: z.number().min(0).max(1),
    providedConfidence: z.number().min(0).max(1),
    ruleScoreNormalizer: z.number().positive(),
    modelPath: z.string().nullable(),
    priority: z.array(z.enum(CATEGORIES)),
    rules: z.record(z.string(), weightTable),
  }),
  currency: z.object({
    default: z.string().length(3),
    frequencyWeight: z.number().min(0),
    valueWeight: z.number().min(0),
    rateTtlMs: z.number().int().positive(),
    rateTimeoutMs: z.number().int().positive(),
    providerUrl: z.string().url(),
    locale: z.string(),
  }),
  budget: z.object({
    percentages: z.record(z.string(), z.number().min(0).max(1)),
    highMultiplier: z.number().positive(),
    expenseShareLimit: z.number().positive(),
    savingsTarget: z.number().min(0).max(1),
  }),
});

export type AppConfig = z.infer<typeof configSchema>;

const DEFAULT_CONFIG: AppConfig = {
  processing: {
    chunkSize: 1000,
    maxRows: 10_000,
    maxWorkers: 4,
    pdfMaxPages: 50,
    maxFileBytes: 16 * 1024 * 1024,
  },
  categorizer: {
    confidenceThreshold: 0.4,
    providedConfidence: 0.7,
    ruleScoreNormalizer: 5,
    modelPath: null,
    priority: [...CATEGORIES],
    rules: defaultRules,
  },
  currency: {
    default: "USD",
    frequencyWeight: 0.7,
    valueWeight: 0.3,
    rateTtlMs: 3_600_000,
    rateTimeoutMs: 10_000,
    providerUrl: "https://api.exchangerate.host",
    locale: "en-US",
  },
  budget: {
    percentages: {
      food: 0.15,
      transport: 0.1,
      entertainment: 0.05,
      shopping: 0.1,
      utilities: 0.08,
      healthcare: 0.08,
      education: 0.05,
      travel: 0.05,
      insurance: 0.08,
      investment: 0.2,
      other: 0.06,
    },
    highMultiplier: 1.5,
    expenseShareLimit: 0.8,
    savingsTarget: 0.2,
  },
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

export function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result = { ...target };
  for (const key of Object.keys(source)) {
    const srcVal = source[key];
    const tgtVal = target[key];
    if (isPlainObject(srcVal) && isPlainObject(tgtVal)) {
      result[key] = deepMerge(tgtVal, srcVal);
    } else {
      result[key] = srcVal;
    }
  }
  return result;
}

/** Merge overrides over the defaults and validate the result. */
export function buildConfig(overrides: Record<string, unknown> = {}): AppConfig {
  return configSchema.parse(deepMerge(DEFAULT_CONFIG, overrides));
}

export function getConfigPath(): string {
  return process.env.LEDGERLINE_CONFIG ?? join(homedir(), ".ledgerline", "config.json");
}

function readOverrides(configPath: string): Record<string, unknown> {
  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch {
    // No config file: use defaults
    return {};
  }
  const parsed: unknown = JSON.parse(raw);
  if (!isPlainObject(parsed)) {
    throw new Error(`Config file ${configPath} must contain a JSON object`);
  }
  return parsed;
}

let cached: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (cached) return cached;
  cached = buildConfig(readOverrides(getConfigPath()));
  return cached;
}

/** Reset cached config (for testing). */
export function _resetConfig(): void {
  cached = null;
}
