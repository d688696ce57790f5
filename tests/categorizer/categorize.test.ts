import { describe, expect, test, vi } from "vitest";
import { createCategorizer } from "../../src/categorizer/categorize";
import type { ClassifierModel } from "../../src/categorizer/model";
import { modelStrategy, providedStrategy } from "../../src/categorizer/strategies";
import { buildConfig } from "../../src/config";

const config = buildConfig().categorizer;

function fixedModel(label: string, probability: number): ClassifierModel {
  return { predict: () => ({ label, probability }) };
}

describe("providedStrategy", () => {
  const strategy = providedStrategy(0.7);

  test("keeps a known category from the statement", () => {
    expect(strategy({ description: "x", providedCategory: " Food " })).toEqual({
      category: "food",
      confidence: 0.7,
      source: "provided",
    });
  });

  test("ignores other, unknown and absent categories", () => {
    expect(strategy({ description: "x", providedCategory: "Other" })).toBeNull();
    expect(strategy({ description: "x", providedCategory: "Groceries" })).toBeNull();
    expect(strategy({ description: "x" })).toBeNull();
  });
});

describe("modelStrategy", () => {
  test("accepts confident predictions in the category set", () => {
    const strategy = modelStrategy(fixedModel("Travel", 0.9), 0.4);
    expect(strategy({ description: "Delta flight 221" })).toEqual({ category: "travel", confidence: 0.9, source: "model" });
  });

  test("rejects low-probability and unknown labels", () => {
    expect(modelStrategy(fixedModel("travel", 0.3), 0.4)({ description: "flight" })).toBeNull();
    expect(modelStrategy(fixedModel("crypto", 0.99), 0.4)({ description: "flight" })).toBeNull();
  });

  test.each([Number.NaN, 7, -0.2, Number.POSITIVE_INFINITY])("a probability of %s is not trusted", (probability) => {
    expect(modelStrategy(fixedModel("food", probability), 0.4)({ description: "coffee" })).toBeNull();
  });

  test("a throwing model yields null and warns once", () => {
    const warn = vi.fn();
    const broken: ClassifierModel = {
      predict: () => {
        throw new Error("corrupt weights");
      },
    };
    const strategy = modelStrategy(broken, 0.4, warn);

    expect(strategy({ description: "coffee" })).toBeNull();
    expect(strategy({ description: "taxi" })).toBeNull();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith("categorizer: model prediction failed (corrupt weights); falling back to rules");
  });

  test("descriptions with no tokens never reach the model", () => {
    const predict = vi.fn(() => ({ label: "food", probability: 1 }));
    expect(modelStrategy({ predict }, 0.4)({ description: "#### 1234" })).toBeNull();
    expect(predict).not.toHaveBeenCalled();
  });
});

describe("createCategorizer", () => {
  test("runs rule-only without a model", () => {
    const categorizer = createCategorizer({ config });
    expect(categorizer.categorize({ description: "UBER TRIP" })).toEqual({
      category: "transport",
      confidence: 0.6,
      source: "rules",
    });
  });

  test("a model reporting an out-of-range probability falls back to rules", () => {
    const categorizer = createCategorizer({ config, model: fixedModel("food", Number.NaN) });
    expect(categorizer.categorize({ description: "UBER TRIP" })).toEqual({
      category: "transport",
      confidence: 0.6,
      source: "rules",
    });
  });

  test("a confident model wins over rules", () => {
    const categorizer = createCategorizer({ config, model: fixedModel("travel", 0.8) });
    expect(categorizer.categorize({ description: "UBER TRIP" })).toEqual({
      category: "travel",
      confidence: 0.8,
      source: "model",
    });
  });

  test("an unsure model falls back to rules", () => {
    const categorizer = createCategorizer({ config, model: fixedModel("travel", 0.2) });
    expect(categorizer.categorize({ description: "UBER TRIP" }).source).toBe("rules");
  });

  test("a provided category wins over the model", () => {
    const categorizer = createCategorizer({ config, model: fixedModel("travel", 0.99) });
    expect(categorizer.categorize({ description: "UBER TRIP", providedCategory: "shopping" })).toEqual({
      category: "shopping",
      confidence: 0.7,
      source: "provided",
    });
  });

  test("defaults to other with zero confidence", () => {
    const categorizer = createCategorizer({ config });
    expect(categorizer.categorize({ description: "ZXQ 4421" })).toEqual({ category: "other", confidence: 0, source: "default" });
  });

  test("is deterministic for the same input", () => {
    const categorizer = createCategorizer({ config, model: fixedModel("food", 0.55) });
    const input = { description: "Corner Cafe 12" };
    expect(categorizer.categorize(input)).toEqual(categorizer.categorize(input));
  });

  test("honours the configured threshold", () => {
    const categorizer = createCategorizer({
      config: { ...config, confidenceThreshold: 0.9 },
      model: fixedModel("travel", 0.8),
    });
    expect(categorizer.categorize({ description: "UBER TRIP" }).category).toBe("transport");
  });
});
