import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, test, vi } from "vitest";
import { _resetConfig, buildConfig, deepMerge, getConfig, getConfigPath } from "../src/config";

describe("buildConfig", () => {
  test("defaults", () => {
    const config = buildConfig();
    expect(config.processing).toEqual({
      chunkSize: 1000,
      maxRows: 10_000,
      maxWorkers: 4,
      pdfMaxPages: 50,
      maxFileBytes: 16 * 1024 * 1024,
    });
    expect(config.currency.default).toBe("USD");
    expect(config.categorizer.confidenceThreshold).toBe(0.4);
    expect(config.budget.percentages.food).toBe(0.15);
  });

  test("overrides merge into nested sections", () => {
    const config = buildConfig({ processing: { chunkSize: 250 } });
    expect(config.processing.chunkSize).toBe(250);
    expect(config.processing.maxRows).toBe(10_000);
  });

  test("rejects invalid values", () => {
    expect(() => buildConfig({ processing: { chunkSize: -1 } })).toThrow();
    expect(() => buildConfig({ currency: { default: "DOLLARS" } })).toThrow();
  });
});

describe("deepMerge", () => {
  test("arrays are replaced, not merged", () => {
    expect(deepMerge({ a: [1, 2], b: { c: 1, d: 2 } }, { a: [3], b: { d: 4 } })).toEqual({
      a: [3],
      b: { c: 1, d: 4 },
    });
  });
});

describe("getConfig", () => {
  let dir: string | undefined;

  afterEach(() => {
    _resetConfig();
    vi.unstubAllEnvs();
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  test("reads overrides from LEDGERLINE_CONFIG", () => {
    dir = mkdtempSync(join(tmpdir(), "ledgerline-config-"));
    const path = join(dir, "config.json");
    writeFileSync(path, JSON.stringify({ currency: { default: "EUR" } }));
    vi.stubEnv("LEDGERLINE_CONFIG", path);

    expect(getConfigPath()).toBe(path);
    expect(getConfig().currency.default).toBe("EUR");
    expect(getConfig().currency.valueWeight).toBe(0.3);
  });

  test("a missing file falls back to defaults", () => {
    vi.stubEnv("LEDGERLINE_CONFIG", join(tmpdir(), "ledgerline-missing", "config.json"));
    expect(getConfig().currency.default).toBe("USD");
  });

  test("the file must hold a JSON object", () => {
    dir = mkdtempSync(join(tmpdir(), "ledgerline-config-"));
    const path = join(dir, "config.json");
    writeFileSync(path, "[1, 2]");
    vi.stubEnv("LEDGERLINE_CONFIG", path);

    expect(() => getConfig()).toThrow(`Config file ${path} must contain a JSON object`);
  });

  test("the result is cached until reset", () => {
    const first = getConfig();
    expect(getConfig()).toBe(first);
    _resetConfig();
    expect(getConfig()).not.toBe(first);
  });
});
