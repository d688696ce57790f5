import axios, { type InternalAxiosRequestConfig } from "axios";
import { describe, expect, test } from "vitest";
import { createHttpRateProvider, RateCache } from "../../src/currency/rates";

function fakeClient(data: unknown, seen: InternalAxiosRequestConfig[] = []) {
  return axios.create({
    baseURL: "https://rates.test",
    adapter: async (config) => {
      seen.push(config);
      return { data, status: 200, statusText: "OK", headers: {}, config };
    },
  });
}

describe("RateCache", () => {
  test("serves direct and inverted rates until they expire", () => {
    const cache = new RateCache();
    cache.store({ base: "EUR", quote: "USD", rate: 1.25, fetchedAt: 0, expiresAt: 1000 });

    expect(cache.lookup("EUR", "USD", 500)).toBe(1.25);
    expect(cache.lookup("USD", "EUR", 500)).toBe(0.8);
    expect(cache.lookup("EUR", "USD", 1000)).toBeNull();
    expect(cache.lookup("GBP", "USD", 500)).toBeNull();
  });

  test("prune drops expired entries", () => {
    const cache = new RateCache();
    cache.store({ base: "EUR", quote: "USD", rate: 1.25, fetchedAt: 0, expiresAt: 1000 });
    cache.store({ base: "GBP", quote: "USD", rate: 1.3, fetchedAt: 0, expiresAt: 5000 });

    expect(cache.prune(1000)).toBe(1);
    expect(cache.prune(1000)).toBe(0);
    expect(cache.lookup("GBP", "USD", 1000)).toBe(1.3);
  });
});

describe("createHttpRateProvider", () => {
  test("queries /convert and returns the result", async () => {
    const seen: InternalAxiosRequestConfig[] = [];
    const provider = createHttpRateProvider({
      baseUrl: "https://rates.test",
      timeoutMs: 1000,
      client: fakeClient({ success: true, result: 1.1 }, seen),
    });

    await expect(provider.getRate("EUR", "USD")).resolves.toBe(1.1);
    expect(seen[0].url).toBe("/convert");
    expect(seen[0].params).toMatchObject({ from: "EUR", to: "USD", amount: 1 });
  });

  test("rejects when the provider reports failure", async () => {
    const provider = createHttpRateProvider({
      baseUrl: "https://rates.test",
      timeoutMs: 1000,
      client: fakeClient({ success: false, error: { info: "quota" } }),
    });
    await expect(provider.getRate("EUR", "USD")).rejects.toThrow("provider returned no rate");
  });

  test("rejects an unexpected body", async () => {
    const provider = createHttpRateProvider({
      baseUrl: "https://rates.test",
      timeoutMs: 1000,
      client: fakeClient("not json"),
    });
    await expect(provider.getRate("EUR", "USD")).rejects.toThrow(/unexpected response shape/);
  });
});
