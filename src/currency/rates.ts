/**
 * Exchange rates: the provider seam, an HTTP provider and a TTL cache.
 */

import axios, { type AxiosInstance } from "axios";
import { z } from "zod";

export interface CurrencyRate {
  base: string;
  quote: string;
  rate: number;
  fetchedAt: number;
  expiresAt: number;
}

/** Source of live rates. Implementations throw when no rate is available. */
export interface RateProvider {
  getRate(base: string, quote: string): Promise<number>;
}

function pairKey(base: string, quote: string): string {
  return `${base}/${quote}`;
}

/**
 * In-memory rate cache. Serves a stored pair directly or inverted;
 * expired entries are never served.
 */
export class RateCache {
  private entries = new Map<string, CurrencyRate>();

  store(rate: CurrencyRate): void {
    this.entries.set(pairKey(rate.base, rate.quote), rate);
  }

  lookup(base: string, quote: string, now: number = Date.now()): number | null {
    const direct = this.entries.get(pairKey(base, quote));
    if (direct && direct.expiresAt > now) return direct.rate;

    const inverse = this.entries.get(pairKey(quote, base));
    if (inverse && inverse.expiresAt > now && inverse.rate > 0) return 1 / inverse.rate;

    return null;
  }

  /** Drop expired entries. Returns how many were removed. */
  prune(now: number = Date.now()): number {
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }
}

const convertResponseSchema = z.object({
  success: z.boolean().optional(),
  result: z.number().nullable().optional(),
  error: z.unknown().optional(),
});

export interface HttpRateProviderOptions {
  baseUrl: string;
  timeoutMs: number;
  accessKey?: string;
  /** Injected for tests */
  client?: AxiosInstance;
}

/**
 * Rate provider for exchangerate.host-style APIs:
 * GET /convert?from=EUR&to=USD&amount=1 → { success, result }.
 */
export function createHttpRateProvider(options: HttpRateProviderOptions): RateProvider {
  const client = options.client ?? axios.create({ baseURL: options.baseUrl, timeout: options.timeoutMs });

  return {
    async getRate(base: string, quote: string): Promise<number> {
      const response = await client.get<unknown>("/convert", {
        params: { from: base, to: quote, amount: 1, access_key: options.accessKey },
      });
      const body = convertResponseSchema.safeParse(response.data);
      if (!body.success) {
        throw new Error(`unexpected response shape: ${body.error.issues[0]?.message ?? "invalid"}`);
      }
      if (body.data.success === false || typeof body.data.result !== "number") {
        throw new Error("provider returned no rate");
      }
      return body.data.result;
    },
  };
}
