/**
 * Currency conversion backed by a rate provider and a TTL cache.
 */

import { RateUnavailableError, errorMessage, isLedgerError } from "../errors";
import type { Transaction } from "../types";
import { RateCache, type RateProvider } from "./rates";

export interface CurrencyConverter {
  getRate(from: string, to: string): Promise<number>;
  convert(amount: number, from: string, to: string): Promise<number>;
}

export interface CurrencyConverterDeps {
  provider: RateProvider;
  cache?: RateCache;
  ttlMs?: number;
  timeoutMs?: number;
  now?: () => number;
}

function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`timed out after ${ms}ms`)), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

export function createCurrencyConverter(deps: CurrencyConverterDeps): CurrencyConverter {
  const cache = deps.cache ?? new RateCache();
  const ttlMs = deps.ttlMs ?? 3_600_000;
  const timeoutMs = deps.timeoutMs ?? 10_000;
  const now = deps.now ?? Date.now;

  async function getRate(from: string, to: string): Promise<number> {
    const base = from.toUpperCase();
    const quote = to.toUpperCase();
    if (base === quote) return 1;

    const cached = cache.lookup(base, quote, now());
    if (cached !== null) return cached;

    let rate: number;
    try {
      rate = await withTimeout(deps.provider.getRate(base, quote), timeoutMs);
    } catch (err) {
      if (isLedgerError(err)) throw err;
      throw new RateUnavailableError(base, quote, errorMessage(err));
    }
    if (!Number.isFinite(rate) || rate <= 0) {
      throw new RateUnavailableError(base, quote, `invalid rate ${rate}`);
    }

    const fetchedAt = now();
    cache.prune(fetchedAt);
    cache.store({ base, quote, rate, fetchedAt, expiresAt: fetchedAt + ttlMs });
    return rate;
  }

  return {
    getRate,
    async convert(amount: number, from: string, to: string): Promise<number> {
      const rate = await getRate(from, to);
      return amount * rate;
    },
  };
}

export interface ConversionResult {
  transactions: Transaction[];
  warnings: string[];
}

/**
 * Convert every transaction not already in `target`. One rate is fetched per
 * distinct source currency; a currency without a rate stays unconverted and
 * produces a warning.
 */
export async function convertTransactions(
  transactions: Transaction[],
  target: string,
  converter: CurrencyConverter,
): Promise<ConversionResult> {
  const quote = target.toUpperCase();
  const rates = new Map<string, number | null>();
  const warnings: string[] = [];

  for (const tx of transactions) {
    if (tx.currency === quote || rates.has(tx.currency)) continue;
    try {
      rates.set(tx.currency, await converter.getRate(tx.currency, quote));
    } catch (err) {
      rates.set(tx.currency, null);
      const message = `currency: ${errorMessage(err)}; ${tx.currency} amounts left unconverted`;
      console.warn(message);
      warnings.push(message);
    }
  }

  const converted = transactions.map((tx) => {
    const rate = rates.get(tx.currency);
    if (tx.currency === quote || rate === undefined || rate === null) return tx;
    const exact = tx.amount * rate;
    const rounded = Math.round(exact * 100) / 100;
    return {
      ...tx,
      // Amounts under a cent keep full precision instead of rounding to zero
      amount: rounded === 0 ? exact : rounded,
      currency: quote,
      originalAmount: tx.amount,
      originalCurrency: tx.currency,
    };
  });

  return { transactions: converted, warnings };
}
