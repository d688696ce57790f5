/**
 * Currency detection for individual records and primary-currency voting
 * across a statement.
 */

import patterns from "./currency-patterns.json";

export const DEFAULT_CURRENCY = "USD";

/**
 * A symbol or code pattern. Without `code`, the matched text is the code.
 * An `ambiguous` match (the bare `$`) yields to any other match on the record.
 */
export interface CurrencyPattern {
  pattern: string;
  code?: string;
  ambiguous?: boolean;
}

export const CURRENCY_PATTERNS: CurrencyPattern[] = patterns;

const ISO_CODE = /^[A-Z]{3}$/;

const compiled = CURRENCY_PATTERNS.map((p) => ({
  regex: new RegExp(p.pattern),
  code: p.code,
  ambiguous: p.ambiguous ?? false,
}));

export function isCurrencyCode(value: string): boolean {
  return ISO_CODE.test(value);
}

interface CurrencyMatch {
  code: string;
  ambiguous: boolean;
}

/** Scan text against the precedence table. Returns null when nothing matches. */
function matchCurrency(text: string): CurrencyMatch | null {
  for (const { regex, code, ambiguous } of compiled) {
    const match = regex.exec(text);
    if (match) return { code: code ?? match[0], ambiguous };
  }
  return null;
}

export interface CurrencySource {
  currency?: string;
  amountText: string;
  description: string;
}

/**
 * Detect a record's currency: an explicit currency column first, then
 * symbols or codes in the amount text, then in the description. A bare `$`
 * counts as USD only when neither text carries another marker.
 */
export function detectCurrency(record: CurrencySource, fallback: string = DEFAULT_CURRENCY): string {
  const explicit = record.currency?.trim().toUpperCase();
  if (explicit && isCurrencyCode(explicit)) return explicit;

  const matches = [matchCurrency(record.amountText), matchCurrency(record.description)];
  const definite = matches.find((m) => m !== null && !m.ambiguous);
  if (definite) return definite.code;
  return matches.find((m) => m !== null)?.code ?? fallback;
}

export interface CurrencyWeights {
  frequencyWeight: number;
  valueWeight: number;
}

interface CurrencyTally {
  count: number;
  absTotal: number;
}

/**
 * Pick the statement's primary currency by weighted vote over transaction
 * counts and absolute value shares. Ties go to the currency seen first.
 */
export function determinePrimaryCurrency(
  transactions: ReadonlyArray<{ currency: string; amount: number }>,
  weights: CurrencyWeights = { frequencyWeight: 0.7, valueWeight: 0.3 },
  fallback: string = DEFAULT_CURRENCY,
): string {
  if (transactions.length === 0) return fallback;

  const tallies = new Map<string, CurrencyTally>();
  let grandAbs = 0;
  for (const tx of transactions) {
    const tally = tallies.get(tx.currency) ?? { count: 0, absTotal: 0 };
    tally.count += 1;
    tally.absTotal += Math.abs(tx.amount);
    tallies.set(tx.currency, tally);
    grandAbs += Math.abs(tx.amount);
  }

  let best = fallback;
  let bestScore = Number.NEGATIVE_INFINITY;
  for (const [currency, tally] of tallies) {
    const valueShare = grandAbs > 0 ? tally.absTotal / grandAbs : 0;
    const score = weights.frequencyWeight * (tally.count / transactions.length) + weights.valueWeight * valueShare;
    if (score > bestScore) {
      best = currency;
      bestScore = score;
    }
  }
  return best;
}
