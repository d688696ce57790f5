/**
 * Spending analysis: totals, per-category breakdown, monthly and weekday
 * patterns, and top merchants for a transaction set.
 */

import { differenceInCalendarDays, format, getDay } from "date-fns";
import { getConfig } from "../config";
import { determinePrimaryCurrency } from "../currency/detect";
import type { CategoryName, Transaction } from "../types";
import type { CategoryBreakdown, MerchantTotal, SpendingAnalysis, Weekday } from "./types";

const WEEKDAYS: Weekday[] = ["Sunday", "Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday"];
const TOP_MERCHANTS = 10;

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function monthKey(date: Date): string {
  return format(date, "yyyy-MM");
}

function emptyWeekdays(): Record<Weekday, number> {
  return { Monday: 0, Tuesday: 0, Wednesday: 0, Thursday: 0, Friday: 0, Saturday: 0, Sunday: 0 };
}

function addTo<K>(map: Map<K, number>, key: K, value: number): void {
  map.set(key, (map.get(key) ?? 0) + value);
}

export function analyzeSpending(transactions: Transaction[], currency?: string): SpendingAnalysis {
  const { currency: currencyConfig } = getConfig();
  const primary = currency ?? determinePrimaryCurrency(transactions, currencyConfig, currencyConfig.default);
  const currenciesFound = [...new Set(transactions.map((tx) => tx.currency))];

  const expenses = transactions.filter((tx) => tx.amount < 0);
  const totalIncome = transactions.filter((tx) => tx.amount > 0).reduce((sum, tx) => sum + tx.amount, 0);
  const totalExpenses = expenses.reduce((sum, tx) => sum + Math.abs(tx.amount), 0);

  const byCategory = new Map<CategoryName, { total: number; count: number }>();
  const byMonth = new Map<string, number>();
  const byDay = new Map<string, number>();
  const byMerchant = new Map<string, number>();
  const weekdayPattern = emptyWeekdays();

  for (const tx of expenses) {
    const spent = Math.abs(tx.amount);
    const entry = byCategory.get(tx.category) ?? { total: 0, count: 0 };
    entry.total += spent;
    entry.count += 1;
    byCategory.set(tx.category, entry);
    addTo(byMonth, monthKey(tx.date), spent);
    addTo(byDay, format(tx.date, "yyyy-MM-dd"), spent);
    addTo(byMerchant, tx.description, spent);
    weekdayPattern[WEEKDAYS[getDay(tx.date)]] += spent;
  }

  const categoryBreakdown: Partial<Record<CategoryName, CategoryBreakdown>> = {};
  for (const [category, { total, count }] of byCategory) {
    categoryBreakdown[category] = {
      total: round2(total),
      count,
      mean: round2(total / count),
      percentage: totalExpenses > 0 ? round2((total / totalExpenses) * 100) : 0,
    };
  }

  const topMerchants: MerchantTotal[] = [...byMerchant]
    .sort((a, b) => b[1] - a[1])
    .slice(0, TOP_MERCHANTS)
    .map(([description, total]) => ({ description, total: round2(total) }));

  const dailyTotals = [...byDay.values()];
  const avgDailyExpense = dailyTotals.length > 0 ? dailyTotals.reduce((a, b) => a + b, 0) / dailyTotals.length : 0;

  let period: SpendingAnalysis["period"] = null;
  if (expenses.length > 0) {
    const times = expenses.map((tx) => tx.date.getTime());
    const start = new Date(Math.min(...times));
    const end = new Date(Math.max(...times));
    period = {
      start: format(start, "yyyy-MM-dd"),
      end: format(end, "yyyy-MM-dd"),
      days: differenceInCalendarDays(end, start),
    };
  }

  for (const day of WEEKDAYS) weekdayPattern[day] = round2(weekdayPattern[day]);

  return {
    currency: primary,
    currenciesFound,
    totalExpenses: round2(totalExpenses),
    totalIncome: round2(totalIncome),
    expenseCount: expenses.length,
    avgDailyExpense: round2(avgDailyExpense),
    categoryBreakdown,
    monthlySpending: Object.fromEntries([...byMonth].sort((a, b) => (a[0] < b[0] ? -1 : 1)).map(([month, total]) => [month, round2(total)])),
    weekdayPattern,
    topMerchants,
    period,
  };
}
