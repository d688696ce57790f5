/**
 * Income estimation and budget recommendations against a fixed
 * percentage-of-income table.
 */

import { getConfig, type AppConfig } from "../config";
import { determinePrimaryCurrency } from "../currency/detect";
import { formatCurrency } from "../currency/format";
import { CATEGORIES, type Transaction } from "../types";
import { monthKey, round2 } from "./analyze";
import type { Alert, BudgetRecommendation, BudgetReport, Severity } from "./types";

/**
 * Average monthly income: total income divided by the number of distinct
 * months that have income. Undefined when there is no income.
 */
export function estimateMonthlyIncome(transactions: Transaction[]): number | undefined {
  const income = transactions.filter((tx) => tx.amount > 0);
  const months = new Set(income.map((tx) => monthKey(tx.date)));
  if (months.size === 0) return undefined;
  const total = income.reduce((sum, tx) => sum + tx.amount, 0);
  return total / months.size;
}

export function severityFor(actual: number, recommended: number, highMultiplier: number): Severity {
  if (actual > highMultiplier * recommended) return "high";
  if (actual > recommended) return "medium";
  return "none";
}

const SEVERITY_RANK: Record<Alert["severity"], number> = { high: 0, medium: 1 };

export function sortAlerts(alerts: Alert[]): Alert[] {
  return [...alerts].sort(
    (a, b) =>
      SEVERITY_RANK[a.severity] - SEVERITY_RANK[b.severity] ||
      (a.category < b.category ? -1 : a.category > b.category ? 1 : 0),
  );
}

export interface BudgetOptions extends Partial<AppConfig["budget"]> {
  currency?: string;
  locale?: string;
}

/**
 * Compare average monthly spend per category with income-based targets.
 * Without income there are no recommendations and no alerts.
 */
export function generateBudget(transactions: Transaction[], options: BudgetOptions = {}): BudgetReport {
  const config = getConfig();
  const budget = { ...config.budget, ...options };
  const currency =
    options.currency ?? determinePrimaryCurrency(transactions, config.currency, config.currency.default);
  const locale = options.locale ?? config.currency.locale;
  const money = (amount: number) => formatCurrency(amount, currency, locale);

  const months = new Set(transactions.map((tx) => monthKey(tx.date)));
  const spentByCategory = new Map<string, number>();
  for (const tx of transactions) {
    if (tx.amount >= 0) continue;
    spentByCategory.set(tx.category, (spentByCategory.get(tx.category) ?? 0) + Math.abs(tx.amount));
  }
  const monthlySpendFor = (category: string) => (spentByCategory.get(category) ?? 0) / Math.max(1, months.size);
  const monthlySpend = round2([...spentByCategory.keys()].reduce((sum, c) => sum + monthlySpendFor(c), 0));

  const income = estimateMonthlyIncome(transactions);
  if (income === undefined) {
    return { currency, monthlyIncome: undefined, monthlySpend, savingsRate: undefined, recommendations: [], alerts: [] };
  }

  const recommendations: BudgetRecommendation[] = [];
  const alerts: Alert[] = [];

  for (const category of CATEGORIES) {
    const percentage = budget.percentages[category] ?? 0;
    const recommended = income * percentage;
    const actual = monthlySpendFor(category);
    const severity = severityFor(actual, recommended, budget.highMultiplier);
    recommendations.push({
      category,
      recommended: round2(recommended),
      actual: round2(actual),
      difference: round2(recommended - actual),
      percentageOfIncome: round2(percentage * 100),
      severity,
    });
    if (severity !== "none") {
      alerts.push({
        category,
        severity,
        message: `Spending on ${category} averages ${money(actual)} a month against a recommended ${money(recommended)}`,
      });
    }
  }

  const expenseLimit = income * budget.expenseShareLimit;
  if (monthlySpend > expenseLimit) {
    alerts.push({
      category: "overall",
      severity: "high",
      message: `Total monthly spending (${money(monthlySpend)}) exceeds the recommended ${money(expenseLimit)}`,
    });
  }

  const savingsRate = (income - monthlySpend) / income;
  if (savingsRate < budget.savingsTarget) {
    alerts.push({
      category: "savings",
      severity: "medium",
      message: `Savings rate is ${(savingsRate * 100).toFixed(1)}%; aim for at least ${(budget.savingsTarget * 100).toFixed(0)}%`,
    });
  }

  return {
    currency,
    monthlyIncome: round2(income),
    monthlySpend,
    savingsRate: round2(savingsRate),
    recommendations,
    alerts: sortAlerts(alerts),
  };
}
