import type { CategoryName } from "../types";

export type Weekday = "Monday" | "Tuesday" | "Wednesday" | "Thursday" | "Friday" | "Saturday" | "Sunday";

export interface CategoryBreakdown {
  total: number;
  count: number;
  mean: number;
  /** Share of all expenses, 0–100 */
  percentage: number;
}

export interface MerchantTotal {
  description: string;
  total: number;
}

export interface SpendingAnalysis {
  currency: string;
  currenciesFound: string[];
  totalExpenses: number;
  totalIncome: number;
  expenseCount: number;
  /** Mean of per-day expense totals over days that had expenses */
  avgDailyExpense: number;
  categoryBreakdown: Partial<Record<CategoryName, CategoryBreakdown>>;
  /** Expense totals keyed by yyyy-MM */
  monthlySpending: Record<string, number>;
  weekdayPattern: Record<Weekday, number>;
  topMerchants: MerchantTotal[];
  /** Null when there are no expenses */
  period: { start: string; end: string; days: number } | null;
}

export type Severity = "high" | "medium" | "none";

export interface BudgetRecommendation {
  category: CategoryName;
  recommended: number;
  /** Average monthly spend */
  actual: number;
  /** recommended - actual */
  difference: number;
  percentageOfIncome: number;
  severity: Severity;
}

export type AlertCategory = CategoryName | "overall" | "savings";

export interface Alert {
  category: AlertCategory;
  message: string;
  severity: Exclude<Severity, "none">;
}

export interface BudgetReport {
  currency: string;
  /** Undefined when there is no income to budget against */
  monthlyIncome: number | undefined;
  monthlySpend: number;
  savingsRate: number | undefined;
  recommendations: BudgetRecommendation[];
  alerts: Alert[];
}
