export { analyzeSpending, monthKey } from "./analyze";
export { estimateMonthlyIncome, generateBudget, severityFor, sortAlerts, type BudgetOptions } from "./recommend";
export type * from "./types";
