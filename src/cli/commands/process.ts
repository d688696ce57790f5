/**
 * `ledgerline process` command.
 * Normalizes a statement, prints a spending summary and alerts, and
 * optionally writes the canonical CSV.
 */

import { writeFile } from "node:fs/promises";
import { analyzeSpending } from "../../budget/analyze";
import { generateBudget } from "../../budget/recommend";
import type { SpendingAnalysis } from "../../budget/types";
import { getConfig } from "../../config";
import { formatCurrency } from "../../currency/format";
import { exportTransactionsCsv } from "../../export/csv";
import type { SkipCounts } from "../../types";
import { printAlerts } from "../alerts";
import { loadStatement, parseStatementArgs } from "../load";

function formatSkipped(skipped: SkipCounts): string {
  const parts = Object.entries(skipped).map(([reason, count]) => `${reason}=${count}`);
  return parts.length > 0 ? parts.join(", ") : "none";
}

/** Print the spending summary to console. */
export function printSummary(analysis: SpendingAnalysis, locale = getConfig().currency.locale): void {
  const money = (n: number) => formatCurrency(n, analysis.currency, locale);

  console.log("=== Statement Summary ===\n");
  console.log(`Currency:           ${analysis.currency} (found: ${analysis.currenciesFound.join(", ") || "none"})`);
  console.log(`Total Expenses:     ${money(analysis.totalExpenses)}`);
  console.log(`Total Income:       ${money(analysis.totalIncome)}`);
  console.log(`Avg Daily Expense:  ${money(analysis.avgDailyExpense)}`);
  if (analysis.period) {
    console.log(`Period:             ${analysis.period.start} to ${analysis.period.end} (${analysis.period.days} days)`);
  }

  const categories = Object.entries(analysis.categoryBreakdown).sort((a, b) => (b[1]?.total ?? 0) - (a[1]?.total ?? 0));
  if (categories.length > 0) {
    console.log("\n--- Category Breakdown ---\n");
    console.log(`${"Category".padEnd(16)} ${"Amount".padEnd(18)} ${"Count".padEnd(8)} %`);
    console.log("-".repeat(50));
    for (const [category, stats] of categories) {
      if (!stats) continue;
      console.log(
        `${category.padEnd(16)} ${money(stats.total).padEnd(18)} ${String(stats.count).padEnd(8)} ${stats.percentage.toFixed(1)}%`,
      );
    }
  }

  const months = Object.entries(analysis.monthlySpending);
  if (months.length > 0) {
    console.log("\n--- Monthly Spending ---\n");
    for (const [month, total] of months) {
      console.log(`${month.padEnd(12)} ${money(total)}`);
    }
  }
}

export async function processCommand(args: string[]): Promise<void> {
  const opts = parseStatementArgs(args);
  if (!opts.file) {
    console.error("Usage: ledgerline process <file> [--out=path] [--currency=XXX] [--model=path]");
    process.exitCode = 1;
    return;
  }

  const result = await loadStatement({ ...opts, file: opts.file });
  console.log(
    `Parsed ${result.transactions.length} transaction(s) from ${result.format.toUpperCase()}` +
      (result.encoding ? ` (${result.encoding})` : "") +
      `; skipped: ${formatSkipped(result.skipped)}\n`,
  );

  printSummary(analyzeSpending(result.transactions, result.currency));
  printAlerts(generateBudget(result.transactions, { currency: result.currency }).alerts);

  for (const warning of result.warnings) {
    console.log(`\nwarning: ${warning}`);
  }

  if (opts.out) {
    await writeFile(opts.out, exportTransactionsCsv(result.transactions), "utf-8");
    console.log(`\nWrote ${result.transactions.length} row(s) to ${opts.out}`);
  }
}
