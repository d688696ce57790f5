/**
 * `ledgerline budget` command.
 * Prints per-category recommendations against estimated monthly income.
 */

import { generateBudget } from "../../budget/recommend";
import type { BudgetReport } from "../../budget/types";
import { getConfig } from "../../config";
import { formatCurrency } from "../../currency/format";
import { printAlerts } from "../alerts";
import { loadStatement, parseStatementArgs } from "../load";

export function printBudget(report: BudgetReport, locale = getConfig().currency.locale): void {
  const money = (n: number) => formatCurrency(n, report.currency, locale);

  console.log("=== Budget ===\n");
  if (report.monthlyIncome === undefined) {
    console.log("No income found; recommendations need at least one credit.");
    console.log(`Monthly spending:   ${money(report.monthlySpend)}`);
    return;
  }

  console.log(`Monthly income:     ${money(report.monthlyIncome)}`);
  console.log(`Monthly spending:   ${money(report.monthlySpend)}`);
  if (report.savingsRate !== undefined) {
    console.log(`Savings rate:       ${(report.savingsRate * 100).toFixed(1)}%`);
  }

  console.log(`\n${"Category".padEnd(16)} ${"Recommended".padEnd(16)} ${"Actual".padEnd(16)} Status`);
  console.log("-".repeat(60));
  for (const rec of report.recommendations) {
    const status = rec.severity === "none" ? "ok" : `over (${rec.severity})`;
    console.log(`${rec.category.padEnd(16)} ${money(rec.recommended).padEnd(16)} ${money(rec.actual).padEnd(16)} ${status}`);
  }
}

export async function budgetCommand(args: string[]): Promise<void> {
  const opts = parseStatementArgs(args);
  if (!opts.file) {
    console.error("Usage: ledgerline budget <file> [--currency=XXX] [--model=path]");
    process.exitCode = 1;
    return;
  }

  const result = await loadStatement({ ...opts, file: opts.file });
  const report = generateBudget(result.transactions, { currency: result.currency });
  printBudget(report);
  printAlerts(report.alerts);
  for (const warning of result.warnings) {
    console.log(`\nwarning: ${warning}`);
  }
}
