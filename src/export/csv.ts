/**
 * Canonical CSV export of processed transactions.
 */

import { format } from "date-fns";
import { stringify } from "csv-stringify/sync";
import type { Transaction } from "../types";

export const EXPORT_COLUMNS = ["date", "description", "amount", "currency", "category", "type"] as const;

/** One row per transaction, in sequence order, with ISO dates. */
export function exportTransactionsCsv(transactions: Transaction[]): string {
  const rows = transactions.map((tx) => ({
    date: format(tx.date, "yyyy-MM-dd"),
    description: tx.description,
    amount: String(tx.amount),
    currency: tx.currency,
    category: tx.category,
    type: tx.type,
  }));
  return stringify(rows, { header: true, columns: [...EXPORT_COLUMNS] });
}
