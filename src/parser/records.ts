/**
 * Shared row-to-record mapping for the CSV and PDF paths.
 */

import type { RawRecord, SkipCounts, SkipReason } from "../types";
import { parseAmount, parseMagnitude } from "./amount";
import { parseStatementDate } from "./date";

/** Text fields recovered from one statement row, keyed by canonical name. */
export interface RecordFields {
  date: string;
  description: string;
  amount?: string;
  debit?: string;
  credit?: string;
  currency?: string;
  category?: string;
  type?: string;
}

const DEBIT_TYPE_RE = /^(?:debit|dr|withdrawal|expense|payment|purchase)$/i;
const CREDIT_TYPE_RE = /^(?:credit|cr|deposit|income|refund)$/i;

function present(value: string | undefined): value is string {
  return value !== undefined && value.trim() !== "";
}

/** Resolve a signed amount and the text it came from. */
function resolveAmount(fields: RecordFields): { amount: number; text: string } | null {
  if (present(fields.amount)) {
    const value = parseAmount(fields.amount);
    if (value === null) return null;
    const type = fields.type?.trim() ?? "";
    if (DEBIT_TYPE_RE.test(type)) return { amount: -Math.abs(value), text: fields.amount };
    if (CREDIT_TYPE_RE.test(type)) return { amount: Math.abs(value), text: fields.amount };
    return { amount: value, text: fields.amount };
  }

  // Separate debit/credit columns: debits are outflows
  const debit = present(fields.debit) ? parseMagnitude(fields.debit) : 0;
  const credit = present(fields.credit) ? parseMagnitude(fields.credit) : 0;
  if (debit === null || credit === null) return null;
  if (!present(fields.debit) && !present(fields.credit)) return null;

  const text = present(fields.debit) && debit !== 0 ? fields.debit : (fields.credit ?? "");
  return { amount: credit - debit, text };
}

/**
 * Build a raw record from row fields.
 * Returns the skip reason instead when the row cannot be used.
 */
export function toRawRecord(
  fields: RecordFields,
  sourceRow: number,
  referenceDate?: Date,
): RawRecord | SkipReason {
  const description = fields.description.trim().replace(/\s+/g, " ");
  if (!description) return "missing_description";

  const date = parseStatementDate(fields.date, referenceDate);
  if (!date) return "invalid_date";

  const resolved = resolveAmount(fields);
  if (!resolved) return "invalid_amount";
  // credit - debit can leave float noise
  const amount = Math.round(resolved.amount * 1e8) / 1e8;
  if (amount === 0) return "zero_amount";

  const record: RawRecord = {
    date,
    description,
    amount,
    amountText: resolved.text.trim(),
    sourceRow,
  };
  if (present(fields.currency)) record.currency = fields.currency.trim();
  if (present(fields.category)) record.category = fields.category.trim();
  return record;
}

export function countSkip(skipped: SkipCounts, reason: SkipReason): void {
  skipped[reason] = (skipped[reason] ?? 0) + 1;
}
