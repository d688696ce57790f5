/**
 * CSV statement normalizer: encoding resolution, header aliasing and
 * row-to-record mapping.
 */

import { CsvError } from "csv-parse";
import { parse } from "csv-parse/sync";
import {
  MalformedCsvError,
  MissingColumnsError,
  NoTransactionsFoundError,
  RowLimitExceededError,
  errorMessage,
} from "../errors";
import type { ParseResult, RawRecord, SkipCounts } from "../types";
import { decodeText } from "./encoding";
import { countSkip, toRawRecord, type RecordFields } from "./records";

export type CanonicalColumn = keyof RecordFields;

/** Header variants (after normalization) mapped to canonical columns. */
export const HEADER_ALIASES: Record<string, CanonicalColumn> = {
  date: "date",
  transaction_date: "date",
  posted_date: "date",
  post_date: "date",
  posting_date: "date",
  trans_date: "date",
  description: "description",
  merchant: "description",
  payee: "description",
  details: "description",
  memo: "description",
  transaction_description: "description",
  amount: "amount",
  transaction_amount: "amount",
  debit: "debit",
  withdrawal: "debit",
  withdrawals: "debit",
  credit: "credit",
  deposit: "credit",
  deposits: "credit",
  category: "category",
  transaction_category: "category",
  currency: "currency",
  currency_code: "currency",
  type: "type",
  transaction_type: "type",
  debit_credit: "type",
};

const DELIMITERS = [",", ";", "\t", "|"];

export function normalizeHeader(header: string): string {
  return header.trim().toLowerCase().replace(/[\s-]+/g, "_");
}

/**
 * Map raw headers to canonical columns. The first header that maps to a
 * column wins. Throws MissingColumnsError if date, description or an amount
 * column (amount, debit or credit) is absent.
 */
export function resolveColumns(headers: string[]): Partial<Record<CanonicalColumn, number>> {
  const columns: Partial<Record<CanonicalColumn, number>> = {};
  headers.forEach((header, index) => {
    const canonical = HEADER_ALIASES[normalizeHeader(header)];
    if (canonical && columns[canonical] === undefined) {
      columns[canonical] = index;
    }
  });

  const missing: string[] = [];
  if (columns.date === undefined) missing.push("date");
  if (columns.description === undefined) missing.push("description");
  if (columns.amount === undefined && columns.debit === undefined && columns.credit === undefined) {
    missing.push("amount");
  }
  if (missing.length > 0) {
    throw new MissingColumnsError(missing, headers);
  }
  return columns;
}

/** Pick the delimiter that occurs most often in the header line. */
export function sniffDelimiter(text: string): string {
  const firstLine = text.split(/\r?\n/, 1)[0] ?? "";
  let best = ",";
  let bestCount = 0;
  for (const d of DELIMITERS) {
    const count = firstLine.split(d).length - 1;
    if (count > bestCount) {
      best = d;
      bestCount = count;
    }
  }
  return best;
}

function isStringMatrix(value: unknown): value is string[][] {
  return (
    Array.isArray(value) &&
    value.every((row) => Array.isArray(row) && row.every((cell) => typeof cell === "string"))
  );
}

function errorLine(err: CsvError): number | undefined {
  const lines: unknown = err.lines;
  return typeof lines === "number" ? lines : undefined;
}

function readRows(text: string, encoding: string): string[][] {
  let rows: unknown;
  try {
    rows = parse(text, {
      delimiter: sniffDelimiter(text),
      relax_column_count: true,
      relax_quotes: true,
      skip_empty_lines: true,
      trim: true,
    });
  } catch (err) {
    if (err instanceof CsvError) throw new MalformedCsvError(errorLine(err), encoding, err.message);
    throw new MalformedCsvError(undefined, encoding, errorMessage(err));
  }
  if (!isStringMatrix(rows)) {
    throw new Error("csv: parser returned an unexpected row shape");
  }
  return rows;
}

function pick(row: string[], index: number | undefined): string | undefined {
  return index === undefined ? undefined : row[index];
}

export interface CsvParseOptions {
  /** Supplies the year for dates written without one */
  referenceDate?: Date;
  /** Data rows allowed before any row is mapped */
  maxRows?: number;
}

/**
 * Parse CSV statement bytes into raw records.
 * Rows with unusable dates or amounts are dropped and counted, never fatal.
 * The row cap applies to data rows as read, before any are dropped.
 */
export function parseCsvStatement(bytes: Uint8Array, options: CsvParseOptions = {}): ParseResult {
  const { text, encoding } = decodeText(bytes);
  const rows = readRows(text, encoding);
  const [headers = [], ...dataRows] = rows;
  if (options.maxRows !== undefined && dataRows.length > options.maxRows) {
    throw new RowLimitExceededError(dataRows.length, options.maxRows);
  }
  const columns = resolveColumns(headers);

  const records: RawRecord[] = [];
  const skipped: SkipCounts = {};

  dataRows.forEach((row, index) => {
    const fields: RecordFields = {
      date: pick(row, columns.date) ?? "",
      description: pick(row, columns.description) ?? "",
      amount: pick(row, columns.amount),
      debit: pick(row, columns.debit),
      credit: pick(row, columns.credit),
      currency: pick(row, columns.currency),
      category: pick(row, columns.category),
      type: pick(row, columns.type),
    };
    const result = toRawRecord(fields, index, options.referenceDate);
    if (typeof result === "string") {
      countSkip(skipped, result);
    } else {
      records.push(result);
    }
  });

  if (records.length === 0) {
    throw new NoTransactionsFoundError("csv", skipped, { encoding, rows: dataRows.length });
  }

  const dropped = dataRows.length - records.length;
  if (dropped > 0) {
    console.warn(`csv: dropped ${dropped} of ${dataRows.length} row(s)`, skipped);
  }

  return { format: "csv", records, skipped, encoding };
}
