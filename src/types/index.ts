/** Direction of money flow */
export type TransactionType = "debit" | "credit";

/** Supported statement file formats */
export type StatementFormat = "csv" | "pdf";

/** Fixed category set, in tie-break priority order. */
export const CATEGORIES = [
  "food",
  "transport",
  "entertainment",
  "shopping",
  "utilities",
  "healthcare",
  "education",
  "travel",
  "insurance",
  "investment",
  "other",
] as const;

export type CategoryName = (typeof CATEGORIES)[number];

/** How a transaction's category was decided */
export type CategorySource = "provided" | "model" | "rules" | "default";

/**
 * A row recovered from a statement, before enrichment.
 * CSV and PDF parsers both produce this shape.
 */
export interface RawRecord {
  date: Date;
  description: string;
  /** Signed: debit negative, credit positive */
  amount: number;
  /** Amount text as it appeared in the statement */
  amountText: string;
  /** Value of an explicit currency column, if the statement had one */
  currency?: string;
  /** Value of the statement's own category column, if any */
  category?: string;
  /** Zero-based index of the originating data row or text line */
  sourceRow: number;
}

/** A canonical, labeled transaction */
export interface Transaction {
  date: Date;
  description: string;
  amount: number;
  currency: string;
  category: CategoryName;
  confidence: number;
  type: TransactionType;
  sourceRow: number;
  categorySource: CategorySource;
  /** Set when the amount was converted from another currency */
  originalAmount?: number;
  originalCurrency?: string;
}

/** Reasons a row can be dropped during parsing */
export type SkipReason =
  | "invalid_date"
  | "invalid_amount"
  | "zero_amount"
  | "missing_description"
  | "unmatched_line";

export type SkipCounts = Partial<Record<SkipReason, number>>;

/** Result of parsing a statement file into raw records */
export interface ParseResult {
  format: StatementFormat;
  records: RawRecord[];
  skipped: SkipCounts;
  /** Encoding that decoded a CSV file */
  encoding?: string;
  /** Pages read from a PDF file */
  pagesRead?: number;
}

/** Derive the transaction type from a signed amount. */
export function typeForAmount(amount: number): TransactionType {
  return amount < 0 ? "debit" : "credit";
}

/** Validate that a string is one of the known categories. */
export function isValidCategory(category: string): category is CategoryName {
  return CATEGORIES.some((c) => c === category);
}
