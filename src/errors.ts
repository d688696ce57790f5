/**
 * Error taxonomy.
 * File-level and capacity errors abort a batch; rate and model errors are
 * caught by the pipeline and reported as warnings.
 */

import type { SkipCounts, StatementFormat } from "./types";

export type LedgerErrorCode =
  | "UNSUPPORTED_FORMAT"
  | "FILE_TOO_LARGE"
  | "ENCODING_ERROR"
  | "MISSING_COLUMNS"
  | "MALFORMED_CSV"
  | "NO_TRANSACTIONS_FOUND"
  | "ROW_LIMIT_EXCEEDED"
  | "PROCESSING_CANCELLED"
  | "RATE_UNAVAILABLE"
  | "MODEL_UNAVAILABLE";

export class LedgerError extends Error {
  readonly code: LedgerErrorCode;
  readonly details: Record<string, unknown>;

  constructor(code: LedgerErrorCode, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

export class UnsupportedFormatError extends LedgerError {
  constructor(readonly filename: string, readonly signature: string) {
    super(
      "UNSUPPORTED_FORMAT",
      `Unsupported file format for "${filename}" (signature: ${signature}). Only CSV and PDF statements are supported.`,
      { filename, signature },
    );
  }
}

export class FileTooLargeError extends LedgerError {
  constructor(readonly filename: string, readonly bytes: number, readonly limit: number) {
    super(
      "FILE_TOO_LARGE",
      `File "${filename}" is ${bytes} bytes, which exceeds the limit of ${limit} bytes`,
      { filename, bytes, limit },
    );
  }
}

export class EncodingError extends LedgerError {
  constructor(readonly attempted: string[]) {
    super(
      "ENCODING_ERROR",
      `Could not decode file; tried encodings: ${attempted.join(", ")}`,
      { attempted },
    );
  }
}

export class MissingColumnsError extends LedgerError {
  constructor(readonly missing: string[], readonly found: string[]) {
    super(
      "MISSING_COLUMNS",
      `Missing required column(s): ${missing.join(", ")}. Found: ${found.join(", ") || "(none)"}`,
      { missing, found },
    );
  }
}

export class MalformedCsvError extends LedgerError {
  constructor(readonly line: number | undefined, readonly encoding: string, reason: string) {
    super(
      "MALFORMED_CSV",
      `Malformed CSV${line === undefined ? "" : ` at line ${line}`} (decoded as ${encoding}): ${reason}`,
      { line, encoding, reason },
    );
  }
}

export class NoTransactionsFoundError extends LedgerError {
  constructor(
    readonly format: StatementFormat,
    readonly skipped: SkipCounts,
    details: Record<string, unknown> = {},
  ) {
    const total = Object.values(skipped).reduce((sum, n) => sum + (n ?? 0), 0);
    super(
      "NO_TRANSACTIONS_FOUND",
      `No transactions found in ${format.toUpperCase()} file (${total} row(s) skipped)`,
      { format, skipped, ...details },
    );
  }
}

export class RowLimitExceededError extends LedgerError {
  constructor(readonly rows: number, readonly limit: number) {
    super(
      "ROW_LIMIT_EXCEEDED",
      `Statement has ${rows} rows, which exceeds the limit of ${limit}`,
      { rows, limit },
    );
  }
}

export class ProcessingCancelledError extends LedgerError {
  constructor(readonly completedChunks: number, readonly totalChunks: number) {
    super(
      "PROCESSING_CANCELLED",
      `Processing cancelled after ${completedChunks} of ${totalChunks} chunk(s)`,
      { completedChunks, totalChunks },
    );
  }
}

export class RateUnavailableError extends LedgerError {
  constructor(readonly base: string, readonly quote: string, reason: string) {
    super("RATE_UNAVAILABLE", `No exchange rate for ${base} -> ${quote}: ${reason}`, {
      base,
      quote,
      reason,
    });
  }
}

export class ModelUnavailableError extends LedgerError {
  constructor(readonly path: string, reason: string) {
    super("MODEL_UNAVAILABLE", `Classifier model at ${path} is unavailable: ${reason}`, {
      path,
      reason,
    });
  }
}

export function isLedgerError(error: unknown): error is LedgerError {
  return error instanceof LedgerError;
}

/** Render an unknown thrown value as a one-line message. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
