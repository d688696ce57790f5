import { describe, expect, test } from "vitest";
import {
  FileTooLargeError,
  LedgerError,
  MalformedCsvError,
  MissingColumnsError,
  NoTransactionsFoundError,
  RowLimitExceededError,
  errorMessage,
  isLedgerError,
} from "../src/errors";

describe("errors", () => {
  test("RowLimitExceededError", () => {
    const err = new RowLimitExceededError(12_000, 10_000);
    expect(err).toBeInstanceOf(LedgerError);
    expect(err.name).toBe("RowLimitExceededError");
    expect(err.code).toBe("ROW_LIMIT_EXCEEDED");
    expect(err.message).toBe("Statement has 12000 rows, which exceeds the limit of 10000");
    expect(err.details).toEqual({ rows: 12_000, limit: 10_000 });
  });

  test("MissingColumnsError lists what was found", () => {
    expect(new MissingColumnsError(["date"], []).message).toBe("Missing required column(s): date. Found: (none)");
  });

  test("NoTransactionsFoundError totals skipped rows", () => {
    const err = new NoTransactionsFoundError("csv", { invalid_date: 2, zero_amount: 1 }, { encoding: "utf-8" });
    expect(err.message).toBe("No transactions found in CSV file (3 row(s) skipped)");
    expect(err.details).toEqual({ format: "csv", skipped: { invalid_date: 2, zero_amount: 1 }, encoding: "utf-8" });
  });

  test("isLedgerError and errorMessage", () => {
    expect(isLedgerError(new RowLimitExceededError(2, 1))).toBe(true);
    expect(isLedgerError(new Error("plain"))).toBe(false);
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage("text")).toBe("text");
  });

  test("FileTooLargeError and MalformedCsvError messages", () => {
    expect(new FileTooLargeError("big.csv", 2048, 1024).message).toBe(
      'File "big.csv" is 2048 bytes, which exceeds the limit of 1024 bytes',
    );
    expect(new MalformedCsvError(3, "latin-1", "Quote Not Closed").message).toBe(
      "Malformed CSV at line 3 (decoded as latin-1): Quote Not Closed",
    );
    expect(new MalformedCsvError(undefined, "utf-8", "bad").message).toBe("Malformed CSV (decoded as utf-8): bad");
  });
});
