import { describe, expect, test } from "vitest";
import { parseStatementDate } from "../../src/parser/date";

function ymd(date: Date | null): string | null {
  if (!date) return null;
  return `${date.getFullYear()}-${date.getMonth() + 1}-${date.getDate()}`;
}

const REFERENCE = new Date(2024, 5, 1);

describe("parseStatementDate", () => {
  test("parses ISO dates", () => {
    expect(ymd(parseStatementDate("2024-01-15", REFERENCE))).toBe("2024-1-15");
    expect(ymd(parseStatementDate("2024/03/02", REFERENCE))).toBe("2024-3-2");
  });

  test("prefers the US reading for ambiguous slash dates", () => {
    expect(ymd(parseStatementDate("01/15/2024", REFERENCE))).toBe("2024-1-15");
    expect(ymd(parseStatementDate("03/04/2024", REFERENCE))).toBe("2024-3-4");
  });

  test("falls back to EU order when the US reading is impossible", () => {
    expect(ymd(parseStatementDate("15/01/2024", REFERENCE))).toBe("2024-1-15");
    expect(ymd(parseStatementDate("15.03.2024", REFERENCE))).toBe("2024-3-15");
  });

  test("expands two-digit years instead of reading them as year 24", () => {
    expect(ymd(parseStatementDate("03/15/24", REFERENCE))).toBe("2024-3-15");
  });

  test("parses month-name forms", () => {
    expect(ymd(parseStatementDate("15 Mar 2024", REFERENCE))).toBe("2024-3-15");
    expect(ymd(parseStatementDate("Mar 15, 2024", REFERENCE))).toBe("2024-3-15");
    expect(ymd(parseStatementDate("15-Mar-2024", REFERENCE))).toBe("2024-3-15");
  });

  test("takes the year from the reference date when the text has none", () => {
    expect(ymd(parseStatementDate("15 Mar", new Date(2023, 5, 1)))).toBe("2023-3-15");
  });

  test("returns null for unparsable input", () => {
    expect(parseStatementDate("not a date", REFERENCE)).toBeNull();
    expect(parseStatementDate("", REFERENCE)).toBeNull();
    expect(parseStatementDate("2024-13-01", REFERENCE)).toBeNull();
    expect(parseStatementDate("02/30/2024", REFERENCE)).toBeNull();
  });
});
