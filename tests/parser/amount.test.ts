import { describe, expect, test } from "vitest";
import { normalizeSeparators, parseAmount, parseMagnitude } from "../../src/parser/amount";

describe("parseAmount", () => {
  test("strips currency symbols", () => {
    expect(parseAmount("$1,234.56")).toBe(1234.56);
    expect(parseAmount("Rs. 500")).toBe(500);
    expect(parseAmount("₹500")).toBe(500);
    expect(parseAmount("1.234,56 €")).toBe(1234.56);
  });

  test("removes grouping commas (Indian and Western formats)", () => {
    expect(parseAmount("1,50,000.00")).toBe(150000);
    expect(parseAmount("₹10,00,000")).toBe(1000000);
    expect(parseAmount("1,000.50")).toBe(1000.5);
    expect(parseAmount("1,234")).toBe(1234);
  });

  test("treats a lone comma before one or two digits as the decimal point", () => {
    expect(parseAmount("12,50")).toBe(12.5);
    expect(parseAmount("-4,5")).toBe(-4.5);
  });

  test("treats repeated dot groups as grouping", () => {
    expect(parseAmount("1.234.567")).toBe(1234567);
  });

  test("reads the sign from parentheses, minus signs and DR/CR suffixes", () => {
    expect(parseAmount("(45.00)")).toBe(-45);
    expect(parseAmount("-12.50")).toBe(-12.5);
    expect(parseAmount("12.50-")).toBe(-12.5);
    expect(parseAmount("99.00 DR")).toBe(-99);
    expect(parseAmount("150.00 CR")).toBe(150);
    expect(parseAmount("+20")).toBe(20);
  });

  test("returns null for text without digits", () => {
    expect(parseAmount("")).toBeNull();
    expect(parseAmount("   ")).toBeNull();
    expect(parseAmount("abc")).toBeNull();
    expect(parseAmount("$")).toBeNull();
  });

  test("never returns negative zero", () => {
    expect(Object.is(parseAmount("(0.00)"), 0)).toBe(true);
  });
});

describe("parseMagnitude", () => {
  test("drops the sign", () => {
    expect(parseMagnitude("-25.00")).toBe(25);
    expect(parseMagnitude("(7.10)")).toBe(7.1);
    expect(parseMagnitude("n/a")).toBeNull();
  });
});

describe("normalizeSeparators", () => {
  test("last separator wins when both occur", () => {
    expect(normalizeSeparators("1.234,56")).toBe("1234.56");
    expect(normalizeSeparators("1,234.56")).toBe("1234.56");
  });

  test("plain digits pass through", () => {
    expect(normalizeSeparators("500")).toBe("500");
  });
});
