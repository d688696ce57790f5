/**
 * Amount normalization for statement values.
 * Strips currency symbols and grouping separators, infers the decimal
 * convention, and returns a signed number.
 */

const PARENTHESES = /^\((.*)\)$/;
const DEBIT_SUFFIX = /\s*(?:DR|Dr|dr)\.?$/;
const CREDIT_SUFFIX = /\s*(?:CR|Cr|cr)\.?$/;
const NON_NUMERIC = /[^\d.,+-]/g;
const EURO_GROUPING = /^\d{1,3}(?:\.\d{3})+$/;
const COMMA_GROUPING = /^\d{1,3}(?:,\d{3})+$/;

/**
 * Decide which separator is the decimal point and return a plain
 * digits-and-dot string.
 */
export function normalizeSeparators(digits: string): string {
  const lastComma = digits.lastIndexOf(",");
  const lastDot = digits.lastIndexOf(".");

  if (lastComma >= 0 && lastDot >= 0) {
    // Whichever separator comes last is the decimal point: 1.234,56 vs 1,234.56
    return lastComma > lastDot
      ? digits.replace(/\./g, "").replace(",", ".")
      : digits.replace(/,/g, "");
  }

  if (lastComma >= 0) {
    if (COMMA_GROUPING.test(digits)) return digits.replace(/,/g, "");
    const decimals = digits.length - lastComma - 1;
    if (decimals >= 1 && decimals <= 2 && digits.indexOf(",") === lastComma) {
      return digits.replace(",", ".");
    }
    return digits.replace(/,/g, "");
  }

  if (lastDot >= 0 && digits.indexOf(".") !== lastDot && EURO_GROUPING.test(digits)) {
    return digits.replace(/\./g, "");
  }

  return digits;
}

/**
 * Parse an amount string to a signed number.
 * Handles formats like:
 *   "$1,234.56", "(45.00)", "-12.50", "12.50-", "1.234,56 €", "99.00 DR"
 * Returns null if the string cannot be parsed.
 */
export function parseAmount(raw: string): number | null {
  let text = raw.trim();
  if (!text) return null;

  let negative = false;

  const paren = text.match(PARENTHESES);
  if (paren) {
    negative = true;
    text = paren[1].trim();
  }

  if (DEBIT_SUFFIX.test(text)) {
    negative = true;
    text = text.replace(DEBIT_SUFFIX, "");
  } else if (CREDIT_SUFFIX.test(text)) {
    text = text.replace(CREDIT_SUFFIX, "");
  }

  let cleaned = text.replace(NON_NUMERIC, "");
  if (cleaned.startsWith("-") || cleaned.endsWith("-")) negative = true;
  // Separators left behind by symbols such as "Rs." are not part of the number
  cleaned = cleaned.replace(/[+-]/g, "").replace(/^[.,]+|[.,]+$/g, "");
  if (!/\d/.test(cleaned)) return null;

  const num = Number(normalizeSeparators(cleaned));
  if (Number.isNaN(num) || !Number.isFinite(num)) return null;

  const value = negative ? -Math.abs(num) : num;
  // Avoid -0 for "(0.00)"
  return value === 0 ? 0 : value;
}

/** Parse a value that is known to be a magnitude (debit or credit column). */
export function parseMagnitude(raw: string): number | null {
  const value = parseAmount(raw);
  return value === null ? null : Math.abs(value);
}
