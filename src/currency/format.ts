/** Format an amount in its currency, falling back to "CODE 1,234.50" for codes Intl does not know. */
export function formatCurrency(amount: number, code: string, locale = "en-US"): string {
  try {
    return new Intl.NumberFormat(locale, { style: "currency", currency: code }).format(amount);
  } catch {
    // RangeError for malformed codes
    const number = new Intl.NumberFormat(locale, { maximumFractionDigits: 8 }).format(amount);
    return `${code} ${number}`;
  }
}
