/**
 * Statement date parsing.
 * Tries an ordered list of formats (ISO, US, EU, month-name) and returns the
 * first strict match.
 */

import { isValid, parse } from "date-fns";

export const DATE_FORMATS = [
  // ISO
  "yyyy-MM-dd",
  "yyyy-MM-dd HH:mm:ss",
  "yyyy-MM-dd'T'HH:mm:ss",
  "yyyy/MM/dd",
  // US
  "MM/dd/yyyy",
  "MM/dd/yyyy HH:mm:ss",
  "MM-dd-yyyy",
  "MM/dd/yy",
  // EU
  "dd/MM/yyyy",
  "dd/MM/yyyy HH:mm:ss",
  "dd-MM-yyyy",
  "dd.MM.yyyy",
  "dd/MM/yy",
  // Month names
  "dd MMM yyyy",
  "d MMMM yyyy",
  "MMM dd, yyyy",
  "MMMM d, yyyy",
  "dd-MMM-yyyy",
] as const;

/** Formats without a year; the reference date supplies it. */
const YEARLESS_FORMATS = ["dd MMM", "MMM dd"] as const;

const MIN_YEAR = 1900;
const MAX_YEAR = 2100;

function plausible(date: Date): boolean {
  if (!isValid(date)) return false;
  const year = date.getFullYear();
  return year >= MIN_YEAR && year <= MAX_YEAR;
}

/**
 * Parse a statement date string.
 * Returns null when no format matches; callers drop and count such rows.
 */
export function parseStatementDate(
  raw: string,
  referenceDate: Date = new Date(),
  formats: readonly string[] = DATE_FORMATS,
): Date | null {
  const value = raw.trim().replace(/\s+/g, " ");
  if (!value) return null;

  for (const fmt of formats) {
    const parsed = parse(value, fmt, referenceDate);
    if (plausible(parsed)) return parsed;
  }

  for (const fmt of YEARLESS_FORMATS) {
    const parsed = parse(value, fmt, referenceDate);
    if (plausible(parsed)) return parsed;
  }

  return null;
}
