/**
 * PDF statement extractor.
 * Rebuilds text lines from positioned page items, then matches each line
 * against an ordered table of statement line formats.
 */

import { NoTransactionsFoundError, RowLimitExceededError } from "../errors";
import type { ParseResult, RawRecord, SkipCounts } from "../types";
import defaultFormats from "./pdf-formats.json";
import { countSkip, toRawRecord, type RecordFields } from "./records";

export type PdfField = keyof RecordFields;

/** One entry of the line format table. `fields` maps canonical fields to named groups. */
export interface PdfLineFormat {
  name: string;
  pattern: string;
  flags?: string;
  fields: Partial<Record<PdfField, string>>;
}

export const DEFAULT_PDF_FORMATS: PdfLineFormat[] = defaultFormats;

export interface PositionedText {
  str: string;
  x: number;
  y: number;
}

export interface PdfText {
  lines: string[];
  pagesRead: number;
}

export type PdfLineExtractor = (bytes: Uint8Array, maxPages: number) => Promise<PdfText>;

/** Items whose baselines differ by at most this many units share a line. */
const LINE_TOLERANCE = 5;

/**
 * Group positioned text items into lines, top to bottom, then left to right.
 * PDF y coordinates grow upwards.
 */
export function groupTextItemsIntoLines(items: PositionedText[]): string[] {
  const sorted = items
    .filter((item) => item.str.trim() !== "")
    .sort((a, b) => b.y - a.y || a.x - b.x);

  const rows: PositionedText[][] = [];
  let current: PositionedText[] = [];
  let currentY = Number.NaN;
  for (const item of sorted) {
    if (current.length > 0 && Math.abs(item.y - currentY) <= LINE_TOLERANCE) {
      current.push(item);
      continue;
    }
    if (current.length > 0) rows.push(current);
    current = [item];
    currentY = item.y;
  }
  if (current.length > 0) rows.push(current);

  return rows.map((row) =>
    row
      .sort((a, b) => a.x - b.x)
      .map((item) => item.str.trim())
      .join(" ")
      .replace(/\s+/g, " "),
  );
}

/** Read up to `maxPages` pages with pdfjs-dist and return their text lines. */
export async function extractPdfLines(bytes: Uint8Array, maxPages = 50): Promise<PdfText> {
  const pdfjs = await import("pdfjs-dist/legacy/build/pdf.mjs");
  // pdfjs takes ownership of the buffer it is given
  const doc = await pdfjs.getDocument({
    data: new Uint8Array(bytes),
    isEvalSupported: false,
    verbosity: pdfjs.VerbosityLevel.ERRORS,
  }).promise;
  try {
    const pagesRead = Math.min(doc.numPages, maxPages);
    const lines: string[] = [];
    for (let pageNumber = 1; pageNumber <= pagesRead; pageNumber++) {
      const page = await doc.getPage(pageNumber);
      const content = await page.getTextContent();
      const items: PositionedText[] = [];
      for (const item of content.items) {
        if ("str" in item) {
          items.push({ str: item.str, x: Number(item.transform[4]), y: Number(item.transform[5]) });
        }
      }
      lines.push(...groupTextItemsIntoLines(items));
      page.cleanup();
    }
    return { lines, pagesRead };
  } finally {
    await doc.destroy();
  }
}

interface CompiledFormat {
  format: PdfLineFormat;
  regex: RegExp;
}

function compile(formats: PdfLineFormat[]): CompiledFormat[] {
  return formats.map((format) => ({ format, regex: new RegExp(format.pattern, format.flags) }));
}

function fieldsFromMatch(format: PdfLineFormat, groups: Record<string, string | undefined>): RecordFields {
  const fields: RecordFields = { date: "", description: "" };
  for (const [field, group] of Object.entries(format.fields)) {
    const value = group === undefined ? undefined : groups[group];
    if (value === undefined) continue;
    switch (field) {
      case "date":
      case "description":
      case "amount":
      case "debit":
      case "credit":
      case "currency":
      case "category":
      case "type":
        fields[field] = value;
        break;
    }
  }
  return fields;
}

export interface PdfLinesResult {
  records: RawRecord[];
  skipped: SkipCounts;
}

/**
 * Match lines against the format table. The first matching format wins;
 * lines no format matches are counted as `unmatched_line`.
 */
export function parsePdfLines(
  lines: string[],
  formats: PdfLineFormat[] = DEFAULT_PDF_FORMATS,
  referenceDate?: Date,
): PdfLinesResult {
  const compiled = compile(formats);
  const records: RawRecord[] = [];
  const skipped: SkipCounts = {};

  lines.forEach((raw, index) => {
    const line = raw.trim();
    if (!line) return;

    let fields: RecordFields | null = null;
    for (const { format, regex } of compiled) {
      const match = regex.exec(line);
      if (match) {
        fields = fieldsFromMatch(format, match.groups ?? {});
        break;
      }
    }
    if (!fields) {
      countSkip(skipped, "unmatched_line");
      return;
    }

    const result = toRawRecord(fields, index, referenceDate);
    if (typeof result === "string") {
      countSkip(skipped, result);
    } else {
      records.push(result);
    }
  });

  return { records, skipped };
}

export interface PdfParseOptions {
  extractor?: PdfLineExtractor;
  maxPages?: number;
  formats?: PdfLineFormat[];
  referenceDate?: Date;
  /** Non-blank lines allowed before any line is matched */
  maxRows?: number;
}

/** Extract and parse a PDF statement into raw records. */
export async function parsePdfStatement(bytes: Uint8Array, options: PdfParseOptions = {}): Promise<ParseResult> {
  const extractor = options.extractor ?? extractPdfLines;
  const { lines, pagesRead } = await extractor(bytes, options.maxPages ?? 50);
  const nonBlank = lines.filter((line) => line.trim() !== "").length;
  if (options.maxRows !== undefined && nonBlank > options.maxRows) {
    throw new RowLimitExceededError(nonBlank, options.maxRows);
  }
  const { records, skipped } = parsePdfLines(lines, options.formats, options.referenceDate);

  if (records.length === 0) {
    throw new NoTransactionsFoundError("pdf", skipped, { pagesRead, linesScanned: lines.length });
  }

  return { format: "pdf", records, skipped, pagesRead };
}
