/**
 * Format detection: decides whether an uploaded statement is CSV or PDF from
 * its magic bytes, its extension and, failing both, a look at its first line.
 */

import { extname } from "node:path";
import { UnsupportedFormatError } from "../errors";
import type { StatementFormat } from "../types";

const PDF_MAGIC = "%PDF-";
const CSV_EXTENSIONS = new Set([".csv", ".txt", ".tsv"]);
const DELIMITERS = [",", ";", "\t", "|"];
const SNIFF_BYTES = 1024;

function describeSignature(bytes: Uint8Array): string {
  const head = Array.from(bytes.subarray(0, 8))
    .map((b) => b.toString(16).padStart(2, "0"))
    .join(" ");
  return head || "empty";
}

/** True when the first line looks like delimited text. */
function looksLikeDelimitedText(bytes: Uint8Array): boolean {
  const sample = bytes.subarray(0, SNIFF_BYTES);
  // Control bytes other than tab/CR/LF mean binary content
  for (const b of sample) {
    if (b < 0x09 || (b > 0x0d && b < 0x20)) return false;
  }
  const firstLine = Buffer.from(sample).toString("latin1").split(/\r?\n/)[0] ?? "";
  return DELIMITERS.some((d) => firstLine.includes(d));
}

/**
 * Classify statement bytes as CSV or PDF.
 * Throws UnsupportedFormatError when neither signature matches.
 */
export function detectFormat(bytes: Uint8Array, filename: string): StatementFormat {
  const head = Buffer.from(bytes.subarray(0, PDF_MAGIC.length)).toString("latin1");
  if (head === PDF_MAGIC) return "pdf";

  const ext = extname(filename).toLowerCase();
  if (bytes.length === 0) throw new UnsupportedFormatError(filename, describeSignature(bytes));

  if (ext === ".pdf") {
    // A .pdf name without the PDF header is not something we can read
    throw new UnsupportedFormatError(filename, describeSignature(bytes));
  }
  if (CSV_EXTENSIONS.has(ext) || looksLikeDelimitedText(bytes)) {
    return "csv";
  }

  throw new UnsupportedFormatError(filename, describeSignature(bytes));
}
