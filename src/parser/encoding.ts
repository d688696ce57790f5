/**
 * Text decoding for CSV statements.
 * Candidates are tried in priority order; the first clean decode wins.
 */

import { EncodingError } from "../errors";

export type EncodingName = "utf-8" | "utf-8-bom" | "latin-1" | "cp1252";

export const ENCODING_PRIORITY: readonly EncodingName[] = ["utf-8", "utf-8-bom", "latin-1", "cp1252"];

export interface DecodedText {
  text: string;
  encoding: EncodingName;
}

const BOM = "\uFEFF";

function decodeWith(bytes: Uint8Array, encoding: EncodingName): string | null {
  switch (encoding) {
    case "utf-8": {
      const text = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true }).decode(bytes);
      // A BOM is left for the utf-8-bom candidate
      return text.startsWith(BOM) ? null : text;
    }
    case "utf-8-bom": {
      const text = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true }).decode(bytes);
      return text.startsWith(BOM) ? text.slice(1) : null;
    }
    case "latin-1":
      return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("latin1");
    case "cp1252":
      return new TextDecoder("windows-1252").decode(bytes);
  }
}

/** Returns the decoded text, or null if this encoding does not fit the bytes. */
function tryDecode(bytes: Uint8Array, encoding: EncodingName): string | null {
  let text: string | null;
  try {
    text = decodeWith(bytes, encoding);
  } catch {
    // Invalid byte sequence for this encoding
    return null;
  }
  // NUL characters mean binary content, not text in this encoding
  if (text === null || text.includes("\u0000")) return null;
  return text;
}

/**
 * Decode statement bytes, trying each encoding in priority order.
 * Throws EncodingError listing every encoding attempted when none fits.
 */
export function decodeText(
  bytes: Uint8Array,
  encodings: readonly EncodingName[] = ENCODING_PRIORITY,
): DecodedText {
  for (const encoding of encodings) {
    const text = tryDecode(bytes, encoding);
    if (text !== null) return { text, encoding };
  }
  throw new EncodingError([...encodings]);
}
