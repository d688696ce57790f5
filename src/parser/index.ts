import { parseCsvStatement } from "./csv";
import { type PdfLineExtractor, type PdfLineFormat, parsePdfStatement } from "./pdf";
import { ParserRegistry } from "./registry";

export interface StatementParsersOptions {
  maxFileBytes?: number;
  /** Override the pdfjs-based line extractor (for testing) */
  pdfExtractor?: PdfLineExtractor;
  pdfMaxPages?: number;
  pdfFormats?: PdfLineFormat[];
}

/** Create a registry with the CSV and PDF parsers registered. */
export function createParserRegistry(options: StatementParsersOptions = {}): ParserRegistry {
  const registry = new ParserRegistry({ maxFileBytes: options.maxFileBytes });

  registry.register({
    format: "csv",
    parse: (bytes, context) => parseCsvStatement(bytes, context),
  });
  registry.register({
    format: "pdf",
    parse: (bytes, context) =>
      parsePdfStatement(bytes, {
        extractor: options.pdfExtractor,
        maxPages: options.pdfMaxPages,
        formats: options.pdfFormats,
        referenceDate: context.referenceDate,
        maxRows: context.maxRows,
      }),
  });

  return registry;
}

export { ParserRegistry, type ParseContext, type ParserRegistryOptions, type StatementParser } from "./registry";
export { detectFormat } from "./detect";
export { decodeText, ENCODING_PRIORITY, type EncodingName } from "./encoding";
export { parseAmount, parseMagnitude } from "./amount";
export { parseStatementDate, DATE_FORMATS } from "./date";
export { parseCsvStatement, resolveColumns, HEADER_ALIASES } from "./csv";
export {
  DEFAULT_PDF_FORMATS,
  extractPdfLines,
  groupTextItemsIntoLines,
  parsePdfLines,
  parsePdfStatement,
  type PdfLineExtractor,
  type PdfLineFormat,
} from "./pdf";
