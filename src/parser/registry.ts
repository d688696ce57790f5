import { FileTooLargeError, UnsupportedFormatError } from "../errors";
import type { ParseResult, StatementFormat } from "../types";
import { detectFormat } from "./detect";

export interface ParseContext {
  /** Supplies the year for dates written without one */
  referenceDate?: Date;
  /** Row cap checked against the file's rows before they are mapped */
  maxRows?: number;
}

export interface ParserRegistryOptions {
  /** Larger inputs are rejected before format detection */
  maxFileBytes?: number;
}

export interface StatementParser {
  format: StatementFormat;
  parse(bytes: Uint8Array, context: ParseContext): ParseResult | Promise<ParseResult>;
}

/**
 * Holds one parser per statement format and dispatches files to them
 * after format detection.
 */
export class ParserRegistry {
  private parsers = new Map<StatementFormat, StatementParser>();

  constructor(private readonly options: ParserRegistryOptions = {}) {}

  register(parser: StatementParser): void {
    this.parsers.set(parser.format, parser);
  }

  has(format: StatementFormat): boolean {
    return this.parsers.has(format);
  }

  async parse(bytes: Uint8Array, filename: string, context: ParseContext = {}): Promise<ParseResult> {
    const { maxFileBytes } = this.options;
    if (maxFileBytes !== undefined && bytes.length > maxFileBytes) {
      throw new FileTooLargeError(filename, bytes.length, maxFileBytes);
    }
    const format = detectFormat(bytes, filename);
    const parser = this.parsers.get(format);
    if (!parser) {
      throw new UnsupportedFormatError(filename, `no parser registered for ${format}`);
    }
    return parser.parse(bytes, context);
  }
}
