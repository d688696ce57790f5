/**
 * Statement pipeline: detect → parse → chunked enrichment → primary currency
 * → optional conversion.
 */

import { createCategorizer, type Categorizer } from "../categorizer/categorize";
import { loadClassifierModelOrNull } from "../categorizer/model";
import { getConfig, type AppConfig } from "../config";
import { convertTransactions, type CurrencyConverter } from "../currency/convert";
import { detectCurrency, determinePrimaryCurrency } from "../currency/detect";
import { createParserRegistry } from "../parser";
import type { PdfLineExtractor } from "../parser/pdf";
import type { ParserRegistry } from "../parser/registry";
import {
  typeForAmount,
  type RawRecord,
  type SkipCounts,
  type StatementFormat,
  type Transaction,
} from "../types";
import { runChunked, type ChunkProgress } from "./scheduler";

export interface StatementPipelineDeps {
  config?: AppConfig;
  categorizer?: Categorizer;
  /** Classifier artifact; defaults to config.categorizer.modelPath */
  modelPath?: string | null;
  converter?: CurrencyConverter;
  pdfExtractor?: PdfLineExtractor;
  registry?: ParserRegistry;
  warn?: (message: string) => void;
}

export interface ProcessOptions {
  /** Convert amounts into this currency; defaults to the primary currency */
  targetCurrency?: string;
  referenceDate?: Date;
  signal?: AbortSignal;
  onProgress?: (progress: ChunkProgress) => void;
}

export interface ProcessResult {
  format: StatementFormat;
  encoding?: string;
  pagesRead?: number;
  transactions: Transaction[];
  /** Currency chosen by weighted vote before conversion */
  primaryCurrency: string;
  /** Currency the transactions are reported in */
  currency: string;
  skipped: SkipCounts;
  warnings: string[];
}

export interface StatementPipeline {
  process(bytes: Uint8Array, filename: string, options?: ProcessOptions): Promise<ProcessResult>;
}

function toTransaction(record: RawRecord, categorizer: Categorizer, fallbackCurrency: string): Transaction {
  const decision = categorizer.categorize({
    description: record.description,
    providedCategory: record.category,
  });
  return {
    date: record.date,
    description: record.description,
    amount: record.amount,
    currency: detectCurrency(record, fallbackCurrency),
    category: decision.category,
    confidence: decision.confidence,
    type: typeForAmount(record.amount),
    sourceRow: record.sourceRow,
    categorySource: decision.source,
  };
}

export function createStatementPipeline(deps: StatementPipelineDeps = {}): StatementPipeline {
  const config = deps.config ?? getConfig();
  const warn = deps.warn ?? console.warn;
  const setupWarnings: string[] = [];

  let categorizer = deps.categorizer;
  if (!categorizer) {
    const modelPath = deps.modelPath === undefined ? config.categorizer.modelPath : deps.modelPath;
    const model = modelPath
      ? loadClassifierModelOrNull(modelPath, (message) => {
          warn(message);
          setupWarnings.push(message);
        })
      : null;
    categorizer = createCategorizer({ model, config: config.categorizer, warn });
  }
  const activeCategorizer = categorizer;

  const registry =
    deps.registry ??
    createParserRegistry({
      pdfExtractor: deps.pdfExtractor,
      pdfMaxPages: config.processing.pdfMaxPages,
      maxFileBytes: config.processing.maxFileBytes,
    });

  return {
    async process(bytes, filename, options = {}) {
      const warnings = [...setupWarnings];
      const parsed = await registry.parse(bytes, filename, {
        referenceDate: options.referenceDate,
        maxRows: config.processing.maxRows,
      });

      const enriched = await runChunked(
        parsed.records,
        (chunk) => chunk.map((record) => toTransaction(record, activeCategorizer, config.currency.default)),
        {
          chunkSize: config.processing.chunkSize,
          maxRows: config.processing.maxRows,
          maxWorkers: config.processing.maxWorkers,
          signal: options.signal,
          onProgress: options.onProgress,
        },
      );

      const primaryCurrency = determinePrimaryCurrency(enriched, config.currency, config.currency.default);
      const target = (options.targetCurrency ?? primaryCurrency).toUpperCase();

      let transactions = enriched;
      const foreign = enriched.filter((tx) => tx.currency !== target).length;
      if (foreign > 0 && deps.converter) {
        const converted = await convertTransactions(enriched, target, deps.converter);
        transactions = converted.transactions;
        warnings.push(...converted.warnings);
      } else if (foreign > 0) {
        const message = `currency: ${foreign} transaction(s) are not in ${target} and no rate source is configured`;
        warn(message);
        warnings.push(message);
      }

      return {
        format: parsed.format,
        encoding: parsed.encoding,
        pagesRead: parsed.pagesRead,
        transactions,
        primaryCurrency,
        currency: target,
        skipped: parsed.skipped,
        warnings,
      };
    },
  };
}
