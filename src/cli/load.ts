/**
 * Shared statement loading for CLI commands: argument parsing, pipeline
 * construction and Ctrl-C cancellation.
 */

import { readFile, stat } from "node:fs/promises";
import { basename } from "node:path";
import { getConfig } from "../config";
import { createCurrencyConverter } from "../currency/convert";
import { createHttpRateProvider, RateCache } from "../currency/rates";
import { FileTooLargeError } from "../errors";
import { createStatementPipeline, type ProcessResult } from "../pipeline/process";

export interface StatementArgs {
  file?: string;
  out?: string;
  currency?: string;
  model?: string;
}

export function parseStatementArgs(args: string[]): StatementArgs {
  const opts: StatementArgs = {};
  for (const arg of args) {
    if (arg.startsWith("--out=")) {
      opts.out = arg.slice("--out=".length);
    } else if (arg.startsWith("--currency=")) {
      opts.currency = arg.slice("--currency=".length).toUpperCase();
    } else if (arg.startsWith("--model=")) {
      opts.model = arg.slice("--model=".length);
    } else if (!arg.startsWith("--") && !opts.file) {
      opts.file = arg;
    }
  }
  return opts;
}

/**
 * Read and process a statement file. Oversize files are rejected before they
 * are read; Ctrl-C cancels between chunks.
 */
export async function loadStatement(opts: StatementArgs & { file: string }): Promise<ProcessResult> {
  const config = getConfig();
  const { size } = await stat(opts.file);
  if (size > config.processing.maxFileBytes) {
    throw new FileTooLargeError(basename(opts.file), size, config.processing.maxFileBytes);
  }
  const bytes = await readFile(opts.file);

  const converter = createCurrencyConverter({
    provider: createHttpRateProvider({
      baseUrl: config.currency.providerUrl,
      timeoutMs: config.currency.rateTimeoutMs,
      accessKey: process.env.LEDGERLINE_RATE_KEY,
    }),
    cache: new RateCache(),
    ttlMs: config.currency.rateTtlMs,
    timeoutMs: config.currency.rateTimeoutMs,
  });

  const pipeline = createStatementPipeline({
    config,
    converter,
    modelPath: opts.model ?? config.categorizer.modelPath,
  });

  const controller = new AbortController();
  const onInterrupt = () => controller.abort();
  process.once("SIGINT", onInterrupt);
  try {
    return await pipeline.process(new Uint8Array(bytes), basename(opts.file), {
      targetCurrency: opts.currency,
      signal: controller.signal,
      onProgress: (p) => {
        if (p.status === "done" && p.totalChunks > 1) {
          console.error(`  chunk ${p.chunkIndex + 1}/${p.totalChunks} done`);
        }
      },
    });
  } finally {
    process.off("SIGINT", onInterrupt);
  }
}
