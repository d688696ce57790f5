/**
 * Chunk scheduler: splits work into fixed-size chunks and reassembles results
 * in input order.
 *
 * Workers are synchronous and share the event loop. `maxWorkers` bounds how
 * many chunk slots are in flight, interleaved at the yield between chunks;
 * no two chunks ever execute in parallel.
 */

import { setImmediate as yieldToEventLoop } from "node:timers/promises";
import { ProcessingCancelledError, RowLimitExceededError } from "../errors";

export type ChunkStatus = "queued" | "processing" | "done";

export interface ChunkProgress {
  chunkIndex: number;
  totalChunks: number;
  status: ChunkStatus;
  /** Items in this chunk */
  size: number;
}

export interface ChunkOptions {
  chunkSize?: number;
  maxRows?: number;
  maxWorkers?: number;
  signal?: AbortSignal;
  onProgress?: (progress: ChunkProgress) => void;
}

/** Processes one chunk. `offset` is the index of the chunk's first item in the full input. */
export type ChunkWorker<T, R> = (chunk: T[], offset: number) => R[];

export function splitIntoChunks<T>(items: readonly T[], chunkSize: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += chunkSize) {
    chunks.push(items.slice(i, i + chunkSize));
  }
  return chunks;
}

/**
 * Run `worker` over `items` in chunks, one chunk at a time per slot.
 * Throws RowLimitExceededError before any chunk runs when there are more than
 * `maxRows` items, and ProcessingCancelledError when `signal` aborts between chunks.
 */
export async function runChunked<T, R>(
  items: readonly T[],
  worker: ChunkWorker<T, R>,
  options: ChunkOptions = {},
): Promise<R[]> {
  const chunkSize = options.chunkSize ?? 1000;
  const maxRows = options.maxRows ?? 10_000;
  const maxWorkers = Math.max(1, options.maxWorkers ?? 4);
  const { signal, onProgress } = options;

  if (items.length > maxRows) {
    throw new RowLimitExceededError(items.length, maxRows);
  }

  const chunks = splitIntoChunks(items, chunkSize);
  const results: R[][] = [];
  const totalChunks = chunks.length;
  let completed = 0;
  let next = 0;

  const report = (chunkIndex: number, status: ChunkStatus) =>
    onProgress?.({ chunkIndex, totalChunks, status, size: chunks[chunkIndex].length });

  chunks.forEach((_, index) => report(index, "queued"));

  async function drain(): Promise<void> {
    while (next < totalChunks) {
      if (signal?.aborted) throw new ProcessingCancelledError(completed, totalChunks);
      const index = next++;
      report(index, "processing");
      results[index] = worker(chunks[index], index * chunkSize);
      completed++;
      report(index, "done");
      // An abort raised while this chunk ran is seen before the next one starts
      await yieldToEventLoop();
    }
  }

  const slots = Math.min(maxWorkers, totalChunks);
  await Promise.all(Array.from({ length: slots }, () => drain()));

  return results.flat();
}
