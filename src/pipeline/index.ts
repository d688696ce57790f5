export {
  createStatementPipeline,
  type ProcessOptions,
  type ProcessResult,
  type StatementPipeline,
  type StatementPipelineDeps,
} from "./process";
export { runChunked, splitIntoChunks, type ChunkOptions, type ChunkProgress, type ChunkStatus, type ChunkWorker } from "./scheduler";
export { analyzeSpending, estimateMonthlyIncome, generateBudget } from "../budget";
export { exportTransactionsCsv } from "../export/csv";
export { createCurrencyConverter, convertTransactions } from "../currency/convert";
export { createHttpRateProvider, RateCache } from "../currency/rates";
export { createCategorizer, loadClassifierModel } from "../categorizer";
export * from "../errors";
export * from "../types";
