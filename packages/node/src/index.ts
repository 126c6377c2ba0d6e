/**
 * @pft-node/node — PFT memo node daemon.
 *
 * Public API for embedding the pipeline; main.ts is the executable.
 */

export { loadConfig, toRuntimeOptions, ConfigSchema } from "./config.js";
export type { AppConfig, RuntimeOptions } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";

export { TransactionFilter } from "./services/transaction-filter.js";
export type {
  FilterCriteria,
  TokenCriteria,
  RejectionReason,
} from "./services/transaction-filter.js";
export {
  DedupLedger,
  DedupError,
  InMemoryDedupPersistence,
  JsonlDedupPersistence,
} from "./services/dedup-ledger.js";
export type { DedupErrorCode, DedupPersistence } from "./services/dedup-ledger.js";
export {
  AnalysisClient,
  AnalysisError,
  SYSTEM_PROMPT,
  buildUserPrompt,
} from "./services/analysis-client.js";
export type {
  AnalysisClientOptions,
  AnalysisErrorCode,
  MemoAnalyzer,
} from "./services/analysis-client.js";
export {
  MonitorLoop,
  TRANSACTIONS_METRIC,
  INTERRUPTIONS_METRIC,
} from "./services/monitor-loop.js";
export type {
  MonitorLoopOptions,
  MonitorState,
  MonitorStatus,
  ProcessOutcome,
  ReplySender,
  SessionSupervisor,
} from "./services/monitor-loop.js";
export { MetricsCollector } from "./middleware/metrics.js";
export * from "./types/index.js";
