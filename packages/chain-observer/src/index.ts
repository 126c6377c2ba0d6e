/**
 * @pft-node/chain-observer — Ledger-facing layer of the PFT memo node.
 *
 * Provides:
 * - Ranked endpoint list and a ConnectionManager with failover + reconnect
 * - LiveSession capability and its xrpl.js implementation
 * - Normalization of stream and history records into IncomingTransaction
 * - Retry/backoff, deadlines, hex and currency-code helpers
 *
 * Design rules:
 * - One live session at a time, replaced wholesale on reconnect
 * - A dropped feed is an interruption, never silent
 * - Only exhausted connectivity is fatal
 */

// Endpoints
export { buildEndpoints, isWebSocketUrl } from "./endpoints.js";
export type { EndpointSources } from "./endpoints.js";

// Sessions
export type {
  LiveSession,
  SessionFactory,
  TransactionFeed,
  AccountHistoryQuery,
  AccountHistoryPage,
  SubmissionOutcome,
  TrustLine,
} from "./session.js";
export { FeedQueue } from "./feed.js";

// Connection management
export {
  ConnectionManager,
  DEFAULT_RECONNECT_CONFIG,
} from "./connection-manager.js";
export type {
  ConnectionManagerOptions,
  ReconnectConfig,
  ReconnectHooks,
  SessionConsumer,
  Interruption,
} from "./connection-manager.js";

// XRPL implementation
export {
  XrplSession,
  toSubmissionOutcome,
  normalizeTransaction,
  decodeMemos,
} from "./xrpl/index.js";
export type { XrplSessionOptions } from "./xrpl/index.js";

// Errors
export {
  ConnectivityError,
  TransientStreamError,
  describeError,
} from "./errors.js";
export type { ConnectivityErrorCode, EndpointFailure } from "./errors.js";

// Retry & deadlines
export {
  withRetry,
  computeDelay,
  sleep,
  isRetryableXrplError,
  RetryExhaustedError,
  DEFAULT_RETRY_CONFIG,
} from "./retry.js";
export type { BackoffConfig, RetryConfig, RetryListener } from "./retry.js";
export { withTimeout, TimeoutError } from "./timeout.js";

// Encoding helpers
export { toHex, fromHex, isHex } from "./hex.js";
export { decodeCurrencyCode, encodeCurrencyCode } from "./currency.js";
