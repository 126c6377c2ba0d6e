/**
 * Connectivity errors.
 *
 * - ConnectivityError: fatal. No endpoint could be reached, or the
 *   supervisor gave up after too many consecutive failures.
 * - TransientStreamError: a single live session dropped. Recovered by
 *   reconnecting with backoff.
 */

import type { Endpoint } from "@pft-node/types";

export type ConnectivityErrorCode =
  | "NO_ENDPOINTS"
  | "ALL_ENDPOINTS_FAILED"
  | "MAX_FAILURES_EXCEEDED";

/**
 * Why a single endpoint could not be used.
 */
export interface EndpointFailure {
  readonly endpoint: Endpoint;
  readonly reason: string;
}

export class ConnectivityError extends Error {
  constructor(
    public readonly code: ConnectivityErrorCode,
    message: string,
    /** Per-endpoint failures from the last connect attempt */
    public readonly failures: readonly EndpointFailure[] = [],
    /** Consecutive failed sessions when escalated by the supervisor */
    public readonly consecutiveFailures: number = 0,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ConnectivityError";
  }
}

export class TransientStreamError extends Error {
  readonly code = "STREAM_INTERRUPTED" as const;

  constructor(
    public readonly endpointUrl: string,
    public readonly reason: string,
    options?: { cause?: unknown },
  ) {
    super(`Stream from ${endpointUrl} interrupted: ${reason}`, options);
    this.name = "TransientStreamError";
  }
}

/**
 * Render any thrown value as a one-line reason.
 */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
