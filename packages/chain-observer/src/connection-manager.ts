/**
 * Connection Manager
 *
 * Owns endpoint failover and session supervision.
 *
 * connect():
 *   Try each endpoint in rank order, each bounded by connectTimeoutMs.
 *   First session that opens wins. All failing → ConnectivityError.
 *
 * runWithReconnect(consumer):
 *   connect → consumer(session, ready) → (feed drops) → close → backoff → connect …
 *   Every drop is reported through onInterruption and counted. A session
 *   the consumer marks ready() resets the count. Reaching
 *   maxConsecutiveFailures escalates to a fatal ConnectivityError.
 */

import type { Logger } from "pino";
import type { Endpoint } from "@pft-node/types";
import {
  ConnectivityError,
  TransientStreamError,
  describeError,
} from "./errors.js";
import type { EndpointFailure } from "./errors.js";
import { computeDelay, sleep } from "./retry.js";
import type { BackoffConfig } from "./retry.js";
import { TimeoutError, withTimeout } from "./timeout.js";
import type { LiveSession, SessionFactory } from "./session.js";
import { XrplSession } from "./xrpl/xrpl-session.js";

export interface ReconnectConfig extends BackoffConfig {
  /** Failed sessions in a row before giving up. Default: 10 */
  readonly maxConsecutiveFailures: number;
}

export const DEFAULT_RECONNECT_CONFIG: ReconnectConfig = {
  maxConsecutiveFailures: 10,
  baseDelayMs: 1000,
  maxDelayMs: 60_000,
  jitterMs: 250,
};

export interface ConnectionManagerOptions {
  /** Ranked candidates, tried lowest rank first */
  readonly endpoints: readonly Endpoint[];

  /** Bound on each connection attempt in ms. Default: 10000 */
  readonly connectTimeoutMs?: number;

  /** Per-request timeout handed to the default session factory. Default: 20000 */
  readonly requestTimeoutMs?: number;

  readonly reconnect?: ReconnectConfig;

  /** Session factory (injectable for testing). Default: XrplSession.open */
  readonly openSession?: SessionFactory;

  /** Sleep function (injectable for testing) */
  readonly sleep?: (ms: number) => Promise<void>;

  readonly logger?: Logger;
}

/**
 * Processes one live session. Must call `ready()` once the session is
 * subscribed, and should return or throw when its feed ends.
 */
export type SessionConsumer = (
  session: LiveSession,
  ready: () => void,
) => Promise<void>;

export type Interruption = TransientStreamError | ConnectivityError;

export interface ReconnectHooks {
  /** A session opened and is about to be handed to the consumer */
  readonly onConnected?: (session: LiveSession) => void;

  /** A session dropped or a connect round failed; a retry follows after delayMs */
  readonly onInterruption?: (
    error: Interruption,
    consecutiveFailures: number,
    delayMs: number,
  ) => void;
}

export class ConnectionManager {
  private readonly endpoints: readonly Endpoint[];
  private readonly connectTimeoutMs: number;
  private readonly reconnectConfig: ReconnectConfig;
  private readonly openSession: SessionFactory;
  private readonly sleepFn: (ms: number) => Promise<void>;
  private readonly logger: Logger | undefined;

  private active: LiveSession | null = null;
  private stopped = false;

  constructor(options: ConnectionManagerOptions) {
    this.endpoints = [...options.endpoints].sort((a, b) => a.rank - b.rank);
    this.connectTimeoutMs = options.connectTimeoutMs ?? 10_000;
    this.reconnectConfig = options.reconnect ?? DEFAULT_RECONNECT_CONFIG;
    this.sleepFn = options.sleep ?? sleep;
    this.logger = options.logger;

    const requestTimeoutMs = options.requestTimeoutMs ?? 20_000;
    const connectTimeoutMs = this.connectTimeoutMs;
    this.openSession =
      options.openSession ??
      ((endpoint) =>
        XrplSession.open(endpoint, { requestTimeoutMs, connectTimeoutMs, logger: this.logger }));
  }

  /**
   * Open a session on the best reachable endpoint.
   *
   * @throws ConnectivityError when every endpoint fails
   */
  async connect(): Promise<LiveSession> {
    if (this.endpoints.length === 0) {
      throw new ConnectivityError("NO_ENDPOINTS", "No ledger endpoints configured");
    }

    const failures: EndpointFailure[] = [];

    for (const endpoint of this.endpoints) {
      try {
        const session = await this.openWithTimeout(endpoint);
        this.logger?.info(
          { endpoint: endpoint.url, label: endpoint.label },
          "Connected to ledger endpoint",
        );
        return session;
      } catch (err: unknown) {
        const reason = describeError(err);
        failures.push({ endpoint, reason });
        this.logger?.warn(
          { endpoint: endpoint.url, label: endpoint.label, reason },
          "Ledger endpoint unavailable",
        );
      }
    }

    throw new ConnectivityError(
      "ALL_ENDPOINTS_FAILED",
      `All ${failures.length} ledger endpoints failed: ${failures
        .map((f) => `${f.endpoint.url} (${f.reason})`)
        .join("; ")}`,
      failures,
    );
  }

  /**
   * Supervise sessions until stop() is called or connectivity is exhausted.
   *
   * @throws ConnectivityError with code MAX_FAILURES_EXCEEDED when escalating
   */
  async runWithReconnect(
    consumer: SessionConsumer,
    hooks: ReconnectHooks = {},
  ): Promise<void> {
    this.stopped = false;
    let consecutiveFailures = 0;

    while (!this.stopped) {
      const interruption = await this.runOnce(consumer, hooks, () => {
        consecutiveFailures = 0;
      });
      if (interruption === null) {
        return;
      }

      consecutiveFailures++;
      if (consecutiveFailures >= this.reconnectConfig.maxConsecutiveFailures) {
        throw new ConnectivityError(
          "MAX_FAILURES_EXCEEDED",
          `Giving up after ${consecutiveFailures} consecutive connection failures: ${interruption.message}`,
          interruption instanceof ConnectivityError ? interruption.failures : [],
          consecutiveFailures,
          { cause: interruption },
        );
      }

      const delayMs = computeDelay(consecutiveFailures - 1, this.reconnectConfig);
      hooks.onInterruption?.(interruption, consecutiveFailures, delayMs);
      this.logger?.warn(
        { reason: interruption.message, consecutiveFailures, delayMs },
        "Ledger session interrupted, reconnecting",
      );
      await this.sleepFn(delayMs);
    }
  }

  /**
   * Close the active session and make runWithReconnect() return.
   */
  async stop(): Promise<void> {
    this.stopped = true;
    const session = this.active;
    this.active = null;
    if (session !== null) {
      await session.close();
    }
  }

  /**
   * One connect + consume round.
   *
   * @returns null when stopped, otherwise the interruption that ended it
   */
  private async runOnce(
    consumer: SessionConsumer,
    hooks: ReconnectHooks,
    markReady: () => void,
  ): Promise<Interruption | null> {
    let session: LiveSession;
    try {
      session = await this.connect();
    } catch (err: unknown) {
      if (err instanceof ConnectivityError) return err;
      throw err;
    }

    if (this.stopped) {
      await this.closeQuietly(session);
      return null;
    }

    this.active = session;
    hooks.onConnected?.(session);

    let interruption: Interruption | null;
    try {
      await consumer(session, markReady);
      interruption = this.stopped
        ? null
        : new TransientStreamError(session.endpoint.url, "feed ended");
    } catch (err: unknown) {
      if (this.stopped) {
        interruption = null;
      } else if (err instanceof TransientStreamError || err instanceof ConnectivityError) {
        interruption = err;
      } else {
        interruption = new TransientStreamError(
          session.endpoint.url,
          describeError(err),
          { cause: err },
        );
      }
    }

    if (this.active === session) {
      this.active = null;
    }
    await this.closeQuietly(session);
    return interruption;
  }

  private async openWithTimeout(endpoint: Endpoint): Promise<LiveSession> {
    const pending = this.openSession(endpoint);
    try {
      return await withTimeout(pending, this.connectTimeoutMs, `connect ${endpoint.url}`);
    } catch (err: unknown) {
      if (err instanceof TimeoutError) {
        // A session that opens after the deadline must not leak
        void pending.then(
          (late) => this.closeQuietly(late),
          (lateErr: unknown) => {
            this.logger?.debug(
              { endpoint: endpoint.url, reason: describeError(lateErr) },
              "Abandoned connection attempt failed",
            );
          },
        );
      }
      throw err;
    }
  }

  private async closeQuietly(session: LiveSession): Promise<void> {
    try {
      await session.close();
    } catch (err: unknown) {
      this.logger?.warn(
        { endpoint: session.endpoint.url, reason: describeError(err) },
        "Failed to close ledger session",
      );
    }
  }
}
