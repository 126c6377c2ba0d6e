/**
 * Hono application factory.
 *
 * Creates the status API with middleware and routes. Separated from
 * main.ts so tests create the app without starting the HTTP server.
 */

import { Hono } from "hono";
import pino from "pino";
import type { Logger } from "pino";
import type { AppEnv } from "./types/api-contract.js";
import {
  handleError,
  handleNotFound,
  metricsMiddleware,
  MetricsCollector,
  requestContext,
} from "./middleware/index.js";
import { createHealthRoutes, createStatusRoutes } from "./routes/index.js";
import type { StatusSource } from "./routes/index.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  /** Monitor whose snapshot backs /ready and /status */
  readonly monitor: StatusSource;

  /** Request and error logging. Default: silent */
  readonly logger?: Logger;

  /** Shared collector; the monitor loop increments pipeline counters on it */
  readonly metricsCollector?: MetricsCollector;

  /** Enable metrics collection. Default: true */
  readonly enableMetrics?: boolean;
}

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly metricsCollector: MetricsCollector;
}

// =============================================================================
// Factory
// =============================================================================

export function createApp(options: CreateAppOptions): AppInstance {
  const metricsCollector = options.metricsCollector ?? new MetricsCollector();
  const enableMetrics = options.enableMetrics !== false;

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestContext(options.logger ?? pino({ level: "silent" })));

  if (enableMetrics) {
    app.use("*", metricsMiddleware(metricsCollector));
  }

  // ─── Error Handling ─────────────────────────────────────────────
  app.onError(handleError);
  app.notFound(handleNotFound);

  // ─── Routes ─────────────────────────────────────────────────────
  app.route("/", createHealthRoutes(options.monitor));
  app.route("/", createStatusRoutes(options.monitor, enableMetrics ? metricsCollector : undefined));

  return { app, metricsCollector };
}
