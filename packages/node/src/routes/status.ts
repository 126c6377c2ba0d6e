/**
 * Status routes.
 *
 * GET /status  — Monitor snapshot: state, endpoint, outcome counters,
 *                answered count, catch-up ledger and last error
 * GET /metrics — Pipeline and HTTP counters in Prometheus text format
 *                (only with a collector)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { MonitorStatus } from "../services/monitor-loop.js";
import type { MetricsCollector } from "../middleware/metrics.js";

const PROMETHEUS_CONTENT_TYPE = "text/plain; version=0.0.4; charset=utf-8";

/**
 * Anything that can report a monitor snapshot.
 */
export interface StatusSource {
  status(): MonitorStatus;
}

export function createStatusRoutes(
  monitor: StatusSource,
  collector?: MetricsCollector,
): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/status", (c) => c.json(monitor.status()));

  if (collector !== undefined) {
    routes.get("/metrics", (c) =>
      c.text(collector.render(), 200, { "Content-Type": PROMETHEUS_CONTENT_TYPE }),
    );
  }

  return routes;
}
