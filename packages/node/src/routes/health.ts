/**
 * Health check routes.
 *
 * GET /health — Liveness check (always 200 if the server is running)
 * GET /ready  — Readiness check (200 only while the monitor holds a live feed)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { MonitorState } from "../services/monitor-loop.js";
import type { StatusSource } from "./status.js";

const READY_STATES: ReadonlySet<MonitorState> = new Set(["SUBSCRIBED", "PROCESSING"]);

export function createHealthRoutes(monitor: StatusSource): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const { state, endpoint } = monitor.status();
    const ready = READY_STATES.has(state);

    return c.json(
      {
        status: ready ? "ready" : "not_ready",
        state,
        endpoint,
        timestamp: new Date().toISOString(),
      },
      ready ? 200 : 503,
    );
  });

  return routes;
}
