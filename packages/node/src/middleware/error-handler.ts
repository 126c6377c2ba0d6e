/**
 * Global error handler and 404 fallback.
 *
 * Every failure leaves the API as an error envelope. The status surface
 * only reads snapshots, so any thrown error is a 500 and its message is
 * not leaked.
 */

import type { Context } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

function errorCode(err: Error): string {
  return "code" in err && typeof err.code === "string" ? err.code : "INTERNAL_ERROR";
}

/**
 * Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context<AppEnv>): Response {
  c.get("log").error({ err, path: c.req.path }, "Status API request failed");
  return c.json(createErrorEnvelope(errorCode(err), "Internal server error"), 500);
}

/**
 * Registered as Hono's notFound handler.
 */
export function handleNotFound(c: Context): Response {
  return c.json(
    createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`),
    404,
  );
}
