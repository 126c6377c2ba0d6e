/**
 * Request context middleware.
 *
 * Takes the caller's X-Request-Id (or a fresh UUID), echoes it on the
 * response, and gives handlers a pino child logger bound to it as
 * `c.get("log")`. One debug line per request once the response is ready.
 */

import { randomUUID } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import type { Logger } from "pino";
import type { AppEnv } from "../types/api-contract.js";

export const REQUEST_ID_HEADER = "X-Request-Id";

export function requestContext(logger: Logger): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const requestId = c.req.header(REQUEST_ID_HEADER) ?? randomUUID();
    const log = logger.child({ requestId });
    c.set("requestId", requestId);
    c.set("log", log);

    const start = Date.now();
    await next();

    c.header(REQUEST_ID_HEADER, requestId);
    log.debug(
      { method: c.req.method, path: c.req.path, status: c.res.status, durationMs: Date.now() - start },
      `${c.req.method} ${c.req.path} ${c.res.status}`,
    );
  };
}
