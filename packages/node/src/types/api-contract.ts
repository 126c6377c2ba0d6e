/**
 * Hono application environment type.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */

import type { Logger } from "pino";

export interface AppEnv {
  Variables: {
    /** Caller's X-Request-Id or a generated UUID */
    requestId: string;
    /** Child logger bound to requestId */
    log: Logger;
  };
}
