/**
 * Middleware barrel — re-exports all middleware.
 */

export { handleError, handleNotFound } from "./error-handler.js";
export { requestContext, REQUEST_ID_HEADER } from "./request-context.js";
export { metricsMiddleware, MetricsCollector } from "./metrics.js";
