/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createStatusRoutes } from "./status.js";
export type { StatusSource } from "./status.js";
