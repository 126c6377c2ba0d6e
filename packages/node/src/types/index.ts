export type { AppEnv } from "./api-contract.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";
export { createErrorEnvelope } from "./error.js";
