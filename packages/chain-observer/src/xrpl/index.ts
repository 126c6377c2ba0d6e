export { XrplSession, toSubmissionOutcome } from "./xrpl-session.js";
export type { XrplSessionOptions } from "./xrpl-session.js";
export { normalizeTransaction, decodeMemos } from "./normalize.js";
