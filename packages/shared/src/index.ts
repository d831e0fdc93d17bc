export { canonicalizeJson, canonicalJsonEquals } from "./canonicalJson.js";
export { makeErrorResponse } from "./errors.js";
export type { ErrorCode, ErrorResponse } from "./errors.js";
export { createLogger, redact, redactString } from "./log.js";
export type { LogLevel, LogMeta, Logger, LoggerOptions } from "./log.js";
