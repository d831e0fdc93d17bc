import { redactString } from "./log.js";

export type ErrorCode =
  | "invalid_request"
  | "config_invalid"
  | "credential_offer_invalid"
  | "metadata_unavailable"
  | "transport_failed"
  | "software_keys_not_allowed"
  | "proof_generation_failed"
  | "internal_error";

export type ErrorResponse = {
  error: ErrorCode;
  message: string;
  details?: string;
  debug?: { cause?: string; hint?: string };
};

type ErrorOptions = {
  details?: string;
  cause?: unknown;
  hint?: string;
  devMode?: boolean;
};

const describeCause = (cause: unknown) => {
  if (cause === undefined) return undefined;
  return redactString(cause instanceof Error ? cause.message : String(cause));
};

// Causes and hints are only exposed in dev mode.
export const makeErrorResponse = (
  error: ErrorCode,
  message: string,
  options: ErrorOptions = {}
): ErrorResponse => {
  const response: ErrorResponse = { error, message };
  if (options.details) {
    response.details = options.details;
  }
  const cause = describeCause(options.cause);
  if (options.devMode && (cause !== undefined || options.hint !== undefined)) {
    response.debug = {
      ...(cause === undefined ? {} : { cause }),
      ...(options.hint === undefined ? {} : { hint: options.hint })
    };
  }
  return response;
};
