import { makeErrorResponse, type ErrorCode, type ErrorResponse } from "@vci-wallet/shared";
import {
  CredentialOfferRequestException,
  InvalidValueError,
  ProofGenerationException,
  type CredentialOfferErrorCategory
} from "@vci-wallet/openid4vci";

export class CliError extends Error {
  readonly code: ErrorCode;
  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = "CliError";
    this.code = code;
  }
}

const OFFER_ERROR_CODES: Record<CredentialOfferErrorCategory, ErrorCode> = {
  validation: "credential_offer_invalid",
  metadata_resolution: "metadata_unavailable",
  transport: "transport_failed"
};

export const toErrorResponse = (error: unknown, options: { devMode?: boolean } = {}): ErrorResponse => {
  if (error instanceof CliError) {
    return makeErrorResponse(error.code, error.message, {
      hint: error.code === "software_keys_not_allowed" ? "Set WALLET_ALLOW_SOFTWARE_KEYS=true outside production." : undefined,
      devMode: options.devMode
    });
  }
  if (error instanceof CredentialOfferRequestException) {
    return makeErrorResponse(OFFER_ERROR_CODES[error.category], "Credential offer could not be resolved", {
      details: error.message,
      cause: error.cause,
      devMode: options.devMode
    });
  }
  if (error instanceof ProofGenerationException) {
    return makeErrorResponse("proof_generation_failed", "Proof could not be built", {
      details: error.message
    });
  }
  if (error instanceof InvalidValueError) {
    return makeErrorResponse("invalid_request", "Invalid argument", { details: error.code });
  }
  return makeErrorResponse("internal_error", "Unexpected failure", {
    cause: error,
    devMode: options.devMode
  });
};
