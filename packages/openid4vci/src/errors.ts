import type { ProofType } from "./types.js";

export class InvalidValueError extends Error {
  readonly code: string;
  constructor(code: string, message?: string) {
    super(message ?? code);
    this.name = "InvalidValueError";
    this.code = code;
  }
}

export type MetadataResolutionFailure =
  | "fetch_failed"
  | "malformed_json"
  | "invalid_metadata"
  | "issuer_mismatch";

export class MetadataResolutionError extends Error {
  readonly reason: MetadataResolutionFailure;
  readonly url: string;
  readonly details?: string;
  constructor(
    reason: MetadataResolutionFailure,
    url: string,
    options: { cause?: unknown; details?: string } = {}
  ) {
    super(`metadata_${reason}`, { cause: options.cause });
    this.name = "MetadataResolutionError";
    this.reason = reason;
    this.url = url;
    this.details = options.details;
  }
}

export type CredentialOfferRequestValidationError =
  | { kind: "invalid_use_of_both_credential_offer_params" }
  | { kind: "missing_credential_offer_param" }
  | { kind: "invalid_credential_offer_uri"; reason: string }
  | { kind: "invalid_credential_issuer_id"; reason: string }
  | { kind: "invalid_credentials"; reason: string }
  | { kind: "invalid_grants"; reason: string };

export type CredentialOfferRequestError =
  | CredentialOfferRequestValidationError
  | { kind: "invalid_credential_offer"; reason: string }
  | { kind: "unable_to_fetch_credential_offer"; cause: unknown }
  | { kind: "unable_to_resolve_credential_issuer_metadata"; cause: MetadataResolutionError }
  | { kind: "unable_to_resolve_authorization_server_metadata"; cause: MetadataResolutionError };

export type CredentialOfferErrorCategory = "validation" | "metadata_resolution" | "transport";

export const credentialOfferErrorCategory = (
  error: CredentialOfferRequestError
): CredentialOfferErrorCategory => {
  switch (error.kind) {
    case "unable_to_fetch_credential_offer":
      return "transport";
    case "unable_to_resolve_credential_issuer_metadata":
    case "unable_to_resolve_authorization_server_metadata":
      return "metadata_resolution";
    case "invalid_use_of_both_credential_offer_params":
    case "missing_credential_offer_param":
    case "invalid_credential_offer_uri":
    case "invalid_credential_issuer_id":
    case "invalid_credentials":
    case "invalid_grants":
    case "invalid_credential_offer":
      return "validation";
  }
};

const describeError = (error: CredentialOfferRequestError) =>
  "reason" in error ? `${error.kind}: ${error.reason}` : error.kind;

export class CredentialOfferRequestException extends Error {
  readonly error: CredentialOfferRequestError;
  readonly category: CredentialOfferErrorCategory;
  constructor(error: CredentialOfferRequestError) {
    super(describeError(error), { cause: "cause" in error ? error.cause : undefined });
    this.name = "CredentialOfferRequestException";
    this.error = error;
    this.category = credentialOfferErrorCategory(error);
  }
}

export type ProofGenerationError =
  | { kind: "proof_type_not_supported"; proofType: ProofType }
  | { kind: "proof_signing_algorithm_not_supported"; algorithm: string }
  | { kind: "missing_credential_spec" }
  | { kind: "missing_claim"; claim: "aud" | "nonce" }
  | { kind: "missing_binding_key" }
  | { kind: "builder_already_used" };

export class ProofGenerationException extends Error {
  readonly error: ProofGenerationError;
  constructor(error: ProofGenerationError) {
    super(error.kind === "missing_claim" ? `missing_claim: ${error.claim}` : error.kind);
    this.name = "ProofGenerationException";
    this.error = error;
  }
}
