import { test } from "node:test";
import assert from "node:assert/strict";
import {
  CredentialOfferRequestException,
  InvalidValueError,
  MetadataResolutionError,
  ProofGenerationException
} from "@vci-wallet/openid4vci";
import { CliError, toErrorResponse } from "./errors.js";

test("cli errors keep their code and message", () => {
  assert.deepEqual(toErrorResponse(new CliError("invalid_request", "Usage: resolve-offer <deep-link>")), {
    error: "invalid_request",
    message: "Usage: resolve-offer <deep-link>"
  });
});

test("software key refusals hint at the flag in dev mode", () => {
  const error = new CliError("software_keys_not_allowed", "WALLET_ALLOW_SOFTWARE_KEYS must be true for software keys.");
  assert.deepEqual(toErrorResponse(error, { devMode: true }), {
    error: "software_keys_not_allowed",
    message: "WALLET_ALLOW_SOFTWARE_KEYS must be true for software keys.",
    debug: { hint: "Set WALLET_ALLOW_SOFTWARE_KEYS=true outside production." }
  });
});

test("offer failures map by category", () => {
  const validation = new CredentialOfferRequestException({ kind: "invalid_grants", reason: "no_known_grant" });
  assert.deepEqual(toErrorResponse(validation), {
    error: "credential_offer_invalid",
    message: "Credential offer could not be resolved",
    details: "invalid_grants: no_known_grant"
  });

  const metadata = new CredentialOfferRequestException({
    kind: "unable_to_resolve_credential_issuer_metadata",
    cause: new MetadataResolutionError("fetch_failed", "https://issuer.example.com/.well-known/openid-credential-issuer")
  });
  assert.deepEqual(toErrorResponse(metadata, { devMode: true }), {
    error: "metadata_unavailable",
    message: "Credential offer could not be resolved",
    details: "unable_to_resolve_credential_issuer_metadata",
    debug: { cause: "metadata_fetch_failed" }
  });

  const transport = new CredentialOfferRequestException({
    kind: "unable_to_fetch_credential_offer",
    cause: new Error("HTTP 500")
  });
  assert.equal(toErrorResponse(transport).error, "transport_failed");
});

test("proof and value failures carry their code as details", () => {
  assert.deepEqual(toErrorResponse(new ProofGenerationException({ kind: "missing_claim", claim: "nonce" })), {
    error: "proof_generation_failed",
    message: "Proof could not be built",
    details: "missing_claim: nonce"
  });
  assert.deepEqual(toErrorResponse(new InvalidValueError("c_nonce_empty")), {
    error: "invalid_request",
    message: "Invalid argument",
    details: "c_nonce_empty"
  });
});

test("unexpected failures hide their cause outside dev mode", () => {
  assert.deepEqual(toErrorResponse(new Error("boom")), { error: "internal_error", message: "Unexpected failure" });
  assert.deepEqual(toErrorResponse("boom", { devMode: true }), {
    error: "internal_error",
    message: "Unexpected failure",
    debug: { cause: "boom" }
  });
});
