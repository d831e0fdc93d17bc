import { test } from "node:test";
import assert from "node:assert/strict";
import { InvalidValueError } from "./errors.js";
import {
  toCNonce,
  toCredentialConfigurationIdentifier,
  toCredentialIssuerId,
  toHttpsUrl,
  toPKCEVerifier,
  toScope,
  wellKnownUrl
} from "./types.js";

const invalidValue = (code: string) => (error: unknown) =>
  error instanceof InvalidValueError && error.code === code;

test("https urls keep their original form", () => {
  assert.equal(toHttpsUrl("https://issuer.example.com/tenant"), "https://issuer.example.com/tenant");
  assert.equal(toHttpsUrl("HTTPS://issuer.example.com"), "HTTPS://issuer.example.com");
});

test("non-https urls are rejected", () => {
  assert.throws(() => toHttpsUrl("http://issuer.example.com"), invalidValue("https_url_invalid"));
  assert.throws(() => toHttpsUrl("not a url"), invalidValue("https_url_invalid"));
});

test("credential issuer ids must not carry a query or fragment", () => {
  assert.equal(toCredentialIssuerId("https://issuer.example.com"), "https://issuer.example.com");
  assert.throws(
    () => toCredentialIssuerId("https://issuer.example.com?tenant=1"),
    invalidValue("credential_issuer_id_invalid")
  );
  assert.throws(
    () => toCredentialIssuerId("https://issuer.example.com#top"),
    invalidValue("credential_issuer_id_invalid")
  );
  assert.throws(() => toCredentialIssuerId("ftp://issuer.example.com"), invalidValue("credential_issuer_id_invalid"));
});

test("credential issuer ids with an empty query or fragment are rejected", () => {
  assert.throws(() => toCredentialIssuerId("https://issuer.example.com/?"), invalidValue("credential_issuer_id_invalid"));
  assert.throws(() => toCredentialIssuerId("https://issuer.example.com/#"), invalidValue("credential_issuer_id_invalid"));
});

test("value objects reject empty strings", () => {
  assert.equal(toScope("UniversityDegree"), "UniversityDegree");
  assert.throws(() => toScope(""), invalidValue("scope_empty"));
  assert.throws(
    () => toCredentialConfigurationIdentifier(""),
    invalidValue("credential_configuration_identifier_empty")
  );
});

test("c_nonce defaults its lifetime to five seconds", () => {
  assert.deepEqual(toCNonce("nonce-1"), { value: "nonce-1", expiresInSeconds: 5 });
  assert.deepEqual(toCNonce("nonce-2", 60), { value: "nonce-2", expiresInSeconds: 60 });
  assert.throws(() => toCNonce(""), invalidValue("c_nonce_empty"));
});

test("pkce verifier requires both members", () => {
  assert.deepEqual(toPKCEVerifier("verifier-1", "S256"), {
    codeVerifier: "verifier-1",
    codeVerifierMethod: "S256"
  });
  assert.throws(() => toPKCEVerifier("", "S256"), invalidValue("code_verifier_empty"));
  assert.throws(() => toPKCEVerifier("verifier-1", ""), invalidValue("code_verifier_method_empty"));
});

test("well-known urls insert or append the segment", () => {
  const base = toHttpsUrl("https://issuer.example.com/tenant/");
  assert.equal(
    wellKnownUrl(base, "openid-credential-issuer", "insert"),
    "https://issuer.example.com/.well-known/openid-credential-issuer/tenant"
  );
  assert.equal(
    wellKnownUrl(base, "openid-configuration", "append"),
    "https://issuer.example.com/tenant/.well-known/openid-configuration"
  );
  assert.equal(
    wellKnownUrl(toHttpsUrl("https://issuer.example.com"), "oauth-authorization-server", "insert"),
    "https://issuer.example.com/.well-known/oauth-authorization-server"
  );
});
