import { test } from "node:test";
import assert from "node:assert/strict";
import { CredentialOfferRequestException } from "../errors.js";
import {
  authorizationCodeGrantOf,
  decodeGrants,
  grantAuthorizationServers,
  preAuthorizedCodeGrantOf,
  preferredAuthorizationServer
} from "./grants.js";

const PRE_AUTHORIZED = "urn:ietf:params:oauth:grant-type:pre-authorized_code";

const invalidGrants = (reason: string) => (error: unknown) =>
  error instanceof CredentialOfferRequestException &&
  error.error.kind === "invalid_grants" &&
  error.error.reason === reason;

test("absent grants default to the authorization code flow", () => {
  const grants = decodeGrants(undefined);
  assert.equal(grants.kind, "authorization_code");
  assert.equal(authorizationCodeGrantOf(grants)?.issuerState, undefined);
  assert.equal(preAuthorizedCodeGrantOf(grants), undefined);
});

test("decodes an authorization code grant with issuer state", () => {
  const grants = decodeGrants({ authorization_code: { issuer_state: "issuer-state-1" } });
  assert.equal(grants.kind, "authorization_code");
  assert.equal(authorizationCodeGrantOf(grants)?.issuerState, "issuer-state-1");
});

test("pre-authorized code grant applies interval and pin defaults", () => {
  const grants = decodeGrants({ [PRE_AUTHORIZED]: { "pre-authorized_code": "pre-auth-code-1" } });
  const grant = preAuthorizedCodeGrantOf(grants);
  assert.equal(grants.kind, "pre_authorized_code");
  assert.equal(grant?.preAuthorizedCode, "pre-auth-code-1");
  assert.equal(grant?.intervalSeconds, 5);
  assert.equal(grant?.userPinRequired, false);
  assert.equal(grant?.txCode, undefined);
});

test("a tx_code object requires a pin unless stated otherwise", () => {
  const withTxCode = preAuthorizedCodeGrantOf(
    decodeGrants({
      [PRE_AUTHORIZED]: {
        "pre-authorized_code": "pre-auth-code-1",
        tx_code: { input_mode: "numeric", length: 6, description: "Code sent by email" },
        interval: 10
      }
    })
  );
  assert.equal(withTxCode?.userPinRequired, true);
  assert.equal(withTxCode?.intervalSeconds, 10);
  assert.deepEqual(withTxCode?.txCode, { inputMode: "numeric", length: 6, description: "Code sent by email" });

  const explicit = preAuthorizedCodeGrantOf(
    decodeGrants({
      [PRE_AUTHORIZED]: { "pre-authorized_code": "pre-auth-code-1", tx_code: {}, user_pin_required: false }
    })
  );
  assert.equal(explicit?.userPinRequired, false);
});

test("both grants decode together with their authorization server hints", () => {
  const grants = decodeGrants({
    authorization_code: { issuer_state: "issuer-state-1", authorization_server: "https://login.example.com" },
    [PRE_AUTHORIZED]: { "pre-authorized_code": "pre-auth-code-1", authorization_server: "https://auth.example.com" }
  });
  assert.equal(grants.kind, "both");
  assert.deepEqual(grantAuthorizationServers(grants), ["https://login.example.com", "https://auth.example.com"]);
  assert.equal(preferredAuthorizationServer(grants), "https://auth.example.com");
});

test("the authorization code server is preferred only when it is the sole hint", () => {
  const grants = decodeGrants({
    authorization_code: { authorization_server: "https://login.example.com" },
    [PRE_AUTHORIZED]: { "pre-authorized_code": "pre-auth-code-1" }
  });
  assert.equal(preferredAuthorizationServer(grants), "https://login.example.com");
  assert.equal(preferredAuthorizationServer(decodeGrants(undefined)), undefined);
});

test("blank grant secrets are rejected", () => {
  assert.throws(() => decodeGrants({ authorization_code: { issuer_state: "  " } }), invalidGrants("issuer_state_blank"));
  assert.throws(
    () => decodeGrants({ [PRE_AUTHORIZED]: { "pre-authorized_code": "" } }),
    invalidGrants("pre_authorized_code_blank")
  );
});

test("grants without a known grant type are rejected", () => {
  assert.throws(() => decodeGrants({}), invalidGrants("no_known_grant"));
  assert.throws(() => decodeGrants({ implicit: {} }), invalidGrants("no_known_grant"));
});

test("malformed grant members are rejected with their path", () => {
  assert.throws(
    () => decodeGrants({ [PRE_AUTHORIZED]: { "pre-authorized_code": "pre-auth-code-1", interval: 0 } }),
    invalidGrants("pre-authorized_code: interval: Number must be greater than 0")
  );
  assert.throws(
    () => decodeGrants({ authorization_code: { authorization_server: "http://login.example.com" } }),
    invalidGrants("authorization_code: authorization_server: https_url_required")
  );
});
