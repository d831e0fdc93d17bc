import { test } from "node:test";
import assert from "node:assert/strict";
import { CredentialOfferRequestException } from "@vci-wallet/openid4vci";
import { CliError } from "../errors.js";
import { resolveOffer } from "./resolveOffer.js";
import { createTestContext, deepLinkFor, ISSUER } from "./testContext.js";

test("resolve-offer prints the offer without grant secrets", async () => {
  const { context, output } = createTestContext();
  await resolveOffer(context, [
    deepLinkFor({
      credential_issuer: ISSUER,
      credentials: ["UniversityDegree"],
      grants: {
        "urn:ietf:params:oauth:grant-type:pre-authorized_code": {
          "pre-authorized_code": "pre-auth-code-1",
          tx_code: { input_mode: "numeric", length: 4 }
        }
      }
    })
  ]);
  assert.equal(output.length, 1);
  assert.deepEqual(JSON.parse(output[0] ?? ""), {
    credentialIssuer: ISSUER,
    credentialEndpoint: `${ISSUER}/credential`,
    authorizationServer: ISSUER,
    tokenEndpoint: `${ISSUER}/token`,
    credentials: [{ kind: "scope", scope: "UniversityDegree" }],
    grants: {
      kind: "pre_authorized_code",
      preAuthorizedCode: {
        userPinRequired: true,
        intervalSeconds: 5,
        txCode: { inputMode: "numeric", length: 4 }
      }
    }
  });
  assert.equal(output[0]?.includes("pre-auth-code-1"), false);
});

test("resolve-offer requires a deep link", async () => {
  const { context } = createTestContext();
  await assert.rejects(resolveOffer(context, []), (error: unknown) => error instanceof CliError && error.code === "invalid_request");
});

test("resolve-offer surfaces offer failures", async () => {
  const { context, output } = createTestContext();
  await assert.rejects(
    resolveOffer(context, ["openid-credential-offer://?credential_offer_uri=http%3A%2F%2Fissuer.example.com"]),
    (error: unknown) =>
      error instanceof CredentialOfferRequestException && error.error.kind === "invalid_credential_offer_uri"
  );
  assert.deepEqual(output, []);
});
