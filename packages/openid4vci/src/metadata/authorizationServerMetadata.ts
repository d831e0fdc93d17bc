import { z } from "zod";
import { canonicalJsonEquals } from "@vci-wallet/shared";
import { MetadataResolutionError } from "../errors.js";
import type { HttpGet } from "../http/httpGet.js";
import { HttpsUrlSchema, wellKnownUrl, type HttpsUrl } from "../types.js";
import { fetchMetadata } from "./fetchJson.js";

export const PRE_AUTHORIZED_CODE_GRANT_TYPE = "urn:ietf:params:oauth:grant-type:pre-authorized_code";

export type AuthorizationServerMetadata = Readonly<{
  issuer: HttpsUrl;
  authorizationEndpoint?: HttpsUrl;
  tokenEndpoint?: HttpsUrl;
  pushedAuthorizationRequestEndpoint?: HttpsUrl;
  jwksUri?: HttpsUrl;
  grantTypesSupported: string[];
  responseTypesSupported: string[];
  codeChallengeMethodsSupported: string[];
  preAuthorizedGrantAnonymousAccessSupported: boolean;
  // Complete document as served, members this type does not model included.
  raw: Record<string, unknown>;
}>;

const AuthorizationServerMetadataDocumentSchema = z
  .object({
    issuer: HttpsUrlSchema,
    authorization_endpoint: HttpsUrlSchema.optional(),
    token_endpoint: HttpsUrlSchema.optional(),
    pushed_authorization_request_endpoint: HttpsUrlSchema.optional(),
    jwks_uri: HttpsUrlSchema.optional(),
    // RFC 8414 default when the member is omitted.
    grant_types_supported: z.array(z.string()).default(["authorization_code", "implicit"]),
    response_types_supported: z.array(z.string()).default([]),
    code_challenge_methods_supported: z.array(z.string()).default([]),
    "pre-authorized_grant_anonymous_access_supported": z.boolean().default(false)
  })
  .passthrough();

export const AuthorizationServerMetadataSchema = z
  .record(z.string(), z.unknown())
  .transform((raw, ctx): AuthorizationServerMetadata => {
    const parsed = AuthorizationServerMetadataDocumentSchema.safeParse(raw);
    if (!parsed.success) {
      for (const issue of parsed.error.issues) {
        ctx.addIssue(issue);
      }
      return z.NEVER;
    }
    const document = parsed.data;
    return Object.freeze({
      issuer: document.issuer,
      authorizationEndpoint: document.authorization_endpoint,
      tokenEndpoint: document.token_endpoint,
      pushedAuthorizationRequestEndpoint: document.pushed_authorization_request_endpoint,
      jwksUri: document.jwks_uri,
      grantTypesSupported: document.grant_types_supported,
      responseTypesSupported: document.response_types_supported,
      codeChallengeMethodsSupported: document.code_challenge_methods_supported,
      preAuthorizedGrantAnonymousAccessSupported:
        document["pre-authorized_grant_anonymous_access_supported"],
      raw
    });
  });

// Structural equality; two documents are equal when they serialize to the same canonical JSON.
export const authorizationServerMetadataEquals = (
  left: AuthorizationServerMetadata,
  right: AuthorizationServerMetadata
) => canonicalJsonEquals(left.raw, right.raw);

export const supportsPreAuthorizedCodeGrant = (metadata: AuthorizationServerMetadata) =>
  metadata.grantTypesSupported.includes(PRE_AUTHORIZED_CODE_GRANT_TYPE);

export const openIdConfigurationUrl = (issuer: HttpsUrl) =>
  wellKnownUrl(issuer, "openid-configuration", "append");

export const oauthAuthorizationServerUrl = (issuer: HttpsUrl) =>
  wellKnownUrl(issuer, "oauth-authorization-server", "insert");

export type AuthorizationServerMetadataResolver = {
  resolve(issuer: HttpsUrl): Promise<AuthorizationServerMetadata>;
};

const fetchAndCheckIssuer = async (httpGet: HttpGet, url: HttpsUrl, issuer: HttpsUrl) => {
  const metadata = await fetchMetadata(httpGet, url, AuthorizationServerMetadataSchema);
  if (metadata.issuer !== issuer) {
    throw new MetadataResolutionError("issuer_mismatch", url, {
      details: `expected ${issuer}, got ${metadata.issuer}`
    });
  }
  return metadata;
};

/**
 * OpenID Connect discovery first; on any failure the RFC 8414 location is
 * tried and its outcome is final.
 */
export const createAuthorizationServerMetadataResolver = (
  httpGet: HttpGet
): AuthorizationServerMetadataResolver => ({
  async resolve(issuer) {
    try {
      return await fetchAndCheckIssuer(httpGet, openIdConfigurationUrl(issuer), issuer);
    } catch (oidcError) {
      try {
        return await fetchAndCheckIssuer(httpGet, oauthAuthorizationServerUrl(issuer), issuer);
      } catch (oauthError) {
        if (oauthError instanceof MetadataResolutionError) {
          throw new MetadataResolutionError(oauthError.reason, oauthError.url, {
            cause: oidcError,
            details: oauthError.details
          });
        }
        throw oauthError;
      }
    }
  }
});
