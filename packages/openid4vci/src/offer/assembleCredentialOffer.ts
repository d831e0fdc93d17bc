import { CredentialOfferRequestException } from "../errors.js";
import { resolveFormatEntry, type CredentialMetadata } from "../formats/index.js";
import type { AuthorizationServerMetadata } from "../metadata/authorizationServerMetadata.js";
import type { CredentialIssuerMetadata } from "../metadata/credentialIssuerMetadata.js";
import { ScopeSchema, type CredentialIssuerId } from "../types.js";
import { decodeGrants, grantAuthorizationServers, type Grants } from "./grants.js";
import type { RawCredentialOffer } from "./parseCredentialOffer.js";

export type CredentialOffer = Readonly<{
  credentialIssuerIdentifier: CredentialIssuerId;
  credentialIssuerMetadata: CredentialIssuerMetadata;
  authorizationServerMetadata: AuthorizationServerMetadata;
  credentials: readonly CredentialMetadata[];
  grants: Grants;
}>;

const invalidCredentials = (reason: string) =>
  new CredentialOfferRequestException({ kind: "invalid_credentials", reason });

const resolveCredentials = (
  entries: RawCredentialOffer["credentials"],
  issuerMetadata: CredentialIssuerMetadata
): CredentialMetadata[] => {
  if (entries.length === 0) {
    throw invalidCredentials("credentials_empty");
  }
  const configurations = Object.values(issuerMetadata.credentialConfigurationsSupported);
  return entries.map((entry, index): CredentialMetadata => {
    if (typeof entry === "string") {
      const scope = ScopeSchema.safeParse(entry);
      if (!scope.success) {
        throw invalidCredentials(`credentials[${index}]: scope_empty`);
      }
      return { kind: "scope", scope: scope.data };
    }
    const resolved = resolveFormatEntry(entry, configurations);
    if (!resolved.ok) {
      throw invalidCredentials(`credentials[${index}]: ${resolved.reason}`);
    }
    return resolved.credential;
  });
};

// Grants may only point at servers the issuer itself advertises.
export const assertGrantServersAdvertised = (grants: Grants, issuerMetadata: CredentialIssuerMetadata) => {
  const unadvertised = grantAuthorizationServers(grants).filter(
    (server) => !issuerMetadata.authorizationServers.includes(server)
  );
  if (unadvertised.length > 0) {
    throw new CredentialOfferRequestException({
      kind: "invalid_grants",
      reason: "authorization_server_not_advertised_by_issuer"
    });
  }
};

/**
 * Cross-validates a parsed offer against the issuer and authorization server
 * metadata. Any failure aborts with a `CredentialOfferRequestException`.
 */
export const assembleCredentialOffer = (
  rawOffer: RawCredentialOffer,
  issuerMetadata: CredentialIssuerMetadata,
  authorizationServerMetadata: AuthorizationServerMetadata
): CredentialOffer => {
  const issuerId = issuerMetadata.credentialIssuerIdentifier;
  if (rawOffer.credential_issuer !== issuerId) {
    throw new CredentialOfferRequestException({
      kind: "invalid_credential_issuer_id",
      reason: "credential_issuer_does_not_match_metadata"
    });
  }
  const credentials = resolveCredentials(rawOffer.credentials, issuerMetadata);
  const grants = decodeGrants(rawOffer.grants);
  assertGrantServersAdvertised(grants, issuerMetadata);
  return Object.freeze({
    credentialIssuerIdentifier: issuerId,
    credentialIssuerMetadata: issuerMetadata,
    authorizationServerMetadata,
    credentials: Object.freeze(credentials),
    grants
  });
};
