import { createLogger, type Logger } from "@vci-wallet/shared";
import {
  CredentialOfferRequestException,
  MetadataResolutionError,
  type CredentialOfferRequestError
} from "../errors.js";
import type { HttpGet } from "../http/httpGet.js";
import {
  createAuthorizationServerMetadataResolver,
  type AuthorizationServerMetadata,
  type AuthorizationServerMetadataResolver
} from "../metadata/authorizationServerMetadata.js";
import {
  createCredentialIssuerMetadataResolver,
  type CredentialIssuerMetadata,
  type CredentialIssuerMetadataResolver
} from "../metadata/credentialIssuerMetadata.js";
import { CredentialIssuerIdSchema, HttpsUrlSchema, type CredentialIssuerId, type HttpsUrl } from "../types.js";
import { assembleCredentialOffer, assertGrantServersAdvertised, type CredentialOffer } from "./assembleCredentialOffer.js";
import { decodeGrants, preferredAuthorizationServer } from "./grants.js";
import { parseCredentialOffer } from "./parseCredentialOffer.js";

export const CREDENTIAL_OFFER_PARAM = "credential_offer";
export const CREDENTIAL_OFFER_URI_PARAM = "credential_offer_uri";

export type CredentialOfferRequest =
  | { kind: "by_value"; credentialOffer: string }
  | { kind: "by_reference"; credentialOfferUri: HttpsUrl };

const fail = (error: CredentialOfferRequestError): never => {
  throw new CredentialOfferRequestException(error);
};

/**
 * Reads the offer parameters of a deep link. Exactly one of `credential_offer`
 * and `credential_offer_uri` must be present.
 */
export const parseCredentialOfferRequest = (uri: string): CredentialOfferRequest => {
  let url: URL;
  try {
    url = new URL(uri);
  } catch {
    return fail({ kind: "invalid_credential_offer", reason: "deep_link_not_a_uri" });
  }
  const credentialOffer = url.searchParams.get(CREDENTIAL_OFFER_PARAM);
  const credentialOfferUri = url.searchParams.get(CREDENTIAL_OFFER_URI_PARAM);
  if (credentialOffer !== null && credentialOfferUri !== null) {
    return fail({ kind: "invalid_use_of_both_credential_offer_params" });
  }
  if (credentialOffer !== null) {
    return { kind: "by_value", credentialOffer };
  }
  if (credentialOfferUri !== null) {
    const parsed = HttpsUrlSchema.safeParse(credentialOfferUri);
    if (!parsed.success) {
      return fail({ kind: "invalid_credential_offer_uri", reason: "https_url_required" });
    }
    return { kind: "by_reference", credentialOfferUri: parsed.data };
  }
  return fail({ kind: "missing_credential_offer_param" });
};

export type CredentialOfferRequestResolver = {
  resolve(uri: string): Promise<CredentialOffer>;
};

export type CredentialOfferRequestResolverInput = {
  httpGet: HttpGet;
  credentialIssuerMetadataResolver?: CredentialIssuerMetadataResolver;
  authorizationServerMetadataResolver?: AuthorizationServerMetadataResolver;
  logger?: Logger;
};

// Resolvers supplied by the caller may fail with anything; keep the error typed.
const asMetadataResolutionError = (error: unknown, url: string) =>
  error instanceof MetadataResolutionError
    ? error
    : new MetadataResolutionError("fetch_failed", url, { cause: error });

const causeOf = (error: unknown) => (error instanceof Error ? error.message : String(error));

export const createCredentialOfferRequestResolver = (
  input: CredentialOfferRequestResolverInput
): CredentialOfferRequestResolver => {
  const log = input.logger ?? createLogger("openid4vci");
  const issuerMetadataResolver =
    input.credentialIssuerMetadataResolver ?? createCredentialIssuerMetadataResolver(input.httpGet);
  const asMetadataResolver =
    input.authorizationServerMetadataResolver ??
    createAuthorizationServerMetadataResolver(input.httpGet);

  const fetchCredentialOffer = async (uri: HttpsUrl) => {
    try {
      return await input.httpGet.get(uri);
    } catch (error) {
      return fail({ kind: "unable_to_fetch_credential_offer", cause: error });
    }
  };

  const resolveIssuerMetadata = async (issuer: CredentialIssuerId): Promise<CredentialIssuerMetadata> => {
    try {
      return await issuerMetadataResolver.resolve(issuer);
    } catch (error) {
      return fail({
        kind: "unable_to_resolve_credential_issuer_metadata",
        cause: asMetadataResolutionError(error, issuer)
      });
    }
  };

  const resolveAuthorizationServerMetadata = async (
    issuer: HttpsUrl
  ): Promise<AuthorizationServerMetadata> => {
    try {
      return await asMetadataResolver.resolve(issuer);
    } catch (error) {
      return fail({
        kind: "unable_to_resolve_authorization_server_metadata",
        cause: asMetadataResolutionError(error, issuer)
      });
    }
  };

  const resolveOffer = async (uri: string) => {
    const request = parseCredentialOfferRequest(uri);
    const body =
      request.kind === "by_value"
        ? request.credentialOffer
        : await fetchCredentialOffer(request.credentialOfferUri);
    const rawOffer = parseCredentialOffer(body);
    const issuer = CredentialIssuerIdSchema.safeParse(rawOffer.credential_issuer);
    if (!issuer.success) {
      return fail({
        kind: "invalid_credential_issuer_id",
        reason: issuer.error.issues[0]?.message ?? "credential_issuer_invalid"
      });
    }
    const issuerId = issuer.data;

    // A grant that names its authorization server lets both documents load together.
    // The hint is checked against the issuer metadata before its outcome counts.
    const grants = decodeGrants(rawOffer.grants);
    const hintedServer = preferredAuthorizationServer(grants);
    const [issuerResult, hintedResult] = await Promise.allSettled([
      resolveIssuerMetadata(issuerId),
      hintedServer ? resolveAuthorizationServerMetadata(hintedServer) : Promise.resolve(undefined)
    ]);
    if (issuerResult.status === "rejected") {
      throw issuerResult.reason;
    }
    const issuerMetadata = issuerResult.value;
    assertGrantServersAdvertised(grants, issuerMetadata);
    if (hintedResult.status === "rejected") {
      throw hintedResult.reason;
    }
    const authorizationServerMetadata =
      hintedResult.value ??
      (await resolveAuthorizationServerMetadata(
        issuerMetadata.authorizationServers[0] ?? issuerMetadata.credentialIssuerIdentifier
      ));

    return assembleCredentialOffer(rawOffer, issuerMetadata, authorizationServerMetadata);
  };

  return {
    async resolve(uri) {
      try {
        const offer = await resolveOffer(uri);
        log.info("credential_offer.resolved", {
          issuer: offer.credentialIssuerIdentifier,
          authServer: offer.authorizationServerMetadata.issuer,
          credentials: offer.credentials.length,
          grants: offer.grants.kind
        });
        return offer;
      } catch (error) {
        if (error instanceof CredentialOfferRequestException) {
          log.warn("credential_offer.rejected", {
            error: error.error.kind,
            category: error.category,
            cause: error.cause === undefined ? undefined : causeOf(error.cause)
          });
        }
        throw error;
      }
    }
  };
};
