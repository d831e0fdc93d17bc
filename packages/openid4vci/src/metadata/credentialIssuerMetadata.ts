import { z } from "zod";
import { MetadataResolutionError } from "../errors.js";
import { CredentialConfigurationSchema, type CredentialConfiguration } from "../formats/index.js";
import { DisplaySchema, toDisplay, type Display } from "../formats/common.js";
import type { HttpGet } from "../http/httpGet.js";
import {
  CredentialIssuerIdSchema,
  HttpsUrlSchema,
  wellKnownUrl,
  type CredentialConfigurationIdentifier,
  type CredentialIssuerId,
  type HttpsUrl
} from "../types.js";
import { fetchMetadata } from "./fetchJson.js";

export type CredentialResponseEncryption = {
  algValuesSupported: string[];
  encValuesSupported: string[];
  encryptionRequired: boolean;
};

export type CredentialIssuerMetadata = {
  credentialIssuerIdentifier: CredentialIssuerId;
  authorizationServers: HttpsUrl[];
  credentialEndpoint: HttpsUrl;
  batchCredentialEndpoint?: HttpsUrl;
  deferredCredentialEndpoint?: HttpsUrl;
  notificationEndpoint?: HttpsUrl;
  credentialResponseEncryption?: CredentialResponseEncryption;
  credentialIdentifiersSupported: boolean;
  credentialConfigurationsSupported: Record<string, CredentialConfiguration>;
  display: Display[];
};

export const CredentialIssuerMetadataSchema = z
  .object({
    credential_issuer: CredentialIssuerIdSchema,
    authorization_servers: z.array(HttpsUrlSchema).min(1).optional(),
    // Single-valued form used by earlier drafts.
    authorization_server: HttpsUrlSchema.optional(),
    credential_endpoint: HttpsUrlSchema,
    batch_credential_endpoint: HttpsUrlSchema.optional(),
    deferred_credential_endpoint: HttpsUrlSchema.optional(),
    notification_endpoint: HttpsUrlSchema.optional(),
    credential_response_encryption: z
      .object({
        alg_values_supported: z.array(z.string()).min(1),
        enc_values_supported: z.array(z.string()).min(1),
        encryption_required: z.boolean().default(false)
      })
      .optional(),
    credential_identifiers_supported: z.boolean().default(false),
    credential_configurations_supported: z
      .record(z.string().min(1), CredentialConfigurationSchema)
      .refine((value) => Object.keys(value).length > 0, {
        message: "credential_configurations_supported_empty"
      }),
    display: z.array(DisplaySchema).default([])
  })
  .passthrough()
  .transform(
    (raw): CredentialIssuerMetadata => ({
      credentialIssuerIdentifier: raw.credential_issuer,
      authorizationServers:
        raw.authorization_servers ??
        (raw.authorization_server ? [raw.authorization_server] : [raw.credential_issuer]),
      credentialEndpoint: raw.credential_endpoint,
      batchCredentialEndpoint: raw.batch_credential_endpoint,
      deferredCredentialEndpoint: raw.deferred_credential_endpoint,
      notificationEndpoint: raw.notification_endpoint,
      credentialResponseEncryption: raw.credential_response_encryption
        ? {
            algValuesSupported: raw.credential_response_encryption.alg_values_supported,
            encValuesSupported: raw.credential_response_encryption.enc_values_supported,
            encryptionRequired: raw.credential_response_encryption.encryption_required
          }
        : undefined,
      credentialIdentifiersSupported: raw.credential_identifiers_supported,
      credentialConfigurationsSupported: raw.credential_configurations_supported,
      display: raw.display.map(toDisplay)
    })
  );

export const credentialIssuerMetadataUrl = (issuer: CredentialIssuerId) =>
  wellKnownUrl(issuer, "openid-credential-issuer", "insert");

export const findCredentialConfiguration = (
  metadata: CredentialIssuerMetadata,
  id: CredentialConfigurationIdentifier
): CredentialConfiguration | undefined =>
  Object.hasOwn(metadata.credentialConfigurationsSupported, id)
    ? metadata.credentialConfigurationsSupported[id]
    : undefined;

export type CredentialIssuerMetadataResolver = {
  resolve(issuer: CredentialIssuerId): Promise<CredentialIssuerMetadata>;
};

export const createCredentialIssuerMetadataResolver = (
  httpGet: HttpGet
): CredentialIssuerMetadataResolver => ({
  async resolve(issuer) {
    const url = credentialIssuerMetadataUrl(issuer);
    const metadata = await fetchMetadata(httpGet, url, CredentialIssuerMetadataSchema);
    if (metadata.credentialIssuerIdentifier !== issuer) {
      throw new MetadataResolutionError("issuer_mismatch", url, {
        details: `expected ${issuer}, got ${metadata.credentialIssuerIdentifier}`
      });
    }
    return metadata;
  }
});
