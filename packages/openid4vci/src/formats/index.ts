import { z } from "zod";
import {
  FORMAT_MSO_MDOC,
  FORMAT_SD_JWT_VC,
  FORMAT_W3C_JSONLD_DATA_INTEGRITY,
  FORMAT_W3C_JSONLD_SIGNED_JWT,
  FORMAT_W3C_SIGNED_JWT,
  type Scope
} from "../types.js";
import {
  findMsoMdocConfiguration,
  MsoMdocConfigurationSchema,
  MsoMdocOfferSchema,
  toMsoMdocConfiguration,
  type MsoMdocConfiguration,
  type MsoMdocCredentialMetadata
} from "./msoMdoc.js";
import {
  findSdJwtVcConfiguration,
  SdJwtVcConfigurationSchema,
  SdJwtVcOfferSchema,
  toSdJwtVcConfiguration,
  type SdJwtVcConfiguration,
  type SdJwtVcCredentialMetadata
} from "./sdJwtVc.js";
import {
  findW3CSignedJwtConfiguration,
  toW3CSignedJwtConfiguration,
  W3CSignedJwtConfigurationSchema,
  W3CSignedJwtOfferSchema,
  type W3CSignedJwtConfiguration,
  type W3CSignedJwtCredentialMetadata
} from "./w3cSignedJwt.js";
import {
  findW3CJsonLdConfiguration,
  toW3CJsonLdConfiguration,
  W3CJsonLdDataIntegrityConfigurationSchema,
  W3CJsonLdDataIntegrityOfferSchema,
  W3CJsonLdSignedJwtConfigurationSchema,
  W3CJsonLdSignedJwtOfferSchema,
  type W3CJsonLdDataIntegrityConfiguration,
  type W3CJsonLdDataIntegrityCredentialMetadata,
  type W3CJsonLdSignedJwtConfiguration,
  type W3CJsonLdSignedJwtCredentialMetadata
} from "./w3cJsonLd.js";

export const CREDENTIAL_FORMATS = [
  FORMAT_MSO_MDOC,
  FORMAT_SD_JWT_VC,
  FORMAT_W3C_JSONLD_DATA_INTEGRITY,
  FORMAT_W3C_JSONLD_SIGNED_JWT,
  FORMAT_W3C_SIGNED_JWT
] as const;

export type CredentialFormat = (typeof CREDENTIAL_FORMATS)[number];

export const isCredentialFormat = (value: string): value is CredentialFormat =>
  CREDENTIAL_FORMATS.some((format) => format === value);

export type CredentialConfiguration =
  | MsoMdocConfiguration
  | SdJwtVcConfiguration
  | W3CJsonLdDataIntegrityConfiguration
  | W3CJsonLdSignedJwtConfiguration
  | W3CSignedJwtConfiguration;

export const CredentialConfigurationSchema = z
  .discriminatedUnion("format", [
    MsoMdocConfigurationSchema,
    SdJwtVcConfigurationSchema,
    W3CJsonLdDataIntegrityConfigurationSchema,
    W3CJsonLdSignedJwtConfigurationSchema,
    W3CSignedJwtConfigurationSchema
  ])
  .transform((raw): CredentialConfiguration => {
    switch (raw.format) {
      case FORMAT_MSO_MDOC:
        return toMsoMdocConfiguration(raw);
      case FORMAT_SD_JWT_VC:
        return toSdJwtVcConfiguration(raw);
      case FORMAT_W3C_JSONLD_DATA_INTEGRITY:
        return toW3CJsonLdConfiguration(FORMAT_W3C_JSONLD_DATA_INTEGRITY, raw);
      case FORMAT_W3C_JSONLD_SIGNED_JWT:
        return toW3CJsonLdConfiguration(FORMAT_W3C_JSONLD_SIGNED_JWT, raw);
      case FORMAT_W3C_SIGNED_JWT:
        return toW3CSignedJwtConfiguration(raw);
    }
  });

export type ScopeCredentialMetadata = { kind: "scope"; scope: Scope };

// One credential on offer: by scope, or by the identifiers of a known format.
export type CredentialMetadata =
  | ScopeCredentialMetadata
  | MsoMdocCredentialMetadata
  | SdJwtVcCredentialMetadata
  | W3CJsonLdDataIntegrityCredentialMetadata
  | W3CJsonLdSignedJwtCredentialMetadata
  | W3CSignedJwtCredentialMetadata;

export type FormatEntryResolution =
  | { ok: true; credential: CredentialMetadata }
  | { ok: false; reason: string };

const ofFormat =
  <F extends CredentialFormat>(format: F) =>
  (configuration: CredentialConfiguration): configuration is Extract<CredentialConfiguration, { format: F }> =>
    configuration.format === format;

const unmatched = (format: CredentialFormat): FormatEntryResolution => ({
  ok: false,
  reason: `no_${format}_configuration_matches`
});

const malformed = (format: CredentialFormat, error: z.ZodError): FormatEntryResolution => ({
  ok: false,
  reason: `malformed_${format}_entry: ${error.issues.map((issue) => issue.path.join(".") || issue.message).join(", ")}`
});

/**
 * Resolves a credential entry that names a format against the configurations
 * the issuer advertises. The scope of the matching configuration is carried over.
 */
export const resolveFormatEntry = (
  entry: Record<string, unknown>,
  configurations: readonly CredentialConfiguration[]
): FormatEntryResolution => {
  const format = entry.format;
  if (typeof format !== "string" || format.length === 0) {
    return { ok: false, reason: "credential_format_missing" };
  }
  if (!isCredentialFormat(format)) {
    return { ok: false, reason: `credential_format_unknown: ${format}` };
  }
  switch (format) {
    case FORMAT_MSO_MDOC: {
      const parsed = MsoMdocOfferSchema.safeParse(entry);
      if (!parsed.success) return malformed(format, parsed.error);
      const match = findMsoMdocConfiguration(parsed.data, configurations.filter(ofFormat(format)));
      if (!match) return unmatched(format);
      return { ok: true, credential: { kind: format, docType: match.docType, scope: match.scope } };
    }
    case FORMAT_SD_JWT_VC: {
      const parsed = SdJwtVcOfferSchema.safeParse(entry);
      if (!parsed.success) return malformed(format, parsed.error);
      const match = findSdJwtVcConfiguration(parsed.data, configurations.filter(ofFormat(format)));
      if (!match) return unmatched(format);
      return { ok: true, credential: { kind: format, type: match.type, scope: match.scope } };
    }
    case FORMAT_W3C_SIGNED_JWT: {
      const parsed = W3CSignedJwtOfferSchema.safeParse(entry);
      if (!parsed.success) return malformed(format, parsed.error);
      const match = findW3CSignedJwtConfiguration(
        parsed.data,
        configurations.filter(ofFormat(format))
      );
      if (!match) return unmatched(format);
      return {
        ok: true,
        credential: {
          kind: format,
          credentialDefinition: { type: match.credentialDefinition.type },
          scope: match.scope
        }
      };
    }
    case FORMAT_W3C_JSONLD_DATA_INTEGRITY: {
      const parsed = W3CJsonLdDataIntegrityOfferSchema.safeParse(entry);
      if (!parsed.success) return malformed(format, parsed.error);
      const match = findW3CJsonLdConfiguration(parsed.data, configurations.filter(ofFormat(format)));
      if (!match) return unmatched(format);
      return {
        ok: true,
        credential: {
          kind: format,
          credentialDefinition: {
            context: match.credentialDefinition.context,
            type: match.credentialDefinition.type
          },
          scope: match.scope
        }
      };
    }
    case FORMAT_W3C_JSONLD_SIGNED_JWT: {
      const parsed = W3CJsonLdSignedJwtOfferSchema.safeParse(entry);
      if (!parsed.success) return malformed(format, parsed.error);
      const match = findW3CJsonLdConfiguration(parsed.data, configurations.filter(ofFormat(format)));
      if (!match) return unmatched(format);
      return {
        ok: true,
        credential: {
          kind: format,
          credentialDefinition: {
            context: match.credentialDefinition.context,
            type: match.credentialDefinition.type
          },
          scope: match.scope
        }
      };
    }
  }
};

export type { Display, ProofTypeMetadata, ProofTypesSupported } from "./common.js";
export type { MsoMdocConfiguration, MsoMdocCredentialMetadata } from "./msoMdoc.js";
export type { SdJwtVcConfiguration, SdJwtVcCredentialMetadata } from "./sdJwtVc.js";
export type { W3CSignedJwtConfiguration, W3CSignedJwtCredentialMetadata } from "./w3cSignedJwt.js";
export type {
  W3CJsonLdDataIntegrityConfiguration,
  W3CJsonLdDataIntegrityCredentialMetadata,
  W3CJsonLdSignedJwtConfiguration,
  W3CJsonLdSignedJwtCredentialMetadata
} from "./w3cJsonLd.js";
