import { z } from "zod";
import {
  FORMAT_W3C_JSONLD_DATA_INTEGRITY,
  FORMAT_W3C_JSONLD_SIGNED_JWT,
  type Scope
} from "../types.js";
import {
  ClaimsSchema,
  commonConfigurationFields,
  sameMembers,
  sameSequence,
  toCommonConfiguration,
  type CommonConfiguration
} from "./common.js";

// ldp_vc and jwt_vc_json-ld describe credentials the same way; only the securing differs.
export type JsonLdFormat = typeof FORMAT_W3C_JSONLD_DATA_INTEGRITY | typeof FORMAT_W3C_JSONLD_SIGNED_JWT;

const jsonLdConfigurationSchema = <F extends JsonLdFormat>(format: F) =>
  z
    .object({
      format: z.literal(format),
      ...commonConfigurationFields,
      credential_definition: z
        .object({
          "@context": z.array(z.string().min(1)).min(1),
          type: z.array(z.string().min(1)).min(1),
          credentialSubject: ClaimsSchema.optional()
        })
        .passthrough(),
      order: z.array(z.string()).optional()
    })
    .passthrough();

const jsonLdOfferSchema = <F extends JsonLdFormat>(format: F) =>
  z
    .object({
      format: z.literal(format),
      credential_definition: z
        .object({
          "@context": z.array(z.string().min(1)).min(1),
          type: z.array(z.string().min(1)).min(1)
        })
        .passthrough()
    })
    .passthrough();

export const W3CJsonLdDataIntegrityConfigurationSchema = jsonLdConfigurationSchema(
  FORMAT_W3C_JSONLD_DATA_INTEGRITY
);
export const W3CJsonLdSignedJwtConfigurationSchema = jsonLdConfigurationSchema(
  FORMAT_W3C_JSONLD_SIGNED_JWT
);
export const W3CJsonLdDataIntegrityOfferSchema = jsonLdOfferSchema(FORMAT_W3C_JSONLD_DATA_INTEGRITY);
export const W3CJsonLdSignedJwtOfferSchema = jsonLdOfferSchema(FORMAT_W3C_JSONLD_SIGNED_JWT);

type RawJsonLdConfiguration = z.infer<ReturnType<typeof jsonLdConfigurationSchema<JsonLdFormat>>>;
type RawJsonLdOffer = z.infer<ReturnType<typeof jsonLdOfferSchema<JsonLdFormat>>>;

export type JsonLdCredentialDefinition = {
  context: string[];
  type: string[];
  credentialSubject?: Record<string, unknown>;
};

export type W3CJsonLdConfiguration<F extends JsonLdFormat> = CommonConfiguration & {
  format: F;
  credentialDefinition: JsonLdCredentialDefinition;
  order?: string[];
};

export type W3CJsonLdDataIntegrityConfiguration = W3CJsonLdConfiguration<
  typeof FORMAT_W3C_JSONLD_DATA_INTEGRITY
>;
export type W3CJsonLdSignedJwtConfiguration = W3CJsonLdConfiguration<
  typeof FORMAT_W3C_JSONLD_SIGNED_JWT
>;

export const toW3CJsonLdConfiguration = <F extends JsonLdFormat>(
  format: F,
  raw: RawJsonLdConfiguration
): W3CJsonLdConfiguration<F> => ({
  format,
  ...toCommonConfiguration(raw),
  credentialDefinition: {
    context: raw.credential_definition["@context"],
    type: raw.credential_definition.type,
    credentialSubject: raw.credential_definition.credentialSubject
  },
  order: raw.order
});

export type W3CJsonLdCredentialMetadata<F extends JsonLdFormat> = {
  kind: F;
  credentialDefinition: { context: string[]; type: string[] };
  scope?: Scope;
};

export type W3CJsonLdDataIntegrityCredentialMetadata = W3CJsonLdCredentialMetadata<
  typeof FORMAT_W3C_JSONLD_DATA_INTEGRITY
>;
export type W3CJsonLdSignedJwtCredentialMetadata = W3CJsonLdCredentialMetadata<
  typeof FORMAT_W3C_JSONLD_SIGNED_JWT
>;

// Context order is significant in JSON-LD, type order is not.
export const findW3CJsonLdConfiguration = <F extends JsonLdFormat>(
  offer: RawJsonLdOffer,
  configurations: readonly W3CJsonLdConfiguration<F>[]
) =>
  configurations.find(
    (configuration) =>
      sameSequence(configuration.credentialDefinition.context, offer.credential_definition["@context"]) &&
      sameMembers(configuration.credentialDefinition.type, offer.credential_definition.type)
  );
