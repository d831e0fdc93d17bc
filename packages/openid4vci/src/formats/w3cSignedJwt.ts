import { z } from "zod";
import { FORMAT_W3C_SIGNED_JWT, type Scope } from "../types.js";
import {
  ClaimsSchema,
  commonConfigurationFields,
  sameMembers,
  toCommonConfiguration,
  type CommonConfiguration
} from "./common.js";

export const W3CSignedJwtConfigurationSchema = z
  .object({
    format: z.literal(FORMAT_W3C_SIGNED_JWT),
    ...commonConfigurationFields,
    credential_definition: z
      .object({
        type: z.array(z.string().min(1)).min(1),
        credentialSubject: ClaimsSchema.optional()
      })
      .passthrough(),
    order: z.array(z.string()).optional()
  })
  .passthrough();

export type W3CSignedJwtConfiguration = CommonConfiguration & {
  format: typeof FORMAT_W3C_SIGNED_JWT;
  credentialDefinition: { type: string[]; credentialSubject?: Record<string, unknown> };
  order?: string[];
};

export const toW3CSignedJwtConfiguration = (
  raw: z.infer<typeof W3CSignedJwtConfigurationSchema>
): W3CSignedJwtConfiguration => ({
  format: FORMAT_W3C_SIGNED_JWT,
  ...toCommonConfiguration(raw),
  credentialDefinition: {
    type: raw.credential_definition.type,
    credentialSubject: raw.credential_definition.credentialSubject
  },
  order: raw.order
});

export const W3CSignedJwtOfferSchema = z
  .object({
    format: z.literal(FORMAT_W3C_SIGNED_JWT),
    credential_definition: z
      .object({
        type: z.array(z.string().min(1)).min(1)
      })
      .passthrough()
  })
  .passthrough();

export type W3CSignedJwtCredentialMetadata = {
  kind: typeof FORMAT_W3C_SIGNED_JWT;
  credentialDefinition: { type: string[] };
  scope?: Scope;
};

export const findW3CSignedJwtConfiguration = (
  offer: z.infer<typeof W3CSignedJwtOfferSchema>,
  configurations: readonly W3CSignedJwtConfiguration[]
) =>
  configurations.find((configuration) =>
    sameMembers(configuration.credentialDefinition.type, offer.credential_definition.type)
  );
