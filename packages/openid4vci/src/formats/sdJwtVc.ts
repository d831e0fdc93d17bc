import { z } from "zod";
import { FORMAT_SD_JWT_VC, type Scope } from "../types.js";
import {
  ClaimsSchema,
  commonConfigurationFields,
  toCommonConfiguration,
  type CommonConfiguration
} from "./common.js";

export const SdJwtVcConfigurationSchema = z
  .object({
    format: z.literal(FORMAT_SD_JWT_VC),
    ...commonConfigurationFields,
    vct: z.string().min(1),
    claims: ClaimsSchema.default({}),
    order: z.array(z.string()).optional()
  })
  .passthrough();

export type SdJwtVcConfiguration = CommonConfiguration & {
  format: typeof FORMAT_SD_JWT_VC;
  type: string;
  claims: Record<string, unknown>;
  order?: string[];
};

export const toSdJwtVcConfiguration = (
  raw: z.infer<typeof SdJwtVcConfigurationSchema>
): SdJwtVcConfiguration => ({
  format: FORMAT_SD_JWT_VC,
  ...toCommonConfiguration(raw),
  type: raw.vct,
  claims: raw.claims,
  order: raw.order
});

export const SdJwtVcOfferSchema = z
  .object({
    format: z.literal(FORMAT_SD_JWT_VC),
    vct: z.string().min(1)
  })
  .passthrough();

export type SdJwtVcCredentialMetadata = {
  kind: typeof FORMAT_SD_JWT_VC;
  type: string;
  scope?: Scope;
};

export const findSdJwtVcConfiguration = (
  offer: z.infer<typeof SdJwtVcOfferSchema>,
  configurations: readonly SdJwtVcConfiguration[]
) => configurations.find((configuration) => configuration.type === offer.vct);
