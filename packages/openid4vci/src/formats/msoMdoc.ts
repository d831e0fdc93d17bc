import { z } from "zod";
import { FORMAT_MSO_MDOC, type Scope } from "../types.js";
import {
  ClaimsSchema,
  commonConfigurationFields,
  toCommonConfiguration,
  type CommonConfiguration
} from "./common.js";

export const MsoMdocConfigurationSchema = z
  .object({
    format: z.literal(FORMAT_MSO_MDOC),
    ...commonConfigurationFields,
    doctype: z.string().min(1),
    claims: ClaimsSchema.default({}),
    order: z.array(z.string()).optional()
  })
  .passthrough();

export type MsoMdocConfiguration = CommonConfiguration & {
  format: typeof FORMAT_MSO_MDOC;
  docType: string;
  claims: Record<string, unknown>;
  order?: string[];
};

export const toMsoMdocConfiguration = (
  raw: z.infer<typeof MsoMdocConfigurationSchema>
): MsoMdocConfiguration => ({
  format: FORMAT_MSO_MDOC,
  ...toCommonConfiguration(raw),
  docType: raw.doctype,
  claims: raw.claims,
  order: raw.order
});

export const MsoMdocOfferSchema = z
  .object({
    format: z.literal(FORMAT_MSO_MDOC),
    doctype: z.string().min(1)
  })
  .passthrough();

export type MsoMdocCredentialMetadata = {
  kind: typeof FORMAT_MSO_MDOC;
  docType: string;
  scope?: Scope;
};

export const findMsoMdocConfiguration = (
  offer: z.infer<typeof MsoMdocOfferSchema>,
  configurations: readonly MsoMdocConfiguration[]
) => configurations.find((configuration) => configuration.docType === offer.doctype);
