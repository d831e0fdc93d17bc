import { z } from "zod";
import { isProofType, ProofType, ScopeSchema, type Scope } from "../types.js";

export const DisplaySchema = z
  .object({
    name: z.string().optional(),
    locale: z.string().optional(),
    logo: z
      .object({
        uri: z.string().optional(),
        alt_text: z.string().optional()
      })
      .passthrough()
      .optional(),
    description: z.string().optional(),
    background_color: z.string().optional(),
    text_color: z.string().optional()
  })
  .passthrough();

export type Display = {
  name?: string;
  locale?: string;
  logo?: { uri?: string; altText?: string };
  description?: string;
  backgroundColor?: string;
  textColor?: string;
};

export const toDisplay = (raw: z.infer<typeof DisplaySchema>): Display => ({
  name: raw.name,
  locale: raw.locale,
  logo: raw.logo ? { uri: raw.logo.uri, altText: raw.logo.alt_text } : undefined,
  description: raw.description,
  backgroundColor: raw.background_color,
  textColor: raw.text_color
});

export type ProofTypeMetadata = { algorithms: string[] };
export type ProofTypesSupported = Partial<Record<ProofType, ProofTypeMetadata>>;

const ProofTypeEntrySchema = z
  .object({
    proof_signing_alg_values_supported: z.array(z.string()).default([])
  })
  .passthrough();

// Older issuers publish a bare list of proof type names.
const ProofTypesSupportedSchema = z.union([
  z.array(z.string()),
  z.record(z.string(), ProofTypeEntrySchema)
]);

const toProofTypesSupported = (
  raw: z.infer<typeof ProofTypesSupportedSchema> | undefined
): ProofTypesSupported => {
  if (raw === undefined) {
    return { [ProofType.JWT]: { algorithms: [] } };
  }
  const result: ProofTypesSupported = {};
  if (Array.isArray(raw)) {
    for (const name of raw) {
      if (isProofType(name)) result[name] = { algorithms: [] };
    }
    return result;
  }
  for (const [name, entry] of Object.entries(raw)) {
    if (isProofType(name)) {
      result[name] = { algorithms: entry.proof_signing_alg_values_supported };
    }
  }
  return result;
};

export const commonConfigurationFields = {
  scope: ScopeSchema.optional(),
  cryptographic_binding_methods_supported: z.array(z.string()).default([]),
  credential_signing_alg_values_supported: z.array(z.string()).default([]),
  proof_types_supported: ProofTypesSupportedSchema.optional(),
  display: z.array(DisplaySchema).default([])
};

const CommonConfigurationSchema = z.object(commonConfigurationFields);

export type CommonConfiguration = {
  scope?: Scope;
  cryptographicBindingMethodsSupported: string[];
  credentialSigningAlgorithmsSupported: string[];
  proofTypesSupported: ProofTypesSupported;
  display: Display[];
};

export const toCommonConfiguration = (
  raw: z.infer<typeof CommonConfigurationSchema>
): CommonConfiguration => ({
  scope: raw.scope,
  cryptographicBindingMethodsSupported: raw.cryptographic_binding_methods_supported,
  credentialSigningAlgorithmsSupported: raw.credential_signing_alg_values_supported,
  proofTypesSupported: toProofTypesSupported(raw.proof_types_supported),
  display: raw.display.map(toDisplay)
});

export const ClaimsSchema = z.record(z.string(), z.unknown());

export const sameMembers = (left: readonly string[], right: readonly string[]) => {
  const a = new Set(left);
  const b = new Set(right);
  return a.size === b.size && [...a].every((entry) => b.has(entry));
};

export const sameSequence = (left: readonly string[], right: readonly string[]) =>
  left.length === right.length && left.every((entry, index) => entry === right[index]);
