import { z } from "zod";
import { CredentialOfferRequestException } from "../errors.js";
import { formatIssues } from "../metadata/fetchJson.js";

// Syntactic shape only; nothing here is checked against issuer metadata.
export const RawCredentialOfferSchema = z
  .object({
    credential_issuer: z.string(),
    credentials: z.array(z.union([z.string(), z.record(z.string(), z.unknown())])),
    grants: z.record(z.string(), z.unknown()).optional()
  })
  .passthrough();

export type RawCredentialOffer = z.infer<typeof RawCredentialOfferSchema>;

export const parseCredentialOffer = (raw: string): RawCredentialOffer => {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new CredentialOfferRequestException({
      kind: "invalid_credential_offer",
      reason: "credential_offer_not_json"
    });
  }
  const parsed = RawCredentialOfferSchema.safeParse(json);
  if (!parsed.success) {
    throw new CredentialOfferRequestException({
      kind: "invalid_credential_offer",
      reason: formatIssues(parsed.error)
    });
  }
  return parsed.data;
};
