import { z } from "zod";
import { InvalidValueError } from "./errors.js";

export const FORMAT_MSO_MDOC = "mso_mdoc";
export const FORMAT_SD_JWT_VC = "vc+sd-jwt";
export const FORMAT_W3C_JSONLD_DATA_INTEGRITY = "ldp_vc";
export const FORMAT_W3C_JSONLD_SIGNED_JWT = "jwt_vc_json-ld";
export const FORMAT_W3C_SIGNED_JWT = "jwt_vc_json";

export const ProofType = {
  JWT: "jwt",
  CWT: "cwt",
  LDP_VP: "ldp_vp"
} as const;

export type ProofType = (typeof ProofType)[keyof typeof ProofType];

export const isProofType = (value: string): value is ProofType =>
  value === ProofType.JWT || value === ProofType.CWT || value === ProofType.LDP_VP;

const isHttpsUrl = (value: string) => {
  try {
    return new URL(value).protocol === "https:";
  } catch {
    return false;
  }
};

// Keeps the string as given; identifiers are compared verbatim.
export const HttpsUrlSchema = z
  .string()
  .refine(isHttpsUrl, { message: "https_url_required" })
  .brand<"HttpsUrl">();

export type HttpsUrl = z.infer<typeof HttpsUrlSchema>;

// URL drops an empty query or fragment, so the raw string is checked too.
const hasNoQueryOrFragment = (value: string) => {
  if (value.includes("?") || value.includes("#")) {
    return false;
  }
  try {
    const url = new URL(value);
    return url.search === "" && url.hash === "";
  } catch {
    return false;
  }
};

export const CredentialIssuerIdSchema = HttpsUrlSchema.refine(hasNoQueryOrFragment, {
  message: "issuer_id_must_not_have_query_or_fragment"
});

export type CredentialIssuerId = HttpsUrl;

const nonEmpty = <Brand extends string>(brand: Brand) => z.string().min(1).brand<Brand>();

export const ScopeSchema = nonEmpty("Scope");
export const AccessTokenSchema = nonEmpty("AccessToken");
export const AuthorizationCodeSchema = nonEmpty("AuthorizationCode");
export const TransactionIdSchema = nonEmpty("TransactionId");
export const NotificationIdSchema = nonEmpty("NotificationId");
export const CredentialConfigurationIdentifierSchema = nonEmpty("CredentialConfigurationIdentifier");
export const CredentialIdentifierSchema = nonEmpty("CredentialIdentifier");

export type Scope = z.infer<typeof ScopeSchema>;
export type AccessToken = z.infer<typeof AccessTokenSchema>;
export type AuthorizationCode = z.infer<typeof AuthorizationCodeSchema>;
export type TransactionId = z.infer<typeof TransactionIdSchema>;
export type NotificationId = z.infer<typeof NotificationIdSchema>;
export type CredentialConfigurationIdentifier = z.infer<
  typeof CredentialConfigurationIdentifierSchema
>;
export type CredentialIdentifier = z.infer<typeof CredentialIdentifierSchema>;

const parseValue = <T extends z.ZodTypeAny>(schema: T, value: unknown, code: string): z.output<T> => {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidValueError(code, parsed.error.issues[0]?.message ?? code);
  }
  return parsed.data;
};

export const toHttpsUrl = (value: string): HttpsUrl =>
  parseValue(HttpsUrlSchema, value, "https_url_invalid");
export const toCredentialIssuerId = (value: string): CredentialIssuerId =>
  parseValue(CredentialIssuerIdSchema, value, "credential_issuer_id_invalid");
export const toScope = (value: string): Scope => parseValue(ScopeSchema, value, "scope_empty");
export const toAccessToken = (value: string): AccessToken =>
  parseValue(AccessTokenSchema, value, "access_token_empty");
export const toAuthorizationCode = (value: string): AuthorizationCode =>
  parseValue(AuthorizationCodeSchema, value, "authorization_code_empty");
export const toTransactionId = (value: string): TransactionId =>
  parseValue(TransactionIdSchema, value, "transaction_id_empty");
export const toNotificationId = (value: string): NotificationId =>
  parseValue(NotificationIdSchema, value, "notification_id_empty");
export const toCredentialConfigurationIdentifier = (
  value: string
): CredentialConfigurationIdentifier =>
  parseValue(
    CredentialConfigurationIdentifierSchema,
    value,
    "credential_configuration_identifier_empty"
  );
export const toCredentialIdentifier = (value: string): CredentialIdentifier =>
  parseValue(CredentialIdentifierSchema, value, "credential_identifier_empty");

// c_nonce as returned by the token and credential endpoints.
export type CNonce = Readonly<{
  value: string;
  expiresInSeconds?: number;
}>;

export const toCNonce = (value: string, expiresInSeconds: number | undefined = 5): CNonce => {
  if (value.length === 0) {
    throw new InvalidValueError("c_nonce_empty");
  }
  return Object.freeze({ value, expiresInSeconds });
};

export type PKCEVerifier = Readonly<{
  codeVerifier: string;
  codeVerifierMethod: string;
}>;

export const toPKCEVerifier = (codeVerifier: string, codeVerifierMethod: string): PKCEVerifier => {
  if (codeVerifier.length === 0) {
    throw new InvalidValueError("code_verifier_empty");
  }
  if (codeVerifierMethod.length === 0) {
    throw new InvalidValueError("code_verifier_method_empty");
  }
  return Object.freeze({ codeVerifier, codeVerifierMethod });
};

/**
 * Location of a well-known document for `base`.
 *
 * `insert` places the well-known segment between host and path (RFC 8414 style),
 * `append` adds it after the path (OpenID Connect Discovery style).
 */
export const wellKnownUrl = (
  base: HttpsUrl,
  segment: string,
  placement: "insert" | "append"
): HttpsUrl => {
  const url = new URL(base);
  const path = url.pathname.replace(/\/+$/, "");
  url.pathname =
    placement === "insert" ? `/.well-known/${segment}${path}` : `${path}/.well-known/${segment}`;
  url.search = "";
  url.hash = "";
  return toHttpsUrl(url.toString());
};
