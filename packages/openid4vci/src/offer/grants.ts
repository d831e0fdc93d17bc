import { z } from "zod";
import { CredentialOfferRequestException } from "../errors.js";
import { PRE_AUTHORIZED_CODE_GRANT_TYPE } from "../metadata/authorizationServerMetadata.js";
import { formatIssues } from "../metadata/fetchJson.js";
import { HttpsUrlSchema, type HttpsUrl } from "../types.js";

export const AUTHORIZATION_CODE_GRANT = "authorization_code";
export const DEFAULT_POLLING_INTERVAL_SECONDS = 5;

export type TxCode = {
  inputMode?: "numeric" | "text";
  length?: number;
  description?: string;
};

export type AuthorizationCodeGrant = Readonly<{
  issuerState?: string;
  authorizationServer?: HttpsUrl;
}>;

export type PreAuthorizedCodeGrant = Readonly<{
  preAuthorizedCode: string;
  userPinRequired: boolean;
  intervalSeconds: number;
  txCode?: TxCode;
  authorizationServer?: HttpsUrl;
}>;

export type Grants =
  | Readonly<{ kind: "authorization_code"; authorizationCode: AuthorizationCodeGrant }>
  | Readonly<{ kind: "pre_authorized_code"; preAuthorizedCode: PreAuthorizedCodeGrant }>
  | Readonly<{
      kind: "both";
      authorizationCode: AuthorizationCodeGrant;
      preAuthorizedCode: PreAuthorizedCodeGrant;
    }>;

const AuthorizationCodeGrantSchema = z
  .object({
    issuer_state: z.string().optional(),
    authorization_server: HttpsUrlSchema.optional()
  })
  .passthrough();

const PreAuthorizedCodeGrantSchema = z
  .object({
    "pre-authorized_code": z.string(),
    user_pin_required: z.boolean().optional(),
    tx_code: z
      .object({
        input_mode: z.enum(["numeric", "text"]).optional(),
        length: z.number().int().positive().optional(),
        description: z.string().max(300).optional()
      })
      .passthrough()
      .optional(),
    interval: z.number().int().positive().optional(),
    authorization_server: HttpsUrlSchema.optional()
  })
  .passthrough();

const invalidGrants = (reason: string) =>
  new CredentialOfferRequestException({ kind: "invalid_grants", reason });

const isBlank = (value: string) => value.trim().length === 0;

const decodeAuthorizationCode = (raw: unknown): AuthorizationCodeGrant => {
  const parsed = AuthorizationCodeGrantSchema.safeParse(raw);
  if (!parsed.success) {
    throw invalidGrants(`authorization_code: ${formatIssues(parsed.error)}`);
  }
  const issuerState = parsed.data.issuer_state;
  if (issuerState !== undefined && isBlank(issuerState)) {
    throw invalidGrants("issuer_state_blank");
  }
  return Object.freeze({ issuerState, authorizationServer: parsed.data.authorization_server });
};

const decodePreAuthorizedCode = (raw: unknown): PreAuthorizedCodeGrant => {
  const parsed = PreAuthorizedCodeGrantSchema.safeParse(raw);
  if (!parsed.success) {
    throw invalidGrants(`pre-authorized_code: ${formatIssues(parsed.error)}`);
  }
  const grant = parsed.data;
  if (isBlank(grant["pre-authorized_code"])) {
    throw invalidGrants("pre_authorized_code_blank");
  }
  const txCode = grant.tx_code
    ? {
        inputMode: grant.tx_code.input_mode,
        length: grant.tx_code.length,
        description: grant.tx_code.description
      }
    : undefined;
  return Object.freeze({
    preAuthorizedCode: grant["pre-authorized_code"],
    userPinRequired: grant.user_pin_required ?? txCode !== undefined,
    intervalSeconds: grant.interval ?? DEFAULT_POLLING_INTERVAL_SECONDS,
    txCode,
    authorizationServer: grant.authorization_server
  });
};

/**
 * Decodes the `grants` member of an offer. An absent member means the
 * authorization code flow is available without issuer state; a present member
 * must carry at least one known grant.
 */
export const decodeGrants = (raw: Record<string, unknown> | undefined): Grants => {
  if (raw === undefined) {
    return Object.freeze({ kind: "authorization_code", authorizationCode: Object.freeze({}) });
  }
  const hasAuthorizationCode = Object.hasOwn(raw, AUTHORIZATION_CODE_GRANT);
  const hasPreAuthorizedCode = Object.hasOwn(raw, PRE_AUTHORIZED_CODE_GRANT_TYPE);
  if (hasAuthorizationCode && hasPreAuthorizedCode) {
    return Object.freeze({
      kind: "both",
      authorizationCode: decodeAuthorizationCode(raw[AUTHORIZATION_CODE_GRANT]),
      preAuthorizedCode: decodePreAuthorizedCode(raw[PRE_AUTHORIZED_CODE_GRANT_TYPE])
    });
  }
  if (hasAuthorizationCode) {
    return Object.freeze({
      kind: "authorization_code",
      authorizationCode: decodeAuthorizationCode(raw[AUTHORIZATION_CODE_GRANT])
    });
  }
  if (hasPreAuthorizedCode) {
    return Object.freeze({
      kind: "pre_authorized_code",
      preAuthorizedCode: decodePreAuthorizedCode(raw[PRE_AUTHORIZED_CODE_GRANT_TYPE])
    });
  }
  throw invalidGrants("no_known_grant");
};

export const authorizationCodeGrantOf = (grants: Grants) =>
  grants.kind === "pre_authorized_code" ? undefined : grants.authorizationCode;

export const preAuthorizedCodeGrantOf = (grants: Grants) =>
  grants.kind === "authorization_code" ? undefined : grants.preAuthorizedCode;

// Authorization servers named by the grants themselves, in grant order.
export const grantAuthorizationServers = (grants: Grants): HttpsUrl[] => {
  const servers = [
    authorizationCodeGrantOf(grants)?.authorizationServer,
    preAuthorizedCodeGrantOf(grants)?.authorizationServer
  ];
  return servers.filter((server): server is HttpsUrl => server !== undefined);
};

/**
 * The server a grant asks the wallet to use. The pre-authorized code grant
 * wins when both grants name one, since it needs no user-facing authorization.
 */
export const preferredAuthorizationServer = (grants: Grants): HttpsUrl | undefined =>
  preAuthorizedCodeGrantOf(grants)?.authorizationServer ?? authorizationCodeGrantOf(grants)?.authorizationServer;
