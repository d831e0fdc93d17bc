import type { JWK } from "jose";
import { InvalidValueError } from "./errors.js";

// Public key material a proof of possession binds to.
export type BindingKey =
  | Readonly<{ type: "jwk"; jwk: Readonly<JWK> }>
  | Readonly<{ type: "did"; identity: string }>
  | Readonly<{ type: "x509"; chain: readonly string[] }>;

const PRIVATE_JWK_MEMBERS = ["d", "p", "q", "dp", "dq", "qi", "oth", "k"] as const;
const BASE64 = /^[A-Za-z0-9+/]+={0,2}$/;

export const isPrivateJwk = (jwk: JWK) =>
  jwk.kty === "oct" || PRIVATE_JWK_MEMBERS.some((member) => jwk[member] !== undefined);

export const jwkBindingKey = (jwk: JWK): BindingKey => {
  if (isPrivateJwk(jwk)) {
    throw new InvalidValueError("binding_key_jwk_not_public");
  }
  return Object.freeze({ type: "jwk", jwk: Object.freeze({ ...jwk }) });
};

export const didBindingKey = (identity: string): BindingKey => {
  if (identity.trim().length === 0) {
    throw new InvalidValueError("binding_key_did_empty");
  }
  return Object.freeze({ type: "did", identity });
};

/**
 * @param chain DER certificates, base64 (not base64url) encoded, leaf first; the
 * form the `x5c` header carries.
 */
export const x509BindingKey = (chain: readonly string[]): BindingKey => {
  if (chain.length === 0) {
    throw new InvalidValueError("binding_key_x509_chain_empty");
  }
  if (!chain.every((certificate) => BASE64.test(certificate))) {
    throw new InvalidValueError("binding_key_x509_certificate_invalid");
  }
  return Object.freeze({ type: "x509", chain: Object.freeze([...chain]) });
};
