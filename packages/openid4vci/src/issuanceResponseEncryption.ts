import type { JWK } from "jose";
import { InvalidValueError } from "./errors.js";

const RSA_ALGORITHMS = ["RSA1_5", "RSA-OAEP", "RSA-OAEP-256", "RSA-OAEP-384", "RSA-OAEP-512"];
const ECDH_ALGORITHMS = ["ECDH-ES", "ECDH-ES+A128KW", "ECDH-ES+A192KW", "ECDH-ES+A256KW"];
const CONTENT_ENCRYPTION_METHODS = [
  "A128CBC-HS256",
  "A192CBC-HS384",
  "A256CBC-HS512",
  "A128GCM",
  "A192GCM",
  "A256GCM"
];

export type IssuanceResponseEncryptionSpec = Readonly<{
  jwk: Readonly<JWK>;
  algorithm: string;
  encryptionMethod: string;
}>;

const keyTypesFor = (algorithm: string) => {
  if (RSA_ALGORITHMS.includes(algorithm)) return ["RSA"];
  if (ECDH_ALGORITHMS.includes(algorithm)) return ["EC", "OKP"];
  return undefined;
};

/**
 * Encryption the wallet asks the issuer to apply to credential responses.
 * Only asymmetric key management algorithms are accepted and the key must be
 * an encryption key of the matching type.
 */
export const toIssuanceResponseEncryptionSpec = (input: {
  jwk: JWK;
  algorithm: string;
  encryptionMethod: string;
}): IssuanceResponseEncryptionSpec => {
  const keyTypes = keyTypesFor(input.algorithm);
  if (!keyTypes) {
    throw new InvalidValueError("encryption_algorithm_not_asymmetric");
  }
  if (!input.jwk.kty || !keyTypes.includes(input.jwk.kty)) {
    throw new InvalidValueError("encryption_key_algorithm_mismatch");
  }
  if (input.jwk.use !== "enc") {
    throw new InvalidValueError("encryption_key_use_not_enc");
  }
  if (!CONTENT_ENCRYPTION_METHODS.includes(input.encryptionMethod)) {
    throw new InvalidValueError("encryption_method_unknown");
  }
  return Object.freeze({
    jwk: Object.freeze({ ...input.jwk }),
    algorithm: input.algorithm,
    encryptionMethod: input.encryptionMethod
  });
};
