import { test } from "node:test";
import assert from "node:assert/strict";
import { InvalidValueError } from "./errors.js";
import { toIssuanceResponseEncryptionSpec } from "./issuanceResponseEncryption.js";

const invalidValue = (code: string) => (error: unknown) =>
  error instanceof InvalidValueError && error.code === code;

const ecKey = { kty: "EC", crv: "P-256", x: "x-coordinate", y: "y-coordinate", use: "enc" };
const rsaKey = { kty: "RSA", n: "modulus", e: "AQAB", use: "enc" };

test("accepts an ECDH-ES spec with an EC encryption key", () => {
  const spec = toIssuanceResponseEncryptionSpec({
    jwk: ecKey,
    algorithm: "ECDH-ES",
    encryptionMethod: "A256GCM"
  });
  assert.deepEqual(spec, { jwk: ecKey, algorithm: "ECDH-ES", encryptionMethod: "A256GCM" });
  assert.equal(Object.isFrozen(spec), true);
});

test("accepts an RSA-OAEP-256 spec with an RSA encryption key", () => {
  const spec = toIssuanceResponseEncryptionSpec({
    jwk: rsaKey,
    algorithm: "RSA-OAEP-256",
    encryptionMethod: "A128CBC-HS256"
  });
  assert.equal(spec.algorithm, "RSA-OAEP-256");
});

test("rejects symmetric algorithms", () => {
  assert.throws(
    () => toIssuanceResponseEncryptionSpec({ jwk: ecKey, algorithm: "A256KW", encryptionMethod: "A256GCM" }),
    invalidValue("encryption_algorithm_not_asymmetric")
  );
  assert.throws(
    () => toIssuanceResponseEncryptionSpec({ jwk: ecKey, algorithm: "dir", encryptionMethod: "A256GCM" }),
    invalidValue("encryption_algorithm_not_asymmetric")
  );
});

test("rejects a key whose type does not match the algorithm family", () => {
  assert.throws(
    () => toIssuanceResponseEncryptionSpec({ jwk: ecKey, algorithm: "RSA-OAEP", encryptionMethod: "A256GCM" }),
    invalidValue("encryption_key_algorithm_mismatch")
  );
  assert.throws(
    () => toIssuanceResponseEncryptionSpec({ jwk: rsaKey, algorithm: "ECDH-ES", encryptionMethod: "A256GCM" }),
    invalidValue("encryption_key_algorithm_mismatch")
  );
});

test("rejects keys not meant for encryption", () => {
  assert.throws(
    () =>
      toIssuanceResponseEncryptionSpec({
        jwk: { ...ecKey, use: "sig" },
        algorithm: "ECDH-ES",
        encryptionMethod: "A256GCM"
      }),
    invalidValue("encryption_key_use_not_enc")
  );
});

test("rejects unknown content encryption methods", () => {
  assert.throws(
    () => toIssuanceResponseEncryptionSpec({ jwk: ecKey, algorithm: "ECDH-ES", encryptionMethod: "A512GCM" }),
    invalidValue("encryption_method_unknown")
  );
});
