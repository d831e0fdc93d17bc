import { getPublicKey, hashes, sign } from "@noble/ed25519";
import { sha512 } from "@noble/hashes/sha2.js";
import { base64url, type JWK } from "jose";
import { InvalidValueError } from "../errors.js";
import type { ProofSigner } from "./proofBuilder.js";

if (!hashes.sha512) {
  hashes.sha512 = sha512;
}

const SEED_LENGTH = 32;

const assertSeed = (seed: Uint8Array) => {
  if (seed.length !== SEED_LENGTH) {
    throw new InvalidValueError("ed25519_seed_invalid", `expected ${SEED_LENGTH} bytes`);
  }
};

export const ed25519PublicJwk = async (seed: Uint8Array): Promise<JWK> => {
  assertSeed(seed);
  const publicKey = await getPublicKey(seed);
  return { kty: "OKP", crv: "Ed25519", x: base64url.encode(publicKey) };
};

// Software key; callers gate its use on configuration.
export const createEd25519ProofSigner = (seed: Uint8Array): ProofSigner => {
  assertSeed(seed);
  const privateKey = Uint8Array.from(seed);
  return {
    getAlgorithm: () => "EdDSA",
    async sign(signingInput) {
      return sign(signingInput, privateKey);
    }
  };
};
