import { base64url, type JWK } from "jose";
import type { BindingKey } from "../bindingKey.js";
import { ProofGenerationException, type ProofGenerationError } from "../errors.js";
import type { CredentialConfiguration } from "../formats/index.js";
import { ProofType, type CNonce } from "../types.js";

export const JWT_PROOF_TYPE_HEADER = "openid4vci-proof+jwt";

export type ProofSigner = {
  getAlgorithm(): string;
  sign(signingInput: Uint8Array): Promise<Uint8Array>;
};

export type Proof = Readonly<{ type: typeof ProofType.JWT; jwt: string }>;

export type ProofBuilder = {
  iss(value: string): ProofBuilder;
  aud(value: string): ProofBuilder;
  nonce(value: string): ProofBuilder;
  publicKey(value: BindingKey): ProofBuilder;
  credentialSpec(value: CredentialConfiguration): ProofBuilder;
  build(signer: ProofSigner): Promise<Proof>;
};

export type JwtProofHeader = {
  alg: string;
  typ: typeof JWT_PROOF_TYPE_HEADER;
  jwk?: JWK;
  kid?: string;
  x5c?: string[];
};

export type JwtProofClaims = {
  iss?: string;
  aud: string;
  nonce: string;
  iat: number;
};

const fail = (error: ProofGenerationError): never => {
  throw new ProofGenerationException(error);
};

const keyHeader = (key: BindingKey): Pick<JwtProofHeader, "jwk" | "kid" | "x5c"> => {
  switch (key.type) {
    case "jwk":
      return { jwk: { ...key.jwk } };
    case "did":
      return { kid: key.identity };
    case "x509":
      return { x5c: [...key.chain] };
  }
};

const encodeSegment = (value: object) => base64url.encode(JSON.stringify(value));

/**
 * Single-use builder for an `openid4vci-proof+jwt`. Setters overwrite; a second
 * `build` fails even when the first one did.
 */
export class JwtProofBuilder implements ProofBuilder {
  private issuer?: string;
  private audience?: string;
  private cNonce?: string;
  private bindingKey?: BindingKey;
  private spec?: CredentialConfiguration;
  private used = false;

  constructor(private readonly now: () => number = Date.now) {}

  iss(value: string) {
    this.issuer = value;
    return this;
  }

  aud(value: string) {
    this.audience = value;
    return this;
  }

  nonce(value: string) {
    this.cNonce = value;
    return this;
  }

  publicKey(value: BindingKey) {
    this.bindingKey = value;
    return this;
  }

  credentialSpec(value: CredentialConfiguration) {
    this.spec = value;
    return this;
  }

  async build(signer: ProofSigner): Promise<Proof> {
    if (this.used) {
      return fail({ kind: "builder_already_used" });
    }
    this.used = true;

    const spec = this.spec ?? fail({ kind: "missing_credential_spec" });
    const jwtProof =
      spec.proofTypesSupported[ProofType.JWT] ??
      fail({ kind: "proof_type_not_supported", proofType: ProofType.JWT });
    const algorithm = signer.getAlgorithm();
    if (jwtProof.algorithms.length > 0 && !jwtProof.algorithms.includes(algorithm)) {
      return fail({ kind: "proof_signing_algorithm_not_supported", algorithm });
    }
    const aud = this.audience ?? fail({ kind: "missing_claim", claim: "aud" });
    const nonce = this.cNonce ?? fail({ kind: "missing_claim", claim: "nonce" });
    const key = this.bindingKey ?? fail({ kind: "missing_binding_key" });

    const header: JwtProofHeader = { alg: algorithm, typ: JWT_PROOF_TYPE_HEADER, ...keyHeader(key) };
    const claims: JwtProofClaims = {
      ...(this.issuer === undefined ? {} : { iss: this.issuer }),
      aud,
      nonce,
      iat: Math.floor(this.now() / 1000)
    };
    const signingInput = `${encodeSegment(header)}.${encodeSegment(claims)}`;
    const signature = await signer.sign(new TextEncoder().encode(signingInput));
    return Object.freeze({ type: ProofType.JWT, jwt: `${signingInput}.${base64url.encode(signature)}` });
  }
}

/**
 * Hands a fresh builder for `type` to `usage`. Only JWT proofs can be built;
 * other types fail before `usage` runs.
 */
export const proofBuilderOfType = async <T>(
  type: ProofType,
  usage: (builder: ProofBuilder) => Promise<T> | T
): Promise<T> => {
  switch (type) {
    case ProofType.JWT:
      return usage(new JwtProofBuilder());
    case ProofType.CWT:
    case ProofType.LDP_VP:
      return fail({ kind: "proof_type_not_supported", proofType: type });
  }
};

export type JwtProofParams = Readonly<{
  iss?: string;
  aud: string;
  nonce: CNonce | string;
  publicKey: BindingKey;
  credentialSpec: CredentialConfiguration;
  now?: () => number;
}>;

export const buildJwtProof = (params: JwtProofParams, signer: ProofSigner) => {
  const builder = new JwtProofBuilder(params.now)
    .aud(params.aud)
    .nonce(typeof params.nonce === "string" ? params.nonce : params.nonce.value)
    .publicKey(params.publicKey)
    .credentialSpec(params.credentialSpec);
  if (params.iss !== undefined) {
    builder.iss(params.iss);
  }
  return builder.build(signer);
};
