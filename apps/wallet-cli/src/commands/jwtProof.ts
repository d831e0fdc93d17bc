import {
  buildJwtProof,
  createEd25519ProofSigner,
  ed25519PublicJwk,
  findCredentialConfiguration,
  jwkBindingKey,
  toCNonce,
  toCredentialConfigurationIdentifier
} from "@vci-wallet/openid4vci";
import { holderSeed } from "../config.js";
import { CliError } from "../errors.js";
import type { CommandContext } from "./context.js";
import { resolveOfferWith } from "./resolveOffer.js";

export const jwtProof = async (context: CommandContext, args: string[]) => {
  const [deepLink, configurationId, cNonce] = args;
  if (!deepLink || !configurationId || !cNonce) {
    throw new CliError("invalid_request", "Usage: jwt-proof <deep-link> <configuration-id> <c_nonce>");
  }
  // Refuse before anything goes over the network.
  const seed = holderSeed(context.config);
  const offer = await resolveOfferWith(context, deepLink);
  const credentialSpec = findCredentialConfiguration(
    offer.credentialIssuerMetadata,
    toCredentialConfigurationIdentifier(configurationId)
  );
  if (!credentialSpec) {
    throw new CliError("invalid_request", `Unknown credential configuration: ${configurationId}`);
  }
  const proof = await buildJwtProof(
    {
      iss: context.config.WALLET_CLIENT_ID,
      aud: offer.credentialIssuerIdentifier,
      nonce: toCNonce(cNonce),
      publicKey: jwkBindingKey(await ed25519PublicJwk(seed)),
      credentialSpec
    },
    createEd25519ProofSigner(seed)
  );
  context.logger.info("proof.built", { configuration: configurationId, proofType: proof.type });
  context.write(JSON.stringify({ proof: { proof_type: proof.type, jwt: proof.jwt } }, null, 2));
};
