import {
  authorizationCodeGrantOf,
  createCredentialOfferRequestResolver,
  preAuthorizedCodeGrantOf,
  type CredentialOffer,
  type Grants
} from "@vci-wallet/openid4vci";
import { CliError } from "../errors.js";
import type { CommandContext } from "./context.js";

// Grant secrets stay out of the printed summary; only their presence is shown.
const describeGrants = (grants: Grants) => {
  const authorizationCode = authorizationCodeGrantOf(grants);
  const preAuthorizedCode = preAuthorizedCodeGrantOf(grants);
  return {
    kind: grants.kind,
    authorizationCode: authorizationCode && {
      issuerStatePresent: authorizationCode.issuerState !== undefined,
      authorizationServer: authorizationCode.authorizationServer
    },
    preAuthorizedCode: preAuthorizedCode && {
      userPinRequired: preAuthorizedCode.userPinRequired,
      intervalSeconds: preAuthorizedCode.intervalSeconds,
      txCode: preAuthorizedCode.txCode,
      authorizationServer: preAuthorizedCode.authorizationServer
    }
  };
};

export const describeOffer = (offer: CredentialOffer) => ({
  credentialIssuer: offer.credentialIssuerIdentifier,
  credentialEndpoint: offer.credentialIssuerMetadata.credentialEndpoint,
  authorizationServer: offer.authorizationServerMetadata.issuer,
  tokenEndpoint: offer.authorizationServerMetadata.tokenEndpoint,
  credentials: offer.credentials,
  grants: describeGrants(offer.grants)
});

export const resolveOfferWith = (context: CommandContext, deepLink: string) =>
  createCredentialOfferRequestResolver({ httpGet: context.httpGet, logger: context.logger }).resolve(deepLink);

export const resolveOffer = async (context: CommandContext, args: string[]) => {
  const [deepLink] = args;
  if (!deepLink) {
    throw new CliError("invalid_request", "Usage: resolve-offer <deep-link>");
  }
  const offer = await resolveOfferWith(context, deepLink);
  context.write(JSON.stringify(describeOffer(offer), null, 2));
};
