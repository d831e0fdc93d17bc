import type { HttpGet } from "@vci-wallet/openid4vci";
import { createLogger } from "@vci-wallet/shared";
import { loadConfig } from "../config.js";
import type { CommandContext } from "./context.js";

export const ISSUER = "https://issuer.example.com";

const issuerMetadata = {
  credential_issuer: ISSUER,
  credential_endpoint: `${ISSUER}/credential`,
  credential_configurations_supported: {
    UniversityDegree_JWT: {
      format: "jwt_vc_json",
      scope: "UniversityDegree",
      proof_types_supported: { jwt: { proof_signing_alg_values_supported: ["EdDSA"] } },
      credential_definition: { type: ["VerifiableCredential", "UniversityDegreeCredential"] }
    }
  }
};

const authorizationServerMetadata = {
  issuer: ISSUER,
  token_endpoint: `${ISSUER}/token`
};

export const ROUTES: Record<string, string> = {
  [`${ISSUER}/.well-known/openid-credential-issuer`]: JSON.stringify(issuerMetadata),
  [`${ISSUER}/.well-known/openid-configuration`]: JSON.stringify(authorizationServerMetadata)
};

export const deepLinkFor = (offer: unknown) =>
  `openid-credential-offer://?credential_offer=${encodeURIComponent(JSON.stringify(offer))}`;

export const createTestContext = (env: NodeJS.ProcessEnv = {}) => {
  const requested: string[] = [];
  const output: string[] = [];
  const httpGet: HttpGet = {
    async get(url) {
      requested.push(url);
      const body = Object.hasOwn(ROUTES, url) ? ROUTES[url] : undefined;
      if (body === undefined) {
        throw new Error("HTTP 404");
      }
      return body;
    }
  };
  const context: CommandContext = {
    config: loadConfig(env),
    httpGet,
    logger: createLogger("wallet-cli-test", { sink: () => undefined }),
    write: (line) => {
      output.push(line);
    }
  };
  return { context, requested, output };
};
