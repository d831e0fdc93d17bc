import { readFileSync } from "node:fs";
import { createLogger, type LogLevel } from "@vci-wallet/shared";
import type { HttpGet } from "../http/httpGet.js";

export const ISSUER = "https://issuer.example.com";
export const AUTH_SERVER = "https://auth.example.com";
export const LOGIN_SERVER = "https://login.example.com";

export const ISSUER_METADATA_URL = `${ISSUER}/.well-known/openid-credential-issuer`;
export const AUTH_SERVER_OIDC_URL = `${AUTH_SERVER}/.well-known/openid-configuration`;
export const AUTH_SERVER_OAUTH_URL = `${AUTH_SERVER}/.well-known/oauth-authorization-server`;
export const LOGIN_SERVER_OIDC_URL = `${LOGIN_SERVER}/.well-known/openid-configuration`;

export const readFixture = (name: string) =>
  readFileSync(new URL(`./fixtures/${name}`, import.meta.url), "utf8");

export const readJsonFixture = (name: string): Record<string, unknown> => {
  const parsed: unknown = JSON.parse(readFixture(name));
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new Error(`fixture ${name} is not a JSON object`);
  }
  return Object.fromEntries(Object.entries(parsed));
};

export type MockRoute = string | Error;

export type MockHttpGet = HttpGet & {
  requested: string[];
};

// Serves bodies by exact URL; anything unrouted fails like a 404.
export const createMockHttpGet = (routes: Record<string, MockRoute>): MockHttpGet => {
  const requested: string[] = [];
  return {
    requested,
    async get(url) {
      requested.push(url);
      const route = Object.hasOwn(routes, url) ? routes[url] : undefined;
      if (route === undefined) {
        throw new Error("HTTP 404");
      }
      if (route instanceof Error) {
        throw route;
      }
      return route;
    }
  };
};

// Routes for the example issuer, served over OIDC discovery.
export const defaultRoutes = (): Record<string, MockRoute> => ({
  [ISSUER_METADATA_URL]: readFixture("credential_issuer_metadata.json"),
  [AUTH_SERVER_OIDC_URL]: readFixture("authorization_server_metadata.json"),
  [LOGIN_SERVER_OIDC_URL]: readFixture("login_server_metadata.json")
});

export const offerDeepLink = (offer: unknown) =>
  `openid-credential-offer://?credential_offer=${encodeURIComponent(JSON.stringify(offer))}`;

const readJsonLine = (line: string): Record<string, unknown> => {
  const parsed: unknown = JSON.parse(line);
  return typeof parsed === "object" && parsed !== null ? Object.fromEntries(Object.entries(parsed)) : {};
};

export const captureLogger = (level?: LogLevel) => {
  const lines: Array<Record<string, unknown>> = [];
  const logger = createLogger("openid4vci-test", {
    level,
    sink: (_level, line) => lines.push(readJsonLine(line))
  });
  return { logger, lines };
};
