import { test } from "node:test";
import assert from "node:assert/strict";
import { assertSoftwareKeysAllowed, holderSeed, loadConfig } from "./config.js";
import { CliError } from "./errors.js";

const HOLDER_KEY = "07".repeat(32);

const cliError = (code: string) => (error: unknown) => error instanceof CliError && error.code === code;

test("config applies defaults", () => {
  const config = loadConfig({});
  assert.equal(config.OID4VCI_HTTP_TIMEOUT_MS, 10_000);
  assert.equal(config.OID4VCI_LOG_LEVEL, "info");
  assert.equal(config.WALLET_BUILD_MODE, "development");
  assert.equal(config.WALLET_ALLOW_SOFTWARE_KEYS, false);
  assert.equal(config.WALLET_HOLDER_KEY, undefined);
});

test("config parses explicit values", () => {
  const config = loadConfig({
    OID4VCI_HTTP_TIMEOUT_MS: "2500",
    OID4VCI_LOG_LEVEL: "warn",
    WALLET_ALLOW_SOFTWARE_KEYS: "true",
    WALLET_HOLDER_KEY: ` ${HOLDER_KEY} `,
    WALLET_CLIENT_ID: "wallet-client-1"
  });
  assert.equal(config.OID4VCI_HTTP_TIMEOUT_MS, 2500);
  assert.equal(config.OID4VCI_LOG_LEVEL, "warn");
  assert.equal(config.WALLET_ALLOW_SOFTWARE_KEYS, true);
  assert.equal(config.WALLET_HOLDER_KEY, HOLDER_KEY);
  assert.equal(config.WALLET_CLIENT_ID, "wallet-client-1");
});

test("NODE_ENV=production forces production mode", () => {
  assert.equal(loadConfig({ NODE_ENV: "production" }).WALLET_BUILD_MODE, "production");
});

test("invalid values are reported as config_invalid", () => {
  assert.throws(() => loadConfig({ OID4VCI_HTTP_TIMEOUT_MS: "soon" }), cliError("config_invalid"));
  assert.throws(() => loadConfig({ OID4VCI_LOG_LEVEL: "debug" }), cliError("config_invalid"));
  assert.throws(() => loadConfig({ WALLET_HOLDER_KEY: "abcd" }), {
    message: "WALLET_HOLDER_KEY: WALLET_HOLDER_KEY must be 32 bytes (64 hex chars)."
  });
});

test("software keys need the allow flag outside production", () => {
  assert.throws(() => assertSoftwareKeysAllowed(loadConfig({})), cliError("software_keys_not_allowed"));
  assert.throws(
    () => assertSoftwareKeysAllowed(loadConfig({ WALLET_ALLOW_SOFTWARE_KEYS: "true", WALLET_BUILD_MODE: "production" })),
    { message: "Software keys are not allowed in production mode." }
  );
  assert.doesNotThrow(() => assertSoftwareKeysAllowed(loadConfig({ WALLET_ALLOW_SOFTWARE_KEYS: "true" })));
});

test("holder seed decodes the configured key", () => {
  const seed = holderSeed(loadConfig({ WALLET_ALLOW_SOFTWARE_KEYS: "true", WALLET_HOLDER_KEY: HOLDER_KEY }));
  assert.deepEqual(seed, new Uint8Array(32).fill(7));
  assert.throws(() => holderSeed(loadConfig({ WALLET_ALLOW_SOFTWARE_KEYS: "true" })), cliError("config_invalid"));
});
