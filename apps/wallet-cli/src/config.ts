import dotenv from "dotenv";
import path from "node:path";
import { z } from "zod";
import { CliError } from "./errors.js";

export const loadEnvFile = () => {
  dotenv.config({ path: path.resolve(process.cwd(), ".env") });
};

const booleanFlag = z.preprocess((value) => value === "true", z.boolean());

const envSchema = z.object({
  OID4VCI_HTTP_TIMEOUT_MS: z.preprocess(
    (value) => (value === undefined || value === "" ? undefined : Number(value)),
    z.number().int().positive().default(10_000)
  ),
  OID4VCI_LOG_LEVEL: z.enum(["info", "warn", "error"]).default("info"),
  WALLET_BUILD_MODE: z.enum(["development", "production"]).default("development"),
  NODE_ENV: z.string().optional(),
  WALLET_ALLOW_SOFTWARE_KEYS: booleanFlag,
  WALLET_HOLDER_KEY: z
    .string()
    .trim()
    .regex(/^[a-fA-F0-9]{64}$/, "WALLET_HOLDER_KEY must be 32 bytes (64 hex chars).")
    .optional(),
  WALLET_CLIENT_ID: z.string().trim().min(1).optional()
});

export type WalletConfig = z.infer<typeof envSchema>;

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): WalletConfig => {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new CliError("config_invalid", issues.join("; "));
  }
  const buildMode = parsed.data.NODE_ENV === "production" ? "production" : parsed.data.WALLET_BUILD_MODE;
  return { ...parsed.data, WALLET_BUILD_MODE: buildMode };
};

export const assertSoftwareKeysAllowed = (config: WalletConfig) => {
  if (!config.WALLET_ALLOW_SOFTWARE_KEYS) {
    throw new CliError("software_keys_not_allowed", "WALLET_ALLOW_SOFTWARE_KEYS must be true for software keys.");
  }
  if (config.WALLET_BUILD_MODE === "production") {
    throw new CliError("software_keys_not_allowed", "Software keys are not allowed in production mode.");
  }
};

export const holderSeed = (config: WalletConfig) => {
  assertSoftwareKeysAllowed(config);
  if (!config.WALLET_HOLDER_KEY) {
    throw new CliError("config_invalid", "WALLET_HOLDER_KEY is required to sign proofs.");
  }
  return new Uint8Array(Buffer.from(config.WALLET_HOLDER_KEY, "hex"));
};
