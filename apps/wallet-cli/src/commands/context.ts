import { createFetchHttpGet, type HttpGet } from "@vci-wallet/openid4vci";
import { createLogger, type Logger } from "@vci-wallet/shared";
import type { WalletConfig } from "../config.js";

export type CommandContext = {
  config: WalletConfig;
  httpGet: HttpGet;
  logger: Logger;
  write: (output: string) => void;
};

export const createCommandContext = (config: WalletConfig): CommandContext => ({
  config,
  httpGet: createFetchHttpGet({ timeoutMs: config.OID4VCI_HTTP_TIMEOUT_MS }),
  logger: createLogger("wallet-cli", { level: config.OID4VCI_LOG_LEVEL }),
  write: (output) => {
    process.stdout.write(`${output}\n`);
  }
});
