import { loadConfig, loadEnvFile, type WalletConfig } from "./config.js";
import { createCommandContext, type CommandContext } from "./commands/context.js";
import { jwtProof } from "./commands/jwtProof.js";
import { resolveOffer } from "./commands/resolveOffer.js";
import { toErrorResponse } from "./errors.js";

const COMMANDS: Record<string, (context: CommandContext, args: string[]) => Promise<void>> = {
  "resolve-offer": resolveOffer,
  "jwt-proof": jwtProof
};

const usage = () => {
  console.log("Usage: wallet <command> [args]");
  console.log("  resolve-offer <deep-link>                            Resolve and validate a credential offer");
  console.log("  jwt-proof <deep-link> <configuration-id> <c_nonce>   Build a JWT proof with the software holder key");
};

let config: WalletConfig | undefined;

const run = async () => {
  loadEnvFile();
  const [command, ...args] = process.argv.slice(2);
  const handler = command && Object.hasOwn(COMMANDS, command) ? COMMANDS[command] : undefined;
  if (!handler) {
    usage();
    return;
  }
  config = loadConfig();
  await handler(createCommandContext(config), args);
};

run()
  .then(() => {
    process.exit(0);
  })
  .catch((error: unknown) => {
    const devMode = config?.WALLET_BUILD_MODE === "development";
    console.error(JSON.stringify(toErrorResponse(error, { devMode })));
    process.exit(1);
  });
