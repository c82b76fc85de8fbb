/**
 * @wallet-ledger/terminal — Entry point.
 *
 * Loads config, opens the session log, and runs one terminal session
 * over stdin/stdout. Run with `npm start`.
 */

import { loadConfig } from "./config.js";
import { createConsoleIO } from "./console-io.js";
import { createLogger } from "./logger.js";
import { WalletTerminal } from "./terminal.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const { logger, file } = createLogger(config);
  logger.info({ file, level: config.LOG_LEVEL }, "Logging initialized");

  const io = createConsoleIO();
  const terminal = new WalletTerminal({ io, logger, color: config.COLOR });

  try {
    await terminal.run();
  } finally {
    io.close();
  }
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
