/**
 * @wallet-ledger/terminal — Interactive front end for the wallet ledger.
 *
 * Owns one ledger per session, reads commands from a line-oriented
 * console, and writes an operation log through pino.
 */

export { WalletTerminal, MENU_LINES, CHOICE_PROMPT, ADDRESS_PROMPT, AMOUNT_PROMPT } from "./terminal.js";
export type { WalletTerminalOptions } from "./terminal.js";
export { createConsoleIO } from "./console-io.js";
export type { TerminalIO, ConsoleIO } from "./console-io.js";
export { createLogger, logFileName } from "./logger.js";
export type { LoggerConfig, SessionLogger } from "./logger.js";
export { loadConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
