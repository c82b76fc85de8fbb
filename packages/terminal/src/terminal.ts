/**
 * Interactive wallet terminal.
 *
 * Reads menu choices, forwards deposits and withdrawals to the ledger,
 * prints results, and logs every operation. The ledger decides what is
 * admissible; the terminal only reports it.
 */

import chalk, { Chalk } from "chalk";
import type { ChalkInstance } from "chalk";
import type { Logger } from "pino";
import { isEntryKind } from "@wallet-ledger/types";
import type { EntryKind } from "@wallet-ledger/types";
import {
  WalletLedger,
  entryKindLabel,
  parseAmount,
  renderStatement,
} from "@wallet-ledger/ledger";
import type { WalletErrorDetails } from "@wallet-ledger/ledger";
import type { TerminalIO } from "./console-io.js";

// =============================================================================
// Menu
// =============================================================================

type MenuAction = "balance" | EntryKind | "history" | "exit";

const MENU: ReadonlyMap<string, MenuAction> = new Map<string, MenuAction>([
  ["1", "balance"],
  ["2", "deposit"],
  ["3", "withdrawal"],
  ["4", "history"],
  ["5", "exit"],
]);

export const MENU_LINES: readonly string[] = [
  "Please select an option:",
  "1. Check Balance",
  "2. Deposit",
  "3. Withdraw",
  "4. View Transaction History",
  "5. Exit",
];

export const CHOICE_PROMPT = "\nEnter your choice (1-5): ";
export const ADDRESS_PROMPT = "Enter wallet address: ";
export const AMOUNT_PROMPT = "Enter amount: ";

// =============================================================================
// Helpers
// =============================================================================

/** JSON has no bigint; log amounts as decimal text. */
function loggableDetails(details: WalletErrorDetails): Record<string, string> {
  switch (details.code) {
    case "INVALID_AMOUNT":
      return { code: details.code, reason: details.reason, amount: details.amount };
    case "INSUFFICIENT_FUNDS":
      return {
        code: details.code,
        requested: details.requested.toString(),
        available: details.available.toString(),
      };
  }
}

function successMessage(kind: EntryKind, amount: bigint, address: string): string {
  switch (kind) {
    case "deposit":
      return `Successfully deposited ${amount.toString()} to ${address}`;
    case "withdrawal":
      return `Successfully withdrew ${amount.toString()} from ${address}`;
  }
}

// =============================================================================
// Terminal
// =============================================================================

export interface WalletTerminalOptions {
  readonly io: TerminalIO;
  readonly logger: Logger;
  /** Ledger to operate on. A fresh one per terminal by default. */
  readonly ledger?: WalletLedger | undefined;
  /** Colour output. Defaults to on, subject to chalk's terminal detection. */
  readonly color?: boolean | undefined;
}

export class WalletTerminal {
  private readonly io: TerminalIO;
  private readonly logger: Logger;
  private readonly ledger: WalletLedger;
  private readonly style: ChalkInstance;

  constructor(options: WalletTerminalOptions) {
    this.io = options.io;
    this.logger = options.logger;
    this.ledger = options.ledger ?? new WalletLedger();
    this.style = options.color === false ? new Chalk({ level: 0 }) : chalk;
  }

  /**
   * Run the menu loop until the user exits or input ends.
   */
  async run(): Promise<void> {
    this.logger.info("Starting wallet terminal session");
    this.io.print(this.style.cyan.bold("Welcome to the Wallet Ledger Terminal!"));

    let done = false;
    while (!done) {
      done = await this.step();
    }

    this.logger.info(
      { balance: this.ledger.balance.toString(), entries: this.ledger.entryCount },
      "Terminating wallet terminal session",
    );
    this.io.print(this.style.cyan("Thank you for using the Wallet Ledger Terminal!"));
  }

  /**
   * Show the menu and handle one choice.
   * Returns true when the session should end.
   */
  async step(): Promise<boolean> {
    this.io.print("");
    for (const line of MENU_LINES) {
      this.io.print(line);
    }

    const choice = await this.io.ask(CHOICE_PROMPT);
    if (choice === undefined) {
      this.logger.info("Input closed");
      return true;
    }

    const action = MENU.get(choice.trim());
    if (action === undefined) {
      this.logger.warn({ choice: choice.trim() }, "Invalid menu choice");
      this.io.print(this.style.yellow("Invalid choice. Please try again."));
      return false;
    }

    this.logger.debug({ action }, "Menu selection");

    if (isEntryKind(action)) {
      return this.transact(action);
    }

    switch (action) {
      case "balance":
        this.showBalance();
        return false;
      case "history":
        this.showHistory();
        return false;
      case "exit":
        return true;
    }
  }

  private showBalance(): void {
    const balance = this.ledger.balance;
    this.logger.info({ balance: balance.toString() }, "Balance checked");
    this.io.print(`Current balance: ${balance.toString()}`);
  }

  private showHistory(): void {
    const lines = renderStatement(this.ledger);
    this.logger.info({ entries: lines }, "History viewed");

    if (lines.length === 0) {
      this.io.print("No transactions recorded yet.");
      return;
    }

    this.io.print(this.style.bold("Transaction history:"));
    for (const line of lines) {
      this.io.print(line);
    }
  }

  /**
   * Prompt for address and amount, then apply the entry.
   * Returns true if input ended mid-prompt.
   */
  private async transact(kind: EntryKind): Promise<boolean> {
    const label = entryKindLabel(kind);

    const rawAddress = await this.io.ask(ADDRESS_PROMPT);
    if (rawAddress === undefined) {
      return true;
    }
    const address = rawAddress.trim();
    if (address === "") {
      this.logger.warn({ kind }, `${label} rejected: empty wallet address`);
      this.io.print(this.style.red("Error: Wallet address cannot be empty"));
      return false;
    }

    const rawAmount = await this.io.ask(AMOUNT_PROMPT);
    if (rawAmount === undefined) {
      return true;
    }

    const outcome = parseAmount(rawAmount).andThen((amount) =>
      this.ledger.apply(kind, address, amount).map((balance) => ({ amount, balance })),
    );

    if (outcome.isErr()) {
      this.logger.warn(
        { kind, address, ...loggableDetails(outcome.error.details) },
        `${label} rejected`,
      );
      this.io.print(this.style.red(`Error: ${outcome.error.message}`));
      return false;
    }

    const { amount, balance } = outcome.value;
    this.logger.info(
      { kind, address, amount: amount.toString(), balance: balance.toString() },
      `${label} accepted`,
    );
    this.io.print(
      this.style.green(`${successMessage(kind, amount, address)}. New balance: ${balance.toString()}`),
    );
    return false;
  }
}
