/**
 * @wallet-ledger/ledger — History view.
 *
 * Read-only rendering of the entry sequence. Every call recomputes
 * from the ledger's current entries; nothing is cached between calls.
 */

import type { Entry, EntryKind } from "@wallet-ledger/types";
import { runningBalances } from "./balance-calculator.js";

/**
 * Anything that can list its accepted entries in order.
 */
export interface HistorySource {
  getEntries(): readonly Entry[];
}

export function entryKindLabel(kind: EntryKind): string {
  switch (kind) {
    case "deposit":
      return "Deposit";
    case "withdrawal":
      return "Withdrawal";
  }
}

/**
 * "Deposit of 100 to addrA"
 */
export function formatEntry(entry: Entry): string {
  return `${entryKindLabel(entry.kind)} of ${entry.amount.toString()} to ${entry.address}`;
}

/**
 * One line per entry, in acceptance order.
 */
export function renderHistory(source: HistorySource): string[] {
  return source.getEntries().map(formatEntry);
}

/**
 * History lines with the balance after each entry:
 * "Deposit of 100 to addrA | Running balance: 100"
 */
export function renderStatement(source: HistorySource): string[] {
  const entries = source.getEntries();
  const balances = runningBalances(entries);

  return entries.map((entry, i) => {
    const balance = balances[i] ?? 0n;
    return `${formatEntry(entry)} | Running balance: ${balance.toString()}`;
  });
}
