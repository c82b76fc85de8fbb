/**
 * @wallet-ledger/ledger — Session-level functions.
 *
 * The ledger is an explicitly owned value: the caller creates one per
 * session and passes it into every call. There is no shared instance.
 */

import type { Result } from "neverthrow";
import type { EntryKind } from "@wallet-ledger/types";
import { WalletLedger } from "./ledger.js";
import type { LedgerOptions, WalletError } from "./types.js";

/** Empty ledger: balance 0, no history. */
export function newSession(options?: LedgerOptions): WalletLedger {
  return new WalletLedger(options);
}

export function apply(
  ledger: WalletLedger,
  kind: EntryKind,
  address: string,
  amount: bigint,
): Result<bigint, WalletError> {
  return ledger.apply(kind, address, amount);
}

export function balanceOf(ledger: WalletLedger): bigint {
  return ledger.balance;
}

