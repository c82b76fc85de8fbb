/**
 * @wallet-ledger/ledger — Balance calculation.
 *
 * The balance is a fold over the entry sequence: deposits add,
 * withdrawals subtract. Nothing else moves it.
 */

import { err, ok } from "neverthrow";
import type { Result } from "neverthrow";
import type { EntryDraft } from "@wallet-ledger/types";
import type { ReplayFailure } from "./types.js";
import { validate } from "./validator.js";

/**
 * The amount an entry contributes to the balance.
 */
export function signedAmount(entry: EntryDraft): bigint {
  switch (entry.kind) {
    case "deposit":
      return entry.amount;
    case "withdrawal":
      return -entry.amount;
  }
}

/**
 * Fold drafts into a balance, validating each against the balance
 * accumulated so far. Stops at the first inadmissible draft.
 */
export function foldBalance(
  drafts: readonly EntryDraft[],
): Result<bigint, ReplayFailure> {
  let balance = 0n;

  for (const [index, draft] of drafts.entries()) {
    const verdict = validate(draft.kind, draft.amount, balance);
    if (verdict.isErr()) {
      return err({ index, error: verdict.error });
    }
    balance += signedAmount(draft);
  }

  return ok(balance);
}

/**
 * Balance after each entry, in order. Assumes the entries were
 * already admitted (as every entry in a ledger was).
 */
export function runningBalances(entries: readonly EntryDraft[]): bigint[] {
  const balances: bigint[] = [];
  let balance = 0n;

  for (const entry of entries) {
    balance += signedAmount(entry);
    balances.push(balance);
  }

  return balances;
}
