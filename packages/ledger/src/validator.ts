/**
 * @wallet-ledger/ledger — Admissibility rules for a proposed entry.
 *
 * Pure and deterministic: the verdict depends only on the kind, the
 * amount and the balance the entry would be applied to.
 *
 * Rules (checked in order, first failure wins):
 * 1. Amount must fit in a signed 64-bit integer
 * 2. Amount must be positive
 * 3. Withdrawals must not exceed the balance (equal is allowed)
 * 4. Deposits must not push the balance past INT64_MAX
 */

import { err, ok } from "neverthrow";
import type { Result } from "neverthrow";
import type { EntryKind } from "@wallet-ledger/types";
import { checkedAdd, isInt64 } from "./amount-math.js";
import { insufficientFunds, invalidAmount } from "./types.js";
import type { WalletError } from "./types.js";

export function validate(
  kind: EntryKind,
  amount: bigint,
  currentBalance: bigint,
): Result<void, WalletError> {
  if (!isInt64(amount)) {
    return err(invalidAmount(amount, "OUT_OF_RANGE"));
  }

  if (amount <= 0n) {
    return err(invalidAmount(amount, "NON_POSITIVE"));
  }

  switch (kind) {
    case "withdrawal":
      if (amount > currentBalance) {
        return err(insufficientFunds(amount, currentBalance));
      }
      return ok(undefined);
    case "deposit":
      if (checkedAdd(currentBalance, amount) === undefined) {
        return err(invalidAmount(amount, "OVERFLOW"));
      }
      return ok(undefined);
  }
}
