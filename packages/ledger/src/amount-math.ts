/**
 * @wallet-ledger/ledger — Signed 64-bit amount arithmetic.
 *
 * Amounts are bigint, bounded to the signed 64-bit range so the
 * ledger behaves like a fixed-width integer ledger without ever
 * wrapping around.
 *
 * Rules:
 * - No floating-point operations
 * - Results outside the range are reported, never clamped
 */

import { err, ok } from "neverthrow";
import type { Result } from "neverthrow";
import { invalidAmount } from "./types.js";
import type { WalletError } from "./types.js";

export const INT64_MAX = 2n ** 63n - 1n;
export const INT64_MIN = -(2n ** 63n);

/**
 * Whether a value fits in a signed 64-bit integer.
 */
export function isInt64(value: bigint): boolean {
  return value >= INT64_MIN && value <= INT64_MAX;
}

/**
 * Add two amounts. Returns undefined when the sum leaves the range.
 */
export function checkedAdd(a: bigint, b: bigint): bigint | undefined {
  const sum = a + b;
  return isInt64(sum) ? sum : undefined;
}

/**
 * Subtract two amounts. Returns undefined when the difference leaves the range.
 */
export function checkedSub(a: bigint, b: bigint): bigint | undefined {
  const difference = a - b;
  return isInt64(difference) ? difference : undefined;
}

/**
 * Parse user text into an amount.
 *
 * "100" → 100n
 * " -5 " → -5n
 * "+7" → 7n
 * "1.5" → MALFORMED
 *
 * Sign is accepted here; whether a value is admissible is the
 * validator's decision.
 */
export function parseAmount(text: string): Result<bigint, WalletError> {
  const trimmed = text.trim();

  if (!/^[+-]?\d+$/.test(trimmed)) {
    return err(invalidAmount(trimmed, "MALFORMED"));
  }

  const value = BigInt(trimmed);
  if (!isInt64(value)) {
    return err(invalidAmount(trimmed, "OUT_OF_RANGE"));
  }

  return ok(value);
}
