/**
 * @wallet-ledger/ledger — Internal types for the ledger engine.
 *
 * Rules:
 * - All types are readonly
 * - No mutation of stored entries
 * - Fail-closed: invalid entries are rejected with a typed error, never
 *   silently accepted or corrected
 */

import type { Entry, EntryKind } from "@wallet-ledger/types";

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for wallet operations. */
export type WalletErrorCode = "INVALID_AMOUNT" | "INSUFFICIENT_FUNDS";

/** Why an amount was not processable. */
export type InvalidAmountReason =
  | "NON_POSITIVE"
  | "OVERFLOW"
  | "OUT_OF_RANGE"
  | "MALFORMED";

/**
 * Structured detail carried by a WalletError, discriminated on `code`.
 * Amounts are kept as text so malformed input can be reported verbatim.
 */
export type WalletErrorDetails =
  | {
      readonly code: "INVALID_AMOUNT";
      readonly reason: InvalidAmountReason;
      readonly amount: string;
    }
  | {
      readonly code: "INSUFFICIENT_FUNDS";
      readonly requested: bigint;
      readonly available: bigint;
    };

function messageFor(details: WalletErrorDetails): string {
  switch (details.code) {
    case "INSUFFICIENT_FUNDS":
      return `Insufficient funds for withdrawal of ${details.requested.toString()}. Available balance: ${details.available.toString()}`;
    case "INVALID_AMOUNT":
      switch (details.reason) {
        case "NON_POSITIVE":
          return `Invalid transaction amount: ${details.amount}`;
        case "OVERFLOW":
          return `Invalid transaction amount: ${details.amount} would overflow the balance`;
        case "OUT_OF_RANGE":
          return `Invalid transaction amount: ${details.amount} is outside the 64-bit range`;
        case "MALFORMED":
          return `Invalid transaction amount: "${details.amount}" is not a whole number`;
      }
  }
}

/**
 * Structured error from the ledger engine.
 * Returned inside a Result, never thrown for a rejected entry.
 */
export class WalletError extends Error {
  public readonly code: WalletErrorCode;
  public readonly details: WalletErrorDetails;

  constructor(details: WalletErrorDetails) {
    super(messageFor(details));
    this.name = "WalletError";
    this.code = details.code;
    this.details = details;
  }
}

export function invalidAmount(amount: bigint | string, reason: InvalidAmountReason): WalletError {
  return new WalletError({
    code: "INVALID_AMOUNT",
    reason,
    amount: typeof amount === "bigint" ? amount.toString() : amount,
  });
}

export function insufficientFunds(requested: bigint, available: bigint): WalletError {
  return new WalletError({ code: "INSUFFICIENT_FUNDS", requested, available });
}

export function isWalletError(value: unknown): value is WalletError {
  return value instanceof WalletError;
}

/**
 * A replayed draft that the ledger refused, with its zero-based
 * position in the replayed sequence.
 */
export interface ReplayFailure {
  readonly index: number;
  readonly error: WalletError;
}

// ─── Ledger Options ──────────────────────────────────────────────────────

/**
 * Options for constructing a ledger.
 */
export interface LedgerOptions {
  /** Source of entry timestamps. Defaults to the wall clock. */
  readonly clock?: (() => string) | undefined;
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

/**
 * Point-in-time copy of the ledger state. Lives only as long as the
 * session that produced it.
 */
export interface LedgerSnapshot {
  readonly version: 1;
  readonly entries: readonly Entry[];
  readonly balance: bigint;
  readonly createdAt: string;
}

// ─── Query Types ─────────────────────────────────────────────────────────

/**
 * Filter criteria for querying ledger entries.
 */
export interface EntryFilter {
  readonly address?: string | undefined;
  readonly kind?: EntryKind | undefined;
}
