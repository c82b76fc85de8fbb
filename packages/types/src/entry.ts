/**
 * Entry Types
 *
 * The record of a single movement of funds into or out of the wallet.
 *
 * Rules:
 * - Amounts are bigint magnitudes, never negative in a stored entry
 * - Direction is carried by the kind, not by the sign of the amount
 * - Entries are append-only by contract
 */

/**
 * Direction of a movement. There are exactly two; consumers switch
 * over them exhaustively.
 */
export type EntryKind = "deposit" | "withdrawal";

/**
 * A proposed movement, before the ledger has accepted it.
 */
export interface EntryDraft {
  /** Deposit or withdrawal */
  readonly kind: EntryKind;

  /** Wallet the movement concerns (opaque, attached as metadata) */
  readonly address: string;

  /** Signed 64-bit quantity; only values > 0 are admissible */
  readonly amount: bigint;
}

/**
 * A movement the ledger has accepted.
 */
export interface Entry extends EntryDraft {
  /** 1-based position in the ledger */
  readonly sequence: number;

  /** ISO 8601 timestamp of acceptance */
  readonly timestamp: string;
}
