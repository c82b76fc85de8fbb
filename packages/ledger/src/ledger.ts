/**
 * @wallet-ledger/ledger — Core WalletLedger class.
 *
 * Append-only ledger for a single wallet. Once an entry is accepted
 * it is permanent; the balance is the fold of the accepted entries.
 *
 * API surface:
 * - apply() — Validate and append a deposit or withdrawal
 * - balance — Current balance
 * - getEntries() — Query accepted entries with optional filters
 * - snapshot() — Copy of the current state
 * - replay() — Build a ledger from a sequence of drafts
 *
 * There is NO update(), delete(), or modify().
 */

import { err, ok } from "neverthrow";
import type { Result } from "neverthrow";
import type { Entry, EntryDraft, EntryKind } from "@wallet-ledger/types";
import { signedAmount } from "./balance-calculator.js";
import type {
  EntryFilter,
  LedgerOptions,
  LedgerSnapshot,
  ReplayFailure,
  WalletError,
} from "./types.js";
import { validate } from "./validator.js";

/**
 * Append-only single-wallet ledger.
 *
 * Every apply is validated against the current balance before
 * anything is written. A rejected apply leaves the ledger exactly
 * as it was.
 */
export class WalletLedger {
  private readonly _entries: Entry[] = [];
  private readonly _clock: () => string;
  private _balance = 0n;

  constructor(options?: LedgerOptions) {
    this._clock = options?.clock ?? (() => new Date().toISOString());
  }

  // ─── Core Apply (The Only Write Operation) ───────────────────────────

  /**
   * Apply a deposit or withdrawal.
   *
   * Returns the new balance, or the reason the entry was refused.
   */
  apply(kind: EntryKind, address: string, amount: bigint): Result<bigint, WalletError> {
    const verdict = validate(kind, amount, this._balance);
    if (verdict.isErr()) {
      return err(verdict.error);
    }

    const entry: Entry = {
      sequence: this._entries.length + 1,
      kind,
      address,
      amount,
      timestamp: this._clock(),
    };

    this._entries.push(entry);
    this._balance += signedAmount(entry);

    return ok(this._balance);
  }

  // ─── Query Operations ────────────────────────────────────────────────

  /**
   * Current balance over all accepted entries.
   */
  get balance(): bigint {
    return this._balance;
  }

  /**
   * Number of accepted entries.
   */
  get entryCount(): number {
    return this._entries.length;
  }

  /**
   * Get accepted entries in acceptance order, optionally filtered.
   */
  getEntries(filter?: EntryFilter): readonly Entry[] {
    if (filter === undefined) {
      return [...this._entries];
    }

    return this._entries.filter((entry) => {
      if (filter.address !== undefined && entry.address !== filter.address) {
        return false;
      }
      if (filter.kind !== undefined && entry.kind !== filter.kind) {
        return false;
      }
      return true;
    });
  }

  // ─── Snapshot ────────────────────────────────────────────────────────

  snapshot(): LedgerSnapshot {
    return {
      version: 1,
      entries: [...this._entries],
      balance: this._balance,
      createdAt: this._clock(),
    };
  }

  /**
   * Build a ledger by applying drafts in order.
   * Fails at the first draft the ledger refuses, reporting its index.
   */
  static replay(
    drafts: readonly EntryDraft[],
    options?: LedgerOptions,
  ): Result<WalletLedger, ReplayFailure> {
    const ledger = new WalletLedger(options);

    for (const [index, draft] of drafts.entries()) {
      const applied = ledger.apply(draft.kind, draft.address, draft.amount);
      if (applied.isErr()) {
        return err({ index, error: applied.error });
      }
    }

    return ok(ledger);
  }
}
