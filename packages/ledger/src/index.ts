/**
 * @wallet-ledger/ledger — Single-wallet append-only ledger engine.
 *
 * Enforces the wallet invariants:
 * - The balance is the fold of accepted entries (deposits minus withdrawals)
 * - The balance never goes negative and never leaves the 64-bit range
 * - Entries are immutable once accepted
 * - A rejected operation leaves the ledger untouched
 *
 * Design rules:
 * - All types are readonly
 * - Failures are returned as Results, never thrown
 * - No logging or I/O; callers decide what to report
 */

// Core engine
export { WalletLedger } from "./ledger.js";

// Session facade
export { newSession, apply, balanceOf } from "./session.js";

// Admissibility rules
export { validate } from "./validator.js";

// Balance computation
export { signedAmount, foldBalance, runningBalances } from "./balance-calculator.js";

// History view
export {
  entryKindLabel,
  formatEntry,
  renderHistory,
  renderStatement,
} from "./history.js";
export type { HistorySource } from "./history.js";

// Amount arithmetic
export {
  INT64_MAX,
  INT64_MIN,
  isInt64,
  checkedAdd,
  checkedSub,
  parseAmount,
} from "./amount-math.js";

// Types
export type {
  WalletErrorCode,
  InvalidAmountReason,
  WalletErrorDetails,
  ReplayFailure,
  LedgerOptions,
  LedgerSnapshot,
  EntryFilter,
} from "./types.js";

export {
  WalletError,
  invalidAmount,
  insufficientFunds,
  isWalletError,
} from "./types.js";
