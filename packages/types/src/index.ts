/**
 * @wallet-ledger/types — Shared entry types for the wallet ledger.
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types — meaning lives in consuming code
 */

export type { EntryKind, EntryDraft, Entry } from "./entry.js";

// Runtime type guards
export { isEntryKind } from "./guards.js";
