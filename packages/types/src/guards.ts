/**
 * Runtime Type Guards
 *
 * Narrowing functions for entry types, for values arriving from
 * outside the type system (user input, menu tables).
 */

import type { EntryKind } from "./entry.js";

const ENTRY_KINDS = new Set<string>(["deposit", "withdrawal"]);

export function isEntryKind(value: unknown): value is EntryKind {
  return typeof value === "string" && ENTRY_KINDS.has(value);
}

