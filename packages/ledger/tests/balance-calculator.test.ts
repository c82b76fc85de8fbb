import { describe, it, expect } from "vitest";
import type { EntryDraft } from "@wallet-ledger/types";
import {
  foldBalance,
  runningBalances,
  signedAmount,
} from "../src/balance-calculator.js";

function deposit(amount: bigint, address = "wallet_1"): EntryDraft {
  return { kind: "deposit", address, amount };
}

function withdrawal(amount: bigint, address = "wallet_1"): EntryDraft {
  return { kind: "withdrawal", address, amount };
}

describe("signedAmount", () => {
  it("is positive for deposits and negative for withdrawals", () => {
    expect(signedAmount(deposit(100n))).toBe(100n);
    expect(signedAmount(withdrawal(30n))).toBe(-30n);
  });
});

describe("foldBalance", () => {
  it("returns 0 for no drafts", () => {
    expect(foldBalance([])._unsafeUnwrap()).toBe(0n);
  });

  it("folds a deposit and a withdrawal", () => {
    expect(foldBalance([deposit(100n), withdrawal(30n)])._unsafeUnwrap()).toBe(70n);
  });

  it("sums multiple deposits", () => {
    expect(foldBalance([deposit(100n), deposit(200n)])._unsafeUnwrap()).toBe(300n);
  });

  it("stops at the first withdrawal that exceeds the balance", () => {
    const failure = foldBalance([withdrawal(50n), withdrawal(30n)])._unsafeUnwrapErr();
    expect(failure.index).toBe(0);
    expect(failure.error.details).toEqual({
      code: "INSUFFICIENT_FUNDS",
      requested: 50n,
      available: 0n,
    });
  });

  it("reports the available balance at the failing position", () => {
    const failure = foldBalance([deposit(50n), withdrawal(100n)])._unsafeUnwrapErr();
    expect(failure.index).toBe(1);
    expect(failure.error.details).toEqual({
      code: "INSUFFICIENT_FUNDS",
      requested: 100n,
      available: 50n,
    });
  });

  it("rejects a negative amount", () => {
    const failure = foldBalance([deposit(-100n)])._unsafeUnwrapErr();
    expect(failure.index).toBe(0);
    expect(failure.error.details).toEqual({
      code: "INVALID_AMOUNT",
      reason: "NON_POSITIVE",
      amount: "-100",
    });
  });

  it("ignores the address when folding", () => {
    const drafts = [deposit(150n, "wallet_6"), withdrawal(50n, "wallet_7")];
    expect(foldBalance(drafts)._unsafeUnwrap()).toBe(100n);
  });
});

describe("runningBalances", () => {
  it("lists the balance after each entry", () => {
    expect(runningBalances([deposit(100n), withdrawal(40n), deposit(10n)])).toEqual([
      100n,
      60n,
      70n,
    ]);
  });

  it("is empty for no entries", () => {
    expect(runningBalances([])).toEqual([]);
  });
});
