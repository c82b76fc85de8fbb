import { describe, it, expect } from "vitest";
import {
  INT64_MAX,
  INT64_MIN,
  isInt64,
  checkedAdd,
  checkedSub,
  parseAmount,
} from "../src/amount-math.js";
import { WalletError } from "../src/types.js";

describe("range constants", () => {
  it("match the signed 64-bit bounds", () => {
    expect(INT64_MAX).toBe(9223372036854775807n);
    expect(INT64_MIN).toBe(-9223372036854775808n);
  });
});

describe("isInt64", () => {
  it("accepts the bounds", () => {
    expect(isInt64(INT64_MAX)).toBe(true);
    expect(isInt64(INT64_MIN)).toBe(true);
    expect(isInt64(0n)).toBe(true);
  });

  it("rejects values one past the bounds", () => {
    expect(isInt64(INT64_MAX + 1n)).toBe(false);
    expect(isInt64(INT64_MIN - 1n)).toBe(false);
  });
});

describe("checkedAdd / checkedSub", () => {
  it("returns the result inside the range", () => {
    expect(checkedAdd(100n, 50n)).toBe(150n);
    expect(checkedSub(100n, 150n)).toBe(-50n);
    expect(checkedAdd(INT64_MAX - 1n, 1n)).toBe(INT64_MAX);
  });

  it("returns undefined on overflow", () => {
    expect(checkedAdd(INT64_MAX, 1n)).toBeUndefined();
    expect(checkedSub(INT64_MIN, 1n)).toBeUndefined();
  });
});

describe("parseAmount", () => {
  it("parses plain digits", () => {
    expect(parseAmount("100")._unsafeUnwrap()).toBe(100n);
  });

  it("ignores surrounding whitespace", () => {
    expect(parseAmount("  42 \n")._unsafeUnwrap()).toBe(42n);
  });

  it("keeps the sign for the validator to judge", () => {
    expect(parseAmount("-5")._unsafeUnwrap()).toBe(-5n);
    expect(parseAmount("+7")._unsafeUnwrap()).toBe(7n);
    expect(parseAmount("0")._unsafeUnwrap()).toBe(0n);
  });

  it("parses the largest 64-bit value", () => {
    expect(parseAmount("9223372036854775807")._unsafeUnwrap()).toBe(INT64_MAX);
  });

  it("rejects values past the 64-bit range", () => {
    const error = parseAmount("9223372036854775808")._unsafeUnwrapErr();
    expect(error).toBeInstanceOf(WalletError);
    expect(error.details).toEqual({
      code: "INVALID_AMOUNT",
      reason: "OUT_OF_RANGE",
      amount: "9223372036854775808",
    });
  });

  it("rejects fractions, words and empty input", () => {
    for (const text of ["1.5", "abc", "", "   ", "10e3", "--1"]) {
      const result = parseAmount(text);
      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.code).toBe("INVALID_AMOUNT");
        expect(result.error.details).toMatchObject({ reason: "MALFORMED" });
      }
    }
  });

  it("reports the trimmed text in the message", () => {
    const error = parseAmount(" 1.5 ")._unsafeUnwrapErr();
    expect(error.message).toBe('Invalid transaction amount: "1.5" is not a whole number');
  });
});
