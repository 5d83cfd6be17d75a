import { describe, test, expect } from "vitest";
import { GlycemicError, isGlycemicError } from "@/lib/glycemic-error";
import { parseServingSize } from "@/lib/serving";

const BASE_SERVING = 98;

function servingError(servingSize: string): GlycemicError {
  try {
    parseServingSize(servingSize, BASE_SERVING);
  } catch (error) {
    if (isGlycemicError(error)) return error;
    throw error;
  }
  throw new Error(`expected '${servingSize}' to be rejected`);
}

describe("parseServingSize: grams", () => {
  test("accepts a number with or without a space before g", () => {
    expect(parseServingSize("100g", BASE_SERVING)).toBe(100);
    expect(parseServingSize("100 g", BASE_SERVING)).toBe(100);
    expect(parseServingSize("50.5g", BASE_SERVING)).toBe(50.5);
  });

  test("is case-insensitive and ignores surrounding whitespace", () => {
    expect(parseServingSize("  150G ", BASE_SERVING)).toBe(150);
  });

  test("zero grams is a valid serving", () => {
    expect(parseServingSize("0g", BASE_SERVING)).toBe(0);
    expect(Object.is(parseServingSize("-0g", BASE_SERVING), 0)).toBe(true);
  });
});

describe("parseServingSize: servings", () => {
  test("multiplies by the base serving mass", () => {
    expect(parseServingSize("1 serving", BASE_SERVING)).toBe(98);
    expect(parseServingSize("2 servings", BASE_SERVING)).toBe(196);
    expect(parseServingSize("0.5 serving", BASE_SERVING)).toBe(49);
    expect(parseServingSize("2.5 Servings", BASE_SERVING)).toBe(245);
  });

  test("does not read 'serving' as a gram suffix", () => {
    // ends in "g", but must go through the serving branch
    expect(parseServingSize("3 serving", 10)).toBe(30);
  });

  test("zero servings is a valid serving", () => {
    expect(parseServingSize("0 servings", BASE_SERVING)).toBe(0);
  });
});

describe("parseServingSize: rejected input", () => {
  test("empty string", () => {
    expect(servingError("").detail).toEqual({
      kind: "INVALID_SERVING_FORMAT",
      servingSize: "",
      reason: "serving size is empty",
    });
    expect(servingError("   ").kind).toBe("INVALID_SERVING_FORMAT");
  });

  test("negative grams and servings", () => {
    expect(servingError("-100g").detail).toEqual({
      kind: "INVALID_SERVING_FORMAT",
      servingSize: "-100g",
      reason: "amount must not be negative",
    });
    expect(servingError("-1 serving").kind).toBe("INVALID_SERVING_FORMAT");
  });

  test("unit without a number", () => {
    expect(servingError("g").detail).toMatchObject({ reason: "missing amount" });
    expect(servingError("serving").detail).toMatchObject({ reason: "missing amount" });
  });

  test("unrecognized shapes", () => {
    expect(servingError("invalid format").detail).toMatchObject({
      reason: "expected '<number>g' or '<number> serving(s)'",
    });
    expect(servingError("100").kind).toBe("INVALID_SERVING_FORMAT");
    expect(servingError("100kg").detail).toMatchObject({ reason: "'100k' is not a number" });
    expect(servingError("two servings").detail).toMatchObject({ reason: "'two' is not a number" });
  });

  test("the unit must follow the number", () => {
    expect(servingError("serving 2").detail).toMatchObject({
      reason: "expected '<number>g' or '<number> serving(s)'",
    });
    expect(servingError("servings2").kind).toBe("INVALID_SERVING_FORMAT");
    expect(servingError("2 servings extra").kind).toBe("INVALID_SERVING_FORMAT");
  });

  test("amounts too large for a finite number", () => {
    const huge = "1" + "0".repeat(400);
    expect(servingError(`${huge}g`).detail).toEqual({
      kind: "INVALID_SERVING_FORMAT",
      servingSize: `${huge}g`,
      reason: "amount is out of range",
    });
    expect(servingError(`${huge} servings`).detail).toMatchObject({ reason: "amount is out of range" });
  });

  test("a finite count whose mass overflows", () => {
    // 1e308 servings of 98g
    expect(servingError(`1${"0".repeat(308)} servings`).detail).toMatchObject({
      reason: "amount is out of range",
    });
  });

  test("error message names the offending input", () => {
    expect(servingError("lots").message).toBe(
      "Invalid serving size 'lots': expected '<number>g' or '<number> serving(s)'"
    );
  });
});
