import { describe, expect, test } from "@jest/globals";
import { DEFAULT_DICTIONARY } from "../estimate/dictionary";
import { checkPriceSanity, isPriceValid, validatePrice } from "../estimate/priceValidator";

const D = DEFAULT_DICTIONARY;

describe("validatePrice", () => {
  test("a missing price is always valid", () => {
    expect(validatePrice("cubicle", null, D)).toEqual({ valid: true, reason: null });
  });

  test("high-value equipment below its minimum is rejected", () => {
    expect(validatePrice("Cubicle", 400000, D)).toEqual({
      valid: false,
      reason: "below-minimum",
      limit: 800000,
      keyword: "cubicle",
    });
    expect(validatePrice("キュービクル", 500000, D)).toEqual({
      valid: false,
      reason: "below-minimum",
      limit: 800000,
      keyword: "キュービクル",
    });
  });

  test("the minimum itself is accepted", () => {
    expect(isPriceValid("transformer", 300000, D)).toBe(true);
  });

  test("exclusion keywords skip the minimum check", () => {
    expect(isPriceValid("cubicle inspection", 50000, D)).toBe(true);
    expect(isPriceValid("キュービクル点検", 50000, D)).toBe(true);
  });

  test("everyday items above their maximum are rejected", () => {
    expect(validatePrice("outlet", 25000, D)).toEqual({
      valid: false,
      reason: "above-maximum",
      limit: 20000,
      keyword: "outlet",
    });
  });

  test("keywords match whole words in latin text", () => {
    // "switchboard" is not a "switch"
    expect(isPriceValid("switchboard", 50000, D)).toBe(true);
    expect(isPriceValid("light switch", 50000, D)).toBe(false);
  });
});

describe("checkPriceSanity", () => {
  test("unit price above the unit ceiling is rejected", () => {
    expect(checkPriceSanity({ unit: "ｍ", price: 60000, quantity: 1 }, D)).toEqual({
      valid: false,
      reason: "unit-price-ceiling",
      limit: 50000,
      keyword: "m",
    });
  });

  test("line amount above the cap is rejected", () => {
    expect(checkPriceSanity({ unit: "set", price: 60000000, quantity: 2 }, D)).toEqual({
      valid: false,
      reason: "amount-ceiling",
      limit: 100000000,
      keyword: "",
    });
  });

  test("passes without a quantity or below the limits", () => {
    expect(checkPriceSanity({ unit: "m", price: 100, quantity: null }, D).valid).toBe(true);
    expect(checkPriceSanity({ unit: "m", price: 8990, quantity: 93 }, D).valid).toBe(true);
  });
});
