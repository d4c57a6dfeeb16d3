import { describe, expect, test } from "@jest/globals";
import { DEFAULT_DICTIONARY } from "../estimate/dictionary";
import { containsTerm, eitherContains, extractCategory, extractSize, normalizeText, tokenize } from "../estimate/textNormalizer";

describe("normalizeText", () => {
  test("folds width, unifies brackets and collapses whitespace", () => {
    expect(normalizeText("  ＬＥＤ　照明【屋外】 ")).toBe("led 照明(屋外)");
  });

  test("removes middle dots, slashes and hyphens", () => {
    expect(normalizeText("White-Gas／Pipe")).toBe("whitegaspipe");
    expect(normalizeText("ガス・メーター")).toBe("ガスメーター");
  });

  test("empty and missing input normalize to empty string", () => {
    expect(normalizeText(null)).toBe("");
    expect(normalizeText(undefined)).toBe("");
    expect(normalizeText("   ")).toBe("");
  });

  test("is idempotent", () => {
    const samples = [
      "白ガス管（ネジ接合）",
      "  ＬＥＤ　照明【屋外】 ",
      "Cable [CV 5.5sq-3C] / tray",
      "ｶﾞｽﾒｰﾀｰ　Ｎ－１６",
      "A・B・C",
      "Step‐down  Transformer – dry",
    ];
    for (const s of samples) {
      const once = normalizeText(s);
      expect(normalizeText(once)).toBe(once);
    }
  });
});

describe("containsTerm", () => {
  test("latin needles match whole words only", () => {
    expect(containsTerm("gas pipe", "gas")).toBe(true);
    expect(containsTerm("gasket seal", "gas")).toBe(false);
    expect(containsTerm("led light (outdoor)", "outdoor")).toBe(true);
  });

  test("other scripts match as substrings", () => {
    expect(containsTerm("白ガス管", "ガス")).toBe(true);
    expect(containsTerm("白ガス管", "電気")).toBe(false);
  });

  test("empty needle or haystack never matches", () => {
    expect(containsTerm("", "gas")).toBe(false);
    expect(containsTerm("gas", "")).toBe(false);
  });

  test("eitherContains is symmetric", () => {
    expect(eitherContains("gas", "gas pipe")).toBe(true);
    expect(eitherContains("gas pipe", "gas")).toBe(true);
  });
});

describe("tokenize", () => {
  test("drops single-character tokens", () => {
    expect(tokenize("white gas pipe a")).toEqual(["white", "gas", "pipe"]);
  });
});

describe("extractSize", () => {
  test("reads nominal sizes", () => {
    expect(extractSize("SGP 15A")).toBe("15A");
    expect(extractSize("１５Ａ")).toBe("15A");
    expect(extractSize("φ20mm")).toBe("20MM");
  });

  test("returns empty string without a size token", () => {
    expect(extractSize("screwed joint")).toBe("");
    expect(extractSize(null)).toBe("");
  });
});

describe("extractCategory", () => {
  test("returns the first dictionary category found", () => {
    expect(extractCategory("White Gas Pipe (screwed)", DEFAULT_DICTIONARY)).toBe("white gas pipe");
    expect(extractCategory("白ガス管（ネジ接合）", DEFAULT_DICTIONARY)).toBe("白ガス管");
    expect(extractCategory("site overhead", DEFAULT_DICTIONARY)).toBe("overhead");
  });

  test("returns empty string when nothing matches", () => {
    expect(extractCategory("cable tray", DEFAULT_DICTIONARY)).toBe("");
  });
});
