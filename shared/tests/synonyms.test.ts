import { describe, expect, test } from "@jest/globals";
import { DEFAULT_DICTIONARY, withDictionaryOverrides } from "../estimate/dictionary";
import { expandSynonyms, normalizedSynonymSet, synonymSetsIntersect } from "../estimate/synonyms";

describe("expandSynonyms", () => {
  test("returns the term itself when no group matches", () => {
    expect(expandSynonyms("qqq", DEFAULT_DICTIONARY)).toEqual(["qqq"]);
  });

  test("a canonical key expands to its synonyms", () => {
    expect(expandSynonyms("white gas pipe", DEFAULT_DICTIONARY)).toEqual([
      "white gas pipe",
      "steel gas pipe",
      "sgp pipe",
      "carbon steel pipe",
      "white pipe",
    ]);
  });

  test("lookup is symmetric: a synonym finds its key", () => {
    expect(expandSynonyms("exhaust fan", DEFAULT_DICTIONARY)).toEqual([
      "exhaust fan",
      "ventilation fan",
      "supply fan",
      "ceiling fan",
    ]);
  });

  test("uses the injected dictionary", () => {
    const dictionary = withDictionaryOverrides({ synonyms: { widget: ["gizmo"] } });
    expect(expandSynonyms("gizmo", dictionary)).toEqual(["gizmo", "widget"]);
    expect(expandSynonyms("white gas pipe", dictionary)).toEqual(["white gas pipe"]);
  });
});

describe("synonymSetsIntersect", () => {
  test("names sharing a group intersect", () => {
    const a = normalizedSynonymSet("Steel Gas Pipe", DEFAULT_DICTIONARY);
    const b = normalizedSynonymSet("white pipe", DEFAULT_DICTIONARY);
    expect(synonymSetsIntersect(a, b)).toBe(true);
  });

  test("unrelated names do not", () => {
    const a = normalizedSynonymSet("exhaust fan", DEFAULT_DICTIONARY);
    const b = normalizedSynonymSet("cubicle", DEFAULT_DICTIONARY);
    expect(synonymSetsIntersect(a, b)).toBe(false);
  });
});
