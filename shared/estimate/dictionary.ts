import defaultDictionaryJson from "./data/defaultDictionary.json";
import { estimatingDictionarySchema, type EstimatingDictionary } from "./schema";

export type { EstimatingDictionary } from "./schema";

/**
 * Keyword tables shipped with the engine: synonyms, categories, unit families,
 * trade aliases, price plausibility limits and quantity estimation rules.
 */
export const DEFAULT_DICTIONARY: EstimatingDictionary = estimatingDictionarySchema.parse(defaultDictionaryJson);

export function parseDictionary(raw: unknown): EstimatingDictionary {
  return estimatingDictionarySchema.parse(raw);
}

/**
 * Shallow override: each table present in `overrides` replaces the default table.
 */
export function withDictionaryOverrides(
  overrides: Partial<EstimatingDictionary>,
  base: EstimatingDictionary = DEFAULT_DICTIONARY
): EstimatingDictionary {
  return { ...base, ...overrides };
}
