import type { EstimatingDictionary } from "./schema";
import { normalizedSynonymSet, synonymSetsIntersect } from "./synonyms";
import { containsTerm, eitherContains, extractCategory, extractSize, normalizeText, tokenize } from "./textNormalizer";
import type { CandidateScore, EstimateLineItem, PriceKBEntry } from "./types";
import { checkUnitCompatibility } from "./unitCompatibility";

/**
 * Additive point weights. These were tuned empirically against one historical
 * dataset; any change moves items between match tiers.
 */
export const SCORE_WEIGHTS = {
  exactName: 2.0,
  synonymName: 1.8,
  containedName: 1.5,
  tokenName: 1.0,
  category: 1.0,
  exactSpecification: 1.5,
  sizeSpecification: 1.2,
  containedSpecification: 0.8,
  unitEqual: 0.5,
  unitLoose: 0.3,
} as const;

export type PreparedItem = {
  name: string;
  tokens: string[];
  synonyms: Set<string>;
  category: string;
  specification: string;
  size: string;
  unit: string | null;
};

export type PreparedEntry = {
  entry: PriceKBEntry;
  description: string;
  synonyms: Set<string>;
  category: string;
  specification: string;
  fullText: string;
  size: string;
};

export function prepareItem(
  item: Pick<EstimateLineItem, "name" | "specification" | "unit">,
  dictionary: EstimatingDictionary
): PreparedItem {
  const name = normalizeText(item.name);
  return {
    name,
    tokens: tokenize(name),
    synonyms: normalizedSynonymSet(item.name, dictionary),
    category: extractCategory(item.name, dictionary),
    specification: normalizeText(item.specification),
    size: extractSize(item.specification),
    unit: item.unit,
  };
}

const entryCache = new WeakMap<EstimatingDictionary, WeakMap<PriceKBEntry, PreparedEntry>>();

export function prepareEntry(entry: PriceKBEntry, dictionary: EstimatingDictionary): PreparedEntry {
  let perDictionary = entryCache.get(dictionary);
  if (!perDictionary) {
    perDictionary = new WeakMap();
    entryCache.set(dictionary, perDictionary);
  }
  const cached = perDictionary.get(entry);
  if (cached) return cached;

  const rawSpec = entry.features.specification ?? "";
  const prepared: PreparedEntry = {
    entry,
    description: normalizeText(entry.description),
    synonyms: normalizedSynonymSet(entry.description, dictionary),
    category: extractCategory(entry.description, dictionary),
    specification: normalizeText(rawSpec),
    fullText: normalizeText(`${entry.description} ${rawSpec}`),
    size: extractSize(rawSpec),
  };
  perDictionary.set(entry, prepared);
  return prepared;
}

function roundScore(value: number): number {
  return Math.round(value * 1e6) / 1e6;
}

function nameScore(item: PreparedItem, entry: PreparedEntry): number {
  if (!item.name || !entry.description) return 0;
  if (item.name === entry.description) return SCORE_WEIGHTS.exactName;
  if (synonymSetsIntersect(item.synonyms, entry.synonyms)) return SCORE_WEIGHTS.synonymName;
  if (eitherContains(item.name, entry.description)) return SCORE_WEIGHTS.containedName;

  // flat weight once any token of two or more characters is shared
  const shared = item.tokens.some((t) => containsTerm(entry.description, t));
  return shared ? SCORE_WEIGHTS.tokenName : 0;
}

function specificationScore(item: PreparedItem, entry: PreparedEntry): number {
  if (!item.specification || !entry.specification) return 0;
  if (item.specification === entry.specification) return SCORE_WEIGHTS.exactSpecification;
  if (item.size && item.size === entry.size) return SCORE_WEIGHTS.sizeSpecification;
  if (containsTerm(entry.fullText, item.specification) || containsTerm(item.specification, entry.specification)) {
    return SCORE_WEIGHTS.containedSpecification;
  }
  return 0;
}

export function scorePrepared(
  item: PreparedItem,
  entry: PreparedEntry,
  dictionary: EstimatingDictionary
): CandidateScore {
  const unitCompatibility = checkUnitCompatibility(item.unit, entry.entry.unit, dictionary);
  if (unitCompatibility === "incompatible") {
    return {
      score: 0,
      categoryMatch: false,
      unitCompatibility,
      breakdown: { name: 0, category: 0, specification: 0, unit: 0 },
    };
  }

  const categoryMatch = Boolean(item.category) && item.category === entry.category;
  const breakdown = {
    name: nameScore(item, entry),
    category: categoryMatch ? SCORE_WEIGHTS.category : 0,
    specification: specificationScore(item, entry),
    unit: unitCompatibility === "equal" ? SCORE_WEIGHTS.unitEqual : SCORE_WEIGHTS.unitLoose,
  };

  return {
    score: roundScore(breakdown.name + breakdown.category + breakdown.specification + breakdown.unit),
    categoryMatch,
    unitCompatibility,
    breakdown,
  };
}

/**
 * Similarity of one line item to one KB entry. Incompatible units veto the
 * candidate: the score is 0 whatever the text says.
 */
export function scoreCandidate(
  item: Pick<EstimateLineItem, "name" | "specification" | "unit">,
  entry: PriceKBEntry,
  dictionary: EstimatingDictionary
): CandidateScore {
  return scorePrepared(prepareItem(item, dictionary), prepareEntry(entry, dictionary), dictionary);
}
