import type { EstimatingDictionary } from "./schema";
import { eitherContains, normalizeText } from "./textNormalizer";

type NormalizedSynonymGroup = {
  key: string;
  terms: string[];
  normalizedTerms: string[];
};

const groupCache = new WeakMap<EstimatingDictionary, NormalizedSynonymGroup[]>();

function synonymGroups(dictionary: EstimatingDictionary): NormalizedSynonymGroup[] {
  const cached = groupCache.get(dictionary);
  if (cached) return cached;

  const groups = Object.entries(dictionary.synonyms).map(([key, values]) => {
    const terms = [key, ...values];
    return { key, terms, normalizedTerms: terms.map((t) => normalizeText(t)).filter(Boolean) };
  });
  groupCache.set(dictionary, groups);
  return groups;
}

/**
 * The term plus every synonym group it touches: a group matches when the
 * normalized term contains, or is contained in, the group's key or any of its
 * synonyms. Lookup is symmetric, so a synonym finds its canonical key.
 */
export function expandSynonyms(term: string, dictionary: EstimatingDictionary): string[] {
  const expanded = new Set<string>([term]);
  const normalized = normalizeText(term);
  if (!normalized) return Array.from(expanded);

  for (const group of synonymGroups(dictionary)) {
    if (group.normalizedTerms.some((t) => eitherContains(normalized, t))) {
      for (const t of group.terms) expanded.add(t);
    }
  }

  return Array.from(expanded);
}

export function normalizedSynonymSet(term: string, dictionary: EstimatingDictionary): Set<string> {
  return new Set(expandSynonyms(term, dictionary).map((t) => normalizeText(t)).filter(Boolean));
}

export function synonymSetsIntersect(a: Set<string>, b: Set<string>): boolean {
  const [small, large] = a.size <= b.size ? [a, b] : [b, a];
  for (const t of small) {
    if (large.has(t)) return true;
  }
  return false;
}
