import type { EstimatingDictionary } from "./schema";
import { normalizeText } from "./textNormalizer";
import type { UnitCompatibility } from "./types";

const familyCache = new WeakMap<EstimatingDictionary, Map<string, string>>();

function unitFamilyIndex(dictionary: EstimatingDictionary): Map<string, string> {
  const cached = familyCache.get(dictionary);
  if (cached) return cached;

  const index = new Map<string, string>();
  for (const [family, units] of Object.entries(dictionary.unitFamilies)) {
    for (const unit of units) {
      const normalized = normalizeText(unit);
      if (normalized && !index.has(normalized)) index.set(normalized, family);
    }
  }
  familyCache.set(dictionary, index);
  return index;
}

export function unitFamilyOf(unit: string | null | undefined, dictionary: EstimatingDictionary): string | null {
  const normalized = normalizeText(unit);
  if (!normalized) return null;
  return unitFamilyIndex(dictionary).get(normalized) ?? null;
}

/**
 * `incompatible` is a veto: count-like, length-like and lump-sum units never
 * price each other.
 */
export function checkUnitCompatibility(
  unitA: string | null | undefined,
  unitB: string | null | undefined,
  dictionary: EstimatingDictionary
): UnitCompatibility {
  const a = normalizeText(unitA);
  const b = normalizeText(unitB);

  if (!a || !b) return "loose";
  if (a === b) return "equal";
  if (a.includes(b) || b.includes(a)) return "loose";

  const familyA = unitFamilyOf(a, dictionary);
  const familyB = unitFamilyOf(b, dictionary);
  if (familyA && familyB && familyA !== familyB) return "incompatible";

  return "loose";
}
