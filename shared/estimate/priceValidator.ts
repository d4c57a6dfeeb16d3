import type { EstimatingDictionary } from "./schema";
import { containsTerm, normalizeText } from "./textNormalizer";
import type { PriceRejectionReason } from "./types";

export type PriceCheck =
  | { valid: true; reason: null }
  | { valid: false; reason: PriceRejectionReason; limit: number; keyword: string };

const VALID: PriceCheck = { valid: true, reason: null };

function nameMatches(normalizedName: string, keyword: string): boolean {
  return containsTerm(normalizedName, normalizeText(keyword));
}

/**
 * Keyword plausibility limits for a candidate unit price.
 *
 * High-value equipment (cubicles, transformers, generators...) must not be
 * priced below its minimum unless the name marks it as a part or a work item
 * (inspection, piping, removal...). Everyday items must not exceed their
 * maximum. A missing price is always valid.
 */
export function validatePrice(
  itemName: string,
  price: number | null | undefined,
  dictionary: EstimatingDictionary
): PriceCheck {
  if (price === null || price === undefined) return VALID;

  const name = normalizeText(itemName);
  const excluded = dictionary.highValueExclusions.some((kw) => nameMatches(name, kw));

  if (!excluded) {
    for (const [keyword, minimum] of Object.entries(dictionary.highValueMinimums)) {
      if (nameMatches(name, keyword) && price < minimum) {
        return { valid: false, reason: "below-minimum", limit: minimum, keyword };
      }
    }
  }

  for (const [keyword, maximum] of Object.entries(dictionary.maxPrices)) {
    if (nameMatches(name, keyword) && price > maximum) {
      return { valid: false, reason: "above-maximum", limit: maximum, keyword };
    }
  }

  return VALID;
}

export function isPriceValid(
  itemName: string,
  price: number | null | undefined,
  dictionary: EstimatingDictionary
): boolean {
  return validatePrice(itemName, price, dictionary).valid;
}

/**
 * Ceiling checks on the priced line: per-unit price limits and a cap on
 * quantity × price.
 */
export function checkPriceSanity(
  params: { unit: string | null | undefined; price: number | null | undefined; quantity: number | null | undefined },
  dictionary: EstimatingDictionary
): PriceCheck {
  const { price, quantity } = params;
  if (!price || !quantity) return VALID;

  const unit = normalizeText(params.unit);
  if (unit) {
    for (const [ceilingUnit, ceiling] of Object.entries(dictionary.unitPriceCeilings)) {
      if (normalizeText(ceilingUnit) === unit && price > ceiling) {
        return { valid: false, reason: "unit-price-ceiling", limit: ceiling, keyword: ceilingUnit };
      }
    }
  }

  if (price * quantity > dictionary.lineAmountCeiling) {
    return { valid: false, reason: "amount-ceiling", limit: dictionary.lineAmountCeiling, keyword: "" };
  }

  return VALID;
}
