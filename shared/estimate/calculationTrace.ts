import type { EstimatingDictionary, EstimationRule } from "./schema";
import { containsTerm, normalizeText } from "./textNormalizer";
import type { BuildingMetrics, CalculationBasis, CalculationTrace, EstimateLineItem } from "./types";
import { unitFamilyOf } from "./unitCompatibility";

export const TRACE_CONFIDENCE = {
  subtotal: 0.9,
  knownBasis: 0.8,
  signalIncrement: 0.1,
} as const;

const numberFormat = new Intl.NumberFormat("en-US", { maximumFractionDigits: 2 });

export function formatNumber(value: number): string {
  return numberFormat.format(value);
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * `8,990/m × 93m = 836,070`. Null unless both unit price and quantity are known.
 */
export function formatFormula(item: Pick<EstimateLineItem, "unitPrice" | "quantity" | "unit">): string | null {
  if (item.unitPrice === null || item.quantity === null) return null;
  const unit = item.unit ?? "";
  const per = unit ? `/${unit}` : "";
  const total = round2(item.unitPrice * item.quantity);
  return `${formatNumber(item.unitPrice)}${per} × ${formatNumber(item.quantity)}${unit} = ${formatNumber(total)}`;
}

type RuleEstimate = { basis: "area-estimate" | "room-count-estimate"; note: string };

const RULE_METRIC: Record<EstimationRule["basis"], { key: "floorAreaM2" | "roomCount" | "floorCount"; label: string; per: string }> = {
  "floor-area": { key: "floorAreaM2", label: "floor area", per: "m2" },
  "room-count": { key: "roomCount", label: "rooms", per: "room" },
  "floor-count": { key: "floorCount", label: "floors", per: "floor" },
};

/**
 * First estimation rule whose keyword appears in the name decides; when the
 * metric it needs is missing there is no estimate.
 */
export function estimateFromRules(
  itemName: string,
  metrics: BuildingMetrics | null | undefined,
  dictionary: EstimatingDictionary
): RuleEstimate | null {
  if (!metrics) return null;
  const name = normalizeText(itemName);
  const rule = dictionary.estimationRules.find((r) => containsTerm(name, normalizeText(r.keyword)));
  if (!rule) return null;

  const metric = RULE_METRIC[rule.basis];
  const value = metrics[metric.key];
  if (value === null || value <= 0) return null;

  const estimated = Math.round(value * rule.factor);
  return {
    basis: rule.basis === "floor-area" ? "area-estimate" : "room-count-estimate",
    note: `${metric.label} ${formatNumber(value)} × ${rule.factor}/${metric.per} = ${estimated}`,
  };
}

export type TraceContext = {
  dictionary: EstimatingDictionary;
  /** number of children in the rolled-up tree */
  childCount: number;
  metrics?: BuildingMetrics | null;
};

/**
 * Reconstruct how an item's amount was derived.
 */
export function traceCalculation(item: EstimateLineItem, context: TraceContext): CalculationTrace {
  const base = {
    itemId: item.id,
    itemName: item.name,
    quantity: item.quantity,
    unit: item.unit,
    unitPrice: item.unitPrice,
    amount: item.amount,
  };

  if (context.childCount > 0) {
    return {
      ...base,
      basis: "subtotal",
      formula: null,
      kbReference: null,
      confidence: TRACE_CONFIDENCE.subtotal,
      notes: `sum of ${context.childCount} child item${context.childCount === 1 ? "" : "s"}`,
    };
  }

  const kbReference = item.matchTier !== "none" && item.priceReferences.length > 0 ? item.priceReferences[0] : null;
  const formula = formatFormula(item);
  const estimate = estimateFromRules(item.name, context.metrics, context.dictionary);

  let basis: CalculationBasis = "unknown";
  let notes: string | null = null;
  if (kbReference) {
    basis = "kb-reference";
    notes = item.sourceReference;
  } else if (formula) {
    basis = unitFamilyOf(item.unit, context.dictionary) === "lumpSum" ? "lump-sum" : "material-by-quantity";
  } else if (estimate) {
    basis = estimate.basis;
    notes = estimate.note;
  }

  let confidence = 0;
  if (basis !== "unknown") confidence = TRACE_CONFIDENCE.knownBasis;
  if (kbReference) confidence += TRACE_CONFIDENCE.signalIncrement;
  if (formula) confidence += TRACE_CONFIDENCE.signalIncrement;

  return {
    ...base,
    basis,
    formula,
    kbReference,
    confidence: round2(Math.min(confidence, 1.0)),
    notes,
  };
}
