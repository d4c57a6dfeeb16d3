import { prepareEntry, prepareItem, scorePrepared, type PreparedEntry } from "./candidateScorer";
import { isDisciplineCompatible } from "./disciplineCompatibility";
import { FINDING_CODES, infoFinding, itemPath, warningFinding, type Finding } from "./findings";
import { checkPriceSanity, validatePrice, type PriceCheck } from "./priceValidator";
import type { EstimatingDictionary } from "./schema";
import type { EstimateLineItem, MatchResult, MatchTier, PriceKBEntry } from "./types";

export type MatchThresholds = {
  /** best score at or above this is an `exact` match */
  exactMin: number;
  partialMin: number;
  categoryFallbackMin: number;
  /** normalized confidence at or above this applies the price */
  applyConfidenceMin: number;
  /** score that maps to confidence 1.0 */
  confidenceScale: number;
  rejectionPenalty: number;
};

export const DEFAULT_MATCH_THRESHOLDS: MatchThresholds = {
  exactMin: 1.0,
  partialMin: 0.5,
  categoryFallbackMin: 0.8,
  applyConfidenceMin: 0.5,
  confidenceScale: 5.0,
  rejectionPenalty: 0.5,
};

export type MatchOptions = {
  dictionary: EstimatingDictionary;
  thresholds?: Partial<MatchThresholds>;
};

export type ItemMatchOutcome = {
  item: EstimateLineItem;
  result: MatchResult;
  findings: Finding[];
};

export type EnrichmentResult = {
  items: EstimateLineItem[];
  results: MatchResult[];
  findings: Finding[];
};

type ScoredCandidate = { entry: PreparedEntry; score: number };

function round4(value: number): number {
  return Math.round(value * 1e4) / 1e4;
}

function roundMoney(value: number): number {
  return Math.round(value * 100) / 100;
}

export function resolveThresholds(overrides?: Partial<MatchThresholds>): MatchThresholds {
  return { ...DEFAULT_MATCH_THRESHOLDS, ...(overrides ?? {}) };
}

/**
 * Level-0 rows are section headers and rows without a quantity cannot be
 * priced; both pass through matching untouched.
 */
export function isPriceable(item: Pick<EstimateLineItem, "level" | "quantity">): boolean {
  return item.level > 0 && item.quantity !== null;
}

export function classifyTier(params: {
  bestScore: number;
  hasBest: boolean;
  fallbackScore: number;
  hasFallback: boolean;
  thresholds: MatchThresholds;
}): MatchTier {
  const { bestScore, hasBest, fallbackScore, hasFallback, thresholds } = params;
  if (hasBest && bestScore >= thresholds.exactMin) return "exact";
  if (hasBest && bestScore >= thresholds.partialMin) return "partial";
  if (hasFallback && fallbackScore >= thresholds.categoryFallbackMin) return "category-fallback";
  return "none";
}

export function scoreToConfidence(score: number, thresholds: MatchThresholds = DEFAULT_MATCH_THRESHOLDS): number {
  if (!Number.isFinite(score) || score <= 0) return 0;
  return round4(Math.min(score / thresholds.confidenceScale, 1.0));
}

/**
 * Scan the KB for one item. Ties keep the first entry in KB order.
 */
export function findCandidates(
  item: EstimateLineItem,
  kb: readonly PriceKBEntry[],
  dictionary: EstimatingDictionary
): { best: ScoredCandidate | null; fallback: ScoredCandidate | null; candidatesScored: number } {
  const prepared = prepareItem(item, dictionary);
  let best: ScoredCandidate | null = null;
  let fallback: ScoredCandidate | null = null;
  let candidatesScored = 0;

  for (const kbEntry of kb) {
    if (!isDisciplineCompatible(kbEntry.discipline, item.discipline, dictionary)) continue;
    candidatesScored += 1;

    const entry = prepareEntry(kbEntry, dictionary);
    const scored = scorePrepared(prepared, entry, dictionary);
    if (scored.unitCompatibility === "incompatible") continue;

    if (scored.score > (best?.score ?? 0)) best = { entry, score: scored.score };
    if (scored.categoryMatch && scored.score > (fallback?.score ?? 0)) fallback = { entry, score: scored.score };
  }

  return { best, fallback, candidatesScored };
}

function provenanceNote(entry: PriceKBEntry, tier: MatchTier, confidence: number, previous: string | null): string {
  const note = `KB:${entry.itemId}[${tier}](${Math.floor(confidence * 100)}%)`;
  return previous ? `${note}, ${previous}` : note;
}

type PriceFailure = Extract<PriceCheck, { valid: false }>;

function firstFailure(...checks: PriceCheck[]): PriceFailure | null {
  for (const check of checks) {
    if (!check.valid) return check;
  }
  return null;
}

/**
 * Price one line item against the KB. Returns a new item; the input is not
 * modified.
 */
export function matchItem(
  item: EstimateLineItem,
  kb: readonly PriceKBEntry[],
  options: MatchOptions & { index?: number }
): ItemMatchOutcome {
  const thresholds = resolveThresholds(options.thresholds);
  const path = itemPath(options.index ?? 0);
  const { best, fallback, candidatesScored } = findCandidates(item, kb, options.dictionary);

  const tier = classifyTier({
    bestScore: best?.score ?? 0,
    hasBest: best !== null,
    fallbackScore: fallback?.score ?? 0,
    hasFallback: fallback !== null,
    thresholds,
  });

  const chosen = tier === "none" ? null : tier === "category-fallback" ? fallback : best;

  if (!chosen) {
    return {
      item: { ...item, matchTier: "none" },
      result: {
        itemId: item.id,
        tier: "none",
        entry: null,
        score: best?.score ?? 0,
        confidence: null,
        applied: false,
        rejectionReason: null,
        candidatesScored,
      },
      findings: [
        warningFinding({
          code: FINDING_CODES.noMatchFound,
          message: `No KB entry cleared a match threshold for "${item.name}"`,
          path,
          entityId: item.id,
          context: { bestScore: best?.score ?? 0, candidatesScored },
        }),
      ],
    };
  }

  const entry = chosen.entry.entry;
  const confidence = scoreToConfidence(chosen.score, thresholds);
  const clearsThreshold = confidence >= thresholds.applyConfidenceMin || chosen.score >= thresholds.exactMin;
  const failure = firstFailure(
    validatePrice(item.name, entry.unitPrice, options.dictionary),
    checkPriceSanity({ unit: item.unit, price: entry.unitPrice, quantity: item.quantity }, options.dictionary)
  );

  const base: EstimateLineItem = {
    ...item,
    priceReferences: [entry.itemId],
    matchTier: tier,
    sourceReference: provenanceNote(entry, tier, confidence, item.sourceReference),
  };
  const result: MatchResult = {
    itemId: item.id,
    tier,
    entry,
    score: chosen.score,
    confidence,
    applied: false,
    rejectionReason: null,
    candidatesScored,
  };

  if (clearsThreshold && !failure) {
    const quantity = item.quantity ?? 0;
    return {
      item: { ...base, unitPrice: entry.unitPrice, amount: roundMoney(quantity * entry.unitPrice), confidence },
      result: { ...result, applied: true },
      findings: [],
    };
  }

  if (failure) {
    const penalized = round4(confidence * thresholds.rejectionPenalty);
    return {
      item: { ...base, confidence: penalized },
      result: { ...result, confidence: penalized, rejectionReason: failure.reason },
      findings: [
        warningFinding({
          code: FINDING_CODES.priceRejected,
          message: `KB price ${entry.unitPrice} for "${item.name}" failed the ${failure.reason} check (limit ${failure.limit})`,
          path,
          entityId: item.id,
          context: { kbItemId: entry.itemId, reason: failure.reason, limit: failure.limit, keyword: failure.keyword },
        }),
      ],
    };
  }

  return {
    item: { ...base, confidence },
    result,
    findings: [
      infoFinding({
        code: FINDING_CODES.lowConfidence,
        message: `Match for "${item.name}" recorded but not applied (confidence ${confidence})`,
        path,
        entityId: item.id,
        context: { kbItemId: entry.itemId, score: chosen.score },
      }),
    ],
  };
}

/**
 * Synchronous enrichment of a whole item sequence.
 */
export function enrichWithPrices(
  items: readonly EstimateLineItem[],
  kb: readonly PriceKBEntry[],
  options: MatchOptions
): EnrichmentResult {
  const out: EstimateLineItem[] = [];
  const results: MatchResult[] = [];
  const findings: Finding[] = [];

  items.forEach((item, index) => {
    if (!isPriceable(item)) {
      out.push(item);
      return;
    }
    const outcome = matchItem(item, kb, { ...options, index });
    out.push(outcome.item);
    results.push(outcome.result);
    findings.push(...outcome.findings);
  });

  return { items: out, results, findings };
}
