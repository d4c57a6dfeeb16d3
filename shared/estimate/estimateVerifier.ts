import { traceCalculation } from "./calculationTrace";
import { FINDING_CODES, itemPath, warningFinding, type Finding } from "./findings";
import { buildItemTree, type ItemTree } from "./itemTree";
import type { EstimatingDictionary } from "./schema";
import { eitherContains, normalizeText } from "./textNormalizer";
import type {
  BuildingMetrics,
  EstimateLineItem,
  ItemVerification,
  ReferenceItem,
  VerificationIssue,
  VerificationMatchStatus,
  VerificationResult,
  VerificationSummary,
} from "./types";

export const DIFFERENCE_BANDS = {
  matched: 0.1,
  acceptable: 0.3,
} as const;

export type VerifyOptions = {
  dictionary: EstimatingDictionary;
  references?: readonly ReferenceItem[] | null;
  metrics?: BuildingMetrics | null;
  /** reuse the tree built by the rollup */
  tree?: ItemTree;
};

export type VerifyOutcome = {
  result: VerificationResult;
  findings: Finding[];
};

function roundMoney(value: number): number {
  return Math.round(value * 100) / 100;
}

type ReferenceKey = { name: string; specification: string };

function keyOf(item: { name: string; specification: string | null }): ReferenceKey {
  return { name: normalizeText(item.name), specification: normalizeText(item.specification) };
}

function takeFirst(
  references: readonly ReferenceItem[],
  keys: readonly ReferenceKey[],
  used: Set<number>,
  accept: (key: ReferenceKey) => boolean
): ReferenceItem | null {
  for (let i = 0; i < references.length; i++) {
    if (used.has(i) || !accept(keys[i])) continue;
    used.add(i);
    return references[i];
  }
  return null;
}

/**
 * Pair each generated item with at most one reference item, in item order.
 * Each item tries exact (name, specification), then name only, then mutual
 * containment of names with compatible specifications. A reference item is
 * consumed by the first item it is paired with; `used` holds consumed
 * reference indices for this call only.
 */
export function matchReferences(
  items: ReadonlyArray<Pick<EstimateLineItem, "name" | "specification">>,
  references: readonly ReferenceItem[],
  used: Set<number> = new Set()
): Array<ReferenceItem | null> {
  const keys = references.map(keyOf);

  return items.map((item) => {
    const own = keyOf(item);
    if (!own.name) return null;

    return (
      takeFirst(references, keys, used, (k) => k.name === own.name && k.specification === own.specification) ??
      takeFirst(references, keys, used, (k) => k.name === own.name) ??
      takeFirst(
        references,
        keys,
        used,
        (k) =>
          Boolean(k.name) &&
          eitherContains(own.name, k.name) &&
          (!own.specification || !k.specification || eitherContains(own.specification, k.specification))
      )
    );
  });
}

export function classifyDifference(ratio: number | null): VerificationMatchStatus {
  if (ratio === null || !Number.isFinite(ratio)) return "unmatched";
  const magnitude = Math.abs(ratio);
  if (magnitude < DIFFERENCE_BANDS.matched) return "matched";
  if (magnitude < DIFFERENCE_BANDS.acceptable) return "acceptable";
  return "needs-review";
}

/**
 * Trace every item, compare it with its paired reference (when references
 * are given) and summarize. The generated total is taken over root items and
 * the reference total over the outermost paired items, so subtotals are not
 * counted twice.
 */
export function verifyEstimate(items: readonly EstimateLineItem[], options: VerifyOptions): VerifyOutcome {
  const tree = options.tree ?? buildItemTree(items);
  const references = options.references ?? [];
  const paired = references.length > 0 ? matchReferences(items, references) : items.map(() => null);
  const findings: Finding[] = [];

  const verifications: ItemVerification[] = items.map((item, index) => {
    const childCount = tree.nodes[index].children.length;
    const trace = traceCalculation(item, { dictionary: options.dictionary, childCount, metrics: options.metrics });
    const generatedAmount = item.amount ?? 0;
    const reference = paired[index];
    const referenceAmount = reference ? reference.amount : null;

    const difference = referenceAmount !== null ? roundMoney(generatedAmount - referenceAmount) : null;
    const differenceRatio = difference !== null && referenceAmount ? difference / referenceAmount : null;
    const status = classifyDifference(differenceRatio);

    if (reference && differenceRatio === null) {
      findings.push(
        warningFinding({
          code: FINDING_CODES.undefinedRatio,
          message: `Reference for "${item.name}" has no non-zero amount; difference ratio is undefined`,
          path: itemPath(index),
          entityId: item.id,
          context: { referenceName: reference.name, referenceAmount },
        })
      );
    }

    const issues: VerificationIssue[] = [];
    if (generatedAmount === 0) issues.push("zero-amount");
    if (childCount === 0 && item.unitPrice === null) issues.push("missing-price");
    if (trace.basis === "unknown") issues.push("unclear-basis");
    if (status === "needs-review") issues.push("large-difference");

    return {
      itemId: item.id,
      itemName: item.name,
      generatedAmount,
      referenceAmount,
      difference,
      differenceRatio,
      status,
      trace,
      issues,
    };
  });

  let generatedTotal = 0;
  for (const rootIndex of tree.roots) generatedTotal += verifications[rootIndex].generatedAmount;

  // a paired reference counts unless an ancestor's reference already covers it
  let referenceTotal = 0;
  verifications.forEach((v, index) => {
    if (v.referenceAmount === null) return;
    for (let p = tree.nodes[index].parent; p !== null; p = tree.nodes[p].parent) {
      if (verifications[p].referenceAmount !== null) return;
    }
    referenceTotal += v.referenceAmount;
  });
  generatedTotal = roundMoney(generatedTotal);
  referenceTotal = roundMoney(referenceTotal);

  const matchedItems = verifications.filter((v) => v.status === "matched" || v.status === "acceptable").length;
  const totalDifference = referenceTotal ? roundMoney(generatedTotal - referenceTotal) : null;

  const summary: VerificationSummary = {
    totalItems: verifications.length,
    matchedItems,
    matchRate: verifications.length > 0 ? matchedItems / verifications.length : 0,
    generatedTotal,
    referenceTotal,
    totalDifference,
    totalDifferenceRatio: totalDifference !== null ? totalDifference / referenceTotal : null,
    issueCount: verifications.reduce((n, v) => n + v.issues.length, 0),
  };

  return {
    result: {
      summary,
      items: verifications,
      issues: verifications
        .filter((v) => v.issues.length > 0)
        .map((v) => ({ itemId: v.itemId, itemName: v.itemName, issues: v.issues })),
      metrics: options.metrics ?? null,
    },
    findings,
  };
}
