import { buildItemTree, hierarchyFindings, type ItemTree } from "../estimate/itemTree";
import type { Finding } from "../estimate/findings";
import type { EstimateLineItem } from "../estimate/types";

export type EstimateRollupResult = {
  items: EstimateLineItem[];
  tree: ItemTree;
  findings: Finding[];
  /** sum of root amounts (null amounts count as 0) */
  grandTotal: number;
};

/**
 * Bottom-up subtotal pricing.
 *
 * Indices are walked from last to first so every child is final before its
 * parent is summed. A node with children gets the sum of its children's
 * amounts, unrounded, and loses its own unit price; leaves pass through
 * unchanged.
 * Running the rollup on its own output returns the same amounts.
 */
export function rollupEstimate(items: readonly EstimateLineItem[]): EstimateRollupResult {
  const tree = buildItemTree(items);
  const out: EstimateLineItem[] = items.map((item) => ({ ...item }));

  for (let i = out.length - 1; i >= 0; i--) {
    const children = tree.nodes[i].children;
    if (children.length === 0) continue;

    let sum = 0;
    for (const childIndex of children) sum += out[childIndex].amount ?? 0;

    out[i] = { ...out[i], amount: sum, unitPrice: null };
  }

  let grandTotal = 0;
  for (const rootIndex of tree.roots) grandTotal += out[rootIndex].amount ?? 0;

  return {
    items: out,
    tree,
    findings: hierarchyFindings(tree, items),
    grandTotal,
  };
}
