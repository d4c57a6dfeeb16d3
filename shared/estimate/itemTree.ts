import { FINDING_CODES, itemPath, warningFinding, type Finding } from "./findings";
import type { EstimateLineItem } from "./types";

export type ItemTreeNode = {
  index: number;
  level: number;
  parent: number | null;
  children: number[];
};

export type ItemTree = {
  nodes: ItemTreeNode[];
  roots: number[];
  /** indices whose level has no reachable parent; each is treated as its own root */
  malformed: number[];
};

/**
 * Explicit arena over the level-encoded sequence, built once in O(n).
 *
 * A node's parent is the nearest preceding open node at `level - 1`. Level 0
 * and level 1 nodes without one are roots; deeper nodes without one are
 * malformed and also become roots.
 */
export function buildItemTree(items: ReadonlyArray<Pick<EstimateLineItem, "level">>): ItemTree {
  const nodes: ItemTreeNode[] = items.map((item, index) => ({
    index,
    level: item.level,
    parent: null,
    children: [],
  }));
  const roots: number[] = [];
  const malformed: number[] = [];
  const open: ItemTreeNode[] = [];

  for (const node of nodes) {
    while (open.length > 0 && open[open.length - 1].level >= node.level) open.pop();

    const top = open.length > 0 ? open[open.length - 1] : undefined;
    if (top && top.level === node.level - 1) {
      node.parent = top.index;
      top.children.push(node.index);
    } else {
      roots.push(node.index);
      if (node.level >= 2) malformed.push(node.index);
    }

    open.push(node);
  }

  return { nodes, roots, malformed };
}

export function hasChildren(tree: ItemTree, index: number): boolean {
  return (tree.nodes[index]?.children.length ?? 0) > 0;
}

export function hierarchyFindings(tree: ItemTree, items: ReadonlyArray<Pick<EstimateLineItem, "id" | "name" | "level">>): Finding[] {
  return tree.malformed.map((index) =>
    warningFinding({
      code: FINDING_CODES.malformedHierarchy,
      message: `Level ${items[index].level} item "${items[index].name}" has no level ${items[index].level - 1} parent; rolled up as its own root`,
      path: itemPath(index),
      entityId: items[index].id,
      context: { level: items[index].level },
    })
  );
}

/**
 * Priced amounts on nodes that have no unit price and no children cannot be
 * explained by the tree.
 */
export function orphanedAmountFindings(tree: ItemTree, items: readonly EstimateLineItem[]): Finding[] {
  const findings: Finding[] = [];
  items.forEach((item, index) => {
    if (item.amount !== null && item.unitPrice === null && !hasChildren(tree, index)) {
      findings.push(
        warningFinding({
          code: FINDING_CODES.orphanedAmount,
          message: `"${item.name}" carries an amount without a unit price or children`,
          path: itemPath(index),
          entityId: item.id,
          context: { amount: item.amount },
        })
      );
    }
  });
  return findings;
}

/**
 * Hierarchical numbers: roots 1, 2, ...; children extend their parent's
 * number (1.1, 1.2, 1.2.1).
 */
export function assignItemNumbers(items: readonly EstimateLineItem[], tree: ItemTree = buildItemTree(items)): EstimateLineItem[] {
  const numbers: string[] = new Array(items.length).fill("");

  tree.roots.forEach((rootIndex, position) => {
    numbers[rootIndex] = String(position + 1);
  });

  for (const node of tree.nodes) {
    node.children.forEach((childIndex, position) => {
      numbers[childIndex] = `${numbers[node.index]}.${position + 1}`;
    });
  }

  return items.map((item, index) => ({ ...item, itemNo: numbers[index] }));
}
