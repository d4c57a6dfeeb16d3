import { normalizeText } from "./textNormalizer";
import type { PriceKBEntry } from "./types";

export const AGGREGATION_METHODS = ["median", "average", "time-weighted"] as const;
export type AggregationMethod = (typeof AGGREGATION_METHODS)[number];

export const MERGE_STRATEGIES = ["keep-new", "keep-old", "average"] as const;
export type MergeStrategy = (typeof MERGE_STRATEGIES)[number];

export type KbMergeResult = {
  entries: PriceKBEntry[];
  added: number;
  updated: number;
};

function roundMoney(value: number): number {
  return Math.round(value * 100) / 100;
}

/** Observations of the same thing share description, specification and unit. */
export function kbEntryKey(entry: Pick<PriceKBEntry, "description" | "unit" | "features">): string {
  return [
    normalizeText(entry.description),
    normalizeText(entry.features.specification ?? ""),
    normalizeText(entry.unit),
  ].join("|");
}

export function median(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

function mean(values: readonly number[]): number {
  return values.length === 0 ? 0 : values.reduce((s, v) => s + v, 0) / values.length;
}

function sampleStdDev(values: readonly number[]): number {
  if (values.length < 2) return 0;
  const m = mean(values);
  const variance = values.reduce((s, v) => s + (v - m) ** 2, 0) / (values.length - 1);
  return Math.sqrt(variance);
}

/**
 * Oldest first by `validFrom`; undated entries keep their input order ahead of
 * dated ones.
 */
function chronological(entries: readonly PriceKBEntry[]): PriceKBEntry[] {
  return entries
    .map((entry, index) => ({ entry, index }))
    .sort((a, b) => {
      const da = a.entry.validFrom ?? "";
      const db = b.entry.validFrom ?? "";
      if (da !== db) return da < db ? -1 : 1;
      return a.index - b.index;
    })
    .map(({ entry }) => entry);
}

export function aggregatePrice(prices: readonly number[], method: AggregationMethod): number {
  switch (method) {
    case "average":
      return mean(prices);
    case "time-weighted": {
      // weight 1 for the oldest observation, n for the newest
      let weighted = 0;
      let weights = 0;
      prices.forEach((price, i) => {
        weighted += price * (i + 1);
        weights += i + 1;
      });
      return weights === 0 ? 0 : weighted / weights;
    }
    case "median":
      return median(prices);
  }
}

/**
 * Collapse repeated observations of the same item into one entry per key.
 * Single observations pass through unchanged.
 */
export function aggregateKbEntries(entries: readonly PriceKBEntry[], method: AggregationMethod = "median"): PriceKBEntry[] {
  const groups = new Map<string, PriceKBEntry[]>();
  for (const entry of entries) {
    const key = kbEntryKey(entry);
    const group = groups.get(key);
    if (group) group.push(entry);
    else groups.set(key, [entry]);
  }

  const out: PriceKBEntry[] = [];
  for (const group of Array.from(groups.values())) {
    if (group.length === 1) {
      out.push(group[0]);
      continue;
    }

    const ordered = chronological(group);
    const prices = ordered.map((e) => e.unitPrice);
    const first = group[0];
    const dates = group.map((e) => e.validFrom).filter((d): d is string => Boolean(d)).sort();
    const projects = Array.from(new Set(group.map((e) => e.sourceProject).filter((p): p is string => Boolean(p))));

    out.push({
      itemId: `AGG_${first.itemId}`,
      description: first.description,
      discipline: first.discipline,
      unit: first.unit,
      unitPrice: roundMoney(aggregatePrice(prices, method)),
      features: {
        ...first.features,
        aggregatedFrom: group.length,
        priceMin: Math.min(...prices),
        priceMax: Math.max(...prices),
        stdDev: roundMoney(sampleStdDev(prices)),
      },
      contextTags: Array.from(new Set(group.flatMap((e) => e.contextTags))),
      vendor: null,
      validFrom: dates.length > 0 ? dates[0] : null,
      validTo: null,
      sourceProject: projects.length > 0 ? projects.join(", ") : null,
    });
  }
  return out;
}

/**
 * Fold a new batch into an existing KB. New entries come first in their
 * input order, followed by existing entries the batch did not touch.
 */
export function mergeKbEntries(
  existing: readonly PriceKBEntry[],
  incoming: readonly PriceKBEntry[],
  strategy: MergeStrategy = "keep-new"
): KbMergeResult {
  const byKey = new Map<string, PriceKBEntry>();
  for (const entry of existing) {
    const key = kbEntryKey(entry);
    if (!byKey.has(key)) byKey.set(key, entry);
  }
  const consumed = new Set<PriceKBEntry>();

  const entries: PriceKBEntry[] = [];
  let added = 0;
  let updated = 0;

  for (const entry of incoming) {
    const key = kbEntryKey(entry);
    const previous = byKey.get(key);
    if (!previous) {
      entries.push(entry);
      added += 1;
      continue;
    }

    if (strategy === "keep-new") entries.push(entry);
    else if (strategy === "keep-old") entries.push(previous);
    else entries.push({ ...previous, unitPrice: roundMoney((previous.unitPrice + entry.unitPrice) / 2) });

    updated += 1;
    consumed.add(previous);
    byKey.delete(key);
  }

  entries.push(...existing.filter((entry) => !consumed.has(entry)));
  return { entries, added, updated };
}
