import { describe, expect, test } from "@jest/globals";
import { aggregateKbEntries, aggregatePrice, kbEntryKey, median, mergeKbEntries } from "../estimate/kbMaintenance";
import { kbEntry } from "./estimateFixtures";

const observations = [
  kbEntry({
    itemId: "a1",
    description: "White gas pipe",
    unit: "m",
    unitPrice: 9000,
    features: { specification: "15A" },
    validFrom: "2024-01-10",
    sourceProject: "P1",
    contextTags: ["gas"],
  }),
  kbEntry({
    itemId: "a2",
    description: "White gas pipe",
    unit: "m",
    unitPrice: 8000,
    features: { specification: "15A" },
    validFrom: "2023-05-01",
    sourceProject: "P2",
    contextTags: ["gas", "school"],
  }),
  kbEntry({
    itemId: "a3",
    description: "white gas pipe",
    unit: "m",
    unitPrice: 10000,
    features: { specification: "15A" },
    validFrom: "2025-02-01",
    sourceProject: "P1",
  }),
  kbEntry({ itemId: "b", description: "PE pipe", unit: "m", unitPrice: 3000 }),
];

describe("median", () => {
  test("odd and even lengths", () => {
    expect(median([3, 1, 2])).toBe(2);
    expect(median([4, 1, 3, 2])).toBe(2.5);
    expect(median([])).toBe(0);
  });
});

describe("aggregatePrice", () => {
  test("time-weighted gives later observations more weight", () => {
    expect(aggregatePrice([8000, 9000, 10000], "time-weighted")).toBeCloseTo(56000 / 6, 6);
    expect(aggregatePrice([8000, 9000, 10000], "average")).toBe(9000);
  });
});

describe("aggregateKbEntries", () => {
  test("collapses observations sharing description, specification and unit", () => {
    const out = aggregateKbEntries(observations, "median");

    expect(out).toHaveLength(2);
    expect(out[0]).toEqual({
      itemId: "AGG_a1",
      description: "White gas pipe",
      discipline: "",
      unit: "m",
      unitPrice: 9000,
      features: { specification: "15A", aggregatedFrom: 3, priceMin: 8000, priceMax: 10000, stdDev: 1000 },
      contextTags: ["gas", "school"],
      vendor: null,
      validFrom: "2023-05-01",
      validTo: null,
      sourceProject: "P1, P2",
    });
    expect(out[1]).toBe(observations[3]);
  });

  test("time-weighted orders observations by validFrom", () => {
    const out = aggregateKbEntries(observations, "time-weighted");
    expect(out[0].unitPrice).toBe(9333.33);
  });
});

describe("mergeKbEntries", () => {
  const existing = [
    kbEntry({ itemId: "x1", description: "White gas pipe", unit: "m", unitPrice: 9000, features: { specification: "15A" } }),
    kbEntry({ itemId: "x2", description: "Cable", unit: "m", unitPrice: 500 }),
  ];
  const incoming = [
    kbEntry({ itemId: "n1", description: "white gas pipe", unit: "M", unitPrice: 11000, features: { specification: "15A" } }),
    kbEntry({ itemId: "n2", description: "Outlet", unit: "個", unitPrice: 3500 }),
  ];

  test("keys ignore case and width", () => {
    expect(kbEntryKey(existing[0])).toBe(kbEntryKey(incoming[0]));
  });

  test("keep-new replaces matching entries", () => {
    const r = mergeKbEntries(existing, incoming, "keep-new");
    expect(r.entries.map((e) => e.itemId)).toEqual(["n1", "n2", "x2"]);
    expect(r.added).toBe(1);
    expect(r.updated).toBe(1);
  });

  test("keep-old keeps matching entries", () => {
    const r = mergeKbEntries(existing, incoming, "keep-old");
    expect(r.entries.map((e) => e.itemId)).toEqual(["x1", "n2", "x2"]);
  });

  test("average keeps the old entry at the mean price", () => {
    const r = mergeKbEntries(existing, incoming, "average");
    expect(r.entries[0]).toEqual({ ...existing[0], unitPrice: 10000 });
  });
});
