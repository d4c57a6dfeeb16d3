import { describe, expect, test } from "@jest/globals";
import type { VerificationResult } from "../estimate/types";
import { formatPercent, formatSigned, formatVerificationReport, verificationToCsv } from "../estimate/verificationReportText";

const RULE = "=".repeat(70);
const THIN_RULE = "-".repeat(70);

function sampleResult(): VerificationResult {
  return {
    summary: {
      totalItems: 2,
      matchedItems: 1,
      matchRate: 0.5,
      generatedTotal: 836070,
      referenceTotal: 800000,
      totalDifference: 36070,
      totalDifferenceRatio: 36070 / 800000,
      issueCount: 3,
    },
    items: [
      {
        itemId: "p",
        itemName: "White Gas Pipe",
        generatedAmount: 836070,
        referenceAmount: 800000,
        difference: 36070,
        differenceRatio: 36070 / 800000,
        status: "matched",
        trace: {
          itemId: "p",
          itemName: "White Gas Pipe",
          quantity: 93,
          unit: "m",
          unitPrice: 8990,
          amount: 836070,
          basis: "kb-reference",
          formula: "8,990/m × 93m = 836,070",
          kbReference: "KB-SGP-15",
          confidence: 1,
          notes: "KB:KB-SGP-15[exact](100%)",
        },
        issues: [],
      },
      {
        itemId: "l",
        itemName: "LED light, outdoor",
        generatedAmount: 0,
        referenceAmount: null,
        difference: null,
        differenceRatio: null,
        status: "unmatched",
        trace: {
          itemId: "l",
          itemName: "LED light, outdoor",
          quantity: 10,
          unit: null,
          unitPrice: null,
          amount: null,
          basis: "unknown",
          formula: null,
          kbReference: null,
          confidence: 0,
          notes: null,
        },
        issues: ["zero-amount", "missing-price", "unclear-basis"],
      },
    ],
    issues: [{ itemId: "l", itemName: "LED light, outdoor", issues: ["zero-amount", "missing-price", "unclear-basis"] }],
    metrics: { floorAreaM2: 2145, floorCount: 3, roomCount: 42, requiredEquipment: ["lighting"] },
  };
}

describe("number formatting", () => {
  test("formatSigned always carries a sign", () => {
    expect(formatSigned(36070)).toBe("+36,070");
    expect(formatSigned(-1234.5)).toBe("-1,234.5");
    expect(formatSigned(0)).toBe("+0");
  });

  test("formatPercent uses one decimal", () => {
    expect(formatPercent(0.5)).toBe("50.0%");
    expect(formatPercent(-0.125)).toBe("-12.5%");
    expect(formatPercent(0.0450875, { signed: true })).toBe("+4.5%");
  });
});

describe("formatVerificationReport", () => {
  test("renders summary, metrics, items and the review list", () => {
    expect(formatVerificationReport(sampleResult()).split("\n")).toEqual([
      RULE,
      "Estimate verification report",
      RULE,
      "",
      "Summary",
      "  Items: 2",
      "  Match rate: 50.0% (1/2)",
      "  Generated total: 836,070",
      "  Reference total: 800,000",
      "  Difference: +36,070 (+4.5%)",
      "  Issues: 3",
      "",
      "Building metrics",
      "  Floor area: 2,145 m2",
      "  Floors: 3",
      "  Estimated rooms: 42",
      "  Required equipment: lighting",
      "",
      "Items",
      THIN_RULE,
      "* White Gas Pipe",
      "  Generated: 836,070",
      "  Reference: 800,000 (matched)",
      "  Basis: kb-reference",
      "  Formula: 8,990/m × 93m = 836,070",
      "  KB reference: KB-SGP-15",
      "  Notes: KB:KB-SGP-15[exact](100%)",
      "  Confidence: 100%",
      "* LED light, outdoor",
      "  Generated: 0",
      "  Basis: unknown",
      "  Confidence: 0%",
      "  Issues: zero-amount, missing-price, unclear-basis",
      "",
      RULE,
      "Needs review",
      RULE,
      "  - LED light, outdoor: zero-amount, missing-price, unclear-basis",
    ]);
  });

  test("omits reference lines and metrics when there are none", () => {
    const result = sampleResult();
    result.summary = { ...result.summary, referenceTotal: 0, totalDifference: null, totalDifferenceRatio: null };
    result.metrics = null;
    result.issues = [];

    const lines = formatVerificationReport(result).split("\n");
    expect(lines.slice(5, 10)).toEqual(["  Items: 2", "  Match rate: 50.0% (1/2)", "  Generated total: 836,070", "  Issues: 3", ""]);
    expect(lines).not.toContain("Building metrics");
    expect(lines).not.toContain("Needs review");
  });
});

describe("verificationToCsv", () => {
  test("one row per item with a header", () => {
    expect(verificationToCsv(sampleResult()).split("\r\n")).toEqual([
      "Item ID,Item,Generated Amount,Reference Amount,Difference,Difference Ratio,Status,Basis,Formula,KB Reference,Confidence,Issues",
      'p,White Gas Pipe,836070,800000,36070,0.0451,matched,kb-reference,"8,990/m × 93m = 836,070",KB-SGP-15,1,',
      'l,"LED light, outdoor",0,,,,unmatched,unknown,,,0,zero-amount; missing-price; unclear-basis',
      "",
    ]);
  });
});
