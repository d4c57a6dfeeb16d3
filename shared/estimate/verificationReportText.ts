import { buildCsv, type CsvColumn } from "../csv";
import { formatNumber } from "./calculationTrace";
import type { ItemVerification, VerificationResult } from "./types";

const RULE = "=".repeat(70);
const THIN_RULE = "-".repeat(70);

export function formatSigned(value: number): string {
  return `${value < 0 ? "-" : "+"}${formatNumber(Math.abs(value))}`;
}

export function formatPercent(ratio: number, opts?: { signed?: boolean }): string {
  const pct = `${Math.abs(ratio * 100).toFixed(1)}%`;
  if (opts?.signed) return `${ratio < 0 ? "-" : "+"}${pct}`;
  return ratio < 0 ? `-${pct}` : pct;
}

function itemLines(item: ItemVerification): string[] {
  const lines = [`* ${item.itemName}`, `  Generated: ${formatNumber(item.generatedAmount)}`];
  if (item.referenceAmount !== null) {
    lines.push(`  Reference: ${formatNumber(item.referenceAmount)} (${item.status})`);
  }
  lines.push(`  Basis: ${item.trace.basis}`);
  if (item.trace.formula) lines.push(`  Formula: ${item.trace.formula}`);
  if (item.trace.kbReference) lines.push(`  KB reference: ${item.trace.kbReference}`);
  if (item.trace.notes) lines.push(`  Notes: ${item.trace.notes}`);
  lines.push(`  Confidence: ${Math.round(item.trace.confidence * 100)}%`);
  if (item.issues.length > 0) lines.push(`  Issues: ${item.issues.join(", ")}`);
  return lines;
}

/**
 * Plain-text rendering of a verification result for terminals and logs.
 */
export function formatVerificationReport(result: VerificationResult): string {
  const s = result.summary;
  const lines: string[] = [RULE, "Estimate verification report", RULE, "", "Summary"];

  lines.push(`  Items: ${s.totalItems}`);
  lines.push(`  Match rate: ${formatPercent(s.matchRate)} (${s.matchedItems}/${s.totalItems})`);
  lines.push(`  Generated total: ${formatNumber(s.generatedTotal)}`);
  if (s.referenceTotal) {
    lines.push(`  Reference total: ${formatNumber(s.referenceTotal)}`);
    if (s.totalDifference !== null && s.totalDifferenceRatio !== null) {
      lines.push(`  Difference: ${formatSigned(s.totalDifference)} (${formatPercent(s.totalDifferenceRatio, { signed: true })})`);
    }
  }
  lines.push(`  Issues: ${s.issueCount}`);

  const m = result.metrics;
  if (m && (m.floorAreaM2 !== null || m.roomCount !== null)) {
    lines.push("", "Building metrics");
    if (m.floorAreaM2 !== null) lines.push(`  Floor area: ${formatNumber(m.floorAreaM2)} m2`);
    if (m.floorCount !== null) lines.push(`  Floors: ${m.floorCount}`);
    if (m.roomCount !== null) lines.push(`  Estimated rooms: ${m.roomCount}`);
    if (m.requiredEquipment && m.requiredEquipment.length > 0) {
      lines.push(`  Required equipment: ${m.requiredEquipment.join(", ")}`);
    }
  }

  lines.push("", "Items", THIN_RULE);
  for (const item of result.items) lines.push(...itemLines(item));

  if (result.issues.length > 0) {
    lines.push("", RULE, "Needs review", RULE);
    for (const entry of result.issues) lines.push(`  - ${entry.itemName}: ${entry.issues.join(", ")}`);
  }

  return lines.join("\n");
}

const VERIFICATION_COLUMNS: CsvColumn<ItemVerification>[] = [
  { header: "Item ID", value: (v) => v.itemId },
  { header: "Item", value: (v) => v.itemName },
  { header: "Generated Amount", value: (v) => v.generatedAmount },
  { header: "Reference Amount", value: (v) => v.referenceAmount },
  { header: "Difference", value: (v) => v.difference },
  { header: "Difference Ratio", value: (v) => (v.differenceRatio === null ? null : Math.round(v.differenceRatio * 1e4) / 1e4) },
  { header: "Status", value: (v) => v.status },
  { header: "Basis", value: (v) => v.trace.basis },
  { header: "Formula", value: (v) => v.trace.formula },
  { header: "KB Reference", value: (v) => v.trace.kbReference },
  { header: "Confidence", value: (v) => v.trace.confidence },
  { header: "Issues", value: (v) => v.issues.join("; ") },
];

export function verificationToCsv(result: VerificationResult): string {
  return buildCsv(result.items, VERIFICATION_COLUMNS);
}
