export type FindingSeverity = "ERROR" | "WARNING" | "INFO";

export const FINDING_CODES = {
  noMatchFound: "NO_MATCH_FOUND",
  priceRejected: "PRICE_REJECTED",
  lowConfidence: "LOW_CONFIDENCE",
  malformedHierarchy: "MALFORMED_HIERARCHY",
  undefinedRatio: "UNDEFINED_RATIO",
  orphanedAmount: "ORPHANED_AMOUNT",
  matchCancelled: "MATCH_CANCELLED",
} as const;

export type FindingCode = (typeof FINDING_CODES)[keyof typeof FINDING_CODES];

export type Finding = {
  code: FindingCode;
  severity: FindingSeverity;
  message: string;
  /**
   * Position in the item sequence, e.g. items[4].
   */
  path: string;
  entityId?: string;
  context?: Record<string, unknown>;
};

export function errorFinding(params: Omit<Finding, "severity">): Finding {
  return { ...params, severity: "ERROR" };
}

export function warningFinding(params: Omit<Finding, "severity">): Finding {
  return { ...params, severity: "WARNING" };
}

export function infoFinding(params: Omit<Finding, "severity">): Finding {
  return { ...params, severity: "INFO" };
}

export function itemPath(index: number): string {
  return `items[${index}]`;
}

export function countBySeverity(findings: Finding[]): Record<FindingSeverity, number> {
  const counts: Record<FindingSeverity, number> = { ERROR: 0, WARNING: 0, INFO: 0 };
  for (const f of findings) counts[f.severity] += 1;
  return counts;
}
