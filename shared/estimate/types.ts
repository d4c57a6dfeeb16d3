// ------------------------------------------------------------
// Estimate pricing engine: line items, KB entries, match/trace records
// ------------------------------------------------------------

export const MATCH_TIERS = ["exact", "partial", "category-fallback", "none"] as const;
export type MatchTier = (typeof MATCH_TIERS)[number];

export type UnitCompatibility = "equal" | "loose" | "incompatible";

/**
 * One row of a generated estimate. The hierarchy is implicit: `level` over the
 * flat ordered sequence, children follow their parent at `level + 1`.
 */
export type EstimateLineItem = {
  id: string;
  name: string;
  specification: string | null;
  discipline: string | null;
  level: number;
  quantity: number | null;
  unit: string | null;
  unitPrice: number | null;
  amount: number | null;
  confidence: number | null;
  priceReferences: string[];
  sourceReference: string | null;
  itemNo?: string | null;
  matchTier?: MatchTier | null;
};

export type PriceKBFeatures = {
  specification?: string;
  [key: string]: unknown;
};

export type PriceKBEntry = {
  itemId: string;
  description: string;
  discipline: string;
  unit: string;
  unitPrice: number;
  features: PriceKBFeatures;
  contextTags: string[];
  vendor?: string | null;
  validFrom?: string | null;
  validTo?: string | null;
  sourceProject?: string | null;
};

export type ScoreBreakdown = {
  name: number;
  category: number;
  specification: number;
  unit: number;
};

export type CandidateScore = {
  score: number;
  categoryMatch: boolean;
  unitCompatibility: UnitCompatibility;
  breakdown: ScoreBreakdown;
};

export type PriceRejectionReason = "below-minimum" | "above-maximum" | "unit-price-ceiling" | "amount-ceiling";

export type MatchResult = {
  itemId: string;
  tier: MatchTier;
  entry: PriceKBEntry | null;
  score: number;
  confidence: number | null;
  applied: boolean;
  rejectionReason: PriceRejectionReason | null;
  candidatesScored: number;
};

export type BuildingMetrics = {
  floorAreaM2: number | null;
  floorCount: number | null;
  roomCount: number | null;
  requiredEquipment?: string[];
};

export const CALCULATION_BASES = [
  "subtotal",
  "kb-reference",
  "material-by-quantity",
  "lump-sum",
  "area-estimate",
  "room-count-estimate",
  "unknown",
] as const;
export type CalculationBasis = (typeof CALCULATION_BASES)[number];

export type CalculationTrace = {
  itemId: string;
  itemName: string;
  quantity: number | null;
  unit: string | null;
  unitPrice: number | null;
  amount: number | null;
  basis: CalculationBasis;
  formula: string | null;
  kbReference: string | null;
  confidence: number;
  notes: string | null;
};

/** One row of an independently produced estimate used as the comparison baseline. */
export type ReferenceItem = {
  name: string;
  specification: string | null;
  amount: number | null;
};

export type VerificationMatchStatus = "matched" | "acceptable" | "needs-review" | "unmatched";

export type VerificationIssue = "zero-amount" | "missing-price" | "unclear-basis" | "large-difference";

export type ItemVerification = {
  itemId: string;
  itemName: string;
  generatedAmount: number;
  referenceAmount: number | null;
  difference: number | null;
  differenceRatio: number | null;
  status: VerificationMatchStatus;
  trace: CalculationTrace;
  issues: VerificationIssue[];
};

export type VerificationSummary = {
  totalItems: number;
  matchedItems: number;
  matchRate: number;
  generatedTotal: number;
  referenceTotal: number;
  totalDifference: number | null;
  totalDifferenceRatio: number | null;
  issueCount: number;
};

export type VerificationResult = {
  summary: VerificationSummary;
  items: ItemVerification[];
  issues: Array<{ itemId: string; itemName: string; issues: VerificationIssue[] }>;
  metrics: BuildingMetrics | null;
};
