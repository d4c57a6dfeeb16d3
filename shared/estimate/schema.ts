import { z } from "zod";
import { MATCH_TIERS } from "./types";

// ------------------------------------------------------------
// Boundary schemas: everything entering the engine from files or
// callers is parsed here first.
// ------------------------------------------------------------

const nullableNumber = z.number().finite().nullable().default(null);
const nullableString = z.string().nullable().default(null);

export const estimateLineItemSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  specification: nullableString,
  discipline: nullableString,
  level: z.number().int().min(0),
  quantity: nullableNumber,
  unit: nullableString,
  unitPrice: nullableNumber,
  amount: nullableNumber,
  confidence: z.number().min(0).max(1).nullable().default(null),
  priceReferences: z.array(z.string()).default([]),
  sourceReference: nullableString,
  itemNo: z.string().nullable().optional(),
  matchTier: z.enum(MATCH_TIERS).nullable().optional(),
});

export const priceKbEntrySchema = z.object({
  itemId: z.string().min(1),
  description: z.string(),
  discipline: z.string().default(""),
  unit: z.string().default(""),
  unitPrice: z.number().finite().nonnegative(),
  features: z.object({ specification: z.string().optional() }).passthrough().default({}),
  contextTags: z.array(z.string()).default([]),
  vendor: z.string().nullable().optional(),
  validFrom: z.string().nullable().optional(),
  validTo: z.string().nullable().optional(),
  sourceProject: z.string().nullable().optional(),
});

export const referenceItemSchema = z.object({
  name: z.string(),
  specification: nullableString,
  amount: nullableNumber,
});

export const buildingMetricsSchema = z.object({
  floorAreaM2: z.number().positive().nullable().default(null),
  floorCount: z.number().int().positive().nullable().default(null),
  roomCount: z.number().int().nonnegative().nullable().default(null),
  requiredEquipment: z.array(z.string()).optional(),
});

export const estimationRuleSchema = z.object({
  keyword: z.string().min(1),
  basis: z.enum(["floor-area", "room-count", "floor-count"]),
  factor: z.number().positive(),
});

export const estimatingDictionarySchema = z.object({
  synonyms: z.record(z.array(z.string())),
  categories: z.array(z.string()),
  unitFamilies: z.record(z.array(z.string())),
  wildcardDisciplines: z.array(z.string()),
  disciplineAliases: z.array(z.object({ short: z.string().min(1), full: z.string().min(1) })),
  highValueMinimums: z.record(z.number().nonnegative()),
  highValueExclusions: z.array(z.string()),
  maxPrices: z.record(z.number().nonnegative()),
  unitPriceCeilings: z.record(z.number().positive()),
  lineAmountCeiling: z.number().positive(),
  estimationRules: z.array(estimationRuleSchema),
  equipmentKeywords: z.array(z.string()).default([]),
});

/** Dictionary file that replaces only the tables it names. */
export const dictionaryOverrideSchema = estimatingDictionarySchema.partial();

export const estimateLineItemListSchema = z.array(estimateLineItemSchema);
export const priceKbSchema = z.array(priceKbEntrySchema);
export const referenceItemListSchema = z.array(referenceItemSchema);

export type EstimatingDictionary = z.infer<typeof estimatingDictionarySchema>;
export type EstimationRule = z.infer<typeof estimationRuleSchema>;
export type EstimateLineItemInput = z.input<typeof estimateLineItemSchema>;
export type PriceKBEntryInput = z.input<typeof priceKbEntrySchema>;
