import type { EstimatingDictionary } from "./schema";
import { containsTerm, normalizeText } from "./textNormalizer";
import type { BuildingMetrics } from "./types";

// NFKC folds ㎡ and m² to "m2" and full-width digits to ASCII before these run.
const AREA_UNIT = String.raw`(?:m2|sqm|square\s+met(?:er|re)s?)(?![0-9a-z])`;
const AREA_NUMBER = String.raw`([0-9][0-9,]*(?:\.[0-9]+)?)`;

const AREA_PATTERNS: RegExp[] = [
  new RegExp(String.raw`延床面積[:\s]*${AREA_NUMBER}\s*${AREA_UNIT}`, "i"),
  new RegExp(String.raw`(?:gross|total)\s+floor\s+area[:\s]*${AREA_NUMBER}\s*${AREA_UNIT}`, "i"),
  new RegExp(String.raw`延べ面積[:\s]*${AREA_NUMBER}\s*${AREA_UNIT}`, "i"),
  new RegExp(String.raw`床面積[:\s]*${AREA_NUMBER}\s*${AREA_UNIT}`, "i"),
  new RegExp(String.raw`floor\s+area[:\s]*${AREA_NUMBER}\s*${AREA_UNIT}`, "i"),
  new RegExp(String.raw`建築面積[:\s]*${AREA_NUMBER}\s*${AREA_UNIT}`, "i"),
  new RegExp(String.raw`延床面積[\s\S]*?${AREA_NUMBER}\s*${AREA_UNIT}`, "i"),
  // any bare area of three digits or more
  new RegExp(String.raw`(?<![0-9,.])([1-9][0-9]{0,2}(?:,[0-9]{3})+|[1-9][0-9]{2,5})(?:\.[0-9]+)?\s*${AREA_UNIT}`, "i"),
];

const FLOOR_PATTERNS: RegExp[] = [
  /([0-9]+)\s*階建/,
  /地上\s*([0-9]+)\s*階/,
  /\b([0-9]+)[-\s]*(?:storey|story|storeys|stories)\b/i,
  /\b([0-9]+)\s*floors?\s+(?:building|structure)\b/i,
  /\b([0-9]+)F\b/,
];

export const METRIC_LIMITS = {
  minArea: 100,
  maxArea: 100_000,
  minFloors: 1,
  maxFloors: 50,
  /** floor area per room when deriving a room count */
  areaPerRoom: 50,
} as const;

function parseAmount(raw: string): number {
  return Number(raw.replace(/,/g, ""));
}

export function extractFloorArea(text: string): number | null {
  for (const pattern of AREA_PATTERNS) {
    const match = pattern.exec(text);
    if (!match) continue;
    const area = parseAmount(match[1]);
    if (area >= METRIC_LIMITS.minArea && area <= METRIC_LIMITS.maxArea) return area;
  }
  return null;
}

export function extractFloorCount(text: string): number | null {
  for (const pattern of FLOOR_PATTERNS) {
    const match = pattern.exec(text);
    if (!match) continue;
    const floors = Number.parseInt(match[1], 10);
    if (floors >= METRIC_LIMITS.minFloors && floors <= METRIC_LIMITS.maxFloors) return floors;
  }
  return null;
}

/**
 * Pull floor area, floor count and equipment keywords out of free
 * specification text. Room count is derived from the area.
 */
export function extractBuildingMetrics(specText: string, dictionary: EstimatingDictionary): BuildingMetrics {
  const text = specText.normalize("NFKC");
  const floorAreaM2 = extractFloorArea(text);
  const floorCount = extractFloorCount(text);
  const roomCount = floorAreaM2 !== null ? Math.floor(floorAreaM2 / METRIC_LIMITS.areaPerRoom) : null;

  const normalized = normalizeText(specText);
  const requiredEquipment = dictionary.equipmentKeywords.filter((kw) => containsTerm(normalized, normalizeText(kw)));

  return { floorAreaM2, floorCount, roomCount, requiredEquipment };
}
