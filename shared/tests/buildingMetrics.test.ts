import { describe, expect, test } from "@jest/globals";
import { extractBuildingMetrics, extractFloorArea, extractFloorCount } from "../estimate/buildingMetrics";
import { DEFAULT_DICTIONARY } from "../estimate/dictionary";

describe("extractBuildingMetrics", () => {
  test("reads area, floors and equipment from English text", () => {
    const text = [
      "Project: temporary school building",
      "Gross floor area: 2,145 m²",
      "3-story steel structure",
      "Equipment: cubicle, LED lighting, distribution board",
    ].join("\n");

    expect(extractBuildingMetrics(text, DEFAULT_DICTIONARY)).toEqual({
      floorAreaM2: 2145,
      floorCount: 3,
      roomCount: 42,
      requiredEquipment: ["cubicle", "distribution board", "lighting"],
    });
  });

  test("reads full-width Japanese notation", () => {
    const metrics = extractBuildingMetrics("延床面積：２，１４５㎡\n鉄骨造 地上3階建", DEFAULT_DICTIONARY);
    expect(metrics.floorAreaM2).toBe(2145);
    expect(metrics.floorCount).toBe(3);
    expect(metrics.roomCount).toBe(42);
  });

  test("returns nulls when nothing plausible is found", () => {
    expect(extractBuildingMetrics("Scope: replace two valves.", DEFAULT_DICTIONARY)).toEqual({
      floorAreaM2: null,
      floorCount: null,
      roomCount: null,
      requiredEquipment: [],
    });
  });
});

describe("extractFloorArea", () => {
  test("skips areas outside the plausible range", () => {
    expect(extractFloorArea("floor area: 50 m2")).toBeNull();
  });

  test("falls back to a bare area figure", () => {
    expect(extractFloorArea("approx. 850 sqm in total")).toBe(850);
  });
});

describe("extractFloorCount", () => {
  test("accepts storey and F notation within range", () => {
    expect(extractFloorCount("a 5 storey block")).toBe(5);
    expect(extractFloorCount("12F office")).toBe(12);
    expect(extractFloorCount("99F tower")).toBeNull();
  });
});
