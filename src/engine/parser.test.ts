import { describe, it, expect } from "vitest";
import { aggregate } from "./aggregator.js";
import { FoodCatalog } from "./catalog.js";
import { MealTextParser, splitSegments } from "./parser.js";
import { FoodResolver } from "./resolver.js";
import { UnitConverter } from "./units.js";
import type { FoodEntry, ResolvedItem, UnitTable } from "../types.js";

const foods: FoodEntry[] = [
  { name: "계란", kcal: 155, protein_g: 13, fat_g: 11, carbs_g: 1.1, serving_g: 50 },
  { name: "토마토", kcal: 18, protein_g: 0.9, fat_g: 0.2, carbs_g: 3.9, serving_g: null },
  { name: "닭가슴살", kcal: 165, protein_g: 31, fat_g: 3.6, carbs_g: 0, serving_g: null },
  { name: "백미밥", kcal: 130, protein_g: 2.7, fat_g: 0.3, carbs_g: 28.2, serving_g: 210 },
];

const units: UnitTable = {
  defaults: { 개: 50, 공기: 210 },
  foods: { 계란: { 개: 50 } },
};

const parser = new MealTextParser(
  new FoodResolver(new FoodCatalog(foods, [["밥", "백미밥"]])),
  new UnitConverter(units)
);

const resolved = (items: ReturnType<typeof parser.parse>["items"]): ResolvedItem[] =>
  items.flatMap((i) => (i.confidence === "unresolved" ? [] : [i]));

describe("splitSegments", () => {
  it("splits on delimiters and connectives", () => {
    expect(splitSegments("계란 2개 그리고 토마토; 밥\n닭가슴살")).toEqual([
      "계란 2개",
      "토마토",
      "밥",
      "닭가슴살",
    ]);
  });

  it("keeps fractions intact", () => {
    expect(splitSegments("밥 1/2공기/계란")).toEqual(["밥 1/2공기", "계란"]);
  });
});

describe("MealTextParser", () => {
  it("parses a comma separated meal with mixed units", () => {
    const meal = parser.parse("계란 2개, 토마토 100g, 닭가슴살 150g");
    expect(meal.items.map((i) => [i.confidence, i.grams])).toEqual([
      ["exact", 100],
      ["exact", 100],
      ["exact", 150],
    ]);

    const { totals, resolvedCount, unresolvedCount } = aggregate(meal);
    expect(resolvedCount).toBe(3);
    expect(unresolvedCount).toBe(0);
    expect(totals.kcal).toBeCloseTo(420.5);
    expect(totals.protein_g).toBeCloseTo(60.4);
  });

  it("keeps unknown foods as unresolved items", () => {
    const meal = parser.parse("계란 2개, asdf, 밥 1공기");
    expect(meal.items).toHaveLength(3);
    expect(meal.items[1]).toEqual({
      confidence: "unresolved",
      raw: "asdf",
      name: "asdf",
      quantity: null,
      reason: "unknown_food",
      grams: null,
    });
    expect(meal.items[2]).toMatchObject({ confidence: "synonym", foodKey: "백미밥", grams: 210 });

    const { totals, unresolvedCount } = aggregate(meal);
    expect(unresolvedCount).toBe(1);
    expect(totals.kcal).toBeCloseTo(428);
  });

  it("separates a quantity glued to the name", () => {
    const [item] = parser.parse("계란2개").items;
    expect(item).toMatchObject({ raw: "계란 2개", foodKey: "계란", grams: 100 });
  });

  it("accepts a quantity before the name", () => {
    const [item] = parser.parse("100g 닭가슴살").items;
    expect(item).toMatchObject({ raw: "100g 닭가슴살", foodKey: "닭가슴살", grams: 100 });
  });

  it("splits two foods written without a delimiter", () => {
    const items = resolved(parser.parse("계란 토마토 100g").items);
    expect(items.map((i) => [i.foodKey, i.grams])).toEqual([
      ["계란", 50],
      ["토마토", 100],
    ]);
  });

  it("uses the default serving when no quantity is given", () => {
    const items = resolved(parser.parse("토마토, 밥").items);
    expect(items.map((i) => i.grams)).toEqual([100, 210]);
  });

  it("reads a quantity written with a space before its unit", () => {
    const read = (text: string) => parser.parse(text).items.map((i) => [i.confidence, i.raw, i.grams]);
    expect(read("닭가슴살 150 g")).toEqual([["exact", "닭가슴살 150g", 150]]);
    expect(read("계란 2 개")).toEqual([["exact", "계란 2개", 100]]);
    expect(read("밥 1 공기")).toEqual([["synonym", "밥 1공기", 210]]);
    expect(read("100 g 닭가슴살")).toEqual([["exact", "100g 닭가슴살", 100]]);
  });

  it("handles fractional count units", () => {
    const [item] = parser.parse("밥 1/2공기").items;
    expect(item.grams).toBe(105);
  });

  it("flags units it cannot convert", () => {
    const [item] = parser.parse("계란 3봉지").items;
    expect(item).toMatchObject({ confidence: "unresolved", reason: "unrecognized_unit", grams: null });
  });

  it("keeps explicit grams on unknown foods", () => {
    const [item] = parser.parse("asdf 200g").items;
    expect(item).toMatchObject({ confidence: "unresolved", reason: "unknown_food", grams: 200 });
  });

  it("reports a quantity with no food name", () => {
    const [item] = parser.parse("200g").items;
    expect(item).toMatchObject({ confidence: "unresolved", reason: "missing_name", raw: "200g" });
  });

  it("returns no items for blank text", () => {
    expect(parser.parse("  ,  ").items).toEqual([]);
  });
});
