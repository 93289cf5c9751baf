import { describe, it, expect } from "vitest";
import { aggregate, aggregateRange, scaleNutrition, totalsByDate } from "./aggregator.js";
import type { LoggedEntry, ParsedMeal } from "../types.js";

const meal = (text: string, grams: number, kcal: number): ParsedMeal => ({
  text,
  items: [
    {
      confidence: "exact",
      raw: text,
      name: text,
      quantity: `${grams}g`,
      foodKey: text,
      grams,
      per100g: { kcal, protein_g: 10, fat_g: 5, carbs_g: 20 },
    },
  ],
});

const entry = (id: number, date: string, kcal: number): LoggedEntry => ({
  id,
  logged_at: `${date} 12:00:00`,
  date,
  time: "12:00",
  meal: { text: "", items: [] },
  totals: { kcal, protein_g: 0, fat_g: 0, carbs_g: 0 },
});

describe("aggregate", () => {
  it("returns zeros for an empty meal", () => {
    expect(aggregate({ text: "", items: [] })).toEqual({
      totals: { kcal: 0, protein_g: 0, fat_g: 0, carbs_g: 0 },
      resolvedCount: 0,
      unresolvedCount: 0,
    });
  });

  it("scales per-100 g values by grams", () => {
    expect(scaleNutrition({ kcal: 200, protein_g: 10, fat_g: 5, carbs_g: 20 }, 50)).toEqual({
      kcal: 100,
      protein_g: 5,
      fat_g: 2.5,
      carbs_g: 10,
    });
  });

  it("sums several meals in any order", () => {
    const a = meal("a", 150, 120);
    const b = meal("b", 80, 300);
    const forward = aggregate([a, b]).totals;
    const backward = aggregate([b, a]).totals;
    expect(forward.kcal).toBeCloseTo(420);
    expect(backward.kcal).toBeCloseTo(forward.kcal);
    expect(backward.protein_g).toBeCloseTo(forward.protein_g);
  });

  it("counts unresolved items without adding them", () => {
    const parsed: ParsedMeal = {
      text: "x",
      items: [
        ...meal("a", 100, 100).items,
        { confidence: "unresolved", raw: "y 50g", name: "y", quantity: "50g", reason: "unknown_food", grams: 50 },
      ],
    };
    const result = aggregate(parsed);
    expect(result.totals.kcal).toBe(100);
    expect(result.resolvedCount).toBe(1);
    expect(result.unresolvedCount).toBe(1);
  });
});

describe("aggregateRange", () => {
  const entries = [entry(1, "2026-01-01", 500), entry(2, "2026-01-02", 700), entry(3, "2026-01-03", 900)];

  it("includes both ends", () => {
    expect(aggregateRange(entries, "2026-01-01", "2026-01-02").kcal).toBe(1200);
    expect(aggregateRange(entries, "2026-01-03", "2026-01-03").kcal).toBe(900);
  });

  it("groups totals per date", () => {
    const byDate = totalsByDate([...entries, entry(4, "2026-01-01", 250)]);
    expect(byDate.get("2026-01-01")?.kcal).toBe(750);
    expect(byDate.size).toBe(3);
  });
});
