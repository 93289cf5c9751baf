import { describe, it, expect } from "vitest";
import { summarize, summarizeWeek } from "./summarizer.js";

describe("summarize", () => {
  const targets = { kcal: 2000, protein_g: 150, fat_g: 60, carbs_g: 0 };

  it("reports consumed, target and delta per nutrient", () => {
    const { rows } = summarize({ kcal: 1800, protein_g: 120, fat_g: 70, carbs_g: 210 }, targets);
    expect(rows[0]).toEqual({ nutrient: "kcal", consumed: 1800, target: 2000, delta: -200, percent: 90 });
    expect(rows[1]).toEqual({ nutrient: "protein_g", consumed: 120, target: 150, delta: -30, percent: 80 });
    expect(rows[3].percent).toBeNull();
  });

  it("marks the day achieved inside the calorie band", () => {
    const at = (kcal: number) =>
      summarize({ kcal, protein_g: 0, fat_g: 0, carbs_g: 0 }, targets).achieved;
    expect(at(1750)).toBe(true);
    expect(at(2050)).toBe(true);
    expect(at(1600)).toBe(false);
    expect(at(2200)).toBe(false);
  });
});

describe("summarizeWeek", () => {
  it("averages and counts days outside the band", () => {
    const days = [
      { date: "2026-01-01", kcal: 2000 },
      { date: "2026-01-02", kcal: 2200 },
      { date: "2026-01-03", kcal: 1800 },
      { date: "2026-01-04", kcal: 0 },
    ];
    expect(summarizeWeek(days, 2000)).toEqual({
      start: "2026-01-01",
      end: "2026-01-04",
      days,
      targetKcal: 2000,
      avgKcal: 1500,
      aboveDays: 1,
      belowDays: 2,
    });
  });
});
