import { describe, it, expect } from "vitest";
import { InvalidProfileError } from "../errors.js";
import { macroShares, recommend, splitTargets } from "./recommender.js";
import type { FoodEntry, MacroRatio } from "../types.js";

const food = (name: string, kcal: number, protein_g: number, fat_g: number, carbs_g: number): FoodEntry => ({
  name,
  kcal,
  protein_g,
  fat_g,
  carbs_g,
  serving_g: null,
});

const PROTEIN = food("P", 400, 100, 0, 0);
const FAT = food("F", 900, 0, 100, 0);
const CARBS = food("C", 400, 0, 0, 100);
const foods = [PROTEIN, FAT, CARBS];

const ratio: MacroRatio = { protein: 0.4, fat: 0.3, carbs: 0.3 };
const portions = [5, 10, 15, 20, 25, 30];

describe("splitTargets", () => {
  it("splits evenly by default", () => {
    expect(splitTargets(600, 3, null)).toEqual([200, 200, 200]);
  });

  it("splits by weight", () => {
    expect(splitTargets(600, 3, [1, 2, 1])).toEqual([150, 300, 150]);
  });

  it("rejects bad input", () => {
    expect(() => splitTargets(600, 0, null)).toThrow(RangeError);
    expect(() => splitTargets(600, 2, [1, 1, 1])).toThrow(RangeError);
  });
});

describe("recommend", () => {
  it("finds meals inside both tolerances", () => {
    const result = recommend(600, ratio, 3, foods, { portions });
    expect(result.status).toBe("ok");
    if (result.status !== "ok") return;

    expect(result.plan.meals).toHaveLength(3);
    for (const meal of result.plan.meals) {
      expect(meal.targetKcal).toBe(200);
      expect(meal.items.length).toBeGreaterThanOrEqual(2);
      expect(meal.totals.kcal).toBeGreaterThanOrEqual(180);
      expect(meal.totals.kcal).toBeLessThanOrEqual(220);
      const shares = macroShares(meal.totals);
      expect(shares).not.toBeNull();
      if (!shares) continue;
      expect(Math.abs(shares.protein - ratio.protein)).toBeLessThanOrEqual(0.1);
      expect(Math.abs(shares.fat - ratio.fat)).toBeLessThanOrEqual(0.1);
      expect(Math.abs(shares.carbs - ratio.carbs)).toBeLessThanOrEqual(0.1);
    }
    const summed = result.plan.meals.reduce((sum, m) => sum + m.totals.kcal, 0);
    expect(result.plan.totals.kcal).toBeCloseTo(summed);
  });

  it("never returns a plan outside tolerance", () => {
    const kitchen = [
      food("계란", 155, 13, 11, 1.1),
      food("토마토", 18, 0.9, 0.2, 3.9),
      food("닭가슴살", 165, 31, 3.6, 0),
    ];
    const result = recommend(600, ratio, 3, kitchen);
    if (result.status === "infeasible") {
      expect(result.reason).toBe("out_of_tolerance");
      return;
    }
    for (const meal of result.plan.meals) {
      expect(Math.abs(meal.totals.kcal - 200)).toBeLessThanOrEqual(20);
      const shares = macroShares(meal.totals);
      expect(shares && Math.abs(shares.carbs - ratio.carbs) <= 0.1).toBe(true);
    }
  });

  it("follows meal weights", () => {
    const result = recommend(800, ratio, 3, foods, { portions, mealWeights: [1, 1, 2] });
    expect(result.status === "ok" && result.plan.meals.map((m) => m.targetKcal)).toEqual([200, 200, 400]);
  });

  it("is deterministic", () => {
    expect(recommend(600, ratio, 3, foods, { portions })).toEqual(
      recommend(600, ratio, 3, foods, { portions })
    );
  });

  it("reports out_of_tolerance when no mix reaches the ratio", () => {
    const fatty = [food("F1", 900, 0, 100, 0), food("F2", 800, 0, 90, 0)];
    expect(recommend(600, ratio, 3, fatty, { portions })).toMatchObject({
      status: "infeasible",
      reason: "out_of_tolerance",
      mealIndex: 0,
    });
  });

  it("leaves avoided foods out", () => {
    expect(recommend(600, ratio, 3, foods, { portions, avoid: ["p"] })).toMatchObject({
      status: "infeasible",
      reason: "out_of_tolerance",
    });
  });

  it("favours preferred foods", () => {
    const twin = food("P2", 400, 100, 0, 0);
    const result = recommend(200, ratio, 1, [...foods, twin], { portions, prefer: ["P2"] });
    expect(result.status).toBe("ok");
    if (result.status !== "ok") return;
    expect(result.plan.meals[0].items.map((i) => i.name)).toContain("P2");
  });

  it("reports no_budget without remaining calories", () => {
    expect(recommend(0, ratio, 3, foods)).toEqual({
      status: "infeasible",
      reason: "no_budget",
      mealIndex: null,
      expansions: 0,
    });
  });

  it("reports no_candidates without usable foods", () => {
    expect(recommend(600, ratio, 3, [food("water", 0, 0, 0, 0)])).toMatchObject({
      status: "infeasible",
      reason: "no_candidates",
      mealIndex: 0,
    });
  });

  it("stops at the expansion cap", () => {
    expect(recommend(600, ratio, 3, foods, { portions, maxExpansions: 1 })).toEqual({
      status: "infeasible",
      reason: "out_of_tolerance",
      mealIndex: 0,
      expansions: 1,
    });
  });

  it("rejects an invalid macro ratio", () => {
    expect(() => recommend(600, { protein: 0.5, fat: 0.3, carbs: 0.3 }, 3, foods)).toThrow(
      InvalidProfileError
    );
  });
});
