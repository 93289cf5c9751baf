import type {
  DailyPoint,
  Nutrient,
  NutrientRow,
  NutritionSummary,
  NutritionTargets,
  NutritionTotals,
  WeeklySummary,
} from "../types.js";

export const NUTRIENTS: readonly Nutrient[] = ["kcal", "protein_g", "fat_g", "carbs_g"];

// Day counts as on target when kcal lands in [85%, 105%] of the goal
export const ACHIEVED_BAND = { lower: 0.85, upper: 1.05 } as const;
// Weekly over/under thresholds
export const WEEKLY_BAND = { lower: 0.95, upper: 1.05 } as const;

export function summarize(totals: NutritionTotals, targets: NutritionTargets): NutritionSummary {
  const rows: NutrientRow[] = NUTRIENTS.map((nutrient) => {
    const consumed = totals[nutrient];
    const target = targets[nutrient];
    return {
      nutrient,
      consumed,
      target,
      delta: consumed - target,
      percent: target > 0 ? (consumed / target) * 100 : null,
    };
  });

  const achieved =
    targets.kcal > 0 &&
    totals.kcal >= targets.kcal * ACHIEVED_BAND.lower &&
    totals.kcal <= targets.kcal * ACHIEVED_BAND.upper;

  return { rows, achieved };
}

export function summarizeWeek(days: readonly DailyPoint[], targetKcal: number): WeeklySummary {
  const count = days.length || 1;
  const avgKcal = days.reduce((sum, d) => sum + d.kcal, 0) / count;
  const aboveDays = days.filter((d) => d.kcal > targetKcal * WEEKLY_BAND.upper).length;
  const belowDays = days.filter((d) => d.kcal < targetKcal * WEEKLY_BAND.lower).length;
  return {
    start: days[0]?.date ?? "",
    end: days[days.length - 1]?.date ?? "",
    days: [...days],
    targetKcal,
    avgKcal,
    aboveDays,
    belowDays,
  };
}
