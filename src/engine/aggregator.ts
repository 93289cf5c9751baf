import type {
  AggregateResult,
  LoggedEntry,
  NutritionTotals,
  ParsedMeal,
} from "../types.js";

export const zeroTotals = (): NutritionTotals => ({ kcal: 0, protein_g: 0, fat_g: 0, carbs_g: 0 });

export function scaleNutrition(per100g: NutritionTotals, grams: number): NutritionTotals {
  const factor = grams / 100;
  return {
    kcal: per100g.kcal * factor,
    protein_g: per100g.protein_g * factor,
    fat_g: per100g.fat_g * factor,
    carbs_g: per100g.carbs_g * factor,
  };
}

export function addTotals(a: NutritionTotals, b: NutritionTotals): NutritionTotals {
  return {
    kcal: a.kcal + b.kcal,
    protein_g: a.protein_g + b.protein_g,
    fat_g: a.fat_g + b.fat_g,
    carbs_g: a.carbs_g + b.carbs_g,
  };
}

export function sumTotals(list: readonly NutritionTotals[]): NutritionTotals {
  return list.reduce(addTotals, zeroTotals());
}

/**
 * Sums resolved items of one or more meals. Unresolved items add nothing and
 * are counted so callers can flag incomplete totals.
 */
export function aggregate(meals: ParsedMeal | readonly ParsedMeal[]): AggregateResult {
  const list: readonly ParsedMeal[] = "items" in meals ? [meals] : meals;
  let totals = zeroTotals();
  let resolvedCount = 0;
  let unresolvedCount = 0;

  for (const meal of list) {
    for (const item of meal.items) {
      if (item.confidence === "unresolved") {
        unresolvedCount++;
        continue;
      }
      resolvedCount++;
      totals = addTotals(totals, scaleNutrition(item.per100g, Math.max(0, item.grams)));
    }
  }
  return { totals, resolvedCount, unresolvedCount };
}

// Dates are YYYY-MM-DD, both ends inclusive
export function aggregateRange(
  entries: readonly LoggedEntry[],
  from: string,
  to: string
): NutritionTotals {
  return sumTotals(
    entries.filter((e) => e.date >= from && e.date <= to).map((e) => e.totals)
  );
}

export function totalsByDate(entries: readonly LoggedEntry[]): Map<string, NutritionTotals> {
  const byDate = new Map<string, NutritionTotals>();
  for (const entry of entries) {
    byDate.set(entry.date, addTotals(byDate.get(entry.date) ?? zeroTotals(), entry.totals));
  }
  return byDate;
}
