import type {
  AggregateResult,
  LoggedEntry,
  MealPlan,
  NutritionSummary,
  NutritionTotals,
  ParsedMeal,
  Profile,
  QuantifiedItem,
  RecommendationResult,
  WeeklySummary,
} from "../types.js";

const NUTRIENT_LABELS = {
  kcal: "Calories",
  protein_g: "Protein",
  fat_g: "Fat",
  carbs_g: "Carbs",
} as const;

export const round1 = (n: number) => Math.round(n * 10) / 10;

export function formatTotals(t: NutritionTotals): string {
  return `${Math.round(t.kcal)} cal | P: ${round1(t.protein_g)}g | F: ${round1(t.fat_g)}g | C: ${round1(t.carbs_g)}g`;
}

export function formatItem(item: QuantifiedItem): string {
  if (item.confidence === "unresolved") {
    const why = {
      unknown_food: "unknown food",
      unrecognized_unit: "unrecognized unit",
      missing_name: "no food name",
    }[item.reason];
    return `- ? "${item.raw}" (${why})`;
  }
  const via = item.confidence === "exact" ? "" : ` ← "${item.name}" (${item.confidence})`;
  const kcal = Math.round((item.per100g.kcal * item.grams) / 100);
  return `- **${item.foodKey}** ${round1(item.grams)}g - ${kcal} cal${via}`;
}

export function formatParsedMeal(meal: ParsedMeal, result: AggregateResult): string {
  let text = meal.items.map(formatItem).join("\n");
  text += `\n\n**Total:** ${formatTotals(result.totals)}`;
  if (result.unresolvedCount > 0) {
    text += `\n⚠ ${result.unresolvedCount} item(s) could not be resolved; totals are incomplete.`;
  }
  return text;
}

export function formatEntry(entry: LoggedEntry): string {
  const lines = [`### ${entry.time} [ID: ${entry.id}]`, `> ${entry.meal.text}`];
  lines.push(...entry.meal.items.map(formatItem));
  lines.push(`Subtotal: ${formatTotals(entry.totals)}`);
  return lines.join("\n");
}

export function formatSummary(title: string, summary: NutritionSummary): string {
  const lines = [`## ${title}`, ""];
  for (const row of summary.rows) {
    const unit = row.nutrient === "kcal" ? "" : "g";
    const pct = row.percent === null ? "" : ` (${Math.round(row.percent)}%)`;
    const sign = row.delta >= 0 ? "+" : "";
    lines.push(
      `- ${NUTRIENT_LABELS[row.nutrient]}: ${round1(row.consumed)}${unit} / ${round1(row.target)}${unit}${pct}, ${sign}${round1(row.delta)}${unit}`
    );
  }
  lines.push(`- On target: ${summary.achieved ? "yes" : "no"}`);
  return lines.join("\n");
}

export function formatWeekly(summary: WeeklySummary): string {
  const lines = [
    `## Weekly Report: ${summary.start} to ${summary.end}`,
    "",
    `- Average: ${Math.round(summary.avgKcal)} cal / ${Math.round(summary.targetKcal)} cal target`,
    `- Days over target: ${summary.aboveDays}`,
    `- Days under target: ${summary.belowDays}`,
    "",
    "### Daily Breakdown",
  ];
  for (const day of summary.days) lines.push(`- ${day.date}: ${Math.round(day.kcal)} cal`);
  return lines.join("\n");
}

export function formatProfile(
  profile: Profile,
  derived: { bmr: number; tdee: number; targets: NutritionTotals }
): string {
  const r = profile.macro_ratio;
  return [
    "**Profile:**",
    `- ${profile.gender}, ${profile.age} y, ${profile.height_cm} cm, ${profile.weight_kg} kg, ${profile.activity}`,
    `- Macro ratio: protein ${r.protein} / fat ${r.fat} / carbs ${r.carbs}`,
    `- Target override: ${profile.target_kcal ?? "not set"}`,
    `- BMR: ${round1(derived.bmr)} kcal | TDEE: ${round1(derived.tdee)} kcal`,
    `- Daily target: ${formatTotals(derived.targets)}`,
  ].join("\n");
}

function formatMeal(meal: MealPlan, index: number): string {
  const lines = [`### Meal ${index + 1} (target ${Math.round(meal.targetKcal)} cal)`];
  for (const item of meal.items) {
    lines.push(`- ${item.name} ${item.grams}g: ${formatTotals(item.nutrition)}`);
  }
  lines.push(`Subtotal: ${formatTotals(meal.totals)}`);
  return lines.join("\n");
}

export function formatRecommendation(result: RecommendationResult): string {
  if (result.status === "infeasible") {
    const why = {
      no_budget: "there is no calorie budget left",
      no_candidates: "not enough usable foods in the database",
      out_of_tolerance: "no food combination fits the calorie and macro tolerance",
    }[result.reason];
    const where = result.mealIndex === null ? "" : ` for meal ${result.mealIndex + 1}`;
    return `**Infeasible**${where}: ${why} (searched ${result.expansions} combinations).`;
  }
  const { plan } = result;
  return [
    `## Meal Plan (${Math.round(plan.remainingKcal)} cal budget)`,
    "",
    ...plan.meals.map(formatMeal),
    "",
    `**Plan total:** ${formatTotals(plan.totals)}`,
  ].join("\n");
}
