// Nutrition facts. Per 100 g on a FoodEntry, absolute amounts everywhere else.
export interface NutritionTotals {
  kcal: number;
  protein_g: number;
  fat_g: number;
  carbs_g: number;
}

// Food database row, nutrition per 100 g
export interface FoodEntry extends NutritionTotals {
  name: string;
  serving_g: number | null;
}

export type SynonymPair = readonly [alias: string, canonical: string];

// Unit conversion tables (grams per one unit)
export interface UnitTable {
  defaults: Record<string, number>;
  foods: Record<string, Record<string, number>>;
}

export type MatchConfidence = "exact" | "synonym" | "fuzzy";

export type UnresolvedReason = "unknown_food" | "unrecognized_unit" | "missing_name";

export interface ResolvedItem {
  confidence: MatchConfidence;
  raw: string;
  name: string;
  quantity: string | null;
  foodKey: string;
  grams: number;
  per100g: NutritionTotals;
}

export interface UnresolvedItem {
  confidence: "unresolved";
  raw: string;
  name: string;
  quantity: string | null;
  reason: UnresolvedReason;
  grams: number | null;
}

export type QuantifiedItem = ResolvedItem | UnresolvedItem;

export interface ParsedMeal {
  text: string;
  items: QuantifiedItem[];
}

export interface AggregateResult {
  totals: NutritionTotals;
  resolvedCount: number;
  unresolvedCount: number;
}

// Profile
export type Gender = "male" | "female";
export type ActivityLevel = "sedentary" | "light" | "moderate" | "active" | "very_active";

export interface MacroRatio {
  protein: number;
  fat: number;
  carbs: number;
}

export interface Profile {
  gender: Gender;
  age: number;
  height_cm: number;
  weight_kg: number;
  activity: ActivityLevel;
  target_kcal: number | null;
  macro_ratio: MacroRatio;
}

// Food log entry
export interface LoggedEntry {
  id: number;
  logged_at: string;
  date: string;
  time: string;
  meal: ParsedMeal;
  totals: NutritionTotals;
}

export type NewLoggedEntry = Omit<LoggedEntry, "id" | "logged_at">;

// Recommendation
export interface PlanItem {
  name: string;
  grams: number;
  nutrition: NutritionTotals;
}

export interface MealPlan {
  targetKcal: number;
  items: PlanItem[];
  totals: NutritionTotals;
  score: number;
}

export interface RecommendationPlan {
  remainingKcal: number;
  macroRatio: MacroRatio;
  meals: MealPlan[];
  totals: NutritionTotals;
}

export type InfeasibleReason = "no_budget" | "no_candidates" | "out_of_tolerance";

export interface Infeasible {
  status: "infeasible";
  reason: InfeasibleReason;
  mealIndex: number | null;
  expansions: number;
}

export type RecommendationResult = { status: "ok"; plan: RecommendationPlan } | Infeasible;

// Report
export type Nutrient = keyof NutritionTotals;

export interface NutrientRow {
  nutrient: Nutrient;
  consumed: number;
  target: number;
  delta: number;
  percent: number | null;
}

export type NutritionTargets = NutritionTotals;

export interface NutritionSummary {
  rows: NutrientRow[];
  achieved: boolean;
}

export interface DailyPoint {
  date: string;
  kcal: number;
}

export interface WeeklySummary {
  start: string;
  end: string;
  days: DailyPoint[];
  targetKcal: number;
  avgKcal: number;
  aboveDays: number;
  belowDays: number;
}

export type RenderInput =
  | { kind: "daily"; date: string; summary: NutritionSummary }
  | { kind: "weekly"; summary: WeeklySummary };
