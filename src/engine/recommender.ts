import { addTotals, scaleNutrition, sumTotals, zeroTotals } from "./aggregator.js";
import { compareText, normalizeName } from "./catalog.js";
import { MinHeap } from "./heap.js";
import { KCAL_PER_GRAM, validateMacroRatio } from "./profile.js";
import type {
  FoodEntry,
  Infeasible,
  MacroRatio,
  MealPlan,
  NutritionTotals,
  RecommendationResult,
} from "../types.js";

export interface RecommenderOptions {
  // allowed |kcal - target| / target
  kcalTolerance: number;
  // allowed |share - ratio| per macro
  macroTolerance: number;
  minItems: number;
  maxItems: number;
  // gram grid every food is portioned on
  portions: readonly number[];
  // hard cap on node expansions per meal
  maxExpansions: number;
  // foods taken per macro when building the candidate pool
  poolPerMacro: number;
  kcalWeight: number;
  macroWeight: number;
  // null → equal split
  mealWeights: readonly number[] | null;
  avoid: readonly string[];
  prefer: readonly string[];
  preferBonus: number;
  // keep foods from earlier meals out of later ones while that stays feasible
  varyMeals: boolean;
}

export const DEFAULT_RECOMMENDER_OPTIONS: RecommenderOptions = {
  kcalTolerance: 0.1,
  macroTolerance: 0.1,
  minItems: 2,
  maxItems: 3,
  portions: [50, 100, 150, 200],
  maxExpansions: 20_000,
  poolPerMacro: 8,
  kcalWeight: 1,
  macroWeight: 1,
  mealWeights: null,
  avoid: [],
  prefer: [],
  preferBonus: 0.02,
  varyMeals: true,
};

const MACROS = ["protein", "fat", "carbs"] as const;

export function macroShares(totals: NutritionTotals): MacroRatio | null {
  const protein = totals.protein_g * KCAL_PER_GRAM.protein_g;
  const fat = totals.fat_g * KCAL_PER_GRAM.fat_g;
  const carbs = totals.carbs_g * KCAL_PER_GRAM.carbs_g;
  const sum = protein + fat + carbs;
  if (sum <= 0) return null;
  return { protein: protein / sum, fat: fat / sum, carbs: carbs / sum };
}

export function splitTargets(
  remainingKcal: number,
  mealCount: number,
  weights: readonly number[] | null
): number[] {
  if (!Number.isInteger(mealCount) || mealCount < 1) {
    throw new RangeError(`mealCount must be a positive integer, got ${mealCount}`);
  }
  if (!weights) return Array.from({ length: mealCount }, () => remainingKcal / mealCount);
  if (weights.length !== mealCount || weights.some((w) => !(w > 0))) {
    throw new RangeError(`mealWeights must hold ${mealCount} positive numbers`);
  }
  const total = weights.reduce((a, b) => a + b, 0);
  return weights.map((w) => (remainingKcal * w) / total);
}

interface Node {
  items: Array<{ food: FoodEntry; grams: number }>;
  lastIndex: number;
  totals: NutritionTotals;
  score: number;
  key: string;
}

interface MealSearch {
  target: number;
  ratio: MacroRatio;
  pool: readonly FoodEntry[];
  preferred: ReadonlySet<string>;
  options: RecommenderOptions;
}

function macroDeviation(totals: NutritionTotals, ratio: MacroRatio): number {
  const shares = macroShares(totals);
  if (!shares) return MACROS.length;
  return MACROS.reduce((sum, m) => sum + Math.abs(shares[m] - ratio[m]), 0);
}

function withinTolerance(node: Node, search: MealSearch): boolean {
  const { target, ratio, options } = search;
  if (node.items.length < options.minItems) return false;
  if (Math.abs(node.totals.kcal - target) > target * options.kcalTolerance) return false;
  const shares = macroShares(node.totals);
  if (!shares) return false;
  return MACROS.every((m) => Math.abs(shares[m] - ratio[m]) <= options.macroTolerance);
}

function makeNode(parent: Node, food: FoodEntry, index: number, grams: number, search: MealSearch): Node {
  const items = [...parent.items, { food, grams }];
  const totals = addTotals(parent.totals, scaleNutrition(food, grams));
  const { options } = search;
  const preferredCount = items.filter((i) => search.preferred.has(i.food.name)).length;
  const score =
    options.kcalWeight * (Math.abs(totals.kcal - search.target) / search.target) +
    options.macroWeight * macroDeviation(totals, search.ratio) -
    options.preferBonus * preferredCount;
  const key = items.map((i) => `${i.food.name}:${i.grams}`).join("|");
  return { items, lastIndex: index, totals, score, key };
}

const byScore = (a: Node, b: Node) => a.score - b.score || compareText(a.key, b.key);

/**
 * Bounded best-first search over food combinations for one meal. Children add
 * one food (pool order, no repeats) at each portion size; the frontier pops the
 * lowest score first and the first node within tolerance wins.
 */
function searchMeal(search: MealSearch): { node: Node | null; expansions: number } {
  const { pool, options } = search;
  const upper = search.target * (1 + options.kcalTolerance);
  const lower = search.target * (1 - options.kcalTolerance);

  const root: Node = { items: [], lastIndex: -1, totals: zeroTotals(), score: Infinity, key: "" };
  const frontier = new MinHeap<Node>(byScore);
  frontier.push(root);

  let expansions = 0;
  while (frontier.size > 0 && expansions < options.maxExpansions) {
    const node = frontier.pop();
    if (!node) break;
    if (withinTolerance(node, search)) return { node, expansions };

    expansions++;
    if (node.items.length >= options.maxItems) continue;

    for (let index = node.lastIndex + 1; index < pool.length; index++) {
      for (const grams of options.portions) {
        const child = makeNode(node, pool[index], index, grams, search);
        if (child.totals.kcal > upper) continue;
        if (child.items.length >= options.maxItems && child.totals.kcal < lower) continue;
        frontier.push(child);
      }
    }
  }
  return { node: null, expansions };
}

function buildPool(
  foods: readonly FoodEntry[],
  excluded: ReadonlySet<string>,
  preferred: ReadonlySet<string>,
  perMacro: number
): FoodEntry[] {
  const usable = foods.filter((f) => f.kcal > 0 && !excluded.has(f.name));
  const withShares = usable
    .map((food) => ({ food, shares: macroShares(food) }))
    .filter((f): f is { food: FoodEntry; shares: MacroRatio } => f.shares !== null);

  const picked = new Map<string, FoodEntry>();
  for (const macro of MACROS) {
    const ranked = [...withShares].sort(
      (a, b) => b.shares[macro] - a.shares[macro] || compareText(a.food.name, b.food.name)
    );
    for (const { food } of ranked.slice(0, perMacro)) picked.set(food.name, food);
  }
  for (const food of usable) {
    if (preferred.has(food.name)) picked.set(food.name, food);
  }
  return [...picked.values()].sort((a, b) => compareText(a.name, b.name));
}

/**
 * Splits the remaining budget across meals and searches each meal. Returns a
 * plan only when every meal lands within tolerance; otherwise reports which
 * meal could not be met.
 *
 * remainingKcal is taken as given; TDEE and deficit math belong to the caller.
 */
export function recommend(
  remainingKcal: number,
  macroRatio: MacroRatio,
  mealCount: number,
  foods: readonly FoodEntry[],
  overrides: Partial<RecommenderOptions> = {}
): RecommendationResult {
  const options: RecommenderOptions = { ...DEFAULT_RECOMMENDER_OPTIONS, ...overrides };
  const ratio = validateMacroRatio(macroRatio);
  const targets = splitTargets(remainingKcal, mealCount, options.mealWeights);

  const infeasible = (
    reason: Infeasible["reason"],
    mealIndex: number | null,
    expansions: number
  ): Infeasible => ({ status: "infeasible", reason, mealIndex, expansions });

  if (!Number.isFinite(remainingKcal) || remainingKcal <= 0) {
    return infeasible("no_budget", null, 0);
  }

  const avoid = new Set(options.avoid.map(normalizeName));
  const eligible = foods.filter((f) => !avoid.has(normalizeName(f.name)));
  const preferredNames = new Set(options.prefer.map(normalizeName));
  const preferred = new Set(
    eligible.filter((f) => preferredNames.has(normalizeName(f.name))).map((f) => f.name)
  );

  const meals: MealPlan[] = [];
  const used = new Set<string>();
  let expansions = 0;

  for (const [mealIndex, target] of targets.entries()) {
    const attempt = (excluded: ReadonlySet<string>) => {
      const pool = buildPool(eligible, excluded, preferred, options.poolPerMacro);
      const result = searchMeal({ target, ratio, pool, preferred, options });
      expansions += result.expansions;
      return { pool, node: result.node };
    };

    let outcome = attempt(options.varyMeals ? used : new Set<string>());
    if (!outcome.node && options.varyMeals && used.size > 0) {
      outcome = attempt(new Set<string>());
    }

    if (!outcome.node) {
      const reason = outcome.pool.length < options.minItems ? "no_candidates" : "out_of_tolerance";
      return infeasible(reason, mealIndex, expansions);
    }

    const items = outcome.node.items.map(({ food, grams }) => ({
      name: food.name,
      grams,
      nutrition: scaleNutrition(food, grams),
    }));
    for (const item of items) used.add(item.name);
    meals.push({ targetKcal: target, items, totals: outcome.node.totals, score: outcome.node.score });
  }

  return {
    status: "ok",
    plan: {
      remainingKcal,
      macroRatio: ratio,
      meals,
      totals: sumTotals(meals.map((m) => m.totals)),
    },
  };
}
