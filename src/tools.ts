import dayjs from "dayjs";
import customParseFormat from "dayjs/plugin/customParseFormat.js";
import { z } from "zod";
import type { CallToolResult, Tool } from "@modelcontextprotocol/sdk/types.js";

import type { AppConfig } from "./config.js";
import { logger } from "./logger.js";
import { aggregate, sumTotals, totalsByDate, zeroTotals } from "./engine/aggregator.js";
import { FoodCatalog } from "./engine/catalog.js";
import { MealTextParser } from "./engine/parser.js";
import {
  calculateBMR,
  calculateTDEE,
  dailyTargetKcal,
  macroTargets,
} from "./engine/profile.js";
import { recommend, type RecommenderOptions } from "./engine/recommender.js";
import { FoodResolver } from "./engine/resolver.js";
import { summarize, summarizeWeek } from "./engine/summarizer.js";
import { UnitConverter } from "./engine/units.js";
import type { DietStore } from "./services/database.js";
import {
  formatEntry,
  formatParsedMeal,
  formatProfile,
  formatRecommendation,
  formatSummary,
  formatTotals,
  formatWeekly,
} from "./services/format.js";
import type { ReportRenderer } from "./services/renderer.js";
import { importFoodsCsv } from "./services/seed.js";
import type { NutritionTargets, Profile, UnitTable } from "./types.js";

dayjs.extend(customParseFormat);

export interface ToolContext {
  store: DietStore;
  config: AppConfig;
  units: UnitTable;
  renderer: ReportRenderer;
  now: () => Date;
}

// Tool input schemas
const DateSchema = z
  .string()
  .refine((v) => dayjs(v, "YYYY-MM-DD", true).isValid(), "Date must be YYYY-MM-DD");
const TimeSchema = z
  .string()
  .refine((v) => dayjs(v, "HH:mm", true).isValid(), "Time must be HH:mm");
const DeficitSchema = z.number().min(0).lt(0.9);

const ParseMealSchema = z.object({
  text: z.string().min(1).describe("Free-text meal, e.g. '계란 2개, 밥 1공기'"),
});

const LogMealSchema = z.object({
  text: z.string().min(1),
  date: DateSchema.optional(),
  time: TimeSchema.optional(),
});

const GetDailyLogSchema = z.object({
  date: DateSchema.optional(),
});

const DeleteEntrySchema = z.object({
  entry_id: z.number().int(),
});

const SetProfileSchema = z.object({
  gender: z.enum(["male", "female"]).optional(),
  age: z.number().optional(),
  height_cm: z.number().optional(),
  weight_kg: z.number().optional(),
  activity: z.enum(["sedentary", "light", "moderate", "active", "very_active"]).optional(),
  target_kcal: z.number().nullable().optional(),
  macro_ratio: z
    .object({ protein: z.number(), fat: z.number(), carbs: z.number() })
    .optional(),
});

const GetSummarySchema = z.object({
  date: DateSchema.optional(),
  deficit: DeficitSchema.optional(),
});

const WeeklyReportSchema = z.object({
  end_date: DateSchema.optional(),
  deficit: DeficitSchema.optional(),
});

const RecommendSchema = z.object({
  meals: z.number().int().min(1).max(6).optional().default(3),
  deficit: DeficitSchema.optional(),
  date: DateSchema.optional(),
  account_for_logged: z.boolean().optional().default(true),
  avoid: z.array(z.string()).optional().default([]),
  prefer: z.array(z.string()).optional().default([]),
});

const SearchFoodSchema = z.object({
  query: z.string().min(1),
  limit: z.number().int().positive().optional().default(10),
});

const AddFoodSchema = z.object({
  name: z.string().trim().min(1),
  kcal: z.number().min(0),
  protein_g: z.number().min(0),
  fat_g: z.number().min(0),
  carbs_g: z.number().min(0),
  serving_g: z.number().positive().optional(),
});

const AddSynonymSchema = z.object({
  alias: z.string().trim().min(1),
  canonical: z.string().trim().min(1),
});

const ImportCsvSchema = z.object({
  path: z.string().min(1),
});

const dateProp = { type: "string", description: "Date YYYY-MM-DD (default: today)" };
const deficitProp = {
  type: "number",
  description: "Calorie deficit fraction applied to the daily target, e.g. 0.15",
};
const macroRatioProp = {
  type: "object",
  description: "Fractions of calories; must sum to 1",
  properties: {
    protein: { type: "number" },
    fat: { type: "number" },
    carbs: { type: "number" },
  },
  required: ["protein", "fat", "carbs"],
};

export const TOOLS: Tool[] = [
  {
    name: "parse_meal",
    description: "Preview how a free-text meal is parsed and resolved, without logging it.",
    inputSchema: {
      type: "object",
      properties: { text: { type: "string", description: "Meal text, e.g. '계란 2개, 밥 1공기'" } },
      required: ["text"],
    },
  },
  {
    name: "log_meal",
    description:
      "Log a free-text meal. Foods are resolved against the local database; unrecognized tokens are kept and reported.",
    inputSchema: {
      type: "object",
      properties: {
        text: { type: "string", description: "Meal text, e.g. '계란 2개, 토마토 100g'" },
        date: dateProp,
        time: { type: "string", description: "Time HH:mm (default: now)" },
      },
      required: ["text"],
    },
  },
  {
    name: "get_daily_log",
    description: "Get all logged meals for a day with totals against the profile target.",
    inputSchema: { type: "object", properties: { date: dateProp } },
  },
  {
    name: "delete_entry",
    description: "Delete a logged meal by its ID.",
    inputSchema: {
      type: "object",
      properties: { entry_id: { type: "number", description: "ID of the logged meal" } },
      required: ["entry_id"],
    },
  },
  {
    name: "get_profile",
    description: "Show the profile with BMR, TDEE and daily targets.",
    inputSchema: { type: "object", properties: {} },
  },
  {
    name: "set_profile",
    description: "Update profile fields. The whole profile is validated before saving.",
    inputSchema: {
      type: "object",
      properties: {
        gender: { type: "string", enum: ["male", "female"] },
        age: { type: "number" },
        height_cm: { type: "number" },
        weight_kg: { type: "number" },
        activity: {
          type: "string",
          enum: ["sedentary", "light", "moderate", "active", "very_active"],
        },
        target_kcal: { type: ["number", "null"], description: "Daily calorie override; null clears it" },
        macro_ratio: macroRatioProp,
      },
    },
  },
  {
    name: "get_summary",
    description: "Daily nutrition summary against targets, with a chart.",
    inputSchema: { type: "object", properties: { date: dateProp, deficit: deficitProp } },
  },
  {
    name: "get_weekly_report",
    description: "Seven-day calorie trend ending on a date, with a chart.",
    inputSchema: {
      type: "object",
      properties: {
        end_date: { type: "string", description: "Last day YYYY-MM-DD (default: today)" },
        deficit: deficitProp,
      },
    },
  },
  {
    name: "recommend_meals",
    description:
      "Recommend meals that fit the remaining calorie budget and the profile macro ratio, or report that none fits.",
    inputSchema: {
      type: "object",
      properties: {
        meals: { type: "number", description: "Number of meals (default: 3)" },
        deficit: deficitProp,
        date: dateProp,
        account_for_logged: {
          type: "boolean",
          description: "Subtract what is already logged on the date (default: true)",
        },
        avoid: { type: "array", items: { type: "string" }, description: "Foods to leave out" },
        prefer: { type: "array", items: { type: "string" }, description: "Foods to favour" },
      },
    },
  },
  {
    name: "search_food",
    description: "Search the local food database. Values are per 100g.",
    inputSchema: {
      type: "object",
      properties: {
        query: { type: "string", description: "Food name or part of it" },
        limit: { type: "number", description: "Number of results (default: 10)" },
      },
      required: ["query"],
    },
  },
  {
    name: "add_food",
    description: "Add or update a food (nutrition per 100g).",
    inputSchema: {
      type: "object",
      properties: {
        name: { type: "string" },
        kcal: { type: "number" },
        protein_g: { type: "number" },
        fat_g: { type: "number" },
        carbs_g: { type: "number" },
        serving_g: { type: "number", description: "Default serving in grams" },
      },
      required: ["name", "kcal", "protein_g", "fat_g", "carbs_g"],
    },
  },
  {
    name: "add_synonym",
    description: "Map an alias to a food in the database. An existing alias is reassigned.",
    inputSchema: {
      type: "object",
      properties: { alias: { type: "string" }, canonical: { type: "string" } },
      required: ["alias", "canonical"],
    },
  },
  {
    name: "import_foods_csv",
    description: "Import foods from a CSV file with columns name,kcal,protein,fat,carbs[,serving_g].",
    inputSchema: {
      type: "object",
      properties: { path: { type: "string", description: "Path to the CSV file" } },
      required: ["path"],
    },
  },
];

const text = (body: string, isError = false): CallToolResult => ({
  content: [{ type: "text", text: body }],
  ...(isError ? { isError: true } : {}),
});

// Catalog and parser are rebuilt per call from the current tables
function buildEngine(ctx: ToolContext) {
  const catalog = new FoodCatalog(ctx.store.listFoods(), ctx.store.listSynonyms());
  const resolver = new FoodResolver(catalog, ctx.config.resolver);
  const parser = new MealTextParser(resolver, new UnitConverter(ctx.units));
  return { catalog, resolver, parser };
}

function today(ctx: ToolContext): string {
  return dayjs(ctx.now()).format("YYYY-MM-DD");
}

// Every tool plans against the same target: profile kcal less the configured deficit
function targetKcal(ctx: ToolContext, profile: Profile, deficit?: number): number {
  return dailyTargetKcal(profile, deficit ?? ctx.config.defaultDeficit);
}

function nutritionTargets(ctx: ToolContext, profile: Profile, deficit?: number): NutritionTargets {
  return macroTargets(targetKcal(ctx, profile, deficit), profile.macro_ratio);
}

function mealWeightsFor(ctx: ToolContext, meals: number): readonly number[] | null {
  const weights = ctx.config.recommender.mealWeights;
  if (weights && weights.length !== meals) {
    logger.warn(`MEAL_WEIGHTS has ${weights.length} entries but ${meals} meals requested; using an equal split`);
    return null;
  }
  return weights;
}

export async function handleToolCall(
  ctx: ToolContext,
  name: string,
  args: unknown
): Promise<CallToolResult> {
  try {
    switch (name) {
      case "parse_meal": {
        const { text: mealText } = ParseMealSchema.parse(args);
        const meal = buildEngine(ctx).parser.parse(mealText);
        return text(formatParsedMeal(meal, aggregate(meal)));
      }

      case "log_meal": {
        const input = LogMealSchema.parse(args);
        const date = input.date ?? today(ctx);
        const time = input.time ?? dayjs(ctx.now()).format("HH:mm");

        const meal = buildEngine(ctx).parser.parse(input.text);
        const result = aggregate(meal);
        if (result.resolvedCount === 0) {
          return text(
            `Nothing logged: no food in "${input.text}" could be resolved.\n\n${formatParsedMeal(meal, result)}`
          );
        }

        const entry = ctx.store.appendLog({ date, time, meal, totals: result.totals });
        const daily = sumTotals(ctx.store.getEntriesByDate(date).map((e) => e.totals));
        const target = targetKcal(ctx, ctx.store.readProfile());
        const remaining = target - daily.kcal;

        let response = `Logged meal [ID: ${entry.id}] on ${date} ${time}\n`;
        response += formatParsedMeal(meal, result);
        response += `\n\n**Daily Total (${date}):** ${formatTotals(daily)}`;
        response += ` | ${remaining >= 0 ? `${Math.round(remaining)} remaining` : `${Math.round(-remaining)} over goal`}`;
        return text(response);
      }

      case "get_daily_log": {
        const { date } = GetDailyLogSchema.parse(args);
        const targetDate = date ?? today(ctx);
        const entries = ctx.store.getEntriesByDate(targetDate);
        if (entries.length === 0) {
          return text(`No meals logged for ${targetDate}. Start logging with the log_meal tool!`);
        }

        const totals = sumTotals(entries.map((e) => e.totals));
        const summary = summarize(totals, nutritionTargets(ctx, ctx.store.readProfile()));
        const unresolved = entries.reduce(
          (n, e) => n + e.meal.items.filter((i) => i.confidence === "unresolved").length,
          0
        );

        let response = `## Food Log for ${targetDate}\n\n`;
        response += entries.map(formatEntry).join("\n\n");
        response += `\n\n${formatSummary("Daily Totals", summary)}`;
        if (unresolved > 0) response += `\n⚠ ${unresolved} unresolved item(s) are not counted.`;
        return text(response);
      }

      case "delete_entry": {
        const { entry_id } = DeleteEntrySchema.parse(args);
        return ctx.store.deleteEntry(entry_id)
          ? text(`Entry ${entry_id} deleted successfully.`)
          : text(`Entry ${entry_id} not found.`);
      }

      case "get_profile": {
        const profile = ctx.store.readProfile();
        return text(
          formatProfile(profile, {
            bmr: calculateBMR(profile),
            tdee: calculateTDEE(profile),
            targets: nutritionTargets(ctx, profile),
          })
        );
      }

      case "set_profile": {
        const input = SetProfileSchema.parse(args);
        const current = ctx.store.readProfile();
        const saved = ctx.store.writeProfile({
          gender: input.gender ?? current.gender,
          age: input.age ?? current.age,
          height_cm: input.height_cm ?? current.height_cm,
          weight_kg: input.weight_kg ?? current.weight_kg,
          activity: input.activity ?? current.activity,
          target_kcal: input.target_kcal === undefined ? current.target_kcal : input.target_kcal,
          macro_ratio: input.macro_ratio ?? current.macro_ratio,
        });
        return text(
          `**Profile Updated.**\n\n${formatProfile(saved, {
            bmr: calculateBMR(saved),
            tdee: calculateTDEE(saved),
            targets: nutritionTargets(ctx, saved),
          })}`
        );
      }

      case "get_summary": {
        const input = GetSummarySchema.parse(args);
        const date = input.date ?? today(ctx);
        const totals = sumTotals(ctx.store.getEntriesByDate(date).map((e) => e.totals));
        const summary = summarize(totals, nutritionTargets(ctx, ctx.store.readProfile(), input.deficit));
        const chart = ctx.renderer.render({ kind: "daily", date, summary });
        return text(`${formatSummary(`Daily Summary ${date}`, summary)}\n\nChart: ${chart}`);
      }

      case "get_weekly_report": {
        const input = WeeklyReportSchema.parse(args);
        const end = dayjs(input.end_date ?? today(ctx));
        const start = end.subtract(6, "day");
        const byDate = totalsByDate(
          ctx.store.queryLog(start.format("YYYY-MM-DD"), end.format("YYYY-MM-DD"))
        );
        const days = Array.from({ length: 7 }, (_, i) => {
          const date = start.add(i, "day").format("YYYY-MM-DD");
          return { date, kcal: (byDate.get(date) ?? zeroTotals()).kcal };
        });
        const summary = summarizeWeek(days, targetKcal(ctx, ctx.store.readProfile(), input.deficit));
        const chart = ctx.renderer.render({ kind: "weekly", summary });
        return text(`${formatWeekly(summary)}\n\nChart: ${chart}`);
      }

      case "recommend_meals": {
        const input = RecommendSchema.parse(args);
        const { resolver, catalog } = buildEngine(ctx);
        const profile = ctx.store.readProfile();
        const date = input.date ?? today(ctx);
        const target = targetKcal(ctx, profile, input.deficit);
        const consumed = input.account_for_logged
          ? sumTotals(ctx.store.getEntriesByDate(date).map((e) => e.totals)).kcal
          : 0;

        const notes: string[] = [];
        const toKeys = (names: string[]) =>
          names.flatMap((n) => {
            const r = resolver.resolve(n);
            if (r.status === "resolved") return [r.food.name];
            notes.push(`"${n}" is not in the food database and was ignored.`);
            return [];
          });

        const options: Partial<RecommenderOptions> = {
          kcalTolerance: ctx.config.recommender.kcalTolerance,
          macroTolerance: ctx.config.recommender.macroTolerance,
          maxItems: ctx.config.recommender.maxItems,
          maxExpansions: ctx.config.recommender.maxExpansions,
          mealWeights: mealWeightsFor(ctx, input.meals),
          avoid: toKeys(input.avoid),
          prefer: toKeys(input.prefer),
        };
        const result = recommend(target - consumed, profile.macro_ratio, input.meals, catalog.foods, options);

        let response = `Daily target ${Math.round(target)} cal, already logged ${Math.round(consumed)} cal.\n\n`;
        response += formatRecommendation(result);
        if (notes.length) response += `\n\n${notes.join("\n")}`;
        return text(response);
      }

      case "search_food": {
        const { query, limit } = SearchFoodSchema.parse(args);
        const results = ctx.store.searchFoods(query, limit);
        const match = buildEngine(ctx).resolver.resolve(query);

        let response =
          match.status === "resolved"
            ? `Best match for "${query}": **${match.food.name}** (${match.confidence})\n\n`
            : `No match for "${query}".\n\n`;
        if (results.length === 0) {
          return text(`${response}No foods contain "${query}". Try a different search term.`);
        }
        response += results
          .map(
            (food, i) =>
              `${i + 1}. **${food.name}**${food.serving_g ? ` (serving ${food.serving_g}g)` : ""}\n` +
              `   Per 100g: ${formatTotals(food)}`
          )
          .join("\n");
        return text(response);
      }

      case "add_food": {
        const input = AddFoodSchema.parse(args);
        const food = ctx.store.upsertFood({ ...input, serving_g: input.serving_g ?? null });
        return text(`Saved food: **${food.name}** - per 100g ${formatTotals(food)}`);
      }

      case "add_synonym": {
        const { alias, canonical } = AddSynonymSchema.parse(args);
        const write = ctx.store.addSynonym(alias, canonical);
        return text(
          write.replaced
            ? `Synonym "${write.alias}" now maps to **${write.canonical}** (was ${write.replaced}).`
            : `Synonym "${write.alias}" maps to **${write.canonical}**.`
        );
      }

      case "import_foods_csv": {
        const { path } = ImportCsvSchema.parse(args);
        const { imported, skipped } = importFoodsCsv(ctx.store, path);
        return text(`Imported ${imported} foods from ${path}${skipped ? ` (${skipped} malformed rows skipped)` : ""}.`);
      }

      default:
        return text(`Unknown tool: ${name}`, true);
    }
  } catch (error) {
    const message =
      error instanceof z.ZodError
        ? error.issues.map((i) => `${i.path.join(".") || "input"}: ${i.message}`).join("; ")
        : error instanceof Error
          ? error.message
          : String(error);
    logger.error(`Tool ${name} failed: ${message}`);
    return text(`Error: ${message}`, true);
  }
}
