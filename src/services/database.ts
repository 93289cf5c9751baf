import Database from "better-sqlite3";
import fs from "fs";
import path from "path";
import { z } from "zod";
import { UnknownFoodError } from "../errors.js";
import { logger } from "../logger.js";
import { DEFAULT_PROFILE, ProfileSchema, validateProfile } from "../engine/profile.js";
import type {
  FoodEntry,
  LoggedEntry,
  NewLoggedEntry,
  Profile,
  QuantifiedItem,
  SynonymPair,
} from "../types.js";

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS user_profile (
    id INTEGER PRIMARY KEY DEFAULT 1,
    gender TEXT NOT NULL,
    age INTEGER NOT NULL,
    height_cm REAL NOT NULL,
    weight_kg REAL NOT NULL,
    activity TEXT NOT NULL,
    target_kcal REAL,
    macro_ratio TEXT NOT NULL,
    updated_at TEXT DEFAULT CURRENT_TIMESTAMP
  );

  CREATE TABLE IF NOT EXISTS foods (
    name TEXT PRIMARY KEY,
    kcal REAL NOT NULL,
    protein_g REAL NOT NULL,
    fat_g REAL NOT NULL,
    carbs_g REAL NOT NULL,
    serving_g REAL
  );

  CREATE TABLE IF NOT EXISTS food_synonyms (
    alias TEXT PRIMARY KEY,
    canonical TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS meal_logs (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    logged_at TEXT DEFAULT CURRENT_TIMESTAMP,
    date TEXT NOT NULL,
    time TEXT NOT NULL,
    raw_text TEXT NOT NULL,
    items TEXT NOT NULL,
    kcal REAL NOT NULL,
    protein_g REAL NOT NULL,
    fat_g REAL NOT NULL,
    carbs_g REAL NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_meal_logs_date ON meal_logs(date);
`;

const nonNegative = z.number().min(0);

export const FoodEntrySchema = z.object({
  name: z.string().trim().min(1),
  kcal: nonNegative,
  protein_g: nonNegative,
  fat_g: nonNegative,
  carbs_g: nonNegative,
  serving_g: z.number().positive().nullable(),
});

const NutritionSchema = z.object({
  kcal: nonNegative,
  protein_g: nonNegative,
  fat_g: nonNegative,
  carbs_g: nonNegative,
});

const QuantifiedItemSchema = z.union([
  z.object({
    confidence: z.enum(["exact", "synonym", "fuzzy"]),
    raw: z.string(),
    name: z.string(),
    quantity: z.string().nullable(),
    foodKey: z.string(),
    grams: nonNegative,
    per100g: NutritionSchema,
  }),
  z.object({
    confidence: z.literal("unresolved"),
    raw: z.string(),
    name: z.string(),
    quantity: z.string().nullable(),
    reason: z.enum(["unknown_food", "unrecognized_unit", "missing_name"]),
    grams: nonNegative.nullable(),
  }),
]);

const MealLogRowSchema = z.object({
  id: z.number(),
  logged_at: z.string(),
  date: z.string(),
  time: z.string(),
  raw_text: z.string(),
  items: z.string(),
  kcal: z.number(),
  protein_g: z.number(),
  fat_g: z.number(),
  carbs_g: z.number(),
});

const ProfileRowSchema = z.object({
  gender: z.string(),
  age: z.number(),
  height_cm: z.number(),
  weight_kg: z.number(),
  activity: z.string(),
  target_kcal: z.number().nullable(),
  macro_ratio: z.string(),
});

const SynonymRowSchema = z.object({ alias: z.string(), canonical: z.string() });

const countSchema = z.number().int();

function toLoggedEntry(row: unknown): LoggedEntry {
  const r = MealLogRowSchema.parse(row);
  const items: QuantifiedItem[] = z.array(QuantifiedItemSchema).parse(JSON.parse(r.items));
  return {
    id: r.id,
    logged_at: r.logged_at,
    date: r.date,
    time: r.time,
    meal: { text: r.raw_text, items },
    totals: { kcal: r.kcal, protein_g: r.protein_g, fat_g: r.fat_g, carbs_g: r.carbs_g },
  };
}

export interface SynonymWrite {
  alias: string;
  canonical: string;
  replaced: string | null;
}

/**
 * SQLite persistence: food database, synonym map, meal log and the profile.
 * Pass ":memory:" for a throwaway store.
 */
export class DietStore {
  readonly db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ":memory:") {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.exec(SCHEMA_SQL);

    if (this.count("user_profile") === 0) {
      this.writeProfile(DEFAULT_PROFILE);
    }
  }

  private count(table: "user_profile" | "foods" | "food_synonyms" | "meal_logs"): number {
    return countSchema.parse(this.db.prepare(`SELECT COUNT(*) FROM ${table}`).pluck().get());
  }

  // Profile operations
  readProfile(): Profile {
    const row = ProfileRowSchema.parse(
      this.db.prepare("SELECT * FROM user_profile WHERE id = 1").get()
    );
    return ProfileSchema.parse({ ...row, macro_ratio: JSON.parse(row.macro_ratio) });
  }

  // Validates before touching the table; an invalid profile is never stored
  writeProfile(profile: Profile): Profile {
    const valid = validateProfile(profile);
    this.db
      .prepare(
        `INSERT INTO user_profile (id, gender, age, height_cm, weight_kg, activity, target_kcal, macro_ratio)
         VALUES (1, @gender, @age, @height_cm, @weight_kg, @activity, @target_kcal, @macro_ratio)
         ON CONFLICT(id) DO UPDATE SET
           gender = excluded.gender,
           age = excluded.age,
           height_cm = excluded.height_cm,
           weight_kg = excluded.weight_kg,
           activity = excluded.activity,
           target_kcal = excluded.target_kcal,
           macro_ratio = excluded.macro_ratio,
           updated_at = CURRENT_TIMESTAMP`
      )
      .run({ ...valid, macro_ratio: JSON.stringify(valid.macro_ratio) });
    return valid;
  }

  // Food database operations
  countFoods(): number {
    return this.count("foods");
  }

  listFoods(): FoodEntry[] {
    return z.array(FoodEntrySchema).parse(this.db.prepare("SELECT * FROM foods ORDER BY name").all());
  }

  searchFoods(query: string, limit = 20): FoodEntry[] {
    const rows = this.db
      .prepare("SELECT * FROM foods WHERE name LIKE ? ORDER BY LENGTH(name), name LIMIT ?")
      .all(`%${query.trim()}%`, limit);
    return z.array(FoodEntrySchema).parse(rows);
  }

  upsertFood(food: FoodEntry): FoodEntry {
    const valid = FoodEntrySchema.parse(food);
    this.db
      .prepare(
        `INSERT INTO foods (name, kcal, protein_g, fat_g, carbs_g, serving_g)
         VALUES (@name, @kcal, @protein_g, @fat_g, @carbs_g, @serving_g)
         ON CONFLICT(name) DO UPDATE SET
           kcal = excluded.kcal,
           protein_g = excluded.protein_g,
           fat_g = excluded.fat_g,
           carbs_g = excluded.carbs_g,
           serving_g = excluded.serving_g`
      )
      .run(valid);
    return valid;
  }

  upsertFoods(foods: readonly FoodEntry[]): number {
    const insertAll = this.db.transaction((rows: readonly FoodEntry[]) => {
      for (const row of rows) this.upsertFood(row);
      return rows.length;
    });
    return insertAll(foods);
  }

  // Synonym operations
  countSynonyms(): number {
    return this.count("food_synonyms");
  }

  // Oldest first, so a consumer replaying them gets last-write-wins
  listSynonyms(): SynonymPair[] {
    const rows = z
      .array(SynonymRowSchema)
      .parse(this.db.prepare("SELECT alias, canonical FROM food_synonyms ORDER BY rowid").all());
    return rows.map((r) => [r.alias, r.canonical] as const);
  }

  addSynonym(alias: string, canonical: string): SynonymWrite {
    const trimmedAlias = alias.trim();
    const food = this.db
      .prepare("SELECT name FROM foods WHERE lower(name) = lower(?)")
      .pluck()
      .get(canonical.trim());
    if (typeof food !== "string") throw new UnknownFoodError(canonical);

    const previous = this.db
      .prepare("SELECT canonical FROM food_synonyms WHERE alias = ?")
      .pluck()
      .get(trimmedAlias);
    const replaced = typeof previous === "string" && previous !== food ? previous : null;
    if (replaced) {
      logger.warn(`Synonym "${trimmedAlias}" reassigned from "${replaced}" to "${food}"`);
    }

    this.db
      .prepare("INSERT OR REPLACE INTO food_synonyms (alias, canonical) VALUES (?, ?)")
      .run(trimmedAlias, food);
    return { alias: trimmedAlias, canonical: food, replaced };
  }

  // Meal log operations
  appendLog(entry: NewLoggedEntry): LoggedEntry {
    const result = this.db
      .prepare(
        `INSERT INTO meal_logs (date, time, raw_text, items, kcal, protein_g, fat_g, carbs_g)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        entry.date,
        entry.time,
        entry.meal.text,
        JSON.stringify(entry.meal.items),
        entry.totals.kcal,
        entry.totals.protein_g,
        entry.totals.fat_g,
        entry.totals.carbs_g
      );

    return toLoggedEntry(
      this.db.prepare("SELECT * FROM meal_logs WHERE id = ?").get(result.lastInsertRowid)
    );
  }

  // Inclusive on both ends, dates as YYYY-MM-DD
  queryLog(startDate: string, endDate: string): LoggedEntry[] {
    return this.db
      .prepare(
        "SELECT * FROM meal_logs WHERE date >= ? AND date <= ? ORDER BY date, time, id"
      )
      .all(startDate, endDate)
      .map(toLoggedEntry);
  }

  getEntriesByDate(date: string): LoggedEntry[] {
    return this.queryLog(date, date);
  }

  deleteEntry(id: number): boolean {
    const result = this.db.prepare("DELETE FROM meal_logs WHERE id = ?").run(id);
    return result.changes > 0;
  }

  close(): void {
    this.db.close();
  }
}

let store: DietStore | null = null;

export function getStore(dbPath: string): DietStore {
  if (!store) {
    store = new DietStore(dbPath);
  }
  return store;
}

export function closeStore(): void {
  if (store) {
    store.close();
    store = null;
  }
}
