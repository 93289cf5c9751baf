import fs from "fs";
import path from "path";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import { logger } from "../logger.js";
import { FoodEntrySchema, type DietStore } from "./database.js";
import type { FoodEntry, UnitTable } from "../types.js";

export const FOODS_CSV = "foods.csv";
export const SYNONYMS_JSON = "synonyms.json";
export const UNITS_JSON = "units.json";

const blankToNull = (v: unknown) => (v === undefined || v === "" ? null : v);

// CSV columns: name,kcal,protein,fat,carbs[,serving_g]
const FoodCsvRowSchema = z.object({
  name: z.string().trim().min(1),
  kcal: z.coerce.number().min(0),
  protein: z.coerce.number().min(0),
  fat: z.coerce.number().min(0),
  carbs: z.coerce.number().min(0),
  serving_g: z.preprocess(blankToNull, z.coerce.number().positive().nullable()),
});

const SynonymFileSchema = z.record(z.string().trim().min(1), z.string().trim().min(1));

const UnitTableSchema = z.object({
  defaults: z.record(z.number().positive()),
  foods: z.record(z.record(z.number().positive())).default({}),
});

export interface CsvImport {
  foods: FoodEntry[];
  skipped: number;
}

export function parseFoodsCsv(content: string): CsvImport {
  const records: unknown[] = parse(content, {
    columns: true,
    skip_empty_lines: true,
    trim: true,
    bom: true,
  });

  const foods: FoodEntry[] = [];
  let skipped = 0;
  records.forEach((record, index) => {
    const row = FoodCsvRowSchema.safeParse(record);
    if (!row.success) {
      skipped++;
      logger.warn(`Skipping CSV row ${index + 2}: ${row.error.issues[0]?.message ?? "invalid"}`);
      return;
    }
    foods.push(
      FoodEntrySchema.parse({
        name: row.data.name,
        kcal: row.data.kcal,
        protein_g: row.data.protein,
        fat_g: row.data.fat,
        carbs_g: row.data.carbs,
        serving_g: row.data.serving_g,
      })
    );
  });
  return { foods, skipped };
}

export function importFoodsCsv(store: DietStore, csvPath: string): { imported: number; skipped: number } {
  const { foods, skipped } = parseFoodsCsv(fs.readFileSync(csvPath, "utf-8"));
  const imported = store.upsertFoods(foods);
  logger.info(`Imported ${imported} foods from ${csvPath} (${skipped} skipped)`);
  return { imported, skipped };
}

export function readSynonymsFile(jsonPath: string): Array<[string, string]> {
  const mapping = SynonymFileSchema.parse(JSON.parse(fs.readFileSync(jsonPath, "utf-8")));
  return Object.entries(mapping);
}

export function loadUnitTable(dataDir: string): UnitTable {
  const file = path.join(dataDir, UNITS_JSON);
  if (!fs.existsSync(file)) {
    logger.warn(`${file} not found, count units disabled`);
    return { defaults: {}, foods: {} };
  }
  return UnitTableSchema.parse(JSON.parse(fs.readFileSync(file, "utf-8")));
}

/**
 * First-run seeding: fills the food and synonym tables from the data
 * directory when they are empty.
 */
export function seedStore(store: DietStore, dataDir: string): void {
  const csvPath = path.join(dataDir, FOODS_CSV);
  if (store.countFoods() === 0 && fs.existsSync(csvPath)) {
    importFoodsCsv(store, csvPath);
  }

  const synonymsPath = path.join(dataDir, SYNONYMS_JSON);
  if (store.countSynonyms() === 0 && fs.existsSync(synonymsPath)) {
    let added = 0;
    for (const [alias, canonical] of readSynonymsFile(synonymsPath)) {
      try {
        store.addSynonym(alias, canonical);
        added++;
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.warn(`Skipping synonym "${alias}": ${message}`);
      }
    }
    logger.info(`Seeded ${added} synonyms from ${synonymsPath}`);
  }
}
