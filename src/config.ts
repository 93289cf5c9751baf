import path from "path";
import { fileURLToPath } from "url";
import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const PROJECT_ROOT = path.resolve(__dirname, "..");

const blankToUndefined = (v: unknown) => (v === undefined || v === "" ? undefined : v);
const optionalNumber = (schema: z.ZodNumber) => z.preprocess(blankToUndefined, schema.optional());

const envSchema = z.object({
  DIET_DB_PATH: z.string().optional(),
  DIET_DATA_DIR: z.string().optional(),
  DIET_REPORT_DIR: z.string().optional(),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).optional(),

  FUZZY_MAX_DISTANCE: optionalNumber(z.coerce.number().int().min(0)),
  FUZZY_MAX_RATIO: optionalNumber(z.coerce.number().min(0).max(1)),

  RECOMMEND_KCAL_TOLERANCE: optionalNumber(z.coerce.number().gt(0).lt(1)),
  RECOMMEND_MACRO_TOLERANCE: optionalNumber(z.coerce.number().gt(0).lt(1)),
  RECOMMEND_MAX_ITEMS: optionalNumber(z.coerce.number().int().min(2).max(6)),
  RECOMMEND_MAX_EXPANSIONS: optionalNumber(z.coerce.number().int().positive()),
  MEAL_WEIGHTS: z.string().optional(),
  DEFAULT_DEFICIT: optionalNumber(z.coerce.number().min(0).lt(0.9)),
});

export type Env = z.infer<typeof envSchema>;

const parseWeights = (raw: string | undefined): number[] | null => {
  if (!raw || !raw.trim()) return null;
  const weights = raw.split(",").map((w) => Number(w.trim()));
  if (weights.some((w) => !Number.isFinite(w) || w <= 0)) {
    throw new Error(`MEAL_WEIGHTS must be positive numbers, got "${raw}"`);
  }
  return weights;
};

const buildConfig = (env: Env) => {
  const dataDir = env.DIET_DATA_DIR
    ? path.resolve(env.DIET_DATA_DIR)
    : path.join(PROJECT_ROOT, "data");
  return {
    dbPath: env.DIET_DB_PATH
      ? path.resolve(env.DIET_DB_PATH)
      : path.join(PROJECT_ROOT, "storage", "diet.db"),
    dataDir,
    reportDir: env.DIET_REPORT_DIR
      ? path.resolve(env.DIET_REPORT_DIR)
      : path.join(PROJECT_ROOT, "storage", "reports"),
    logging: {
      level: env.LOG_LEVEL ?? "info",
    },
    resolver: {
      maxDistance: env.FUZZY_MAX_DISTANCE ?? 2,
      maxRatio: env.FUZZY_MAX_RATIO ?? 0.34,
    },
    recommender: {
      kcalTolerance: env.RECOMMEND_KCAL_TOLERANCE ?? 0.1,
      macroTolerance: env.RECOMMEND_MACRO_TOLERANCE ?? 0.1,
      maxItems: env.RECOMMEND_MAX_ITEMS ?? 3,
      maxExpansions: env.RECOMMEND_MAX_EXPANSIONS ?? 20_000,
      mealWeights: parseWeights(env.MEAL_WEIGHTS),
    },
    defaultDeficit: env.DEFAULT_DEFICIT ?? 0.15,
  };
};

export type AppConfig = ReturnType<typeof buildConfig>;

let cachedConfig: AppConfig | null = null;

export const loadConfig = (): AppConfig => {
  if (!cachedConfig) {
    const parsed = envSchema.safeParse(process.env);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((i) => `${i.path.join(".")}: ${i.message}`)
        .join(", ");
      throw new Error(`Invalid environment configuration: ${issues}`);
    }
    cachedConfig = buildConfig(parsed.data);
  }
  return cachedConfig;
};

// Exposed for tests that need a config without touching process.env
export const configFromEnv = (env: Record<string, string | undefined>): AppConfig => {
  return buildConfig(envSchema.parse(env));
};
