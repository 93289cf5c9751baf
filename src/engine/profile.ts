import { z } from "zod";
import { InvalidProfileError } from "../errors.js";
import type { ActivityLevel, MacroRatio, NutritionTargets, Profile } from "../types.js";

export const ACTIVITY_FACTORS: Record<ActivityLevel, number> = {
  sedentary: 1.2,
  light: 1.375,
  moderate: 1.55,
  active: 1.725,
  very_active: 1.9,
};

export const KCAL_PER_GRAM = { protein_g: 4, fat_g: 9, carbs_g: 4 } as const;

export const MACRO_SUM_TOLERANCE = 0.01;

export const DEFAULT_PROFILE: Profile = {
  gender: "male",
  age: 25,
  height_cm: 175,
  weight_kg: 70,
  activity: "light",
  target_kcal: null,
  macro_ratio: { protein: 0.3, fat: 0.3, carbs: 0.4 },
};

const fraction = z.number().min(0).max(1);

export const MacroRatioSchema = z
  .object({ protein: fraction, fat: fraction, carbs: fraction })
  .refine((r) => Math.abs(r.protein + r.fat + r.carbs - 1) <= MACRO_SUM_TOLERANCE, {
    message: "protein + fat + carbs must sum to 1 (±0.01)",
  });

export const ProfileSchema = z.object({
  gender: z.enum(["male", "female"]),
  age: z.number().int().min(10).max(120),
  height_cm: z.number().min(100).max(250),
  weight_kg: z.number().min(25).max(350),
  activity: z.enum(["sedentary", "light", "moderate", "active", "very_active"]),
  target_kcal: z.number().min(800).max(6000).nullable(),
  macro_ratio: MacroRatioSchema,
});

function issuesOf(error: z.ZodError): string[] {
  return error.issues.map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message));
}

// Rejects, never clamps
export function validateProfile(input: unknown): Profile {
  const parsed = ProfileSchema.safeParse(input);
  if (!parsed.success) throw new InvalidProfileError(issuesOf(parsed.error));
  return parsed.data;
}

export function validateMacroRatio(input: unknown): MacroRatio {
  const parsed = MacroRatioSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidProfileError(issuesOf(parsed.error).map((i) => `macro_ratio: ${i}`));
  }
  return parsed.data;
}

/** Mifflin-St Jeor */
export function calculateBMR(profile: Profile): number {
  const base = 10 * profile.weight_kg + 6.25 * profile.height_cm - 5 * profile.age;
  return profile.gender === "female" ? base - 161 : base + 5;
}

export function calculateTDEE(profile: Profile): number {
  return calculateBMR(profile) * ACTIVITY_FACTORS[profile.activity];
}

/**
 * Daily calorie target: the explicit override or TDEE, reduced by the deficit
 * when 0 < deficit < 0.9.
 */
export function dailyTargetKcal(profile: Profile, deficit?: number | null): number {
  const base = profile.target_kcal ?? calculateTDEE(profile);
  if (deficit !== undefined && deficit !== null && deficit > 0 && deficit < 0.9) {
    return base * (1 - deficit);
  }
  return base;
}

export function macroTargets(targetKcal: number, ratio: MacroRatio): NutritionTargets {
  return {
    kcal: targetKcal,
    protein_g: (targetKcal * ratio.protein) / KCAL_PER_GRAM.protein_g,
    fat_g: (targetKcal * ratio.fat) / KCAL_PER_GRAM.fat_g,
    carbs_g: (targetKcal * ratio.carbs) / KCAL_PER_GRAM.carbs_g,
  };
}

export function profileTargets(profile: Profile, deficit?: number | null): NutritionTargets {
  return macroTargets(dailyTargetKcal(profile, deficit), profile.macro_ratio);
}
