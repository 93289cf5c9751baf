import { UnrecognizedUnitError } from "../errors.js";
import type { FoodEntry, UnitTable } from "../types.js";

// Grams per unit. Volumes assume a density of 1 g/ml.
export const MASS_UNITS: Readonly<Record<string, number>> = {
  mg: 0.001,
  g: 1,
  gram: 1,
  grams: 1,
  kg: 1000,
  ml: 1,
  l: 1000,
};

export const DEFAULT_SERVING_G = 100;

const QUANTITY_RE = /^(\d+(?:\.\d+)?)(?:\s*\/\s*(\d+(?:\.\d+)?))?\s*([^\d\s.\/]*)$/u;

export interface Quantity {
  value: number;
  unit: string | null;
}

/**
 * Reads "100g", "1.5kg", "2개", "1/2공기" or a bare "150".
 * Returns null when the text does not start with a number or has trailing junk.
 */
export function parseQuantity(expression: string): Quantity | null {
  const match = expression.trim().toLowerCase().match(QUANTITY_RE);
  if (!match) return null;

  let value = Number(match[1]);
  if (match[2] !== undefined) {
    const denominator = Number(match[2]);
    if (denominator === 0) return null;
    value = value / denominator;
  }
  return { value, unit: match[3] ? match[3] : null };
}

export function isQuantity(token: string): boolean {
  return parseQuantity(token) !== null;
}

/**
 * Approximate quantity → grams conversion. Mass units are exact; count units
 * ("개", "공기", "큰술") go through the per-food table, then the global defaults.
 */
export class UnitConverter {
  constructor(private readonly table: UnitTable) {}

  convert(foodKey: string | null, expression: string): number {
    const quantity = parseQuantity(expression);
    if (!quantity) {
      throw new UnrecognizedUnitError(expression, null);
    }

    // bare number means grams
    if (quantity.unit === null) return quantity.value;

    const perUnit = this.gramsPerUnit(foodKey, quantity.unit);
    if (perUnit === null) {
      throw new UnrecognizedUnitError(expression, quantity.unit);
    }
    return quantity.value * perUnit;
  }

  gramsPerUnit(foodKey: string | null, unit: string): number | null {
    const mass = MASS_UNITS[unit];
    if (mass !== undefined) return mass;

    if (foodKey !== null) {
      const specific = this.table.foods[foodKey]?.[unit];
      if (specific !== undefined) return specific;
    }
    return this.table.defaults[unit] ?? null;
  }

  // Any unit the tables can convert for at least one food
  isKnownUnit(unit: string): boolean {
    const key = unit.toLowerCase();
    if (MASS_UNITS[key] !== undefined || Object.hasOwn(this.table.defaults, key)) return true;
    return Object.values(this.table.foods).some((units) => Object.hasOwn(units, key));
  }

  defaultServing(food: FoodEntry): number {
    return food.serving_g ?? DEFAULT_SERVING_G;
  }
}
