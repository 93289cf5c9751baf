import { distance } from "fastest-levenshtein";
import { compareText, normalizeName, type FoodCatalog } from "./catalog.js";
import type { FoodEntry, MatchConfidence } from "../types.js";

export type Resolution =
  | {
      status: "resolved";
      food: FoodEntry;
      confidence: MatchConfidence;
      matched: string;
      distance: number;
    }
  | { status: "unresolved"; raw: string };

export interface FuzzyOptions {
  // Largest Levenshtein distance accepted outside of substring containment
  maxDistance: number;
  // distance / length of the longer string
  maxRatio: number;
}

// Shortest query allowed to match by substring containment, in code points
export const MIN_CONTAINMENT_LENGTH = 2;

export const DEFAULT_FUZZY: FuzzyOptions = { maxDistance: 2, maxRatio: 0.34 };

interface Scored {
  food: FoodEntry;
  matched: string;
  distance: number;
}

function rank(a: Scored, b: Scored): number {
  return (
    a.distance - b.distance ||
    a.food.name.length - b.food.name.length ||
    compareText(a.food.name, b.food.name)
  );
}

/**
 * Resolves a raw food token: exact canonical name, then synonym alias, then
 * the closest fuzzy candidate. Pure over the catalog it was built with.
 */
export class FoodResolver {
  constructor(
    private readonly catalog: FoodCatalog,
    private readonly options: FuzzyOptions = DEFAULT_FUZZY
  ) {}

  resolve(raw: string): Resolution {
    const query = normalizeName(raw);
    if (!query) return { status: "unresolved", raw };

    const exact = this.catalog.findByName(query);
    if (exact) {
      return { status: "resolved", food: exact, confidence: "exact", matched: query, distance: 0 };
    }

    const synonym = this.catalog.findByAlias(query);
    if (synonym) {
      return { status: "resolved", food: synonym, confidence: "synonym", matched: query, distance: 0 };
    }

    const best = this.fuzzy(query);
    if (best) {
      return {
        status: "resolved",
        food: best.food,
        confidence: "fuzzy",
        matched: best.matched,
        distance: best.distance,
      };
    }
    return { status: "unresolved", raw };
  }

  private fuzzy(query: string): Scored | null {
    let best: Scored | null = null;
    const containable = [...query].length >= MIN_CONTAINMENT_LENGTH;
    for (const candidate of this.catalog.candidates()) {
      const d = distance(query, candidate.text);
      const contained =
        containable && (candidate.text.includes(query) || query.includes(candidate.text));
      const longer = Math.max(query.length, candidate.text.length);
      const close = d <= this.options.maxDistance && d / longer <= this.options.maxRatio;
      if (!contained && !close) continue;

      const scored: Scored = { food: candidate.food, matched: candidate.text, distance: d };
      if (!best || rank(scored, best) < 0) best = scored;
    }
    return best;
  }
}
