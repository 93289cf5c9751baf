import { logger } from "../logger.js";
import type { FoodEntry, SynonymPair } from "../types.js";

export function normalizeName(name: string): string {
  return name.trim().replace(/\s+/g, " ").toLowerCase();
}

export function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export interface MatchCandidate {
  text: string;
  food: FoodEntry;
  viaAlias: boolean;
}

/**
 * Read-only snapshot of the food database and the synonym map, built once per
 * invocation and handed to the resolver, parser and recommender.
 *
 * Alias conflicts: the last pair wins and a warning is logged. Aliases whose
 * canonical food is missing are dropped.
 */
export class FoodCatalog {
  readonly foods: readonly FoodEntry[];
  private readonly byKey = new Map<string, FoodEntry>();
  private readonly byName = new Map<string, FoodEntry>();
  private readonly aliases = new Map<string, FoodEntry>();

  constructor(foods: readonly FoodEntry[], synonyms: readonly SynonymPair[] = []) {
    for (const food of foods) {
      const entry = Object.freeze({ ...food });
      const normalized = normalizeName(entry.name);
      const previous = this.byName.get(normalized);
      if (previous) {
        logger.warn(`Food "${entry.name}" shadows "${previous.name}"`);
        this.byKey.delete(previous.name);
      }
      this.byKey.set(entry.name, entry);
      this.byName.set(normalized, entry);
    }
    this.foods = Object.freeze(
      [...this.byKey.values()].sort((a, b) => compareText(a.name, b.name))
    );

    for (const [alias, canonical] of synonyms) {
      const key = normalizeName(alias);
      const target = this.byKey.get(canonical) ?? this.byName.get(normalizeName(canonical));
      if (!key) continue;
      if (!target) {
        logger.warn(`Synonym "${alias}" points at unknown food "${canonical}", skipped`);
        continue;
      }
      const existing = this.aliases.get(key);
      if (existing && existing.name !== target.name) {
        logger.warn(
          `Synonym "${alias}" reassigned from "${existing.name}" to "${target.name}"`
        );
      }
      this.aliases.set(key, target);
    }
  }

  get size(): number {
    return this.foods.length;
  }

  get(key: string): FoodEntry | undefined {
    return this.byKey.get(key);
  }

  findByName(name: string): FoodEntry | undefined {
    return this.byName.get(normalizeName(name));
  }

  findByAlias(alias: string): FoodEntry | undefined {
    return this.aliases.get(normalizeName(alias));
  }

  // Every string a fuzzy match may be scored against, canonical names first
  candidates(): MatchCandidate[] {
    const result: MatchCandidate[] = [];
    for (const [text, food] of this.byName) result.push({ text, food, viaAlias: false });
    for (const [text, food] of this.aliases) result.push({ text, food, viaAlias: true });
    return result;
  }
}
