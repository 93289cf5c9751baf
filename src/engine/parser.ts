import { UnrecognizedUnitError } from "../errors.js";
import { MASS_UNITS, isQuantity, parseQuantity, type UnitConverter } from "./units.js";
import type { FoodResolver } from "./resolver.js";
import type { ParsedMeal, QuantifiedItem, UnresolvedReason } from "../types.js";

export interface ParserOptions {
  delimiters: string[];
  // Words that join two foods ("계란 그리고 밥"); treated like a delimiter
  connectives: string[];
}

export const DEFAULT_PARSER_OPTIONS: ParserOptions = {
  delimiters: [",", "\n", "/", ";", "+", "·"],
  connectives: ["그리고", "and", "with"],
};

// name glued to a trailing quantity: "계란2개", "닭가슴살150g"
const GLUED_RE = /^(.*[^\d\s.\/])(\d+(?:\.\d+)?(?:\/\d+(?:\.\d+)?)?[^\d\s.\/]*)$/u;

interface Pair {
  words: string[];
  quantity: string | null;
  // quantity written before the name ("100g 닭가슴살")
  leading: boolean;
}

const escapeRegExp = (s: string) => s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

export function splitSegments(text: string, options: ParserOptions = DEFAULT_PARSER_OPTIONS): string[] {
  let working = text;
  for (const word of options.connectives) {
    const re = new RegExp(`(^|\\s)${escapeRegExp(word)}(?=\\s|$)`, "giu");
    working = working.replace(re, "$1,");
  }

  // "/" between digits is a fraction ("1/2공기"), not a delimiter
  const alternatives = options.delimiters.map((d) =>
    d === "/" ? "(?<!\\d)\\/|\\/(?!\\d)" : escapeRegExp(d)
  );
  const splitter = new RegExp(alternatives.join("|"), "u");
  return working
    .split(splitter)
    .map((segment) => segment.trim())
    .filter(Boolean);
}

// "150 g" and "2 개" read as one quantity when the second token is a known unit
function joinSpacedUnits(tokens: string[], isUnit: (unit: string) => boolean): string[] {
  const joined: string[] = [];
  for (let i = 0; i < tokens.length; i++) {
    const bare = parseQuantity(tokens[i]);
    const next = tokens[i + 1];
    if (bare && bare.unit === null && next !== undefined && isUnit(next)) {
      joined.push(`${tokens[i]}${next}`);
      i++;
      continue;
    }
    joined.push(tokens[i]);
  }
  return joined;
}

function pairTokens(segment: string, isUnit: (unit: string) => boolean): Pair[] {
  const pairs: Pair[] = [];
  let words: string[] = [];
  let pending: string | null = null;

  const flush = (quantity: string | null, leading: boolean) => {
    pairs.push({ words, quantity, leading });
    words = [];
  };

  for (const token of joinSpacedUnits(segment.split(/\s+/u).filter(Boolean), isUnit)) {
    if (isQuantity(token)) {
      if (words.length > 0) {
        if (pending !== null) {
          flush(pending, true);
          pending = token;
        } else {
          flush(token, false);
        }
      } else {
        if (pending !== null) flush(pending, true);
        pending = token;
      }
      continue;
    }

    const glued = token.match(GLUED_RE);
    if (glued && isQuantity(glued[2])) {
      if (words.length > 0 || pending !== null) {
        flush(pending, pending !== null);
        pending = null;
      }
      words = [glued[1]];
      flush(glued[2], false);
      continue;
    }

    words.push(token);
  }

  if (words.length > 0 || pending !== null) flush(pending, pending !== null);
  return pairs;
}

function explicitGrams(quantity: string | null): number | null {
  if (quantity === null) return null;
  const parsed = parseQuantity(quantity);
  if (!parsed) return null;
  if (parsed.unit === null) return parsed.value;
  const perUnit = MASS_UNITS[parsed.unit];
  return perUnit === undefined ? null : parsed.value * perUnit;
}

/**
 * Turns a free-text log line into quantified items. Bad tokens become
 * unresolved items; the parse itself never fails.
 *
 * A segment without a quantity gets the food's default serving
 * (its serving_g, else 100 g).
 */
export class MealTextParser {
  private readonly options: ParserOptions;

  constructor(
    private readonly resolver: FoodResolver,
    private readonly converter: UnitConverter,
    options: Partial<ParserOptions> = {}
  ) {
    this.options = { ...DEFAULT_PARSER_OPTIONS, ...options };
  }

  parse(text: string): ParsedMeal {
    const items: QuantifiedItem[] = [];
    for (const segment of splitSegments(text, this.options)) {
      for (const pair of pairTokens(segment, (unit) => this.converter.isKnownUnit(unit))) {
        for (const piece of this.splitName(pair)) {
          items.push(this.toItem(piece.name, piece.quantity, piece.leading));
        }
      }
    }
    return { text, items };
  }

  // "계란 토마토 100g" holds two foods; only split when every piece is an exact or alias hit
  private splitName(pair: Pair): Array<{ name: string; quantity: string | null; leading: boolean }> {
    const whole = pair.words.join(" ");
    const single = [{ name: whole, quantity: pair.quantity, leading: pair.leading }];
    if (pair.words.length < 2 || this.isStrictMatch(whole)) return single;

    const names: string[] = [];
    let i = 0;
    while (i < pair.words.length) {
      let next = -1;
      for (let j = pair.words.length; j > i; j--) {
        if (this.isStrictMatch(pair.words.slice(i, j).join(" "))) {
          next = j;
          break;
        }
      }
      if (next < 0) return single;
      names.push(pair.words.slice(i, next).join(" "));
      i = next;
    }

    const carrier = pair.leading ? 0 : names.length - 1;
    return names.map((name, index) => ({
      name,
      quantity: index === carrier ? pair.quantity : null,
      leading: pair.leading,
    }));
  }

  private isStrictMatch(name: string): boolean {
    const resolution = this.resolver.resolve(name);
    return resolution.status === "resolved" && resolution.confidence !== "fuzzy";
  }

  private toItem(name: string, quantity: string | null, leading: boolean): QuantifiedItem {
    const raw = quantity === null ? name : leading ? `${quantity} ${name}`.trim() : `${name} ${quantity}`.trim();

    if (!name) return this.unresolved(raw, name, quantity, "missing_name");

    const resolution = this.resolver.resolve(name);
    if (resolution.status === "unresolved") {
      return this.unresolved(raw, name, quantity, "unknown_food");
    }

    const { food } = resolution;
    let grams: number;
    if (quantity === null) {
      grams = this.converter.defaultServing(food);
    } else {
      try {
        grams = this.converter.convert(food.name, quantity);
      } catch (error) {
        if (error instanceof UnrecognizedUnitError) {
          return this.unresolved(raw, name, quantity, "unrecognized_unit");
        }
        throw error;
      }
    }

    return {
      confidence: resolution.confidence,
      raw,
      name,
      quantity,
      foodKey: food.name,
      grams,
      per100g: {
        kcal: food.kcal,
        protein_g: food.protein_g,
        fat_g: food.fat_g,
        carbs_g: food.carbs_g,
      },
    };
  }

  private unresolved(
    raw: string,
    name: string,
    quantity: string | null,
    reason: UnresolvedReason
  ): QuantifiedItem {
    return { confidence: "unresolved", raw, name, quantity, reason, grams: explicitGrams(quantity) };
  }
}
