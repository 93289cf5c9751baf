import { describe, it, expect, vi, afterEach } from "vitest";
import { logger } from "../logger.js";
import { FoodCatalog } from "./catalog.js";
import { FoodResolver } from "./resolver.js";
import type { FoodEntry } from "../types.js";

const food = (name: string, kcal = 100): FoodEntry => ({
  name,
  kcal,
  protein_g: 1,
  fat_g: 1,
  carbs_g: 1,
  serving_g: null,
});

const foods = [food("계란", 155), food("토마토", 18), food("닭가슴살", 165), food("tomato paste")];

afterEach(() => {
  vi.restoreAllMocks();
});

describe("FoodResolver", () => {
  const catalog = new FoodCatalog(foods, [
    ["달걀", "계란"],
    ["egg", "계란"],
  ]);
  const resolver = new FoodResolver(catalog);

  it("matches canonical names exactly, ignoring case and spacing", () => {
    const result = resolver.resolve("  Tomato   Paste ");
    expect(result).toMatchObject({ status: "resolved", confidence: "exact", distance: 0 });
    if (result.status === "resolved") expect(result.food.name).toBe("tomato paste");
  });

  it("resolves synonyms to the canonical food", () => {
    const result = resolver.resolve("달걀");
    expect(result).toMatchObject({ status: "resolved", confidence: "synonym" });
    if (result.status === "resolved") expect(result.food.name).toBe("계란");
  });

  it("falls back to substring containment", () => {
    const result = resolver.resolve("닭가슴");
    expect(result).toMatchObject({ status: "resolved", confidence: "fuzzy", matched: "닭가슴살" });
  });

  it("accepts small edit distances", () => {
    const result = resolver.resolve("eggs");
    expect(result).toMatchObject({ status: "resolved", confidence: "fuzzy", matched: "egg", distance: 1 });
    if (result.status === "resolved") expect(result.food.name).toBe("계란");
  });

  it("leaves unknown text unresolved", () => {
    expect(resolver.resolve("asdf")).toEqual({ status: "unresolved", raw: "asdf" });
    expect(resolver.resolve("   ")).toEqual({ status: "unresolved", raw: "   " });
  });

  it("does not match single characters by containment", () => {
    expect(resolver.resolve("g")).toEqual({ status: "unresolved", raw: "g" });
    expect(resolver.resolve("토")).toEqual({ status: "unresolved", raw: "토" });
  });

  it("is deterministic", () => {
    expect(resolver.resolve("토마")).toEqual(resolver.resolve("토마"));
  });
});

describe("fuzzy tie-breaking", () => {
  it("prefers the shorter food name at equal distance", () => {
    const catalog = new FoodCatalog([food("beef"), food("beet greens")], [["beet", "beet greens"]]);
    const result = new FoodResolver(catalog).resolve("beek");
    expect(result.status === "resolved" && result.food.name).toBe("beef");
  });

  it("breaks remaining ties lexically", () => {
    const catalog = new FoodCatalog([food("bean"), food("bead")]);
    const result = new FoodResolver(catalog).resolve("beaz");
    expect(result.status === "resolved" && result.food.name).toBe("bead");
  });

  it("honours a tighter distance limit", () => {
    const catalog = new FoodCatalog([food("tomato")]);
    const strict = new FoodResolver(catalog, { maxDistance: 0, maxRatio: 0 });
    expect(strict.resolve("tomatoe").status).toBe("resolved");
    expect(strict.resolve("tomaot").status).toBe("unresolved");
  });
});

describe("FoodCatalog", () => {
  it("warns and keeps the last pair on alias conflicts", () => {
    const warn = vi.spyOn(logger, "warn").mockImplementation(() => undefined);
    const catalog = new FoodCatalog(foods, [
      ["tom", "토마토"],
      ["tom", "tomato paste"],
    ]);
    expect(catalog.findByAlias("tom")?.name).toBe("tomato paste");
    expect(warn).toHaveBeenCalledWith('Synonym "tom" reassigned from "토마토" to "tomato paste"');
  });

  it("drops aliases pointing at unknown foods", () => {
    const warn = vi.spyOn(logger, "warn").mockImplementation(() => undefined);
    const catalog = new FoodCatalog(foods, [["pb", "peanut butter"]]);
    expect(catalog.findByAlias("pb")).toBeUndefined();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("lists foods sorted by name", () => {
    const catalog = new FoodCatalog(foods);
    expect(catalog.foods.map((f) => f.name)).toEqual(["tomato paste", "계란", "닭가슴살", "토마토"]);
    expect(catalog.size).toBe(4);
  });
});
