import { describe, it, expect } from "vitest";
import { UnrecognizedUnitError } from "../errors.js";
import { UnitConverter, isQuantity, parseQuantity } from "./units.js";
import type { UnitTable } from "../types.js";

const table: UnitTable = {
  defaults: { 개: 50, 공기: 210, 큰술: 13.5 },
  foods: { 바나나: { 개: 120 } },
};

describe("parseQuantity", () => {
  it("reads value and unit", () => {
    expect(parseQuantity("100g")).toEqual({ value: 100, unit: "g" });
    expect(parseQuantity("1.5 KG")).toEqual({ value: 1.5, unit: "kg" });
    expect(parseQuantity("150")).toEqual({ value: 150, unit: null });
  });

  it("reads fractions", () => {
    expect(parseQuantity("1/2공기")).toEqual({ value: 0.5, unit: "공기" });
  });

  it("rejects text that is not a quantity", () => {
    expect(parseQuantity("계란")).toBeNull();
    expect(parseQuantity("1/0개")).toBeNull();
    expect(isQuantity("2개")).toBe(true);
    expect(isQuantity("g100")).toBe(false);
  });
});

describe("UnitConverter", () => {
  const converter = new UnitConverter(table);

  it("converts mass units directly", () => {
    expect(converter.convert("계란", "1.5kg")).toBe(1500);
    expect(converter.convert(null, "250mg")).toBeCloseTo(0.25);
  });

  it("treats a bare number as grams", () => {
    expect(converter.convert("계란", "150")).toBe(150);
  });

  it("prefers the per-food table over defaults", () => {
    expect(converter.convert("바나나", "2개")).toBe(240);
    expect(converter.convert("계란", "2개")).toBe(100);
  });

  it("scales fractional count units", () => {
    expect(converter.convert("백미밥", "1/2공기")).toBe(105);
  });

  it("throws on an unknown unit", () => {
    expect(() => converter.convert("계란", "3봉지")).toThrow(UnrecognizedUnitError);
    expect(() => converter.convert("계란", "abc")).toThrow('Unrecognized quantity "abc"');
  });

  it("knows units from every table", () => {
    expect(converter.isKnownUnit("G")).toBe(true);
    expect(converter.isKnownUnit("공기")).toBe(true);
    expect(converter.isKnownUnit("봉지")).toBe(false);
    expect(new UnitConverter({ defaults: {}, foods: { 두부: { 모: 300 } } }).isKnownUnit("모")).toBe(true);
  });

  it("falls back to 100 g without a serving size", () => {
    const food = { name: "토마토", kcal: 18, protein_g: 0.9, fat_g: 0.2, carbs_g: 3.9, serving_g: null };
    expect(converter.defaultServing(food)).toBe(100);
    expect(converter.defaultServing({ ...food, serving_g: 150 })).toBe(150);
  });
});
