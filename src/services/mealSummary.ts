// src/services/mealSummary.ts
// Per-item macros, totals and energy breakdown for a set of chosen foods.

import {
  MACRO_NAMES,
  MacroTotals,
  MealLineItem,
  MealSelection,
  perUnit,
  zeroTotals,
} from "../domain/types";
import { round2 } from "../utils/number";
import { FoodCatalog } from "./foodCatalog";

export const KCAL_PER_GRAM = { Protein: 4, Carbs: 4, Fats: 9 } as const;

export interface EnergyBreakdown {
  proteinKcal: number;
  carbsKcal: number;
  fatsKcal: number;
  totalKcal: number;
  // Share of totalKcal, 0..1 (all 0 when totalKcal is 0)
  share: { Protein: number; Carbs: number; Fats: number };
}

export interface MealSummary {
  items: MealLineItem[];
  totals: MacroTotals;
  energy: EnergyBreakdown;
}

export function sumLineItems(items: readonly MacroTotals[]): MacroTotals {
  const totals = zeroTotals();
  for (const item of items) {
    for (const macro of MACRO_NAMES) totals[macro] += item[macro];
  }
  for (const macro of MACRO_NAMES) totals[macro] = round2(totals[macro]);
  return totals;
}

/** Energy from protein/carbs/fats grams (4/4/9 kcal per gram). */
export function energyBreakdown(totals: MacroTotals): EnergyBreakdown {
  const proteinKcal = totals.Protein * KCAL_PER_GRAM.Protein;
  const carbsKcal = totals.Carbs * KCAL_PER_GRAM.Carbs;
  const fatsKcal = totals.Fats * KCAL_PER_GRAM.Fats;
  const totalKcal = proteinKcal + carbsKcal + fatsKcal;
  const share = (kcal: number) => (totalKcal > 0 ? kcal / totalKcal : 0);

  return {
    proteinKcal,
    carbsKcal,
    fatsKcal,
    totalKcal,
    share: {
      Protein: share(proteinKcal),
      Carbs: share(carbsKcal),
      Fats: share(fatsKcal),
    },
  };
}

export interface SelectionInput {
  name: string;
  quantity?: number;
}

/** Fills a missing quantity with the food's default quantity from the catalog. */
export function resolveSelections(
  catalog: FoodCatalog,
  inputs: readonly SelectionInput[]
): MealSelection[] {
  return inputs.map(({ name, quantity }) => {
    const food = catalog.get(name);
    if (!food) throw new Error(`FOOD_NOT_FOUND: ${name}`);
    return { name, quantity: quantity ?? food.defaultQuantity };
  });
}

export function summarizeMeal(
  catalog: FoodCatalog,
  selections: readonly MealSelection[]
): MealSummary {
  if (!selections.length) {
    throw new Error("EMPTY_MEAL");
  }

  const items: MealLineItem[] = selections.map(({ name, quantity }) => {
    const food = catalog.get(name);
    if (!food) throw new Error(`FOOD_NOT_FOUND: ${name}`);
    if (!Number.isFinite(quantity) || quantity < 0) {
      throw new Error(`INVALID_QUANTITY: ${name}`);
    }

    const line: MealLineItem = { name, quantity, ...zeroTotals() };
    for (const macro of MACRO_NAMES) {
      line[macro] = round2(perUnit(food, macro) * quantity);
    }
    return line;
  });

  const totals = sumLineItems(items);
  return { items, totals, energy: energyBreakdown(totals) };
}
