export type MacroName = "Calories" | "Protein" | "Carbs" | "Fats";

export const MACRO_NAMES: readonly MacroName[] = ["Calories", "Protein", "Carbs", "Fats"];

export type MacroTotals = Record<MacroName, number>;

// Only the macros present are scored.
export type TargetProfile = Partial<Record<MacroName, number>>;

export interface FoodItem {
  name: string;
  servingSize: string;
  caloriesPerUnit: number;
  proteinPerUnit: number;
  carbsPerUnit: number;
  fatsPerUnit: number;
  defaultQuantity: number;
}

export interface PortionedFood {
  food: FoodItem;
  multiplier: number;
}

export interface CandidateMeal {
  items: PortionedFood[];
  totals: MacroTotals;
}

export interface SearchResult {
  meal: CandidateMeal;
  score: number;
  trialsRun: number;
  foundAtTrial: number; // 1-based
}

export interface MealSelection {
  name: string;
  quantity: number;
}

export interface MealLineItem extends MacroTotals {
  name: string;
  quantity: number;
}

export interface LoggedMeal {
  timestamp: string; // YYYY-MM-DD HH:mm:ss
  tag: string;
  items: MealLineItem[];
  totals: MacroTotals;
}

export interface DayGroup {
  day: string; // YYYY-MM-DD
  meals: LoggedMeal[];
}

export function zeroTotals(): MacroTotals {
  return { Calories: 0, Protein: 0, Carbs: 0, Fats: 0 };
}

export function perUnit(food: FoodItem, macro: MacroName): number {
  switch (macro) {
    case "Calories":
      return food.caloriesPerUnit;
    case "Protein":
      return food.proteinPerUnit;
    case "Carbs":
      return food.carbsPerUnit;
    case "Fats":
      return food.fatsPerUnit;
  }
}
