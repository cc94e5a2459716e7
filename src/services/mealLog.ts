// src/services/mealLog.ts
// Turning a selection of foods into a logged meal.

import { LoggedMeal, MealSelection } from "../domain/types";
import { formatTimestamp } from "../utils/date";
import { FoodCatalog } from "./foodCatalog";
import { MealLogStore } from "./mealLogStore";
import { summarizeMeal } from "./mealSummary";

export const UNTITLED_TAG = "Untitled";

export interface SaveMealInput {
  tag?: string | null;
  items: readonly MealSelection[];
}

export function saveMeal(
  catalog: FoodCatalog,
  store: MealLogStore,
  input: SaveMealInput,
  now: Date = new Date()
): LoggedMeal {
  const summary = summarizeMeal(catalog, input.items);
  const tag = input.tag?.trim() ? input.tag.trim() : UNTITLED_TAG;

  const meal: LoggedMeal = {
    timestamp: formatTimestamp(now),
    tag,
    items: summary.items,
    totals: summary.totals,
  };

  store.append(meal);
  console.log(`[meal-log] Saved "${tag}" (${meal.items.length} items) at ${meal.timestamp}`);
  return meal;
}
