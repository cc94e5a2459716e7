// src/services/dailyReport.ts
// Day grouping of the meal log and daily totals against targets.

import {
  DayGroup,
  LoggedMeal,
  MacroName,
  MacroTotals,
} from "../domain/types";
import { dayOfTimestamp } from "../utils/date";
import { round2 } from "../utils/number";
import { EnergyBreakdown, energyBreakdown, sumLineItems } from "./mealSummary";

export type MacroStatus = "over" | "on_track" | "under";

export interface MacroProgress {
  actual: number;
  target: number;
  remaining: number;
  progress: number; // 0..1
  status: MacroStatus;
}

export interface MealReport extends LoggedMeal {
  energy: EnergyBreakdown;
}

export interface DayReport {
  day: string;
  meals: MealReport[];
  totals: MacroTotals;
  progress: Record<MacroName, MacroProgress>;
}

/** Days in first-seen order; meals keep their log order. */
export function groupByDay(meals: readonly LoggedMeal[]): DayGroup[] {
  const groups = new Map<string, LoggedMeal[]>();
  for (const meal of meals) {
    const day = dayOfTimestamp(meal.timestamp);
    const list = groups.get(day);
    if (list) {
      list.push(meal);
    } else {
      groups.set(day, [meal]);
    }
  }
  return Array.from(groups, ([day, dayMeals]) => ({ day, meals: dayMeals }));
}

/** At or above 110% is over, at or above 90% is on track, anything lower is under. */
export function macroStatus(actual: number, target: number): MacroStatus {
  if (actual >= 1.1 * target) return "over";
  if (actual >= 0.9 * target) return "on_track";
  return "under";
}

export function macroProgress(actual: number, target: number): MacroProgress {
  let progress: number;
  if (target > 0) {
    progress = Math.min(actual / target, 1);
  } else {
    progress = actual > 0 ? 1 : 0;
  }

  return {
    actual,
    target,
    remaining: Math.max(0, target - actual),
    progress,
    status: macroStatus(actual, target),
  };
}

/**
 * Protein, carbs and fats summed from the meals' item rows. Calories are
 * the 4/4/9 energy of those grams, not the logged calorie column.
 */
export function dayTotals(meals: readonly LoggedMeal[]): MacroTotals {
  const grams = sumLineItems(meals.flatMap((m) => m.items));
  return { ...grams, Calories: round2(energyBreakdown(grams).totalKcal) };
}

export function buildDayReport(group: DayGroup, targets: MacroTotals): DayReport {
  const totals = dayTotals(group.meals);

  const progress: Record<MacroName, MacroProgress> = {
    Calories: macroProgress(totals.Calories, targets.Calories),
    Protein: macroProgress(totals.Protein, targets.Protein),
    Carbs: macroProgress(totals.Carbs, targets.Carbs),
    Fats: macroProgress(totals.Fats, targets.Fats),
  };

  return {
    day: group.day,
    meals: group.meals.map((meal) => ({
      ...meal,
      energy: energyBreakdown(sumLineItems(meal.items)),
    })),
    totals,
    progress,
  };
}

export function buildDailyReports(meals: readonly LoggedMeal[], targets: MacroTotals): DayReport[] {
  return groupByDay(meals).map((group) => buildDayReport(group, targets));
}
