// src/services/mealLogCsv.ts
// Flat CSV layout of the meal log. Each meal is written as its item rows,
// then a "Meal Logged" totals row carrying timestamp and tag, then a "---"
// divider row. In-memory code only ever sees LoggedMeal records.

import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { z } from "zod";
import { LoggedMeal, MacroTotals, MealLineItem } from "../domain/types";

export const LOG_COLUMNS = [
  "Food Item",
  "Quantity",
  "Calories",
  "Protein",
  "Carbs",
  "Fats",
  "Timestamp",
  "Meal Tag",
] as const;

export type LogColumn = (typeof LOG_COLUMNS)[number];
export type LogRow = Record<LogColumn, string>;

export const MEAL_MARKER = "Meal Logged";
export const DIVIDER_MARKER = "---";

const csvRecordsSchema = z.array(z.record(z.string(), z.string()));

function emptyRow(): LogRow {
  return {
    "Food Item": "",
    Quantity: "",
    Calories: "",
    Protein: "",
    Carbs: "",
    Fats: "",
    Timestamp: "",
    "Meal Tag": "",
  };
}

function macroCells(totals: MacroTotals): Pick<LogRow, "Calories" | "Protein" | "Carbs" | "Fats"> {
  return {
    Calories: String(totals.Calories),
    Protein: String(totals.Protein),
    Carbs: String(totals.Carbs),
    Fats: String(totals.Fats),
  };
}

function readNumber(raw: string | undefined): number {
  const n = Number((raw ?? "").trim());
  return Number.isFinite(n) ? n : 0;
}

function readMacros(record: Record<string, string>): MacroTotals {
  return {
    Calories: readNumber(record.Calories),
    Protein: readNumber(record.Protein),
    Carbs: readNumber(record.Carbs),
    Fats: readNumber(record.Fats),
  };
}

// ==========================================================================
// Serialize
// ==========================================================================

export function mealToRows(meal: LoggedMeal): LogRow[] {
  const itemRows = meal.items.map((item) => ({
    ...emptyRow(),
    "Food Item": item.name,
    Quantity: String(item.quantity),
    ...macroCells(item),
  }));

  const totalsRow: LogRow = {
    ...emptyRow(),
    "Food Item": MEAL_MARKER,
    ...macroCells(meal.totals),
    Timestamp: meal.timestamp,
    "Meal Tag": meal.tag,
  };

  const dividerRow: LogRow = { ...emptyRow(), "Food Item": DIVIDER_MARKER };

  return [...itemRows, totalsRow, dividerRow];
}

export function rowsToCsv(rows: readonly LogRow[], withHeader: boolean): string {
  return stringify(
    rows.map((row) => LOG_COLUMNS.map((col) => row[col])),
    { header: withHeader, columns: [...LOG_COLUMNS] }
  );
}

export function mealsToCsv(meals: readonly LoggedMeal[]): string {
  return rowsToCsv(meals.flatMap(mealToRows), true);
}

// ==========================================================================
// Parse
// ==========================================================================

/**
 * Rebuilds meals from the flat log. Item rows accumulate until a
 * "Meal Logged" row closes the meal; a divider drops anything pending,
 * so each meal owns exactly the rows between the two nearest markers.
 */
export function parseMealLogCsv(content: string): LoggedMeal[] {
  if (!content.trim()) return [];

  const records = csvRecordsSchema.parse(
    parse(content, {
      columns: true,
      skip_empty_lines: true,
      relax_column_count: true,
      bom: true,
    })
  );

  const meals: LoggedMeal[] = [];
  let pending: MealLineItem[] = [];

  for (const record of records) {
    const name = (record["Food Item"] ?? "").trim();

    if (name === MEAL_MARKER) {
      meals.push({
        timestamp: (record.Timestamp ?? "").trim(),
        tag: record["Meal Tag"] ?? "",
        items: pending,
        totals: readMacros(record),
      });
      pending = [];
      continue;
    }

    if (name === DIVIDER_MARKER) {
      if (pending.length) {
        console.warn(`[meal-log] Dropped ${pending.length} item rows with no meal marker`);
      }
      pending = [];
      continue;
    }

    const item: MealLineItem = { name, quantity: readNumber(record.Quantity), ...readMacros(record) };
    pending.push(item);
  }

  if (pending.length) {
    console.warn(`[meal-log] Ignored ${pending.length} trailing item rows with no meal marker`);
  }

  return meals;
}

