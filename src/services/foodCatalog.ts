// src/services/foodCatalog.ts
// Food catalog loaded once from CSV and read-only afterwards.

import fs from "fs";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import { FoodItem } from "../domain/types";
import { DIVIDER_MARKER, MEAL_MARKER } from "./mealLogCsv";

// ==========================================================================
// CSV Column Mappings
// ==========================================================================

export const CATALOG_COLUMNS = {
  name: "Food Item",
  servingSize: "Serving Size",
  calories: "Calories (kcal)",
  protein: "Protein (g)",
  carbs: "Carbs (g)",
  fats: "Fats (g)",
  quantity: "Quantity",
} as const;

const csvRecordsSchema = z.array(z.record(z.string(), z.string()));

// Item rows with these names would read back as meal log markers.
const RESERVED_NAMES: ReadonlySet<string> = new Set([MEAL_MARKER, DIVIDER_MARKER]);

export function isReservedFoodName(name: string): boolean {
  return RESERVED_NAMES.has(name.trim());
}

function readNumber(
  raw: string | undefined,
  column: string,
  recordNo: number,
  fallback: number
): number {
  const text = (raw ?? "").trim();
  if (!text) return fallback;
  const n = Number(text);
  if (!Number.isFinite(n) || n < 0) {
    throw new Error(
      `CATALOG_INVALID_ROW: record ${recordNo} has a bad "${column}" value "${text}"`
    );
  }
  return n;
}

/**
 * Parses catalog CSV text. Records with no food name are dropped; blank
 * nutrient cells read as 0 and a blank quantity as 1.
 */
export function parseFoodCatalogCsv(content: string): FoodItem[] {
  const records = csvRecordsSchema.parse(
    parse(content, {
      columns: true,
      skip_empty_lines: true,
      trim: true,
      relax_column_count: true,
      bom: true,
    })
  );

  const foods: FoodItem[] = [];
  records.forEach((record, idx) => {
    const recordNo = idx + 1;
    const name = (record[CATALOG_COLUMNS.name] ?? "").trim();
    if (!name) return;
    if (isReservedFoodName(name)) {
      throw new Error(`CATALOG_INVALID_ROW: record ${recordNo} uses the reserved name "${name}"`);
    }

    foods.push({
      name,
      servingSize: (record[CATALOG_COLUMNS.servingSize] ?? "").trim(),
      caloriesPerUnit: readNumber(record[CATALOG_COLUMNS.calories], CATALOG_COLUMNS.calories, recordNo, 0),
      proteinPerUnit: readNumber(record[CATALOG_COLUMNS.protein], CATALOG_COLUMNS.protein, recordNo, 0),
      carbsPerUnit: readNumber(record[CATALOG_COLUMNS.carbs], CATALOG_COLUMNS.carbs, recordNo, 0),
      fatsPerUnit: readNumber(record[CATALOG_COLUMNS.fats], CATALOG_COLUMNS.fats, recordNo, 0),
      defaultQuantity: readNumber(record[CATALOG_COLUMNS.quantity], CATALOG_COLUMNS.quantity, recordNo, 1),
    });
  });

  return foods;
}

// ==========================================================================
// Catalog
// ==========================================================================

export class FoodCatalog {
  private readonly foods: FoodItem[] = [];
  private readonly byName = new Map<string, FoodItem>();

  constructor(foods: readonly FoodItem[]) {
    for (const food of foods) {
      if (isReservedFoodName(food.name)) {
        throw new Error(`CATALOG_INVALID_ROW: food "${food.name}" uses a reserved name`);
      }
      if (this.byName.has(food.name)) {
        console.warn(`[catalog] Duplicate food "${food.name}" ignored`);
        continue;
      }
      const frozen = Object.freeze({ ...food });
      this.byName.set(food.name, frozen);
      this.foods.push(frozen);
    }
  }

  get size(): number {
    return this.foods.length;
  }

  list(): readonly FoodItem[] {
    return this.foods;
  }

  get(name: string): FoodItem | undefined {
    return this.byName.get(name);
  }
}

export function loadFoodCatalog(filePath: string): FoodCatalog {
  const content = fs.readFileSync(filePath, "utf8");
  const catalog = new FoodCatalog(parseFoodCatalogCsv(content));
  console.log(`[catalog] Loaded ${catalog.size} foods from ${filePath}`);
  return catalog;
}
