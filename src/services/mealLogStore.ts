// src/services/mealLogStore.ts
// Persistence boundary for the meal log: structured meals in, flat CSV on disk.

import fs from "fs";
import path from "path";
import { LoggedMeal } from "../domain/types";
import { mealToRows, parseMealLogCsv, rowsToCsv } from "./mealLogCsv";

export interface MealLogStore {
  append(meal: LoggedMeal): void;
  readAll(): LoggedMeal[];
  clear(): void;
  /** Raw CSV for download; empty string when nothing is logged. */
  exportCsv(): string;
}

/**
 * Shared CSV handling. Subclasses only move text around: the header is
 * written with the first meal, later meals append their rows.
 */
abstract class CsvMealLogStore implements MealLogStore {
  protected abstract readRaw(): string;
  protected abstract writeRaw(content: string): void;
  protected abstract appendRaw(content: string): void;
  abstract clear(): void;

  append(meal: LoggedMeal): void {
    const rows = mealToRows(meal);
    if (this.readRaw().trim()) {
      this.appendRaw(rowsToCsv(rows, false));
    } else {
      this.writeRaw(rowsToCsv(rows, true));
    }
  }

  readAll(): LoggedMeal[] {
    return parseMealLogCsv(this.readRaw());
  }

  exportCsv(): string {
    return this.readRaw();
  }
}

export class FileMealLogStore extends CsvMealLogStore {
  constructor(private readonly filePath: string) {
    super();
  }

  protected readRaw(): string {
    if (!fs.existsSync(this.filePath)) return "";
    return fs.readFileSync(this.filePath, "utf8");
  }

  protected writeRaw(content: string): void {
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    fs.writeFileSync(this.filePath, content, "utf8");
  }

  protected appendRaw(content: string): void {
    fs.appendFileSync(this.filePath, content, "utf8");
  }

  clear(): void {
    fs.rmSync(this.filePath, { force: true });
    console.log(`[meal-log] Cleared ${this.filePath}`);
  }
}

export class InMemoryMealLogStore extends CsvMealLogStore {
  private content = "";

  protected readRaw(): string {
    return this.content;
  }

  protected writeRaw(content: string): void {
    this.content = content;
  }

  protected appendRaw(content: string): void {
    this.content += content;
  }

  clear(): void {
    this.content = "";
  }
}
