// src/services/suggestionEngine.ts
// Randomized meal-combination search: samples small combinations of catalog
// foods with portion multipliers and keeps the one whose totals sit closest
// to the targets (sum of relative errors).

import {
  CandidateMeal,
  FoodItem,
  MACRO_NAMES,
  MacroTotals,
  PortionedFood,
  SearchResult,
  TargetProfile,
  perUnit,
  zeroTotals,
} from "../domain/types";
import { RandomSource, createRandom, randomInt } from "./random";
import {
  InvalidCatalogError,
  InvalidConfigurationError,
  InvalidTargetsError,
} from "./suggestionErrors";

// ------------------------------------------------------------------
// Defaults
// ------------------------------------------------------------------

export const DEFAULT_TRIALS = 2000;
export const DEFAULT_PORTION_SIZES: readonly number[] = [0.5, 1.0, 1.5];
export const DEFAULT_MAX_ITEMS = 3;
export const DEFAULT_EPSILON = 1e-6;

const MIN_ITEMS = 2;

export interface SuggestOptions {
  trials?: number;
  portionSizes?: readonly number[];
  maxItems?: number;
  epsilon?: number;
  random?: RandomSource;
  /** Epoch ms. The loop stops after the first trial that ends at or past it. */
  deadline?: number;
  clock?: () => number;
}

export interface SamplingConfig {
  portionSizes: readonly number[];
  maxItems: number;
}

// ------------------------------------------------------------------
// Scoring
// ------------------------------------------------------------------

export function computeTotals(items: readonly PortionedFood[]): MacroTotals {
  const totals = zeroTotals();
  for (const { food, multiplier } of items) {
    for (const macro of MACRO_NAMES) {
      totals[macro] += perUnit(food, macro) * multiplier;
    }
  }
  return totals;
}

/**
 * Sum over the macros present in `targets` of |total - target| / (target + epsilon).
 * Macros missing from `targets` never contribute.
 */
export function scoreTotals(
  totals: MacroTotals,
  targets: TargetProfile,
  epsilon: number = DEFAULT_EPSILON
): number {
  let score = 0;
  for (const macro of MACRO_NAMES) {
    const target = targets[macro];
    if (target === undefined) continue;
    score += Math.abs(totals[macro] - target) / (target + epsilon);
  }
  return score;
}

// ------------------------------------------------------------------
// Sampling
// ------------------------------------------------------------------

/**
 * Draws one candidate. Draw order: combination size, then the items
 * (partial Fisher-Yates, no replacement), then one multiplier per item.
 * Expects `maxItems` already clamped to the catalog size.
 */
export function sampleCandidate(
  catalog: readonly FoodItem[],
  config: SamplingConfig,
  random: RandomSource
): CandidateMeal {
  const k = randomInt(random, MIN_ITEMS, config.maxItems);

  const indices = catalog.map((_, i) => i);
  for (let i = 0; i < k; i++) {
    const j = randomInt(random, i, indices.length - 1);
    const tmp = indices[i];
    indices[i] = indices[j];
    indices[j] = tmp;
  }

  const items: PortionedFood[] = [];
  for (let i = 0; i < k; i++) {
    const multiplier =
      config.portionSizes[randomInt(random, 0, config.portionSizes.length - 1)];
    items.push({ food: catalog[indices[i]], multiplier });
  }

  return { items, totals: computeTotals(items) };
}

// ------------------------------------------------------------------
// Validation
// ------------------------------------------------------------------

function isNonNegativeNumber(n: number): boolean {
  return Number.isFinite(n) && n >= 0;
}

function validateCatalog(catalog: readonly FoodItem[]): void {
  if (catalog.length < MIN_ITEMS) {
    throw new InvalidCatalogError(
      `Add at least two food items to the catalog (found ${catalog.length}).`
    );
  }
  for (const food of catalog) {
    const bad = MACRO_NAMES.find((m) => !isNonNegativeNumber(perUnit(food, m)));
    if (bad) {
      throw new InvalidCatalogError(
        `Food "${food.name}" has an invalid ${bad} value; nutrients must be non-negative numbers.`
      );
    }
  }
}

function validateTargets(targets: TargetProfile): void {
  const present = MACRO_NAMES.filter((m) => targets[m] !== undefined);
  if (!present.length) {
    throw new InvalidTargetsError("Set a target for at least one macro.");
  }
  for (const macro of present) {
    const value = targets[macro];
    if (value === undefined || !isNonNegativeNumber(value)) {
      throw new InvalidTargetsError(`Target for ${macro} must be a non-negative number.`);
    }
  }
}

function validateConfig(
  trials: number,
  portionSizes: readonly number[],
  maxItems: number,
  epsilon: number
): void {
  if (!Number.isInteger(trials) || trials < 1) {
    throw new InvalidConfigurationError("trials must be a positive integer.");
  }
  if (!portionSizes.length) {
    throw new InvalidConfigurationError("portionSizes must not be empty.");
  }
  if (!portionSizes.every(isNonNegativeNumber)) {
    throw new InvalidConfigurationError("portionSizes must be non-negative numbers.");
  }
  if (!Number.isInteger(maxItems) || maxItems < MIN_ITEMS) {
    throw new InvalidConfigurationError(`maxItems must be an integer of at least ${MIN_ITEMS}.`);
  }
  if (!Number.isFinite(epsilon) || epsilon <= 0) {
    throw new InvalidConfigurationError("epsilon must be a positive number.");
  }
}

// ------------------------------------------------------------------
// Search
// ------------------------------------------------------------------

/**
 * Runs `trials` independent samples and returns the lowest-scoring one.
 * Ties keep the earlier candidate. Throws a SuggestionError on invalid input
 * before sampling anything; never mutates the catalog or the targets.
 *
 * `maxItems` larger than the catalog is clamped to the catalog size.
 */
export function suggestMeal(
  catalog: readonly FoodItem[],
  targets: TargetProfile,
  options: SuggestOptions = {}
): SearchResult {
  const trials = options.trials ?? DEFAULT_TRIALS;
  const portionSizes = options.portionSizes ?? DEFAULT_PORTION_SIZES;
  const requestedMaxItems = options.maxItems ?? DEFAULT_MAX_ITEMS;
  const epsilon = options.epsilon ?? DEFAULT_EPSILON;

  validateCatalog(catalog);
  validateTargets(targets);
  validateConfig(trials, portionSizes, requestedMaxItems, epsilon);

  // Snapshots: the caller may keep editing its own objects.
  const foods = [...catalog];
  const targetSnapshot: TargetProfile = { ...targets };
  const config: SamplingConfig = {
    portionSizes: [...portionSizes],
    maxItems: Math.min(requestedMaxItems, foods.length),
  };

  const random = options.random ?? createRandom();
  const clock = options.clock ?? Date.now;

  let best: CandidateMeal | null = null;
  let bestScore = Infinity;
  let foundAtTrial = 0;
  let trialsRun = 0;

  while (trialsRun < trials) {
    const candidate = sampleCandidate(foods, config, random);
    const score = scoreTotals(candidate.totals, targetSnapshot, epsilon);
    trialsRun++;

    if (score < bestScore) {
      best = candidate;
      bestScore = score;
      foundAtTrial = trialsRun;
    }

    if (options.deadline !== undefined && clock() >= options.deadline) break;
  }

  // Unreachable after validation: trials >= 1 and a catalog of >= 2 foods.
  if (!best) {
    throw new InvalidCatalogError("No candidate meal could be formed.");
  }

  return { meal: best, score: bestScore, trialsRun, foundAtTrial };
}
