import { test, expect } from '@playwright/test';
import { MACRO_NAMES, MacroTotals } from '../src/domain/types';
import { createSeededRandom } from '../src/services/random';
import {
  computeTotals,
  sampleCandidate,
  scoreTotals,
  suggestMeal,
} from '../src/services/suggestionEngine';
import {
  InvalidCatalogError,
  InvalidConfigurationError,
  InvalidTargetsError,
  SuggestionError,
} from '../src/services/suggestionErrors';
import { ScriptedRandom, food } from './helpers';

const CATALOG = [
  food('Oats', 150, 5, 27, 2.5),
  food('Milk', 149, 8, 12, 8),
  food('Chicken', 165, 31, 0, 3.6),
  food('Rice', 205, 4.3, 45, 0.4),
  food('Almonds', 164, 6, 6, 14),
];

const TARGETS = { Calories: 600, Protein: 40, Carbs: 60, Fats: 20 };

test.describe('Suggestion engine: input validation', () => {
  test('rejects a one-item catalog before drawing anything', () => {
    const random = new ScriptedRandom([]);
    expect(() =>
      suggestMeal([food('Oats', 150)], { Calories: 500 }, { maxItems: 3, random })
    ).toThrow(InvalidCatalogError);
    expect(random.draws).toBe(0);
  });

  test('rejects an empty catalog', () => {
    expect(() => suggestMeal([], { Calories: 500 })).toThrow(InvalidCatalogError);
  });

  test('rejects negative nutrient values in the catalog', () => {
    const catalog = [food('Oats', 150), food('Broken', -5)];
    expect(() => suggestMeal(catalog, { Calories: 500 })).toThrow(InvalidCatalogError);
  });

  test('rejects targets with no macro and negative targets', () => {
    expect(() => suggestMeal(CATALOG, {})).toThrow(InvalidTargetsError);
    expect(() => suggestMeal(CATALOG, { Protein: -1 })).toThrow(InvalidTargetsError);
  });

  test('rejects bad trial counts, portion sets and item limits', () => {
    expect(() => suggestMeal(CATALOG, TARGETS, { trials: 0 })).toThrow(InvalidConfigurationError);
    expect(() => suggestMeal(CATALOG, TARGETS, { trials: 2.5 })).toThrow(InvalidConfigurationError);
    expect(() => suggestMeal(CATALOG, TARGETS, { portionSizes: [] })).toThrow(
      InvalidConfigurationError
    );
    expect(() => suggestMeal(CATALOG, TARGETS, { maxItems: 1 })).toThrow(InvalidConfigurationError);
  });

  test('errors carry their kind', () => {
    try {
      suggestMeal([food('Oats', 150)], { Calories: 500 });
      throw new Error('expected suggestMeal to throw');
    } catch (err) {
      expect(err).toBeInstanceOf(SuggestionError);
      if (err instanceof SuggestionError) {
        expect(err.kind).toBe('InvalidCatalog');
      }
    }
  });
});

test.describe('Suggestion engine: scoring', () => {
  test('sums relative errors over the targeted macros', () => {
    const totals: MacroTotals = { Calories: 450, Protein: 30, Carbs: 60, Fats: 25 };
    // 150/600 + 10/40 + 0/60 + 5/20
    expect(scoreTotals(totals, TARGETS)).toBeCloseTo(0.25 + 0.25 + 0 + 0.25, 6);
  });

  test('macros absent from the targets never contribute', () => {
    const a: MacroTotals = { Calories: 450, Protein: 99, Carbs: 99, Fats: 99 };
    const b: MacroTotals = { Calories: 450, Protein: 0, Carbs: 1000, Fats: 3 };
    expect(scoreTotals(a, { Calories: 500 })).toBeCloseTo(0.1, 9);
    expect(scoreTotals(b, { Calories: 500 })).toBe(scoreTotals(a, { Calories: 500 }));
  });

  test('zero targets give large but finite terms through the epsilon guard', () => {
    const totals: MacroTotals = { Calories: 200, Protein: 20, Carbs: 0.5, Fats: 0 };
    const score = scoreTotals(totals, { Carbs: 0, Fats: 0 });
    expect(Number.isFinite(score)).toBe(true);
    expect(score).toBeCloseTo(500000, 3);
  });

  test('score is zero only for an exact match', () => {
    const exact: MacroTotals = { Calories: 600, Protein: 40, Carbs: 60, Fats: 20 };
    expect(scoreTotals(exact, TARGETS)).toBe(0);

    const random = createSeededRandom(3);
    for (let i = 0; i < 200; i++) {
      const totals: MacroTotals = {
        Calories: random.next() * 1000,
        Protein: random.next() * 100,
        Carbs: random.next() * 100,
        Fats: random.next() * 100,
      };
      expect(scoreTotals(totals, TARGETS)).toBeGreaterThan(0);
    }
  });

  test('multipliers scale all four macros of an item together', () => {
    const totals = computeTotals([
      { food: food('Oats', 150, 5, 27, 2.5), multiplier: 1.5 },
      { food: food('Milk', 149, 8, 12, 8), multiplier: 0.5 },
    ]);
    expect(totals).toEqual({ Calories: 299.5, Protein: 11.5, Carbs: 46.5, Fats: 7.75 });
  });
});

test.describe('Suggestion engine: search', () => {
  test('finds the exact combination when one exists', () => {
    const a = food('A', 100, 10, 0, 0);
    const b = food('B', 0, 0, 0, 0);
    const result = suggestMeal(
      [a, b],
      { Calories: 200, Protein: 20, Carbs: 0, Fats: 0 },
      { portionSizes: [1.0, 2.0], trials: 200, random: createSeededRandom(7) }
    );

    expect(result.score).toBe(0);
    const portionA = result.meal.items.find((i) => i.food.name === 'A');
    expect(portionA?.multiplier).toBe(2.0);
  });

  test('a zero target with a nonzero total is heavily penalized but finite', () => {
    const a = food('A', 100, 10, 1, 0);
    const b = food('B', 0, 0, 0, 0);
    const result = suggestMeal([a, b], { Carbs: 0 }, {
      portionSizes: [1.0, 2.0],
      trials: 20,
      random: createSeededRandom(1),
    });
    // Every candidate holds A, so at least 1 g of carbs against a zero target.
    expect(Number.isFinite(result.score)).toBe(true);
    expect(result.score).toBeGreaterThan(999_999);
  });

  test('same seed, same result', () => {
    const first = suggestMeal(CATALOG, TARGETS, { trials: 300, random: createSeededRandom(42) });
    const second = suggestMeal(CATALOG, TARGETS, { trials: 300, random: createSeededRandom(42) });
    expect(second).toEqual(first);
  });

  test('doubling the trial budget never worsens the best score', () => {
    for (const seed of [1, 2, 3, 11, 99]) {
      const small = suggestMeal(CATALOG, TARGETS, { trials: 100, random: createSeededRandom(seed) });
      const large = suggestMeal(CATALOG, TARGETS, { trials: 200, random: createSeededRandom(seed) });
      expect(large.score).toBeLessThanOrEqual(small.score);
      expect(large.trialsRun).toBe(200);
    }
  });

  test('maxItems above the catalog size is clamped', () => {
    const pair = [food('A', 100), food('B', 50)];
    const result = suggestMeal(pair, { Calories: 300 }, {
      maxItems: 6,
      trials: 30,
      random: createSeededRandom(5),
    });
    expect(result.meal.items).toHaveLength(2);
  });

  test('ties keep the first candidate found', () => {
    const a = food('A', 100);
    const b = food('B', 100);
    // Per trial: size draw, two item draws, two multiplier draws.
    // Trial 1 picks [A, B]; trial 2 swaps to [B, A]. Both score 0.
    const random = new ScriptedRandom([0, 0, 0, 0, 0, 0, 0.9, 0, 0, 0]);
    const result = suggestMeal([a, b], { Calories: 200 }, {
      trials: 2,
      portionSizes: [1],
      maxItems: 2,
      random,
    });

    expect(random.draws).toBe(10);
    expect(result.trialsRun).toBe(2);
    expect(result.foundAtTrial).toBe(1);
    expect(result.meal.items.map((i) => i.food.name)).toEqual(['A', 'B']);
  });

  test('a later candidate wins only when strictly better', () => {
    const a = food('A', 100);
    const b = food('B', 100);
    const random = new ScriptedRandom([0, 0.9, 0, 0, 0, 0, 0, 0, 0, 0]);
    const result = suggestMeal([a, b], { Calories: 200 }, {
      trials: 2,
      portionSizes: [1],
      maxItems: 2,
      random,
    });
    expect(result.meal.items.map((i) => i.food.name)).toEqual(['B', 'A']);
  });

  test('a deadline truncates the loop but keeps the best so far', () => {
    let tick = 0;
    const result = suggestMeal(CATALOG, TARGETS, {
      trials: 100,
      random: createSeededRandom(8),
      deadline: 3,
      clock: () => ++tick,
    });
    expect(result.trialsRun).toBe(3);
    expect(result.foundAtTrial).toBeLessThanOrEqual(3);
  });

  test('at least one trial runs even when the deadline has passed', () => {
    const result = suggestMeal(CATALOG, TARGETS, {
      trials: 100,
      random: createSeededRandom(8),
      deadline: 0,
      clock: () => 1000,
    });
    expect(result.trialsRun).toBe(1);
    expect(result.foundAtTrial).toBe(1);
  });

  test('leaves the catalog and targets untouched', () => {
    const catalog = Object.freeze([...CATALOG]);
    const targets = Object.freeze({ ...TARGETS });
    suggestMeal(catalog, targets, { trials: 50, random: createSeededRandom(4) });
    expect(catalog.map((f) => f.name)).toEqual(CATALOG.map((f) => f.name));
    expect(targets).toEqual(TARGETS);
  });
});

test.describe('Suggestion engine: sampling', () => {
  test('candidate size, distinct items and multipliers stay in bounds', () => {
    const portionSizes = [0.5, 1, 1.5];
    const random = createSeededRandom(2024);
    const sizes = new Set<number>();

    for (let i = 0; i < 500; i++) {
      const candidate = sampleCandidate(CATALOG, { portionSizes, maxItems: 4 }, random);
      const names = candidate.items.map((item) => item.food.name);

      expect(names.length).toBeGreaterThanOrEqual(2);
      expect(names.length).toBeLessThanOrEqual(4);
      expect(new Set(names).size).toBe(names.length);
      for (const item of candidate.items) {
        expect(portionSizes).toContain(item.multiplier);
      }
      for (const macro of MACRO_NAMES) {
        expect(candidate.totals[macro]).toBeGreaterThanOrEqual(0);
      }
      sizes.add(names.length);
    }

    expect([...sizes].sort()).toEqual([2, 3, 4]);
  });
});
