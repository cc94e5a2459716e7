import { test, expect } from '@playwright/test';
import path from 'path';
import { FoodCatalog, loadFoodCatalog, parseFoodCatalogCsv } from '../src/services/foodCatalog';
import { food } from './helpers';

const HEADER = 'Food Item,Serving Size,Calories (kcal),Protein (g),Carbs (g),Fats (g),Quantity';

test.describe('Food catalog', () => {
  test('drops rows without a name and fills blank cells', () => {
    const csv = [
      HEADER,
      'Oats,40 g,150,5,27,2.5,2',
      ',1 cup,99,1,1,1,1',
      'Rice,1 cup,205,4.3,45,,',
    ].join('\n');

    const foods = parseFoodCatalogCsv(csv);

    expect(foods).toEqual([
      {
        name: 'Oats',
        servingSize: '40 g',
        caloriesPerUnit: 150,
        proteinPerUnit: 5,
        carbsPerUnit: 27,
        fatsPerUnit: 2.5,
        defaultQuantity: 2,
      },
      {
        name: 'Rice',
        servingSize: '1 cup',
        caloriesPerUnit: 205,
        proteinPerUnit: 4.3,
        carbsPerUnit: 45,
        fatsPerUnit: 0,
        defaultQuantity: 1,
      },
    ]);
  });

  test('rejects non-numeric and negative nutrient cells', () => {
    expect(() => parseFoodCatalogCsv(`${HEADER}\nOats,40 g,lots,5,27,2.5,1`)).toThrow(
      /CATALOG_INVALID_ROW: record 1/
    );
    expect(() => parseFoodCatalogCsv(`${HEADER}\nOats,40 g,150,-5,27,2.5,1`)).toThrow(
      /Protein \(g\)/
    );
  });

  test('rejects food names that collide with the meal log markers', () => {
    expect(() => parseFoodCatalogCsv(`${HEADER}\nOats,40 g,150,5,27,2.5,1\nMeal Logged,1 cup,1,1,1,1,1`)).toThrow(
      'CATALOG_INVALID_ROW: record 2 uses the reserved name "Meal Logged"'
    );
    expect(() => parseFoodCatalogCsv(`${HEADER}\n---,1 cup,1,1,1,1,1`)).toThrow(
      'CATALOG_INVALID_ROW: record 1 uses the reserved name "---"'
    );
    expect(() => new FoodCatalog([food('Oats', 150), food('Meal Logged', 1)])).toThrow(
      'CATALOG_INVALID_ROW: food "Meal Logged" uses a reserved name'
    );
  });

  test('keeps the first of two foods with the same name', () => {
    const catalog = new FoodCatalog([food('Oats', 150), food('Oats', 999), food('Milk', 149)]);
    expect(catalog.size).toBe(2);
    expect(catalog.get('Oats')?.caloriesPerUnit).toBe(150);
    expect(catalog.list().map((f) => f.name)).toEqual(['Oats', 'Milk']);
    expect(catalog.get('Pizza')).toBeUndefined();
  });

  test('loads the bundled catalog', () => {
    const catalog = loadFoodCatalog(path.resolve(__dirname, '../data/foods.csv'));
    expect(catalog.size).toBe(30);
    expect(catalog.get('Banana')).toEqual({
      name: 'Banana',
      servingSize: '1 medium',
      caloriesPerUnit: 105,
      proteinPerUnit: 1.3,
      carbsPerUnit: 27,
      fatsPerUnit: 0.4,
      defaultQuantity: 1,
    });
  });
});
