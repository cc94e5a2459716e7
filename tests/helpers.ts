// Shared builders for the specs.

import { Server } from "http";
import { AppDeps, createApp } from "../src/app";
import { FoodItem } from "../src/domain/types";
import { FoodCatalog } from "../src/services/foodCatalog";
import { InMemoryMealLogStore } from "../src/services/mealLogStore";
import { RandomSource } from "../src/services/random";
import { SessionStore } from "../src/services/sessionStore";

export function food(
  name: string,
  calories: number,
  protein = 0,
  carbs = 0,
  fats = 0,
  defaultQuantity = 1
): FoodItem {
  return {
    name,
    servingSize: "1 serving",
    caloriesPerUnit: calories,
    proteinPerUnit: protein,
    carbsPerUnit: carbs,
    fatsPerUnit: fats,
    defaultQuantity,
  };
}

/** Replays the given values in order and counts draws. Throws when exhausted. */
export class ScriptedRandom implements RandomSource {
  draws = 0;

  constructor(private readonly values: number[]) {}

  next(): number {
    if (this.draws >= this.values.length) {
      throw new Error(`scripted random exhausted after ${this.values.length} draws`);
    }
    return this.values[this.draws++];
  }
}

export const TEST_FOODS: FoodItem[] = [
  food("Oats", 150, 5, 27, 2.5),
  food("Milk", 149, 8, 12, 8),
  food("Chicken", 165, 31, 0, 3.6, 1.5),
  food("Rice", 205, 4.3, 45, 0.4),
];

export const TEST_TARGETS = { Calories: 2500, Protein: 150, Carbs: 200, Fats: 70 };

export function testDeps(overrides: Partial<AppDeps> = {}): AppDeps {
  return {
    catalog: new FoodCatalog(TEST_FOODS),
    mealLog: new InMemoryMealLogStore(),
    sessions: new SessionStore(TEST_TARGETS),
    suggestion: { trials: 200, maxTrials: 5000, maxItems: 3, portionSizes: [0.5, 1, 1.5] },
    rateLimit: { windowMs: 60000, maxRequests: 1000 },
    requestLogging: false,
    ...overrides,
  };
}

export interface RunningServer {
  baseURL: string;
  close(): Promise<void>;
}

/** Starts the app on an ephemeral loopback port inside the test process. */
export function startServer(deps: AppDeps): Promise<RunningServer> {
  const app = createApp(deps);
  return new Promise((resolve, reject) => {
    const server: Server = app.listen(0, "127.0.0.1", () => {
      const address = server.address();
      if (!address || typeof address === "string") {
        reject(new Error("server has no TCP address"));
        return;
      }
      const { port } = address;
      resolve({
        baseURL: `http://127.0.0.1:${port}`,
        close: () =>
          new Promise<void>((done, fail) => {
            server.closeAllConnections();
            server.close((err) => (err ? fail(err) : done()));
          }),
      });
    });
    server.on("error", reject);
  });
}
