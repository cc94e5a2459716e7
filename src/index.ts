import "dotenv/config";
import path from "path";

import { createApp } from "./app";
import { validateEnvironment } from "./middleware/validateEnv";
import { loadFoodCatalog } from "./services/foodCatalog";
import { FileMealLogStore } from "./services/mealLogStore";
import { SessionStore } from "./services/sessionStore";

function main(): void {
  const env = validateEnvironment();

  const catalog = loadFoodCatalog(path.resolve(process.cwd(), env.FOOD_CATALOG_PATH));
  const mealLog = new FileMealLogStore(path.resolve(process.cwd(), env.MEAL_LOG_PATH));
  const defaultTargets = {
    Calories: env.DEFAULT_CALORIES_TARGET,
    Protein: env.DEFAULT_PROTEIN_TARGET,
    Carbs: env.DEFAULT_CARBS_TARGET,
    Fats: env.DEFAULT_FAT_TARGET,
  };
  const sessions = new SessionStore(defaultTargets, {
    idleTtlMs: env.SESSION_IDLE_TTL_MS,
    maxSessions: env.MAX_SESSIONS,
  });

  const app = createApp({
    catalog,
    mealLog,
    sessions,
    suggestion: {
      trials: env.SUGGEST_TRIALS,
      maxTrials: env.SUGGEST_MAX_TRIALS,
      maxItems: env.SUGGEST_MAX_ITEMS,
      portionSizes: env.SUGGEST_PORTION_SIZES,
      timeBudgetMs: env.SUGGEST_TIME_BUDGET_MS,
    },
    rateLimit: {
      windowMs: env.RATE_LIMIT_WINDOW_MS,
      maxRequests: env.RATE_LIMIT_MAX_REQUESTS,
    },
    allowedOrigins: env.ALLOWED_ORIGINS
      ? env.ALLOWED_ORIGINS.split(",").map((s) => s.trim())
      : undefined,
    requestLogging: env.NODE_ENV !== "test",
  });

  app.listen(env.PORT, () => {
    console.log(`Meal planner backend listening on port ${env.PORT}`);
  });
}

try {
  main();
} catch (err) {
  console.error("Startup failed:", err);
  process.exit(1);
}
