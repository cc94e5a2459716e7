import { Router } from "express";
import { z } from "zod";
import { MacroTotals, SearchResult, TargetProfile } from "../domain/types";
import { FoodCatalog } from "../services/foodCatalog";
import { createRandom } from "../services/random";
import { SessionStore, setDraft } from "../services/sessionStore";
import { suggestMeal } from "../services/suggestionEngine";
import { round2 } from "../utils/number";
import { sessionFor } from "../middleware/session";
import { sendSuccess } from "../middleware/responseHelper";

export interface SuggestionSettings {
  trials: number;
  maxTrials: number;
  maxItems: number;
  portionSizes: number[];
  timeBudgetMs?: number;
}

// Shapes only: the engine owns the semantic checks (empty portions, trials < 1, ...)
// so its error kinds reach the client.
function suggestionRequestSchema(settings: SuggestionSettings) {
  return z.object({
    targets: z
      .object({
        Calories: z.number(),
        Protein: z.number(),
        Carbs: z.number(),
        Fats: z.number(),
      })
      .partial()
      .strict()
      .optional(),
    trials: z.number().int().max(settings.maxTrials).optional(),
    portionSizes: z.array(z.number()).max(20).optional(),
    maxItems: z.number().int().max(10).optional(),
    seed: z.number().int().optional(),
    applyToDraft: z.boolean().optional(),
  });
}

export interface SuggestedItem extends MacroTotals {
  name: string;
  servingSize: string;
  quantity: number;
}

export interface SuggestionResponse {
  targets: TargetProfile;
  score: number;
  trialsRun: number;
  foundAtTrial: number;
  items: SuggestedItem[];
  totals: MacroTotals;
}

function presentResult(
  targets: TargetProfile,
  result: SearchResult
): SuggestionResponse {
  return {
    targets,
    score: result.score,
    trialsRun: result.trialsRun,
    foundAtTrial: result.foundAtTrial,
    items: result.meal.items.map(({ food, multiplier }) => ({
      name: food.name,
      servingSize: food.servingSize,
      quantity: multiplier,
      Calories: round2(food.caloriesPerUnit * multiplier),
      Protein: round2(food.proteinPerUnit * multiplier),
      Carbs: round2(food.carbsPerUnit * multiplier),
      Fats: round2(food.fatsPerUnit * multiplier),
    })),
    totals: {
      Calories: round2(result.meal.totals.Calories),
      Protein: round2(result.meal.totals.Protein),
      Carbs: round2(result.meal.totals.Carbs),
      Fats: round2(result.meal.totals.Fats),
    },
  };
}

export function createSuggestionsRouter(
  catalog: FoodCatalog,
  sessions: SessionStore,
  settings: SuggestionSettings
): Router {
  const router = Router();
  const schema = suggestionRequestSchema(settings);

  // POST /api/v1/suggestions
  router.post("/", (req, res, next) => {
    try {
      const parsed = schema.parse(req.body ?? {});
      const ctx = sessionFor(req, sessions);
      const targets: TargetProfile = parsed.targets ?? { ...ctx.targets };

      const result = suggestMeal(catalog.list(), targets, {
        trials: parsed.trials ?? settings.trials,
        portionSizes: parsed.portionSizes ?? settings.portionSizes,
        maxItems: parsed.maxItems ?? settings.maxItems,
        random: createRandom(parsed.seed),
        deadline:
          settings.timeBudgetMs !== undefined ? Date.now() + settings.timeBudgetMs : undefined,
      });

      if (parsed.applyToDraft) {
        setDraft(ctx, {
          tag: ctx.draft.tag,
          items: result.meal.items.map(({ food, multiplier }) => ({
            name: food.name,
            quantity: multiplier,
          })),
        });
      }

      sendSuccess(res, presentResult(targets, result));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
