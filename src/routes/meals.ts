import { Router } from "express";
import { z } from "zod";
import { FoodCatalog } from "../services/foodCatalog";
import { resolveSelections, summarizeMeal } from "../services/mealSummary";
import { sendSuccess } from "../middleware/responseHelper";

export const mealSelectionSchema = z.object({
  name: z.string().trim().min(1),
  quantity: z.number().nonnegative().optional(),
});

const mealSummarySchema = z.object({
  items: z.array(mealSelectionSchema).min(1),
});

export function createMealsRouter(catalog: FoodCatalog): Router {
  const router = Router();

  // POST /api/v1/meals/summary: preview totals without logging anything
  router.post("/summary", (req, res, next) => {
    try {
      const parsed = mealSummarySchema.parse(req.body);
      const summary = summarizeMeal(catalog, resolveSelections(catalog, parsed.items));
      sendSuccess(res, summary);
    } catch (err) {
      next(err);
    }
  });

  return router;
}
