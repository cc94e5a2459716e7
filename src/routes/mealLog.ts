import { Router } from "express";
import { z } from "zod";
import { FoodCatalog } from "../services/foodCatalog";
import { buildDailyReports } from "../services/dailyReport";
import { saveMeal } from "../services/mealLog";
import { MealLogStore } from "../services/mealLogStore";
import { resolveSelections } from "../services/mealSummary";
import { SessionStore, resetDraft } from "../services/sessionStore";
import { sessionFor } from "../middleware/session";
import { sendNotFound, sendSuccess } from "../middleware/responseHelper";
import { mealSelectionSchema } from "./meals";

export const LOG_DOWNLOAD_NAME = "nutrition_log.csv";

const saveMealSchema = z.object({
  tag: z.string().max(200).optional(),
  items: z.array(mealSelectionSchema).min(1).optional(),
});

export function createMealLogRouter(
  catalog: FoodCatalog,
  store: MealLogStore,
  sessions: SessionStore
): Router {
  const router = Router();

  // POST /api/v1/log: save the given items, or the session draft
  router.post("/", (req, res, next) => {
    try {
      const parsed = saveMealSchema.parse(req.body ?? {});
      const ctx = sessionFor(req, sessions);

      const items = parsed.items ? resolveSelections(catalog, parsed.items) : ctx.draft.items;
      const tag = parsed.tag ?? ctx.draft.tag;

      const meal = saveMeal(catalog, store, { tag, items });
      resetDraft(ctx);

      sendSuccess(res, { meal }, 201);
    } catch (err) {
      next(err);
    }
  });

  // GET /api/v1/log: meals grouped by day, with totals against session targets
  router.get("/", (req, res, next) => {
    try {
      const ctx = sessionFor(req, sessions);
      const days = buildDailyReports(store.readAll(), ctx.targets);
      sendSuccess(res, { targets: ctx.targets, days });
    } catch (err) {
      next(err);
    }
  });

  // GET /api/v1/log/download
  router.get("/download", (_req, res, next) => {
    try {
      const csv = store.exportCsv();
      if (!csv.trim()) {
        sendNotFound(res, "Meal log is empty");
        return;
      }
      res.attachment(LOG_DOWNLOAD_NAME);
      res.type("text/csv");
      res.send(csv);
    } catch (err) {
      next(err);
    }
  });

  // DELETE /api/v1/log
  router.delete("/", (_req, res, next) => {
    try {
      store.clear();
      sendSuccess(res, { cleared: true });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
