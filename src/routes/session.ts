import { Router } from "express";
import { z } from "zod";
import { FoodCatalog } from "../services/foodCatalog";
import { resolveSelections } from "../services/mealSummary";
import { SessionStore, resetDraft, setDraft } from "../services/sessionStore";
import { sessionFor } from "../middleware/session";
import { sendSuccess } from "../middleware/responseHelper";
import { mealSelectionSchema } from "./meals";

const draftSchema = z.object({
  tag: z.string().max(200).default(""),
  items: z.array(mealSelectionSchema).default([]),
});

export function createSessionRouter(catalog: FoodCatalog, sessions: SessionStore): Router {
  const router = Router();

  // POST /api/v1/session: hand out a fresh session id
  router.post("/", (_req, res) => {
    const ctx = sessions.create();
    sendSuccess(res, { sessionId: ctx.id, targets: ctx.targets }, 201);
  });

  // GET /api/v1/session/draft
  router.get("/draft", (req, res, next) => {
    try {
      const ctx = sessionFor(req, sessions);
      sendSuccess(res, { sessionId: ctx.id, draft: ctx.draft });
    } catch (err) {
      next(err);
    }
  });

  // PUT /api/v1/session/draft  { tag?, items? }
  router.put("/draft", (req, res, next) => {
    try {
      const parsed = draftSchema.parse(req.body);
      const ctx = sessionFor(req, sessions);
      const draft = setDraft(ctx, {
        tag: parsed.tag,
        items: resolveSelections(catalog, parsed.items),
      });
      sendSuccess(res, { sessionId: ctx.id, draft });
    } catch (err) {
      next(err);
    }
  });

  // POST /api/v1/session/reset: clear tag and selected items
  router.post("/reset", (req, res, next) => {
    try {
      const ctx = sessionFor(req, sessions);
      sendSuccess(res, { sessionId: ctx.id, draft: resetDraft(ctx) });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
