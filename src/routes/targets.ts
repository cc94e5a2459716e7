import { Router } from "express";
import { z } from "zod";
import { SessionStore, updateTargets } from "../services/sessionStore";
import { sessionFor } from "../middleware/session";
import { sendSuccess } from "../middleware/responseHelper";

// Zero or negative targets are user-input errors at this layer.
const updateTargetsSchema = z
  .object({
    Calories: z.number().positive(),
    Protein: z.number().positive(),
    Carbs: z.number().positive(),
    Fats: z.number().positive(),
  })
  .partial()
  .strict();

export function createTargetsRouter(sessions: SessionStore): Router {
  const router = Router();

  // GET /api/v1/targets
  router.get("/", (req, res, next) => {
    try {
      const ctx = sessionFor(req, sessions);
      sendSuccess(res, { sessionId: ctx.id, targets: ctx.targets });
    } catch (err) {
      next(err);
    }
  });

  // PUT /api/v1/targets  { Calories?, Protein?, Carbs?, Fats? }
  router.put("/", (req, res, next) => {
    try {
      const patch = updateTargetsSchema.parse(req.body);
      const ctx = sessionFor(req, sessions);
      const targets = updateTargets(ctx, patch);
      sendSuccess(res, { sessionId: ctx.id, targets });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
