import express, { Express, Request, Response } from "express";
import cors from "cors";
import morgan from "morgan";

import { FoodCatalog } from "./services/foodCatalog";
import { MealLogStore } from "./services/mealLogStore";
import { SessionStore } from "./services/sessionStore";
import { rateLimitMiddleware } from "./middleware/rateLimiter";
import { errorHandler } from "./middlewares/errorHandler";
import { createFoodsRouter } from "./routes/foods";
import { createMealsRouter } from "./routes/meals";
import { createTargetsRouter } from "./routes/targets";
import { SuggestionSettings, createSuggestionsRouter } from "./routes/suggestions";
import { createSessionRouter } from "./routes/session";
import { createMealLogRouter } from "./routes/mealLog";

export interface AppDeps {
  catalog: FoodCatalog;
  mealLog: MealLogStore;
  sessions: SessionStore;
  suggestion: SuggestionSettings;
  rateLimit: { windowMs: number; maxRequests: number };
  allowedOrigins?: string[];
  requestLogging?: boolean;
}

const DEFAULT_ORIGINS = ["http://localhost:3000", "http://127.0.0.1:3000"];

export function createApp(deps: AppDeps): Express {
  const app = express();

  // ======================================================================
  //                     CORE MIDDLEWARE (CORS, LOGGING, BODY)
  // ======================================================================

  const allowlist = new Set<string>(deps.allowedOrigins ?? DEFAULT_ORIGINS);

  app.use(
    cors({
      origin: (origin, cb) => {
        // Allow server-to-server/no-origin requests
        if (!origin) return cb(null, true);
        if (allowlist.has(origin)) return cb(null, true);
        return cb(new Error(`CORS blocked: ${origin}`));
      },
      methods: ["GET", "POST", "OPTIONS", "DELETE", "PUT"],
      allowedHeaders: ["Content-Type", "Accept", "X-Session-Id"],
    })
  );

  if (deps.requestLogging ?? true) {
    app.use(morgan("dev"));
  }

  app.use(express.json({ limit: "1mb" }));

  // ======================================================================
  //                       HEALTH CHECK + ROUTES
  // ======================================================================

  app.get("/health", (_req: Request, res: Response) => {
    res.status(200).json({ ok: true, foods: deps.catalog.size });
  });

  app.use("/api/v1/foods", createFoodsRouter(deps.catalog));
  app.use("/api/v1/meals", createMealsRouter(deps.catalog));
  app.use("/api/v1/targets", createTargetsRouter(deps.sessions));
  app.use(
    "/api/v1/suggestions",
    rateLimitMiddleware({
      ...deps.rateLimit,
      message: "Suggestion rate limit exceeded",
    }),
    createSuggestionsRouter(deps.catalog, deps.sessions, deps.suggestion)
  );
  app.use("/api/v1/session", createSessionRouter(deps.catalog, deps.sessions));
  app.use("/api/v1/log", createMealLogRouter(deps.catalog, deps.mealLog, deps.sessions));

  // ======================================================================
  //                 NOT FOUND HANDLER (clean JSON 404)
  // ======================================================================

  app.use((req: Request, res: Response) => {
    res.status(404).json({
      ok: false,
      error: "Not Found",
      path: req.originalUrl,
      method: req.method,
    });
  });

  app.use(errorHandler);

  return app;
}
