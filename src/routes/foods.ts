import { Router } from "express";
import { FoodCatalog } from "../services/foodCatalog";
import { sendSuccess } from "../middleware/responseHelper";

export function createFoodsRouter(catalog: FoodCatalog): Router {
  const router = Router();

  // GET /api/v1/foods
  router.get("/", (_req, res) => {
    sendSuccess(res, { count: catalog.size, foods: catalog.list() });
  });

  return router;
}
