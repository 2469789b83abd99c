import { Router } from "express";
import { container } from "tsyringe";
import { SearchController } from "../controllers/SearchController";

/**
 * Search Routes
 */
export function createSearchRouter(): Router {
  const router = Router();
  const controller = container.resolve(SearchController);

  // GET /api/search/suggest - Prefix suggestions over the term index
  router.get("/suggest", (req, res, next) =>
    controller.suggest(req, res, next),
  );

  return router;
}
