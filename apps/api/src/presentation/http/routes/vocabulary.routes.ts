import { Router } from "express";
import { container } from "tsyringe";
import { VocabularyController } from "../controllers/VocabularyController";

/**
 * Vocabulary Routes
 */
export function createVocabularyRouter(): Router {
  const router = Router();
  const controller = container.resolve(VocabularyController);

  router.get("/definitions", (req, res, next) =>
    controller.getDefinitions(req, res, next),
  );
  router.get("/english", controller.lookupField("getEnglishVocab"));
  router.get("/greek", controller.lookupField("getGreekVocab"));
  router.get(
    "/transliteration",
    controller.lookupField("getDefaultTransliteration"),
  );

  return router;
}
