import { Request, Response, NextFunction } from "express";
import { inject, injectable } from "tsyringe";
import { z } from "zod";
import { VocabularyService } from "../../../application/vocabulary/VocabularyService";
import { TYPES } from "../../../di/types";
import { toHttpError } from "../middleware/toHttpError";

const vocabQuerySchema = z.object({
  ids: z.string().optional(),
});

type FieldLookup = "getEnglishVocab" | "getGreekVocab" | "getDefaultTransliteration";

/**
 * Vocabulary HTTP Controller
 *
 * Handles HTTP requests for lexicon lookups by strong number
 */
@injectable()
export class VocabularyController {
  constructor(
    @inject(TYPES.VocabularyService)
    private vocabularyService: VocabularyService,
  ) {}

  /**
   * GET /api/vocabulary/definitions?ids= - Whole lexicon records
   */
  async getDefinitions(
    req: Request,
    res: Response,
    next: NextFunction,
  ): Promise<void> {
    try {
      const { ids } = vocabQuerySchema.parse(req.query);

      const definitions = await this.vocabularyService.getDefinitions(ids);

      res.status(200).json({
        ok: true,
        definitions,
      });
    } catch (error) {
      next(toHttpError(error));
    }
  }

  /**
   * GET /api/vocabulary/{english,greek,transliteration}?ids=
   */
  lookupField(lookup: FieldLookup) {
    return async (
      req: Request,
      res: Response,
      next: NextFunction,
    ): Promise<void> => {
      try {
        const { ids } = vocabQuerySchema.parse(req.query);

        const vocab = await this.vocabularyService[lookup](ids ?? "");

        res.status(200).json({
          ok: true,
          vocab,
        });
      } catch (error) {
        next(toHttpError(error));
      }
    };
  }
}
