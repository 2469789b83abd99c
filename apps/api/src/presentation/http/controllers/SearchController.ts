import { Request, Response, NextFunction } from "express";
import { inject, injectable } from "tsyringe";
import { z } from "zod";
import { SuggestionService } from "../../../application/search/SuggestionService";
import { TYPES } from "../../../di/types";
import { toHttpError } from "../middleware/toHttpError";

const suggestQuerySchema = z.object({
  field: z.string().min(1),
  prefix: z.string(),
});

/**
 * Search HTTP Controller
 */
@injectable()
export class SearchController {
  constructor(
    @inject(TYPES.SuggestionService)
    private suggestionService: SuggestionService,
  ) {}

  /**
   * GET /api/search/suggest?field=&prefix= - Index terms starting with prefix
   */
  suggest(req: Request, res: Response, next: NextFunction): void {
    try {
      const { field, prefix } = suggestQuerySchema.parse(req.query);

      const suggestions = this.suggestionService.suggest(field, prefix);

      res.status(200).json({
        ok: true,
        suggestions,
      });
    } catch (error) {
      next(toHttpError(error));
    }
  }
}
