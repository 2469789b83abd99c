import { inject, injectable } from "tsyringe";
import { TYPES } from "../../di/types";
import { IIndexSearcher } from "../../domain/search/IIndexSearcher";
import { ILogger } from "../../infrastructure/logging/ILogger";
import { IConfig } from "../../shared/config/IConfig";
import { getAllTermsPrefixedWith } from "./prefixSearch";

/**
 * Search Suggestion Service
 *
 * Prefix completion over the term index, capped at the configured maximum.
 * Indexed terms are lower case, so the prefix is lower-cased to match.
 */
@injectable()
export class SuggestionService {
  private readonly maxSuggestions: number;

  constructor(
    @inject(TYPES.IndexSearcher) private searcher: IIndexSearcher,
    @inject(TYPES.Logger) private logger: ILogger,
    @inject(TYPES.Config) config: IConfig,
  ) {
    this.maxSuggestions = config.maxSuggestions;
  }

  suggest(fieldName: string, prefix: string): string[] {
    const suggestions = getAllTermsPrefixedWith(
      this.searcher,
      fieldName,
      prefix.toLowerCase(),
      this.maxSuggestions,
    );

    this.logger.debug("Suggestions computed", {
      fieldName,
      prefix,
      count: suggestions.length,
    });
    return suggestions;
  }
}
