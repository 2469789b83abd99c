import { inject, injectable } from "tsyringe";
import { TYPES } from "../../di/types";
import { ILexiconRepository } from "../../domain/lexicon/repositories/ILexiconRepository";
import { LexiconDefinition } from "../../domain/lexicon/entities/LexiconDefinition";
import {
  extractField,
  LexiconField,
} from "../../domain/lexicon/services/FieldExtractor";
import { StrongKeyParser } from "../../domain/lexicon/services/StrongKeyParser";
import { ILogger } from "../../infrastructure/logging/ILogger";
import { IConfig, NoMatchPolicy } from "../../shared/config/IConfig";
import {
  EntityNotFoundError,
  ValidationError,
} from "../../shared/errors/DomainError";

/**
 * Vocabulary Service
 *
 * Answers vocabulary queries for compound strong-number identifiers such as
 * "strong:G123 strong:H45". All lookups are read-only.
 */
@injectable()
export class VocabularyService {
  private readonly keyParser: StrongKeyParser;
  private readonly noMatchPolicy: NoMatchPolicy;

  constructor(
    @inject(TYPES.LexiconRepository)
    private lexiconRepository: ILexiconRepository,
    @inject(TYPES.Logger) private logger: ILogger,
    @inject(TYPES.Config) config: IConfig,
  ) {
    this.keyParser = new StrongKeyParser(logger, {
      malformedKeyPolicy: config.malformedKeyPolicy,
    });
    this.noMatchPolicy = config.noMatchPolicy;
  }

  /**
   * Whole lexicon records for every recognized identifier, in store order
   */
  async getDefinitions(
    vocabIdentifiers: string | null | undefined,
  ): Promise<LexiconDefinition[]> {
    if (!vocabIdentifiers || vocabIdentifiers.trim() === "") {
      throw new ValidationError(
        "Vocab identifiers was null",
        "vocabIdentifiers",
      );
    }

    const keys = this.keyParser.parse(vocabIdentifiers);
    if (keys.length === 0) {
      this.logger.debug("No strong numbers in identifiers", {
        vocabIdentifiers,
      });
      return [];
    }

    const definitions = await this.lexiconRepository.findByKeys(keys);
    this.logger.info("Definitions fetched", {
      keys,
      found: definitions.length,
    });
    return definitions;
  }

  async getEnglishVocab(vocabIdentifiers: string): Promise<string> {
    return this.getDataFromLexiconDefinition(
      vocabIdentifiers,
      LexiconField.ShortGloss,
    );
  }

  async getGreekVocab(vocabIdentifiers: string): Promise<string> {
    return this.getDataFromLexiconDefinition(
      vocabIdentifiers,
      LexiconField.OriginalSpelling,
    );
  }

  async getDefaultTransliteration(vocabIdentifiers: string): Promise<string> {
    return this.getDataFromLexiconDefinition(
      vocabIdentifiers,
      LexiconField.Transliteration,
    );
  }

  private async getDataFromLexiconDefinition(
    vocabIdentifiers: string,
    field: LexiconField,
  ): Promise<string> {
    const keys = this.keyParser.parse(vocabIdentifiers);
    if (keys.length === 0) {
      return "";
    }

    const definitions = await this.lexiconRepository.findFieldsByKeys(keys);
    if (definitions.length === 0) {
      return this.noMatch(vocabIdentifiers, keys);
    }

    return definitions.map((d) => extractField(d, field)).join("");
  }

  private noMatch(vocabIdentifiers: string, keys: string[]): string {
    this.logger.warn("No lexicon definitions matched", {
      keys,
      policy: this.noMatchPolicy,
    });

    switch (this.noMatchPolicy) {
      case "passthrough":
        return vocabIdentifiers;
      case "empty":
        return "";
      case "error":
        throw new EntityNotFoundError("LexiconDefinition", keys.join(","));
    }
  }
}
