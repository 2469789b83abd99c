import { describe, it, expect, beforeEach } from "@jest/globals";
import { VocabularyService } from "../VocabularyService";
import { InMemoryLexiconRepository } from "../../../infrastructure/persistence/in-memory/InMemoryLexiconRepository";
import { MockLogger } from "../../../infrastructure/logging/__tests__/MockLogger";
import { ILexiconRepository } from "../../../domain/lexicon/repositories/ILexiconRepository";
import {
  EntityNotFoundError,
  ValidationError,
} from "../../../shared/errors/DomainError";
import { InternalError } from "../../../shared/errors/InternalError";
import { createTestConfig } from "../../../__tests__/helpers/testConfig";
import {
  AB,
  AGAPE,
  ALL_DEFINITIONS,
  LOGOS,
} from "../../../__tests__/helpers/lexiconFixtures";

class FailingLexiconRepository implements ILexiconRepository {
  async findByKeys(): Promise<never> {
    throw new InternalError("Lexicon lookup failed: connection reset");
  }

  async findFieldsByKeys(): Promise<never> {
    throw new InternalError("Lexicon lookup failed: connection reset");
  }
}

describe("VocabularyService", () => {
  let repository: InMemoryLexiconRepository;
  let logger: MockLogger;
  let service: VocabularyService;

  beforeEach(() => {
    repository = new InMemoryLexiconRepository(ALL_DEFINITIONS);
    logger = new MockLogger();
    service = new VocabularyService(repository, logger, createTestConfig());
  });

  describe("getDefinitions", () => {
    it("should throw ValidationError for blank identifiers", async () => {
      await expect(service.getDefinitions("")).rejects.toThrow(
        ValidationError,
      );
      await expect(service.getDefinitions(null)).rejects.toThrow(
        "Vocab identifiers was null",
      );
      await expect(service.getDefinitions("   ")).rejects.toThrow(
        ValidationError,
      );
    });

    it("should return records in store order", async () => {
      const result = await service.getDefinitions("strong:G3056 strong:G26");

      expect(result).toEqual([AGAPE, LOGOS]);
    });

    it("should return an empty list without querying when nothing parses", async () => {
      const result = await service.getDefinitions("hello world");

      expect(result).toEqual([]);
      expect(repository.queryCount).toBe(0);
    });

    it("should log the number of records found", async () => {
      await service.getDefinitions("strong:G26");

      expect(logger.infoCalls).toHaveLength(1);
      expect(logger.infoCalls[0].message).toBe("Definitions fetched");
      expect(logger.infoCalls[0].context).toEqual({
        keys: ["G0026"],
        found: 1,
      });
    });

    it("should reject malformed keys when configured to", async () => {
      service = new VocabularyService(
        repository,
        logger,
        createTestConfig({ malformedKeyPolicy: "reject" }),
      );

      await expect(service.getDefinitions("strong:GX")).rejects.toThrow(
        ValidationError,
      );
    });
  });

  describe("field lookups", () => {
    it("should concatenate English glosses without a separator", async () => {
      expect(await service.getEnglishVocab("strong:G26 strong:H1")).toBe(
        "lovefather",
      );
    });

    it("should return the original spelling", async () => {
      expect(await service.getGreekVocab("strong:G26")).toBe(AGAPE.original);
    });

    it("should return the transliteration", async () => {
      expect(await service.getDefaultTransliteration("strong:G3056")).toBe(
        "logos",
      );
    });

    it("should follow store order rather than input order", async () => {
      expect(
        await service.getDefaultTransliteration("strong:H1 strong:G26"),
      ).toBe(`${AGAPE.simpleTransliteration}${AB.simpleTransliteration}`);
    });

    it("should return an empty string when nothing parses", async () => {
      expect(await service.getEnglishVocab("G26 lemma")).toBe("");
      expect(await service.getGreekVocab("")).toBe("");
      expect(repository.queryCount).toBe(0);
    });

    it("should pass the input through when no record matches", async () => {
      expect(await service.getEnglishVocab("strong:G9999")).toBe(
        "strong:G9999",
      );
      expect(logger.warnCalls[0].message).toBe(
        "No lexicon definitions matched",
      );
      expect(logger.warnCalls[0].context).toEqual({
        keys: ["G9999"],
        policy: "passthrough",
      });
    });

    it("should return an empty string under the empty policy", async () => {
      service = new VocabularyService(
        repository,
        logger,
        createTestConfig({ noMatchPolicy: "empty" }),
      );

      expect(await service.getEnglishVocab("strong:G9999")).toBe("");
    });

    it("should throw EntityNotFoundError under the error policy", async () => {
      service = new VocabularyService(
        repository,
        logger,
        createTestConfig({ noMatchPolicy: "error" }),
      );

      await expect(service.getGreekVocab("strong:G9999")).rejects.toThrow(
        EntityNotFoundError,
      );
      await expect(service.getGreekVocab("strong:G9999")).rejects.toThrow(
        "LexiconDefinition with id G9999 not found",
      );
    });

    it("should propagate store failures", async () => {
      service = new VocabularyService(
        new FailingLexiconRepository(),
        logger,
        createTestConfig(),
      );

      await expect(service.getEnglishVocab("strong:G26")).rejects.toThrow(
        InternalError,
      );
    });
  });
});
