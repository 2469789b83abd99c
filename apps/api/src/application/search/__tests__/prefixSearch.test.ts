import { describe, it, expect } from "@jest/globals";
import { getAllTermsPrefixedWith } from "../prefixSearch";
import { SuggestionService } from "../SuggestionService";
import { InMemoryTermIndex } from "../../../infrastructure/search/InMemoryTermIndex";
import { MockLogger } from "../../../infrastructure/logging/__tests__/MockLogger";
import {
  IIndexSearcher,
  TermEnum,
} from "../../../domain/search/IIndexSearcher";
import { InternalError } from "../../../shared/errors/InternalError";
import { createTestConfig } from "../../../__tests__/helpers/testConfig";

/** Enumerates a fixed list in the given order, regardless of prefix */
class ListSearcher implements IIndexSearcher {
  constructor(private readonly terms: string[]) {}

  prefixTerms(): TermEnum {
    let position = 0;
    const terms = this.terms;
    return {
      term: () => terms[position] ?? null,
      next: () => ++position < terms.length,
    };
  }
}

describe("getAllTermsPrefixedWith", () => {
  const index = InMemoryTermIndex.fromTerms({
    name: ["abraham", "abram", "isaac"],
    numbered: ["a1", "a2", "a3", "a4", "a5"],
  });

  it("should return terms starting with the prefix", () => {
    expect(getAllTermsPrefixedWith(index, "name", "abr", 10)).toEqual([
      "abraham",
      "abram",
    ]);
  });

  it("should return an empty list when nothing matches", () => {
    expect(getAllTermsPrefixedWith(index, "name", "zz", 10)).toEqual([]);
  });

  it("should return an empty list for an unknown field", () => {
    expect(getAllTermsPrefixedWith(index, "missing", "a", 10)).toEqual([]);
  });

  it("should stop at the maximum count", () => {
    expect(getAllTermsPrefixedWith(index, "numbered", "a", 3)).toEqual([
      "a1",
      "a2",
      "a3",
    ]);
  });

  it("should keep the enumerator's order", () => {
    const searcher = new ListSearcher(["beta", "alpha"]);

    expect(getAllTermsPrefixedWith(searcher, "any", "", 10)).toEqual([
      "beta",
      "alpha",
    ]);
  });

  it("should wrap searcher failures in InternalError", () => {
    const broken: IIndexSearcher = {
      prefixTerms: () => {
        throw new Error("disk gone");
      },
    };

    expect(() => getAllTermsPrefixedWith(broken, "name", "a", 10)).toThrow(
      InternalError,
    );
    expect(() => getAllTermsPrefixedWith(broken, "name", "a", 10)).toThrow(
      "Failed to read index terms: disk gone",
    );
  });

  it("should wrap failures while advancing", () => {
    const broken: IIndexSearcher = {
      prefixTerms: () => ({
        term: () => "abraham",
        next: () => {
          throw new Error("segment corrupt");
        },
      }),
    };

    expect(() => getAllTermsPrefixedWith(broken, "name", "a", 10)).toThrow(
      "Failed to read index terms: segment corrupt",
    );
  });
});

describe("SuggestionService", () => {
  it("should cap suggestions at the configured maximum", () => {
    const index = InMemoryTermIndex.fromTerms({
      gloss: ["father", "fear", "feast", "fig"],
    });
    const service = new SuggestionService(
      index,
      new MockLogger(),
      createTestConfig({ maxSuggestions: 2 }),
    );

    expect(service.suggest("gloss", "f")).toEqual(["father", "fear"]);
  });

  it("should match lower-case index terms whatever the prefix case", () => {
    const index = InMemoryTermIndex.fromDocuments([
      { gloss: "God" },
      { gloss: "goodwill" },
    ]);
    const service = new SuggestionService(
      index,
      new MockLogger(),
      createTestConfig(),
    );

    expect(service.suggest("gloss", "God")).toEqual(["god"]);
    expect(service.suggest("gloss", "GO")).toEqual(["god", "goodwill"]);
  });
});
