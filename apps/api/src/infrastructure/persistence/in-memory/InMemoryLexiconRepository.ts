import { ILexiconRepository } from "../../../domain/lexicon/repositories/ILexiconRepository";
import {
  LexiconDefinition,
  LexiconFields,
} from "../../../domain/lexicon/entities/LexiconDefinition";

/**
 * In-memory implementation of ILexiconRepository for testing
 *
 * Returns matches in insertion order, the way a table scan would.
 */
export class InMemoryLexiconRepository implements ILexiconRepository {
  private definitions: Map<string, LexiconDefinition> = new Map();

  /** Number of lookups that reached the store */
  public queryCount = 0;

  constructor(definitions: LexiconDefinition[] = []) {
    definitions.forEach((d) => this.add(d));
  }

  async findByKeys(keys: readonly string[]): Promise<LexiconDefinition[]> {
    if (keys.length === 0) {
      return [];
    }
    this.queryCount++;

    const wanted = new Set(keys);
    return Array.from(this.definitions.values()).filter((d) =>
      wanted.has(d.strongNumber),
    );
  }

  async findFieldsByKeys(keys: readonly string[]): Promise<LexiconFields[]> {
    const matches = await this.findByKeys(keys);
    return matches.map(({ original, shortDefinition, simpleTransliteration }) => ({
      original,
      shortDefinition,
      simpleTransliteration,
    }));
  }

  add(definition: LexiconDefinition): void {
    this.definitions.set(definition.strongNumber, definition);
  }
}
