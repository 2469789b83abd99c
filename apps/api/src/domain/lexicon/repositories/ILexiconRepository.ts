import {
  LexiconDefinition,
  LexiconFields,
} from "../entities/LexiconDefinition";

/**
 * Lexicon Repository Interface
 *
 * Read-only access to lexicon definitions keyed by normalized strong number.
 * Both lookups issue one batched key-in-set query and return records in
 * whatever order the store yields them. An empty key list never reaches
 * the store.
 */
export interface ILexiconRepository {
  /**
   * Find whole records for the given keys
   */
  findByKeys(keys: readonly string[]): Promise<LexiconDefinition[]>;

  /**
   * Find only the three text fields for the given keys
   */
  findFieldsByKeys(keys: readonly string[]): Promise<LexiconFields[]>;
}
