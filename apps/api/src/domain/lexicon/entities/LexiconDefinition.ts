/**
 * Lexicon Types
 *
 * Reference data for one strong number. Loaded by an external import job;
 * this service only reads it.
 */

export interface LexiconDefinition {
  /** Normalized key, e.g. G0123 */
  strongNumber: string;
  /** Original-language spelling */
  original: string;
  /** Short English gloss */
  shortDefinition: string;
  simpleTransliteration: string;
  mediumDefinition: string | null;
  pronunciation: string | null;
}

/**
 * The projection used when only one text field is needed
 */
export type LexiconFields = Pick<
  LexiconDefinition,
  "original" | "shortDefinition" | "simpleTransliteration"
>;
