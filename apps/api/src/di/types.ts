/**
 * Dependency Injection Types/Tokens
 *
 * All injectable dependencies are registered here using symbols
 * to avoid string-based injection which is error-prone
 */

export const TYPES = {
  // Configuration
  Config: Symbol.for("Config"),

  // Logging
  Logger: Symbol.for("Logger"),

  // Database
  SupabaseClient: Symbol.for("SupabaseClient"),

  // Repositories
  LexiconRepository: Symbol.for("LexiconRepository"),

  // Search
  IndexSearcher: Symbol.for("IndexSearcher"),

  // Application Services
  VocabularyService: Symbol.for("VocabularyService"),
  SuggestionService: Symbol.for("SuggestionService"),
} as const;

export type DITypes = typeof TYPES;
