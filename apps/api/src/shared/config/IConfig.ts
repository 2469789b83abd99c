/**
 * Configuration interface
 *
 * Defines all configuration values needed by the application.
 * Implementations can come from environment variables, files, or config services.
 */

export type NoMatchPolicy = "passthrough" | "empty" | "error";
export type MalformedKeyPolicy = "skip" | "reject";

export interface IConfig {
  // Server
  readonly port: number;
  readonly nodeEnv: string;
  readonly logLevel: string;

  // Database
  readonly supabaseUrl: string;
  readonly supabaseAnonKey: string;

  // Vocabulary
  readonly noMatchPolicy: NoMatchPolicy;
  readonly malformedKeyPolicy: MalformedKeyPolicy;

  // Search
  readonly maxSuggestions: number;
  readonly termIndexPath: string;

  // Validation
  validate(): void;
}
