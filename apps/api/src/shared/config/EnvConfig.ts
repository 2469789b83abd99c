import path from "path";
import { injectable } from "tsyringe";
import { IConfig, MalformedKeyPolicy, NoMatchPolicy } from "./IConfig";

const NO_MATCH_POLICIES: readonly NoMatchPolicy[] = [
  "passthrough",
  "empty",
  "error",
];
const MALFORMED_KEY_POLICIES: readonly MalformedKeyPolicy[] = [
  "skip",
  "reject",
];

function parsePolicy<T extends string>(
  name: string,
  raw: string | undefined,
  allowed: readonly T[],
  fallback: T,
): T {
  if (raw === undefined || raw === "") {
    return fallback;
  }
  const match = allowed.find((value) => value === raw);
  if (!match) {
    throw new Error(
      `Invalid ${name}: ${raw} (expected one of ${allowed.join(", ")})`,
    );
  }
  return match;
}

/**
 * Environment-based configuration implementation
 *
 * Reads configuration from process.env and validates on startup
 */
@injectable()
export class EnvConfig implements IConfig {
  readonly port: number;
  readonly nodeEnv: string;
  readonly logLevel: string;

  readonly supabaseUrl: string;
  readonly supabaseAnonKey: string;

  readonly noMatchPolicy: NoMatchPolicy;
  readonly malformedKeyPolicy: MalformedKeyPolicy;

  readonly maxSuggestions: number;
  readonly termIndexPath: string;

  constructor() {
    this.port = parseInt(process.env.PORT || "3001", 10);
    this.nodeEnv = process.env.NODE_ENV || "development";
    this.logLevel = process.env.LOG_LEVEL || "info";

    this.supabaseUrl = process.env.SUPABASE_URL || "";
    this.supabaseAnonKey = process.env.SUPABASE_ANON_KEY || "";

    this.noMatchPolicy = parsePolicy(
      "VOCAB_NO_MATCH_POLICY",
      process.env.VOCAB_NO_MATCH_POLICY,
      NO_MATCH_POLICIES,
      "passthrough",
    );
    this.malformedKeyPolicy = parsePolicy(
      "VOCAB_MALFORMED_KEY_POLICY",
      process.env.VOCAB_MALFORMED_KEY_POLICY,
      MALFORMED_KEY_POLICIES,
      "skip",
    );

    this.maxSuggestions = parseInt(process.env.MAX_SUGGESTIONS || "10", 10);
    this.termIndexPath =
      process.env.TERM_INDEX_PATH ||
      path.join(__dirname, "..", "..", "..", "data", "lexicon-index.json");

    this.validate();
  }

  validate(): void {
    const required = [
      { name: "SUPABASE_URL", value: this.supabaseUrl },
      { name: "SUPABASE_ANON_KEY", value: this.supabaseAnonKey },
    ];

    const missing = required.filter((r) => !r.value);

    if (missing.length > 0) {
      throw new Error(
        `Missing required environment variables: ${missing.map((m) => m.name).join(", ")}`,
      );
    }

    if (Number.isNaN(this.port) || this.port < 1 || this.port > 65535) {
      throw new Error(`Invalid PORT: ${this.port}`);
    }

    if (Number.isNaN(this.maxSuggestions) || this.maxSuggestions < 1) {
      throw new Error(`Invalid MAX_SUGGESTIONS: ${this.maxSuggestions}`);
    }
  }
}
