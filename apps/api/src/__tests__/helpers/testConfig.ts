import { IConfig } from "../../shared/config/IConfig";

type ConfigValues = Omit<IConfig, "validate">;

/**
 * IConfig for tests: no environment lookups, every value overridable
 */
export function createTestConfig(overrides: Partial<ConfigValues> = {}): IConfig {
  return {
    port: 3001,
    nodeEnv: "test",
    logLevel: "silent",
    supabaseUrl: "https://test.supabase.co",
    supabaseAnonKey: "test-anon-key",
    noMatchPolicy: "passthrough",
    malformedKeyPolicy: "skip",
    maxSuggestions: 10,
    termIndexPath: "test-index.json",
    validate: () => undefined,
    ...overrides,
  };
}
