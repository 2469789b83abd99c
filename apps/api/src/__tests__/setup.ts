/**
 * Jest test setup
 *
 * Runs before each test file
 */

import "reflect-metadata";

// Set test environment variables
process.env.NODE_ENV = "test";
process.env.SUPABASE_URL = "https://test.supabase.co";
process.env.SUPABASE_ANON_KEY = "test-anon-key";
process.env.PORT = "3001";
process.env.LOG_LEVEL = "silent";
