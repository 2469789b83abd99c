import express, { Express } from "express";
import cors from "cors";
import helmet from "helmet";
import morgan from "morgan";
import { createVocabularyRouter } from "./routes/vocabulary.routes";
import { createSearchRouter } from "./routes/search.routes";
import { errorHandler } from "./middleware/ErrorHandler";

export interface AppOptions {
  /** Write access logs (off in tests) */
  accessLog?: boolean;
}

/**
 * Build the Express app. Expects the DI container to be fully registered.
 */
export function createApp(options: AppOptions = {}): Express {
  const app = express();

  // Security middleware
  app.use(helmet());

  app.use(
    cors({
      origin: ["http://localhost:5173"],
    }),
  );

  if (options.accessLog ?? true) {
    app.use(morgan("combined"));
  }

  app.get("/health", (_req, res) => {
    res.json({
      ok: true,
      service: "lexicon-api",
    });
  });

  app.use("/api/vocabulary", createVocabularyRouter());
  app.use("/api/search", createSearchRouter());

  // 404 handler
  app.use((_req, res) => {
    res.status(404).json({ error: "Not Found" });
  });

  // Centralized error handler (must be last)
  app.use(errorHandler);

  return app;
}
