import "reflect-metadata";
import {
  container,
  DependencyContainer,
  instanceCachingFactory,
} from "tsyringe";
import { TYPES } from "./types";

// Configuration
import { IConfig } from "../shared/config/IConfig";
import { EnvConfig } from "../shared/config/EnvConfig";

// Logging
import { ILogger } from "../infrastructure/logging/ILogger";
import { PinoLogger } from "../infrastructure/logging/PinoLogger";

// Persistence
import { SupabaseClient } from "../infrastructure/persistence/supabase/SupabaseClient";
import { ILexiconRepository } from "../domain/lexicon/repositories/ILexiconRepository";
import { SupabaseLexiconRepository } from "../infrastructure/persistence/supabase/repositories/SupabaseLexiconRepository";

// Search
import { IIndexSearcher } from "../domain/search/IIndexSearcher";

// Services
import { VocabularyService } from "../application/vocabulary/VocabularyService";
import { SuggestionService } from "../application/search/SuggestionService";

/**
 * Dependency Injection Container Configuration
 *
 * Registers all dependencies and their implementations. The index searcher
 * is loaded asynchronously at start up, so it is registered separately.
 */
export class DIContainer {
  static initialize(): void {
    // Configuration
    container.registerSingleton<IConfig>(TYPES.Config, EnvConfig);

    // Logging
    container.register<ILogger>(TYPES.Logger, {
      useFactory: instanceCachingFactory<ILogger>((c) =>
        DIContainer.createLogger(c.resolve<IConfig>(TYPES.Config)),
      ),
    });

    // Database
    container.registerSingleton<SupabaseClient>(
      TYPES.SupabaseClient,
      SupabaseClient,
    );

    // Repositories
    container.register<ILexiconRepository>(TYPES.LexiconRepository, {
      useClass: SupabaseLexiconRepository,
    });

    // Services
    DIContainer.registerServices(container);
  }

  static createLogger(config: IConfig): PinoLogger {
    return new PinoLogger({
      level: config.logLevel,
      pretty: config.nodeEnv !== "production",
    });
  }

  static registerServices(target: DependencyContainer): void {
    target.register(TYPES.VocabularyService, {
      useClass: VocabularyService,
    });
    target.register(TYPES.SuggestionService, {
      useClass: SuggestionService,
    });
  }

  static registerIndexSearcher(searcher: IIndexSearcher): void {
    container.registerInstance<IIndexSearcher>(TYPES.IndexSearcher, searcher);
  }

  static getContainer(): DependencyContainer {
    return container;
  }
}

export { container };
