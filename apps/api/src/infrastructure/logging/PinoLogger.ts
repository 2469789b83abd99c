import pino from "pino";
import { ILogger, LogContext } from "./ILogger";

export interface PinoLoggerOptions {
  name?: string;
  level?: string;
  /** Human-readable output through pino-pretty */
  pretty?: boolean;
  /** Wrap an existing pino instance instead of creating one */
  instance?: pino.Logger;
}

/**
 * Pino logger implementation
 *
 * Registered through a factory in the container so the level comes from IConfig.
 */
export class PinoLogger implements ILogger {
  private logger: pino.Logger;

  constructor(options: PinoLoggerOptions = {}) {
    if (options.instance) {
      this.logger = options.instance;
      return;
    }

    this.logger = pino({
      name: options.name ?? "lexicon-api",
      level: options.level ?? "info",
      transport: options.pretty
        ? {
            target: "pino-pretty",
            options: {
              colorize: true,
              ignore: "pid,hostname",
              translateTime: "SYS:standard",
            },
          }
        : undefined,
    });
  }

  debug(message: string, context?: LogContext): void {
    this.logger.debug(context || {}, message);
  }

  info(message: string, context?: LogContext): void {
    this.logger.info(context || {}, message);
  }

  warn(message: string, context?: LogContext): void {
    this.logger.warn(context || {}, message);
  }

  error(message: string, error?: Error, context?: LogContext): void {
    this.logger.error({ ...context, err: error }, message);
  }

  fatal(message: string, error?: Error, context?: LogContext): void {
    this.logger.fatal({ ...context, err: error }, message);
  }

  child(bindings: LogContext): ILogger {
    return new PinoLogger({ instance: this.logger.child(bindings) });
  }
}
