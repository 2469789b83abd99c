import { AppError } from "./AppError";

/**
 * Infrastructure failure (store or index I/O)
 *
 * Not operational: callers cannot recover from it, so it is surfaced as-is.
 */
export class InternalError extends AppError {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message, "INTERNAL_ERROR", false);
    this.name = "InternalError";
  }

  static wrap(message: string, cause: unknown): InternalError {
    if (cause instanceof InternalError) {
      return cause;
    }
    const detail =
      typeof cause === "object" &&
      cause !== null &&
      "message" in cause &&
      typeof cause.message === "string"
        ? cause.message
        : String(cause);
    return new InternalError(`${message}: ${detail}`, cause);
  }
}
