/**
 * Base application error class
 *
 * Every error the lexicon API raises on purpose extends this class, so the
 * HTTP layer can tell expected failures from bugs.
 */

export interface SerializedAppError {
  name: string;
  message: string;
  code: string;
  timestamp: string;
}

export abstract class AppError extends Error {
  public readonly isOperational: boolean;
  public readonly timestamp: Date;

  constructor(
    message: string,
    public readonly code: string,
    isOperational = true,
  ) {
    super(message);
    this.name = this.constructor.name;
    this.isOperational = isOperational;
    this.timestamp = new Date();

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): SerializedAppError {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp.toISOString(),
    };
  }
}
