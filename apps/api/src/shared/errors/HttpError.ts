import { AppError } from "./AppError";

/**
 * HTTP-level errors
 *
 * These map to HTTP status codes
 */

export class HttpError extends AppError {
  constructor(
    message: string,
    public readonly statusCode: number,
    code: string,
  ) {
    super(message, code);
    this.name = "HttpError";
  }

  toJSON() {
    return {
      ...super.toJSON(),
      statusCode: this.statusCode,
    };
  }
}

export class BadRequestError extends HttpError {
  constructor(message: string) {
    super(message, 400, "BAD_REQUEST");
    this.name = "BadRequestError";
  }
}
