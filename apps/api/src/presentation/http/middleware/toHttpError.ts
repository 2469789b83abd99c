import { ZodError } from "zod";
import { BadRequestError } from "../../../shared/errors/HttpError";

/**
 * Turns malformed query strings into 400s; domain errors pass through to the
 * error handler unchanged.
 */
export function toHttpError(error: unknown): unknown {
  if (error instanceof ZodError) {
    return new BadRequestError(
      error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; "),
    );
  }
  return error;
}
