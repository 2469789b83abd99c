import { AppError } from "./AppError";

/**
 * Domain-level errors
 *
 * These represent business rule violations
 */

export class ValidationError extends AppError {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message, "VALIDATION_ERROR");
    this.name = "ValidationError";
  }

  toJSON() {
    return {
      ...super.toJSON(),
      field: this.field,
    };
  }
}

export class EntityNotFoundError extends AppError {
  constructor(entityName: string, id: string) {
    super(`${entityName} with id ${id} not found`, "ENTITY_NOT_FOUND");
    this.name = "EntityNotFoundError";
  }
}
