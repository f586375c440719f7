export abstract class AppError extends Error {
  public constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A lookup by id matched zero rows. */
export class NotFoundError extends AppError {
  public readonly entity: string;
  public readonly id: number;

  public constructor(entity: string, id: number) {
    super(`${entity} ${id} not found`);
    this.entity = entity;
    this.id = id;
  }
}

/** Malformed input rejected before it reaches the store. */
export class ValidationError extends AppError {
  public readonly issues: string[];

  public constructor(message: string, issues: string[] = []) {
    super(message);
    this.issues = issues;
  }
}

/**
 * Any storage failure: constraint violations, I/O errors, malformed
 * statements, and rows that point at data that is no longer there.
 */
export class PersistenceError extends AppError {}
